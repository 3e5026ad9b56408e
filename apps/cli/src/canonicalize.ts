import {
  DiagnosticEmitter,
  isLocationError,
  parseLocation,
  printLocation,
  type Diagnostic,
  type LocationContext,
} from "@locus/location";

export type CanonicalizeOptions = {
  file: string;
  showKind?: boolean;
};

export type CanonicalizeFailure = {
  /** 1-based position of the input among all inputs. */
  line: number;
  source: string;
  diagnostic: Diagnostic;
};

export type CanonicalizeResult = {
  output: string[];
  failures: CanonicalizeFailure[];
  diagnostics: DiagnosticEmitter;
};

/**
 * Parses each input into `context` and prints it back. A malformed input is
 * recorded and skipped. Errors that are not about the input, including use
 * of a disposed context, propagate.
 */
export const canonicalizeInputs = (
  context: LocationContext,
  inputs: readonly string[],
  options: CanonicalizeOptions,
): CanonicalizeResult => {
  const diagnostics = new DiagnosticEmitter();
  const output: string[] = [];
  const failures: CanonicalizeFailure[] = [];

  inputs.forEach((source, index) => {
    try {
      const location = parseLocation(context, source, { file: options.file });
      const text = printLocation(location);
      output.push(options.showKind ? `${location.kind}\t${text}` : text);
    } catch (error) {
      if (!isLocationError(error) || error.kind === "ContextDisposed") {
        throw error;
      }
      failures.push({
        line: index + 1,
        source,
        diagnostic: diagnostics.report(error.diagnostic),
      });
    }
  });

  return { output, failures, diagnostics };
};

/** Non-empty, trimmed lines of a text stream. */
export const inputLines = (text: string): string[] =>
  text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
