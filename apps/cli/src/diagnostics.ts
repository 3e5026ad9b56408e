import type { Diagnostic, DiagnosticSeverity } from "@locus/location";

type Position = { index: number; line: number; column: number };

type Colorizer = {
  severityLabel: (severity: DiagnosticSeverity) => string;
  pointer: (severity: DiagnosticSeverity, text: string) => string;
  accent: (text: string) => string;
  muted: (text: string) => string;
};

const clampIndex = (value: number, max: number): number => {
  if (value < 0) return 0;
  if (value > max) return max;
  return value;
};

const createLineStarts = (source: string): number[] => {
  const starts = [0];
  for (let i = 0; i < source.length; i += 1) {
    if (source[i] === "\n") {
      starts.push(i + 1);
    }
  }
  return starts;
};

const positionAt = (starts: number[], index: number): Position => {
  let line = 0;
  for (let i = 1; i < starts.length; i += 1) {
    if (starts[i] > index) break;
    line = i;
  }
  return { index, line, column: index - starts[line] };
};

const colorForSeverity = (
  severity: DiagnosticSeverity,
): ((text: string) => string) => {
  switch (severity) {
    case "warning":
      return (text) => `\u001B[33m${text}\u001B[0m`;
    case "note":
      return (text) => `\u001B[36m${text}\u001B[0m`;
    default:
      return (text) => `\u001B[31m${text}\u001B[0m`;
  }
};

const createColorizer = (enabled: boolean): Colorizer => {
  if (!enabled) {
    const identity = (text: string) => text;
    return {
      severityLabel: (severity) => severity.toUpperCase(),
      pointer: (_severity, text) => text,
      accent: identity,
      muted: identity,
    };
  }

  const bold = (text: string) => `\u001B[1m${text}\u001B[0m`;
  const dim = (text: string) => `\u001B[2m${text}\u001B[0m`;
  return {
    severityLabel: (severity) =>
      bold(colorForSeverity(severity)(severity.toUpperCase())),
    pointer: (severity, text) => colorForSeverity(severity)(text),
    accent: (text) => `\u001B[35m${text}\u001B[0m`,
    muted: dim,
  };
};

const formatSnippet = ({
  diagnostic,
  source,
  gutter,
  start,
  end,
  color,
}: {
  diagnostic: Diagnostic;
  source: string;
  gutter: string;
  start: Position;
  end: Position;
  color: Colorizer;
}): string => {
  const lineText = source.split("\n")[start.line] ?? "";
  const lastColumn = end.line === start.line ? end.column : lineText.length;
  const pointerLength = Math.max(1, lastColumn - start.column);
  const padding = " ".repeat(gutter.length);
  const marker = `${" ".repeat(start.column)}${color.pointer(
    diagnostic.severity,
    "^".repeat(pointerLength),
  )}`;

  return [
    `${padding} |`,
    `${gutter} | ${lineText}`,
    `${padding} | ${marker} ${color.muted(diagnostic.message)}`,
  ].join("\n");
};

/**
 * Renders a diagnostic for the terminal. With the offending input it reads as
 * `file:input:column` followed by the input and a pointer under the span;
 * without it, the span's raw offsets are shown.
 */
export const formatCliDiagnostic = (
  diagnostic: Diagnostic,
  options: { source?: string; line?: number; color?: boolean } = {},
): string => {
  const color = createColorizer(options.color ?? true);
  const phase = diagnostic.phase ? ` [${diagnostic.phase}]` : "";
  const describe = (location: string) =>
    `${location} ${color.severityLabel(diagnostic.severity)}${phase} ${color.accent(
      diagnostic.code,
    )}: ${diagnostic.message}`;
  const { span } = diagnostic;

  if (options.source === undefined) {
    return describe(`${span.file}:${span.start}-${span.end}`);
  }

  const { source } = options;
  const starts = createLineStarts(source);
  const startIndex = clampIndex(span.start, source.length);
  const start = positionAt(starts, startIndex);
  const end = positionAt(starts, Math.max(clampIndex(span.end, source.length), startIndex));
  const line = (options.line ?? 1) + start.line;
  const header = describe(`${span.file}:${line}:${start.column + 1}`);
  const snippet = formatSnippet({
    diagnostic,
    source,
    gutter: `${line}`,
    start,
    end,
    color,
  });

  return `${header}\n${snippet}`;
};
