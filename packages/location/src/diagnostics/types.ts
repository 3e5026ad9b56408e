export type DiagnosticSeverity = "error" | "warning" | "note";

export type DiagnosticPhase = "builder" | "interner" | "opaque" | "parser";

/** Character offsets into the text a diagnostic refers to. */
export interface SourceSpan {
  file: string;
  start: number;
  end: number;
}

export interface DiagnosticHint {
  message: string;
}

export interface Diagnostic {
  code: string;
  message: string;
  severity: DiagnosticSeverity;
  phase?: DiagnosticPhase;
  span: SourceSpan;
  related?: readonly Diagnostic[];
  hints?: readonly DiagnosticHint[];
}

export type DiagnosticInput = Omit<Diagnostic, "severity" | "phase"> & {
  severity?: DiagnosticSeverity;
  phase?: DiagnosticPhase;
};
