import {
  DiagnosticError,
  diagnosticFromCode,
  type DiagnosticCode,
  type DiagnosticHint,
  type RegistryDiagnosticOptions,
} from "./diagnostics/index.js";

export type LocationErrorKind =
  | "MissingRequiredField"
  | "ContextMismatch"
  | "InvalidRange"
  | "TypeTagMismatch"
  | "ContextDisposed"
  | "SyntaxError";

const errorKindsByCode: Record<DiagnosticCode, LocationErrorKind> = {
  LB0001: "MissingRequiredField",
  LB0002: "ContextMismatch",
  LB0003: "InvalidRange",
  LB0004: "InvalidRange",
  LI0001: "ContextDisposed",
  LO0001: "TypeTagMismatch",
  LP0001: "InvalidRange",
  LP0002: "SyntaxError",
};

/** Attached to errors about a missing child location. */
export const missingChildHint: DiagnosticHint = {
  message:
    "Pass the context's unknown location explicitly when no origin is available.",
};

export class LocationError extends DiagnosticError {
  readonly kind: LocationErrorKind;

  constructor(kind: LocationErrorKind, ...args: ConstructorParameters<typeof DiagnosticError>) {
    super(...args);
    this.name = "LocationError";
    this.kind = kind;
  }
}

export const locationError = <K extends DiagnosticCode>(
  options: RegistryDiagnosticOptions<K>,
): LocationError =>
  new LocationError(errorKindsByCode[options.code], diagnosticFromCode(options));

export const isLocationError = (
  error: unknown,
  kind?: LocationErrorKind,
): error is LocationError =>
  error instanceof LocationError && (kind === undefined || error.kind === kind);
