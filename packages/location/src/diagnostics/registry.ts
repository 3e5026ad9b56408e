import type {
  DiagnosticHint,
  DiagnosticPhase,
  DiagnosticSeverity,
} from "./types.js";

type DiagnosticMessage<P> = (params: P) => string;

export type DiagnosticDefinition<P> = {
  code: string;
  message: DiagnosticMessage<P>;
  severity?: DiagnosticSeverity;
  phase?: DiagnosticPhase;
  hints?: readonly DiagnosticHint[];
};

type DiagnosticParamsMap = {
  LB0001:
    | { kind: "missing-field"; variant: string; field: string }
    | { kind: "empty-name" }
    | { kind: "empty-chain" };
  LB0002: {
    kind: "foreign-child";
    variant: string;
    field: string;
    childContext: string;
    targetContext: string;
  };
  LB0003: { kind: "invalid-range"; filename: string; reason: string };
  LB0004: { kind: "invalid-integer"; path: string; value: string };
  LI0001: { kind: "context-disposed"; context: string; operation: string };
  LO0001:
    | { kind: "tag-mismatch"; expected: string; actual: string }
    | { kind: "not-opaque"; expected: string; actualKind: string }
    | { kind: "target-released"; expected: string };
  LP0001:
    | { kind: "invalid-integer"; text: string }
    | { kind: "invalid-range"; reason: string };
  LP0002:
    | { kind: "unexpected-token"; expected: string; found: string }
    | { kind: "unexpected-character"; character: string }
    | { kind: "unterminated-string" }
    | { kind: "invalid-escape"; sequence: string };
};

export type DiagnosticCode = keyof DiagnosticParamsMap;

export type DiagnosticParams<K extends DiagnosticCode> = DiagnosticParamsMap[K];

export const diagnosticsRegistry: {
  [K in DiagnosticCode]: DiagnosticDefinition<DiagnosticParamsMap[K]>;
} = {
  LB0001: {
    code: "LB0001",
    message: (params) => {
      switch (params.kind) {
        case "missing-field":
          return `${params.variant} location is missing required field '${params.field}'`;
        case "empty-name":
          return "name location requires a non-empty name";
        case "empty-chain":
          return "call-site chain requires at least one frame";
      }
      return exhaustive(params);
    },
    severity: "error",
    phase: "builder",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["LB0001"]>,
  LB0002: {
    code: "LB0002",
    message: (params) =>
      `${params.variant} location field '${params.field}' belongs to context ${params.childContext}, not ${params.targetContext}`,
    severity: "error",
    phase: "builder",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["LB0002"]>,
  LB0003: {
    code: "LB0003",
    message: (params) =>
      `invalid range in ${JSON.stringify(params.filename)}: ${params.reason}`,
    severity: "error",
    phase: "builder",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["LB0003"]>,
  LB0004: {
    code: "LB0004",
    message: (params) =>
      `fused ${params.path} must be a safe integer, got ${params.value}`,
    severity: "error",
    phase: "builder",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["LB0004"]>,
  LI0001: {
    code: "LI0001",
    message: (params) =>
      `cannot ${params.operation}: location context ${params.context} has been disposed`,
    severity: "error",
    phase: "interner",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["LI0001"]>,
  LO0001: {
    code: "LO0001",
    message: (params) => {
      switch (params.kind) {
        case "tag-mismatch":
          return `opaque location holds ${params.actual}, not ${params.expected}`;
        case "not-opaque":
          return `expected an opaque location holding ${params.expected}, found ${params.actualKind}`;
        case "target-released":
          return `the ${params.expected} referenced by this opaque location has been released`;
      }
      return exhaustive(params);
    },
    severity: "error",
    phase: "opaque",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["LO0001"]>,
  LP0001: {
    code: "LP0001",
    message: (params) =>
      params.kind === "invalid-integer"
        ? `invalid integer '${params.text}'`
        : `invalid range: ${params.reason}`,
    severity: "error",
    phase: "parser",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["LP0001"]>,
  LP0002: {
    code: "LP0002",
    message: (params) => {
      switch (params.kind) {
        case "unexpected-token":
          return `expected ${params.expected}, found ${params.found}`;
        case "unexpected-character":
          return `unexpected character '${params.character}'`;
        case "unterminated-string":
          return "unterminated string literal";
        case "invalid-escape":
          return `invalid escape sequence '${params.sequence}'`;
      }
      return exhaustive(params);
    },
    severity: "error",
    phase: "parser",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["LP0002"]>,
} as const;

export const formatDiagnosticMessage = <K extends DiagnosticCode>(
  code: K,
  params: DiagnosticParams<K>,
): string => diagnosticsRegistry[code].message(params);

export const getDiagnosticDefinition = <K extends DiagnosticCode>(code: K) =>
  diagnosticsRegistry[code];

export const diagnosticCodes = (): DiagnosticCode[] =>
  Object.keys(diagnosticsRegistry).filter(isDiagnosticCode);

const isDiagnosticCode = (code: string): code is DiagnosticCode =>
  code in diagnosticsRegistry;

const exhaustive = (_value: never): never => _value;
