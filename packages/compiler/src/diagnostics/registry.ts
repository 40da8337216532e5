import type { DiagnosticPhase, DiagnosticSeverity } from "./types.js";

type DiagnosticMessage<P> = (params: P) => string;

export type DiagnosticDefinition<P> = {
  code: string;
  message: DiagnosticMessage<P>;
  severity?: DiagnosticSeverity;
  phase?: DiagnosticPhase;
};

type DiagnosticParamsMap = {
  LX0001: { kind: "unterminated-string" };
  PS0001: { kind: "unexpected-token"; expected: string; got?: string };
  PS0002: { kind: "integer-out-of-range"; lexeme: string };
  PS0003: { kind: "invalid-assignment-target" };
  PS0004: { kind: "invalid-callee" };
  TY0001: { kind: "type-mismatch"; expected: string; actual: string };
  TY0002: { kind: "undefined-symbol"; name: string };
  TY0003: { kind: "unknown-type"; name: string };
  TY0004:
    | { kind: "duplicate-binding"; name: string }
    | { kind: "duplicate-declaration"; name: string };
  TY0005: { kind: "constant-assignment"; name: string };
  TY0006: { kind: "not-callable"; name: string };
  TY0007: { kind: "arity"; expected: number; actual: number };
  TY0008: { kind: "not-indexable"; type: string };
  TY0009:
    | { kind: "tuple-index-out-of-range"; index: number; type: string }
    | { kind: "not-a-tuple"; type: string };
  TY0010:
    | { kind: "unknown-field"; record: string; field: string }
    | { kind: "missing-field"; record: string; field: string }
    | { kind: "duplicate-field"; record: string; field: string }
    | { kind: "not-a-record"; type: string; field: string };
  TY0011:
    | { kind: "not-iterable"; type: string }
    | { kind: "two-variables"; type: string };
  TY0012: { kind: "empty-literal"; collection: "list" | "map" };
  TY0013: { kind: "invalid-operands"; op: string; left: string; right?: string };
  TY0014: { kind: "invalid-main" };
  TY0015: { kind: "function-as-value"; name: string };
  TY0016: { kind: "reserved-name"; name: string };
  TY0017: { kind: "missing-return"; name: string };
};

export type DiagnosticCode = keyof DiagnosticParamsMap;

export type DiagnosticParams<K extends DiagnosticCode> = DiagnosticParamsMap[K];

export const diagnosticsRegistry: {
  [K in DiagnosticCode]: DiagnosticDefinition<DiagnosticParamsMap[K]>;
} = {
  LX0001: {
    code: "LX0001",
    message: () => "unterminated string literal",
    phase: "lexer",
  },
  PS0001: {
    code: "PS0001",
    message: (params) =>
      `expected ${params.expected}, got ${params.got ?? "end of file"}`,
    phase: "parser",
  },
  PS0002: {
    code: "PS0002",
    message: (params) => `integer literal out of range: ${params.lexeme}`,
    phase: "parser",
  },
  PS0003: {
    code: "PS0003",
    message: () => "can only assign to symbols",
    phase: "parser",
  },
  PS0004: {
    code: "PS0004",
    message: () => "function must be a symbol",
    phase: "parser",
  },
  TY0001: {
    code: "TY0001",
    message: (params) => `expected ${params.expected}, got ${params.actual}`,
  },
  TY0002: {
    code: "TY0002",
    message: (params) => `undefined symbol: ${params.name}`,
  },
  TY0003: {
    code: "TY0003",
    message: (params) => `unknown type: ${params.name}`,
  },
  TY0004: {
    code: "TY0004",
    message: (params) =>
      params.kind === "duplicate-binding"
        ? `duplicate binding: ${params.name}`
        : `duplicate declaration: ${params.name}`,
  },
  TY0005: {
    code: "TY0005",
    message: (params) => `cannot assign to constant: ${params.name}`,
  },
  TY0006: {
    code: "TY0006",
    message: (params) => `${params.name} is not a function`,
  },
  TY0007: {
    code: "TY0007",
    message: (params) =>
      `expected ${params.expected} arguments, got ${params.actual}`,
  },
  TY0008: {
    code: "TY0008",
    message: (params) => `type ${params.type} cannot be indexed`,
  },
  TY0009: {
    code: "TY0009",
    message: (params) =>
      params.kind === "tuple-index-out-of-range"
        ? `tuple index ${params.index} out of range for ${params.type}`
        : `type ${params.type} is not a tuple`,
  },
  TY0010: {
    code: "TY0010",
    message: (params) => {
      switch (params.kind) {
        case "unknown-field":
          return `record ${params.record} has no field ${params.field}`;
        case "missing-field":
          return `missing field ${params.field} in ${params.record} literal`;
        case "duplicate-field":
          return `field ${params.field} given twice in ${params.record} literal`;
        case "not-a-record":
          return `type ${params.type} has no field ${params.field}`;
      }
      return exhaustive(params);
    },
  },
  TY0011: {
    code: "TY0011",
    message: (params) =>
      params.kind === "not-iterable"
        ? `type ${params.type} is not iterable`
        : `cannot unpack two loop variables from ${params.type}`,
  },
  TY0012: {
    code: "TY0012",
    message: (params) =>
      `cannot infer the type of an empty ${params.collection} literal`,
  },
  TY0013: {
    code: "TY0013",
    message: (params) =>
      params.right === undefined
        ? `invalid operand type for ${params.op}: ${params.left}`
        : `invalid operand types for ${params.op}: ${params.left} and ${params.right}`,
  },
  TY0014: {
    code: "TY0014",
    message: () => "main must be declared as func main() -> i64",
  },
  TY0015: {
    code: "TY0015",
    message: (params) => `function ${params.name} can only be called`,
  },
  TY0016: {
    code: "TY0016",
    message: (params) =>
      `${params.name} is reserved: names beginning with venice_ belong to the runtime`,
  },
  TY0017: {
    code: "TY0017",
    message: (params) =>
      `function ${params.name} can reach its end without returning a value`,
  },
};

export const formatDiagnosticMessage = <K extends DiagnosticCode>(
  code: K,
  params: DiagnosticParams<K>
): string => diagnosticsRegistry[code].message(params);

export const getDiagnosticDefinition = <K extends DiagnosticCode>(code: K) =>
  diagnosticsRegistry[code];

const exhaustive = (_value: never): never => _value;
