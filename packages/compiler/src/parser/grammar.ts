import type { BinaryOp, UnaryOp } from "../common/operators.js";
import type { TokenKind } from "../lexer/token.js";

export type InfixOp = { op: BinaryOp; precedence: number };

/** Key is the operator token, value its tree operator and precedence */
export const infixOps: ReadonlyMap<TokenKind, InfixOp> = new Map<
  TokenKind,
  InfixOp
>([
  ["or", { op: "or", precedence: 1 }],
  ["and", { op: "and", precedence: 2 }],
  ["<", { op: "lt", precedence: 3 }],
  ["<=", { op: "le", precedence: 3 }],
  [">", { op: "gt", precedence: 3 }],
  [">=", { op: "ge", precedence: 3 }],
  ["==", { op: "eq", precedence: 3 }],
  ["!=", { op: "ne", precedence: 3 }],
  ["+", { op: "add", precedence: 4 }],
  ["-", { op: "sub", precedence: 4 }],
  ["++", { op: "concat", precedence: 4 }],
  ["*", { op: "mul", precedence: 5 }],
  ["/", { op: "div", precedence: 5 }],
  ["%", { op: "mod", precedence: 5 }],
]);

export const LOWEST_PRECEDENCE = 1;

export const prefixOps: ReadonlyMap<TokenKind, UnaryOp> = new Map<
  TokenKind,
  UnaryOp
>([
  ["-", "neg"],
  ["not", "not"],
]);

const statementKeywords: ReadonlySet<TokenKind> = new Set<TokenKind>([
  "let",
  "if",
  "while",
  "for",
  "return",
  "assert",
]);

const declarationKeywords: ReadonlySet<TokenKind> = new Set<TokenKind>([
  "func",
  "const",
  "record",
]);

export const isStatementKeyword = (kind: TokenKind): boolean =>
  statementKeywords.has(kind);

export const isDeclarationKeyword = (kind: TokenKind): boolean =>
  declarationKeywords.has(kind);

const escapes: Record<string, string> = {
  n: "\n",
  t: "\t",
  r: "\r",
  "\\": "\\",
  '"': '"',
  "0": "\0",
};

/**
 * Decodes the body of a string token. Unknown escapes stand for the escaped
 * character itself.
 */
export const decodeStringLiteral = (lexeme: string): string => {
  const chars = Array.from(lexeme).slice(1);
  let value = "";
  for (let index = 0; index < chars.length; index += 1) {
    const char = chars[index];
    if (char === undefined || char === '"') break;
    if (char === "\\") {
      index += 1;
      const escaped = chars[index];
      if (escaped === undefined) break;
      value += escapes[escaped] ?? escaped;
      continue;
    }
    value += char;
  }
  return value;
};

export const I64_MAX = 2n ** 63n - 1n;
