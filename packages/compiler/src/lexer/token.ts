import type { Location } from "../common/location.js";

export const keywords = [
  "and",
  "assert",
  "const",
  "else",
  "false",
  "for",
  "func",
  "if",
  "in",
  "let",
  "new",
  "not",
  "or",
  "record",
  "return",
  "true",
  "while",
] as const;

export const oneCharOperators = [
  "=",
  "+",
  "-",
  "*",
  "/",
  "%",
  "<",
  ">",
  ".",
  ",",
  ";",
  ":",
  "(",
  ")",
  "[",
  "]",
  "{",
  "}",
] as const;

export const twoCharOperators = ["->", "==", "!=", "<=", ">=", "++"] as const;

export type Keyword = (typeof keywords)[number];
export type OneCharOperator = (typeof oneCharOperators)[number];
export type TwoCharOperator = (typeof twoCharOperators)[number];

export type TokenKind =
  | "int"
  | "str"
  | "symbol"
  | OneCharOperator
  | TwoCharOperator
  | Keyword
  | "eof"
  | "unknown";

const keywordSet: ReadonlySet<string> = new Set(keywords);
const oneCharSet: ReadonlySet<string> = new Set(oneCharOperators);
const twoCharSet: ReadonlySet<string> = new Set(twoCharOperators);

export const isKeyword = (value: string): value is Keyword =>
  keywordSet.has(value);

export const isOneCharOperator = (value: string): value is OneCharOperator =>
  oneCharSet.has(value);

export const isTwoCharOperator = (value: string): value is TwoCharOperator =>
  twoCharSet.has(value);

export class Token {
  readonly kind: TokenKind;
  readonly lexeme: string;
  readonly location: Location;

  constructor(opts: { kind: TokenKind; lexeme: string; location: Location }) {
    this.kind = opts.kind;
    this.lexeme = opts.lexeme;
    this.location = opts.location;
  }

  /** Location is not significant for equality. */
  eq(other: Token): boolean {
    return this.kind === other.kind && this.lexeme === other.lexeme;
  }

  toString(): string {
    return this.kind === "eof" ? "end of file" : this.lexeme;
  }
}
