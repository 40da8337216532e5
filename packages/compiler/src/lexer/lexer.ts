import { CharStream } from "./char-stream.js";
import {
  Token,
  isKeyword,
  isOneCharOperator,
  isTwoCharOperator,
  type TokenKind,
} from "./token.js";
import { DiagnosticEmitter } from "../diagnostics/index.js";
import type { Diagnostic } from "../diagnostics/index.js";
import type { Location } from "../common/location.js";

const WHITESPACE = /^\s$/u;
const ASCII_DIGIT = /^[0-9]$/;
const SYMBOL_START = /^[A-Za-z_]$/;
const SYMBOL_CHAR = /^[A-Za-z0-9_]$/;

export const isWhitespace = (char?: string): boolean =>
  char !== undefined && WHITESPACE.test(char);

export const isDigit = (char?: string): boolean =>
  char !== undefined && ASCII_DIGIT.test(char);

export const isSymbolStart = (char?: string): boolean =>
  char !== undefined && SYMBOL_START.test(char);

export const isSymbolChar = (char?: string): boolean =>
  char !== undefined && SYMBOL_CHAR.test(char);

/**
 * Produces tokens on demand. Construction stages the first token, so
 * `current()` is valid immediately; once the end of input is reached every
 * further `advance()` yields another EOF token.
 */
export class Lexer {
  readonly file: string;
  readonly #chars: CharStream;
  readonly #diagnostics = new DiagnosticEmitter();
  #token: Token;

  constructor(file: string, source: string) {
    this.file = file;
    this.#chars = new CharStream(source, file);
    this.#token = this.#scan();
  }

  current(): Token {
    return this.#token;
  }

  advance(): Token {
    this.#token = this.#scan();
    return this.#token;
  }

  done(): boolean {
    return this.#token.kind === "eof";
  }

  get diagnostics(): readonly Diagnostic[] {
    return this.#diagnostics.diagnostics;
  }

  #scan(): Token {
    this.#skipWhitespaceAndComments();

    const chars = this.#chars;
    const start = chars.position;
    const location = chars.currentLocation();
    const char = chars.next;

    if (char === undefined) {
      return this.#makeToken("eof", start, location);
    }

    const pair = char + (chars.at(1) ?? "");
    if (isTwoCharOperator(pair)) {
      chars.consumeChar();
      chars.consumeChar();
      return this.#makeToken(pair, start, location);
    }

    if (isOneCharOperator(char)) {
      chars.consumeChar();
      return this.#makeToken(char, start, location);
    }

    if (isDigit(char)) {
      while (isDigit(chars.next)) chars.consumeChar();
      return this.#makeToken("int", start, location);
    }

    if (char === '"') {
      return this.#consumeString(start, location);
    }

    if (isSymbolStart(char)) {
      while (isSymbolChar(chars.next)) chars.consumeChar();
      const value = chars.slice(start);
      return this.#makeToken(isKeyword(value) ? value : "symbol", start, location);
    }

    chars.consumeChar();
    return this.#makeToken("unknown", start, location);
  }

  #consumeString(start: number, location: Location): Token {
    const chars = this.#chars;
    chars.consumeChar();

    while (chars.hasCharacters) {
      const char = chars.consumeChar();
      if (char === '"') {
        return this.#makeToken("str", start, location);
      }

      // The escaped character is kept verbatim; the parser decodes escapes.
      if (char === "\\" && chars.hasCharacters) {
        chars.consumeChar();
      }
    }

    this.#diagnostics.report({
      code: "LX0001",
      params: { kind: "unterminated-string" },
      location,
    });
    return this.#makeToken("str", start, location);
  }

  #skipWhitespaceAndComments(): void {
    const chars = this.#chars;
    while (chars.hasCharacters) {
      if (isWhitespace(chars.next)) {
        chars.consumeChar();
        continue;
      }

      if (chars.next === "/" && chars.at(1) === "/") {
        while (chars.hasCharacters && chars.at(0) !== "\n") {
          chars.consumeChar();
        }
        continue;
      }

      break;
    }
  }

  #makeToken(kind: TokenKind, start: number, location: Location): Token {
    return new Token({ kind, lexeme: this.#chars.slice(start), location });
  }
}

/** Lexes the whole source, including the final EOF token. */
export const tokenize = (
  file: string,
  source: string
): { tokens: Token[]; diagnostics: readonly Diagnostic[] } => {
  const lexer = new Lexer(file, source);
  const tokens = [lexer.current()];
  while (!lexer.done()) {
    tokens.push(lexer.advance());
  }
  return { tokens, diagnostics: lexer.diagnostics };
};
