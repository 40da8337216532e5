import type { Token } from "./token.js";

/**
 * Joins token lexemes with single spaces. Every token boundary gets a
 * separator, so the output relexes to the same token sequence.
 */
export const reprintTokens = (tokens: readonly Token[]): string =>
  tokens
    .filter((token) => token.kind !== "eof")
    .map((token) => token.lexeme)
    .join(" ");
