import type { Diagnostic } from "../diagnostics/index.js";
import type { Location } from "../common/location.js";

/** Thrown inside the parser to unwind to the nearest recovery point. */
export class ParserSyntaxError extends Error {
  readonly diagnostic: Diagnostic;

  constructor(diagnostic: Diagnostic) {
    super(diagnostic.message);
    this.name = "ParserSyntaxError";
    this.diagnostic = diagnostic;
  }

  get location(): Location {
    return this.diagnostic.location;
  }
}

export const isParserSyntaxError = (
  error: unknown
): error is ParserSyntaxError => error instanceof ParserSyntaxError;
