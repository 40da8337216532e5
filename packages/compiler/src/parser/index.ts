export * from "./parser.js";
export { ParserSyntaxError } from "./errors.js";
export { decodeStringLiteral } from "./grammar.js";
