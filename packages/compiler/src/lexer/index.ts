export * from "./token.js";
export * from "./lexer.js";
export * from "./print.js";
export { CharStream } from "./char-stream.js";
