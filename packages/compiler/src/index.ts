export * from "./common/index.js";
export * from "./diagnostics/index.js";
export * from "./lexer/index.js";
export * from "./parser/index.js";
export * from "./tree/index.js";
export * from "./semantics/index.js";
export * from "./vil/index.js";
export * from "./x86/index.js";
export * from "./pipeline.js";
