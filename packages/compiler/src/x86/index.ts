export * from "./program.js";
export * from "./codegen.js";
export * from "./print.js";
