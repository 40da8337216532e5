export * from "./types.js";
export * from "./symbol-table.js";
export * from "./builtins.js";
export * from "./analyzer.js";
export * from "./print.js";
