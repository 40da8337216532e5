export * from "./ir.js";
export * from "./builder.js";
export * from "./lower.js";
export * from "./print.js";
export * from "./validate.js";
export * from "./runtime.js";
