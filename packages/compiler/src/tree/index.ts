export * from "./syntax.js";
export * from "./print.js";
export * from "./format.js";
