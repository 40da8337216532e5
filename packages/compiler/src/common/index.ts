export * from "./location.js";
export * from "./operators.js";
