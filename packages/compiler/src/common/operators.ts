export type ArithmeticOp = "add" | "sub" | "mul" | "div" | "mod";
export type ComparisonOp = "lt" | "le" | "gt" | "ge" | "eq" | "ne";
export type LogicalOp = "and" | "or";

export type BinaryOp = ArithmeticOp | ComparisonOp | LogicalOp | "concat";

export type UnaryOp = "neg" | "not";

export const binaryOpSymbols: Record<BinaryOp, string> = {
  add: "+",
  sub: "-",
  mul: "*",
  div: "/",
  mod: "%",
  concat: "++",
  or: "or",
  and: "and",
  lt: "<",
  le: "<=",
  gt: ">",
  ge: ">=",
  eq: "==",
  ne: "!=",
};

export const unaryOpSymbols: Record<UnaryOp, string> = {
  neg: "-",
  not: "not",
};
