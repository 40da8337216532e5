import { binaryOpSymbols, type BinaryOp } from "../common/operators.js";
import type {
  Declaration,
  Expression,
  Program,
  Statement,
  SyntacticType,
} from "./syntax.js";

const INDENT = "    ";

/** Binding strength of each precedence level, loosest first. */
const precedence = {
  or: 1,
  and: 2,
  comparison: 3,
  additive: 4,
  multiplicative: 5,
  unary: 6,
  postfix: 7,
} as const;

const binaryPrecedence: Record<BinaryOp, number> = {
  or: precedence.or,
  and: precedence.and,
  lt: precedence.comparison,
  le: precedence.comparison,
  gt: precedence.comparison,
  ge: precedence.comparison,
  eq: precedence.comparison,
  ne: precedence.comparison,
  add: precedence.additive,
  sub: precedence.additive,
  concat: precedence.additive,
  mul: precedence.multiplicative,
  div: precedence.multiplicative,
  mod: precedence.multiplicative,
};

const expressionPrecedence = <T>(expr: Expression<T>): number => {
  if (expr.kind === "binary") return binaryPrecedence[expr.op];
  if (expr.kind === "unary") return precedence.unary;
  return precedence.postfix;
};

export const formatSyntacticType = (type: SyntacticType): string =>
  type.kind === "literal"
    ? type.name
    : `${type.name}[${type.parameters.map(formatSyntacticType).join(", ")}]`;

const stringEscapes: Record<string, string> = {
  "\\": "\\\\",
  '"': '\\"',
  "\n": "\\n",
  "\t": "\\t",
  "\r": "\\r",
  "\0": "\\0",
};

export const quoteString = (value: string): string =>
  `"${Array.from(value)
    .map((char) => stringEscapes[char] ?? char)
    .join("")}"`;

const formatOperand = <T>(expr: Expression<T>, minimum: number): string => {
  const text = formatExpression(expr);
  return expressionPrecedence(expr) < minimum ? `(${text})` : text;
};

export const formatExpression = <T>(expr: Expression<T>): string => {
  switch (expr.kind) {
    case "boolean":
      return expr.value ? "true" : "false";
    case "integer":
      return expr.value.toString();
    case "string":
      return quoteString(expr.value);
    case "identifier":
      return expr.name;
    case "binary": {
      const level = binaryPrecedence[expr.op];
      const left = formatOperand(expr.left, level);
      const right = formatOperand(expr.right, level + 1);
      return `${left} ${binaryOpSymbols[expr.op]} ${right}`;
    }
    case "unary": {
      const operand = formatOperand(expr.operand, precedence.unary);
      return expr.op === "neg" ? `-${operand}` : `not ${operand}`;
    }
    case "call":
      return `${expr.callee}(${expr.arguments.map(formatExpression).join(", ")})`;
    case "index":
      return `${formatOperand(expr.value, precedence.postfix)}[${formatExpression(expr.index)}]`;
    case "tuple-index":
      return `${formatOperand(expr.value, precedence.postfix)}.${expr.index}`;
    case "attribute":
      return `${formatOperand(expr.value, precedence.postfix)}.${expr.attribute}`;
    case "list":
      return `[${expr.items.map(formatExpression).join(", ")}]`;
    case "tuple":
      return expr.items.length === 1
        ? `(${expr.items.map(formatExpression).join("")},)`
        : `(${expr.items.map(formatExpression).join(", ")})`;
    case "map":
      return `{${expr.entries
        .map((entry) => `${formatExpression(entry.key)}: ${formatExpression(entry.value)}`)
        .join(", ")}}`;
    case "record":
      return `new ${expr.name} {${expr.fields
        .map((field) => `${field.name}: ${formatExpression(field.value)}`)
        .join(", ")}}`;
  }
};

const formatBlock = <T>(body: Statement<T>[], depth: number): string => {
  if (body.length === 0) return "{}";
  const inner = body.map((stmt) => formatStatement(stmt, depth + 1)).join("\n");
  return `{\n${inner}\n${INDENT.repeat(depth)}}`;
};

export const formatStatement = <T>(stmt: Statement<T>, depth = 0): string => {
  const pad = INDENT.repeat(depth);
  switch (stmt.kind) {
    case "let":
      return `${pad}let ${stmt.name}: ${formatSyntacticType(stmt.type)} = ${formatExpression(stmt.value)};`;
    case "assign":
      return `${pad}${stmt.name} = ${formatExpression(stmt.value)};`;
    case "if": {
      let text = `${pad}if ${formatExpression(stmt.condition)} ${formatBlock(stmt.body, depth)}`;
      for (const clause of stmt.elifs) {
        text += ` else if ${formatExpression(clause.condition)} ${formatBlock(clause.body, depth)}`;
      }
      if (stmt.elseBody) {
        text += ` else ${formatBlock(stmt.elseBody, depth)}`;
      }
      return text;
    }
    case "while":
      return `${pad}while ${formatExpression(stmt.condition)} ${formatBlock(stmt.body, depth)}`;
    case "for": {
      const variables =
        stmt.secondVariable === undefined
          ? stmt.variable
          : `${stmt.variable}, ${stmt.secondVariable}`;
      return `${pad}for ${variables} in ${formatExpression(stmt.iterable)} ${formatBlock(stmt.body, depth)}`;
    }
    case "return":
      return `${pad}return ${formatExpression(stmt.value)};`;
    case "assert":
      return `${pad}assert ${formatExpression(stmt.condition)};`;
    case "expression":
      return `${pad}${formatExpression(stmt.expression)};`;
  }
};

export const formatDeclaration = <T>(decl: Declaration<T>): string => {
  switch (decl.kind) {
    case "function": {
      const parameters = decl.parameters
        .map((param) => `${param.name}: ${formatSyntacticType(param.type)}`)
        .join(", ");
      return `func ${decl.name}(${parameters}) -> ${formatSyntacticType(decl.returnType)} ${formatBlock(decl.body, 0)}`;
    }
    case "const":
      return `const ${decl.name}: ${formatSyntacticType(decl.type)} = ${formatExpression(decl.value)};`;
    case "record": {
      if (decl.fields.length === 0) return `record ${decl.name} {}`;
      const fields = decl.fields
        .map((field) => `${INDENT}${field.name}: ${formatSyntacticType(field.type)},`)
        .join("\n");
      return `record ${decl.name} {\n${fields}\n}`;
    }
  }
};

/** Renders a tree back to Venice source that parses to the same tree. */
export const formatProgram = <T>(program: Program<T>): string =>
  program.declarations.map(formatDeclaration).join("\n\n") + "\n";
