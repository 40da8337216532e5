import { formatSyntacticType, quoteString } from "./format.js";
import type {
  Declaration,
  Expression,
  Program,
  Statement,
} from "./syntax.js";

/** Renders an annotation; `undefined` leaves the node unannotated. */
export type Annotate<T> = (annotation: T) => string | undefined;

type SExpr = string | { items: SExpr[]; suffix: string };

const LINE_WIDTH = 80;

const list = (...items: SExpr[]): SExpr => ({ items, suffix: "" });

const renderFlat = (expr: SExpr): string =>
  typeof expr === "string"
    ? expr
    : `(${expr.items.map(renderFlat).join(" ")})${expr.suffix}`;

/**
 * Keeps a node on one line when it fits, otherwise puts the leading atoms on
 * the opening line and every remaining child on its own line.
 */
const render = (expr: SExpr, depth: number): string => {
  const flat = renderFlat(expr);
  if (typeof expr === "string" || depth * 2 + flat.length <= LINE_WIDTH) {
    return flat;
  }

  const head: string[] = [];
  let index = 0;
  for (const item of expr.items) {
    if (typeof item !== "string") break;
    head.push(item);
    index += 1;
  }

  const rest = expr.items.slice(index);
  if (rest.length === 0) return flat;

  const pad = "  ".repeat(depth + 1);
  const children = rest.map((child) => `${pad}${render(child, depth + 1)}`);
  return `(${head.join(" ")}\n${children.join("\n")})${expr.suffix}`;
};

class TreePrinter<T> {
  constructor(private readonly annotate?: Annotate<T>) {}

  #annotated(expr: SExpr, annotation: T): SExpr {
    const text = this.annotate?.(annotation);
    if (text === undefined) return expr;
    return typeof expr === "string"
      ? `${expr}:${text}`
      : { items: expr.items, suffix: `${expr.suffix}:${text}` };
  }

  program(program: Program<T>): SExpr {
    return list("program", ...program.declarations.map((d) => this.declaration(d)));
  }

  declaration(decl: Declaration<T>): SExpr {
    switch (decl.kind) {
      case "function":
        return list(
          "func",
          decl.name,
          list(
            ...decl.parameters.map((param) =>
              list(param.name, formatSyntacticType(param.type))
            )
          ),
          formatSyntacticType(decl.returnType),
          ...decl.body.map((stmt) => this.statement(stmt))
        );
      case "const":
        return list(
          "const",
          decl.name,
          formatSyntacticType(decl.type),
          this.expression(decl.value)
        );
      case "record":
        return list(
          "record",
          decl.name,
          ...decl.fields.map((field) =>
            list(field.name, formatSyntacticType(field.type))
          )
        );
    }
  }

  block(body: Statement<T>[]): SExpr {
    return list("block", ...body.map((stmt) => this.statement(stmt)));
  }

  statement(stmt: Statement<T>): SExpr {
    switch (stmt.kind) {
      case "let":
        return list(
          "let",
          stmt.name,
          formatSyntacticType(stmt.type),
          this.expression(stmt.value)
        );
      case "assign":
        return list("assign", stmt.name, this.expression(stmt.value));
      case "if": {
        const items: SExpr[] = [
          "if",
          this.expression(stmt.condition),
          this.block(stmt.body),
        ];
        for (const clause of stmt.elifs) {
          items.push(
            list("elif", this.expression(clause.condition), this.block(clause.body))
          );
        }
        if (stmt.elseBody) {
          items.push(list("else", this.block(stmt.elseBody)));
        }
        return list(...items);
      }
      case "while":
        return list("while", this.expression(stmt.condition), this.block(stmt.body));
      case "for":
        return list(
          "for",
          stmt.secondVariable === undefined
            ? stmt.variable
            : list(stmt.variable, stmt.secondVariable),
          this.expression(stmt.iterable),
          this.block(stmt.body)
        );
      case "return":
        return list("return", this.expression(stmt.value));
      case "assert":
        return list("assert", this.expression(stmt.condition));
      case "expression":
        return list("expr", this.expression(stmt.expression));
    }
  }

  expression(expr: Expression<T>): SExpr {
    return this.#annotated(this.#bareExpression(expr), expr.type);
  }

  #bareExpression(expr: Expression<T>): SExpr {
    switch (expr.kind) {
      case "boolean":
        return expr.value ? "true" : "false";
      case "integer":
        return expr.value.toString();
      case "string":
        return quoteString(expr.value);
      case "identifier":
        return expr.name;
      case "binary":
        return list(
          "binary",
          expr.op,
          this.expression(expr.left),
          this.expression(expr.right)
        );
      case "unary":
        return list("unary", expr.op, this.expression(expr.operand));
      case "call":
        return list(
          "call",
          expr.callee,
          ...expr.arguments.map((arg) => this.expression(arg))
        );
      case "index":
        return list("index", this.expression(expr.value), this.expression(expr.index));
      case "tuple-index":
        return list("tuple-index", this.expression(expr.value), String(expr.index));
      case "attribute":
        return list("attribute", this.expression(expr.value), expr.attribute);
      case "list":
        return list("list", ...expr.items.map((item) => this.expression(item)));
      case "tuple":
        return list("tuple", ...expr.items.map((item) => this.expression(item)));
      case "map":
        return list(
          "map",
          ...expr.entries.map((entry) =>
            list(this.expression(entry.key), this.expression(entry.value))
          )
        );
      case "record":
        return list(
          "new",
          expr.name,
          ...expr.fields.map((field) =>
            list(field.name, this.expression(field.value))
          )
        );
    }
  }
}

export const printProgram = <T>(
  program: Program<T>,
  annotate?: Annotate<T>
): string => render(new TreePrinter(annotate).program(program), 0);

export const printStatement = <T>(
  stmt: Statement<T>,
  annotate?: Annotate<T>
): string => render(new TreePrinter(annotate).statement(stmt), 0);

export const printExpression = <T>(
  expr: Expression<T>,
  annotate?: Annotate<T>
): string => render(new TreePrinter(annotate).expression(expr), 0);
