import { compareLocations } from "../common/location.js";
import { DiagnosticEmitter, type Diagnostic } from "../diagnostics/index.js";
import { Lexer } from "../lexer/lexer.js";
import type { Token, TokenKind } from "../lexer/token.js";
import type {
  ConstDeclaration,
  Declaration,
  Expression,
  ForStatement,
  FunctionDeclaration,
  IfClause,
  IfStatement,
  MapEntry,
  Parameter,
  Program,
  RecordDeclaration,
  RecordField,
  RecordLiteralField,
  Statement,
  SyntacticType,
  Untyped,
} from "../tree/syntax.js";
import { ParserSyntaxError, isParserSyntaxError } from "./errors.js";
import {
  I64_MAX,
  LOWEST_PRECEDENCE,
  decodeStringLiteral,
  infixOps,
  isDeclarationKeyword,
  isStatementKeyword,
  prefixOps,
} from "./grammar.js";

export type ParseResult =
  | { ok: true; program: Program<Untyped> }
  | { ok: false; diagnostics: Diagnostic[] };

type UntypedExpression = Expression<Untyped>;
type UntypedStatement = Statement<Untyped>;

/**
 * Recursive-descent parser over a `Lexer`. Syntax errors are reported to the
 * emitter and unwound with `ParserSyntaxError` to the nearest statement or
 * declaration boundary, where parsing resumes.
 */
export class Parser {
  readonly #lexer: Lexer;
  readonly #diagnostics = new DiagnosticEmitter();

  constructor(lexer: Lexer) {
    this.#lexer = lexer;
  }

  get diagnostics(): Diagnostic[] {
    return [...this.#lexer.diagnostics, ...this.#diagnostics.diagnostics].sort(
      (a, b) => compareLocations(a.location, b.location)
    );
  }

  get done(): boolean {
    return this.#lexer.done();
  }

  parseProgram(): Program<Untyped> {
    const declarations: Declaration<Untyped>[] = [];
    while (!this.#lexer.done()) {
      const start = this.#current;
      try {
        declarations.push(this.parseDeclaration());
      } catch (error) {
        if (!isParserSyntaxError(error)) throw error;
        this.#synchronizeDeclaration(start);
      }
    }
    return { declarations };
  }

  parseDeclaration(): Declaration<Untyped> {
    switch (this.#current.kind) {
      case "func":
        return this.#functionDeclaration();
      case "const":
        return this.#constDeclaration();
      case "record":
        return this.#recordDeclaration();
      default:
        throw this.#unexpected("declaration");
    }
  }

  parseStatement(): UntypedStatement {
    switch (this.#current.kind) {
      case "let":
        return this.#letStatement();
      case "if":
        return this.#ifStatement();
      case "while":
        return this.#whileStatement();
      case "for":
        return this.#forStatement();
      case "return": {
        const location = this.#next().location;
        const value = this.parseExpression();
        this.#expect(";", ";");
        return { kind: "return", value, location };
      }
      case "assert": {
        const location = this.#next().location;
        const condition = this.parseExpression();
        this.#expect(";", ";");
        return { kind: "assert", condition, location };
      }
      default:
        return this.#assignOrExpressionStatement();
    }
  }

  parseExpression(minPrecedence = LOWEST_PRECEDENCE): UntypedExpression {
    let left = this.#unary();
    for (;;) {
      const infix = infixOps.get(this.#current.kind);
      if (!infix || infix.precedence < minPrecedence) break;

      const operator = this.#next();
      const right = this.parseExpression(infix.precedence + 1);
      left = {
        kind: "binary",
        op: infix.op,
        left,
        right,
        type: undefined,
        location: operator.location,
      };
    }
    return left;
  }

  parseType(): SyntacticType {
    const name = this.#expect("symbol", "type");
    if (!this.#accept("[")) {
      return { kind: "literal", name: name.lexeme, location: name.location };
    }

    const parameters = this.#commaSeparated("]", () => this.parseType());
    return {
      kind: "parameterized",
      name: name.lexeme,
      parameters,
      location: name.location,
    };
  }

  #functionDeclaration(): FunctionDeclaration<Untyped> {
    const location = this.#expect("func", "func").location;
    const name = this.#expect("symbol", "function name").lexeme;
    this.#expect("(", "(");
    const parameters = this.#commaSeparated(")", (): Parameter<Untyped> => {
      const param = this.#expect("symbol", "parameter name");
      this.#expect(":", ":");
      return {
        name: param.lexeme,
        type: this.parseType(),
        resolvedType: undefined,
        location: param.location,
      };
    });
    this.#expect("->", "->");
    const returnType = this.parseType();
    const body = this.#block();
    return {
      kind: "function",
      name,
      parameters,
      returnType,
      resolvedReturnType: undefined,
      body,
      location,
    };
  }

  #constDeclaration(): ConstDeclaration<Untyped> {
    const location = this.#expect("const", "const").location;
    const name = this.#expect("symbol", "constant name").lexeme;
    this.#expect(":", ":");
    const type = this.parseType();
    this.#expect("=", "=");
    const value = this.parseExpression();
    this.#expect(";", ";");
    return {
      kind: "const",
      name,
      type,
      resolvedType: undefined,
      value,
      location,
    };
  }

  #recordDeclaration(): RecordDeclaration<Untyped> {
    const location = this.#expect("record", "record").location;
    const name = this.#expect("symbol", "record name").lexeme;
    this.#expect("{", "{");
    const fields = this.#commaSeparated("}", (): RecordField<Untyped> => {
      const field = this.#expect("symbol", "field name");
      this.#expect(":", ":");
      return {
        name: field.lexeme,
        type: this.parseType(),
        resolvedType: undefined,
        location: field.location,
      };
    });
    return { kind: "record", name, fields, location };
  }

  #block(): UntypedStatement[] {
    this.#expect("{", "{");
    const body: UntypedStatement[] = [];
    while (!this.#check("}")) {
      const start = this.#current;
      if (start.kind === "eof" || isDeclarationKeyword(start.kind)) {
        throw this.#unexpected("}");
      }

      try {
        body.push(this.parseStatement());
      } catch (error) {
        if (!isParserSyntaxError(error)) throw error;
        this.#synchronizeStatement(start);
      }
    }
    this.#next();
    return body;
  }

  #letStatement(): UntypedStatement {
    const location = this.#expect("let", "let").location;
    const name = this.#expect("symbol", "symbol").lexeme;
    this.#expect(":", ":");
    const type = this.parseType();
    this.#expect("=", "=");
    const value = this.parseExpression();
    this.#expect(";", ";");
    return {
      kind: "let",
      name,
      type,
      resolvedType: undefined,
      value,
      location,
    };
  }

  #ifStatement(): IfStatement<Untyped> {
    const location = this.#expect("if", "if").location;
    const condition = this.parseExpression();
    const body = this.#block();
    const elifs: IfClause<Untyped>[] = [];
    let elseBody: UntypedStatement[] | undefined;

    while (this.#accept("else")) {
      if (this.#accept("if")) {
        const elifCondition = this.parseExpression();
        elifs.push({ condition: elifCondition, body: this.#block() });
        continue;
      }
      elseBody = this.#block();
      break;
    }

    return elseBody === undefined
      ? { kind: "if", condition, body, elifs, location }
      : { kind: "if", condition, body, elifs, elseBody, location };
  }

  #whileStatement(): UntypedStatement {
    const location = this.#expect("while", "while").location;
    const condition = this.parseExpression();
    const body = this.#block();
    return { kind: "while", condition, body, location };
  }

  #forStatement(): ForStatement<Untyped> {
    const location = this.#expect("for", "for").location;
    const variable = this.#expect("symbol", "loop variable").lexeme;
    const secondVariable = this.#accept(",")
      ? this.#expect("symbol", "loop variable").lexeme
      : undefined;
    this.#expect("in", "in");
    const iterable = this.parseExpression();
    const body = this.#block();
    return secondVariable === undefined
      ? { kind: "for", variable, iterable, body, location }
      : { kind: "for", variable, secondVariable, iterable, body, location };
  }

  #assignOrExpressionStatement(): UntypedStatement {
    const expression = this.parseExpression();
    if (this.#check("=")) {
      const location = this.#next().location;
      if (expression.kind !== "identifier") {
        throw new ParserSyntaxError(
          this.#diagnostics.report({
            code: "PS0003",
            params: { kind: "invalid-assignment-target" },
            location: expression.location,
          })
        );
      }
      const value = this.parseExpression();
      this.#expect(";", ";");
      return { kind: "assign", name: expression.name, value, location };
    }

    this.#expect(";", ";");
    return { kind: "expression", expression, location: expression.location };
  }

  #unary(): UntypedExpression {
    const op = prefixOps.get(this.#current.kind);
    if (op === undefined) return this.#postfix();

    const location = this.#next().location;
    const operand = this.#unary();
    return { kind: "unary", op, operand, type: undefined, location };
  }

  #postfix(): UntypedExpression {
    let expr = this.#primary();
    for (;;) {
      const token = this.#current;
      if (token.kind === "[") {
        this.#next();
        const index = this.parseExpression();
        this.#expect("]", "]");
        expr = { kind: "index", value: expr, index, type: undefined, location: token.location };
        continue;
      }

      if (token.kind === ".") {
        this.#next();
        expr = this.#member(expr);
        continue;
      }

      if (token.kind === "(") {
        this.#next();
        if (expr.kind !== "identifier") {
          throw new ParserSyntaxError(
            this.#diagnostics.report({
              code: "PS0004",
              params: { kind: "invalid-callee" },
              location: expr.location,
            })
          );
        }
        const args = this.#commaSeparated(")", () => this.parseExpression());
        expr = {
          kind: "call",
          callee: expr.name,
          arguments: args,
          type: undefined,
          location: expr.location,
        };
        continue;
      }

      return expr;
    }
  }

  #member(value: UntypedExpression): UntypedExpression {
    const token = this.#current;
    if (token.kind === "int") {
      this.#next();
      return {
        kind: "tuple-index",
        value,
        index: Number(this.#integerValue(token)),
        type: undefined,
        location: token.location,
      };
    }

    const attribute = this.#expect("symbol", "field name or tuple index");
    return {
      kind: "attribute",
      value,
      attribute: attribute.lexeme,
      type: undefined,
      location: attribute.location,
    };
  }

  #primary(): UntypedExpression {
    const token = this.#current;
    const location = token.location;
    switch (token.kind) {
      case "int":
        this.#next();
        return { kind: "integer", value: this.#integerValue(token), type: undefined, location };
      case "str":
        this.#next();
        return {
          kind: "string",
          value: decodeStringLiteral(token.lexeme),
          type: undefined,
          location,
        };
      case "true":
      case "false":
        this.#next();
        return { kind: "boolean", value: token.kind === "true", type: undefined, location };
      case "symbol":
        this.#next();
        return { kind: "identifier", name: token.lexeme, type: undefined, location };
      case "(":
        return this.#parenthesized();
      case "[": {
        this.#next();
        const items = this.#commaSeparated("]", () => this.parseExpression());
        return { kind: "list", items, type: undefined, location };
      }
      case "{": {
        this.#next();
        const entries = this.#commaSeparated("}", (): MapEntry<Untyped> => {
          const key = this.parseExpression();
          this.#expect(":", ":");
          return { key, value: this.parseExpression() };
        });
        return { kind: "map", entries, type: undefined, location };
      }
      case "new": {
        this.#next();
        const name = this.#expect("symbol", "record name").lexeme;
        this.#expect("{", "{");
        const fields = this.#commaSeparated("}", (): RecordLiteralField<Untyped> => {
          const field = this.#expect("symbol", "field name");
          this.#expect(":", ":");
          return {
            name: field.lexeme,
            value: this.parseExpression(),
            location: field.location,
          };
        });
        return { kind: "record", name, fields, type: undefined, location };
      }
      default:
        throw this.#unexpected("expression");
    }
  }

  /** `(e)` groups, `(a,)` and `(a, b)` are tuples. */
  #parenthesized(): UntypedExpression {
    const location = this.#expect("(", "(").location;
    const first = this.parseExpression();
    if (!this.#accept(",")) {
      this.#expect(")", ")");
      return first;
    }

    const items = [first];
    while (!this.#check(")")) {
      items.push(this.parseExpression());
      if (!this.#accept(",")) break;
    }
    this.#expect(")", ")");
    return { kind: "tuple", items, type: undefined, location };
  }

  #integerValue(token: Token): bigint {
    const value = BigInt(token.lexeme);
    if (value > I64_MAX) {
      this.#diagnostics.report({
        code: "PS0002",
        params: { kind: "integer-out-of-range", lexeme: token.lexeme },
        location: token.location,
      });
    }
    return value;
  }

  /** Parses `item (, item)* ,? close`; the opening bracket is already consumed. */
  #commaSeparated<T>(close: TokenKind, item: () => T): T[] {
    const items: T[] = [];
    while (!this.#check(close)) {
      items.push(item());
      if (!this.#accept(",")) break;
    }
    this.#expect(close, close);
    return items;
  }

  get #current(): Token {
    return this.#lexer.current();
  }

  #next(): Token {
    const token = this.#lexer.current();
    this.#lexer.advance();
    return token;
  }

  #check(kind: TokenKind): boolean {
    return this.#current.kind === kind;
  }

  #accept(kind: TokenKind): boolean {
    if (!this.#check(kind)) return false;
    this.#next();
    return true;
  }

  #expect(kind: TokenKind, what: string): Token {
    if (this.#check(kind)) return this.#next();
    throw this.#unexpected(what);
  }

  #unexpected(expected: string): ParserSyntaxError {
    const token = this.#current;
    const got = token.kind === "eof" ? undefined : token.lexeme;
    const last = this.#diagnostics.diagnostics.at(-1);
    if (
      last &&
      last.code === "PS0001" &&
      compareLocations(last.location, token.location) === 0
    ) {
      // Nested blocks unwinding at the same token report it once.
      return new ParserSyntaxError(last);
    }

    return new ParserSyntaxError(
      this.#diagnostics.report({
        code: "PS0001",
        params: { kind: "unexpected-token", expected, got },
        location: token.location,
      })
    );
  }

  #synchronizeStatement(start: Token): void {
    if (this.#current === start) this.#next();

    let depth = 0;
    while (!this.#check("eof")) {
      const kind = this.#current.kind;
      if (depth === 0) {
        if (kind === ";") {
          this.#next();
          return;
        }
        if (kind === "}" || isStatementKeyword(kind) || isDeclarationKeyword(kind)) {
          return;
        }
      }

      if (kind === "{") depth += 1;
      if (kind === "}") depth -= 1;
      this.#next();
    }
  }

  #synchronizeDeclaration(start: Token): void {
    if (this.#current === start) this.#next();
    while (!this.#check("eof") && !isDeclarationKeyword(this.#current.kind)) {
      this.#next();
    }
  }
}

export const parse = (lexer: Lexer): ParseResult => {
  const parser = new Parser(lexer);
  const program = parser.parseProgram();
  const diagnostics = parser.diagnostics;
  return diagnostics.length > 0
    ? { ok: false, diagnostics }
    : { ok: true, program };
};

export const parseSource = (source: string, file = "<string>"): ParseResult =>
  parse(new Lexer(file, source));
