import { binaryOpSymbols, unaryOpSymbols, type BinaryOp } from "../common/operators.js";
import { emptyLocation, type Location } from "../common/location.js";
import { DiagnosticEmitter, type Diagnostic } from "../diagnostics/index.js";
import { formatSyntacticType } from "../tree/format.js";
import type {
  ConstDeclaration,
  Declaration,
  Expression,
  FunctionDeclaration,
  Program,
  RecordDeclaration,
  Statement,
  SyntacticType,
} from "../tree/syntax.js";
import { builtins } from "./builtins.js";
import { SymbolTable, type ValueBinding } from "./symbol-table.js";
import {
  booleanType,
  errorType,
  functionType,
  i64Type,
  isErrorType,
  listType,
  mapType,
  recordType,
  stringType,
  tupleType,
  typeMatches,
  typeToString,
  voidType,
  type VeniceType,
} from "./types.js";

export type AnalyzeResult =
  | { ok: true; program: Program<VeniceType> }
  | { ok: false; diagnostics: Diagnostic[] };

export interface AnalyzeOptions {
  /** Report a program that declares no `main`. */
  requireMain?: boolean;
}

export interface RecordInfo {
  name: string;
  fields: { name: string; type: VeniceType }[];
}

interface Signature {
  parameters: VeniceType[];
  returnType: VeniceType;
}

/** Function names with this prefix would collide with runtime and generated symbols. */
export const RESERVED_PREFIX = "venice_";

type TypedExpression = Expression<VeniceType>;
type TypedStatement = Statement<VeniceType>;

const orderingOperands: ReadonlySet<VeniceType["kind"]> = new Set(["i64", "string"]);

const binaryOperandsValid = (op: BinaryOp, left: VeniceType, right: VeniceType) => {
  switch (op) {
    case "add":
    case "sub":
    case "mul":
    case "div":
    case "mod":
      return left.kind === "i64" && right.kind === "i64";
    case "concat":
      return left.kind === "string" && right.kind === "string";
    case "and":
    case "or":
      return left.kind === "boolean" && right.kind === "boolean";
    case "lt":
    case "le":
    case "gt":
    case "ge":
      return left.kind === right.kind && orderingOperands.has(left.kind);
    case "eq":
    case "ne":
      return left.kind !== "void" && left.kind === right.kind && typeMatches(left, right);
  }
};

/** Whether every path through `body` ends in a `return`. */
const alwaysReturns = (body: readonly Statement<unknown>[]): boolean =>
  body.some((stmt) => {
    if (stmt.kind === "return") return true;
    if (stmt.kind !== "if" || stmt.elseBody === undefined) return false;
    return (
      alwaysReturns(stmt.body) &&
      stmt.elifs.every((clause) => alwaysReturns(clause.body)) &&
      alwaysReturns(stmt.elseBody)
    );
  });

const binaryResultType = (op: BinaryOp): VeniceType => {
  switch (op) {
    case "add":
    case "sub":
    case "mul":
    case "div":
    case "mod":
      return i64Type;
    case "concat":
      return stringType;
    default:
      return booleanType;
  }
};

/**
 * Builds the typed tree. Only syntactic information is read from the input,
 * so a tree that was already typed analyzes to the same result.
 */
class Analyzer {
  readonly #diagnostics = new DiagnosticEmitter();
  readonly #values = new SymbolTable<ValueBinding<VeniceType>>();
  readonly #types = new Map<string, VeniceType>([
    ["i64", i64Type],
    ["bool", booleanType],
    ["string", stringType],
    ["void", voidType],
  ]);
  readonly #records = new Map<string, RecordInfo>();
  #returnType: VeniceType = errorType;

  constructor() {
    for (const builtin of builtins) {
      this.#values.declare(builtin.name, {
        type: builtin.type,
        constant: true,
        callable: true,
      });
    }
  }

  get diagnostics(): readonly Diagnostic[] {
    return this.#diagnostics.diagnostics;
  }

  run(program: Program<unknown>, options: AnalyzeOptions): Program<VeniceType> {
    const typed = new Map<Declaration<unknown>, Declaration<VeniceType>>();
    const records = program.declarations.filter(
      (decl): decl is RecordDeclaration<unknown> => decl.kind === "record"
    );
    const functions = program.declarations.filter(
      (decl): decl is FunctionDeclaration<unknown> => decl.kind === "function"
    );
    const consts = program.declarations.filter(
      (decl): decl is ConstDeclaration<unknown> => decl.kind === "const"
    );

    for (const decl of records) {
      if (this.#types.has(decl.name)) {
        this.#duplicateDeclaration(decl.name, decl.location);
        continue;
      }
      this.#types.set(decl.name, recordType(decl.name));
    }

    for (const decl of records) {
      typed.set(decl, this.#recordDeclaration(decl));
    }

    const signatures = new Map<FunctionDeclaration<unknown>, Signature>();
    for (const decl of functions) {
      const signature = {
        parameters: decl.parameters.map((param) => this.#resolveType(param.type)),
        returnType: this.#resolveType(decl.returnType),
      };
      signatures.set(decl, signature);
      if (decl.name.startsWith(RESERVED_PREFIX)) {
        this.#diagnostics.report({
          code: "TY0016",
          params: { kind: "reserved-name", name: decl.name },
          location: decl.location,
        });
      }
      const declared = this.#values.declare(decl.name, {
        type: functionType(signature.parameters, signature.returnType),
        constant: true,
        callable: true,
      });
      if (!declared) this.#duplicateDeclaration(decl.name, decl.location);
    }

    for (const decl of consts) {
      typed.set(decl, this.#constDeclaration(decl));
    }

    for (const decl of functions) {
      const signature = signatures.get(decl) ?? {
        parameters: [],
        returnType: errorType,
      };
      typed.set(decl, this.#functionDeclaration(decl, signature));
    }

    this.#checkMain(functions, signatures, options);

    const declarations: Declaration<VeniceType>[] = [];
    for (const decl of program.declarations) {
      const result = typed.get(decl);
      if (result) declarations.push(result);
    }
    return { declarations };
  }

  #checkMain(
    functions: FunctionDeclaration<unknown>[],
    signatures: Map<FunctionDeclaration<unknown>, Signature>,
    options: AnalyzeOptions
  ): void {
    const main = functions.find((decl) => decl.name === "main");
    if (!main) {
      if (options.requireMain) {
        this.#diagnostics.report({
          code: "TY0014",
          params: { kind: "invalid-main" },
          location: emptyLocation(),
        });
      }
      return;
    }

    const signature = signatures.get(main);
    if (
      !signature ||
      signature.parameters.length > 0 ||
      signature.returnType.kind !== "i64"
    ) {
      this.#diagnostics.report({
        code: "TY0014",
        params: { kind: "invalid-main" },
        location: main.location,
      });
    }
  }

  #recordDeclaration(decl: RecordDeclaration<unknown>): RecordDeclaration<VeniceType> {
    const seen = new Set<string>();
    const fields = decl.fields.map((field) => {
      if (seen.has(field.name)) {
        this.#diagnostics.report({
          code: "TY0004",
          params: { kind: "duplicate-binding", name: field.name },
          location: field.location,
        });
      }
      seen.add(field.name);
      return {
        name: field.name,
        type: field.type,
        resolvedType: this.#resolveType(field.type),
        location: field.location,
      };
    });

    if (!this.#records.has(decl.name)) {
      this.#records.set(decl.name, {
        name: decl.name,
        fields: fields.map((field) => ({ name: field.name, type: field.resolvedType })),
      });
    }

    return { kind: "record", name: decl.name, fields, location: decl.location };
  }

  #constDeclaration(decl: ConstDeclaration<unknown>): ConstDeclaration<VeniceType> {
    const type = this.#resolveType(decl.type);
    const value = this.#expression(decl.value, type);
    this.#expectType(type, value);
    if (!this.#values.declare(decl.name, { type, constant: true })) {
      this.#duplicateDeclaration(decl.name, decl.location);
    }

    return {
      kind: "const",
      name: decl.name,
      type: decl.type,
      resolvedType: type,
      value,
      location: decl.location,
    };
  }

  #functionDeclaration(
    decl: FunctionDeclaration<unknown>,
    signature: Signature
  ): FunctionDeclaration<VeniceType> {
    this.#returnType = signature.returnType;
    this.#checkReturns(decl, signature.returnType);
    return this.#values.withScope((): FunctionDeclaration<VeniceType> => {
      const parameters = decl.parameters.map((param, index) => {
        const type = signature.parameters[index] ?? errorType;
        this.#declareValue(param.name, { type, constant: false }, param.location);
        return {
          name: param.name,
          type: param.type,
          resolvedType: type,
          location: param.location,
        };
      });

      return {
        kind: "function",
        name: decl.name,
        parameters,
        returnType: decl.returnType,
        resolvedReturnType: signature.returnType,
        body: this.#statements(decl.body),
        location: decl.location,
      };
    });
  }

  /** `main` and `void` functions return 0 when they run off their end. */
  #checkReturns(decl: FunctionDeclaration<unknown>, returnType: VeniceType): void {
    if (decl.name === "main" || returnType.kind === "void" || isErrorType(returnType)) {
      return;
    }
    if (alwaysReturns(decl.body)) return;
    this.#diagnostics.report({
      code: "TY0017",
      params: { kind: "missing-return", name: decl.name },
      location: decl.location,
    });
  }

  #resolveType(type: SyntacticType): VeniceType {
    if (type.kind === "literal") {
      const resolved = this.#types.get(type.name);
      if (resolved) return resolved;
      return this.#unknownType(type);
    }

    const parameters = type.parameters.map((param) => this.#resolveType(param));
    const [first, second] = parameters;
    if (type.name === "list" && parameters.length === 1 && first) {
      return listType(first);
    }
    if (type.name === "map" && parameters.length === 2 && first && second) {
      return mapType(first, second);
    }
    if (type.name === "tuple" && parameters.length > 0) {
      return tupleType(parameters);
    }
    return this.#unknownType(type);
  }

  #unknownType(type: SyntacticType): VeniceType {
    this.#diagnostics.report({
      code: "TY0003",
      params: { kind: "unknown-type", name: formatSyntacticType(type) },
      location: type.location,
    });
    return errorType;
  }

  #statements(body: Statement<unknown>[]): TypedStatement[] {
    return body.map((stmt) => this.#statement(stmt));
  }

  #scopedStatements(body: Statement<unknown>[]): TypedStatement[] {
    return this.#values.withScope(() => this.#statements(body));
  }

  #statement(stmt: Statement<unknown>): TypedStatement {
    switch (stmt.kind) {
      case "let": {
        const type = this.#resolveType(stmt.type);
        const value = this.#expression(stmt.value, type);
        this.#expectType(type, value);
        this.#declareValue(stmt.name, { type, constant: false }, stmt.location);
        return {
          kind: "let",
          name: stmt.name,
          type: stmt.type,
          resolvedType: type,
          value,
          location: stmt.location,
        };
      }
      case "assign": {
        const binding = this.#values.resolve(stmt.name);
        if (!binding) {
          this.#undefinedSymbol(stmt.name, stmt.location);
        } else if (binding.constant) {
          this.#diagnostics.report({
            code: "TY0005",
            params: { kind: "constant-assignment", name: stmt.name },
            location: stmt.location,
          });
        }
        const target = binding?.type ?? errorType;
        const value = this.#expression(stmt.value, target);
        this.#expectType(target, value);
        return { kind: "assign", name: stmt.name, value, location: stmt.location };
      }
      case "if": {
        const condition = this.#condition(stmt.condition);
        const body = this.#scopedStatements(stmt.body);
        const elifs = stmt.elifs.map((clause) => ({
          condition: this.#condition(clause.condition),
          body: this.#scopedStatements(clause.body),
        }));
        const base = { kind: "if" as const, condition, body, elifs, location: stmt.location };
        return stmt.elseBody === undefined
          ? base
          : { ...base, elseBody: this.#scopedStatements(stmt.elseBody) };
      }
      case "while": {
        const condition = this.#condition(stmt.condition);
        const body = this.#scopedStatements(stmt.body);
        return { kind: "while", condition, body, location: stmt.location };
      }
      case "for":
        return this.#forStatement(stmt);
      case "return": {
        const value = this.#expression(stmt.value, this.#returnType);
        this.#expectType(this.#returnType, value);
        return { kind: "return", value, location: stmt.location };
      }
      case "assert":
        return {
          kind: "assert",
          condition: this.#condition(stmt.condition),
          location: stmt.location,
        };
      case "expression":
        return {
          kind: "expression",
          expression: this.#expression(stmt.expression),
          location: stmt.location,
        };
    }
  }

  #forStatement(stmt: Extract<Statement<unknown>, { kind: "for" }>): TypedStatement {
    const iterable = this.#expression(stmt.iterable);
    const source = iterable.type;
    let first: VeniceType = errorType;
    let second: VeniceType = errorType;

    if (source.kind === "list") {
      first = source.item;
      if (stmt.secondVariable !== undefined) {
        this.#diagnostics.report({
          code: "TY0011",
          params: { kind: "two-variables", type: typeToString(source) },
          location: stmt.location,
        });
      }
    } else if (source.kind === "map") {
      first = source.key;
      second = source.value;
    } else if (!isErrorType(source)) {
      this.#diagnostics.report({
        code: "TY0011",
        params: { kind: "not-iterable", type: typeToString(source) },
        location: iterable.location,
      });
    }

    const body = this.#values.withScope(() => {
      this.#declareValue(stmt.variable, { type: first, constant: true }, stmt.location);
      if (stmt.secondVariable !== undefined) {
        this.#declareValue(
          stmt.secondVariable,
          { type: second, constant: true },
          stmt.location
        );
      }
      return this.#statements(stmt.body);
    });

    const base = { kind: "for" as const, variable: stmt.variable, iterable, body, location: stmt.location };
    return stmt.secondVariable === undefined
      ? base
      : { ...base, secondVariable: stmt.secondVariable };
  }

  #condition(expr: Expression<unknown>): TypedExpression {
    const typed = this.#expression(expr, booleanType);
    this.#expectType(booleanType, typed);
    return typed;
  }

  /**
   * `expected` is the type the context requires, if any. It only steers the
   * typing of empty collection literals; callers still check the result.
   */
  #expression(expr: Expression<unknown>, expected?: VeniceType): TypedExpression {
    const location = expr.location;
    switch (expr.kind) {
      case "boolean":
        return { kind: "boolean", value: expr.value, type: booleanType, location };
      case "integer":
        return { kind: "integer", value: expr.value, type: i64Type, location };
      case "string":
        return { kind: "string", value: expr.value, type: stringType, location };
      case "identifier": {
        const binding = this.#values.resolve(expr.name);
        let type: VeniceType = errorType;
        if (!binding) {
          this.#undefinedSymbol(expr.name, location);
        } else if (binding.callable) {
          this.#diagnostics.report({
            code: "TY0015",
            params: { kind: "function-as-value", name: expr.name },
            location,
          });
        } else {
          type = binding.type;
        }
        return { kind: "identifier", name: expr.name, type, location };
      }
      case "binary": {
        const left = this.#expression(expr.left);
        const right = this.#expression(expr.right);
        if (
          !isErrorType(left.type) &&
          !isErrorType(right.type) &&
          !binaryOperandsValid(expr.op, left.type, right.type)
        ) {
          this.#diagnostics.report({
            code: "TY0013",
            params: {
              kind: "invalid-operands",
              op: binaryOpSymbols[expr.op],
              left: typeToString(left.type),
              right: typeToString(right.type),
            },
            location,
          });
        }
        return {
          kind: "binary",
          op: expr.op,
          left,
          right,
          type: binaryResultType(expr.op),
          location,
        };
      }
      case "unary": {
        const operand = this.#expression(expr.operand);
        const type = expr.op === "neg" ? i64Type : booleanType;
        if (!isErrorType(operand.type) && operand.type.kind !== type.kind) {
          this.#diagnostics.report({
            code: "TY0013",
            params: {
              kind: "invalid-operands",
              op: unaryOpSymbols[expr.op],
              left: typeToString(operand.type),
            },
            location,
          });
        }
        return { kind: "unary", op: expr.op, operand, type, location };
      }
      case "call":
        return this.#call(expr);
      case "index": {
        const value = this.#expression(expr.value);
        const source = value.type;
        if (source.kind === "list") {
          const index = this.#expression(expr.index, i64Type);
          this.#expectType(i64Type, index);
          return { kind: "index", value, index, type: source.item, location };
        }
        if (source.kind === "map") {
          const index = this.#expression(expr.index, source.key);
          this.#expectType(source.key, index);
          return { kind: "index", value, index, type: source.value, location };
        }

        const index = this.#expression(expr.index);
        if (!isErrorType(source)) {
          this.#diagnostics.report({
            code: "TY0008",
            params: { kind: "not-indexable", type: typeToString(source) },
            location,
          });
        }
        return { kind: "index", value, index, type: errorType, location };
      }
      case "tuple-index": {
        const value = this.#expression(expr.value);
        const source = value.type;
        let type: VeniceType = errorType;
        if (source.kind === "tuple") {
          const item = source.items[expr.index];
          if (item) {
            type = item;
          } else {
            this.#diagnostics.report({
              code: "TY0009",
              params: {
                kind: "tuple-index-out-of-range",
                index: expr.index,
                type: typeToString(source),
              },
              location,
            });
          }
        } else if (!isErrorType(source)) {
          this.#diagnostics.report({
            code: "TY0009",
            params: { kind: "not-a-tuple", type: typeToString(source) },
            location,
          });
        }
        return { kind: "tuple-index", value, index: expr.index, type, location };
      }
      case "attribute": {
        const value = this.#expression(expr.value);
        const source = value.type;
        let type: VeniceType = errorType;
        if (source.kind === "record") {
          const field = this.#records
            .get(source.name)
            ?.fields.find((candidate) => candidate.name === expr.attribute);
          if (field) {
            type = field.type;
          } else {
            this.#diagnostics.report({
              code: "TY0010",
              params: { kind: "unknown-field", record: source.name, field: expr.attribute },
              location,
            });
          }
        } else if (!isErrorType(source)) {
          this.#diagnostics.report({
            code: "TY0010",
            params: {
              kind: "not-a-record",
              type: typeToString(source),
              field: expr.attribute,
            },
            location,
          });
        }
        return { kind: "attribute", value, attribute: expr.attribute, type, location };
      }
      case "list": {
        let item = expected?.kind === "list" ? expected.item : undefined;
        if (expr.items.length === 0 && item === undefined) {
          this.#emptyLiteral("list", location);
          return { kind: "list", items: [], type: errorType, location };
        }

        const items: TypedExpression[] = [];
        for (const element of expr.items) {
          const typed = this.#expression(element, item);
          if (item === undefined) {
            item = typed.type;
          } else {
            this.#expectType(item, typed);
          }
          items.push(typed);
        }
        return { kind: "list", items, type: listType(item ?? errorType), location };
      }
      case "tuple": {
        const hints =
          expected?.kind === "tuple" && expected.items.length === expr.items.length
            ? expected.items
            : [];
        const items = expr.items.map((item, index) =>
          this.#expression(item, hints[index])
        );
        return {
          kind: "tuple",
          items,
          type: tupleType(items.map((item) => item.type)),
          location,
        };
      }
      case "map": {
        let key = expected?.kind === "map" ? expected.key : undefined;
        let value = expected?.kind === "map" ? expected.value : undefined;
        if (expr.entries.length === 0 && (key === undefined || value === undefined)) {
          this.#emptyLiteral("map", location);
          return { kind: "map", entries: [], type: errorType, location };
        }

        const entries: { key: TypedExpression; value: TypedExpression }[] = [];
        for (const entry of expr.entries) {
          const typedKey = this.#expression(entry.key, key);
          const typedValue = this.#expression(entry.value, value);
          if (key === undefined) key = typedKey.type;
          else this.#expectType(key, typedKey);
          if (value === undefined) value = typedValue.type;
          else this.#expectType(value, typedValue);
          entries.push({ key: typedKey, value: typedValue });
        }
        return {
          kind: "map",
          entries,
          type: mapType(key ?? errorType, value ?? errorType),
          location,
        };
      }
      case "record":
        return this.#recordLiteral(expr);
    }
  }

  #call(expr: Extract<Expression<unknown>, { kind: "call" }>): TypedExpression {
    const binding = this.#values.resolve(expr.callee);
    let parameters: VeniceType[] = [];
    let returnType: VeniceType = errorType;

    if (!binding) {
      this.#undefinedSymbol(expr.callee, expr.location);
    } else if (!binding.callable || binding.type.kind !== "function") {
      this.#diagnostics.report({
        code: "TY0006",
        params: { kind: "not-callable", name: expr.callee },
        location: expr.location,
      });
    } else {
      parameters = binding.type.parameters;
      returnType = binding.type.returnType;
      if (parameters.length !== expr.arguments.length) {
        this.#diagnostics.report({
          code: "TY0007",
          params: {
            kind: "arity",
            expected: parameters.length,
            actual: expr.arguments.length,
          },
          location: expr.location,
        });
      }
    }

    const args = expr.arguments.map((arg, index) => {
      const parameter = parameters[index];
      const typed = this.#expression(arg, parameter);
      if (parameter) this.#expectType(parameter, typed);
      return typed;
    });

    return {
      kind: "call",
      callee: expr.callee,
      arguments: args,
      type: returnType,
      location: expr.location,
    };
  }

  #recordLiteral(expr: Extract<Expression<unknown>, { kind: "record" }>): TypedExpression {
    const info = this.#records.get(expr.name);
    if (!info) {
      this.#diagnostics.report({
        code: "TY0003",
        params: { kind: "unknown-type", name: expr.name },
        location: expr.location,
      });
    }

    const seen = new Set<string>();
    const fields = expr.fields.map((field) => {
      const declared = info?.fields.find((candidate) => candidate.name === field.name);
      if (info && !declared) {
        this.#diagnostics.report({
          code: "TY0010",
          params: { kind: "unknown-field", record: info.name, field: field.name },
          location: field.location,
        });
      } else if (info && seen.has(field.name)) {
        this.#diagnostics.report({
          code: "TY0010",
          params: { kind: "duplicate-field", record: info.name, field: field.name },
          location: field.location,
        });
      }
      seen.add(field.name);

      const value = this.#expression(field.value, declared?.type);
      if (declared) this.#expectType(declared.type, value);
      return { name: field.name, value, location: field.location };
    });

    for (const field of info?.fields ?? []) {
      if (seen.has(field.name)) continue;
      this.#diagnostics.report({
        code: "TY0010",
        params: { kind: "missing-field", record: expr.name, field: field.name },
        location: expr.location,
      });
    }

    return {
      kind: "record",
      name: expr.name,
      fields,
      type: info ? recordType(info.name) : errorType,
      location: expr.location,
    };
  }

  #expectType(expected: VeniceType, actual: TypedExpression): void {
    if (typeMatches(expected, actual.type)) return;
    this.#diagnostics.report({
      code: "TY0001",
      params: {
        kind: "type-mismatch",
        expected: typeToString(expected),
        actual: typeToString(actual.type),
      },
      location: actual.location,
    });
  }

  #declareValue(name: string, binding: ValueBinding<VeniceType>, location: Location): void {
    if (this.#values.declare(name, binding)) return;
    this.#diagnostics.report({
      code: "TY0004",
      params: { kind: "duplicate-binding", name },
      location,
    });
  }

  #duplicateDeclaration(name: string, location: Location): void {
    this.#diagnostics.report({
      code: "TY0004",
      params: { kind: "duplicate-declaration", name },
      location,
    });
  }

  #undefinedSymbol(name: string, location: Location): void {
    this.#diagnostics.report({
      code: "TY0002",
      params: { kind: "undefined-symbol", name },
      location,
    });
  }

  #emptyLiteral(collection: "list" | "map", location: Location): void {
    this.#diagnostics.report({
      code: "TY0012",
      params: { kind: "empty-literal", collection },
      location,
    });
  }
}

export const analyze = (
  program: Program<unknown>,
  options: AnalyzeOptions = {}
): AnalyzeResult => {
  const analyzer = new Analyzer();
  const typed = analyzer.run(program, options);
  const diagnostics = [...analyzer.diagnostics];
  return diagnostics.length > 0
    ? { ok: false, diagnostics }
    : { ok: true, program: typed };
};
