import { InternalCompilerError } from "../diagnostics/index.js";
import type { BinaryOp } from "../common/operators.js";
import { getBuiltin } from "../semantics/builtins.js";
import { SymbolTable } from "../semantics/symbol-table.js";
import type { VeniceType } from "../semantics/types.js";
import type {
  ConstDeclaration,
  Expression,
  ForStatement,
  FunctionDeclaration,
  IfStatement,
  Program,
  Statement,
} from "../tree/syntax.js";
import { FunctionBuilder } from "./builder.js";
import {
  globalOperand,
  i64,
  intOperand,
  opaquePtr,
  ptr,
  type CompareInstructionOp,
  type Operand,
  type StringConstant,
  type VilFunction,
  type VilProgram,
  type VilType,
} from "./ir.js";
import { runtime } from "./runtime.js";

type TypedExpression = Expression<VeniceType>;
type TypedStatement = Statement<VeniceType>;

export const CELL_SIZE = 8;
export const INIT_CONSTANTS = "venice_init_constants";

const compareOps: Partial<Record<BinaryOp, CompareInstructionOp>> = {
  lt: "cmp_lt",
  le: "cmp_le",
  gt: "cmp_gt",
  ge: "cmp_ge",
  eq: "cmp_eq",
  ne: "cmp_ne",
};

/** Booleans and integers are held in registers; everything else is a pointer. */
export const vilTypeOf = (type: VeniceType): VilType => {
  switch (type.kind) {
    case "boolean":
    case "i64":
    case "void":
    case "error":
      return i64;
    default:
      return opaquePtr;
  }
};

const constGlobalName = (name: string): string => `const_${name}`;

/** Program-wide state shared by every function being lowered. */
class ProgramContext {
  readonly externs = new Set<string>();
  readonly strings: StringConstant[] = [];
  readonly #stringLabels = new Map<string, string>();
  readonly records = new Map<string, string[]>();
  readonly constants = new Map<string, VilType>();

  internString(value: string): string {
    const existing = this.#stringLabels.get(value);
    if (existing) return existing;

    const label = `str_${this.strings.length}`;
    this.strings.push({ label, value });
    this.#stringLabels.set(value, label);
    return label;
  }

  fieldOffset(record: string, field: string): number {
    const index = this.records.get(record)?.indexOf(field) ?? -1;
    if (index < 0) {
      throw new InternalCompilerError(`record ${record} has no field ${field}`);
    }
    return index * CELL_SIZE;
  }
}

interface Slot {
  address: Operand;
}

/** Lowers one function body through a `FunctionBuilder`. */
class FunctionLowering {
  readonly #builder: FunctionBuilder;
  readonly #context: ProgramContext;
  readonly #slots = new SymbolTable<Slot>();

  constructor(builder: FunctionBuilder, context: ProgramContext) {
    this.#builder = builder;
    this.#context = context;
  }

  get builder(): FunctionBuilder {
    return this.#builder;
  }

  /** Gives every parameter a stack slot holding its incoming value. */
  bindParameters(names: string[]): void {
    this.#builder.parameterOperands.forEach((incoming, index) => {
      const name = names[index];
      if (name === undefined) return;
      const address = this.#builder.alloca(`${name}_slot`, incoming.type);
      this.#builder.store(address, incoming);
      this.#slots.declare(name, { address });
    });
  }

  statements(body: TypedStatement[]): void {
    for (const stmt of body) {
      if (this.#builder.isTerminated) {
        this.#builder.startBlock(this.#builder.label("unreachable"));
      }
      this.statement(stmt);
    }
  }

  #scoped(body: TypedStatement[]): void {
    this.#slots.withScope(() => this.statements(body));
  }

  /**
   * Closes an open last block with `ret 0`. Only `main` and `void` functions
   * reach it; in any other function the analyzer has made it unreachable.
   */
  finish(): VilFunction {
    if (!this.#builder.isTerminated) {
      this.#builder.ret(intOperand(0));
    }
    return this.#builder.build();
  }

  statement(stmt: TypedStatement): void {
    const builder = this.#builder;
    switch (stmt.kind) {
      case "let": {
        const value = this.expression(stmt.value);
        const address = builder.alloca(stmt.name, vilTypeOf(stmt.resolvedType));
        builder.store(address, value);
        this.#slots.declare(stmt.name, { address });
        return;
      }
      case "assign": {
        const value = this.expression(stmt.value);
        builder.store(this.#address(stmt.name), value);
        return;
      }
      case "if":
        return this.#ifStatement(stmt);
      case "while": {
        const cond = builder.label("while_cond");
        const body = builder.label("while");
        const end = builder.label("while_end");
        builder.startBlock(cond);
        builder.jumpCond(this.expression(stmt.condition), body, end);
        builder.startBlock(body);
        this.#scoped(stmt.body);
        if (!builder.isTerminated) builder.jump(cond);
        builder.startBlock(end);
        return;
      }
      case "for":
        return this.#forStatement(stmt);
      case "return":
        builder.ret(this.expression(stmt.value));
        return;
      case "assert": {
        const ok = builder.label("assert_ok");
        const fail = builder.label("assert_fail");
        builder.jumpCond(this.expression(stmt.condition), ok, fail);
        builder.startBlock(fail);
        this.#runtimeCall("venice_assert_failed", [intOperand(stmt.location.line)]);
        builder.jump(ok);
        builder.startBlock(ok);
        return;
      }
      case "expression":
        this.expression(stmt.expression);
        return;
    }
  }

  /**
   * Each arm gets a test block and a body block; every body that falls
   * through jumps to one join block after the whole statement.
   */
  #ifStatement(stmt: IfStatement<VeniceType>): void {
    const builder = this.#builder;
    const end = builder.label("if_end");
    const arms = [{ condition: stmt.condition, body: stmt.body }, ...stmt.elifs];

    arms.forEach((arm, index) => {
      const then = builder.label("if_then");
      const isLast = index === arms.length - 1;
      const next = !isLast
        ? builder.label("if_elif")
        : stmt.elseBody
          ? builder.label("if_else")
          : end;

      builder.jumpCond(this.expression(arm.condition), then, next);
      builder.startBlock(then);
      this.#scoped(arm.body);
      if (!builder.isTerminated) builder.jump(end);
      if (next !== end) builder.startBlock(next);
    });

    if (stmt.elseBody) {
      this.#scoped(stmt.elseBody);
      if (!builder.isTerminated) builder.jump(end);
    }
    builder.startBlock(end);
  }

  /** Walks lists by index and maps by entry index, in insertion order. */
  #forStatement(stmt: ForStatement<VeniceType>): void {
    const builder = this.#builder;
    const source = stmt.iterable.type;
    const container = this.expression(stmt.iterable);
    const isMap = source.kind === "map";
    const length = this.#runtimeCall(
      isMap ? "venice_map_length" : "venice_list_length",
      [container]
    );

    const counter = builder.alloca("for_index", i64);
    builder.store(counter, intOperand(0));

    const cond = builder.label("for_cond");
    const body = builder.label("for");
    const end = builder.label("for_end");

    builder.startBlock(cond);
    const index = builder.load("index", counter);
    builder.jumpCond(builder.binary("cmp_lt", "in_range", index, length), body, end);

    builder.startBlock(body);
    this.#slots.withScope(() => {
      const current = builder.load("index", counter);
      if (source.kind === "map") {
        this.#bindLoopVariable(
          stmt.variable,
          this.#runtimeCall("venice_map_key_at", [container, current], vilTypeOf(source.key))
        );
        if (stmt.secondVariable !== undefined) {
          this.#bindLoopVariable(
            stmt.secondVariable,
            this.#runtimeCall("venice_map_value_at", [container, current], vilTypeOf(source.value))
          );
        }
      } else {
        const item = source.kind === "list" ? vilTypeOf(source.item) : i64;
        this.#bindLoopVariable(
          stmt.variable,
          this.#runtimeCall("venice_list_get", [container, current], item)
        );
      }
      this.statements(stmt.body);
    });

    if (!builder.isTerminated) {
      const last = builder.load("index", counter);
      builder.store(counter, builder.binary("add", "next_index", last, intOperand(1)));
      builder.jump(cond);
    }
    builder.startBlock(end);
  }

  #bindLoopVariable(name: string, value: Operand): void {
    const address = this.#builder.alloca(name, value.type);
    this.#builder.store(address, value);
    this.#slots.declare(name, { address });
  }

  #address(name: string): Operand {
    const slot = this.#slots.resolve(name);
    if (slot) return slot.address;

    const type = this.#context.constants.get(name);
    if (type) return globalOperand(constGlobalName(name), ptr(type));

    throw new InternalCompilerError(`no storage for ${name}`);
  }

  #runtimeCall(name: string, args: Operand[], result: VilType = i64): Operand {
    const fn = runtime[name];
    if (!fn) throw new InternalCompilerError(`unknown runtime function ${name}`);
    this.#context.externs.add(name);
    if (!fn.returns) {
      this.#builder.call(name, args);
      return intOperand(0);
    }

    const value = this.#builder.call(name, args, { hint: fn.hint, type: result });
    return value ?? intOperand(0);
  }

  expression(expr: TypedExpression): Operand {
    const builder = this.#builder;
    switch (expr.kind) {
      case "boolean":
        return intOperand(expr.value ? 1 : 0);
      case "integer":
        return intOperand(expr.value);
      case "string": {
        const label = this.#context.internString(expr.value);
        return this.#runtimeCall(
          "venice_string_new",
          [globalOperand(label, ptr(i64))],
          opaquePtr
        );
      }
      case "identifier":
        return builder.load(expr.name, this.#address(expr.name));
      case "binary":
        return this.#binary(expr);
      case "unary": {
        const operand = this.expression(expr.operand);
        return builder.unary(expr.op, expr.op, operand);
      }
      case "call":
        return this.#call(expr);
      case "index": {
        const container = this.expression(expr.value);
        const index = this.expression(expr.index);
        return this.#runtimeCall(
          expr.value.type.kind === "map" ? "venice_map_get" : "venice_list_get",
          [container, index],
          vilTypeOf(expr.type)
        );
      }
      case "tuple-index":
        return this.#loadCell(this.expression(expr.value), expr.index * CELL_SIZE, expr.type);
      case "attribute": {
        const record = expr.value.type;
        if (record.kind !== "record") {
          throw new InternalCompilerError(`attribute access on ${record.kind}`);
        }
        const offset = this.#context.fieldOffset(record.name, expr.attribute);
        return this.#loadCell(this.expression(expr.value), offset, expr.type);
      }
      case "list": {
        const items = expr.items.map((item) => this.expression(item));
        const list = this.#runtimeCall(
          "venice_list_new",
          [intOperand(items.length)],
          opaquePtr
        );
        for (const item of items) {
          this.#runtimeCall("venice_list_append", [list, item]);
        }
        return list;
      }
      case "map": {
        const entries = expr.entries.map((entry) => ({
          key: this.expression(entry.key),
          value: this.expression(entry.value),
        }));
        const map = this.#runtimeCall("venice_map_new", [], opaquePtr);
        for (const entry of entries) {
          this.#runtimeCall("venice_map_insert", [map, entry.key, entry.value]);
        }
        return map;
      }
      case "tuple": {
        const items = expr.items.map((item) => this.expression(item));
        return this.#allocateCells(items.map((value, index) => ({ offset: index * CELL_SIZE, value })));
      }
      case "record": {
        const cells = expr.fields.map((field) => ({
          offset: this.#context.fieldOffset(expr.name, field.name),
          value: this.expression(field.value),
        }));
        return this.#allocateCells(cells, this.#context.records.get(expr.name)?.length);
      }
    }
  }

  #binary(expr: Extract<TypedExpression, { kind: "binary" }>): Operand {
    const builder = this.#builder;
    if (expr.op === "and" || expr.op === "or") {
      return this.#shortCircuit(expr);
    }

    const left = this.expression(expr.left);
    const right = this.expression(expr.right);
    if (expr.op === "concat") {
      return this.#runtimeCall("venice_string_concat", [left, right], opaquePtr);
    }

    const compare = compareOps[expr.op];
    if (compare) {
      if (expr.left.type.kind === "string") {
        const order = this.#runtimeCall("venice_string_compare", [left, right]);
        return builder.binary(compare, expr.op, order, intOperand(0));
      }
      // Lists, maps, tuples and records compare by reference.
      return builder.binary(compare, expr.op, left, right);
    }

    switch (expr.op) {
      case "add":
      case "sub":
      case "mul":
      case "div":
      case "mod":
        return builder.binary(expr.op, expr.op, left, right);
      default:
        throw new InternalCompilerError(`unexpected operator ${expr.op}`);
    }
  }

  /**
   * `a and b` evaluates `b` only when `a` is true, `a or b` only when `a` is
   * false. The result travels through a stack slot to the join block.
   */
  #shortCircuit(expr: Extract<TypedExpression, { kind: "binary" }>): Operand {
    const builder = this.#builder;
    const result = builder.alloca(expr.op, i64);
    const left = this.expression(expr.left);
    builder.store(result, left);

    const rhs = builder.label(`${expr.op}_rhs`);
    const end = builder.label(`${expr.op}_end`);
    if (expr.op === "and") {
      builder.jumpCond(left, rhs, end);
    } else {
      builder.jumpCond(left, end, rhs);
    }

    builder.startBlock(rhs);
    builder.store(result, this.expression(expr.right));
    builder.jump(end);

    builder.startBlock(end);
    return builder.load(expr.op, result);
  }

  #call(expr: Extract<TypedExpression, { kind: "call" }>): Operand {
    const args = expr.arguments.map((arg) => this.expression(arg));
    const builtin = getBuiltin(expr.callee);
    const returnsValue = expr.type.kind !== "void";

    if (builtin) {
      return this.#runtimeCall(builtin.runtime, args, vilTypeOf(expr.type));
    }

    const value = this.#builder.call(
      expr.callee,
      args,
      returnsValue ? { hint: "call", type: vilTypeOf(expr.type) } : undefined
    );
    return value ?? intOperand(0);
  }

  #loadCell(base: Operand, offset: number, type: VeniceType): Operand {
    const builder = this.#builder;
    const address = builder.binary("add", "cell", base, intOperand(offset));
    return builder.load("item", { type: ptr(vilTypeOf(type)), value: address.value });
  }

  #allocateCells(
    cells: { offset: number; value: Operand }[],
    count = cells.length
  ): Operand {
    const builder = this.#builder;
    const block = this.#runtimeCall(
      "venice_malloc",
      [intOperand(count * CELL_SIZE)],
      opaquePtr
    );
    for (const cell of cells) {
      const address = builder.binary("add", "cell", block, intOperand(cell.offset));
      builder.store({ type: ptr(cell.value.type), value: address.value }, cell.value);
    }
    return block;
  }
}

const lowerFunction = (
  decl: FunctionDeclaration<VeniceType>,
  context: ProgramContext
): VilFunction => {
  const builder = new FunctionBuilder(
    decl.name,
    decl.parameters.map((param) => ({
      hint: param.name,
      type: vilTypeOf(param.resolvedType),
    })),
    vilTypeOf(decl.resolvedReturnType)
  );

  if (decl.name === "main" && context.constants.size > 0) {
    builder.call(INIT_CONSTANTS, []);
  }

  const lowering = new FunctionLowering(builder, context);
  lowering.bindParameters(decl.parameters.map((param) => param.name));
  lowering.statements(decl.body);
  return lowering.finish();
};

/** Evaluates every `const` initializer, in declaration order, into its global. */
const lowerConstants = (
  consts: ConstDeclaration<VeniceType>[],
  context: ProgramContext
): VilFunction => {
  const builder = new FunctionBuilder(INIT_CONSTANTS, [], i64);
  const lowering = new FunctionLowering(builder, context);
  for (const decl of consts) {
    const value = lowering.expression(decl.value);
    const type = vilTypeOf(decl.resolvedType);
    builder.store(globalOperand(constGlobalName(decl.name), ptr(type)), value);
  }
  return lowering.finish();
};

export const lower = (program: Program<VeniceType>): VilProgram => {
  const context = new ProgramContext();
  const consts: ConstDeclaration<VeniceType>[] = [];
  const functions: FunctionDeclaration<VeniceType>[] = [];

  for (const decl of program.declarations) {
    switch (decl.kind) {
      case "record":
        context.records.set(
          decl.name,
          decl.fields.map((field) => field.name)
        );
        break;
      case "const":
        consts.push(decl);
        context.constants.set(decl.name, vilTypeOf(decl.resolvedType));
        break;
      case "function":
        functions.push(decl);
        break;
    }
  }

  const lowered = functions.map((decl) => lowerFunction(decl, context));
  if (consts.length > 0) {
    lowered.push(lowerConstants(consts, context));
  }

  return {
    externs: [...context.externs].sort(),
    functions: lowered,
    strings: context.strings,
    globals: consts.map((decl) => ({ name: constGlobalName(decl.name) })),
  };
};
