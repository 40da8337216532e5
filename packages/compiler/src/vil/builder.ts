import { InternalCompilerError } from "../diagnostics/index.js";
import {
  entryLabel,
  i64,
  ptr,
  symbolOperand,
  type BinaryInstructionOp,
  type Block,
  type Instruction,
  type Operand,
  type Terminator,
  type UnaryInstructionOp,
  type VilFunction,
  type VilParameter,
  type VilType,
} from "./ir.js";

export const makeRet = (value: Operand): Terminator => ({ kind: "ret", value });

export const makeJump = (target: string): Terminator => ({ kind: "jump", target });

export const makeJumpCond = (
  condition: Operand,
  ifTrue: string,
  ifFalse: string
): Terminator => ({ kind: "jump_cond", condition, ifTrue, ifFalse });

const placeholder = (): Terminator => ({ kind: "placeholder" });

const makeBlock = (label: string): Block => ({
  label,
  instructions: [],
  terminator: placeholder(),
});

/**
 * Builds one VIL function. There is always a current block, which is either
 * open (placeholder terminator, accepting instructions) or terminated. Emitting
 * into a terminated block is a compiler bug; starting a block while the current
 * one is open terminates it with a jump to the new block.
 *
 * Usage:
 *   const builder = new FunctionBuilder("main", [], i64);
 *   const sum = builder.binary("add", "sum", intOperand(1), intOperand(2));
 *   builder.ret(sum);
 *   const fn = builder.build();
 */
export class FunctionBuilder {
  readonly name: string;
  readonly parameters: VilParameter[];
  readonly returnType: VilType;
  readonly #blocks: Block[] = [];
  #current: Block;
  #nextSymbol = 0;
  #nextLabel = 0;

  /** Parameter symbols are drawn from the function's symbol counter. */
  constructor(
    name: string,
    parameters: { hint: string; type: VilType }[],
    returnType: VilType
  ) {
    this.name = name;
    this.parameters = parameters.map((param) => ({
      name: this.symbol(param.hint),
      type: param.type,
    }));
    this.returnType = returnType;
    this.#current = makeBlock(entryLabel(name));
    this.#blocks.push(this.#current);
  }

  get parameterOperands(): Operand[] {
    return this.parameters.map((param) => symbolOperand(param.name, param.type));
  }

  get currentLabel(): string {
    return this.#current.label;
  }

  get isTerminated(): boolean {
    return this.#current.terminator.kind !== "placeholder";
  }

  /** A fresh virtual symbol, `<hint>_<N>`. */
  symbol(hint: string): string {
    return `${hint}_${this.#nextSymbol++}`;
  }

  /** A fresh block label, `<prefix>_<N>`. */
  label(prefix: string): string {
    return `${prefix}_${this.#nextLabel++}`;
  }

  startBlock(label: string): void {
    if (!this.isTerminated) {
      this.#current.terminator = makeJump(label);
    }
    this.#current = makeBlock(label);
    this.#blocks.push(this.#current);
  }

  emit(instruction: Instruction): void {
    if (this.isTerminated) {
      throw new InternalCompilerError(
        `emit into terminated block ${this.#current.label} of ${this.name}`
      );
    }
    this.#current.instructions.push(instruction);
  }

  terminate(terminator: Terminator): void {
    if (this.isTerminated) {
      throw new InternalCompilerError(
        `block ${this.#current.label} of ${this.name} is already terminated`
      );
    }
    this.#current.terminator = terminator;
  }

  /** Reserves `size` bytes of stack and returns a pointer to them. */
  alloca(hint: string, type: VilType, size = 8): Operand {
    const dest = this.symbol(hint);
    this.emit({ op: "alloca", dest, type, size });
    return symbolOperand(dest, ptr(type));
  }

  store(address: Operand, value: Operand): void {
    this.emit({ op: "store", address, value });
  }

  load(hint: string, address: Operand): Operand {
    const dest = this.symbol(hint);
    this.emit({ op: "load", dest, address });
    const type = address.type.kind === "ptr" ? address.type.pointee : i64;
    return symbolOperand(dest, type);
  }

  binary(
    op: BinaryInstructionOp,
    hint: string,
    left: Operand,
    right: Operand
  ): Operand {
    const dest = this.symbol(hint);
    this.emit({ op, dest, left, right });
    return symbolOperand(dest, op.startsWith("cmp_") ? i64 : left.type);
  }

  unary(op: UnaryInstructionOp, hint: string, operand: Operand): Operand {
    const dest = this.symbol(hint);
    this.emit({ op, dest, operand });
    return symbolOperand(dest, operand.type);
  }

  /** Emits a call; `result` names the returned value's type, if it has one. */
  call(callee: string, args: Operand[], result?: { hint: string; type: VilType }): Operand | undefined {
    if (!result) {
      this.emit({ op: "call", callee, args });
      return undefined;
    }

    const dest = this.symbol(result.hint);
    this.emit({ op: "call", dest, callee, args });
    return symbolOperand(dest, result.type);
  }

  ret(value: Operand): void {
    this.terminate(makeRet(value));
  }

  jump(target: string): void {
    this.terminate(makeJump(target));
  }

  jumpCond(condition: Operand, ifTrue: string, ifFalse: string): void {
    this.terminate(makeJumpCond(condition, ifTrue, ifFalse));
  }

  build(): VilFunction {
    const open = this.#blocks.find((block) => block.terminator.kind === "placeholder");
    if (open) {
      throw new InternalCompilerError(
        `block ${open.label} of ${this.name} has no terminator`
      );
    }

    return {
      name: this.name,
      parameters: this.parameters,
      returnType: this.returnType,
      blocks: this.#blocks,
    };
  }
}
