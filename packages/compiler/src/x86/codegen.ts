import { InternalCompilerError } from "../diagnostics/index.js";
import {
  type Block,
  type CompareInstructionOp,
  type Instruction,
  type Operand,
  type Terminator,
  type VilFunction,
  type VilProgram,
} from "../vil/ir.js";
import {
  argumentRegisters,
  imm,
  instr,
  label,
  mem,
  reg,
  rip,
  type Register,
  type X86Block,
  type X86Data,
  type X86Instruction,
  type X86Operand,
  type X86Program,
} from "./program.js";

const SLOT_SIZE = 8;
const STACK_ALIGNMENT = 16;

const setccOps: Record<CompareInstructionOp, string> = {
  cmp_lt: "setl",
  cmp_le: "setle",
  cmp_gt: "setg",
  cmp_ge: "setge",
  cmp_eq: "sete",
  cmp_ne: "setne",
};

const alignTo = (value: number, alignment: number): number =>
  Math.ceil(value / alignment) * alignment;

/** `main` keeps its name; generated helpers keep theirs; user functions are prefixed. */
export const asmFunctionName = (name: string): string =>
  name === "main" || name.startsWith("venice_") ? name : `venice_fn_${name}`;

export const localLabel = (vilLabel: string): string => `.${vilLabel}`;

/**
 * Stack layout of one function: every virtual symbol owns an 8-byte slot at
 * `rbp - offset`, assigned on first definition. An `alloca` owns a region of
 * its size instead, and its symbol stands for the region's address.
 */
class FrameLayout {
  readonly #slots = new Map<string, number>();
  readonly #regions = new Map<string, number>();
  #size = 0;

  constructor(fn: VilFunction) {
    for (const param of fn.parameters) this.#assignSlot(param.name);
    for (const block of fn.blocks) {
      for (const instruction of block.instructions) {
        if (instruction.op === "alloca") {
          this.#size += alignTo(Math.max(instruction.size, SLOT_SIZE), SLOT_SIZE);
          this.#regions.set(instruction.dest, this.#size);
        } else if (instruction.op !== "store" && instruction.dest !== undefined) {
          this.#assignSlot(instruction.dest);
        }
      }
    }
  }

  #assignSlot(symbol: string): void {
    if (this.#slots.has(symbol)) return;
    this.#size += SLOT_SIZE;
    this.#slots.set(symbol, this.#size);
  }

  get frameSize(): number {
    return alignTo(this.#size, STACK_ALIGNMENT);
  }

  /** Offset below rbp of the region an alloca symbol points to. */
  region(symbol: string): number | undefined {
    return this.#regions.get(symbol);
  }

  slot(symbol: string): X86Operand {
    const offset = this.#slots.get(symbol);
    if (offset === undefined) {
      throw new InternalCompilerError(`symbol ${symbol} has no stack slot`);
    }
    return mem("rbp", -offset);
  }
}

class FunctionGenerator {
  readonly #fn: VilFunction;
  readonly #frame: FrameLayout;
  readonly #functionNames: ReadonlySet<string>;
  #out: X86Instruction[] = [];

  constructor(fn: VilFunction, functionNames: ReadonlySet<string>) {
    this.#fn = fn;
    this.#frame = new FrameLayout(fn);
    this.#functionNames = functionNames;
  }

  generate(): X86Block[] {
    const entry: X86Block = {
      label: asmFunctionName(this.#fn.name),
      local: false,
      instructions: this.#prologue(),
    };

    const blocks = this.#fn.blocks.map((block) => this.#block(block));
    return [entry, ...blocks];
  }

  #prologue(): X86Instruction[] {
    this.#out = [instr("push", reg("rbp")), instr("mov", reg("rbp"), reg("rsp"))];
    const frameSize = this.#frame.frameSize;
    if (frameSize > 0) {
      this.#emit("sub", reg("rsp"), imm(frameSize));
    }

    this.#fn.parameters.forEach((param, index) => {
      const register = argumentRegisters[index];
      if (register) {
        this.#emit("mov", this.#frame.slot(param.name), reg(register));
        return;
      }
      // Stack arguments sit above the return address and saved rbp.
      const offset = 2 * SLOT_SIZE + (index - argumentRegisters.length) * SLOT_SIZE;
      this.#emit("mov", reg("rax"), mem("rbp", offset));
      this.#emit("mov", this.#frame.slot(param.name), reg("rax"));
    });
    return this.#out;
  }

  #block(block: Block): X86Block {
    this.#out = [];
    for (const instruction of block.instructions) {
      this.#instruction(instruction);
    }
    this.#terminator(block.terminator);
    return { label: localLabel(block.label), local: true, instructions: this.#out };
  }

  #emit(op: string, ...operands: X86Operand[]): void {
    this.#out.push(instr(op, ...operands));
  }

  /** Loads an operand's value into `target`. */
  #materialize(operand: Operand, target: Register): void {
    const value = operand.value;
    switch (value.kind) {
      case "int":
        this.#emit("mov", reg(target), imm(value.value));
        return;
      case "global":
        this.#emit("lea", reg(target), rip(value.name));
        return;
      case "symbol": {
        const region = this.#frame.region(value.name);
        if (region !== undefined) {
          this.#emit("lea", reg(target), mem("rbp", -region));
          return;
        }
        this.#emit("mov", reg(target), this.#frame.slot(value.name));
        return;
      }
    }
  }

  /**
   * The memory operand an address refers to. Stack regions and globals are
   * addressed directly; any other pointer is loaded into `scratch` first.
   */
  #memoryAt(address: Operand, scratch: Register): X86Operand {
    const value = address.value;
    if (value.kind === "global") return rip(value.name);
    if (value.kind === "symbol") {
      const region = this.#frame.region(value.name);
      if (region !== undefined) return mem("rbp", -region);
    }
    this.#materialize(address, scratch);
    return mem(scratch);
  }

  #spill(dest: string, source: Register = "rax"): void {
    this.#emit("mov", this.#frame.slot(dest), reg(source));
  }

  #instruction(instruction: Instruction): void {
    switch (instruction.op) {
      case "alloca":
        // Regions are reserved by the frame layout.
        return;
      case "store": {
        this.#materialize(instruction.value, "rax");
        this.#emit("mov", this.#memoryAt(instruction.address, "rcx"), reg("rax"));
        return;
      }
      case "load":
        this.#emit("mov", reg("rax"), this.#memoryAt(instruction.address, "rax"));
        this.#spill(instruction.dest);
        return;
      case "add":
      case "sub":
        this.#materialize(instruction.left, "rax");
        this.#materialize(instruction.right, "rcx");
        this.#emit(instruction.op, reg("rax"), reg("rcx"));
        this.#spill(instruction.dest);
        return;
      case "mul":
        this.#materialize(instruction.left, "rax");
        this.#materialize(instruction.right, "rcx");
        this.#emit("imul", reg("rax"), reg("rcx"));
        this.#spill(instruction.dest);
        return;
      case "div":
      case "mod":
        this.#materialize(instruction.left, "rax");
        this.#materialize(instruction.right, "rcx");
        this.#emit("cqo");
        this.#emit("idiv", reg("rcx"));
        this.#spill(instruction.dest, instruction.op === "div" ? "rax" : "rdx");
        return;
      case "cmp_lt":
      case "cmp_le":
      case "cmp_gt":
      case "cmp_ge":
      case "cmp_eq":
      case "cmp_ne":
        this.#materialize(instruction.left, "rax");
        this.#materialize(instruction.right, "rcx");
        this.#emit("cmp", reg("rax"), reg("rcx"));
        this.#emit(setccOps[instruction.op], reg("al"));
        this.#emit("movzx", reg("rax"), reg("al"));
        this.#spill(instruction.dest);
        return;
      case "neg":
        this.#materialize(instruction.operand, "rax");
        this.#emit("neg", reg("rax"));
        this.#spill(instruction.dest);
        return;
      case "not":
        this.#materialize(instruction.operand, "rax");
        this.#emit("cmp", reg("rax"), imm(0));
        this.#emit("sete", reg("al"));
        this.#emit("movzx", reg("rax"), reg("al"));
        this.#spill(instruction.dest);
        return;
      case "call":
        this.#call(instruction);
        return;
    }
  }

  /**
   * System V call: six register arguments, the rest pushed right to left with
   * padding so rsp is 16-byte aligned at the `call`.
   */
  #call(instruction: Extract<Instruction, { op: "call" }>): void {
    const stackArgs = instruction.args.slice(argumentRegisters.length);
    const padding = stackArgs.length % 2 === 1 ? SLOT_SIZE : 0;
    if (padding > 0) this.#emit("sub", reg("rsp"), imm(padding));

    for (const arg of [...stackArgs].reverse()) {
      this.#materialize(arg, "rax");
      this.#emit("push", reg("rax"));
    }

    instruction.args.slice(0, argumentRegisters.length).forEach((arg, index) => {
      const register = argumentRegisters[index];
      if (register) this.#materialize(arg, register);
    });

    const target = this.#functionNames.has(instruction.callee)
      ? asmFunctionName(instruction.callee)
      : instruction.callee;
    this.#emit("call", label(target));

    const cleanup = stackArgs.length * SLOT_SIZE + padding;
    if (cleanup > 0) this.#emit("add", reg("rsp"), imm(cleanup));
    if (instruction.dest !== undefined) this.#spill(instruction.dest);
  }

  #terminator(terminator: Terminator): void {
    switch (terminator.kind) {
      case "ret":
        this.#materialize(terminator.value, "rax");
        this.#emit("mov", reg("rsp"), reg("rbp"));
        this.#emit("pop", reg("rbp"));
        this.#emit("ret");
        return;
      case "jump":
        this.#emit("jmp", label(localLabel(terminator.target)));
        return;
      case "jump_cond":
        this.#materialize(terminator.condition, "rax");
        this.#emit("cmp", reg("rax"), imm(0));
        this.#emit("jne", label(localLabel(terminator.ifTrue)));
        this.#emit("jmp", label(localLabel(terminator.ifFalse)));
        return;
      case "placeholder":
        throw new InternalCompilerError(
          `placeholder terminator reached code generation in ${this.#fn.name}`
        );
    }
  }
}

export const generateX86 = (program: VilProgram): X86Program => {
  const functionNames = new Set(program.functions.map((fn) => fn.name));
  const blocks = program.functions.flatMap((fn) =>
    new FunctionGenerator(fn, functionNames).generate()
  );

  const data: X86Data[] = [
    ...program.strings.map(
      (entry): X86Data => ({ kind: "string", label: entry.label, value: entry.value })
    ),
    ...program.globals.map((global): X86Data => ({ kind: "quad", label: global.name })),
  ];

  return {
    externs: [...program.externs],
    globals: functionNames.has("main") ? ["main"] : [],
    blocks,
    data,
  };
};
