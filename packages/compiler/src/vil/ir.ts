/** Venice intermediate language: functions of basic blocks over virtual symbols. */

export type VilType = { kind: "i64" } | { kind: "ptr"; pointee: VilType };

export const i64: VilType = { kind: "i64" };

export const ptr = (pointee: VilType): VilType => ({ kind: "ptr", pointee });

/** Opaque runtime objects (strings, lists, maps) and heap cells. */
export const opaquePtr: VilType = ptr(i64);

export type Value =
  | { kind: "int"; value: bigint }
  | { kind: "symbol"; name: string }
  | { kind: "global"; name: string };

/** A typed expression: the operand of every instruction. */
export interface Operand {
  type: VilType;
  value: Value;
}

export const intOperand = (value: bigint | number): Operand => ({
  type: i64,
  value: { kind: "int", value: BigInt(value) },
});

export const symbolOperand = (name: string, type: VilType): Operand => ({
  type,
  value: { kind: "symbol", name },
});

export const globalOperand = (name: string, type: VilType): Operand => ({
  type,
  value: { kind: "global", name },
});

export type ArithmeticInstructionOp = "add" | "sub" | "mul" | "div" | "mod";

export type CompareInstructionOp =
  | "cmp_lt"
  | "cmp_le"
  | "cmp_gt"
  | "cmp_ge"
  | "cmp_eq"
  | "cmp_ne";

export type BinaryInstructionOp = ArithmeticInstructionOp | CompareInstructionOp;

export type UnaryInstructionOp = "neg" | "not";

export type Instruction =
  | { op: "alloca"; dest: string; type: VilType; size: number }
  | { op: "store"; address: Operand; value: Operand }
  | { op: "load"; dest: string; address: Operand }
  | {
      op: BinaryInstructionOp;
      dest: string;
      left: Operand;
      right: Operand;
    }
  | { op: UnaryInstructionOp; dest: string; operand: Operand }
  | { op: "call"; dest?: string; callee: string; args: Operand[] };

export type Terminator =
  | { kind: "ret"; value: Operand }
  | { kind: "jump"; target: string }
  | {
      kind: "jump_cond";
      condition: Operand;
      ifTrue: string;
      ifFalse: string;
    }
  | { kind: "placeholder" };

export interface Block {
  label: string;
  instructions: Instruction[];
  terminator: Terminator;
}

export interface VilParameter {
  name: string;
  type: VilType;
}

export interface VilFunction {
  name: string;
  parameters: VilParameter[];
  returnType: VilType;
  blocks: Block[];
}

export interface StringConstant {
  label: string;
  value: string;
}

/** Zero-initialised 8-byte storage, used for `const` declarations. */
export interface GlobalSlot {
  name: string;
}

export interface VilProgram {
  externs: string[];
  functions: VilFunction[];
  strings: StringConstant[];
  globals: GlobalSlot[];
}

/** The symbol an instruction defines, if any. */
export const definedSymbol = (instruction: Instruction): string | undefined =>
  instruction.op === "store" ? undefined : instruction.dest;

/** Every operand an instruction reads. */
export const instructionOperands = (instruction: Instruction): Operand[] => {
  switch (instruction.op) {
    case "alloca":
      return [];
    case "store":
      return [instruction.address, instruction.value];
    case "load":
      return [instruction.address];
    case "call":
      return instruction.args;
    case "neg":
    case "not":
      return [instruction.operand];
    default:
      return [instruction.left, instruction.right];
  }
};

export const terminatorOperands = (terminator: Terminator): Operand[] => {
  switch (terminator.kind) {
    case "ret":
      return [terminator.value];
    case "jump_cond":
      return [terminator.condition];
    default:
      return [];
  }
};

export const terminatorTargets = (terminator: Terminator): string[] => {
  switch (terminator.kind) {
    case "jump":
      return [terminator.target];
    case "jump_cond":
      return [terminator.ifTrue, terminator.ifFalse];
    default:
      return [];
  }
};

export const entryLabel = (functionName: string): string =>
  `${functionName}_entry`;
