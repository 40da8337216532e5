export type Register =
  | "rax"
  | "rbx"
  | "rcx"
  | "rdx"
  | "rsi"
  | "rdi"
  | "rbp"
  | "rsp"
  | "r8"
  | "r9"
  | "r10"
  | "r11"
  | "al";

export type X86Operand =
  | { kind: "immediate"; value: bigint }
  | { kind: "register"; name: Register }
  | { kind: "memory"; base: Register; displacement: number }
  | { kind: "rip-relative"; label: string }
  | { kind: "label"; name: string };

export interface X86Instruction {
  op: string;
  operands: X86Operand[];
}

export interface X86Block {
  label: string;
  /** Local blocks print as NASM `.label`s scoped to the preceding function label. */
  local: boolean;
  instructions: X86Instruction[];
}

export type X86Data =
  | { kind: "string"; label: string; value: string }
  | { kind: "quad"; label: string };

export interface X86Program {
  externs: string[];
  globals: string[];
  blocks: X86Block[];
  data: X86Data[];
}

export const imm = (value: bigint | number): X86Operand => ({
  kind: "immediate",
  value: BigInt(value),
});

export const reg = (name: Register): X86Operand => ({ kind: "register", name });

export const mem = (base: Register, displacement = 0): X86Operand => ({
  kind: "memory",
  base,
  displacement,
});

export const rip = (label: string): X86Operand => ({ kind: "rip-relative", label });

export const label = (name: string): X86Operand => ({ kind: "label", name });

export const instr = (op: string, ...operands: X86Operand[]): X86Instruction => ({
  op,
  operands,
});

/** Integer argument registers of the System V AMD64 calling convention. */
export const argumentRegisters: readonly Register[] = [
  "rdi",
  "rsi",
  "rdx",
  "rcx",
  "r8",
  "r9",
];
