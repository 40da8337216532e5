import type { X86Block, X86Data, X86Instruction, X86Operand, X86Program } from "./program.js";

const INDENT = "    ";

export const printX86Operand = (operand: X86Operand): string => {
  switch (operand.kind) {
    case "immediate":
      return operand.value.toString();
    case "register":
      return operand.name;
    case "memory": {
      if (operand.displacement === 0) return `[${operand.base}]`;
      const sign = operand.displacement < 0 ? "-" : "+";
      return `[${operand.base} ${sign} ${Math.abs(operand.displacement)}]`;
    }
    case "rip-relative":
      return `[rel ${operand.label}]`;
    case "label":
      return operand.name;
  }
};

export const printX86Instruction = (instruction: X86Instruction): string =>
  instruction.operands.length === 0
    ? instruction.op
    : `${instruction.op} ${instruction.operands.map(printX86Operand).join(", ")}`;

const printBlock = (block: X86Block): string =>
  [
    `${block.label}:`,
    ...block.instructions.map((instruction) => `${INDENT}${printX86Instruction(instruction)}`),
  ].join("\n");

const backquoteEscapes: Record<string, string> = {
  "\\": "\\\\",
  "`": "\\`",
  "\n": "\\n",
  "\t": "\\t",
  "\r": "\\r",
  "\0": "\\0",
};

/** A NASM backquoted string, which takes C-style escapes. */
export const nasmString = (value: string): string => {
  const body = Array.from(value)
    .map((char) => {
      const escape = backquoteEscapes[char];
      if (escape) return escape;
      const code = char.codePointAt(0) ?? 0;
      return code < 0x20 || code === 0x7f
        ? `\\x${code.toString(16).padStart(2, "0")}`
        : char;
    })
    .join("");
  return `\`${body}\``;
};

const printData = (entry: X86Data): string =>
  entry.kind === "string"
    ? `${entry.label}: db ${nasmString(entry.value)}, 0`
    : `${entry.label}: dq 0`;

/** Renders NASM source for `nasm -f elf64`. */
export const printX86Program = (program: X86Program): string => {
  const header = [
    "default rel",
    ...program.globals.map((name) => `global ${name}`),
    ...program.externs.map((name) => `extern ${name}`),
  ];

  const sections = [
    header.join("\n"),
    ["section .text", ...program.blocks.map(printBlock)].join("\n"),
  ];
  if (program.data.length > 0) {
    sections.push(["section .data", ...program.data.map(printData)].join("\n"));
  }
  return sections.join("\n\n") + "\n";
};
