import { quoteString } from "../tree/format.js";
import type {
  Block,
  Instruction,
  Operand,
  Terminator,
  VilFunction,
  VilProgram,
  VilType,
} from "./ir.js";

export const printType = (type: VilType): string =>
  type.kind === "i64" ? "i64" : `${printType(type.pointee)}*`;

const printValue = (operand: Operand): string => {
  const value = operand.value;
  switch (value.kind) {
    case "int":
      return value.value.toString();
    case "symbol":
      return `%${value.name}`;
    case "global":
      return `@${value.name}`;
  }
};

export const printOperand = (operand: Operand): string =>
  `${printType(operand.type)} ${printValue(operand)}`;

export const printInstruction = (instruction: Instruction): string => {
  switch (instruction.op) {
    case "alloca":
      return `%${instruction.dest} = alloca ${printType(instruction.type)}, ${instruction.size}`;
    case "store":
      return `store ${printOperand(instruction.value)}, ${printOperand(instruction.address)}`;
    case "load":
      return `%${instruction.dest} = load ${printOperand(instruction.address)}`;
    case "call": {
      const call = `call @${instruction.callee}(${instruction.args.map(printOperand).join(", ")})`;
      return instruction.dest === undefined ? call : `%${instruction.dest} = ${call}`;
    }
    case "neg":
    case "not":
      return `%${instruction.dest} = ${instruction.op} ${printOperand(instruction.operand)}`;
    default:
      return `%${instruction.dest} = ${instruction.op} ${printOperand(instruction.left)}, ${printValue(instruction.right)}`;
  }
};

export const printTerminator = (terminator: Terminator): string => {
  switch (terminator.kind) {
    case "ret":
      return `ret ${printOperand(terminator.value)}`;
    case "jump":
      return `jump ${terminator.target}`;
    case "jump_cond":
      return `jump_cond ${printOperand(terminator.condition)}, ${terminator.ifTrue}, ${terminator.ifFalse}`;
    case "placeholder":
      return "placeholder";
  }
};

const printBlock = (block: Block): string =>
  [
    `${block.label}:`,
    ...block.instructions.map((instruction) => `  ${printInstruction(instruction)}`),
    `  ${printTerminator(block.terminator)}`,
  ].join("\n");

export const printFunction = (fn: VilFunction): string => {
  const parameters = fn.parameters
    .map((param) => `${printType(param.type)} %${param.name}`)
    .join(", ");
  const header = `define ${printType(fn.returnType)} @${fn.name}(${parameters}) {`;
  return [header, ...fn.blocks.map(printBlock), "}"].join("\n");
};

export const printVilProgram = (program: VilProgram): string => {
  const sections: string[] = [];
  if (program.externs.length > 0) {
    sections.push(program.externs.map((name) => `declare @${name}`).join("\n"));
  }

  const data = [
    ...program.strings.map((entry) => `@${entry.label} = string ${quoteString(entry.value)}`),
    ...program.globals.map((global) => `@${global.name} = global i64 0`),
  ];
  if (data.length > 0) sections.push(data.join("\n"));

  sections.push(...program.functions.map(printFunction));
  return sections.join("\n\n") + "\n";
};
