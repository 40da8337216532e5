import {
  definedSymbol,
  entryLabel,
  instructionOperands,
  terminatorOperands,
  terminatorTargets,
  type Operand,
  type VilFunction,
  type VilProgram,
} from "./ir.js";

export interface VilViolation {
  function: string;
  message: string;
}

/**
 * Checks the structural invariants of a finished program. Returns every
 * violation found; an empty list means the program is well formed.
 */
export const validateProgram = (program: VilProgram): VilViolation[] => {
  const functionNames = new Set(program.functions.map((fn) => fn.name));
  const externs = new Set(program.externs);
  const globals = new Set([
    ...program.strings.map((entry) => entry.label),
    ...program.globals.map((global) => global.name),
  ]);

  return program.functions.flatMap((fn) =>
    validateFunction(fn, { functionNames, externs, globals })
  );
};

interface ProgramNames {
  functionNames: ReadonlySet<string>;
  externs: ReadonlySet<string>;
  globals: ReadonlySet<string>;
}

const validateFunction = (fn: VilFunction, names: ProgramNames): VilViolation[] => {
  const violations: VilViolation[] = [];
  const report = (message: string) => violations.push({ function: fn.name, message });

  const first = fn.blocks[0];
  if (!first || first.label !== entryLabel(fn.name)) {
    report(`entry block must be labelled ${entryLabel(fn.name)}`);
  }

  const labels = new Set<string>();
  for (const block of fn.blocks) {
    if (labels.has(block.label)) report(`duplicate label ${block.label}`);
    labels.add(block.label);
  }

  // Symbol definitions, in block order, with the instruction index that defines them.
  const definitions = new Map<string, { block: string; index: number }>();
  for (const param of fn.parameters) {
    definitions.set(param.name, { block: "", index: -1 });
  }
  for (const block of fn.blocks) {
    block.instructions.forEach((instruction, index) => {
      const symbol = definedSymbol(instruction);
      if (symbol === undefined) return;
      if (definitions.has(symbol)) report(`symbol ${symbol} is defined twice`);
      else definitions.set(symbol, { block: block.label, index });
    });
  }

  const checkOperand = (operand: Operand, block: string, index: number) => {
    const value = operand.value;
    if (value.kind === "global") {
      if (!names.globals.has(value.name)) report(`unknown global @${value.name}`);
      return;
    }
    if (value.kind !== "symbol") return;

    const definition = definitions.get(value.name);
    if (!definition) {
      report(`symbol ${value.name} is used but never defined`);
    } else if (definition.block === block && definition.index >= index) {
      report(`symbol ${value.name} is used before its definition in ${block}`);
    }
  };

  for (const block of fn.blocks) {
    block.instructions.forEach((instruction, index) => {
      for (const operand of instructionOperands(instruction)) {
        checkOperand(operand, block.label, index);
      }
      if (
        instruction.op === "call" &&
        !names.functionNames.has(instruction.callee) &&
        !names.externs.has(instruction.callee)
      ) {
        report(`call to undeclared function ${instruction.callee}`);
      }
    });

    const terminator = block.terminator;
    if (terminator.kind === "placeholder") {
      report(`block ${block.label} has a placeholder terminator`);
    }
    for (const operand of terminatorOperands(terminator)) {
      checkOperand(operand, block.label, block.instructions.length);
    }
    for (const target of terminatorTargets(terminator)) {
      if (!labels.has(target)) report(`jump to unknown label ${target}`);
    }
  }

  return violations;
};
