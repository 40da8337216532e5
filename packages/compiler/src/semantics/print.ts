import { printProgram } from "../tree/print.js";
import type { Program } from "../tree/syntax.js";
import { typeToString, type VeniceType } from "./types.js";

/** S-expression form of the typed tree; every expression carries `:type`. */
export const printTypedProgram = (program: Program<VeniceType>): string =>
  printProgram(program, typeToString);
