import type { Diagnostic } from "./diagnostics/index.js";
import { InternalCompilerError } from "./diagnostics/index.js";
import { Lexer } from "./lexer/lexer.js";
import { parse } from "./parser/parser.js";
import { analyze } from "./semantics/analyzer.js";
import type { VeniceType } from "./semantics/types.js";
import type { Program, Untyped } from "./tree/syntax.js";
import type { VilProgram } from "./vil/ir.js";
import { lower } from "./vil/lower.js";
import { validateProgram } from "./vil/validate.js";
import { generateX86 } from "./x86/codegen.js";
import { printX86Program } from "./x86/print.js";
import type { X86Program } from "./x86/program.js";

export type CompileOptions = {
  /** Name used in locations; not read from disk. */
  file: string;
  source: string;
};

export type CompilePhase = "parse" | "analyze";

export type CompileSuccess = {
  ok: true;
  tree: Program<Untyped>;
  typedTree: Program<VeniceType>;
  vil: VilProgram;
  x86: X86Program;
  assembly: string;
};

export type CompileFailure = {
  ok: false;
  phase: CompilePhase;
  diagnostics: Diagnostic[];
};

export type CompileResult = CompileSuccess | CompileFailure;

/**
 * Runs every stage from source text to NASM assembly. Stops after the first
 * pass that reports diagnostics; lexing and parsing count as one pass.
 */
export const compile = ({ file, source }: CompileOptions): CompileResult => {
  const parsed = parse(new Lexer(file, source));
  if (!parsed.ok) {
    return { ok: false, phase: "parse", diagnostics: parsed.diagnostics };
  }

  const analyzed = analyze(parsed.program, { requireMain: true });
  if (!analyzed.ok) {
    return { ok: false, phase: "analyze", diagnostics: analyzed.diagnostics };
  }

  const vil = lower(analyzed.program);
  const violations = validateProgram(vil);
  if (violations.length > 0) {
    const details = violations
      .map((violation) => `${violation.function}: ${violation.message}`)
      .join("; ");
    throw new InternalCompilerError(`malformed VIL: ${details}`);
  }

  const x86 = generateX86(vil);
  return {
    ok: true,
    tree: parsed.program,
    typedTree: analyzed.program,
    vil,
    x86,
    assembly: printX86Program(x86),
  };
};
