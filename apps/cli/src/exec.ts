import { readFileSync, rmSync, writeFileSync } from "node:fs";
import {
  compile,
  printProgram,
  printTypedProgram,
  printVilProgram,
  type CompileSuccess,
} from "@venice/compiler";
import { getConfig, type VeniceConfig } from "./config/index.js";
import { formatCliDiagnostic } from "./diagnostics.js";
import { outputPaths, type OutputPaths } from "./output-paths.js";
import { Toolchain, ToolchainError } from "./toolchain.js";

export type RunOptions = {
  toolchain?: Toolchain;
  /** ANSI colour in diagnostics. Defaults to whether stderr is a terminal. */
  color?: boolean;
};

export const exec = () => main().catch(errorHandler);

async function main() {
  process.exitCode = run(getConfig());
}

/** Compiles, assembles and links one source file; returns the exit code. */
export const run = (config: VeniceConfig, options: RunOptions = {}): number => {
  const paths = outputPaths(config.input);
  const source = readFileSync(config.input, "utf8");
  const result = compile({ file: config.input, source });

  if (!result.ok) {
    const color = options.color ?? process.stderr.isTTY === true;
    for (const diagnostic of result.diagnostics) {
      console.error(formatCliDiagnostic(diagnostic, { source, color }));
    }
    return 1;
  }

  if (config.debug) dumpIntermediateForms(result, paths);
  writeFileSync(paths.assembly, result.assembly);

  const toolchain = options.toolchain ?? new Toolchain();
  try {
    toolchain.assemble(paths.assembly, paths.object);
    toolchain.link(paths.object, paths.executable, config.runtime);
  } catch (error) {
    if (!(error instanceof ToolchainError)) throw error;
    console.error(`error: ${error.message}`);
    if (error.stderr) console.error(error.stderr.trimEnd());
    return error.exitCode;
  }

  if (!config.debug) {
    removeIntermediate(paths.assembly);
    removeIntermediate(paths.object);
  }
  return 0;
};

const dumpIntermediateForms = (result: CompileSuccess, paths: OutputPaths) => {
  const forms: [path: string, text: string][] = [
    [paths.parseTree, `${printProgram(result.tree)}\n`],
    [paths.typedTree, `${printTypedProgram(result.typedTree)}\n`],
    [paths.vil, printVilProgram(result.vil)],
  ];

  for (const [path, text] of forms) {
    process.stdout.write(text);
    writeFileSync(path, text);
  }
  process.stdout.write(result.assembly);
};

const removeIntermediate = (path: string) => {
  try {
    rmSync(path, { force: true });
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    console.warn(`warning: could not remove ${path}: ${reason}`);
  }
};

function errorHandler(error: unknown) {
  console.error(error instanceof Error ? `error: ${error.message}` : error);
  process.exit(1);
}
