import { spawnSync } from "node:child_process";

export type ProcessResult = {
  /** `null` when the process was killed by a signal. */
  status: number | null;
  stderr: string;
  /** Set when the process could not be started at all. */
  error?: Error;
};

export type ProcessRunner = (command: string, args: readonly string[]) => ProcessResult;

export type ToolchainStep = "assemble" | "link";

export const spawnRunner: ProcessRunner = (command, args) => {
  const result = spawnSync(command, args, { encoding: "utf8" });
  return result.error
    ? { status: result.status, stderr: result.stderr ?? "", error: result.error }
    : { status: result.status, stderr: result.stderr ?? "" };
};

export class ToolchainError extends Error {
  readonly step: ToolchainStep;
  readonly command: string;
  readonly exitCode: number;
  readonly stderr: string;

  constructor(opts: { step: ToolchainStep; command: string; exitCode: number; stderr: string }) {
    super(`${opts.command} failed with exit code ${opts.exitCode}`);
    this.name = "ToolchainError";
    this.step = opts.step;
    this.command = opts.command;
    this.exitCode = opts.exitCode;
    this.stderr = opts.stderr;
  }
}

const LIB_DIR = "/usr/lib/x86_64-linux-gnu";
const DYNAMIC_LINKER = "/lib64/ld-linux-x86-64.so.2";

export const nasmArgs = (assembly: string, object: string): string[] => [
  "-g",
  "-F",
  "dwarf",
  "-f",
  "elf64",
  "-o",
  object,
  assembly,
];

export const ldArgs = (object: string, executable: string, runtime: string): string[] => [
  "-dynamic-linker",
  DYNAMIC_LINKER,
  `${LIB_DIR}/crt1.o`,
  `${LIB_DIR}/crti.o`,
  runtime,
  "-lc",
  object,
  `${LIB_DIR}/crtn.o`,
  "-o",
  executable,
];

/** Runs `nasm` and `ld` synchronously, failing on any non-zero exit. */
export class Toolchain {
  readonly #runner: ProcessRunner;

  constructor(runner: ProcessRunner = spawnRunner) {
    this.#runner = runner;
  }

  assemble(assembly: string, object: string): void {
    this.#run("assemble", "nasm", nasmArgs(assembly, object));
  }

  link(object: string, executable: string, runtime: string): void {
    this.#run("link", "ld", ldArgs(object, executable, runtime));
  }

  #run(step: ToolchainStep, command: string, args: string[]): void {
    const result = this.#runner(command, args);
    if (result.error) {
      throw new ToolchainError({ step, command, exitCode: 1, stderr: result.error.message });
    }
    if (result.status !== 0) {
      throw new ToolchainError({
        step,
        command,
        exitCode: result.status ?? 1,
        stderr: result.stderr,
      });
    }
  }
}
