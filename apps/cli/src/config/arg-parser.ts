import { Command, InvalidArgumentError } from "commander";
import { createRequire } from "node:module";
import { isSourcePath, SOURCE_EXTENSION } from "../output-paths.js";
import type { VeniceConfig } from "./types.js";

const require = createRequire(import.meta.url);

export const DEFAULT_RUNTIME = "runtime/libvenice.so";

const readVersion = (): string => {
  const manifest: unknown = require("../../package.json");
  if (
    typeof manifest === "object" &&
    manifest !== null &&
    "version" in manifest &&
    typeof manifest.version === "string"
  ) {
    return manifest.version;
  }
  return "0.0.0";
};

const parseSourcePath = (value: string): string => {
  if (isSourcePath(value)) return value;
  throw new InvalidArgumentError(`source files must end in ${SOURCE_EXTENSION}`);
};

export const createCommand = (): Command =>
  new Command()
    .name("venice")
    .description("Compile a Venice source file to an x86-64 executable")
    .version(readVersion(), "-v, --version", "display the current version")
    .helpOption("-h, --help", "display help for command")
    .argument("<path>", `source file (*${SOURCE_EXTENSION})`, parseSourcePath)
    .option("--debug", "print intermediate forms and keep the .s and .o files")
    .option("--runtime <path>", "runtime shared object to link against", DEFAULT_RUNTIME);

/** `argv` excludes the node binary and script path. */
export const parseArgs = (argv: readonly string[], command = createCommand()): VeniceConfig => {
  command.parse(["node", "venice", ...argv]);
  const opts = command.opts<{ debug?: boolean; runtime: string }>();
  const [input] = command.args;
  if (input === undefined) {
    throw new InvalidArgumentError("missing source path");
  }

  return {
    input,
    debug: opts.debug ?? false,
    runtime: opts.runtime,
  };
};

export const getConfigFromCli = (): VeniceConfig => parseArgs(process.argv.slice(2));
