import { describe, expect, it } from "vitest";
import {
  createCommand,
  DEFAULT_RUNTIME,
  getConfigFromCli,
  parseArgs,
} from "../config/arg-parser.js";

const runWithArgv = (argv: string[]) => {
  const originalArgv = process.argv;
  process.argv = argv;
  try {
    return getConfigFromCli();
  } finally {
    process.argv = originalArgv;
  }
};

const quietCommand = (output: string[] = []) =>
  createCommand()
    .exitOverride()
    .configureOutput({
      writeOut: (text) => output.push(text),
      writeErr: (text) => output.push(text),
    });

describe("getConfigFromCli", () => {
  it("reads the source path from process.argv", () => {
    const config = runWithArgv(["node", "venice", "examples/hello.vn"]);
    expect(config).toEqual({
      input: "examples/hello.vn",
      debug: false,
      runtime: DEFAULT_RUNTIME,
    });
  });
});

describe("parseArgs", () => {
  it("enables debug output", () => {
    expect(parseArgs(["prog.vn", "--debug"], quietCommand()).debug).toBe(true);
  });

  it("accepts a runtime override", () => {
    const config = parseArgs(["--runtime", "/opt/venice/libvenice.so", "prog.vn"], quietCommand());
    expect(config.runtime).toBe("/opt/venice/libvenice.so");
    expect(config.input).toBe("prog.vn");
  });

  it("rejects paths without the .vn extension", () => {
    expect(() => parseArgs(["prog.txt"], quietCommand())).toThrow(
      /source files must end in \.vn/
    );
  });

  it("rejects a missing source path", () => {
    const output: string[] = [];
    expect(() => parseArgs([], quietCommand(output))).toThrow(/missing required argument/);
  });

  it("prints the package version", () => {
    const output: string[] = [];
    expect(() => parseArgs(["--version"], quietCommand(output))).toThrow();
    expect(output).toEqual(["0.1.0\n"]);
  });
});
