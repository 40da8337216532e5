import { readFileSync } from "node:fs";
import { describe, expect, test } from "vitest";
import { compile } from "../pipeline.js";
import { AssertionFailure, VilInterpreter } from "./helpers/vil-interpreter.js";

const fixture = (name: string) =>
  readFileSync(new URL(`./__fixtures__/${name}`, import.meta.url), "utf8");

const run = (name: string, stdin: string[] = []) => {
  const result = compile({ file: name, source: fixture(name) });
  if (!result.ok) {
    throw new Error(result.diagnostics.map((d) => d.message).join("\n"));
  }
  const interpreter = new VilInterpreter(result.vil, stdin);
  const exitCode = interpreter.run();
  return { exitCode, stdout: interpreter.stdout };
};

describe("compiled programs", () => {
  test("hello world", () => {
    expect(run("hello.vn")).toEqual({ exitCode: 0n, stdout: "Hello, world!\n" });
  });

  test("if/else", () => {
    expect(run("if-literal.vn")).toEqual({ exitCode: 0n, stdout: "yes\n" });
    expect(run("if.vn").stdout).toBe("big\n");
  });

  test("countdown", () => {
    expect(run("countdown.vn").stdout).toBe("5\n4\n3\n2\n1\n");
  });

  test("function call", () => {
    expect(run("square-call.vn")).toEqual({ exitCode: 0n, stdout: "49\n" });
  });

  test("the exit code is main's return value", () => {
    expect(run("square.vn")).toEqual({ exitCode: 49n, stdout: "" });
  });

  test("iterative and recursive fibonacci agree", () => {
    expect(run("fib-iterative.vn").stdout).toBe("F(10) = 55\n");
    expect(run("fib-recursive.vn").stdout).toBe("F(10) = 55\n");
  });

  test("collections, records and constants", () => {
    expect(run("collections.vn").stdout.split("\n")).toEqual([
      "10",
      "3",
      "ann is 31",
      "bob is 27",
      "27",
      "seven",
      "7",
      "12",
      "3",
      "ordered",
      "2",
      "-3",
      "",
    ]);
  });

  test("and/or skip their right operand", () => {
    expect(run("short-circuit.vn").stdout).toBe("yes\ncalled\nboth\n");
  });

  test("else-if chains", () => {
    expect(run("classify.vn").stdout).toBe("negative\nzero\nsmall\nlarge\n");
  });

  test("collections and records compare by reference", () => {
    expect(run("equality.vn").stdout).toBe(
      "same record\ndistinct records\nsame list\ndistinct lists\nsame tuple\n"
    );
  });

  test("inner bindings shadow outer ones until their scope ends", () => {
    expect(run("shadowing.vn")).toEqual({ exitCode: 0n, stdout: "100\n2\n3\n7\n1\n" });
  });

  test("reads a line of input", () => {
    expect(run("greet.vn", ["Ann"])).toEqual({ exitCode: 3n, stdout: "hi Ann\n" });
  });

  test("a failing assert reports its line", () => {
    expect(() => run("failing-assert.vn")).toThrow(AssertionFailure);
    expect(() => run("failing-assert.vn")).toThrow("assertion failed on line 4");
  });
});
