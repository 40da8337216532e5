import { describe, expect, test } from "vitest";
import { i64, intOperand, symbolOperand, type VilFunction, type VilProgram } from "../ir.js";
import { validateProgram } from "../validate.js";

const program = (fn: VilFunction, overrides: Partial<VilProgram> = {}): VilProgram => ({
  externs: [],
  functions: [fn],
  strings: [],
  globals: [],
  ...overrides,
});

const messages = (vil: VilProgram) => validateProgram(vil).map((v) => v.message);

describe("validateProgram", () => {
  test("accepts a well-formed function", () => {
    const fn: VilFunction = {
      name: "f",
      parameters: [{ name: "n_0", type: i64 }],
      returnType: i64,
      blocks: [
        {
          label: "f_entry",
          instructions: [
            { op: "add", dest: "sum_1", left: symbolOperand("n_0", i64), right: intOperand(1) },
          ],
          terminator: { kind: "jump", target: "done_0" },
        },
        {
          label: "done_0",
          instructions: [],
          terminator: { kind: "ret", value: symbolOperand("sum_1", i64) },
        },
      ],
    };
    expect(validateProgram(program(fn))).toEqual([]);
  });

  test("reports structural violations", () => {
    const fn: VilFunction = {
      name: "f",
      parameters: [],
      returnType: i64,
      blocks: [
        {
          label: "start",
          instructions: [
            { op: "neg", dest: "a_0", operand: symbolOperand("b_1", i64) },
            { op: "neg", dest: "b_1", operand: intOperand(1) },
            { op: "not", dest: "b_1", operand: symbolOperand("ghost", i64) },
            { op: "call", callee: "missing", args: [] },
            {
              op: "load",
              dest: "g_2",
              address: { type: i64, value: { kind: "global", name: "nowhere" } },
            },
          ],
          terminator: { kind: "jump", target: "elsewhere" },
        },
        { label: "start", instructions: [], terminator: { kind: "placeholder" } },
      ],
    };

    expect(messages(program(fn))).toEqual([
      "entry block must be labelled f_entry",
      "duplicate label start",
      "symbol b_1 is defined twice",
      "symbol b_1 is used before its definition in start",
      "symbol ghost is used but never defined",
      "call to undeclared function missing",
      "unknown global @nowhere",
      "jump to unknown label elsewhere",
      "block start has a placeholder terminator",
    ]);
  });

  test("accepts calls to declared externs", () => {
    const fn: VilFunction = {
      name: "main",
      parameters: [],
      returnType: i64,
      blocks: [
        {
          label: "main_entry",
          instructions: [{ op: "call", callee: "venice_printint", args: [intOperand(1)] }],
          terminator: { kind: "ret", value: intOperand(0) },
        },
      ],
    };
    expect(messages(program(fn, { externs: ["venice_printint"] }))).toEqual([]);
    expect(messages(program(fn))).toEqual(["call to undeclared function venice_printint"]);
  });
});
