import { describe, expect, test } from "vitest";
import { parseSource } from "../../parser/parser.js";
import { analyze } from "../../semantics/analyzer.js";
import { lower } from "../lower.js";
import { printFunction, printVilProgram } from "../print.js";
import { validateProgram } from "../validate.js";

const lowered = (source: string) => {
  const parsed = parseSource(source);
  if (!parsed.ok) throw new Error(parsed.diagnostics.map((d) => d.message).join("\n"));
  const analyzed = analyze(parsed.program);
  if (!analyzed.ok) throw new Error(analyzed.diagnostics.map((d) => d.message).join("\n"));
  const program = lower(analyzed.program);
  expect(validateProgram(program)).toEqual([]);
  return program;
};

const labels = (source: string, fn = 0) =>
  lowered(source).functions[fn]?.blocks.map((block) => block.label);

describe("lower", () => {
  test("hello world", () => {
    expect(
      printVilProgram(lowered('func main() -> i64 { print("Hello, world!"); return 0; }'))
    ).toBe(
      [
        "declare @venice_println",
        "declare @venice_string_new",
        "",
        '@str_0 = string "Hello, world!"',
        "",
        "define i64 @main() {",
        "main_entry:",
        "  %string_0 = call @venice_string_new(i64* @str_0)",
        "  call @venice_println(i64* %string_0)",
        "  ret i64 0",
        "}",
        "",
      ].join("\n")
    );
  });

  test("while loop", () => {
    const source = `
func main() -> i64 {
    let x: i64 = 5;
    while x > 0 {
        print_int(x);
        x = x - 1;
    }
    return 0;
}`;
    expect(printVilProgram(lowered(source))).toBe(
      [
        "declare @venice_printint",
        "",
        "define i64 @main() {",
        "main_entry:",
        "  %x_0 = alloca i64, 8",
        "  store i64 5, i64* %x_0",
        "  jump while_cond_0",
        "while_cond_0:",
        "  %x_1 = load i64* %x_0",
        "  %gt_2 = cmp_gt i64 %x_1, 0",
        "  jump_cond i64 %gt_2, while_1, while_end_2",
        "while_1:",
        "  %x_3 = load i64* %x_0",
        "  call @venice_printint(i64 %x_3)",
        "  %x_4 = load i64* %x_0",
        "  %sub_5 = sub i64 %x_4, 1",
        "  store i64 %sub_5, i64* %x_0",
        "  jump while_cond_0",
        "while_end_2:",
        "  ret i64 0",
        "}",
        "",
      ].join("\n")
    );
  });

  test("short-circuit and", () => {
    const program = lowered("func f(a: bool, b: bool) -> bool { return a and b; }");
    const [fn] = program.functions;
    if (!fn) throw new Error("missing function");
    expect(printFunction(fn)).toBe(
      [
        "define i64 @f(i64 %a_0, i64 %b_1) {",
        "f_entry:",
        "  %a_slot_2 = alloca i64, 8",
        "  store i64 %a_0, i64* %a_slot_2",
        "  %b_slot_3 = alloca i64, 8",
        "  store i64 %b_1, i64* %b_slot_3",
        "  %and_4 = alloca i64, 8",
        "  %a_5 = load i64* %a_slot_2",
        "  store i64 %a_5, i64* %and_4",
        "  jump_cond i64 %a_5, and_rhs_0, and_end_1",
        "and_rhs_0:",
        "  %b_6 = load i64* %b_slot_3",
        "  store i64 %b_6, i64* %and_4",
        "  jump and_end_1",
        "and_end_1:",
        "  %and_7 = load i64* %and_4",
        "  ret i64 %and_7",
        "}",
      ].join("\n")
    );
  });

  test("tuples are heap cells", () => {
    expect(
      printVilProgram(
        lowered("func main() -> i64 { let t: tuple[i64, i64] = (3, 4); return t.1; }")
      )
    ).toBe(
      [
        "declare @venice_malloc",
        "",
        "define i64 @main() {",
        "main_entry:",
        "  %block_0 = call @venice_malloc(i64 16)",
        "  %cell_1 = add i64* %block_0, 0",
        "  store i64 3, i64* %cell_1",
        "  %cell_2 = add i64* %block_0, 8",
        "  store i64 4, i64* %cell_2",
        "  %t_3 = alloca i64*, 8",
        "  store i64* %block_0, i64** %t_3",
        "  %t_4 = load i64** %t_3",
        "  %cell_5 = add i64* %t_4, 8",
        "  %item_6 = load i64* %cell_5",
        "  ret i64 %item_6",
        "}",
        "",
      ].join("\n")
    );
  });

  test("constants are initialized before main runs", () => {
    expect(
      printVilProgram(lowered("const N: i64 = 7; func main() -> i64 { return N; }"))
    ).toBe(
      [
        "@const_N = global i64 0",
        "",
        "define i64 @main() {",
        "main_entry:",
        "  call @venice_init_constants()",
        "  %N_0 = load i64* @const_N",
        "  ret i64 %N_0",
        "}",
        "",
        "define i64 @venice_init_constants() {",
        "venice_init_constants_entry:",
        "  store i64 7, i64* @const_N",
        "  ret i64 0",
        "}",
        "",
      ].join("\n")
    );
  });

  test("if with else-if and else", () => {
    const source = `
func main() -> i64 {
    let x: i64 = 1;
    if x < 0 { return 1; } else if x == 0 { return 2; } else { print_int(x); }
    return 0;
}`;
    expect(labels(source)).toEqual([
      "main_entry",
      "if_then_1",
      "if_elif_2",
      "if_then_3",
      "if_else_4",
      "if_end_0",
    ]);
  });

  test("for loops over lists and maps", () => {
    expect(
      labels("func main() -> i64 { for x in [1, 2] { print_int(x); } return 0; }")
    ).toEqual(["main_entry", "for_cond_0", "for_1", "for_end_2"]);

    const program = lowered(
      'func main() -> i64 { for k, v in {"a": 1} { print(k); print_int(v); } return 0; }'
    );
    expect(program.externs).toEqual([
      "venice_map_insert",
      "venice_map_key_at",
      "venice_map_length",
      "venice_map_new",
      "venice_map_value_at",
      "venice_printint",
      "venice_println",
      "venice_string_new",
    ]);
  });

  test("statements after a return land in an unreachable block", () => {
    expect(labels("func main() -> i64 { return 1; print_int(2); }")).toEqual([
      "main_entry",
      "unreachable_0",
    ]);
  });

  test("interns each distinct string once", () => {
    const program = lowered(
      'func main() -> i64 { print("a"); print("b"); print("a"); return 0; }'
    );
    expect(program.strings).toEqual([
      { label: "str_0", value: "a" },
      { label: "str_1", value: "b" },
    ]);
  });

  test("string comparison goes through the runtime", () => {
    const program = lowered('func f(a: string) -> bool { return a < "m"; }');
    const instructions = program.functions[0]?.blocks[0]?.instructions ?? [];
    expect(instructions.map((instruction) => instruction.op)).toEqual([
      "alloca",
      "store",
      "load",
      "call",
      "call",
      "cmp_lt",
    ]);
  });
});
