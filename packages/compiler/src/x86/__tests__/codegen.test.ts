import { describe, expect, test } from "vitest";
import { parseSource } from "../../parser/parser.js";
import { analyze } from "../../semantics/analyzer.js";
import { lower } from "../../vil/lower.js";
import { asmFunctionName, generateX86 } from "../codegen.js";
import { nasmString, printX86Instruction, printX86Program } from "../print.js";

const x86 = (source: string) => {
  const parsed = parseSource(source);
  if (!parsed.ok) throw new Error(parsed.diagnostics.map((d) => d.message).join("\n"));
  const analyzed = analyze(parsed.program);
  if (!analyzed.ok) throw new Error(analyzed.diagnostics.map((d) => d.message).join("\n"));
  return generateX86(lower(analyzed.program));
};

const blockText = (source: string, label: string) => {
  const block = x86(source).blocks.find((candidate) => candidate.label === label);
  if (!block) throw new Error(`no block ${label}`);
  return block.instructions.map(printX86Instruction);
};

describe("generateX86", () => {
  test("hello world", () => {
    expect(
      printX86Program(x86('func main() -> i64 { print("Hello, world!"); return 0; }'))
    ).toBe(
      [
        "default rel",
        "global main",
        "extern venice_println",
        "extern venice_string_new",
        "",
        "section .text",
        "main:",
        "    push rbp",
        "    mov rbp, rsp",
        "    sub rsp, 16",
        ".main_entry:",
        "    lea rdi, [rel str_0]",
        "    call venice_string_new",
        "    mov [rbp - 8], rax",
        "    mov rdi, [rbp - 8]",
        "    call venice_println",
        "    mov rax, 0",
        "    mov rsp, rbp",
        "    pop rbp",
        "    ret",
        "",
        "section .data",
        "str_0: db `Hello, world!`, 0",
        "",
      ].join("\n")
    );
  });

  test("stack slots, regions and signed remainder", () => {
    expect(
      printX86Program(x86("func d(a: i64, b: i64) -> i64 { return a % b; }"))
    ).toBe(
      [
        "default rel",
        "",
        "section .text",
        "venice_fn_d:",
        "    push rbp",
        "    mov rbp, rsp",
        "    sub rsp, 64",
        "    mov [rbp - 8], rdi",
        "    mov [rbp - 16], rsi",
        ".d_entry:",
        "    mov rax, [rbp - 8]",
        "    mov [rbp - 24], rax",
        "    mov rax, [rbp - 16]",
        "    mov [rbp - 32], rax",
        "    mov rax, [rbp - 24]",
        "    mov [rbp - 40], rax",
        "    mov rax, [rbp - 32]",
        "    mov [rbp - 48], rax",
        "    mov rax, [rbp - 40]",
        "    mov rcx, [rbp - 48]",
        "    cqo",
        "    idiv rcx",
        "    mov [rbp - 56], rdx",
        "    mov rax, [rbp - 56]",
        "    mov rsp, rbp",
        "    pop rbp",
        "    ret",
        "",
      ].join("\n")
    );
  });

  test("passes arguments beyond the sixth on the stack", () => {
    const source = `
func f(a: i64, b: i64, c: i64, d: i64, e: i64, g: i64, h: i64, i: i64) -> i64 { return h; }
func main() -> i64 { return f(1, 2, 3, 4, 5, 6, 7, 8); }`;
    expect(blockText(source, ".main_entry")).toEqual([
      "mov rax, 8",
      "push rax",
      "mov rax, 7",
      "push rax",
      "mov rdi, 1",
      "mov rsi, 2",
      "mov rdx, 3",
      "mov rcx, 4",
      "mov r8, 5",
      "mov r9, 6",
      "call venice_fn_f",
      "add rsp, 16",
      "mov [rbp - 8], rax",
      "mov rax, [rbp - 8]",
      "mov rsp, rbp",
      "pop rbp",
      "ret",
    ]);
    expect(blockText(source, "venice_fn_f").slice(9)).toEqual([
      "mov rax, [rbp + 16]",
      "mov [rbp - 56], rax",
      "mov rax, [rbp + 24]",
      "mov [rbp - 64], rax",
    ]);
  });

  test("pads an odd number of stack arguments", () => {
    const source = `
func f(a: i64, b: i64, c: i64, d: i64, e: i64, g: i64, h: i64) -> i64 { return h; }
func main() -> i64 { return f(1, 2, 3, 4, 5, 6, 7); }`;
    const main = blockText(source, ".main_entry");
    expect(main.slice(0, 3)).toEqual(["sub rsp, 8", "mov rax, 7", "push rax"]);
    expect(main).toContain("add rsp, 16");
  });

  test("compares into a zero-extended flag", () => {
    expect(blockText("func f(a: i64) -> bool { return a >= 3; }", ".f_entry").slice(4, 10)).toEqual([
      "mov rax, [rbp - 24]",
      "mov rcx, 3",
      "cmp rax, rcx",
      "setge al",
      "movzx rax, al",
      "mov [rbp - 32], rax",
    ]);
  });

  test("branches on non-zero conditions", () => {
    const text = blockText(
      "func main() -> i64 { while true { return 1; } return 0; }",
      ".while_cond_0"
    );
    expect(text).toEqual(["mov rax, 1", "cmp rax, 0", "jne .while_1", "jmp .while_end_2"]);
  });

  test("addresses constants relative to rip", () => {
    const text = blockText("const N: i64 = 4; func main() -> i64 { return N; }", ".main_entry");
    expect(text).toEqual([
      "call venice_init_constants",
      "mov rax, [rel const_N]",
      "mov [rbp - 8], rax",
      "mov rax, [rbp - 8]",
      "mov rsp, rbp",
      "pop rbp",
      "ret",
    ]);
  });
});

describe("symbols and data", () => {
  test("prefixes user functions only", () => {
    expect(asmFunctionName("main")).toBe("main");
    expect(asmFunctionName("venice_init_constants")).toBe("venice_init_constants");
    expect(asmFunctionName("fib")).toBe("venice_fn_fib");
  });

  test("escapes NASM strings", () => {
    expect(nasmString("a`b\\c\n\u0001")).toBe("`a\\`b\\\\c\\n\\x01`");
  });

  test("declares constants as zeroed quads", () => {
    const program = printX86Program(x86("const N: i64 = 4; func main() -> i64 { return N; }"));
    expect(program.endsWith("section .data\nconst_N: dq 0\n")).toBe(true);
  });
});
