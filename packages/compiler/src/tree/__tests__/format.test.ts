import { describe, expect, test } from "vitest";
import { Lexer } from "../../lexer/lexer.js";
import { Parser, parseSource } from "../../parser/parser.js";
import { formatExpression, formatProgram, quoteString } from "../format.js";
import type { Program, Untyped } from "../syntax.js";

const stripLocations = (value: unknown): unknown => {
  if (Array.isArray(value)) return value.map(stripLocations);
  if (typeof value !== "object" || value === null) return value;
  return Object.fromEntries(
    Object.entries(value)
      .filter(([key]) => key !== "location")
      .map(([key, item]) => [key, stripLocations(item)])
  );
};

const parseProgram = (source: string): Program<Untyped> => {
  const result = parseSource(source);
  if (!result.ok) {
    throw new Error(result.diagnostics.map((d) => d.message).join("\n"));
  }
  return result.program;
};

const reformat = (source: string) =>
  formatExpression(new Parser(new Lexer("<string>", source)).parseExpression());

const sample = `
record Point { x: i64, y: i64 }

const ORIGIN_X: i64 = 0;

func describe(p: Point, tags: map[string, list[i64]]) -> string {
    let label: string = "(" ++ int_to_string(p.x) ++ ", \\"y\\")\\n";
    for key, values in tags {
        for v in values {
            if v > 10 and not (v == 12) { print(key); }
            else if -v < -(1 + 2) * 3 { label = label ++ "!"; }
            else { assert v % 2 == 0 or v / 3 != 1; }
        }
    }
    while false {}
    return label;
}

func main() -> i64 {
    let pair: tuple[i64, string] = (1, "one");
    let single: tuple[i64] = (pair.0,);
    let points: list[Point] = [new Point {x: 1, y: 2}];
    print(describe(points[0], {"a": [1, 2]}));
    return single.0 - (2 - 3);
}
`;

describe("formatProgram", () => {
  test("output parses back to the same tree", () => {
    const original = parseProgram(sample);
    const formatted = formatProgram(original);
    expect(stripLocations(parseProgram(formatted))).toEqual(stripLocations(original));
  });

  test("formatting is stable", () => {
    const once = formatProgram(parseProgram(sample));
    expect(formatProgram(parseProgram(once))).toBe(once);
  });

  test("lays out declarations", () => {
    expect(
      formatProgram(parseProgram("record P { x: i64 } func main() -> i64 { if true { return 1; } return 0; }"))
    ).toBe(
      [
        "record P {",
        "    x: i64,",
        "}",
        "",
        "func main() -> i64 {",
        "    if true {",
        "        return 1;",
        "    }",
        "    return 0;",
        "}",
        "",
      ].join("\n")
    );
  });
});

describe("formatExpression", () => {
  test("keeps only the parentheses precedence needs", () => {
    expect(reformat("(1 + 2) * 3")).toBe("(1 + 2) * 3");
    expect(reformat("1 - (2 - 3)")).toBe("1 - (2 - 3)");
    expect(reformat("(1 - 2) - 3")).toBe("1 - 2 - 3");
    expect(reformat("-(1 + 2)")).toBe("-(1 + 2)");
    expect(reformat("not (a and b)")).toBe("not (a and b)");
    expect(reformat("(a or b) and c")).toBe("(a or b) and c");
  });

  test("writes one-element tuples with a trailing comma", () => {
    expect(reformat("(x,)")).toBe("(x,)");
  });

  test("escapes strings", () => {
    expect(quoteString('say "hi"\n')).toBe('"say \\"hi\\"\\n"');
  });
});
