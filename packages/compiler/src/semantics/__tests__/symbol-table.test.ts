import { describe, expect, it } from "vitest";
import { SymbolTable } from "../symbol-table.js";

describe("SymbolTable", () => {
  it("resolves bindings across lexical scopes", () => {
    const table = new SymbolTable<number>();
    table.declare("x", 1);
    table.enterScope();
    table.declare("x", 2);

    expect(table.resolve("x")).toBe(2);

    table.exitScope();
    expect(table.resolve("x")).toBe(1);
  });

  it("rejects a second binding in the same frame", () => {
    const table = new SymbolTable<string>();
    expect(table.declare("a", "first")).toBe(true);
    expect(table.declare("a", "second")).toBe(false);
    expect(table.resolve("a")).toBe("first");
  });

  it("drops inner bindings when a scope ends", () => {
    const table = new SymbolTable<number>();
    const inner = table.withScope(() => {
      table.declare("y", 3);
      return table.resolve("y");
    });

    expect(inner).toBe(3);
    expect(table.resolve("y")).toBeUndefined();
  });

  it("leaves the scope when the scoped callback throws", () => {
    const table = new SymbolTable<number>();
    expect(() =>
      table.withScope(() => {
        table.declare("z", 1);
        throw new Error("boom");
      })
    ).toThrow("boom");
    expect(table.resolve("z")).toBeUndefined();
    expect(() => table.exitScope()).toThrow("attempted to exit root scope");
  });

  it("refuses to exit the root frame", () => {
    const table = new SymbolTable<number>();
    expect(() => table.exitScope()).toThrow("attempted to exit root scope");
  });

  it("lets a nested frame rebind a global name", () => {
    const table = new SymbolTable<number>();
    table.declare("g", 0);
    table.enterScope();
    expect(table.declare("g", 1)).toBe(true);
    expect(table.resolve("g")).toBe(1);
  });
});
