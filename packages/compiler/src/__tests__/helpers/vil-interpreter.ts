import type { Operand, VilFunction, VilProgram } from "../../vil/ir.js";

type RuntimeObject =
  | { kind: "string"; value: string }
  | { kind: "list"; items: bigint[] }
  | { kind: "map"; keys: bigint[]; values: bigint[] };

export class AssertionFailure extends Error {
  constructor(readonly line: bigint) {
    super(`assertion failed on line ${line}`);
    this.name = "AssertionFailure";
  }
}

const STEP_LIMIT = 1_000_000;
const wrap = (value: bigint): bigint => BigInt.asIntN(64, value);
const truth = (value: boolean): bigint => (value ? 1n : 0n);

/**
 * Executes VIL in process against a fake libvenice. Memory is a sparse map of
 * 8-byte cells; runtime objects live in a handle table sharing the address
 * space, so handles and pointers never collide.
 */
export class VilInterpreter {
  readonly output: string[] = [];
  readonly #functions: Map<string, VilFunction>;
  readonly #memory = new Map<bigint, bigint>();
  readonly #objects = new Map<bigint, RuntimeObject>();
  readonly #globals = new Map<string, bigint>();
  readonly #stringData = new Map<bigint, string>();
  readonly #stdin: string[];
  #nextAddress = 0x1000n;
  #steps = 0;

  constructor(program: VilProgram, stdin: string[] = []) {
    this.#functions = new Map(program.functions.map((fn) => [fn.name, fn]));
    this.#stdin = [...stdin];
    for (const entry of program.strings) {
      const address = this.#allocate(8);
      this.#globals.set(entry.label, address);
      this.#stringData.set(address, entry.value);
    }
    for (const global of program.globals) {
      this.#globals.set(global.name, this.#allocate(8));
    }
  }

  get stdout(): string {
    return this.output.map((line) => `${line}\n`).join("");
  }

  run(entry = "main"): bigint {
    return this.call(entry, []);
  }

  call(name: string, args: bigint[]): bigint {
    const fn = this.#functions.get(name);
    if (!fn) return this.#runtime(name, args);

    const env = new Map<string, bigint>();
    fn.parameters.forEach((param, index) => env.set(param.name, args[index] ?? 0n));
    const blocks = new Map(fn.blocks.map((block) => [block.label, block]));
    let block = fn.blocks[0];

    while (block) {
      for (const instruction of block.instructions) {
        this.#tick();
        const value = (operand: Operand) => this.#value(operand, env);
        switch (instruction.op) {
          case "alloca":
            env.set(instruction.dest, this.#allocate(instruction.size));
            break;
          case "store":
            this.#memory.set(value(instruction.address), value(instruction.value));
            break;
          case "load":
            env.set(instruction.dest, this.#memory.get(value(instruction.address)) ?? 0n);
            break;
          case "call": {
            const result = this.call(instruction.callee, instruction.args.map(value));
            if (instruction.dest !== undefined) env.set(instruction.dest, result);
            break;
          }
          case "neg":
            env.set(instruction.dest, wrap(-value(instruction.operand)));
            break;
          case "not":
            env.set(instruction.dest, truth(value(instruction.operand) === 0n));
            break;
          default: {
            const left = value(instruction.left);
            const right = value(instruction.right);
            env.set(instruction.dest, this.#binary(instruction.op, left, right));
          }
        }
      }

      const terminator = block.terminator;
      switch (terminator.kind) {
        case "ret":
          return this.#value(terminator.value, env);
        case "jump":
          block = blocks.get(terminator.target);
          break;
        case "jump_cond":
          block = blocks.get(
            this.#value(terminator.condition, env) !== 0n
              ? terminator.ifTrue
              : terminator.ifFalse
          );
          break;
        case "placeholder":
          throw new Error(`placeholder terminator in ${fn.name}`);
      }
    }

    throw new Error(`jump to a missing block in ${fn.name}`);
  }

  #tick(): void {
    this.#steps += 1;
    if (this.#steps > STEP_LIMIT) throw new Error("step limit exceeded");
  }

  #allocate(size: number): bigint {
    const address = this.#nextAddress;
    this.#nextAddress += BigInt(Math.max(8, Math.ceil(size / 8) * 8));
    return address;
  }

  #value(operand: Operand, env: Map<string, bigint>): bigint {
    const value = operand.value;
    switch (value.kind) {
      case "int":
        return value.value;
      case "global": {
        const address = this.#globals.get(value.name);
        if (address === undefined) throw new Error(`unknown global ${value.name}`);
        return address;
      }
      case "symbol": {
        const found = env.get(value.name);
        if (found === undefined) throw new Error(`undefined symbol ${value.name}`);
        return found;
      }
    }
  }

  #binary(op: string, left: bigint, right: bigint): bigint {
    switch (op) {
      case "add":
        return wrap(left + right);
      case "sub":
        return wrap(left - right);
      case "mul":
        return wrap(left * right);
      case "div":
        return wrap(left / right);
      case "mod":
        return wrap(left % right);
      case "cmp_lt":
        return truth(left < right);
      case "cmp_le":
        return truth(left <= right);
      case "cmp_gt":
        return truth(left > right);
      case "cmp_ge":
        return truth(left >= right);
      case "cmp_eq":
        return truth(left === right);
      case "cmp_ne":
        return truth(left !== right);
      default:
        throw new Error(`unknown instruction ${op}`);
    }
  }

  #newObject(object: RuntimeObject): bigint {
    const handle = this.#allocate(8);
    this.#objects.set(handle, object);
    return handle;
  }

  #string(handle: bigint | undefined): string {
    const object = handle === undefined ? undefined : this.#objects.get(handle);
    if (object?.kind !== "string") throw new Error("expected a string handle");
    return object.value;
  }

  #list(handle: bigint | undefined): bigint[] {
    const object = handle === undefined ? undefined : this.#objects.get(handle);
    if (object?.kind !== "list") throw new Error("expected a list handle");
    return object.items;
  }

  #map(handle: bigint | undefined): { keys: bigint[]; values: bigint[] } {
    const object = handle === undefined ? undefined : this.#objects.get(handle);
    if (object?.kind !== "map") throw new Error("expected a map handle");
    return object;
  }

  #keyIndex(keys: bigint[], key: bigint): number {
    const keyObject = this.#objects.get(key);
    return keys.findIndex((candidate) => {
      const candidateObject = this.#objects.get(candidate);
      if (keyObject?.kind === "string" && candidateObject?.kind === "string") {
        return keyObject.value === candidateObject.value;
      }
      return candidate === key;
    });
  }

  #at<T>(items: T[], index: bigint | undefined): T {
    const item = index === undefined ? undefined : items[Number(index)];
    if (item === undefined) throw new Error(`index ${index} out of range`);
    return item;
  }

  #runtime(name: string, args: bigint[]): bigint {
    const [a, b, c] = args;
    switch (name) {
      case "venice_string_new": {
        const data = a === undefined ? undefined : this.#stringData.get(a);
        if (data === undefined) throw new Error("venice_string_new without string data");
        return this.#newObject({ kind: "string", value: data });
      }
      case "venice_string_concat":
        return this.#newObject({ kind: "string", value: this.#string(a) + this.#string(b) });
      case "venice_string_compare": {
        const left = this.#string(a);
        const right = this.#string(b);
        return left < right ? -1n : left > right ? 1n : 0n;
      }
      case "venice_string_length":
        return BigInt(Array.from(this.#string(a)).length);
      case "venice_int_to_string":
        return this.#newObject({ kind: "string", value: String(a ?? 0n) });
      case "venice_println":
        this.output.push(this.#string(a));
        return 0n;
      case "venice_printint":
        this.output.push(String(a ?? 0n));
        return 0n;
      case "venice_input":
        return this.#newObject({ kind: "string", value: this.#stdin.shift() ?? "" });
      case "venice_malloc":
        return this.#allocate(Number(a ?? 8n));
      case "venice_list_new":
        return this.#newObject({ kind: "list", items: [] });
      case "venice_list_append":
        this.#list(a).push(b ?? 0n);
        return 0n;
      case "venice_list_get":
        return this.#at(this.#list(a), b);
      case "venice_list_length":
        return BigInt(this.#list(a).length);
      case "venice_map_new":
        return this.#newObject({ kind: "map", keys: [], values: [] });
      case "venice_map_insert": {
        const map = this.#map(a);
        const key = b ?? 0n;
        const index = this.#keyIndex(map.keys, key);
        if (index >= 0) {
          map.values[index] = c ?? 0n;
        } else {
          map.keys.push(key);
          map.values.push(c ?? 0n);
        }
        return 0n;
      }
      case "venice_map_get": {
        const map = this.#map(a);
        const index = this.#keyIndex(map.keys, b ?? 0n);
        return this.#at(map.values, index < 0 ? undefined : BigInt(index));
      }
      case "venice_map_length":
        return BigInt(this.#map(a).keys.length);
      case "venice_map_key_at":
        return this.#at(this.#map(a).keys, b);
      case "venice_map_value_at":
        return this.#at(this.#map(a).values, b);
      case "venice_assert_failed":
        throw new AssertionFailure(a ?? 0n);
      default:
        throw new Error(`unknown function ${name}`);
    }
  }
}
