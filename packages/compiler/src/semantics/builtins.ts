import {
  functionType,
  i64Type,
  stringType,
  voidType,
  type VeniceType,
} from "./types.js";

export interface Builtin {
  name: string;
  type: VeniceType;
  /** Runtime entry point the call lowers to. */
  runtime: string;
}

export const builtins: readonly Builtin[] = [
  { name: "print", type: functionType([stringType], voidType), runtime: "venice_println" },
  { name: "print_int", type: functionType([i64Type], voidType), runtime: "venice_printint" },
  {
    name: "int_to_string",
    type: functionType([i64Type], stringType),
    runtime: "venice_int_to_string",
  },
  {
    name: "string_length",
    type: functionType([stringType], i64Type),
    runtime: "venice_string_length",
  },
  { name: "input", type: functionType([stringType], stringType), runtime: "venice_input" },
];

const builtinsByName = new Map(builtins.map((builtin) => [builtin.name, builtin]));

export const getBuiltin = (name: string): Builtin | undefined =>
  builtinsByName.get(name);
