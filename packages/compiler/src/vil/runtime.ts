/** Entry points of libvenice.so the generated code may call. */
export interface RuntimeFunction {
  arity: number;
  returns: boolean;
  /** Symbol hint for the value the call defines. */
  hint: string;
}

export const runtime: Readonly<Record<string, RuntimeFunction>> = {
  venice_string_new: { arity: 1, returns: true, hint: "string" },
  venice_string_concat: { arity: 2, returns: true, hint: "concat" },
  venice_string_compare: { arity: 2, returns: true, hint: "order" },
  venice_string_length: { arity: 1, returns: true, hint: "length" },
  venice_int_to_string: { arity: 1, returns: true, hint: "string" },
  venice_println: { arity: 1, returns: false, hint: "" },
  venice_printint: { arity: 1, returns: false, hint: "" },
  venice_input: { arity: 1, returns: true, hint: "input" },
  venice_malloc: { arity: 1, returns: true, hint: "block" },
  venice_list_new: { arity: 1, returns: true, hint: "list" },
  venice_list_append: { arity: 2, returns: false, hint: "" },
  venice_list_get: { arity: 2, returns: true, hint: "item" },
  venice_list_length: { arity: 1, returns: true, hint: "length" },
  venice_map_new: { arity: 0, returns: true, hint: "map" },
  venice_map_insert: { arity: 3, returns: false, hint: "" },
  venice_map_get: { arity: 2, returns: true, hint: "value" },
  venice_map_length: { arity: 1, returns: true, hint: "length" },
  venice_map_key_at: { arity: 2, returns: true, hint: "key" },
  venice_map_value_at: { arity: 2, returns: true, hint: "value" },
  venice_assert_failed: { arity: 1, returns: false, hint: "" },
};
