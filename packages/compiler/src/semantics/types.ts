/** Types after resolution against the type table. */
export type VeniceType =
  | { kind: "boolean" }
  | { kind: "i64" }
  | { kind: "string" }
  | { kind: "void" }
  | { kind: "error" }
  | { kind: "tuple"; items: VeniceType[] }
  | { kind: "list"; item: VeniceType }
  | { kind: "map"; key: VeniceType; value: VeniceType }
  | { kind: "record"; name: string }
  | { kind: "function"; parameters: VeniceType[]; returnType: VeniceType };

export const booleanType: VeniceType = { kind: "boolean" };
export const i64Type: VeniceType = { kind: "i64" };
export const stringType: VeniceType = { kind: "string" };
export const voidType: VeniceType = { kind: "void" };
/** Stands in for the type of a construct that already produced a diagnostic. */
export const errorType: VeniceType = { kind: "error" };

export const tupleType = (items: VeniceType[]): VeniceType => ({
  kind: "tuple",
  items,
});

export const listType = (item: VeniceType): VeniceType => ({
  kind: "list",
  item,
});

export const mapType = (key: VeniceType, value: VeniceType): VeniceType => ({
  kind: "map",
  key,
  value,
});

export const recordType = (name: string): VeniceType => ({
  kind: "record",
  name,
});

export const functionType = (
  parameters: VeniceType[],
  returnType: VeniceType
): VeniceType => ({ kind: "function", parameters, returnType });

export const isErrorType = (type: VeniceType): boolean => type.kind === "error";

const allMatch = (a: VeniceType[], b: VeniceType[]): boolean =>
  a.length === b.length &&
  a.every((type, index) => {
    const other = b[index];
    return other !== undefined && typeMatches(type, other);
  });

/** Structural equality where `error` matches every type. */
export const typeMatches = (a: VeniceType, b: VeniceType): boolean => {
  if (a.kind === "error" || b.kind === "error") return true;

  switch (a.kind) {
    case "tuple":
      return b.kind === "tuple" && allMatch(a.items, b.items);
    case "list":
      return b.kind === "list" && typeMatches(a.item, b.item);
    case "map":
      return (
        b.kind === "map" &&
        typeMatches(a.key, b.key) &&
        typeMatches(a.value, b.value)
      );
    case "record":
      return b.kind === "record" && a.name === b.name;
    case "function":
      return (
        b.kind === "function" &&
        allMatch(a.parameters, b.parameters) &&
        typeMatches(a.returnType, b.returnType)
      );
    default:
      return a.kind === b.kind;
  }
};

export const typeToString = (type: VeniceType): string => {
  switch (type.kind) {
    case "boolean":
      return "bool";
    case "i64":
    case "string":
    case "void":
      return type.kind;
    case "error":
      return "<error>";
    case "tuple":
      return `tuple[${type.items.map(typeToString).join(", ")}]`;
    case "list":
      return `list[${typeToString(type.item)}]`;
    case "map":
      return `map[${typeToString(type.key)}, ${typeToString(type.value)}]`;
    case "record":
      return type.name;
    case "function":
      return `func(${type.parameters.map(typeToString).join(", ")}) -> ${typeToString(type.returnType)}`;
  }
};
