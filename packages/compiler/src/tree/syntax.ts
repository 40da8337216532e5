import type { Location } from "../common/location.js";
import type { BinaryOp, UnaryOp } from "../common/operators.js";

/**
 * The parse tree and the typed tree share one shape. `T` is the annotation the
 * analyzer fills in: `undefined` straight out of the parser, a resolved
 * `VeniceType` afterwards.
 */
export type Untyped = undefined;

export interface Program<T> {
  declarations: Declaration<T>[];
}

export type Declaration<T> =
  | FunctionDeclaration<T>
  | ConstDeclaration<T>
  | RecordDeclaration<T>;

export interface FunctionDeclaration<T> {
  kind: "function";
  name: string;
  parameters: Parameter<T>[];
  returnType: SyntacticType;
  resolvedReturnType: T;
  body: Statement<T>[];
  location: Location;
}

export interface Parameter<T> {
  name: string;
  type: SyntacticType;
  resolvedType: T;
  location: Location;
}

export interface ConstDeclaration<T> {
  kind: "const";
  name: string;
  type: SyntacticType;
  resolvedType: T;
  value: Expression<T>;
  location: Location;
}

export interface RecordDeclaration<T> {
  kind: "record";
  name: string;
  fields: RecordField<T>[];
  location: Location;
}

export interface RecordField<T> {
  name: string;
  type: SyntacticType;
  resolvedType: T;
  location: Location;
}

export type SyntacticType =
  | { kind: "literal"; name: string; location: Location }
  | {
      kind: "parameterized";
      name: string;
      parameters: SyntacticType[];
      location: Location;
    };

export type Statement<T> =
  | LetStatement<T>
  | AssignStatement<T>
  | IfStatement<T>
  | WhileStatement<T>
  | ForStatement<T>
  | ReturnStatement<T>
  | AssertStatement<T>
  | ExpressionStatement<T>;

export interface LetStatement<T> {
  kind: "let";
  name: string;
  type: SyntacticType;
  resolvedType: T;
  value: Expression<T>;
  location: Location;
}

export interface AssignStatement<T> {
  kind: "assign";
  name: string;
  value: Expression<T>;
  location: Location;
}

export interface IfClause<T> {
  condition: Expression<T>;
  body: Statement<T>[];
}

export interface IfStatement<T> {
  kind: "if";
  condition: Expression<T>;
  body: Statement<T>[];
  elifs: IfClause<T>[];
  elseBody?: Statement<T>[];
  location: Location;
}

export interface WhileStatement<T> {
  kind: "while";
  condition: Expression<T>;
  body: Statement<T>[];
  location: Location;
}

export interface ForStatement<T> {
  kind: "for";
  variable: string;
  secondVariable?: string;
  iterable: Expression<T>;
  body: Statement<T>[];
  location: Location;
}

export interface ReturnStatement<T> {
  kind: "return";
  value: Expression<T>;
  location: Location;
}

export interface AssertStatement<T> {
  kind: "assert";
  condition: Expression<T>;
  location: Location;
}

export interface ExpressionStatement<T> {
  kind: "expression";
  expression: Expression<T>;
  location: Location;
}

interface ExpressionBase<T> {
  type: T;
  location: Location;
}

export type Expression<T> =
  | BooleanLiteral<T>
  | IntegerLiteral<T>
  | StringLiteral<T>
  | Identifier<T>
  | BinaryExpression<T>
  | UnaryExpression<T>
  | CallExpression<T>
  | IndexExpression<T>
  | TupleIndexExpression<T>
  | AttributeExpression<T>
  | ListLiteral<T>
  | TupleLiteral<T>
  | MapLiteral<T>
  | RecordLiteral<T>;

export interface BooleanLiteral<T> extends ExpressionBase<T> {
  kind: "boolean";
  value: boolean;
}

export interface IntegerLiteral<T> extends ExpressionBase<T> {
  kind: "integer";
  value: bigint;
}

export interface StringLiteral<T> extends ExpressionBase<T> {
  kind: "string";
  value: string;
}

export interface Identifier<T> extends ExpressionBase<T> {
  kind: "identifier";
  name: string;
}

export interface BinaryExpression<T> extends ExpressionBase<T> {
  kind: "binary";
  op: BinaryOp;
  left: Expression<T>;
  right: Expression<T>;
}

export interface UnaryExpression<T> extends ExpressionBase<T> {
  kind: "unary";
  op: UnaryOp;
  operand: Expression<T>;
}

export interface CallExpression<T> extends ExpressionBase<T> {
  kind: "call";
  callee: string;
  arguments: Expression<T>[];
}

export interface IndexExpression<T> extends ExpressionBase<T> {
  kind: "index";
  value: Expression<T>;
  index: Expression<T>;
}

export interface TupleIndexExpression<T> extends ExpressionBase<T> {
  kind: "tuple-index";
  value: Expression<T>;
  index: number;
}

export interface AttributeExpression<T> extends ExpressionBase<T> {
  kind: "attribute";
  value: Expression<T>;
  attribute: string;
}

export interface ListLiteral<T> extends ExpressionBase<T> {
  kind: "list";
  items: Expression<T>[];
}

export interface TupleLiteral<T> extends ExpressionBase<T> {
  kind: "tuple";
  items: Expression<T>[];
}

export interface MapEntry<T> {
  key: Expression<T>;
  value: Expression<T>;
}

export interface MapLiteral<T> extends ExpressionBase<T> {
  kind: "map";
  entries: MapEntry<T>[];
}

export interface RecordLiteralField<T> {
  name: string;
  value: Expression<T>;
  location: Location;
}

export interface RecordLiteral<T> extends ExpressionBase<T> {
  kind: "record";
  name: string;
  fields: RecordLiteralField<T>[];
}
