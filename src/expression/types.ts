/**
 * Expression Tree Types
 *
 * @module expression/types
 */

export interface IntegerLiteral {
  readonly kind: "Integer";
  readonly value: number;
}

export interface FloatLiteral {
  readonly kind: "Float";
  readonly value: number;
}

export interface NegativeExpression {
  readonly kind: "Negative";
  readonly operand: Expression;
}

/**
 * Binary node; `TKind` is the operator variant
 */
export interface BinaryExpression<TKind extends BinaryKind = BinaryKind> {
  readonly kind: TKind;
  readonly left: Expression;
  readonly right: Expression;
}

export type BinaryKind = "Add" | "Subtract" | "Multiply" | "Divide";

export type AddExpression = BinaryExpression<"Add">;
export type SubtractExpression = BinaryExpression<"Subtract">;
export type MultiplyExpression = BinaryExpression<"Multiply">;
export type DivideExpression = BinaryExpression<"Divide">;

export type BinaryNode =
  | AddExpression
  | SubtractExpression
  | MultiplyExpression
  | DivideExpression;

export type ValueLiteral = IntegerLiteral | FloatLiteral;

export type Expression =
  | IntegerLiteral
  | FloatLiteral
  | NegativeExpression
  | BinaryNode;

export type ExpressionKind = Expression["kind"];
