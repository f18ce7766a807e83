/**
 * Arithmetic expression trees
 *
 * @module expression
 */

export {
  Add,
  Divide,
  Float,
  Integer,
  isBinary,
  isExpression,
  Multiply,
  Negative,
  Subtract,
} from "./nodes.ts";
export { OPERATOR_SYMBOLS } from "./operators.ts";
export { acceptExpression } from "./visitor.ts";
export type { ExpressionHandler, ExpressionVisitor } from "./visitor.ts";
export type {
  AddExpression,
  BinaryExpression,
  BinaryKind,
  BinaryNode,
  DivideExpression,
  Expression,
  ExpressionKind,
  FloatLiteral,
  IntegerLiteral,
  MultiplyExpression,
  NegativeExpression,
  SubtractExpression,
  ValueLiteral,
} from "./types.ts";
