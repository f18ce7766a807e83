/**
 * Expression Visitor Protocol
 *
 * Same contract as the tree visitor: one handler per variant, dispatched
 * by tag, no fallback.
 *
 * @module expression/visitor
 */

import type {
  AddExpression,
  DivideExpression,
  Expression,
  FloatLiteral,
  IntegerLiteral,
  MultiplyExpression,
  NegativeExpression,
  SubtractExpression,
} from "./types.ts";

export type ExpressionHandler<TExpr extends Expression, TContext, TResult> = (
  expr: TExpr,
  context: TContext,
  visitor: ExpressionVisitor<TContext, TResult>,
) => TResult;

export interface ExpressionVisitor<TContext, TResult> {
  Integer: ExpressionHandler<IntegerLiteral, TContext, TResult>;
  Float: ExpressionHandler<FloatLiteral, TContext, TResult>;
  Negative: ExpressionHandler<NegativeExpression, TContext, TResult>;
  Add: ExpressionHandler<AddExpression, TContext, TResult>;
  Subtract: ExpressionHandler<SubtractExpression, TContext, TResult>;
  Multiply: ExpressionHandler<MultiplyExpression, TContext, TResult>;
  Divide: ExpressionHandler<DivideExpression, TContext, TResult>;
}

/**
 * Forward `expr` to the visitor's handler for its variant
 */
export function acceptExpression<TContext, TResult>(
  expr: Expression,
  visitor: ExpressionVisitor<TContext, TResult>,
  context: TContext,
): TResult {
  switch (expr.kind) {
    case "Integer":
      return visitor.Integer(expr, context, visitor);
    case "Float":
      return visitor.Float(expr, context, visitor);
    case "Negative":
      return visitor.Negative(expr, context, visitor);
    case "Add":
      return visitor.Add(expr, context, visitor);
    case "Subtract":
      return visitor.Subtract(expr, context, visitor);
    case "Multiply":
      return visitor.Multiply(expr, context, visitor);
    case "Divide":
      return visitor.Divide(expr, context, visitor);
  }
}
