/**
 * Expression Printer
 *
 * Infix rendering. Every operand that is itself a binary node is wrapped in
 * parentheses; literals and negations are not. The root is never wrapped.
 *
 * `Add(Integer(2), Divide(Multiply(Float(5.0), Negative(Integer(3))), Float(10.0)))`
 * renders as `2 + ((5.0 * -3) / 10.0)`.
 *
 * @module visitors/expression-printer
 */

import { isBinary } from "../expression/nodes.ts";
import { OPERATOR_SYMBOLS } from "../expression/operators.ts";
import { acceptExpression, type ExpressionVisitor } from "../expression/visitor.ts";
import type { BinaryNode, Expression } from "../expression/types.ts";
import { getLogger } from "../telemetry/logger.ts";

const logger = getLogger("expression-printer");

/**
 * Canonical float text: integral values keep one decimal digit (`5.0`)
 */
export function formatFloat(value: number): string {
  const text = String(value);
  return Number.isInteger(value) && !/[e.]/i.test(text) ? `${text}.0` : text;
}

function operand(expr: Expression, visitor: ExpressionVisitor<void, string>): string {
  const text = acceptExpression(expr, visitor, undefined);
  return isBinary(expr) ? `(${text})` : text;
}

function infix(expr: BinaryNode, visitor: ExpressionVisitor<void, string>): string {
  return `${operand(expr.left, visitor)} ${OPERATOR_SYMBOLS[expr.kind]} ${operand(expr.right, visitor)}`;
}

const expressionPrinter: ExpressionVisitor<void, string> = {
  Integer: (expr) => String(expr.value),
  Float: (expr) => formatFloat(expr.value),
  Negative: (expr, _ctx, visitor) => `-${operand(expr.operand, visitor)}`,
  Add: (expr, _ctx, visitor) => infix(expr, visitor),
  Subtract: (expr, _ctx, visitor) => infix(expr, visitor),
  Multiply: (expr, _ctx, visitor) => infix(expr, visitor),
  Divide: (expr, _ctx, visitor) => infix(expr, visitor),
};

/**
 * Render `root` as an infix string
 */
export function printExpression(root: Expression): string {
  const text = acceptExpression(root, expressionPrinter, undefined);
  logger.debug(`printExpression: ${text}`);
  return text;
}
