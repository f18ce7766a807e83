/**
 * Expression Evaluator
 *
 * Reduces an expression tree to a number. Results carry a numeric type so
 * integer arithmetic stays integral until a Float operand or a division
 * promotes it:
 *
 * | Node | Result type |
 * |------|-------------|
 * | `Integer` | integer |
 * | `Float` | float |
 * | `Negative(x)` | type of `x` |
 * | `Add`, `Subtract`, `Multiply` | integer if both operands are integer, else float |
 * | `Divide` | float |
 *
 * @module visitors/evaluator
 */

import { DivisionByZeroError } from "../errors/error-types.ts";
import { acceptExpression, type ExpressionVisitor } from "../expression/visitor.ts";
import type { BinaryNode, Expression } from "../expression/types.ts";
import { getLogger } from "../telemetry/logger.ts";

const logger = getLogger("evaluator");

export type NumericType = "integer" | "float";

/**
 * Integer results are exact: they are carried as `bigint` until a float
 * operand or a division converts them.
 */
export type NumericValue =
  | { type: "integer"; value: bigint }
  | { type: "float"; value: number };

function toFloat(result: NumericValue): number {
  return result.type === "integer" ? Number(result.value) : result.value;
}

function combine(
  expr: BinaryNode,
  visitor: ExpressionVisitor<void, NumericValue>,
  integerOp: (left: bigint, right: bigint) => bigint,
  floatOp: (left: number, right: number) => number,
): NumericValue {
  const left = acceptExpression(expr.left, visitor, undefined);
  const right = acceptExpression(expr.right, visitor, undefined);
  if (left.type === "integer" && right.type === "integer") {
    return { type: "integer", value: integerOp(left.value, right.value) };
  }
  return { type: "float", value: floatOp(toFloat(left), toFloat(right)) };
}

const evaluator: ExpressionVisitor<void, NumericValue> = {
  Integer: (expr) => ({ type: "integer", value: BigInt(expr.value) }),
  Float: (expr) => ({ type: "float", value: expr.value }),
  Negative: (expr, _ctx, visitor) => {
    const inner = acceptExpression(expr.operand, visitor, undefined);
    return inner.type === "integer"
      ? { type: "integer", value: -inner.value }
      : { type: "float", value: -inner.value };
  },
  Add: (expr, _ctx, visitor) => combine(expr, visitor, (a, b) => a + b, (a, b) => a + b),
  Subtract: (expr, _ctx, visitor) => combine(expr, visitor, (a, b) => a - b, (a, b) => a - b),
  Multiply: (expr, _ctx, visitor) => combine(expr, visitor, (a, b) => a * b, (a, b) => a * b),
  Divide: (expr, _ctx, visitor) => {
    const dividend = toFloat(acceptExpression(expr.left, visitor, undefined));
    const divisor = toFloat(acceptExpression(expr.right, visitor, undefined));
    if (divisor === 0) {
      logger.warn(`evaluate: division by zero (${dividend} / ${divisor})`);
      throw new DivisionByZeroError(expr, dividend);
    }
    return { type: "float", value: dividend / divisor };
  },
};

/**
 * Evaluate `root`, keeping integer results exact
 *
 * @throws DivisionByZeroError when a Divide node's right operand evaluates to 0
 */
export function evaluateNumeric(root: Expression): NumericValue {
  const result = acceptExpression(root, evaluator, undefined);
  logger.debug(`evaluate: ${result.value} (${result.type})`);
  return result;
}

/**
 * Evaluate `root` to a number
 *
 * @throws DivisionByZeroError when a Divide node's right operand evaluates to 0
 */
export function evaluate(root: Expression): number {
  return toFloat(evaluateNumeric(root));
}
