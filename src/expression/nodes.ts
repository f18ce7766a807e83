/**
 * Expression Constructors
 *
 * @example
 * ```typescript
 * // 2 + ((5.0 * -3) / 10.0)
 * const expr = Add(
 *   Integer(2),
 *   Divide(Multiply(Float(5.0), Negative(Integer(3))), Float(10.0)),
 * );
 * ```
 *
 * @module expression/nodes
 */

import { z } from "zod";
import { ConstructionError } from "../errors/error-types.ts";
import { claimChildren } from "../lib/ownership.ts";
import type {
  BinaryExpression,
  BinaryKind,
  BinaryNode,
  Expression,
  ExpressionKind,
  FloatLiteral,
  IntegerLiteral,
  NegativeExpression,
} from "./types.ts";

export type Integer = IntegerLiteral;
export type Float = FloatLiteral;
export type Negative = NegativeExpression;
export type Add = BinaryExpression<"Add">;
export type Subtract = BinaryExpression<"Subtract">;
export type Multiply = BinaryExpression<"Multiply">;
export type Divide = BinaryExpression<"Divide">;

const EXPRESSION_KINDS: ReadonlySet<string> = new Set<ExpressionKind>([
  "Integer",
  "Float",
  "Negative",
  "Add",
  "Subtract",
  "Multiply",
  "Divide",
]);

const BINARY_KINDS: ReadonlySet<string> = new Set<BinaryKind>([
  "Add",
  "Subtract",
  "Multiply",
  "Divide",
]);

const NEGATIVE_LITERAL = "value must not be negative; wrap it in Negative";

// Literals carry no sign; negation is always a Negative node
const LiteralValueSchema = z.number({ invalid_type_error: "value must be a number" })
  .finite("value must be finite")
  .nonnegative(NEGATIVE_LITERAL);

const FloatValueSchema = LiteralValueSchema
  .refine((value) => !Object.is(value, -0), NEGATIVE_LITERAL);

const IntegerValueSchema = LiteralValueSchema
  .int("value must be an integer")
  .safe("value must be a safe integer")
  .refine((value) => !Object.is(value, -0), NEGATIVE_LITERAL);

export function isExpression(value: unknown): value is Expression {
  return typeof value === "object" && value !== null && "kind" in value &&
    typeof value.kind === "string" && EXPRESSION_KINDS.has(value.kind);
}

export function isBinary(expr: Expression): expr is BinaryNode {
  return BINARY_KINDS.has(expr.kind);
}

function validateValue(
  variant: "Integer" | "Float",
  schema: z.ZodType<number>,
  value: unknown,
): number {
  const result = schema.safeParse(value);
  if (!result.success) {
    const reason = result.error.issues[0]?.message ?? "invalid value";
    const text = Object.is(value, -0) ? "-0" : String(value);
    throw new ConstructionError(`${variant}(${text}): ${reason}`, variant);
  }
  return result.data;
}

function validateOperand(variant: ExpressionKind, operand: unknown): Expression {
  if (!isExpression(operand)) {
    throw new ConstructionError(`${variant}: operands must be expressions`, variant);
  }
  return operand;
}

function binary<TKind extends BinaryKind>(
  kind: TKind,
  left: Expression,
  right: Expression,
): BinaryExpression<TKind> {
  const node: BinaryExpression<TKind> = {
    kind,
    left: validateOperand(kind, left),
    right: validateOperand(kind, right),
  };
  claimChildren(kind, [node.left, node.right]);
  return Object.freeze(node);
}

/**
 * Integer literal; `value` must be a non-negative safe integer
 */
export function Integer(value: number): Integer {
  const node: Integer = {
    kind: "Integer",
    value: validateValue("Integer", IntegerValueSchema, value),
  };
  return Object.freeze(node);
}

/**
 * Floating-point literal; `value` must be finite and non-negative
 */
export function Float(value: number): Float {
  const node: Float = {
    kind: "Float",
    value: validateValue("Float", FloatValueSchema, value),
  };
  return Object.freeze(node);
}

export function Negative(operand: Expression): Negative {
  const node: Negative = {
    kind: "Negative",
    operand: validateOperand("Negative", operand),
  };
  claimChildren("Negative", [node.operand]);
  return Object.freeze(node);
}

export function Add(left: Expression, right: Expression): Add {
  return binary("Add", left, right);
}

export function Subtract(left: Expression, right: Expression): Subtract {
  return binary("Subtract", left, right);
}

export function Multiply(left: Expression, right: Expression): Multiply {
  return binary("Multiply", left, right);
}

export function Divide(left: Expression, right: Expression): Divide {
  return binary("Divide", left, right);
}
