/**
 * Unit tests for the expression evaluator
 */

import { describe, it } from "node:test";
import assert from "node:assert/strict";
import {
  Add,
  Divide,
  Float,
  Integer,
  Multiply,
  Negative,
  Subtract,
} from "../../../src/expression/nodes.ts";
import type { Expression } from "../../../src/expression/types.ts";
import { evaluate, evaluateNumeric } from "../../../src/visitors/evaluator.ts";
import { DivisionByZeroError } from "../../../src/errors/error-types.ts";

function example(): Expression {
  return Add(
    Integer(2),
    Divide(Multiply(Float(5.0), Negative(Integer(3))), Float(10.0)),
  );
}

describe("evaluate", () => {
  it("evaluates the nested example to 0.5", () => {
    assert.equal(evaluate(example()), 0.5);
  });

  it("evaluates literals and negation", () => {
    assert.equal(evaluate(Integer(42)), 42);
    assert.equal(evaluate(Negative(Integer(23))), -23);
    assert.equal(evaluate(Negative(Negative(Float(1.5)))), 1.5);
  });

  it("uses true division for integers", () => {
    assert.equal(evaluate(Divide(Integer(5), Integer(2))), 2.5);
    assert.equal(evaluate(Divide(Float(5), Integer(2))), 2.5);
  });

  it("subtracts right from left", () => {
    assert.equal(evaluate(Subtract(Integer(3), Integer(10))), -7);
  });

  it("is deterministic", () => {
    const expr = example();

    assert.equal(evaluate(expr), evaluate(expr));
  });
});

describe("evaluateNumeric", () => {
  it("keeps integer arithmetic integral", () => {
    assert.deepEqual(evaluateNumeric(Add(Integer(2), Integer(3))), { type: "integer", value: 5n });
    assert.deepEqual(
      evaluateNumeric(Multiply(Negative(Integer(4)), Subtract(Integer(1), Integer(3)))),
      { type: "integer", value: 8n },
    );
  });

  it("promotes to float when either operand is a float", () => {
    assert.deepEqual(evaluateNumeric(Add(Integer(2), Float(3))), { type: "float", value: 5 });
    assert.deepEqual(evaluateNumeric(Multiply(Float(0.5), Integer(4))), { type: "float", value: 2 });
  });

  it("always yields a float from division", () => {
    assert.deepEqual(evaluateNumeric(Divide(Integer(6), Integer(3))), { type: "float", value: 2 });
  });

  it("keeps the operand type through negation", () => {
    assert.deepEqual(evaluateNumeric(Negative(Integer(7))), { type: "integer", value: -7n });
    assert.deepEqual(evaluateNumeric(Negative(Float(7))), { type: "float", value: -7 });
  });
});

describe("integer precision", () => {
  it("multiplies beyond 2^53 exactly", () => {
    const expr = Multiply(Integer(3 ** 20), Integer(3 ** 20));

    assert.deepEqual(evaluateNumeric(expr), { type: "integer", value: 12157665459056928801n });
  });

  it("adds past the largest safe integer exactly", () => {
    const expr = Add(Integer(Number.MAX_SAFE_INTEGER), Integer(2));

    assert.deepEqual(evaluateNumeric(expr), { type: "integer", value: 9007199254740993n });
  });

  it("keeps large products finite and integral", () => {
    const big = Integer(Number.MAX_SAFE_INTEGER);
    const expr = Multiply(big, Multiply(Integer(Number.MAX_SAFE_INTEGER), Integer(Number.MAX_SAFE_INTEGER)));
    const result = evaluateNumeric(expr);

    assert.equal(result.type, "integer");
    assert.equal(result.value, 9007199254740991n ** 3n);
  });

  it("subtracts to an exact negative integer", () => {
    const expr = Subtract(Integer(0), Multiply(Integer(2 ** 30), Integer(2 ** 30)));

    assert.deepEqual(evaluateNumeric(expr), { type: "integer", value: -(2n ** 60n) });
  });

  it("converts to the nearest number at the evaluate boundary", () => {
    const expr = Add(Integer(Number.MAX_SAFE_INTEGER), Integer(2));

    assert.equal(evaluate(expr), Number(9007199254740993n));
  });

  it("a float operand switches to floating-point arithmetic", () => {
    const expr = Multiply(Integer(Number.MAX_SAFE_INTEGER), Float(2));

    assert.deepEqual(evaluateNumeric(expr), { type: "float", value: 18014398509481982 });
  });
});

describe("division by zero", () => {
  it("raises DivisionByZeroError for an integer zero", () => {
    const node = Divide(Integer(5), Integer(0));

    assert.throws(
      () => evaluate(node),
      (error: unknown) =>
        error instanceof DivisionByZeroError && error.node === node && error.dividend === 5,
    );
  });

  it("raises for any left operand when the right evaluates to zero", () => {
    const divisors = [
      () => Float(0),
      () => Negative(Integer(0)),
      () => Subtract(Integer(2), Integer(2)),
      () => Multiply(Float(0), Integer(9)),
    ];

    for (const divisor of divisors) {
      assert.throws(() => evaluate(Divide(Float(1.5), divisor())), DivisionByZeroError);
    }
  });

  it("propagates from a nested divide and names the inner node", () => {
    const inner = Divide(Integer(1), Subtract(Float(3), Float(3)));
    const expr = Add(Integer(1), Negative(inner));

    assert.throws(
      () => evaluate(expr),
      (error: unknown) => error instanceof DivisionByZeroError && error.node === inner,
    );
  });
});
