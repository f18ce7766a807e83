/**
 * Custom Error Types for treevisit
 *
 * Provides a hierarchy of error classes with error codes, recoverability
 * flags, and suggestions for resolution.
 *
 * @module errors/error-types
 */

import type { Expression } from "../expression/types.ts";

/**
 * Base error class for treevisit
 *
 * All custom errors extend this class to provide:
 * - Unique error code for categorization
 * - Recoverable flag to indicate if the operation can continue
 * - Suggestion for how to resolve the error
 */
export class TreeVisitError extends Error {
  constructor(
    message: string,
    public code: string,
    public recoverable: boolean = false,
    public suggestion?: string,
  ) {
    super(message);
    this.name = this.constructor.name;
    // Maintains proper stack trace for where our error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Tree construction errors
 *
 * Thrown when:
 * - An internal node is built without children
 * - A value leaf receives a non-finite or non-numeric value
 * - A child is already owned by another node
 */
export class ConstructionError extends TreeVisitError {
  constructor(message: string, public variant: string) {
    super(
      message,
      "CONSTRUCTION_ERROR",
      false,
      variant === "Node" ? "Use a Leaf for elements without children" : undefined,
    );
  }
}

/**
 * Raised by the evaluator when a Divide node's right operand evaluates to 0
 */
export class DivisionByZeroError extends TreeVisitError {
  constructor(
    public node: Expression,
    public dividend: number,
  ) {
    super(
      `Division by zero: ${dividend} / 0`,
      "DIVISION_BY_ZERO",
      false,
    );
  }
}

/**
 * Configuration errors
 *
 * Thrown when:
 * - An environment variable holds an unsupported value
 * - Printer options are invalid
 */
export class ConfigurationError extends TreeVisitError {
  constructor(message: string, public configKey?: string) {
    super(
      message,
      "CONFIGURATION_ERROR",
      false,
      configKey ? `Check the value of '${configKey}'` : undefined,
    );
  }
}
