/**
 * treevisit - Public API Exports
 *
 * Immutable labelled and arithmetic trees, with operations supplied as
 * visitors rather than methods on the nodes.
 *
 * @example
 * ```typescript
 * import { Add, Float, Integer, evaluate, printExpression } from "treevisit";
 *
 * const expr = Add(Integer(2), Float(0.5));
 * printExpression(expr); // "2 + 0.5"
 * evaluate(expr); // 2.5
 * ```
 *
 * @module mod
 */

// Generic trees and their visitor protocol
export { acceptTree, isTreeElement, Leaf, Node } from "./src/tree/mod.ts";
export type {
  LeafElement,
  NodeElement,
  TreeElement,
  TreeElementKind,
  TreeHandler,
  TreeVisitor,
} from "./src/tree/mod.ts";

// Expression trees and their visitor protocol
export {
  acceptExpression,
  Add,
  Divide,
  Float,
  Integer,
  isBinary,
  isExpression,
  Multiply,
  Negative,
  OPERATOR_SYMBOLS,
  Subtract,
} from "./src/expression/mod.ts";
export type {
  BinaryKind,
  BinaryNode,
  Expression,
  ExpressionHandler,
  ExpressionKind,
  ExpressionVisitor,
} from "./src/expression/mod.ts";

// Visitors
export {
  evaluate,
  evaluateNumeric,
  formatFloat,
  printExpression,
  printTree,
  TREE_GLYPHS,
} from "./src/visitors/mod.ts";
export type { NumericType, NumericValue } from "./src/visitors/mod.ts";

// Errors
export {
  ConfigurationError,
  ConstructionError,
  DivisionByZeroError,
  TreeVisitError,
} from "./src/errors/error-types.ts";

// Configuration and logging
export { applyConfig, loadConfig } from "./src/config/loader.ts";
export type { TreeVisitConfig } from "./src/config/loader.ts";
export type { PrintStyle, PrintTreeOptions } from "./src/config/schemas.ts";
export { getLogger, setupLogger } from "./src/telemetry/logger.ts";
export type { LoggerConfig, LogLevel } from "./src/telemetry/types.ts";
