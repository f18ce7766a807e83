/**
 * Visitors over the tree and expression families
 *
 * @module visitors
 */

export { printTree, TREE_GLYPHS } from "./structural-printer.ts";
export { formatFloat, printExpression } from "./expression-printer.ts";
export { evaluate, evaluateNumeric } from "./evaluator.ts";
export type { NumericType, NumericValue } from "./evaluator.ts";
