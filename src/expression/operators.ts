/**
 * Infix operator symbols
 *
 * @module expression/operators
 */

import type { BinaryKind } from "./types.ts";

export const OPERATOR_SYMBOLS: Readonly<Record<BinaryKind, string>> = {
  Add: "+",
  Subtract: "-",
  Multiply: "*",
  Divide: "/",
};
