/**
 * Option schemas shared by the configuration loader and the printers
 *
 * @module config/schemas
 */

import { z } from "zod";

/**
 * Layout of `printTree` output:
 * - `tree`: box-drawing diagram
 * - `indent`: two spaces per level
 * - `bullet`: two spaces per level followed by `* `
 */
export const PrintStyleSchema = z.enum(["tree", "indent", "bullet"]);

export type PrintStyle = z.infer<typeof PrintStyleSchema>;

export const PrintTreeOptionsSchema = z.object({
  style: PrintStyleSchema.default("tree"),
}).strict();

export type PrintTreeOptions = z.input<typeof PrintTreeOptionsSchema>;
