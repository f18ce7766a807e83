/**
 * Structural Printer
 *
 * Renders a generic tree as a folder-like diagram:
 *
 * ```
 *  ╿ Scene
 *  ├─┮ Robot
 *  │ ├─┮ Flange
 *  │ │ └─┮ Gripper
 *  │ │   └─╼ Object
 *  │ └─╼ Camera
 *  └─┮ Table
 *    └─╼ Box
 * ```
 *
 * Each line is a one-space margin, one guide per ancestor below the root
 * (blank when that ancestor was the last child of its parent), then the
 * element's own connector and its name. The `indent` and `bullet` styles
 * drop the glyphs and indent two spaces per level.
 *
 * Expression trees print the same way, labelled by variant: literals as
 * `Integer(2)` or `Float(5.0)`, operators by name (`Negative`, `Add`, ...).
 *
 * @module visitors/structural-printer
 */

import { ConfigurationError } from "../errors/error-types.ts";
import { PrintTreeOptionsSchema } from "../config/schemas.ts";
import type { PrintStyle, PrintTreeOptions } from "../config/schemas.ts";
import { acceptExpression, type ExpressionVisitor } from "../expression/visitor.ts";
import type { BinaryNode, Expression } from "../expression/types.ts";
import { getLogger } from "../telemetry/logger.ts";
import { isTreeElement } from "../tree/nodes.ts";
import { acceptTree, type TreeVisitor } from "../tree/visitor.ts";
import type { TreeElement } from "../tree/types.ts";
import { formatFloat } from "./expression-printer.ts";

const logger = getLogger("structural-printer");

export const TREE_GLYPHS = {
  margin: " ",
  root: " ╿ ",
  guide: "│ ",
  blank: "  ",
  nodeMiddle: "├─┮ ",
  nodeLast: "└─┮ ",
  leafMiddle: "├─╼ ",
  leafLast: "└─╼ ",
} as const;

const INDENT_UNIT = "  ";
const BULLET = "* ";

interface PrintContext {
  style: PrintStyle;
  depth: number;
  isLast: boolean;
  /** Last-child flag of every ancestor between the root and this element */
  ancestorsLast: readonly boolean[];
  /** Output shared by the whole traversal; each element appends one line */
  lines: string[];
}

function connector(internal: boolean, isLast: boolean): string {
  if (internal) {
    return isLast ? TREE_GLYPHS.nodeLast : TREE_GLYPHS.nodeMiddle;
  }
  return isLast ? TREE_GLYPHS.leafLast : TREE_GLYPHS.leafMiddle;
}

function formatLine(label: string, internal: boolean, ctx: PrintContext): string {
  switch (ctx.style) {
    case "indent":
      return INDENT_UNIT.repeat(ctx.depth) + label;
    case "bullet":
      return INDENT_UNIT.repeat(ctx.depth) + BULLET + label;
    case "tree": {
      if (ctx.depth === 0) {
        return TREE_GLYPHS.root + label;
      }
      const guides = ctx.ancestorsLast
        .map((last) => (last ? TREE_GLYPHS.blank : TREE_GLYPHS.guide))
        .join("");
      return TREE_GLYPHS.margin + guides + connector(internal, ctx.isLast) + label;
    }
  }
}

function emit(label: string, internal: boolean, ctx: PrintContext): void {
  ctx.lines.push(formatLine(label, internal, ctx));
}

function childAncestors(ctx: PrintContext): readonly boolean[] {
  // The root contributes no guide column
  return ctx.depth === 0 ? [] : [...ctx.ancestorsLast, ctx.isLast];
}

function childContext(
  ctx: PrintContext,
  ancestorsLast: readonly boolean[],
  index: number,
  count: number,
): PrintContext {
  return {
    style: ctx.style,
    depth: ctx.depth + 1,
    isLast: index === count - 1,
    ancestorsLast,
    lines: ctx.lines,
  };
}

const treePrinter: TreeVisitor<PrintContext, void> = {
  Leaf: (leaf, ctx) => emit(leaf.name, false, ctx),
  Node: (node, ctx, visitor) => {
    emit(node.name, true, ctx);
    const ancestorsLast = childAncestors(ctx);
    const count = node.children.length;
    node.children.forEach((child, index) => {
      acceptTree(child, visitor, childContext(ctx, ancestorsLast, index, count));
    });
  },
};

function printBinary(
  expr: BinaryNode,
  ctx: PrintContext,
  visitor: ExpressionVisitor<PrintContext, void>,
): void {
  emit(expr.kind, true, ctx);
  const ancestorsLast = childAncestors(ctx);
  acceptExpression(expr.left, visitor, childContext(ctx, ancestorsLast, 0, 2));
  acceptExpression(expr.right, visitor, childContext(ctx, ancestorsLast, 1, 2));
}

const expressionOutlinePrinter: ExpressionVisitor<PrintContext, void> = {
  Integer: (expr, ctx) => emit(`Integer(${expr.value})`, false, ctx),
  Float: (expr, ctx) => emit(`Float(${formatFloat(expr.value)})`, false, ctx),
  Negative: (expr, ctx, visitor) => {
    emit(expr.kind, true, ctx);
    acceptExpression(expr.operand, visitor, childContext(ctx, childAncestors(ctx), 0, 1));
  },
  Add: (expr, ctx, visitor) => printBinary(expr, ctx, visitor),
  Subtract: (expr, ctx, visitor) => printBinary(expr, ctx, visitor),
  Multiply: (expr, ctx, visitor) => printBinary(expr, ctx, visitor),
  Divide: (expr, ctx, visitor) => printBinary(expr, ctx, visitor),
};

/**
 * Render a generic tree or an expression tree in the requested style
 * (default `tree`)
 *
 * @throws ConfigurationError when `options` do not match the schema
 */
export function printTree(
  root: TreeElement | Expression,
  options: PrintTreeOptions = {},
): string {
  const parsed = PrintTreeOptionsSchema.safeParse(options);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const key = issue && issue.path.length > 0 ? String(issue.path[0]) : undefined;
    throw new ConfigurationError(
      `Invalid printTree options: ${issue?.message ?? "unknown error"}`,
      key,
    );
  }

  const ctx: PrintContext = {
    style: parsed.data.style,
    depth: 0,
    isLast: true,
    ancestorsLast: [],
    lines: [],
  };
  if (isTreeElement(root)) {
    acceptTree(root, treePrinter, ctx);
  } else {
    acceptExpression(root, expressionOutlinePrinter, ctx);
  }
  logger.debug(`printTree: ${ctx.lines.length} lines in '${parsed.data.style}' style`);
  return ctx.lines.join("\n");
}
