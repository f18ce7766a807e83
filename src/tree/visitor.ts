/**
 * Tree Visitor Protocol
 *
 * One handler per element kind. `acceptTree` dispatches on the element's
 * tag; there is no default handler, so a visitor missing a case does not
 * type-check.
 *
 * @example
 * ```typescript
 * const countLeaves: TreeVisitor<void, number> = {
 *   Leaf: () => 1,
 *   Node: (node, ctx, visitor) =>
 *     node.children.reduce((n, c) => n + acceptTree(c, visitor, ctx), 0),
 * };
 * ```
 *
 * @module tree/visitor
 */

import type { LeafElement, NodeElement, TreeElement } from "./types.ts";

/**
 * Handler signature
 *
 * @param element The element being visited
 * @param context Traversal context for this element
 * @param visitor The visitor itself, for recursion into children
 */
export type TreeHandler<TElement extends TreeElement, TContext, TResult> = (
  element: TElement,
  context: TContext,
  visitor: TreeVisitor<TContext, TResult>,
) => TResult;

export interface TreeVisitor<TContext, TResult> {
  Leaf: TreeHandler<LeafElement, TContext, TResult>;
  Node: TreeHandler<NodeElement, TContext, TResult>;
}

/**
 * Forward `element` to the visitor's handler for its kind
 */
export function acceptTree<TContext, TResult>(
  element: TreeElement,
  visitor: TreeVisitor<TContext, TResult>,
  context: TContext,
): TResult {
  switch (element.kind) {
    case "Leaf":
      return visitor.Leaf(element, context, visitor);
    case "Node":
      return visitor.Node(element, context, visitor);
  }
}
