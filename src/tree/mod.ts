/**
 * Generic labelled trees
 *
 * @module tree
 */

export { isTreeElement, Leaf, Node } from "./nodes.ts";
export { acceptTree } from "./visitor.ts";
export type { TreeHandler, TreeVisitor } from "./visitor.ts";
export type { LeafElement, NodeElement, TreeElement, TreeElementKind } from "./types.ts";
