/**
 * Generic Tree Types
 *
 * Labelled trees rendered by the structural printer. The constructors in
 * `nodes.ts` export these shapes under the names `Leaf` and `Node`.
 *
 * @module tree/types
 */

/**
 * Terminal element
 */
export interface LeafElement {
  readonly kind: "Leaf";
  readonly name: string;
}

/**
 * Internal element with one or more ordered children
 */
export interface NodeElement {
  readonly kind: "Node";
  readonly name: string;
  readonly children: readonly TreeElement[];
}

export type TreeElement = LeafElement | NodeElement;

export type TreeElementKind = TreeElement["kind"];
