/**
 * Generic Tree Constructors
 *
 * @example
 * ```typescript
 * const scene = Node("Scene", Node("Table", Leaf("Box")), Leaf("Camera"));
 * ```
 *
 * @module tree/nodes
 */

import { z } from "zod";
import { ConstructionError } from "../errors/error-types.ts";
import { claimChildren } from "../lib/ownership.ts";
import type { LeafElement, NodeElement, TreeElement } from "./types.ts";

export type Leaf = LeafElement;
export type Node = NodeElement;

const NameSchema = z.string();

function validateName(variant: string, name: unknown): string {
  const result = NameSchema.safeParse(name);
  if (!result.success) {
    throw new ConstructionError(`${variant}: name must be a string`, variant);
  }
  return result.data;
}

export function isTreeElement(value: unknown): value is TreeElement {
  return typeof value === "object" && value !== null && "kind" in value &&
    (value.kind === "Leaf" || value.kind === "Node");
}

/**
 * Create a leaf
 */
export function Leaf(name: string): Leaf {
  const leaf: Leaf = { kind: "Leaf", name: validateName("Leaf", name) };
  return Object.freeze(leaf);
}

/**
 * Create an internal node owning `children` in the given order
 *
 * @throws ConstructionError when no children are given, a child is not a
 * tree element, or a child already belongs to another node
 */
export function Node(name: string, ...children: TreeElement[]): Node {
  const validName = validateName("Node", name);
  if (children.length === 0) {
    throw new ConstructionError(
      `Node '${validName}' needs at least one child`,
      "Node",
    );
  }
  for (const child of children) {
    if (!isTreeElement(child)) {
      throw new ConstructionError(
        `Node '${validName}': children must be Leaf or Node elements`,
        "Node",
      );
    }
  }
  claimChildren("Node", children);
  const node: Node = {
    kind: "Node",
    name: validName,
    children: Object.freeze([...children]),
  };
  return Object.freeze(node);
}
