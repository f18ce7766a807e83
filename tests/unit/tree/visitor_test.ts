/**
 * Unit tests for tree visitor dispatch
 */

import { test } from "node:test";
import assert from "node:assert/strict";
import { Leaf, Node } from "../../../src/tree/nodes.ts";
import { acceptTree, type TreeVisitor } from "../../../src/tree/visitor.ts";

test("acceptTree - dispatches to the handler for the element kind", () => {
  const calls: string[] = [];
  const visitor: TreeVisitor<void, void> = {
    Leaf: (leaf) => {
      calls.push(`leaf:${leaf.name}`);
    },
    Node: (node, ctx, self) => {
      calls.push(`node:${node.name}`);
      for (const child of node.children) acceptTree(child, self, ctx);
    },
  };

  acceptTree(Node("a", Leaf("b"), Node("c", Leaf("d"))), visitor, undefined);

  assert.deepEqual(calls, ["node:a", "leaf:b", "node:c", "leaf:d"]);
});

test("acceptTree - passes context through to handlers", () => {
  const depthOf: TreeVisitor<number, string[]> = {
    Leaf: (leaf, depth) => [`${leaf.name}@${depth}`],
    Node: (node, depth, self) => [
      `${node.name}@${depth}`,
      ...node.children.flatMap((child) => acceptTree(child, self, depth + 1)),
    ],
  };

  const result = acceptTree(Node("r", Node("s", Leaf("t")), Leaf("u")), depthOf, 0);

  assert.deepEqual(result, ["r@0", "s@1", "t@2", "u@1"]);
});

test("acceptTree - a leaf root only reaches the Leaf handler", () => {
  const visitor: TreeVisitor<void, string> = {
    Leaf: () => "leaf",
    Node: () => "node",
  };

  assert.equal(acceptTree(Leaf("only"), visitor, undefined), "leaf");
});
