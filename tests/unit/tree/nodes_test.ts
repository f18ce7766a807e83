/**
 * Unit tests for generic tree constructors
 */

import { test } from "node:test";
import assert from "node:assert/strict";
import { isTreeElement, Leaf, Node } from "../../../src/tree/nodes.ts";
import { ConstructionError } from "../../../src/errors/error-types.ts";

test("Leaf - stores its name verbatim", () => {
  const leaf = Leaf("  spaced name ");

  assert.deepEqual(leaf, { kind: "Leaf", name: "  spaced name " });
  assert.ok(Object.isFrozen(leaf));
});

test("Node - keeps children in argument order", () => {
  const a = Leaf("a");
  const b = Leaf("b");
  const c = Node("c", Leaf("d"));
  const node = Node("root", a, b, c);

  assert.equal(node.kind, "Node");
  assert.equal(node.name, "root");
  assert.deepEqual(node.children.map((child) => child.name), ["a", "b", "c"]);
  assert.equal(node.children[2], c);
  assert.ok(Object.isFrozen(node));
  assert.ok(Object.isFrozen(node.children));
});

test("Node - without children raises ConstructionError", () => {
  assert.throws(
    () => Node("X"),
    (error: unknown) =>
      error instanceof ConstructionError &&
      error.variant === "Node" &&
      error.message === "Node 'X' needs at least one child",
  );
});

// Untyped callers: Reflect.apply skips the compile-time signature
test("Node - rejects a child that is not a tree element", () => {
  assert.throws(
    () => Reflect.apply(Node, undefined, ["X", { name: "not a node" }]),
    ConstructionError,
  );
});

test("Leaf - rejects a non-string name", () => {
  assert.throws(() => Reflect.apply(Leaf, undefined, [42]), ConstructionError);
});

test("Node - a child cannot be attached to two parents", () => {
  const shared = Leaf("shared");
  Node("first", shared);

  assert.throws(() => Node("second", shared), ConstructionError);
});

test("Node - the same child cannot be passed twice", () => {
  const twice = Leaf("twice");

  assert.throws(() => Node("parent", twice, twice), ConstructionError);
});

test("Node - a failed construction leaves its children unclaimed", () => {
  const orphan = Leaf("orphan");
  const owned = Leaf("owned");
  Node("owner", owned);

  assert.throws(() => Node("bad", orphan, owned), ConstructionError);
  assert.equal(Node("good", orphan).children[0], orphan);
});

test("isTreeElement - recognizes leaves and nodes only", () => {
  assert.equal(isTreeElement(Leaf("x")), true);
  assert.equal(isTreeElement(Node("y", Leaf("z"))), true);
  assert.equal(isTreeElement({ kind: "Integer", value: 1 }), false);
  assert.equal(isTreeElement(null), false);
  assert.equal(isTreeElement("Leaf"), false);
});
