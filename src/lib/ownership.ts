/**
 * Exclusive child ownership
 *
 * Elements are frozen and carry no parent reference, so attachment is
 * recorded here. An element can be claimed by one parent only.
 *
 * @module lib/ownership
 */

import { ConstructionError } from "../errors/error-types.ts";

const owned = new WeakSet<object>();

/**
 * Claim `children` for a parent of kind `variant`
 *
 * @throws ConstructionError if a child already has a parent or is passed twice
 */
export function claimChildren(variant: string, children: readonly object[]): void {
  const seen = new Set<object>();
  for (const child of children) {
    if (owned.has(child) || seen.has(child)) {
      throw new ConstructionError(
        `${variant}: child is already attached to a parent; subtrees cannot be shared`,
        variant,
      );
    }
    seen.add(child);
  }
  for (const child of children) {
    owned.add(child);
  }
}
