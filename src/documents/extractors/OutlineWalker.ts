/**
 * Outline flattening.
 *
 * @module documents/extractors/OutlineWalker
 */

import type { NativeOutlineNode } from "../../engine/types.js";
import type { OutlineEntry } from "../types.js";

/**
 * Flattened outline and whether any subtree was cut off by the depth limit.
 */
export interface FlattenedOutline {
  entries: OutlineEntry[];
  truncated: boolean;
}

/**
 * Flatten an outline forest into depth-first pre-order entries.
 *
 * Each node is emitted before its children, and children before the node's
 * next sibling. `level` starts at 1 and grows by exactly 1 per child level.
 * The walk uses an explicit stack; nodes deeper than `maxDepth` are dropped
 * together with their descendants.
 *
 * @param roots - Top-level outline nodes
 * @param maxDepth - Deepest level to emit
 *
 * @example
 * ```typescript
 * const { entries } = flattenOutline(
 *   [{ title: "A", uri: "", page: 0, y: 0, children: [{ title: "A.1", uri: "", page: 1, y: 0, children: [] }] }],
 *   256
 * );
 * entries.map((e) => `${e.level}:${e.title}`); // ["1:A", "2:A.1"]
 * ```
 */
export function flattenOutline(
  roots: readonly NativeOutlineNode[],
  maxDepth: number
): FlattenedOutline {
  const entries: OutlineEntry[] = [];
  let truncated = false;

  const stack: Array<{ node: NativeOutlineNode; level: number }> = [];
  for (let i = roots.length - 1; i >= 0; i--) {
    const node = roots[i];
    if (node !== undefined) {
      stack.push({ node, level: 1 });
    }
  }

  for (let next = stack.pop(); next !== undefined; next = stack.pop()) {
    const { node, level } = next;
    entries.push({
      level,
      title: node.title,
      destinationURI: node.uri,
      targetPage: node.page,
      verticalOffset: node.y,
    });

    if (node.children.length === 0) {
      continue;
    }
    if (level >= maxDepth) {
      truncated = true;
      continue;
    }
    for (let i = node.children.length - 1; i >= 0; i--) {
      const child = node.children[i];
      if (child !== undefined) {
        stack.push({ node: child, level: level + 1 });
      }
    }
  }

  return { entries, truncated };
}
