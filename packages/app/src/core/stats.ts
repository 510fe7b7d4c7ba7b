import { Match } from "effect"

import type { ValueStats } from "./types.js"
import type { Value } from "./value.js"

// CHANGE: summarize a parsed tree by node kind and depth
// WHY: the stats command reports document shape without printing the document
// FORMAT THEOREM: ∀v: Σ counts(summarize(v)) = |nodes(v)|
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: maxDepth ≥ 1
// COMPLEXITY: O(n) where n = number of nodes

export const emptyStats: ValueStats = {
  objects: 0,
  arrays: 0,
  strings: 0,
  numbers: 0,
  booleans: 0,
  nulls: 0,
  keys: 0,
  maxDepth: 0
}

const mergeStats = (left: ValueStats, right: ValueStats): ValueStats => ({
  objects: left.objects + right.objects,
  arrays: left.arrays + right.arrays,
  strings: left.strings + right.strings,
  numbers: left.numbers + right.numbers,
  booleans: left.booleans + right.booleans,
  nulls: left.nulls + right.nulls,
  keys: left.keys + right.keys,
  maxDepth: Math.max(left.maxDepth, right.maxDepth)
})

const summarizeChildren = (children: Iterable<Value>, depth: number): ValueStats => {
  let merged = emptyStats
  for (const child of children) {
    merged = mergeStats(merged, summarizeAt(child, depth + 1))
  }
  return merged
}

const summarizeAt = (value: Value, depth: number): ValueStats =>
  Match.value(value).pipe(
    Match.when({ _tag: "Null" }, () => ({ ...emptyStats, nulls: 1, maxDepth: depth })),
    Match.when({ _tag: "Boolean" }, () => ({ ...emptyStats, booleans: 1, maxDepth: depth })),
    Match.when({ _tag: "Number" }, () => ({ ...emptyStats, numbers: 1, maxDepth: depth })),
    Match.when({ _tag: "String" }, () => ({ ...emptyStats, strings: 1, maxDepth: depth })),
    Match.when({ _tag: "Array" }, (node) =>
      mergeStats(
        { ...emptyStats, arrays: 1, maxDepth: depth },
        summarizeChildren(node.items, depth)
      )),
    Match.when({ _tag: "Object" }, (node) =>
      mergeStats(
        { ...emptyStats, objects: 1, keys: node.entries.size, maxDepth: depth },
        summarizeChildren(node.entries.values(), depth)
      )),
    Match.exhaustive
  )

/**
 * Count the nodes of a value tree by kind.
 *
 * @param value - Root of the tree; counted at depth 1.
 * @returns ValueStats with per-kind counts, total object keys and the deepest node level.
 *
 * @pure true
 * @invariant maxDepth = 1 for a scalar or an empty container
 * @complexity O(n)
 */
export const summarizeValue = (value: Value): ValueStats => summarizeAt(value, 1)
