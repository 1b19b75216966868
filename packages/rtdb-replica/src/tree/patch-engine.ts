/**
 * @file Tree Patch Engine
 *
 * Pure functions that apply `put` and `patch` deltas to a tree value and
 * read values below a location. Inputs are never mutated; unchanged
 * subtrees are shared between the input and the result.
 *
 * @module rtdb-replica/tree/patch-engine
 */

import { Path } from '../path/path.js'
import {
  getChild,
  hasChild,
  isTreeMapping,
  mappingFromEntries,
  toTreeValue,
} from './tree-value.js'
import type { TreeMapping, TreeValue } from './tree-value.js'

/**
 * The body of a `patch` delta: child keys (or multi-segment relative paths)
 * to the value to write there. `null` deletes.
 */
export type PatchData = Readonly<Record<string, unknown>>

// =============================================================================
// Internal Helpers
// =============================================================================

/**
 * Returns `mapping` with `key` set to `child`, or with `key` removed when
 * `child` is null. Collapses to null when nothing is left.
 */
function withChild(mapping: TreeMapping | null, key: string, child: TreeValue): TreeValue {
  const entries = mapping ? Object.entries(mapping).filter(([existing]) => existing !== key) : []
  if (child !== null) {
    entries.push([key, child])
  }
  return mappingFromEntries(entries)
}

function putAt(node: TreeValue, segments: readonly string[], index: number, value: TreeValue): TreeValue {
  if (index === segments.length) {
    return value
  }

  const key = segments[index]
  if (key === undefined) {
    return value
  }

  const mapping = isTreeMapping(node) ? node : null

  if (value === null && (mapping === null || !hasChild(mapping, key))) {
    // Deleting something that is not there
    return node
  }

  const current = mapping ? getChild(mapping, key) ?? null : null
  const updated = putAt(current, segments, index + 1, value)
  if (mapping !== null && updated === current) {
    return node
  }
  return withChild(mapping, key, updated)
}

// =============================================================================
// Public API
// =============================================================================

/**
 * Replaces the subtree at `path` with `value`.
 *
 * A `null` value deletes the subtree; parents left empty by the deletion are
 * removed too. Writing below a scalar replaces the scalar with a mapping.
 *
 * @param tree - The current tree
 * @param path - Location relative to the root of `tree`
 * @param value - New value; normalized with {@link toTreeValue}
 * @returns The new tree
 * @throws InvalidValueError if `value` is not representable
 *
 * @example
 * ```typescript
 * const tree = toTreeValue({ a: 5, b: 4 })
 * applyPut(tree, Path.parse('/b'), 7)    // { a: 5, b: 7 }
 * applyPut(tree, Path.parse('/a'), null) // { b: 4 }
 * ```
 */
export function applyPut(tree: TreeValue, path: Path, value: unknown): TreeValue {
  return putAt(tree, path.segments, 0, toTreeValue(value))
}

/**
 * Shallow-merges `data` into the location at `path`: every key of `data` is
 * written with {@link applyPut} at `path/key`. Keys not named in `data` are
 * left alone. Keys may span several segments (`'a/a1'`).
 *
 * @throws InvalidPathError if a key is not a valid relative path
 * @throws InvalidValueError if a value is not representable
 *
 * @example
 * ```typescript
 * const tree = toTreeValue({ a: 5, b: 4 })
 * applyPatch(tree, Path.root, { b: 7, c: 9 }) // { a: 5, b: 7, c: 9 }
 * ```
 */
export function applyPatch(tree: TreeValue, path: Path, data: PatchData): TreeValue {
  let result = tree
  for (const [key, value] of Object.entries(data)) {
    result = applyPut(result, path.join(Path.parse(key)), value)
  }
  return result
}

/**
 * Reads the value at `path`.
 *
 * @returns The value, or `undefined` when the location does not exist
 *
 * @example
 * ```typescript
 * const tree = toTreeValue({ a: { b: 1 } })
 * readAt(tree, Path.parse('/a/b')) // 1
 * readAt(tree, Path.parse('/a/c')) // undefined
 * readAt(tree, Path.parse('/a/b/c')) // undefined
 * ```
 */
export function readAt(tree: TreeValue, path: Path): TreeValue | undefined {
  let node: TreeValue | undefined = tree
  for (const segment of path.segments) {
    if (!isTreeMapping(node)) {
      return undefined
    }
    node = getChild(node, segment)
  }
  return node === null ? undefined : node
}
