/**
 * @file Tree Values
 *
 * The closed set of values a location can hold. Mappings are frozen plain
 * objects whose keys are path segments. There is no array variant: arrays
 * coming off the wire become mappings keyed by index, the same way the
 * database stores them.
 *
 * Normalized invariants:
 * - a mapping never holds a `null` child (null means "absent")
 * - a mapping is never empty (an empty location does not exist)
 * - every mapping, at every depth, is frozen
 *
 * @module rtdb-replica/tree/tree-value
 */

import { InvalidValueError } from '../errors.js'
import { isValidKey } from '../path/path.js'

// =============================================================================
// Types
// =============================================================================

/** Leaf values */
export type TreeScalar = boolean | number | string

/** A mapping from child key to child value */
export interface TreeMapping {
  readonly [key: string]: TreeValue
}

/** Any value a location can hold; `null` is absence */
export type TreeValue = null | TreeScalar | TreeMapping

// =============================================================================
// Guards
// =============================================================================

/**
 * Whether `value` is a mapping (as opposed to a scalar or null).
 */
export function isTreeMapping(value: TreeValue | undefined): value is TreeMapping {
  return typeof value === 'object' && value !== null
}

/**
 * Own-property lookup that ignores the prototype chain.
 */
export function hasChild(mapping: TreeMapping, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(mapping, key)
}

/**
 * Reads a child without consulting the prototype chain.
 */
export function getChild(mapping: TreeMapping, key: string): TreeValue | undefined {
  return hasChild(mapping, key) ? mapping[key] : undefined
}

// =============================================================================
// Construction
// =============================================================================

/**
 * Builds a frozen mapping from entries, or `null` when there are none.
 *
 * `Object.fromEntries` defines own properties, so keys such as `__proto__`
 * are stored as data and never touch the prototype.
 */
export function mappingFromEntries(entries: ReadonlyArray<readonly [string, TreeValue]>): TreeValue {
  const kept = entries.filter(([, child]) => child !== null)
  if (kept.length === 0) {
    return null
  }
  return Object.freeze(Object.fromEntries(kept))
}

/**
 * Converts parsed JSON into a normalized, deeply frozen tree value.
 *
 * - `null` children are dropped and empty containers collapse to `null`
 * - arrays become mappings keyed by index
 * - non-finite numbers, `undefined`, functions and other non-JSON values
 *   are rejected
 *
 * @throws InvalidValueError if the input is not representable
 *
 * @example
 * ```typescript
 * toTreeValue({ a: 1, b: null, c: {} }) // { a: 1 }
 * toTreeValue(['x', null, 'z'])         // { '0': 'x', '2': 'z' }
 * ```
 */
export function toTreeValue(value: unknown): TreeValue {
  return normalize(value, '/')
}

function normalize(value: unknown, at: string): TreeValue {
  if (value === null) {
    return null
  }

  switch (typeof value) {
    case 'boolean':
    case 'string':
      return value
    case 'number':
      if (!Number.isFinite(value)) {
        throw new InvalidValueError(`Invalid value at '${at}': ${value} is not a finite number`)
      }
      return value
    case 'object':
      break
    default:
      throw new InvalidValueError(`Invalid value at '${at}': unsupported type '${typeof value}'`)
  }

  const base = at === '/' ? '' : at
  const entries: Array<readonly [string, TreeValue]> = []

  if (Array.isArray(value)) {
    value.forEach((item: unknown, index) => {
      entries.push([String(index), normalize(item, `${base}/${index}`)])
    })
    return mappingFromEntries(entries)
  }

  for (const [key, child] of Object.entries(value)) {
    if (!isValidKey(key)) {
      throw new InvalidValueError(`Invalid value at '${at}': key '${key}' is not a valid segment`)
    }
    entries.push([key, normalize(child, `${base}/${key}`)])
  }
  return mappingFromEntries(entries)
}

// =============================================================================
// Comparison
// =============================================================================

/**
 * Deep structural equality. Key order is not significant.
 */
export function treeEquals(a: TreeValue, b: TreeValue): boolean {
  if (a === b) {
    return true
  }
  if (!isTreeMapping(a) || !isTreeMapping(b)) {
    return false
  }

  const aKeys = Object.keys(a)
  if (aKeys.length !== Object.keys(b).length) {
    return false
  }
  return aKeys.every((key) => {
    const other = getChild(b, key)
    const mine = getChild(a, key)
    return other !== undefined && mine !== undefined && treeEquals(mine, other)
  })
}
