/**
 * @file Replica Collection Options
 *
 * Mirrors the children of a subscribed location into a TanStack DB
 * collection: each child becomes a row keyed by its child key.
 *
 * The adapter keeps its own copy of the tree, advanced event by event, so
 * every transaction it writes matches exactly one change event. For each
 * event it diffs only the top-level children the event touched and writes
 * `insert`, `update` or `delete` messages for them inside `begin()` and
 * `commit()`. The collection is marked ready after the first root `put`.
 *
 * Row shape: a mapping child becomes the mapping with its key stored under
 * `keyField`; a primitive child becomes `{ [keyField]: key, value }`. Rows
 * are parsed with the zod schema; rows that fail are reported to
 * `onInvalidRow` and left out of the collection.
 *
 * @example
 * ```typescript
 * import { createCollection } from '@tanstack/db'
 * import { z } from 'zod'
 *
 * const playerSchema = z.object({ id: z.string(), score: z.number() })
 *
 * const players = createCollection(
 *   replicaCollectionOptions({
 *     id: 'players',
 *     client,
 *     path: '/games/chess/players',
 *     schema: playerSchema,
 *   })
 * )
 * ```
 *
 * @module rtdb-replica/collection/replica-collection
 */

import type { ZodError, ZodSchema } from 'zod'
import type { ReplicaClient } from '../client.js'
import { createDebugLogger } from '../logger.js'
import type { DebugOption } from '../logger.js'
import type { Path } from '../path/path.js'
import type { QueryBuilder, QuerySpec } from '../query/query-spec.js'
import { applyPatch, applyPut } from '../tree/patch-engine.js'
import { getChild, isTreeMapping, treeEquals } from '../tree/tree-value.js'
import type { TreeValue } from '../tree/tree-value.js'
import type { ChangeMessage, SyncParams, SyncReturn } from '../types/collection.js'
import { isDataEvent, isTerminalEvent } from '../types/events.js'
import type { PatchEvent, PutEvent, TerminalEvent } from '../types/events.js'

// =============================================================================
// Types
// =============================================================================

/**
 * Configuration for {@link replicaCollectionOptions}.
 */
export interface ReplicaCollectionConfig<T extends object> {
  /** Collection id */
  id: string

  /** Client the subscription is opened on */
  client: Pick<ReplicaClient, 'subscribe'>

  /** Location whose children become rows */
  path: Path | string

  /** Optional query applied to the children */
  query?: QuerySpec | QueryBuilder

  /** Row schema */
  schema: ZodSchema<T>

  /**
   * Row property holding the child key.
   * @default 'id'
   */
  keyField?: string

  /** Called for every child that fails the schema */
  onInvalidRow?: (key: string, error: ZodError) => void

  /** Called when the subscription ends with a terminal event */
  onError?: (event: TerminalEvent) => void

  /**
   * Enable debug logging.
   * @default false
   */
  debug?: DebugOption
}

/**
 * Collection options, to pass to TanStack DB's `createCollection`.
 */
export interface ReplicaCollectionOptions<T extends object> {
  id: string
  schema: ZodSchema<T>
  getKey: (row: T) => string
  sync: {
    sync: (params: SyncParams<T>) => SyncReturn
  }
}

const DEFAULT_KEY_FIELD = 'id'

// =============================================================================
// Helpers
// =============================================================================

/**
 * Top-level children an event may have changed, or `undefined` for all of
 * them.
 */
function touchedKeys(event: PutEvent | PatchEvent): string[] | undefined {
  const first = event.path.segments[0]
  if (first !== undefined) {
    return [first]
  }
  if (event.kind === 'put') {
    return undefined
  }
  return [...new Set(Object.keys(event.data).map((key) => key.split('/')[0] ?? key))]
}

function childrenOf(tree: TreeValue): string[] {
  return isTreeMapping(tree) ? Object.keys(tree) : []
}

function childAt(tree: TreeValue, key: string): TreeValue | undefined {
  return isTreeMapping(tree) ? getChild(tree, key) : undefined
}

/**
 * Converts a child into the unvalidated row shape.
 *
 * @example
 * ```typescript
 * toRow('alice', { score: 7 }, 'id') // { score: 7, id: 'alice' }
 * toRow('bob', 4, 'id')              // { id: 'bob', value: 4 }
 * ```
 */
export function toRow(key: string, child: TreeValue, keyField: string): Record<string, unknown> {
  if (isTreeMapping(child)) {
    return { ...child, [keyField]: key }
  }
  return { [keyField]: key, value: child }
}

// =============================================================================
// Options Factory
// =============================================================================

/**
 * Creates TanStack DB collection options backed by a live replica.
 */
export function replicaCollectionOptions<T extends object>(
  config: ReplicaCollectionConfig<T>
): ReplicaCollectionOptions<T> {
  const keyField = config.keyField ?? DEFAULT_KEY_FIELD
  const log = createDebugLogger(`ReplicaCollection:${config.id}`, config.debug)

  const getKey = (row: T): string => {
    const key: unknown = Reflect.get(row, keyField)
    return typeof key === 'string' ? key : String(key)
  }

  const sync = (params: SyncParams<T>): SyncReturn => {
    const { begin, write, commit, markReady } = params
    const handle = config.client.subscribe(config.path, config.query)
    const rows = new Map<string, T>()
    let tree: TreeValue = null
    let ready = false

    const writeChild = (key: string, previous: TreeValue | undefined, next: TreeValue | undefined): void => {
      const existing = rows.get(key)

      if (next === undefined || next === null) {
        if (existing !== undefined) {
          rows.delete(key)
          write({ type: 'delete', key, value: existing })
        }
        return
      }

      if (existing !== undefined && previous !== undefined && previous !== null && treeEquals(previous, next)) {
        return
      }

      const parsed = config.schema.safeParse(toRow(key, next, keyField))
      if (!parsed.success) {
        log('Invalid row', { key, issues: parsed.error.issues.length })
        config.onInvalidRow?.(key, parsed.error)
        if (existing !== undefined) {
          rows.delete(key)
          write({ type: 'delete', key, value: existing })
        }
        return
      }

      rows.set(key, parsed.data)
      const message: ChangeMessage<T> = existing === undefined
        ? { type: 'insert', key, value: parsed.data }
        : { type: 'update', key, value: parsed.data, previousValue: existing }
      write(message)
    }

    const apply = (event: PutEvent | PatchEvent): void => {
      const previous = tree
      tree = event.kind === 'put'
        ? applyPut(tree, event.path, event.data)
        : applyPatch(tree, event.path, event.data)

      const keys = touchedKeys(event) ?? [...new Set([...rows.keys(), ...childrenOf(tree)])]

      begin()
      for (const key of keys) {
        writeChild(key, childAt(previous, key), childAt(tree, key))
      }
      commit()

      if (!ready && event.kind === 'put' && event.path.isRoot) {
        ready = true
        markReady()
        log('Collection ready', { rows: rows.size })
      }
    }

    const pump = async (): Promise<void> => {
      for await (const event of handle.events()) {
        if (isDataEvent(event)) {
          apply(event)
        } else if (isTerminalEvent(event)) {
          log('Subscription ended', { kind: event.kind, error: event.error.message })
          config.onError?.(event)
        }
      }
    }

    void pump().catch((error: unknown) => {
      log('Sync failed', { error: error instanceof Error ? error.message : String(error) })
      handle.close()
    })

    return {
      cleanup: () => {
        handle.close()
      },
    }
  }

  return {
    id: config.id,
    schema: config.schema,
    getKey,
    sync: { sync },
  }
}
