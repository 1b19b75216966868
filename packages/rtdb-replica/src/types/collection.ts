/**
 * @file TanStack DB Sync Types
 *
 * The parts of the TanStack DB sync protocol the collection adapter speaks.
 *
 * @module rtdb-replica/types/collection
 */

import type { Collection } from '@tanstack/db'

/**
 * A change message as TanStack DB expects it.
 *
 * @example
 * ```typescript
 * const message: ChangeMessage<Player> = {
 *   type: 'update',
 *   key: 'alice',
 *   value: { id: 'alice', score: 7 },
 *   previousValue: { id: 'alice', score: 5 },
 * }
 * ```
 */
export interface ChangeMessage<T> {
  /** The type of change operation */
  type: 'insert' | 'update' | 'delete'
  /** The child key of the row */
  key: string
  /** The current value of the row (the last value for deletes) */
  value: T
  /** The previous value before the change (updates only) */
  previousValue?: T
  /** Optional metadata about the change */
  metadata?: Record<string, unknown>
}

/**
 * Parameters passed to the sync function.
 *
 * @remarks
 * The sync process follows this lifecycle:
 * 1. Call `begin()` to start a transaction
 * 2. Call `write()` for each change to apply
 * 3. Call `commit()` to finalize the transaction
 * 4. Call `markReady()` when the initial data is in
 */
export interface SyncParams<T extends object> {
  /** The collection being synced */
  collection: Collection<T>

  /** Begin a sync transaction */
  begin: () => void

  /** Write a change message to the collection */
  write: (change: ChangeMessage<T>) => void

  /** Commit the sync transaction */
  commit: () => void

  /** Mark the initial sync as complete */
  markReady: () => void
}

/**
 * Return type from sync function.
 */
export interface SyncReturn {
  /**
   * Stops syncing and releases the subscription.
   */
  cleanup: () => void
}
