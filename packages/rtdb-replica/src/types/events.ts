/**
 * @file Change Event Types
 *
 * The typed sequence a replica publishes to its consumer, and the state and
 * snapshot types that go with it.
 *
 * Events are published in exactly the order the server sent the frames that
 * produced them. Every event carries a `path` relative to the subscription
 * root. `auth-revoked`, `cancel` and `fault` are terminal: nothing follows
 * them.
 *
 * @example
 * ```typescript
 * for await (const event of handle.events()) {
 *   switch (event.kind) {
 *     case 'put':
 *     case 'patch':
 *       render(handle.snapshot().value)
 *       break
 *     case 'cancel':
 *       showPermissionDenied(event.error.reason)
 *       break
 *   }
 * }
 * ```
 *
 * @module rtdb-replica/types/events
 */

import type {
  AccessRevokedError,
  AuthFailureError,
  RtdbError,
} from '../errors.js'
import type { Path } from '../path/path.js'
import type { TreeValue } from '../tree/tree-value.js'

// =============================================================================
// Session State
// =============================================================================

/**
 * Lifecycle state of a replica.
 *
 * - `connecting`: opening the stream, no root `put` yet
 * - `synced`: the replica mirrors the server
 * - `resyncing`: the connection was lost or the token revoked; reconnecting,
 *   serving the last known value as stale
 * - `closed`: closed by the caller
 * - `faulted`: ended by an unrecoverable error
 */
export type SessionState = 'connecting' | 'synced' | 'resyncing' | 'closed' | 'faulted'

/** States a session never leaves */
export const FINAL_STATES: ReadonlySet<SessionState> = new Set(['closed', 'faulted'])

/**
 * Point-in-time read of a replica.
 */
export interface ReplicaSnapshot {
  /** Value at the subscription root; `null` when nothing is there */
  readonly value: TreeValue
  /** `false` only while the replica is `synced` */
  readonly stale: boolean
  /** State at the time of the read */
  readonly state: SessionState
}

// =============================================================================
// Change Events
// =============================================================================

/**
 * A `patch` body after normalization: relative paths to new values, `null`
 * meaning deletion.
 */
export type PatchMapping = Readonly<Record<string, TreeValue>>

/** The subtree at `path` was replaced by `data` (`null` deleted it) */
export interface PutEvent {
  readonly kind: 'put'
  readonly path: Path
  readonly data: TreeValue
}

/** The children of `path` named in `data` were replaced */
export interface PatchEvent {
  readonly kind: 'patch'
  readonly path: Path
  readonly data: PatchMapping
}

/** The server sent a keep-alive. Only published when requested. */
export interface KeepAliveEvent {
  readonly kind: 'keep-alive'
  readonly path: Path
  readonly data: null
}

/** The token was revoked and could not be replaced */
export interface AuthRevokedEvent {
  readonly kind: 'auth-revoked'
  readonly path: Path
  readonly data: null
  readonly error: AuthFailureError | AccessRevokedError
}

/** The server revoked access to the location */
export interface CancelEvent {
  readonly kind: 'cancel'
  readonly path: Path
  readonly data: null
  readonly error: AccessRevokedError
}

/**
 * The replica ended because of a malformed stream, a protocol violation, an
 * HTTP error, or because reconnecting failed too often.
 */
export interface FaultEvent {
  readonly kind: 'fault'
  readonly path: Path
  readonly data: null
  readonly error: RtdbError
}

export type ChangeEvent =
  | PutEvent
  | PatchEvent
  | KeepAliveEvent
  | AuthRevokedEvent
  | CancelEvent
  | FaultEvent

export type TerminalEvent = AuthRevokedEvent | CancelEvent | FaultEvent

export type ChangeEventKind = ChangeEvent['kind']

// =============================================================================
// Type Guards
// =============================================================================

/**
 * Whether `event` ends the sequence.
 */
export function isTerminalEvent(event: ChangeEvent): event is TerminalEvent {
  return event.kind === 'auth-revoked' || event.kind === 'cancel' || event.kind === 'fault'
}

/**
 * Whether `event` changed the replica.
 */
export function isDataEvent(event: ChangeEvent): event is PutEvent | PatchEvent {
  return event.kind === 'put' || event.kind === 'patch'
}

// =============================================================================
// Handles
// =============================================================================

/**
 * Entry in the state history, and the payload of state listeners.
 */
export interface StateChange {
  readonly from: SessionState
  readonly to: SessionState
  /** `Date.now()` at the transition */
  readonly at: number
  readonly reason?: string
}

export type StateListener = (change: StateChange) => void

/**
 * A live view of one location, as returned by `subscribe()`.
 */
export interface ReplicaHandle {
  /** Current lifecycle state */
  readonly state: SessionState

  /** The error that ended the replica, once it is `faulted` */
  readonly failure: RtdbError | undefined

  /** Current value, tagged stale unless `synced`. Never blocks. */
  snapshot(): ReplicaSnapshot

  /**
   * Value below the subscription root, or `undefined` when absent.
   */
  snapshotAt(path: Path | string): TreeValue | undefined

  /**
   * The change event sequence. Single consumer: iterate it once.
   */
  events(): AsyncIterable<ChangeEvent>

  /**
   * Resolves on the next `synced` state (immediately if already synced).
   * Rejects with the failure if the replica faults, or if it is closed first.
   */
  waitForSync(): Promise<void>

  /**
   * @returns A function that removes the listener
   */
  onStateChange(listener: StateListener): () => void

  /**
   * Stops the replica. Idempotent; no event is published after it returns.
   */
  close(): void
}
