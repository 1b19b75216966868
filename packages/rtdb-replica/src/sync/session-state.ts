/**
 * Session State Machine
 *
 * Tracks the lifecycle of a replica: the allowed transitions, a bounded
 * history, state listeners and `waitForSync()` waiters. Shared by
 * {@link ReplicaSession} and {@link SessionSupervisor}.
 *
 * ```
 * connecting ──▶ synced ◀──▶ resyncing
 *      │            │            │
 *      └────────────┴────────────┴──▶ closed | faulted
 * ```
 *
 * @module rtdb-replica/sync/session-state
 */

import { RtdbError } from '../errors.js'
import type { DebugLogger } from '../logger.js'
import { FINAL_STATES } from '../types/events.js'
import type {
  SessionState,
  StateChange,
  StateListener,
} from '../types/events.js'

// ============================================================================
// State Transitions
// ============================================================================

/**
 * Allowed target states for every state.
 */
const TRANSITIONS: Record<SessionState, readonly SessionState[]> = {
  connecting: ['synced', 'resyncing', 'closed', 'faulted'],
  synced: ['resyncing', 'closed', 'faulted'],
  resyncing: ['synced', 'closed', 'faulted'],
  closed: [],
  faulted: [],
}

/** Default history size */
const DEFAULT_HISTORY_SIZE = 50

interface SyncWaiter {
  resolve: () => void
  reject: (error: RtdbError) => void
}

// ============================================================================
// SessionStateMachine
// ============================================================================

/**
 * @example
 * ```typescript
 * const machine = new SessionStateMachine(log)
 * machine.onStateChange(({ from, to }) => console.log(`${from} -> ${to}`))
 * machine.transition('synced', 'initial put')
 * ```
 */
export class SessionStateMachine {
  private _state: SessionState = 'connecting'
  private _failure: RtdbError | undefined
  private history: StateChange[] = []
  private readonly listeners = new Set<StateListener>()
  private syncWaiters: SyncWaiter[] = []
  private readonly historySize: number
  private readonly log: DebugLogger

  constructor(log: DebugLogger, historySize = DEFAULT_HISTORY_SIZE) {
    this.log = log
    this.historySize = historySize
  }

  get state(): SessionState {
    return this._state
  }

  /** The error that moved the machine to `faulted` */
  get failure(): RtdbError | undefined {
    return this._failure
  }

  get isFinal(): boolean {
    return FINAL_STATES.has(this._state)
  }

  canTransition(to: SessionState): boolean {
    return TRANSITIONS[this._state].includes(to)
  }

  /**
   * Moves to `to`. Staying in the current state is a no-op.
   *
   * @param failure - Recorded when moving to `faulted`
   * @returns Whether the state changed
   */
  transition(to: SessionState, reason?: string, failure?: RtdbError): boolean {
    const from = this._state
    if (from === to) {
      return false
    }
    if (!this.canTransition(to)) {
      this.log('Ignored invalid transition', { from, to, reason })
      return false
    }

    this._state = to
    if (to === 'faulted') {
      this._failure = failure
    }

    const change: StateChange = reason === undefined
      ? { from, to, at: Date.now() }
      : { from, to, at: Date.now(), reason }
    this.record(change)
    this.log('State transition', { from, to, reason })

    this.settleWaiters()
    for (const listener of [...this.listeners]) {
      try {
        listener(change)
      } catch (error) {
        this.log('State listener threw', {
          error: error instanceof Error ? error.message : String(error),
        })
      }
    }
    return true
  }

  /**
   * @returns A function that removes the listener
   */
  onStateChange(listener: StateListener): () => void {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  /**
   * Transitions, newest first.
   */
  getHistory(): StateChange[] {
    return [...this.history]
  }

  /**
   * Resolves when the machine is `synced`; rejects once it is final.
   */
  waitForSync(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.syncWaiters.push({ resolve, reject })
      this.settleWaiters()
    })
  }

  private settleWaiters(): void {
    if (this.syncWaiters.length === 0) {
      return
    }

    let outcome: (waiter: SyncWaiter) => void
    if (this._state === 'synced') {
      outcome = (waiter) => waiter.resolve()
    } else if (this._state === 'faulted') {
      const error = this._failure ?? new RtdbError('Replica faulted before it synced')
      outcome = (waiter) => waiter.reject(error)
    } else if (this._state === 'closed') {
      const error = new RtdbError('Replica closed before it synced')
      outcome = (waiter) => waiter.reject(error)
    } else {
      return
    }

    const waiters = this.syncWaiters
    this.syncWaiters = []
    waiters.forEach(outcome)
  }

  private record(change: StateChange): void {
    if (this.historySize === 0) return

    this.history.unshift(change)
    if (this.history.length > this.historySize) {
      this.history.length = this.historySize
    }
  }
}
