/**
 * @file Session Supervisor
 *
 * Replaces a {@link ReplicaSession} that faulted for a recoverable reason
 * with a brand-new one, after an exponential backoff. A new session always
 * starts from a full sync; nothing is resumed mid-stream.
 *
 * The supervisor is itself a {@link ReplicaHandle}: its consumer sees one
 * uninterrupted event sequence across sessions. Faults that led to a retry
 * are not published; the final terminal event is. Between sessions the last
 * known value is served as stale.
 *
 * @example
 * ```typescript
 * const supervisor = new SessionSupervisor({
 *   createSession: (initialValue) => new ReplicaSession({ ...options, initialValue }),
 *   retry: { maxRetries: Infinity, baseDelayMs: 1000, maxDelayMs: 30000, jitterFactor: 0.1 },
 * }).start()
 *
 * for await (const event of supervisor.events()) {
 *   render(supervisor.snapshot())
 * }
 * ```
 *
 * @module rtdb-replica/sync/supervisor
 */

import { isRecoverableError } from '../errors.js'
import type { RtdbError } from '../errors.js'
import { createDebugLogger } from '../logger.js'
import type { DebugLogger, DebugOption } from '../logger.js'
import { Path } from '../path/path.js'
import { readAt } from '../tree/patch-engine.js'
import type { TreeValue } from '../tree/tree-value.js'
import { isTerminalEvent } from '../types/events.js'
import type {
  ChangeEvent,
  ReplicaHandle,
  ReplicaSnapshot,
  SessionState,
  StateChange,
  StateListener,
  TerminalEvent,
} from '../types/events.js'
import { calculateDelay, sleep } from './backoff.js'
import type { BackoffPolicy } from './backoff.js'
import { EventChannel } from './event-channel.js'
import { DEFAULT_EVENT_BUFFER_SIZE } from './replica-session.js'
import { SessionStateMachine } from './session-state.js'

// =============================================================================
// Types
// =============================================================================

/**
 * Retry policy for replacing faulted sessions.
 */
export interface RetryPolicy extends BackoffPolicy {
  /**
   * Replacement sessions allowed in a row; `Infinity` retries forever. The
   * count resets whenever a session reaches `synced`.
   */
  maxRetries: number
}

/**
 * A session the supervisor can run: a handle that starts on demand.
 */
export interface SupervisedSession extends ReplicaHandle {
  start(): SupervisedSession
}

/**
 * Configuration for {@link SessionSupervisor}.
 */
export interface SessionSupervisorOptions {
  /**
   * Creates an unstarted session that serves `initialValue` (as stale)
   * until it syncs.
   */
  createSession: (initialValue: TreeValue) => SupervisedSession

  /** @default { maxRetries: 5, baseDelayMs: 1000, maxDelayMs: 30000, jitterFactor: 0.1 } */
  retry?: Partial<RetryPolicy>

  /**
   * Decides whether a terminal event may be retried.
   * @default fault events whose error is recoverable
   */
  shouldRetry?: (event: TerminalEvent) => boolean

  /**
   * Capacity of the supervisor's own event channel.
   * @default 64
   */
  eventBufferSize?: number

  /**
   * Enable debug logging.
   * @default false
   */
  debug?: DebugOption
}

/**
 * Supervisor counters.
 */
export interface SupervisorStats {
  /** Sessions created, the first one included */
  sessionsCreated: number
  /** Recovered faults */
  retries: number
  /** Consecutive retries since the last `synced` */
  consecutiveRetries: number
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 5,
  baseDelayMs: 1_000,
  maxDelayMs: 30_000,
  jitterFactor: 0.1,
}

function defaultShouldRetry(event: TerminalEvent): boolean {
  return event.kind === 'fault' && isRecoverableError(event.error)
}

// =============================================================================
// SessionSupervisor
// =============================================================================

export class SessionSupervisor implements ReplicaHandle {
  private readonly options: SessionSupervisorOptions
  private readonly policy: RetryPolicy
  private readonly shouldRetry: (event: TerminalEvent) => boolean
  private readonly log: DebugLogger
  private readonly machine: SessionStateMachine
  private readonly channel: EventChannel<ChangeEvent>
  private readonly lifetime = new AbortController()

  private session: SupervisedSession | undefined
  private detachSession: (() => void) | undefined
  /** Last value of a finished session, served between sessions */
  private lastValue: TreeValue = null
  private task: Promise<void> | undefined
  private closedByCaller = false
  private stats: SupervisorStats = { sessionsCreated: 0, retries: 0, consecutiveRetries: 0 }

  constructor(options: SessionSupervisorOptions) {
    this.options = options
    this.policy = { ...DEFAULT_RETRY_POLICY, ...options.retry }
    this.shouldRetry = options.shouldRetry ?? defaultShouldRetry
    this.log = createDebugLogger('SessionSupervisor', options.debug)
    this.machine = new SessionStateMachine(this.log)
    this.channel = new EventChannel(options.eventBufferSize ?? DEFAULT_EVENT_BUFFER_SIZE)
  }

  // ===========================================================================
  // Public API
  // ===========================================================================

  /**
   * Starts the first session. Idempotent.
   */
  start(): this {
    if (!this.task && !this.machine.isFinal) {
      this.task = this.run()
    }
    return this
  }

  /** Settles when supervision has ended. Never rejects. */
  get finished(): Promise<void> {
    return this.task ?? Promise.resolve()
  }

  get state(): SessionState {
    return this.machine.state
  }

  get failure(): RtdbError | undefined {
    return this.machine.failure
  }

  snapshot(): ReplicaSnapshot {
    const state = this.machine.state
    const value = this.session ? this.session.snapshot().value : this.lastValue
    return { value, stale: state !== 'synced', state }
  }

  snapshotAt(path: Path | string): TreeValue | undefined {
    return readAt(this.snapshot().value, Path.from(path))
  }

  events(): AsyncIterable<ChangeEvent> {
    return this.channel
  }

  waitForSync(): Promise<void> {
    return this.machine.waitForSync()
  }

  onStateChange(listener: StateListener): () => void {
    return this.machine.onStateChange(listener)
  }

  getHistory(): StateChange[] {
    return this.machine.getHistory()
  }

  getStats(): SupervisorStats {
    return { ...this.stats }
  }

  close(): void {
    if (this.closedByCaller) {
      return
    }
    this.closedByCaller = true
    this.log('Closing supervisor')

    this.machine.transition('closed', 'closed by caller')
    this.channel.close()
    this.lifetime.abort()
    this.session?.close()
  }

  // ===========================================================================
  // Supervision Loop
  // ===========================================================================

  private async run(): Promise<void> {
    while (!this.closedByCaller) {
      const terminal = await this.runSession()
      if (terminal === undefined || this.closedByCaller) {
        return
      }

      const retries = this.stats.consecutiveRetries
      if (!this.shouldRetry(terminal) || retries >= this.policy.maxRetries) {
        this.log('Giving up', { kind: terminal.kind, error: terminal.error.message, retries })
        await this.finish(terminal)
        return
      }

      this.machine.transition('resyncing', terminal.error.message)
      const delay = calculateDelay(retries, this.policy)
      this.stats.retries++
      this.stats.consecutiveRetries++
      this.log('Replacing session', { attempt: this.stats.consecutiveRetries, delay, error: terminal.error.message })

      if (!(await sleep(delay, this.lifetime.signal))) {
        return
      }
    }
  }

  /**
   * Runs one session to its end, forwarding its events.
   *
   * @returns The terminal event, or `undefined` if the session was closed
   */
  private async runSession(): Promise<TerminalEvent | undefined> {
    const session = this.options.createSession(this.lastValue)
    this.session = session
    this.stats.sessionsCreated++
    this.detachSession = session.onStateChange((change) => this.followSession(change))
    session.start()

    let terminal: TerminalEvent | undefined
    try {
      for await (const event of session.events()) {
        if (isTerminalEvent(event)) {
          terminal = event
          break
        }
        await this.channel.waitForCapacity()
        this.channel.offer(event)
      }
    } finally {
      this.lastValue = session.snapshot().value
      this.detachSession?.()
      this.detachSession = undefined
      this.session = undefined
      session.close()
    }

    if (terminal === undefined && !this.closedByCaller && session.failure !== undefined) {
      // Sequence ended without publishing its terminal event
      return { kind: 'fault', path: Path.root, data: null, error: session.failure }
    }
    return terminal
  }

  private followSession(change: StateChange): void {
    switch (change.to) {
      case 'synced':
        this.stats.consecutiveRetries = 0
        this.machine.transition('synced', change.reason)
        break
      case 'resyncing':
      case 'faulted':
        // The terminal event may still be queued behind a slow consumer
        this.machine.transition('resyncing', change.reason)
        break
      default:
        break
    }
  }

  private async finish(event: TerminalEvent): Promise<void> {
    this.machine.transition('faulted', event.error.message, event.error)
    this.lifetime.abort()
    await this.channel.waitForCapacity()
    this.channel.offer(event)
    this.channel.close()
  }
}
