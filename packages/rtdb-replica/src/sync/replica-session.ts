/**
 * @file Replica Session
 *
 * One long-lived push-event connection for a (path, query) pair, and the
 * replica it keeps.
 *
 * The session runs a single task that opens the stream, decodes frames,
 * applies `put` and `patch` deltas to an immutable tree, and publishes a
 * {@link ChangeEvent} for each of them through a bounded {@link EventChannel}.
 * The tree reference is swapped in the same synchronous step that publishes
 * the event, so `snapshot()` never observes a delta whose event was not
 * published.
 *
 * Recovery inside a session:
 * - connection loss (I/O error, server close, idle timeout, 429/5xx):
 *   `resyncing`, reconnect with backoff, the tree is served stale until the
 *   next root `put` replaces it
 * - `auth_revoked` or HTTP 401: `resyncing`, refresh the token, reconnect
 *
 * Everything else ends the session with a terminal event, after which the
 * event sequence completes.
 *
 * @example
 * ```typescript
 * const session = new ReplicaSession({
 *   path: Path.parse('/scores'),
 *   endpoint: 'https://example-db.example.com',
 *   credentials: staticCredentials('test-secret'),
 *   transport: new FetchStreamTransport(),
 * }).start()
 *
 * await session.waitForSync()
 * console.log(session.snapshot()) // { value: {...}, stale: false, state: 'synced' }
 *
 * for await (const event of session.events()) {
 *   console.log(event.kind, event.path.toString())
 * }
 * ```
 *
 * @module rtdb-replica/sync/replica-session
 */

import { z } from 'zod'
import type { CredentialAccessor } from '../auth/credentials.js'
import {
  AccessRevokedError,
  AuthFailureError,
  ConnectionError,
  HttpStatusError,
  InvalidPathError,
  InvalidValueError,
  MalformedFrameError,
  ProtocolViolationError,
  RtdbError,
  toRtdbError,
} from '../errors.js'
import { createDebugLogger } from '../logger.js'
import type { DebugLogger, DebugOption } from '../logger.js'
import { Path } from '../path/path.js'
import type { QuerySpec } from '../query/query-spec.js'
import { FrameDecoder } from '../stream/frame-decoder.js'
import type { Frame } from '../stream/frame-decoder.js'
import { buildStreamUrl, redactUrl } from '../stream/transport.js'
import type { StreamTransport } from '../stream/transport.js'
import { applyPatch, applyPut, readAt } from '../tree/patch-engine.js'
import { toTreeValue } from '../tree/tree-value.js'
import type { TreeValue } from '../tree/tree-value.js'
import type {
  ChangeEvent,
  PatchMapping,
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
import { SessionStateMachine } from './session-state.js'

// =============================================================================
// Types
// =============================================================================

/**
 * Reconnect policy for connection loss inside one session.
 */
export interface ReconnectPolicy extends BackoffPolicy {
  /**
   * Consecutive failed connections tolerated before the session faults.
   * The count resets whenever a connection reaches `synced`.
   */
  maxAttempts: number
}

/**
 * How the bearer token travels.
 *
 * - `header`: `Authorization: Bearer <token>`
 * - `query`: `auth=<token>` query parameter
 */
export type AuthMode = 'header' | 'query'

/**
 * Configuration for {@link ReplicaSession}.
 */
export interface ReplicaSessionOptions {
  /** Subscription root */
  path: Path

  /** Optional ordering/bounding/limiting constraints */
  query?: QuerySpec

  /** Base endpoint, e.g. `https://example-db.example.com` */
  endpoint: string

  /** Token source, shared with other sessions */
  credentials: CredentialAccessor

  /** Opens push-event connections */
  transport: StreamTransport

  /**
   * Extra query parameters sent with every request (e.g. `ns` for the
   * emulator).
   */
  parameters?: Record<string, string>

  /** @default 'header' */
  authMode?: AuthMode

  /**
   * Capacity of the event channel. When it is full the session stops
   * reading until the consumer catches up.
   * @default 64
   */
  eventBufferSize?: number

  /**
   * A connection that delivers no bytes for this long is treated as lost.
   * `0` disables the watchdog. The server sends keep-alives every 30s.
   * @default 90000
   */
  idleTimeoutMs?: number

  /** @default { maxAttempts: 3, baseDelayMs: 250, maxDelayMs: 5000 } */
  reconnect?: Partial<ReconnectPolicy>

  /**
   * Publish `keep-alive` events.
   * @default false
   */
  emitKeepAlive?: boolean

  /**
   * Value served (as stale) until the first root `put`.
   * @default null
   */
  initialValue?: TreeValue

  /**
   * Enable debug logging.
   * @default false
   */
  debug?: DebugOption
}

/**
 * Result of one connection attempt.
 */
type ConnectionOutcome =
  | { readonly type: 'closed' }
  | { readonly type: 'lost'; readonly error: RtdbError }
  | { readonly type: 'auth-revoked'; readonly reason?: string }
  | { readonly type: 'terminal'; readonly event: TerminalEvent }

interface Connection {
  readonly controller: AbortController
  idleTimer: ReturnType<typeof setTimeout> | undefined
  idle: boolean
  /** A root `put` arrived on this connection */
  synced: boolean
}

// =============================================================================
// Defaults and Payload Schemas
// =============================================================================

export const DEFAULT_EVENT_BUFFER_SIZE = 64
export const DEFAULT_IDLE_TIMEOUT_MS = 90_000
export const DEFAULT_RECONNECT_POLICY: ReconnectPolicy = {
  maxAttempts: 3,
  baseDelayMs: 250,
  maxDelayMs: 5_000,
  jitterFactor: 0,
}

const putPayloadSchema = z.object({
  path: z.string(),
  data: z.unknown(),
})

const patchPayloadSchema = z.object({
  path: z.string(),
  data: z.record(z.unknown()),
})

function faultOutcome(error: RtdbError): ConnectionOutcome {
  return { type: 'terminal', event: { kind: 'fault', path: Path.root, data: null, error } }
}

function cancelOutcome(error: AccessRevokedError): ConnectionOutcome {
  return { type: 'terminal', event: { kind: 'cancel', path: Path.root, data: null, error } }
}

function authOutcome(error: AuthFailureError | AccessRevokedError): ConnectionOutcome {
  return { type: 'terminal', event: { kind: 'auth-revoked', path: Path.root, data: null, error } }
}

// =============================================================================
// ReplicaSession
// =============================================================================

export class ReplicaSession implements ReplicaHandle {
  readonly path: Path
  readonly query: QuerySpec | undefined

  private readonly options: ReplicaSessionOptions
  private readonly reconnectPolicy: ReconnectPolicy
  private readonly idleTimeoutMs: number
  private readonly log: DebugLogger
  private readonly machine: SessionStateMachine
  private readonly channel: EventChannel<ChangeEvent>
  private readonly lifetime = new AbortController()

  private tree: TreeValue
  private connection: Connection | undefined
  private task: Promise<void> | undefined
  private closedByCaller = false
  private consecutiveFailures = 0
  private refreshedSinceSync = false
  private connectionCount = 0

  constructor(options: ReplicaSessionOptions) {
    this.options = options
    this.path = options.path
    this.query = options.query
    this.tree = options.initialValue ?? null
    this.idleTimeoutMs = options.idleTimeoutMs ?? DEFAULT_IDLE_TIMEOUT_MS
    this.reconnectPolicy = { ...DEFAULT_RECONNECT_POLICY, ...options.reconnect }
    this.log = createDebugLogger('ReplicaSession', options.debug)
    this.machine = new SessionStateMachine(this.log)
    this.channel = new EventChannel(options.eventBufferSize ?? DEFAULT_EVENT_BUFFER_SIZE)
  }

  // ===========================================================================
  // Public API
  // ===========================================================================

  /**
   * Starts the session task. Idempotent.
   */
  start(): this {
    if (!this.task && !this.machine.isFinal) {
      this.task = this.run()
    }
    return this
  }

  /**
   * Settles when the session task has finished (after a close or a terminal
   * event). Never rejects.
   */
  get finished(): Promise<void> {
    return this.task ?? Promise.resolve()
  }

  get state(): SessionState {
    return this.machine.state
  }

  get failure(): RtdbError | undefined {
    return this.machine.failure
  }

  /** Number of connections opened so far */
  get connections(): number {
    return this.connectionCount
  }

  snapshot(): ReplicaSnapshot {
    const state = this.machine.state
    return { value: this.tree, stale: state !== 'synced', state }
  }

  snapshotAt(path: Path | string): TreeValue | undefined {
    return readAt(this.tree, Path.from(path))
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

  close(): void {
    if (this.closedByCaller) {
      return
    }
    this.closedByCaller = true
    this.log('Closing session', { path: this.path.toString() })

    this.machine.transition('closed', 'closed by caller')
    this.channel.close()
    this.lifetime.abort()
    this.connection?.controller.abort()
  }

  // ===========================================================================
  // Session Task
  // ===========================================================================

  private async run(): Promise<void> {
    this.log('Session started', { path: this.path.toString() })
    try {
      await this.loop()
    } catch (error) {
      // Bugs in the loop itself still end the sequence cleanly
      await this.fail({ kind: 'fault', path: Path.root, data: null, error: toRtdbError(error) })
    }
    this.log('Session finished', { path: this.path.toString(), state: this.machine.state })
  }

  private async loop(): Promise<void> {
    while (!this.closedByCaller) {
      const outcome = await this.connect()

      switch (outcome.type) {
        case 'closed':
          return

        case 'terminal':
          await this.fail(outcome.event)
          return

        case 'auth-revoked': {
          if (this.closedByCaller) return
          if (this.refreshedSinceSync) {
            await this.fail({
              kind: 'auth-revoked',
              path: Path.root,
              data: null,
              error: new AccessRevokedError('Token rejected again after a refresh', {
                reason: outcome.reason,
              }),
            })
            return
          }

          this.machine.transition('resyncing', 'auth revoked')
          let refreshFailure: AuthFailureError | undefined
          try {
            await this.options.credentials.refresh()
          } catch (error) {
            refreshFailure = error instanceof AuthFailureError
              ? error
              : new AuthFailureError('Token refresh failed', {
                  cause: error instanceof Error ? error : undefined,
                })
          }
          if (this.closedByCaller) return
          if (refreshFailure) {
            await this.fail({ kind: 'auth-revoked', path: Path.root, data: null, error: refreshFailure })
            return
          }
          this.refreshedSinceSync = true
          this.log('Token refreshed, reconnecting')
          break
        }

        case 'lost': {
          if (this.closedByCaller) return
          this.machine.transition('resyncing', outcome.error.message)

          if (this.consecutiveFailures >= this.reconnectPolicy.maxAttempts) {
            await this.fail({
              kind: 'fault',
              path: Path.root,
              data: null,
              error: new ConnectionError(
                `Connection lost ${this.consecutiveFailures + 1} times in a row: ${outcome.error.message}`,
                { cause: outcome.error }
              ),
            })
            return
          }

          const delay = calculateDelay(this.consecutiveFailures, this.reconnectPolicy)
          this.consecutiveFailures++
          this.log('Reconnecting', { attempt: this.consecutiveFailures, delay })
          if (!(await sleep(delay, this.lifetime.signal))) {
            return
          }
          break
        }
      }
    }
  }

  /**
   * Opens one connection and consumes it until it ends.
   */
  private async connect(): Promise<ConnectionOutcome> {
    const connection: Connection = {
      controller: new AbortController(),
      idleTimer: undefined,
      idle: false,
      synced: false,
    }
    this.connection = connection
    this.connectionCount++

    try {
      let token: string | undefined
      try {
        token = await this.options.credentials.currentToken()
      } catch (error) {
        return authOutcome(new AuthFailureError('Could not read the current token', {
          cause: error instanceof Error ? error : undefined,
        }))
      }
      if (this.closedByCaller) {
        return { type: 'closed' }
      }

      const { url, headers } = this.buildRequest(token)
      this.log('Connecting', { url: redactUrl(url), connection: this.connectionCount })

      let body: AsyncIterable<Uint8Array>
      this.armWatchdog(connection)
      try {
        body = await this.options.transport.open({
          url,
          headers,
          signal: connection.controller.signal,
        })
      } catch (error) {
        if (this.closedByCaller) {
          return { type: 'closed' }
        }
        if (connection.idle) {
          return { type: 'lost', error: this.idleError() }
        }
        return this.classifyOpenError(error)
      }

      return await this.consume(connection, body)
    } finally {
      this.disarmWatchdog(connection)
      connection.controller.abort()
      if (this.connection === connection) {
        this.connection = undefined
      }
    }
  }

  private async consume(connection: Connection, body: AsyncIterable<Uint8Array>): Promise<ConnectionOutcome> {
    const decoder = new FrameDecoder()
    this.armWatchdog(connection)

    try {
      for await (const chunk of body) {
        if (connection.controller.signal.aborted) {
          break
        }
        this.armWatchdog(connection)

        for (const frame of decoder.feed(chunk)) {
          if (connection.controller.signal.aborted) {
            break
          }
          const outcome = await this.handleFrame(connection, frame)
          if (outcome) {
            return outcome
          }
        }
      }
      if (!connection.controller.signal.aborted) {
        decoder.end()
      }
    } catch (error) {
      if (this.closedByCaller) {
        return { type: 'closed' }
      }
      if (connection.idle) {
        return { type: 'lost', error: this.idleError() }
      }
      if (error instanceof MalformedFrameError) {
        return faultOutcome(error)
      }
      const failure = toRtdbError(error)
      return failure.retryable
        ? { type: 'lost', error: failure }
        : faultOutcome(failure)
    }

    if (this.closedByCaller) {
      return { type: 'closed' }
    }
    if (connection.idle) {
      return { type: 'lost', error: this.idleError() }
    }
    return { type: 'lost', error: new ConnectionError('Server closed the stream') }
  }

  // ===========================================================================
  // Frame Handling
  // ===========================================================================

  /**
   * @returns An outcome when the frame ends the connection
   */
  private async handleFrame(connection: Connection, frame: Frame): Promise<ConnectionOutcome | undefined> {
    switch (frame.event) {
      case 'put':
        return this.handlePut(connection, frame)

      case 'patch':
        return this.handlePatch(connection, frame)

      case 'keep-alive':
        if (this.options.emitKeepAlive) {
          return this.publish(() => ({ kind: 'keep-alive', path: Path.root, data: null }))
        }
        return undefined

      case 'auth_revoked':
        this.log('Server revoked the token', { reason: frame.data })
        return {
          type: 'auth-revoked',
          reason: typeof frame.data === 'string' ? frame.data : undefined,
        }

      case 'cancel': {
        const reason = typeof frame.data === 'string' ? frame.data : undefined
        this.log('Server cancelled the subscription', { reason })
        return cancelOutcome(new AccessRevokedError(
          `Access to '${this.path.toString()}' was revoked${reason ? `: ${reason}` : ''}`,
          { reason }
        ))
      }

      default:
        this.log('Ignoring unknown event', { event: frame.event })
        return undefined
    }
  }

  private async handlePut(connection: Connection, frame: Frame): Promise<ConnectionOutcome | undefined> {
    const parsed = putPayloadSchema.safeParse(frame.data)
    if (!parsed.success) {
      return this.violation(frame, 'put payload must be { path: string, data }', parsed.error)
    }

    let path: Path
    let value: TreeValue
    try {
      path = Path.parse(parsed.data.path)
      value = toTreeValue(parsed.data.data)
    } catch (error) {
      return this.rejectPayload(frame, error)
    }

    if (!connection.synced && !path.isRoot) {
      return this.violation(frame, `put at '${path.toString()}' arrived before the initial root put`)
    }

    return this.publish(() => {
      if (path.isRoot) {
        this.tree = value
        if (!connection.synced) {
          connection.synced = true
          this.consecutiveFailures = 0
          this.refreshedSinceSync = false
          this.machine.transition('synced', 'root put')
        }
      } else {
        this.tree = applyPut(this.tree, path, value)
      }
      return { kind: 'put', path, data: value }
    })
  }

  private async handlePatch(connection: Connection, frame: Frame): Promise<ConnectionOutcome | undefined> {
    const parsed = patchPayloadSchema.safeParse(frame.data)
    if (!parsed.success) {
      return this.violation(frame, 'patch payload must be { path: string, data: object }', parsed.error)
    }

    let path: Path
    let data: PatchMapping
    try {
      path = Path.parse(parsed.data.path)
      data = Object.freeze(Object.fromEntries(
        Object.entries(parsed.data.data).map(([key, child]): [string, TreeValue] => {
          Path.parse(key)
          return [key, toTreeValue(child)]
        })
      ))
    } catch (error) {
      return this.rejectPayload(frame, error)
    }

    if (!connection.synced) {
      return this.violation(frame, `patch at '${path.toString()}' arrived before the initial root put`)
    }

    return this.publish(() => {
      this.tree = applyPatch(this.tree, path, data)
      return { kind: 'patch', path, data }
    })
  }

  /**
   * Waits for room in the channel, then applies the delta and publishes its
   * event in one synchronous step.
   */
  private async publish(apply: () => ChangeEvent): Promise<ConnectionOutcome | undefined> {
    if (!this.channel.hasCapacity()) {
      // Stalled by the consumer, not by the server
      this.disarmWatchdog(this.connection)
      await this.channel.waitForCapacity()
      if (this.connection) {
        this.armWatchdog(this.connection)
      }
    }

    if (this.closedByCaller) {
      return { type: 'closed' }
    }

    this.channel.offer(apply())
    return undefined
  }

  private violation(frame: Frame, message: string, cause?: Error): ConnectionOutcome {
    return faultOutcome(new ProtocolViolationError(
      `Invalid '${frame.event}' frame: ${message}`,
      { event: frame.event, cause }
    ))
  }

  private rejectPayload(frame: Frame, error: unknown): ConnectionOutcome {
    if (error instanceof InvalidPathError || error instanceof InvalidValueError) {
      return this.violation(frame, error.message, error)
    }
    throw error
  }

  // ===========================================================================
  // Termination
  // ===========================================================================

  /**
   * Moves to `faulted`, publishes the terminal event and completes the
   * sequence.
   */
  private async fail(event: TerminalEvent): Promise<void> {
    if (this.closedByCaller || this.machine.isFinal) {
      return
    }
    this.log('Session faulted', { kind: event.kind, error: event.error.message })
    this.machine.transition('faulted', event.error.message, event.error)
    this.lifetime.abort()

    await this.channel.waitForCapacity()
    this.channel.offer(event)
    this.channel.close()
  }

  // ===========================================================================
  // Helpers
  // ===========================================================================

  private buildRequest(token: string | undefined): { url: string; headers: Record<string, string> } {
    const parameters: Record<string, string> = {
      ...this.options.parameters,
      ...this.query?.toWireParameters(),
    }
    const headers: Record<string, string> = {}

    if (token !== undefined) {
      if (this.options.authMode === 'query') {
        parameters['auth'] = token
      } else {
        headers['Authorization'] = `Bearer ${token}`
      }
    }

    return { url: buildStreamUrl(this.options.endpoint, this.path, parameters), headers }
  }

  private classifyOpenError(error: unknown): ConnectionOutcome {
    if (error instanceof HttpStatusError) {
      if (error.status === 401) {
        return { type: 'auth-revoked', reason: error.message }
      }
      if (error.status === 403) {
        return cancelOutcome(new AccessRevokedError(
          `Access to '${this.path.toString()}' was denied`,
          { reason: error.statusText, cause: error }
        ))
      }
      return error.retryable ? { type: 'lost', error } : faultOutcome(error)
    }

    const failure = toRtdbError(error)
    return failure.retryable ? { type: 'lost', error: failure } : faultOutcome(failure)
  }

  private idleError(): ConnectionError {
    return new ConnectionError(`No data received for ${this.idleTimeoutMs}ms`)
  }

  private armWatchdog(connection: Connection): void {
    this.disarmWatchdog(connection)
    if (this.idleTimeoutMs <= 0) {
      return
    }
    connection.idleTimer = setTimeout(() => {
      this.log('Connection idle, aborting', { idleTimeoutMs: this.idleTimeoutMs })
      connection.idle = true
      connection.controller.abort()
    }, this.idleTimeoutMs)
  }

  private disarmWatchdog(connection: Connection | undefined): void {
    if (connection?.idleTimer !== undefined) {
      clearTimeout(connection.idleTimer)
      connection.idleTimer = undefined
    }
  }
}
