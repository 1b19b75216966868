/**
 * @file Replica Client
 *
 * Entry point: turns a configuration into supervised, live replicas of
 * database locations.
 *
 * @example
 * ```typescript
 * import { createReplicaClient, query, staticCredentials } from 'rtdb-replica'
 *
 * const client = createReplicaClient({
 *   databaseUrl: 'https://example-db.example.com',
 *   credentials: staticCredentials('test-secret'),
 * })
 *
 * const leaders = client.subscribe('/scores', query().orderByValue().limitToLast(10))
 * await leaders.waitForSync()
 * console.log(leaders.snapshot().value)
 *
 * for await (const event of leaders.events()) {
 *   console.log(event.kind, event.path.toString(), event.data)
 * }
 *
 * client.close()
 * ```
 *
 * @module rtdb-replica/client
 */

import { anonymousCredentials } from './auth/credentials.js'
import type { CredentialAccessor } from './auth/credentials.js'
import { resolveConfig } from './config.js'
import type { ReplicaClientConfig, ResolvedConfig } from './config.js'
import { createDebugLogger } from './logger.js'
import type { DebugLogger, DebugOption } from './logger.js'
import { Path } from './path/path.js'
import { QueryBuilder } from './query/query-spec.js'
import type { QuerySpec } from './query/query-spec.js'
import { FetchStreamTransport } from './stream/transport.js'
import type { StreamTransport } from './stream/transport.js'
import { ReplicaSession } from './sync/replica-session.js'
import { SessionSupervisor } from './sync/supervisor.js'
import type { ReplicaHandle } from './types/events.js'

// =============================================================================
// Types
// =============================================================================

/**
 * A client for one database.
 */
export interface ReplicaClient {
  /** The resolved configuration */
  readonly config: Readonly<ResolvedConfig>

  /**
   * Opens a live replica of `path`, optionally filtered by `query`.
   *
   * @param query - A built spec, or a builder (built here)
   * @throws InvalidPathError if `path` cannot be parsed
   * @throws InvalidQueryError if `query` is a builder that fails to build
   */
  subscribe(path: Path | string, query?: QuerySpec | QueryBuilder): ReplicaHandle

  /** Number of replicas that are open */
  readonly openCount: number

  /** Closes every replica opened by this client */
  close(): void
}

// =============================================================================
// Implementation
// =============================================================================

class DefaultReplicaClient implements ReplicaClient {
  readonly config: Readonly<ResolvedConfig>

  private readonly credentials: CredentialAccessor
  private readonly transport: StreamTransport
  private readonly debug: DebugOption
  private readonly log: DebugLogger
  private readonly open = new Set<SessionSupervisor>()

  constructor(config: ReplicaClientConfig) {
    this.config = Object.freeze(resolveConfig(config))
    this.credentials = config.credentials ?? anonymousCredentials()
    this.debug = config.debug
    this.transport = config.transport ?? new FetchStreamTransport({ debug: config.debug })
    this.log = createDebugLogger('ReplicaClient', config.debug)
    this.log('Client created', { endpoint: this.config.endpoint, emulator: this.config.emulator })
  }

  get openCount(): number {
    return this.open.size
  }

  subscribe(path: Path | string, query?: QuerySpec | QueryBuilder): ReplicaHandle {
    const location = Path.from(path)
    const spec = query instanceof QueryBuilder ? query.build() : query
    const config = this.config

    const supervisor = new SessionSupervisor({
      createSession: (initialValue) =>
        new ReplicaSession({
          path: location,
          query: spec,
          endpoint: config.endpoint,
          parameters: config.parameters,
          credentials: this.credentials,
          transport: this.transport,
          authMode: config.authMode,
          eventBufferSize: config.eventBufferSize,
          idleTimeoutMs: config.idleTimeoutMs,
          reconnect: config.reconnect,
          emitKeepAlive: config.emitKeepAlive,
          initialValue,
          debug: this.debug,
        }),
      retry: config.retry,
      eventBufferSize: config.eventBufferSize,
      debug: this.debug,
    })

    this.open.add(supervisor)
    supervisor.onStateChange((change) => {
      if (change.to === 'closed' || change.to === 'faulted') {
        this.open.delete(supervisor)
      }
    })

    this.log('Subscribing', { path: location.toString(), query: spec?.toWireParameters() })
    return supervisor.start()
  }

  close(): void {
    this.log('Closing client', { open: this.open.size })
    for (const supervisor of [...this.open]) {
      supervisor.close()
    }
    this.open.clear()
  }
}

/**
 * Creates a client.
 *
 * @throws InvalidConfigError if the configuration is invalid
 */
export function createReplicaClient(config: ReplicaClientConfig): ReplicaClient {
  return new DefaultReplicaClient(config)
}
