/**
 * @file Client Configuration
 *
 * Validates the client configuration with zod, fills in defaults and works
 * out the streaming endpoint, including the local emulator override.
 *
 * Endpoint resolution:
 * - `emulatorHost` (or `FIREBASE_DATABASE_EMULATOR_HOST` in the environment)
 *   set: `http://<emulatorHost>`, with the `ns` query parameter naming the
 *   database (`namespace`, or the first label of the `databaseUrl` host)
 * - otherwise: `databaseUrl`, plus `ns` when `namespace` is given
 *
 * @module rtdb-replica/config
 */

import { z } from 'zod'
import type { CredentialAccessor } from './auth/credentials.js'
import { InvalidConfigError } from './errors.js'
import type { DebugOption } from './logger.js'
import type { StreamTransport } from './stream/transport.js'
import type { AuthMode, ReconnectPolicy } from './sync/replica-session.js'
import type { RetryPolicy } from './sync/supervisor.js'

// =============================================================================
// Configuration Types
// =============================================================================

/**
 * Configuration for `createReplicaClient()`.
 *
 * @example
 * ```typescript
 * const config: ReplicaClientConfig = {
 *   databaseUrl: 'https://example-db.example.com',
 *   credentials: staticCredentials('test-secret'),
 *   retry: { maxRetries: Infinity },
 * }
 * ```
 */
export interface ReplicaClientConfig {
  /** Database URL, e.g. `https://example-db.example.com` */
  databaseUrl?: string

  /** Database name sent as the `ns` query parameter */
  namespace?: string

  /** `host:port` of a local emulator */
  emulatorHost?: string

  /** Token source. Defaults to unauthenticated access. */
  credentials?: CredentialAccessor

  /** Defaults to a `fetch`-based transport */
  transport?: StreamTransport

  /** @default 'header' */
  authMode?: AuthMode

  /** @default 64 */
  eventBufferSize?: number

  /** @default 90000 */
  idleTimeoutMs?: number

  /** @default false */
  emitKeepAlive?: boolean

  /** In-session reconnects. @default { maxAttempts: 3, baseDelayMs: 250, maxDelayMs: 5000 } */
  reconnect?: Partial<ReconnectPolicy>

  /** Session replacement. @default { maxRetries: 5, baseDelayMs: 1000, maxDelayMs: 30000, jitterFactor: 0.1 } */
  retry?: Partial<RetryPolicy>

  /** Enable debug logging */
  debug?: DebugOption

  /** Environment read for the emulator override. @default process.env */
  env?: Readonly<Record<string, string | undefined>>
}

/**
 * Configuration after validation and defaulting.
 */
export interface ResolvedConfig {
  /** Base URL requests are built on, without a trailing slash */
  endpoint: string
  /** Query parameters added to every request */
  parameters: Record<string, string>
  /** Whether the emulator override is in effect */
  emulator: boolean
  authMode: AuthMode
  eventBufferSize: number
  idleTimeoutMs: number
  emitKeepAlive: boolean
  reconnect: ReconnectPolicy
  retry: RetryPolicy
}

export const EMULATOR_HOST_ENV = 'FIREBASE_DATABASE_EMULATOR_HOST'

// =============================================================================
// Schema
// =============================================================================

const delayMs = z.number().finite().nonnegative()

const jitterFactor = z.number().min(0).max(1)

const configSchema = z.object({
  databaseUrl: z
    .string()
    .url()
    .refine((url) => /^https?:\/\//i.test(url), { message: 'must be an http(s) URL' })
    .optional(),
  namespace: z.string().min(1).optional(),
  emulatorHost: z
    .string()
    .regex(/^[^/\s]+$/, { message: 'must be host:port without a scheme' })
    .optional(),
  authMode: z.enum(['header', 'query']).default('header'),
  eventBufferSize: z.number().int().positive().default(64),
  idleTimeoutMs: z.number().int().nonnegative().default(90_000),
  emitKeepAlive: z.boolean().default(false),
  reconnect: z
    .object({
      maxAttempts: z.number().int().nonnegative().default(3),
      baseDelayMs: delayMs.default(250),
      maxDelayMs: delayMs.default(5_000),
      jitterFactor: jitterFactor.default(0),
    })
    .default({}),
  retry: z
    .object({
      maxRetries: z.union([z.number().int().nonnegative(), z.literal(Infinity)]).default(5),
      baseDelayMs: delayMs.default(1_000),
      maxDelayMs: delayMs.default(30_000),
      jitterFactor: jitterFactor.default(0.1),
    })
    .default({}),
})

// =============================================================================
// Resolution
// =============================================================================

/**
 * Validates `config` and fills in defaults.
 *
 * @throws InvalidConfigError listing every offending field
 *
 * @example
 * ```typescript
 * resolveConfig({ databaseUrl: 'https://example-db.example.com' }).endpoint
 * // 'https://example-db.example.com'
 *
 * resolveConfig({
 *   databaseUrl: 'https://example-db.example.com',
 *   emulatorHost: 'localhost:9000',
 * })
 * // { endpoint: 'http://localhost:9000', parameters: { ns: 'example-db' }, ... }
 * ```
 */
export function resolveConfig(config: ReplicaClientConfig): ResolvedConfig {
  const env = config.env ?? process.env
  const emulatorHost = config.emulatorHost ?? nonEmpty(env[EMULATOR_HOST_ENV])

  const parsed = configSchema.safeParse({
    databaseUrl: config.databaseUrl,
    namespace: config.namespace,
    emulatorHost,
    authMode: config.authMode,
    eventBufferSize: config.eventBufferSize,
    idleTimeoutMs: config.idleTimeoutMs,
    emitKeepAlive: config.emitKeepAlive,
    reconnect: config.reconnect,
    retry: config.retry,
  })

  if (!parsed.success) {
    const fields = [...new Set(parsed.error.issues.map((issue) => issue.path.join('.')))]
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ')
    throw new InvalidConfigError(`Invalid replica client configuration: ${details}`, fields)
  }

  const options = parsed.data
  const { endpoint, parameters } = resolveEndpoint(options.databaseUrl, options.namespace, options.emulatorHost)

  return {
    endpoint,
    parameters,
    emulator: options.emulatorHost !== undefined,
    authMode: options.authMode,
    eventBufferSize: options.eventBufferSize,
    idleTimeoutMs: options.idleTimeoutMs,
    emitKeepAlive: options.emitKeepAlive,
    reconnect: options.reconnect,
    retry: options.retry,
  }
}

function resolveEndpoint(
  databaseUrl: string | undefined,
  namespace: string | undefined,
  emulatorHost: string | undefined
): { endpoint: string; parameters: Record<string, string> } {
  if (emulatorHost !== undefined) {
    const ns = namespace ?? (databaseUrl ? new URL(databaseUrl).hostname.split('.')[0] : undefined)
    if (!ns) {
      throw new InvalidConfigError(
        'Invalid replica client configuration: namespace or databaseUrl is required with an emulator host',
        ['namespace']
      )
    }
    return { endpoint: `http://${emulatorHost}`, parameters: { ns } }
  }

  if (databaseUrl === undefined) {
    throw new InvalidConfigError(
      'Invalid replica client configuration: databaseUrl is required',
      ['databaseUrl']
    )
  }

  const url = new URL(databaseUrl)
  const endpoint = `${url.origin}${url.pathname}`.replace(/\/+$/, '')
  return { endpoint, parameters: namespace ? { ns: namespace } : {} }
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value.trim()
}
