/**
 * @file Credentials
 * @module rtdb-replica/auth/credentials
 *
 * The token accessor the replica client reads bearer tokens from. The client
 * never signs in by itself; it asks the accessor for the current token when
 * it opens a connection, and for a fresh one when the server revokes the
 * current token.
 *
 * Accessors are shared by every session a client opens, so `refresh()` must
 * be safe to call concurrently. {@link RefreshingCredentials} coalesces
 * concurrent refreshes into one call of the underlying refresher.
 *
 * @example
 * ```typescript
 * const credentials = new RefreshingCredentials({
 *   initialToken: await signIn(),
 *   refresh: async () => (await exchangeRefreshToken()).idToken,
 * })
 *
 * const client = createReplicaClient({ databaseUrl, credentials })
 * ```
 */

import { AuthFailureError } from '../errors.js'

// =============================================================================
// Types
// =============================================================================

/**
 * Source of bearer tokens.
 */
export interface CredentialAccessor {
  /**
   * The token to use for the next request, or `undefined` to connect
   * unauthenticated.
   */
  currentToken(): Promise<string | undefined>

  /**
   * Obtains a fresh token after the server rejected the current one.
   *
   * @throws AuthFailureError if no fresh token can be obtained
   */
  refresh(): Promise<string>
}

/**
 * Refresh metrics tracking success and failure counts.
 */
export interface RefreshMetrics {
  /** Total number of successful token refreshes */
  successCount: number
  /** Total number of failed token refreshes */
  failureCount: number
  /** Refresh requests served by a refresh that was already in flight */
  coalescedCount: number
  /** Timestamp of the last successful refresh */
  lastRefreshAt?: number
  /** Timestamp of the last failed refresh */
  lastFailureAt?: number
}

/**
 * Configuration for {@link RefreshingCredentials}.
 */
export interface RefreshingCredentialsConfig {
  /** Token used until the first refresh */
  initialToken?: string

  /** Produces a fresh token */
  refresh: () => Promise<string>

  /** Called with every new token */
  onRefresh?: (token: string) => void

  /** Called when a refresh fails */
  onError?: (error: AuthFailureError) => void
}

// =============================================================================
// Stock Accessors
// =============================================================================

/**
 * Connects without a token. Refresh always fails.
 */
export function anonymousCredentials(): CredentialAccessor {
  return {
    currentToken: async () => undefined,
    refresh: async () => {
      throw new AuthFailureError('Anonymous credentials cannot be refreshed')
    },
  }
}

/**
 * A fixed token, e.g. a database secret or an emulator owner token.
 * Refresh always fails: a revoked static token stays revoked.
 */
export function staticCredentials(token: string): CredentialAccessor {
  return {
    currentToken: async () => token,
    refresh: async () => {
      throw new AuthFailureError('Static credentials cannot be refreshed')
    },
  }
}

// =============================================================================
// RefreshingCredentials
// =============================================================================

function createInitialMetrics(): RefreshMetrics {
  return {
    successCount: 0,
    failureCount: 0,
    coalescedCount: 0,
    lastRefreshAt: undefined,
    lastFailureAt: undefined,
  }
}

/**
 * Accessor backed by a refresh callback.
 *
 * Concurrent `refresh()` calls share one in-flight call of the refresher;
 * every caller receives the same token or the same error.
 *
 * @example
 * ```typescript
 * const credentials = new RefreshingCredentials({
 *   initialToken: 'test-token',
 *   refresh: () => tokenService.refresh(),
 * })
 *
 * await Promise.all([credentials.refresh(), credentials.refresh()])
 * credentials.getMetrics().coalescedCount // 1
 * ```
 */
export class RefreshingCredentials implements CredentialAccessor {
  private readonly config: RefreshingCredentialsConfig
  private token: string | undefined
  private pendingRefresh?: Promise<string>
  private metrics: RefreshMetrics = createInitialMetrics()

  constructor(config: RefreshingCredentialsConfig) {
    this.config = config
    this.token = config.initialToken
  }

  async currentToken(): Promise<string | undefined> {
    if (this.pendingRefresh) {
      return this.pendingRefresh
    }
    return this.token
  }

  refresh(): Promise<string> {
    // Prevent concurrent refresh attempts - return the pending promise
    if (this.pendingRefresh) {
      this.metrics.coalescedCount++
      return this.pendingRefresh
    }

    const pending = this.doRefresh().finally(() => {
      this.pendingRefresh = undefined
    })
    this.pendingRefresh = pending
    return pending
  }

  /**
   * A copy of the current refresh metrics.
   */
  getMetrics(): RefreshMetrics {
    return { ...this.metrics }
  }

  resetMetrics(): void {
    this.metrics = createInitialMetrics()
  }

  private async doRefresh(): Promise<string> {
    let token: string
    try {
      token = await this.config.refresh()
    } catch (error) {
      const failure =
        error instanceof AuthFailureError
          ? error
          : new AuthFailureError('Token refresh failed', {
              cause: error instanceof Error ? error : new Error(String(error)),
            })
      this.metrics.failureCount++
      this.metrics.lastFailureAt = Date.now()
      this.config.onError?.(failure)
      throw failure
    }

    if (token === '') {
      const failure = new AuthFailureError('Token refresh returned an empty token')
      this.metrics.failureCount++
      this.metrics.lastFailureAt = Date.now()
      this.config.onError?.(failure)
      throw failure
    }

    this.token = token
    this.metrics.successCount++
    this.metrics.lastRefreshAt = Date.now()
    this.config.onRefresh?.(token)
    return token
  }
}
