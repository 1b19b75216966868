/**
 * @file Debug Logging
 *
 * Components accept `debug?: boolean | DebugLogger`. `true` logs to the
 * console with a `[Scope timestamp]` prefix; a function receives every
 * message; anything falsy is a no-op.
 *
 * @example
 * ```typescript
 * const client = createReplicaClient({
 *   databaseUrl: 'https://example-db.example.com',
 *   debug: (message, data) => myLogger.debug({ data }, message),
 * })
 * ```
 *
 * @module rtdb-replica/logger
 */

/**
 * Debug logger interface.
 */
export interface DebugLogger {
  /**
   * Log a debug message.
   * @param message - The message to log
   * @param data - Optional data to include
   */
  (message: string, data?: Record<string, unknown>): void
}

/**
 * The `debug` option accepted by sessions, supervisors and the client.
 */
export type DebugOption = boolean | DebugLogger | undefined

/**
 * Creates the debug logger for a component.
 *
 * @param scope - Name shown in the console prefix
 * @param debug - The component's `debug` option
 */
export function createDebugLogger(scope: string, debug: DebugOption): DebugLogger {
  if (!debug) {
    return () => {} // No-op
  }

  if (typeof debug === 'function') {
    return debug
  }

  return (message: string, data?: Record<string, unknown>) => {
    const timestamp = new Date().toISOString()
    const prefix = `[${scope} ${timestamp}]`
    if (data) {
      console.log(prefix, message, data)
    } else {
      console.log(prefix, message)
    }
  }
}
