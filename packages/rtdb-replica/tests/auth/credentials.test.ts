/**
 * Credentials Tests
 *
 * Stock accessors and RefreshingCredentials: single-flight refresh,
 * failure wrapping, callbacks and metrics.
 */

import { describe, it, expect, vi } from 'vitest'
import {
  RefreshingCredentials,
  anonymousCredentials,
  staticCredentials,
} from '../../src/auth/credentials.js'
import { AuthFailureError } from '../../src/errors.js'

function deferred<T>() {
  let resolve: (value: T) => void = () => {}
  let reject: (error: Error) => void = () => {}
  const promise = new Promise<T>((res, rej) => {
    resolve = res
    reject = rej
  })
  return { promise, resolve, reject }
}

describe('anonymousCredentials', () => {
  it('should provide no token and refuse to refresh', async () => {
    const credentials = anonymousCredentials()
    await expect(credentials.currentToken()).resolves.toBeUndefined()
    await expect(credentials.refresh()).rejects.toBeInstanceOf(AuthFailureError)
  })
})

describe('staticCredentials', () => {
  it('should provide the fixed token and refuse to refresh', async () => {
    const credentials = staticCredentials('test-secret')
    await expect(credentials.currentToken()).resolves.toBe('test-secret')
    await expect(credentials.refresh()).rejects.toThrow('Static credentials cannot be refreshed')
  })
})

describe('RefreshingCredentials', () => {
  it('should start with the initial token', async () => {
    const credentials = new RefreshingCredentials({
      initialToken: 'test-token-1',
      refresh: async () => 'test-token-2',
    })
    await expect(credentials.currentToken()).resolves.toBe('test-token-1')
  })

  it('should replace the token on refresh', async () => {
    const onRefresh = vi.fn()
    const credentials = new RefreshingCredentials({
      initialToken: 'test-token-1',
      refresh: async () => 'test-token-2',
      onRefresh,
    })

    await expect(credentials.refresh()).resolves.toBe('test-token-2')
    await expect(credentials.currentToken()).resolves.toBe('test-token-2')
    expect(onRefresh).toHaveBeenCalledWith('test-token-2')
  })

  it('should coalesce concurrent refreshes into one call', async () => {
    const pending = deferred<string>()
    const refresh = vi.fn(() => pending.promise)
    const credentials = new RefreshingCredentials({ refresh })

    const first = credentials.refresh()
    const second = credentials.refresh()
    const current = credentials.currentToken()
    pending.resolve('test-token-2')

    await expect(Promise.all([first, second, current])).resolves.toEqual([
      'test-token-2',
      'test-token-2',
      'test-token-2',
    ])
    expect(refresh).toHaveBeenCalledTimes(1)
    expect(credentials.getMetrics().coalescedCount).toBe(1)
  })

  it('should refresh again once the previous refresh settled', async () => {
    const refresh = vi.fn()
      .mockResolvedValueOnce('test-token-2')
      .mockResolvedValueOnce('test-token-3')
    const credentials = new RefreshingCredentials({ refresh })

    await credentials.refresh()
    await expect(credentials.refresh()).resolves.toBe('test-token-3')
    expect(refresh).toHaveBeenCalledTimes(2)
  })

  it('should wrap refresher failures in AuthFailureError', async () => {
    const onError = vi.fn()
    const cause = new Error('refresh token expired')
    const credentials = new RefreshingCredentials({
      initialToken: 'test-token-1',
      refresh: async () => {
        throw cause
      },
      onError,
    })

    const error = await credentials.refresh().catch((caught: unknown) => caught)

    expect(error).toBeInstanceOf(AuthFailureError)
    if (error instanceof AuthFailureError) {
      expect(error.message).toBe('Token refresh failed')
      expect(error.cause).toBe(cause)
    }
    expect(onError).toHaveBeenCalledWith(error)
    await expect(credentials.currentToken()).resolves.toBe('test-token-1')
  })

  it('should pass AuthFailureError through unchanged', async () => {
    const failure = new AuthFailureError('account disabled')
    const credentials = new RefreshingCredentials({
      refresh: async () => {
        throw failure
      },
    })

    await expect(credentials.refresh()).rejects.toBe(failure)
  })

  it('should reject an empty token', async () => {
    const credentials = new RefreshingCredentials({ refresh: async () => '' })
    await expect(credentials.refresh()).rejects.toThrow('Token refresh returned an empty token')
  })

  it('should track metrics and reset them', async () => {
    const refresh = vi.fn()
      .mockResolvedValueOnce('test-token-2')
      .mockRejectedValueOnce(new Error('nope'))
    const credentials = new RefreshingCredentials({ refresh })

    await credentials.refresh()
    await credentials.refresh().catch(() => undefined)

    const metrics = credentials.getMetrics()
    expect(metrics.successCount).toBe(1)
    expect(metrics.failureCount).toBe(1)
    expect(metrics.lastRefreshAt).toEqual(expect.any(Number))
    expect(metrics.lastFailureAt).toEqual(expect.any(Number))

    credentials.resetMetrics()
    expect(credentials.getMetrics()).toEqual({
      successCount: 0,
      failureCount: 0,
      coalescedCount: 0,
      lastRefreshAt: undefined,
      lastFailureAt: undefined,
    })
  })
})
