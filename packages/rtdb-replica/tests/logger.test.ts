/**
 * Debug Logger Tests
 */

import { describe, it, expect, vi, afterEach } from 'vitest'
import { createDebugLogger } from '../src/logger.js'

describe('createDebugLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('should not log when debug is off', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => {})
    createDebugLogger('Scope', false)('hello')
    createDebugLogger('Scope', undefined)('hello')
    expect(spy).not.toHaveBeenCalled()
  })

  it('should return a custom logger as-is', () => {
    const custom = vi.fn()
    const log = createDebugLogger('Scope', custom)
    log('hello', { a: 1 })
    expect(custom).toHaveBeenCalledWith('hello', { a: 1 })
  })

  it('should prefix console output with the scope and a timestamp', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => {})
    const log = createDebugLogger('ReplicaSession', true)

    log('State transition', { to: 'synced' })
    log('Closed')

    expect(spy).toHaveBeenNthCalledWith(
      1,
      expect.stringMatching(/^\[ReplicaSession \d{4}-\d{2}-\d{2}T[\d:.]+Z\]$/),
      'State transition',
      { to: 'synced' }
    )
    expect(spy).toHaveBeenNthCalledWith(2, expect.stringMatching(/^\[ReplicaSession /), 'Closed')
  })
})
