/**
 * Session Supervisor Tests
 *
 * Replacement of faulted sessions, retry limits, the merged event sequence
 * and close semantics, using real sessions over a fake transport.
 */

import { describe, it, expect, vi, afterEach } from 'vitest'
import { SessionSupervisor } from '../../src/sync/supervisor.js'
import type { SessionSupervisorOptions } from '../../src/sync/supervisor.js'
import { ReplicaSession } from '../../src/sync/replica-session.js'
import { Path } from '../../src/path/path.js'
import { staticCredentials } from '../../src/auth/credentials.js'
import { AccessRevokedError, MalformedFrameError } from '../../src/errors.js'
import type { TreeValue } from '../../src/tree/tree-value.js'
import type { ChangeEvent } from '../../src/types/events.js'
import { FakeTransport, take } from '../helpers/fake-transport.js'
import type { FakeConnection } from '../helpers/fake-transport.js'

const MALFORMED = 'event: put\ndata: {oops\n\n'

function createSupervisor(overrides: Partial<Omit<SessionSupervisorOptions, 'createSession'>> = {}) {
  const transport = new FakeTransport()
  const createSession = vi.fn((initialValue: TreeValue) => new ReplicaSession({
    path: Path.parse('/scores'),
    endpoint: 'https://db.test',
    credentials: staticCredentials('test-secret'),
    transport,
    idleTimeoutMs: 0,
    reconnect: { maxAttempts: 0, baseDelayMs: 0, maxDelayMs: 0 },
    initialValue,
  }))
  const supervisor = new SessionSupervisor({
    createSession,
    retry: { maxRetries: 3, baseDelayMs: 0, maxDelayMs: 0, jitterFactor: 0 },
    ...overrides,
  })
  return {
    supervisor,
    transport,
    createSession,
    events: supervisor.events()[Symbol.asyncIterator](),
  }
}

function kinds(events: ChangeEvent[]): string[] {
  return events.map((event) => event.kind)
}

describe('SessionSupervisor', () => {
  const supervisors: SessionSupervisor[] = []

  afterEach(async () => {
    for (const supervisor of supervisors.splice(0)) {
      supervisor.close()
      await supervisor.finished
    }
  })

  function setup(overrides: Partial<Omit<SessionSupervisorOptions, 'createSession'>> = {}) {
    const created = createSupervisor(overrides)
    supervisors.push(created.supervisor)
    return created
  }

  async function syncWith(connection: FakeConnection, data: unknown, events: AsyncIterator<ChangeEvent>) {
    connection.send('put', { path: '/', data })
    return take(events, 1)
  }

  it('should forward the events of the running session', async () => {
    const { supervisor, transport, events } = setup()
    supervisor.start()

    const connection = await transport.connection(0)
    await syncWith(connection, { a: 1 }, events)
    connection.send('patch', { path: '/', data: { b: 2 } })
    const [patch] = await take(events, 1)

    expect(patch?.kind).toBe('patch')
    expect(supervisor.snapshot()).toEqual({ value: { a: 1, b: 2 }, stale: false, state: 'synced' })
    expect(supervisor.snapshotAt('/b')).toBe(2)
  })

  it('should replace a session that faulted recoverably, without publishing the fault', async () => {
    const { supervisor, transport, events, createSession } = setup()
    supervisor.start()

    const first = await transport.connection(0)
    await syncWith(first, { a: 1 }, events)
    first.push(MALFORMED)

    const second = await transport.connection(1)
    expect(supervisor.state).toBe('resyncing')
    expect(supervisor.snapshot()).toEqual({ value: { a: 1 }, stale: true, state: 'resyncing' })
    expect(createSession).toHaveBeenNthCalledWith(2, { a: 1 })

    const [resync] = await syncWith(second, { a: 2 }, events)

    expect(resync?.kind).toBe('put')
    expect(supervisor.snapshot()).toEqual({ value: { a: 2 }, stale: false, state: 'synced' })
    expect(supervisor.getStats()).toEqual({ sessionsCreated: 2, retries: 1, consecutiveRetries: 0 })
  })

  it('should report stale as soon as the session faults, before its events are read', async () => {
    const { supervisor, transport, events } = setup({ eventBufferSize: 1 })
    supervisor.start()

    const connection = await transport.connection(0)
    connection.send('put', { path: '/', data: { a: 5 } })
    await supervisor.waitForSync()
    connection.send('patch', { path: '/', data: { b: 7 } })
    connection.send('cancel', 'permission_denied')

    await vi.waitFor(() => expect(supervisor.state).toBe('resyncing'))
    expect(supervisor.snapshot()).toEqual({ value: { a: 5, b: 7 }, stale: true, state: 'resyncing' })

    expect(kinds(await take(events, Infinity))).toEqual(['put', 'patch', 'cancel'])
    expect(supervisor.state).toBe('faulted')
  })

  it('should replace a session that exhausted its reconnects', async () => {
    const { supervisor, transport, events } = setup()
    supervisor.start()

    const first = await transport.connection(0)
    await syncWith(first, 1, events)
    first.end()

    const second = await transport.connection(1)
    const [put] = await syncWith(second, 2, events)

    expect(put?.kind).toBe('put')
    expect(supervisor.getStats().sessionsCreated).toBe(2)
  })

  it('should give up after maxRetries consecutive failures', async () => {
    const { supervisor, transport, events } = setup({
      retry: { maxRetries: 1, baseDelayMs: 0, maxDelayMs: 0 },
    })
    supervisor.start()

    const first = await transport.connection(0)
    first.push(MALFORMED)
    const second = await transport.connection(1)
    second.push(MALFORMED)

    const received = await take(events, Infinity)

    expect(kinds(received)).toEqual(['fault'])
    const [fault] = received
    if (fault?.kind === 'fault') {
      expect(fault.error).toBeInstanceOf(MalformedFrameError)
    }
    expect(supervisor.state).toBe('faulted')
    expect(supervisor.failure).toBeInstanceOf(MalformedFrameError)
    expect(supervisor.getStats()).toEqual({ sessionsCreated: 2, retries: 1, consecutiveRetries: 1 })
  })

  it('should reset the retry count when a replacement syncs', async () => {
    const { supervisor, transport, events } = setup({
      retry: { maxRetries: 1, baseDelayMs: 0, maxDelayMs: 0 },
    })
    supervisor.start()

    const first = await transport.connection(0)
    first.push(MALFORMED)
    const second = await transport.connection(1)
    await syncWith(second, 1, events)
    second.push(MALFORMED)
    const third = await transport.connection(2)
    await syncWith(third, 2, events)

    expect(supervisor.getStats()).toEqual({ sessionsCreated: 3, retries: 2, consecutiveRetries: 0 })
    expect(supervisor.state).toBe('synced')
  })

  it('should not retry a cancelled subscription', async () => {
    const { supervisor, transport, events, createSession } = setup()
    supervisor.start()

    const connection = await transport.connection(0)
    await syncWith(connection, 1, events)
    connection.send('cancel', 'permission_denied')

    const received = await take(events, Infinity)

    expect(kinds(received)).toEqual(['cancel'])
    expect(supervisor.failure).toBeInstanceOf(AccessRevokedError)
    expect(createSession).toHaveBeenCalledTimes(1)
    expect(supervisor.snapshot()).toEqual({ value: 1, stale: true, state: 'faulted' })
  })

  it('should not retry auth failures', async () => {
    const { supervisor, transport, events } = setup()
    supervisor.start()

    const connection = await transport.connection(0)
    connection.send('auth_revoked', 'expired')

    expect(kinds(await take(events, Infinity))).toEqual(['auth-revoked'])
    expect(supervisor.getStats().sessionsCreated).toBe(1)
  })

  it('should honor a custom shouldRetry', async () => {
    const shouldRetry = vi.fn(() => false)
    const { supervisor, transport, events } = setup({ shouldRetry })
    supervisor.start()

    const connection = await transport.connection(0)
    connection.push(MALFORMED)

    expect(kinds(await take(events, Infinity))).toEqual(['fault'])
    expect(shouldRetry).toHaveBeenCalledTimes(1)
  })

  it('should record its own state history', async () => {
    const { supervisor, transport, events } = setup()
    supervisor.start()

    const first = await transport.connection(0)
    await syncWith(first, 1, events)
    first.push(MALFORMED)
    await syncWith(await transport.connection(1), 2, events)

    expect(supervisor.getHistory().map(({ from, to }) => `${from}->${to}`)).toEqual([
      'resyncing->synced',
      'synced->resyncing',
      'connecting->synced',
    ])
  })

  it('should resolve waitForSync through the running session', async () => {
    const { supervisor, transport } = setup()
    supervisor.start()
    const synced = supervisor.waitForSync()

    const connection = await transport.connection(0)
    connection.send('put', { path: '/', data: 1 })

    await expect(synced).resolves.toBeUndefined()
  })

  describe('close', () => {
    it('should close the running session and end the sequence', async () => {
      const { supervisor, transport, events } = setup()
      supervisor.start()

      const connection = await transport.connection(0)
      await syncWith(connection, 1, events)

      supervisor.close()
      connection.send('put', { path: '/', data: 2 })

      expect(await take(events, Infinity)).toEqual([])
      expect(supervisor.state).toBe('closed')
      await supervisor.finished
      expect(connection.aborted).toBe(true)
      expect(supervisor.snapshot()).toEqual({ value: 1, stale: true, state: 'closed' })
    })

    it('should stop a pending retry', async () => {
      const { supervisor, transport, createSession } = setup({
        retry: { maxRetries: 3, baseDelayMs: 60_000, maxDelayMs: 60_000 },
      })
      supervisor.start()

      const connection = await transport.connection(0)
      connection.push(MALFORMED)
      await vi.waitFor(() => expect(supervisor.state).toBe('resyncing'))

      supervisor.close()
      await supervisor.finished

      expect(createSession).toHaveBeenCalledTimes(1)
      expect(supervisor.state).toBe('closed')
    })

    it('should be idempotent', async () => {
      const { supervisor } = setup()
      supervisor.start()
      supervisor.close()
      supervisor.close()
      await supervisor.finished
      expect(supervisor.getHistory()).toHaveLength(1)
    })
  })
})
