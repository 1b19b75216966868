/**
 * Event Channel
 *
 * Bounded, single-consumer async queue between a replica's task and its
 * consumer. The producer waits for room with {@link EventChannel.waitForCapacity}
 * before doing the work that produces an item, then hands the item over with
 * {@link EventChannel.offer}; nothing is ever dropped while the consumer is
 * listening.
 *
 * Closing is synchronous. Items already buffered can still be drained; items
 * offered afterwards are refused.
 *
 * @module rtdb-replica/sync/event-channel
 */

// ============================================================================
// Types
// ============================================================================

/**
 * Statistics about channel operations
 */
export interface EventChannelStats {
  /** Items accepted since creation */
  totalOffered: number
  /** Items handed to the consumer */
  totalDelivered: number
  /** Largest number of items buffered at once */
  peakSize: number
  /** Times the producer had to wait for the consumer */
  producerWaits: number
}

type Waiter<T> = (value: T) => void

// ============================================================================
// EventChannel
// ============================================================================

/**
 * @example
 * ```typescript
 * const channel = new EventChannel<number>(2)
 *
 * // producer
 * await channel.waitForCapacity()
 * channel.offer(1)
 *
 * // consumer
 * for await (const item of channel) {
 *   console.log(item)
 * }
 * ```
 */
export class EventChannel<T> implements AsyncIterable<T> {
  private readonly buffer: Array<{ readonly item: T }> = []
  private readonly _capacity: number
  private _closed = false
  private iterated = false
  private pendingRead: Waiter<IteratorResult<T, undefined>> | undefined
  private capacityWaiters: Array<Waiter<void>> = []
  private stats: EventChannelStats = {
    totalOffered: 0,
    totalDelivered: 0,
    peakSize: 0,
    producerWaits: 0,
  }

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`EventChannel capacity must be a positive integer, got ${capacity}`)
    }
    this._capacity = capacity
  }

  get capacity(): number {
    return this._capacity
  }

  /** Items buffered and not yet read */
  get size(): number {
    return this.buffer.length
  }

  get closed(): boolean {
    return this._closed
  }

  /** Whether {@link offer} would accept an item right now */
  hasCapacity(): boolean {
    return this._closed || this.buffer.length < this._capacity
  }

  /**
   * Resolves once an item can be offered without exceeding the capacity, or
   * once the channel is closed.
   */
  waitForCapacity(): Promise<void> {
    if (this.hasCapacity()) {
      return Promise.resolve()
    }
    this.stats.producerWaits++
    return new Promise((resolve) => {
      this.capacityWaiters.push(resolve)
    })
  }

  /**
   * Hands an item to the consumer.
   *
   * @returns `false` if the channel is closed and the item was discarded
   * @throws RangeError if the channel is full; await {@link waitForCapacity}
   *   first
   */
  offer(item: T): boolean {
    if (this._closed) {
      return false
    }

    this.stats.totalOffered++

    const read = this.pendingRead
    if (read) {
      this.pendingRead = undefined
      this.stats.totalDelivered++
      read({ done: false, value: item })
      return true
    }

    if (this.buffer.length >= this._capacity) {
      throw new RangeError('EventChannel is full')
    }
    this.buffer.push({ item })
    this.stats.peakSize = Math.max(this.stats.peakSize, this.buffer.length)
    return true
  }

  /**
   * Refuses further items. Buffered items remain readable; a pending read
   * with nothing buffered completes, as do pending capacity waits.
   * Idempotent.
   */
  close(): void {
    if (this._closed) {
      return
    }
    this._closed = true

    const read = this.pendingRead
    this.pendingRead = undefined
    read?.({ done: true, value: undefined })

    this.releaseCapacityWaiters()
  }

  /**
   * Reads the next item, waiting if none is buffered.
   */
  next(): Promise<IteratorResult<T, undefined>> {
    const entry = this.buffer.shift()
    if (entry) {
      this.stats.totalDelivered++
      this.releaseCapacityWaiters()
      return Promise.resolve({ done: false, value: entry.item })
    }

    if (this._closed) {
      return Promise.resolve({ done: true, value: undefined })
    }
    if (this.pendingRead) {
      return Promise.reject(new Error('EventChannel supports a single pending read'))
    }
    return new Promise((resolve) => {
      this.pendingRead = resolve
    })
  }

  /**
   * Iterates the channel. The channel has a single consumer: a second
   * iteration throws. Leaving the loop early closes the channel and drops
   * whatever is still buffered.
   */
  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    if (this.iterated) {
      throw new Error('EventChannel can only be iterated once')
    }
    this.iterated = true

    return {
      next: () => this.next(),
      return: async () => {
        this.discard()
        return { done: true, value: undefined }
      },
    }
  }

  /**
   * Closes the channel and drops the buffered items.
   */
  discard(): void {
    this.close()
    this.buffer.length = 0
  }

  getStats(): EventChannelStats {
    return { ...this.stats }
  }

  private releaseCapacityWaiters(): void {
    if (!this.hasCapacity()) {
      return
    }
    const waiters = this.capacityWaiters
    this.capacityWaiters = []
    for (const resolve of waiters) {
      resolve()
    }
  }
}
