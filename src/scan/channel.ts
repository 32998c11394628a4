/**
 * Unbounded single-consumer queue. Producers push values, the consumer
 * awaits them in push order; once closed and drained, `next()` reports done.
 */
export class Channel<T> implements AsyncIterable<T> {
  private buffer: T[] = []
  private waiters: Array<(result: IteratorResult<T, undefined>) => void> = []
  private closed = false

  push(value: T): void {
    if (this.closed) {
      throw new Error('Cannot push to a closed channel')
    }
    const waiter = this.waiters.shift()
    if (waiter) {
      waiter({ done: false, value })
    } else {
      this.buffer.push(value)
    }
  }

  close(): void {
    if (this.closed) return
    this.closed = true
    for (const waiter of this.waiters.splice(0)) {
      waiter({ done: true, value: undefined })
    }
  }

  get isClosed(): boolean {
    return this.closed
  }

  next(): Promise<IteratorResult<T, undefined>> {
    if (this.buffer.length > 0) {
      const [value] = this.buffer.splice(0, 1)
      return Promise.resolve({ done: false, value })
    }
    if (this.closed) {
      return Promise.resolve({ done: true, value: undefined })
    }
    return new Promise(resolve => {
      this.waiters.push(resolve)
    })
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return { next: () => this.next() }
  }
}
