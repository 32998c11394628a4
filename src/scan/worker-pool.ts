import { Channel } from './channel.js'

export type TaskOutcome<T, R> =
  | { item: T; ok: true; value: R }
  | { item: T; ok: false; error: unknown }

export interface WorkerPoolOptions {
  concurrency: number
  /** Workers stop taking new items once this is aborted */
  signal?: AbortSignal
}

/**
 * Fixed-size pool of async workers draining a list of items.
 *
 * Every finished task is pushed onto `completions` in the order it finished;
 * the channel closes once all workers have exited. Workers check for
 * cancellation before starting each item, so items not yet started when the
 * pool is stopped are never run. Tasks already running are not interrupted.
 */
export class WorkerPool<T, R> {
  readonly completions = new Channel<TaskOutcome<T, R>>()
  /** Resolves when every worker has exited */
  readonly settled: Promise<void>

  private nextIndex = 0
  private running = 0
  private stopped = false

  constructor(
    private readonly items: readonly T[],
    private readonly work: (item: T) => Promise<R>,
    private readonly options: WorkerPoolOptions,
  ) {
    const { concurrency } = options
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new Error(`Concurrency must be a positive integer, got ${concurrency}`)
    }

    const workerCount = Math.min(concurrency, items.length)
    const workers: Array<Promise<void>> = []
    for (let i = 0; i < workerCount; i++) {
      workers.push(this.runWorker())
    }
    this.settled = Promise.all(workers).then(() => {
      this.completions.close()
    })
  }

  /**
   * Stop handing out items. Does not wait for running tasks.
   */
  stop(): void {
    this.stopped = true
  }

  get activeCount(): number {
    return this.running
  }

  /**
   * Items that no worker has picked up
   */
  get unstarted(): T[] {
    return this.items.slice(this.nextIndex)
  }

  private shouldStop(): boolean {
    return this.stopped || (this.options.signal?.aborted ?? false)
  }

  private async runWorker(): Promise<void> {
    while (this.nextIndex < this.items.length && !this.shouldStop()) {
      const item = this.items[this.nextIndex++]
      this.running++
      try {
        const value = await this.work(item)
        this.completions.push({ item, ok: true, value })
      } catch (error) {
        this.completions.push({ item, ok: false, error })
      } finally {
        this.running--
      }
    }
  }
}
