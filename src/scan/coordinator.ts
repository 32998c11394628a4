import {
  DEFAULT_CHECKPOINT_INTERVAL,
  DEFAULT_CONCURRENCY,
  DEFAULT_GRACE_PERIOD_MS,
} from '../constants.js'
import { filterVersions } from '../filter/versions.js'
import type { CheckpointStore } from '../progress/store.js'
import type { PackageFetcher } from '../registry/client.js'
import { summarizeScan, uniquePackages } from '../report/model.js'
import type {
  ResolvedResult,
  ScanState,
  ScanSummary,
  TimeWindow,
} from '../types.js'
import { errorMessage } from '../utils.js'
import { WorkerPool, type TaskOutcome } from './worker-pool.js'

export type ScanPhase =
  | 'idle'
  | 'dispatching'
  | 'draining'
  | 'completing'
  | 'finished'

export type ScanEvent =
  | { type: 'phase'; phase: ScanPhase }
  | { type: 'started'; total: number; pending: number; resumed: number }
  | {
      type: 'resolved'
      packageName: string
      result: ResolvedResult
      completed: number
      pending: number
    }
  | { type: 'checkpoint-saved'; resolved: number }
  | { type: 'checkpoint-failed'; error: string }

export type ScanOutcome =
  | { status: 'completed'; state: ScanState; summary: ScanSummary }
  | { status: 'cancelled'; state: ScanState; pending: string[] }

export interface ScanOptions {
  packages: readonly string[]
  fetcher: PackageFetcher
  window: TimeWindow
  concurrency?: number
  /** Completed tasks between periodic checkpoints */
  checkpointInterval?: number
  /** Time in-flight tasks still get after a cancel (ms) */
  gracePeriodMs?: number
  store?: CheckpointStore
  /** Previously saved state; its packages are not fetched again */
  resumeFrom?: ScanState | null
  signal?: AbortSignal
  /** Receives the final state once every package has been resolved */
  reporter?: (state: ScanState, summary: ScanSummary) => Promise<void>
  onEvent?: (event: ScanEvent) => void
}

const ABORTED = Symbol('aborted')
const GRACE_EXPIRED = Symbol('grace-expired')

function cloneState(state: ScanState): ScanState {
  return {
    packages: [...state.packages],
    resolved: [...state.resolved],
    results: new Map(state.results),
  }
}

function whenAborted(signal: AbortSignal | undefined): {
  promise: Promise<typeof ABORTED>
  dispose: () => void
} {
  if (!signal) {
    return { promise: new Promise(() => {}), dispose: () => {} }
  }
  if (signal.aborted) {
    return { promise: Promise.resolve(ABORTED), dispose: () => {} }
  }
  let onAbort = (): void => {}
  const promise = new Promise<typeof ABORTED>(resolve => {
    onAbort = () => resolve(ABORTED)
    signal.addEventListener('abort', onAbort, { once: true })
  })
  return {
    promise,
    dispose: () => signal.removeEventListener('abort', onAbort),
  }
}

/**
 * Runs one scan over a package list with bounded concurrency.
 *
 * Phases: idle → dispatching → (draining | completing) → finished. Only the
 * collection loop in this class mutates the scan state; workers hand their
 * results over through the pool's completion channel.
 */
export class ScanCoordinator {
  private readonly state: ScanState
  private readonly concurrency: number
  private readonly checkpointInterval: number
  private readonly gracePeriodMs: number
  private currentPhase: ScanPhase = 'idle'

  constructor(private readonly options: ScanOptions) {
    this.concurrency = options.concurrency ?? DEFAULT_CONCURRENCY
    this.checkpointInterval =
      options.checkpointInterval ?? DEFAULT_CHECKPOINT_INTERVAL
    this.gracePeriodMs = options.gracePeriodMs ?? DEFAULT_GRACE_PERIOD_MS

    if (!Number.isInteger(this.checkpointInterval) || this.checkpointInterval < 1) {
      throw new Error(
        `Checkpoint interval must be a positive integer, got ${this.checkpointInterval}`,
      )
    }

    this.state = {
      packages: [...options.packages],
      resolved: [],
      results: new Map(),
    }

    const known = new Set(options.packages)
    for (const name of options.resumeFrom?.resolved ?? []) {
      const result = options.resumeFrom?.results.get(name)
      if (!result || !known.has(name) || this.state.results.has(name)) continue
      this.state.resolved.push(name)
      this.state.results.set(name, result)
    }
  }

  get phase(): ScanPhase {
    return this.currentPhase
  }

  /**
   * Packages not resolved yet, in input order
   */
  pendingPackages(): string[] {
    return uniquePackages(this.state.packages).filter(
      name => !this.state.results.has(name),
    )
  }

  snapshot(): ScanState {
    return cloneState(this.state)
  }

  async run(): Promise<ScanOutcome> {
    if (this.currentPhase !== 'idle') {
      throw new Error('A scan can only be run once')
    }

    const pending = this.pendingPackages()
    this.emit({
      type: 'started',
      total: uniquePackages(this.state.packages).length,
      pending: pending.length,
      resumed: this.state.resolved.length,
    })

    if (pending.length > 0) {
      this.enter('dispatching')
      const cancelled = await this.dispatch(pending)
      if (cancelled) {
        this.enter('finished')
        return {
          status: 'cancelled',
          state: this.snapshot(),
          pending: this.pendingPackages(),
        }
      }
    }

    return this.complete()
  }

  private enter(phase: ScanPhase): void {
    this.currentPhase = phase
    this.emit({ type: 'phase', phase })
  }

  private emit(event: ScanEvent): void {
    this.options.onEvent?.(event)
  }

  private async scanPackage(packageName: string): Promise<ResolvedResult> {
    const fetched = await this.options.fetcher.fetchPackage(packageName)
    if (!fetched.ok) {
      return { status: 'failed', error: fetched.error }
    }
    return {
      status: 'found',
      versions: filterVersions(fetched.metadata, this.options.window),
    }
  }

  /**
   * Collect completions until every task is done or the scan is cancelled.
   * Returns true when cancelled.
   */
  private async dispatch(pending: string[]): Promise<boolean> {
    const { signal } = this.options
    const pool = new WorkerPool<string, ResolvedResult>(
      pending,
      name => this.scanPackage(name),
      { concurrency: this.concurrency, signal },
    )
    const aborted = whenAborted(signal)

    let completed = 0
    let nextCompletion = pool.completions.next()
    try {
      for (;;) {
        const winner = await Promise.race([nextCompletion, aborted.promise])
        if (winner === ABORTED) break
        if (winner.done) {
          // Workers only exit early when cancelled
          if (completed === pending.length) return false
          break
        }

        nextCompletion = pool.completions.next()
        completed++
        this.apply(winner.value, completed, pending.length)

        if (signal?.aborted) break
        if (
          completed % this.checkpointInterval === 0 &&
          completed < pending.length
        ) {
          await this.checkpoint()
        }
      }
    } finally {
      aborted.dispose()
    }

    this.enter('draining')
    pool.stop()
    await this.drain(pool, nextCompletion, completed, pending.length)
    await this.checkpoint()
    return true
  }

  /**
   * Keep collecting tasks that finish within the grace period; anything
   * still running afterwards is abandoned.
   */
  private async drain(
    pool: WorkerPool<string, ResolvedResult>,
    nextCompletion: Promise<IteratorResult<TaskOutcome<string, ResolvedResult>, undefined>>,
    completed: number,
    total: number,
  ): Promise<void> {
    let timer: ReturnType<typeof setTimeout> | undefined
    const deadline = new Promise<typeof GRACE_EXPIRED>(resolve => {
      timer = setTimeout(() => resolve(GRACE_EXPIRED), this.gracePeriodMs)
    })

    try {
      let next = nextCompletion
      for (;;) {
        const winner = await Promise.race([next, deadline])
        if (winner === GRACE_EXPIRED || winner.done) return
        next = pool.completions.next()
        completed++
        this.apply(winner.value, completed, total)
      }
    } finally {
      clearTimeout(timer)
    }
  }

  /**
   * Record one finished task. A package already holding a result is left
   * untouched.
   */
  private apply(
    outcome: TaskOutcome<string, ResolvedResult>,
    completed: number,
    total: number,
  ): void {
    const packageName = outcome.item
    if (this.state.results.has(packageName)) return

    const result: ResolvedResult = outcome.ok
      ? outcome.value
      : { status: 'failed', error: errorMessage(outcome.error) }

    this.state.results.set(packageName, result)
    this.state.resolved.push(packageName)
    this.emit({
      type: 'resolved',
      packageName,
      result,
      completed,
      pending: total,
    })
  }

  private async checkpoint(): Promise<void> {
    const { store } = this.options
    if (!store) return

    try {
      const result = await store.save(this.snapshot())
      if (result.success) {
        this.emit({ type: 'checkpoint-saved', resolved: this.state.resolved.length })
      } else {
        this.emit({ type: 'checkpoint-failed', error: result.error ?? 'unknown error' })
      }
    } catch (err) {
      this.emit({ type: 'checkpoint-failed', error: errorMessage(err) })
    }
  }

  private async complete(): Promise<ScanOutcome> {
    this.enter('completing')

    const { store, reporter } = this.options
    if (store) {
      try {
        await store.remove()
      } catch (err) {
        this.emit({ type: 'checkpoint-failed', error: errorMessage(err) })
      }
    }

    const state = this.snapshot()
    const summary = summarizeScan(state)
    if (reporter) {
      try {
        await reporter(state, summary)
      } catch (err) {
        // Progress outlives a failed report so the next run can rebuild it
        await this.checkpoint()
        throw err
      }
    }

    this.enter('finished')
    return { status: 'completed', state, summary }
  }
}

/**
 * Run a scan to completion or cancellation
 */
export function runScan(options: ScanOptions): Promise<ScanOutcome> {
  return new ScanCoordinator(options).run()
}
