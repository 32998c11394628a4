import * as path from 'path'
import type { CommandModule } from 'yargs'
import {
  DEFAULT_CHECKPOINT_INTERVAL,
  DEFAULT_CONCURRENCY,
  DEFAULT_GRACE_PERIOD_MS,
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_WINDOW_DAYS,
} from '../constants.js'
import { describeTimeWindow, resolveTimeWindow } from '../filter/time-window.js'
import { readPackageList } from '../input/package-list.js'
import {
  checkpointPathFor,
  createFileCheckpointStore,
  loadCheckpoint,
  removeCheckpoint,
} from '../progress/store.js'
import { getRegistryClientFromEnv } from '../registry/client.js'
import { buildReport, formatSummary } from '../report/model.js'
import { defaultReportPath, writeReport } from '../report/xlsx.js'
import { runScan, type ScanEvent } from '../scan/coordinator.js'
import type { ScanState, TimeWindowConfig } from '../types.js'
import { error, formatPackageResult, log, warn } from '../utils.js'
import { createProgressDisplay, type ProgressDisplay } from '../utils/progress.js'
import { promptConfirmation } from '../utils/prompt.js'

interface ScanArgs {
  input: string
  token?: string
  registry?: string
  'http-proxy'?: string
  'https-proxy'?: string
  'proxy-user'?: string
  'proxy-password'?: string
  concurrency: number
  'checkpoint-interval': number
  timeout: number
  'grace-period': number
  days: number
  year?: number
  output?: string
  resume?: boolean
  quiet: boolean
}

function sameList(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((name, i) => name === b[i])
}

/**
 * Map CLI overrides onto the environment read by getRegistryClientFromEnv
 */
function applyNetworkOverrides(args: ScanArgs): void {
  const overrides: Array<[string | undefined, string]> = [
    [args.token, 'REGISTRY_SCAN_TOKEN'],
    [args.registry, 'REGISTRY_SCAN_REGISTRY_URL'],
    [args['http-proxy'], 'REGISTRY_SCAN_HTTP_PROXY'],
    [args['https-proxy'], 'REGISTRY_SCAN_HTTPS_PROXY'],
    [args['proxy-user'], 'REGISTRY_SCAN_PROXY_USER'],
    [args['proxy-password'], 'REGISTRY_SCAN_PROXY_PASSWORD'],
  ]
  for (const [value, name] of overrides) {
    if (value) {
      process.env[name] = value
    }
  }
}

function windowConfig(args: ScanArgs): TimeWindowConfig {
  return args.year !== undefined
    ? { kind: 'calendar-year', year: args.year }
    : { kind: 'rolling', days: args.days }
}

export interface ResumeOptions {
  /** `--resume` / `--no-resume`; ask on a TTY when unset */
  resume?: boolean
  onWarning?: (message: string) => void
}

/**
 * Decide whether to continue from a saved checkpoint, deleting it when the
 * user declines
 */
export async function resolveResumeState(
  checkpointPath: string,
  packages: string[],
  options: ResumeOptions = {},
): Promise<ScanState | null> {
  const { resume, onWarning = warn } = options
  const saved = await loadCheckpoint(checkpointPath, { onWarning })
  if (!saved) return null

  if (!sameList(saved.packages, packages)) {
    onWarning(
      `Saved progress at ${checkpointPath} was made for a different package list and will be replaced.`,
    )
    return null
  }

  const question = `Found saved progress (${saved.resolved.length}/${packages.length} packages). Resume?`
  const shouldResume =
    resume ?? (process.stdin.isTTY ? await promptConfirmation(question) : true)

  if (!shouldResume) {
    await removeCheckpoint(checkpointPath)
    console.log('Discarded saved progress, starting over.')
    return null
  }
  return saved
}

function createEventHandler(
  progress: ProgressDisplay,
): (event: ScanEvent) => void {
  return event => {
    switch (event.type) {
      case 'started':
        if (event.resumed > 0) {
          console.log(
            `Resuming: ${event.resumed} package(s) already scanned, ${event.pending} remaining.`,
          )
        }
        if (event.pending > 0) {
          progress.start(`[0/${event.pending}] Scanning packages...`)
        }
        break
      case 'resolved':
        progress.line(
          `[${event.completed}/${event.pending}] ${formatPackageResult(event.packageName, event.result)}`,
        )
        progress.update(`[${event.completed}/${event.pending}] Scanning packages...`)
        break
      case 'checkpoint-saved':
        log(`Checkpoint saved (${event.resolved} package(s) resolved)`)
        break
      case 'checkpoint-failed':
        warn(`Could not save progress: ${event.error}`)
        break
      case 'phase':
        if (event.phase === 'draining') {
          progress.update('Stopping, saving progress...')
        }
        log(`Phase: ${event.phase}`)
        break
    }
  }
}

async function scanPackages(args: ScanArgs): Promise<void> {
  applyNetworkOverrides(args)
  if (!process.env['REGISTRY_SCAN_TOKEN']) {
    throw new Error(
      'A registry access token is required. Pass --token or set REGISTRY_SCAN_TOKEN.',
    )
  }

  const inputPath = path.resolve(args.input)
  const outputPath = args.output
    ? path.resolve(args.output)
    : defaultReportPath(inputPath)
  const window = resolveTimeWindow(windowConfig(args))

  console.log(`Reading package list: ${inputPath}`)
  const packages = await readPackageList(inputPath)
  if (packages.length === 0) {
    console.log('No packages found in the input file.')
    return
  }
  console.log(`✓ Read ${packages.length} package(s)`)
  console.log(`Window: ${describeTimeWindow(window)}`)

  const checkpointPath = checkpointPathFor(inputPath)
  const resumeFrom = await resolveResumeState(checkpointPath, packages, {
    resume: args.resume,
  })

  const client = getRegistryClientFromEnv({ timeoutMs: args.timeout })
  const progress = createProgressDisplay({ disabled: args.quiet })
  const controller = new AbortController()
  const onInterrupt = (): void => {
    progress.line('Interrupt received, finishing in-flight lookups...')
    controller.abort()
  }
  process.once('SIGINT', onInterrupt)

  try {
    const outcome = await runScan({
      packages,
      fetcher: client,
      window,
      concurrency: args.concurrency,
      checkpointInterval: args['checkpoint-interval'],
      gracePeriodMs: args['grace-period'],
      store: createFileCheckpointStore(checkpointPath),
      resumeFrom,
      signal: controller.signal,
      reporter: state => writeReport(buildReport(state), outputPath),
      onEvent: createEventHandler(progress),
    })
    progress.stop()

    if (outcome.status === 'cancelled') {
      const resolved = outcome.state.resolved.length
      console.log('\nScan interrupted by user.')
      console.log(
        `Progress saved to ${checkpointPath} (${resolved} resolved, ${outcome.pending.length} remaining).`,
      )
      console.log('Run the same command again to resume.')
      return
    }

    console.log(`\nReport written to: ${outputPath}`)
    console.log('='.repeat(60))
    console.log('Scan complete!')
    console.log(formatSummary(outcome.summary))
    console.log('='.repeat(60))
  } finally {
    progress.stop()
    process.removeListener('SIGINT', onInterrupt)
  }
}

export const scanCommand: CommandModule<{}, ScanArgs> = {
  command: 'scan <input>',
  describe: 'Scan the packages listed in a spreadsheet or text file',
  builder: yargs => {
    return yargs
      .positional('input', {
        describe: 'Package list (.xlsx, .csv or .txt; first column, header row skipped)',
        type: 'string',
        demandOption: true,
      })
      .option('token', {
        alias: 't',
        describe: 'Registry access token (or REGISTRY_SCAN_TOKEN)',
        type: 'string',
      })
      .option('registry', {
        describe: 'Registry URL (or REGISTRY_SCAN_REGISTRY_URL)',
        type: 'string',
      })
      .option('http-proxy', {
        describe: 'Proxy for HTTP registries',
        type: 'string',
      })
      .option('https-proxy', {
        describe: 'Proxy for HTTPS registries',
        type: 'string',
      })
      .option('proxy-user', {
        describe: 'Proxy username',
        type: 'string',
      })
      .option('proxy-password', {
        describe: 'Proxy password',
        type: 'string',
      })
      .option('concurrency', {
        alias: 'c',
        describe: 'Maximum lookups in flight',
        type: 'number',
        default: DEFAULT_CONCURRENCY,
      })
      .option('checkpoint-interval', {
        describe: 'Save progress after this many lookups',
        type: 'number',
        default: DEFAULT_CHECKPOINT_INTERVAL,
      })
      .option('timeout', {
        describe: 'Per-request timeout in milliseconds',
        type: 'number',
        default: DEFAULT_REQUEST_TIMEOUT_MS,
      })
      .option('grace-period', {
        describe: 'Milliseconds in-flight lookups may still finish after an interrupt',
        type: 'number',
        default: DEFAULT_GRACE_PERIOD_MS,
      })
      .option('days', {
        describe: 'Length of the rolling window ending now',
        type: 'number',
        default: DEFAULT_WINDOW_DAYS,
      })
      .option('year', {
        describe: 'Scan a calendar year (UTC) instead of a rolling window',
        type: 'number',
      })
      .option('output', {
        alias: 'o',
        describe: 'Report path (defaults to <input>-scan-results.xlsx)',
        type: 'string',
      })
      .option('resume', {
        describe: 'Resume from saved progress without asking (--no-resume to start over)',
        type: 'boolean',
      })
      .option('quiet', {
        alias: 'q',
        describe: 'Hide per-package progress',
        type: 'boolean',
        default: false,
      })
  },
  handler: async argv => {
    try {
      await scanPackages(argv)
      process.exit(0)
    } catch (err) {
      error(err instanceof Error ? err.message : String(err))
      process.exit(1)
    }
  },
}
