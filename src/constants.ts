/**
 * Defaults shared by the scanner, the CLI and the checkpoint store
 */

/**
 * Default registry that package metadata is fetched from
 */
export const DEFAULT_REGISTRY_URL = 'https://registry.npmjs.org'

/**
 * Maximum number of package fetches in flight at once
 */
export const DEFAULT_CONCURRENCY = 15

/**
 * Completed tasks between two periodic checkpoint writes
 */
export const DEFAULT_CHECKPOINT_INTERVAL = 10

/**
 * Per-request timeout for registry fetches (ms)
 */
export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000

/**
 * How long in-flight tasks may still complete after a cancel (ms)
 */
export const DEFAULT_GRACE_PERIOD_MS = 1_000

/**
 * Length of the rolling time window (days)
 */
export const DEFAULT_WINDOW_DAYS = 365

/**
 * Keys of the registry time map that are not versions
 */
export const TIME_SENTINEL_KEYS: ReadonlySet<string> = new Set([
  'created',
  'modified',
])

export const CHECKPOINT_SUFFIX = '.scan-progress.json'

export const REPORT_SUFFIX = '-scan-results.xlsx'
