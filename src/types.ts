/**
 * One published release of a package, as it appears in the report
 */
export interface VersionRecord {
  version: string
  /** ISO-8601 UTC timestamp exactly as published by the registry */
  publishedAt: string
  description: string
  author: string
  dependencies: number
}

export type PackageResult =
  | { status: 'not-scanned' }
  | { status: 'found'; versions: VersionRecord[] }
  | { status: 'failed'; error: string }

/**
 * A package result that has been settled by a scan
 */
export type ResolvedResult = Exclude<PackageResult, { status: 'not-scanned' }>

export interface ScanState {
  /** Full input list, in input order */
  packages: string[]
  /** Resolved package names, in completion order */
  resolved: string[]
  results: Map<string, ResolvedResult>
}

export interface ScanSummary {
  total: number
  scanned: number
  failed: number
  versionsFound: number
  emptyPackages: number
}

/**
 * Half-open publish time interval: start <= t < end
 */
export interface TimeWindow {
  start: Date
  end: Date
}

export type TimeWindowConfig =
  | { kind: 'rolling'; days: number }
  | { kind: 'calendar-year'; year: number }
