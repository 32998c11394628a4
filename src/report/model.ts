import type {
  PackageResult,
  ScanState,
  ScanSummary,
  VersionRecord,
} from '../types.js'

export type DetailRow =
  | { kind: 'version'; packageName: string; record: VersionRecord }
  | { kind: 'note'; packageName: string; note: string }

export interface CountRow {
  packageName: string
  status: PackageResult['status']
  /** Versions in window; null when the lookup did not succeed */
  versions: number | null
}

export interface ScanReport {
  detailRows: DetailRow[]
  countRows: CountRow[]
  summary: ScanSummary
}

export const NO_VERSIONS_NOTE = 'No versions in window'

/**
 * Input packages without repeats, in input order
 */
export function uniquePackages(packages: readonly string[]): string[] {
  return Array.from(new Set(packages))
}

export function resultFor(state: ScanState, packageName: string): PackageResult {
  return state.results.get(packageName) ?? { status: 'not-scanned' }
}

export function summarizeScan(state: ScanState): ScanSummary {
  let failed = 0
  let versionsFound = 0
  let emptyPackages = 0

  for (const result of state.results.values()) {
    if (result.status === 'failed') {
      failed++
    } else {
      versionsFound += result.versions.length
      if (result.versions.length === 0) emptyPackages++
    }
  }

  return {
    total: uniquePackages(state.packages).length,
    scanned: state.results.size,
    failed,
    versionsFound,
    emptyPackages,
  }
}

export function buildReport(state: ScanState): ScanReport {
  const detailRows: DetailRow[] = []
  const countRows: CountRow[] = []

  for (const packageName of uniquePackages(state.packages)) {
    const result = resultFor(state, packageName)
    switch (result.status) {
      case 'found':
        if (result.versions.length === 0) {
          detailRows.push({ kind: 'note', packageName, note: NO_VERSIONS_NOTE })
        }
        for (const record of result.versions) {
          detailRows.push({ kind: 'version', packageName, record })
        }
        countRows.push({ packageName, status: 'found', versions: result.versions.length })
        break
      case 'failed':
        detailRows.push({
          kind: 'note',
          packageName,
          note: `Lookup failed: ${result.error}`,
        })
        countRows.push({ packageName, status: 'failed', versions: null })
        break
      case 'not-scanned':
        detailRows.push({ kind: 'note', packageName, note: 'Not scanned' })
        countRows.push({ packageName, status: 'not-scanned', versions: null })
        break
    }
  }

  return { detailRows, countRows, summary: summarizeScan(state) }
}

export function formatSummary(summary: ScanSummary): string {
  return [
    `Scanned ${summary.scanned} of ${summary.total} package(s)`,
    `Failed lookups: ${summary.failed}`,
    `Versions in window: ${summary.versionsFound}`,
    `Packages without versions in window: ${summary.emptyPackages}`,
  ].join('\n')
}
