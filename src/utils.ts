import type { PackageResult } from './types.js'

export function formatPackageResult(
  packageName: string,
  result: PackageResult,
): string {
  switch (result.status) {
    case 'found': {
      const count = result.versions.length
      return `✓ ${packageName}: ${count} version${count === 1 ? '' : 's'} in window`
    }
    case 'failed':
      return `✗ ${packageName}: lookup failed (${result.error})`
    default:
      return `- ${packageName}: not scanned`
  }
}

export function isDebugEnabled(): boolean {
  return (
    process.env['REGISTRY_SCAN_DEBUG'] === '1' ||
    process.env['REGISTRY_SCAN_DEBUG'] === 'true'
  )
}

export function log(message: string, verbose: boolean = false): void {
  if (verbose || isDebugEnabled()) {
    console.log(`[registry-scan] ${message}`)
  }
}

export function warn(message: string): void {
  console.error(`[registry-scan] WARNING: ${message}`)
}

export function error(message: string): void {
  console.error(`[registry-scan] ERROR: ${message}`)
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
