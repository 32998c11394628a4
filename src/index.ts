export type {
  VersionRecord,
  PackageResult,
  ResolvedResult,
  ScanState,
  ScanSummary,
  TimeWindow,
  TimeWindowConfig,
} from './types.js'
export { formatPackageResult, log, warn, error } from './utils.js'

// Re-export checkpoint and registry schemas
export * from './schema/checkpoint-schema.js'
export * from './schema/registry-schema.js'

// Re-export the scan pipeline
export * from './registry/client.js'
export * from './registry/proxy.js'
export * from './filter/time-window.js'
export * from './filter/versions.js'
export * from './progress/store.js'
export * from './scan/channel.js'
export * from './scan/worker-pool.js'
export * from './scan/coordinator.js'

// Re-export input and report adapters
export * from './input/package-list.js'
export * from './report/model.js'
export * from './report/xlsx.js'

export { runScanner, type ScannerOptions } from './run.js'

// Re-export constants
export * from './constants.js'
