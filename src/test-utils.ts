/**
 * Test utilities for registry-scan tests
 */
import * as fs from 'fs/promises'
import * as path from 'path'
import * as os from 'os'
import * as http from 'node:http'
import type { AddressInfo } from 'node:net'
import type { FetchResult, PackageFetcher } from './registry/client.js'
import type { SaveResult, CheckpointStore } from './progress/store.js'
import type { PackageMetadata } from './schema/registry-schema.js'
import type { ResolvedResult, ScanState, VersionRecord } from './types.js'

/**
 * Create a temporary test directory
 */
export async function createTestDir(prefix: string = 'registry-scan-test-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix))
}

/**
 * Remove a directory recursively
 */
export async function removeTestDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true })
}

/**
 * Build registry metadata from a version → publish time map
 */
export function createTestMetadata(
  times: Record<string, string>,
  versions: Record<string, unknown> = {},
): PackageMetadata {
  return {
    time: {
      created: '2015-01-01T00:00:00.000Z',
      modified: '2025-06-01T00:00:00.000Z',
      ...times,
    },
    versions,
  }
}

export function createTestRecord(
  version: string,
  publishedAt: string,
  overrides: Partial<VersionRecord> = {},
): VersionRecord {
  return {
    version,
    publishedAt,
    description: '',
    author: '',
    dependencies: 0,
    ...overrides,
  }
}

export function createTestState(
  packages: string[],
  results: Array<[string, ResolvedResult]> = [],
): ScanState {
  return {
    packages,
    resolved: results.map(([name]) => name),
    results: new Map(results),
  }
}

/**
 * Fetcher answering from a fixed table. Packages missing from the table
 * fail; a `null` entry never answers.
 */
export class FakeFetcher implements PackageFetcher {
  readonly calls: string[] = []

  constructor(
    private readonly responses: Record<string, FetchResult | null>,
  ) {}

  fetchPackage(packageName: string): Promise<FetchResult> {
    this.calls.push(packageName)
    const response = this.responses[packageName]
    if (response === null) {
      return new Promise(() => {})
    }
    return Promise.resolve(response ?? { ok: false, error: 'Package not found' })
  }
}

/**
 * Checkpoint store that keeps every saved snapshot in memory
 */
export class MemoryCheckpointStore implements CheckpointStore {
  readonly saves: ScanState[] = []
  removals = 0

  constructor(private readonly saveResult: SaveResult = { success: true }) {}

  async save(state: ScanState): Promise<SaveResult> {
    this.saves.push(state)
    return this.saveResult
  }

  async remove(): Promise<void> {
    this.removals++
  }
}

export interface MockRegistryRequest {
  url: string
  headers: http.IncomingHttpHeaders
}

export interface MockRegistryResponse {
  status: number
  body: string
  /** Delay before answering (ms) */
  delayMs?: number
}

export interface MockRegistry {
  url: string
  requests: MockRegistryRequest[]
  close(): Promise<void>
}

/**
 * Start an in-process registry answering GET /<encoded name> from a table.
 * Unknown paths answer 404.
 */
export async function startMockRegistry(
  routes: Record<string, MockRegistryResponse>,
): Promise<MockRegistry> {
  const requests: MockRegistryRequest[] = []
  const timers = new Set<ReturnType<typeof setTimeout>>()

  const server = http.createServer((req, res) => {
    const url = req.url ?? '/'
    requests.push({ url, headers: req.headers })

    const route = routes[url]
    if (!route) {
      res.writeHead(404, { 'Content-Type': 'application/json' })
      res.end(JSON.stringify({ error: 'Not found' }))
      return
    }

    const respond = (): void => {
      res.writeHead(route.status, { 'Content-Type': 'application/json' })
      res.end(route.body)
    }
    if (route.delayMs) {
      const timer = setTimeout(() => {
        timers.delete(timer)
        respond()
      }, route.delayMs)
      timers.add(timer)
    } else {
      respond()
    }
  })

  await new Promise<void>(resolve => {
    server.listen(0, '127.0.0.1', () => resolve())
  })
  const { port } = server.address() as AddressInfo

  return {
    url: `http://127.0.0.1:${port}`,
    requests,
    close: () =>
      new Promise<void>((resolve, reject) => {
        for (const timer of timers) clearTimeout(timer)
        server.closeAllConnections()
        server.close(err => (err ? reject(err) : resolve()))
      }),
  }
}
