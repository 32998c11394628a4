import * as https from 'node:https'
import * as http from 'node:http'
import {
  DEFAULT_REGISTRY_URL,
  DEFAULT_REQUEST_TIMEOUT_MS,
} from '../constants.js'
import {
  PackageMetadataSchema,
  type PackageMetadata,
} from '../schema/registry-schema.js'
import { createProxyAgent, type ProxyConfig } from './proxy.js'

export type FetchResult =
  | { ok: true; metadata: PackageMetadata }
  | { ok: false; error: string }

/**
 * Anything that can look up the metadata of a single package.
 * Implementations must resolve with a failure instead of rejecting.
 */
export interface PackageFetcher {
  fetchPackage(packageName: string): Promise<FetchResult>
}

export interface RegistryClientOptions {
  registryUrl?: string
  /** Bearer token sent with every request */
  token?: string
  proxy?: ProxyConfig
  timeoutMs?: number
}

/**
 * Encode a package name as a registry path segment.
 * Scoped names keep their leading "@" and escape the slash.
 */
export function encodePackageName(packageName: string): string {
  if (packageName.startsWith('@')) {
    return `@${encodeURIComponent(packageName.slice(1))}`
  }
  return encodeURIComponent(packageName)
}

export class RegistryClient implements PackageFetcher {
  private readonly registryUrl: string
  private readonly token?: string
  private readonly timeoutMs: number
  private readonly agent?: http.Agent

  constructor(options: RegistryClientOptions = {}) {
    this.registryUrl = (options.registryUrl ?? DEFAULT_REGISTRY_URL).replace(
      /\/$/,
      '',
    )
    this.token = options.token
    this.timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS
    this.agent = createProxyAgent(new URL(this.registryUrl), options.proxy)
  }

  /**
   * Fetch the full metadata document of a package
   */
  async fetchPackage(packageName: string): Promise<FetchResult> {
    if (packageName.trim() === '') {
      return { ok: false, error: 'Package name must not be empty' }
    }
    return this.get(`/${encodePackageName(packageName)}`)
  }

  private get(path: string): Promise<FetchResult> {
    const urlObj = new URL(`${this.registryUrl}${path}`)
    const httpModule = urlObj.protocol === 'https:' ? https : http

    const headers: Record<string, string> = {
      Accept: 'application/json',
    }
    if (this.token) {
      headers['Authorization'] = `Bearer ${this.token}`
    }

    const options: https.RequestOptions = {
      method: 'GET',
      headers,
      agent: this.agent,
    }

    return new Promise(resolve => {
      let timedOut = false
      const fail = (err: Error): void => {
        resolve({
          ok: false,
          error: timedOut
            ? `Request timed out after ${this.timeoutMs}ms`
            : `Network error: ${err.message}`,
        })
      }

      const req = httpModule.request(urlObj, options, res => {
        const chunks: Buffer[] = []

        res.on('data', (chunk: Buffer) => {
          chunks.push(chunk)
        })

        res.on('error', fail)

        res.on('end', () => {
          const status = res.statusCode ?? 0
          const body = Buffer.concat(chunks).toString('utf-8')
          resolve(toFetchResult(status, body))
        })
      })

      req.setTimeout(this.timeoutMs, () => {
        timedOut = true
        req.destroy(new Error('timeout'))
      })

      req.on('error', fail)

      req.end()
    })
  }
}

function toFetchResult(status: number, body: string): FetchResult {
  if (status >= 200 && status < 300) {
    let parsed: unknown
    try {
      parsed = JSON.parse(body)
    } catch (err) {
      return { ok: false, error: `Failed to parse response: ${err}` }
    }
    const result = PackageMetadataSchema.safeParse(parsed)
    if (!result.success) {
      return {
        ok: false,
        error: 'Failed to parse response: unexpected metadata shape',
      }
    }
    return { ok: true, metadata: result.data }
  }
  if (status === 401) {
    return { ok: false, error: 'Unauthorized: invalid registry token' }
  }
  if (status === 404) {
    return { ok: false, error: 'Package not found' }
  }
  if (status === 429) {
    return { ok: false, error: 'Rate limit exceeded' }
  }
  return {
    ok: false,
    error: `Registry request failed with status ${status}`,
  }
}

/**
 * Get a registry client configured from environment variables.
 *
 * Environment variables:
 * - REGISTRY_SCAN_REGISTRY_URL: Override the registry (defaults to https://registry.npmjs.org)
 * - REGISTRY_SCAN_TOKEN: Bearer token sent with every request
 * - REGISTRY_SCAN_HTTP_PROXY / REGISTRY_SCAN_HTTPS_PROXY: Proxy per target protocol
 * - REGISTRY_SCAN_PROXY_USER / REGISTRY_SCAN_PROXY_PASSWORD: Proxy credentials
 */
export function getRegistryClientFromEnv(
  overrides: Pick<RegistryClientOptions, 'timeoutMs'> = {},
): RegistryClient {
  const env = process.env
  return new RegistryClient({
    registryUrl: env['REGISTRY_SCAN_REGISTRY_URL'] || DEFAULT_REGISTRY_URL,
    token: env['REGISTRY_SCAN_TOKEN'] || undefined,
    proxy: {
      httpProxy: env['REGISTRY_SCAN_HTTP_PROXY'] || undefined,
      httpsProxy: env['REGISTRY_SCAN_HTTPS_PROXY'] || undefined,
      username: env['REGISTRY_SCAN_PROXY_USER'] || undefined,
      password: env['REGISTRY_SCAN_PROXY_PASSWORD'] || undefined,
    },
    timeoutMs: overrides.timeoutMs,
  })
}
