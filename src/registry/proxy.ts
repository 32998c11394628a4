import type * as http from 'node:http'
import { HttpProxyAgent } from 'http-proxy-agent'
import { HttpsProxyAgent } from 'https-proxy-agent'

export interface ProxyConfig {
  /** Proxy used for plain HTTP registries */
  httpProxy?: string
  /** Proxy used for HTTPS registries */
  httpsProxy?: string
  username?: string
  password?: string
}

/**
 * Embed basic-auth credentials in a proxy URL.
 * Returns the URL unchanged when no username is given.
 */
export function withProxyCredentials(
  proxyUrl: string,
  username?: string,
  password?: string,
): string {
  if (!username) {
    return proxyUrl
  }
  const url = new URL(proxyUrl)
  // The URL setters percent-encode reserved characters
  url.username = username
  url.password = password ?? ''
  return url.toString()
}

/**
 * Pick the proxy URL (with credentials) that applies to a target URL
 */
export function proxyUrlFor(
  target: URL,
  config: ProxyConfig | undefined,
): string | null {
  if (!config) return null
  const proxy =
    target.protocol === 'https:' ? config.httpsProxy : config.httpProxy
  if (!proxy) return null
  return withProxyCredentials(proxy, config.username, config.password)
}

/**
 * Build the agent that tunnels requests for the target through its proxy,
 * or undefined for a direct connection.
 */
export function createProxyAgent(
  target: URL,
  config: ProxyConfig | undefined,
): http.Agent | undefined {
  const proxyUrl = proxyUrlFor(target, config)
  if (!proxyUrl) return undefined
  return target.protocol === 'https:'
    ? new HttpsProxyAgent(proxyUrl)
    : new HttpProxyAgent(proxyUrl)
}
