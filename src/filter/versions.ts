import { TIME_SENTINEL_KEYS } from '../constants.js'
import type { PackageMetadata } from '../schema/registry-schema.js'
import type { TimeWindow, VersionRecord } from '../types.js'
import { isWithinWindow } from './time-window.js'

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Author fields come either as `{ name, email, url }` or as a plain
 * "Name <email>" string.
 */
export function extractAuthor(author: unknown): string {
  if (author === undefined || author === null) return ''
  if (isRecord(author)) {
    const name = author['name']
    if (name === undefined || name === null) return ''
    return typeof name === 'string' ? name : String(name)
  }
  return typeof author === 'string' ? author : String(author)
}

function toVersionRecord(
  version: string,
  publishedAt: string,
  detail: unknown,
): VersionRecord {
  const data = isRecord(detail) ? detail : {}
  const description = data['description']
  const dependencies = data['dependencies']
  return {
    version,
    publishedAt,
    description:
      description === undefined || description === null ? '' : String(description),
    author: extractAuthor(data['author']),
    dependencies: isRecord(dependencies) ? Object.keys(dependencies).length : 0,
  }
}

/**
 * Select the versions of a package published inside the window, newest first.
 *
 * Versions whose publish time is missing or unparseable are skipped; a package
 * without a time map yields no versions.
 */
export function filterVersions(
  metadata: PackageMetadata,
  window: TimeWindow,
): VersionRecord[] {
  const times = metadata.time
  if (!times) {
    return []
  }
  const details = metadata.versions ?? {}
  const records: VersionRecord[] = []

  for (const [version, publishedAt] of Object.entries(times)) {
    if (TIME_SENTINEL_KEYS.has(version)) continue
    if (typeof publishedAt !== 'string') continue

    const published = new Date(publishedAt)
    if (Number.isNaN(published.getTime())) continue
    if (!isWithinWindow(published, window)) continue

    records.push(toVersionRecord(version, publishedAt, details[version]))
  }

  // ISO-8601 UTC strings sort chronologically
  records.sort((a, b) =>
    a.publishedAt < b.publishedAt ? 1 : a.publishedAt > b.publishedAt ? -1 : 0,
  )
  return records
}
