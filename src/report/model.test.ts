import { describe, it } from 'node:test'
import assert from 'node:assert/strict'
import {
  buildReport,
  formatSummary,
  resultFor,
  summarizeScan,
  uniquePackages,
} from './model.js'
import { createTestRecord, createTestState } from '../test-utils.js'

const NEWER = createTestRecord('2.0.0', '2024-09-01T00:00:00.000Z', {
  description: 'Second major',
  author: 'Ann',
  dependencies: 2,
})
const OLDER = createTestRecord('1.0.0', '2024-02-01T00:00:00.000Z')

function createMixedState() {
  return createTestState(
    ['a', 'b', 'c', 'd', 'a'],
    [
      ['b', { status: 'failed', error: 'Package not found' }],
      ['a', { status: 'found', versions: [NEWER, OLDER] }],
      ['c', { status: 'found', versions: [] }],
    ],
  )
}

describe('report model', () => {
  it('should list unique packages in input order', () => {
    assert.deepEqual(uniquePackages(['b', 'a', 'b', 'c', 'a']), ['b', 'a', 'c'])
  })

  it('should treat packages without a result as not scanned', () => {
    const state = createMixedState()
    assert.deepEqual(resultFor(state, 'd'), { status: 'not-scanned' })
    assert.deepEqual(resultFor(state, 'c'), { status: 'found', versions: [] })
  })

  it('should summarize counts', () => {
    assert.deepEqual(summarizeScan(createMixedState()), {
      total: 4,
      scanned: 3,
      failed: 1,
      versionsFound: 2,
      emptyPackages: 1,
    })
  })

  it('should build detail rows per version and notes otherwise', () => {
    const report = buildReport(createMixedState())

    assert.deepEqual(report.detailRows, [
      { kind: 'version', packageName: 'a', record: NEWER },
      { kind: 'version', packageName: 'a', record: OLDER },
      { kind: 'note', packageName: 'b', note: 'Lookup failed: Package not found' },
      { kind: 'note', packageName: 'c', note: 'No versions in window' },
      { kind: 'note', packageName: 'd', note: 'Not scanned' },
    ])
  })

  it('should build one count row per package', () => {
    const report = buildReport(createMixedState())

    assert.deepEqual(report.countRows, [
      { packageName: 'a', status: 'found', versions: 2 },
      { packageName: 'b', status: 'failed', versions: null },
      { packageName: 'c', status: 'found', versions: 0 },
      { packageName: 'd', status: 'not-scanned', versions: null },
    ])
  })

  it('should format the summary', () => {
    assert.equal(
      formatSummary(summarizeScan(createMixedState())),
      [
        'Scanned 3 of 4 package(s)',
        'Failed lookups: 1',
        'Versions in window: 2',
        'Packages without versions in window: 1',
      ].join('\n'),
    )
  })
})
