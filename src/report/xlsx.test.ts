import { describe, it, before, after } from 'node:test'
import assert from 'node:assert/strict'
import * as path from 'path'
import ExcelJS from 'exceljs'
import type { Worksheet } from 'exceljs'
import { buildReport } from './model.js'
import {
  SUMMARY_HEADERS,
  VERSION_HEADERS,
  countRowCells,
  defaultReportPath,
  detailRowCells,
  writeReport,
} from './xlsx.js'
import {
  createTestDir,
  createTestRecord,
  createTestState,
  removeTestDir,
} from '../test-utils.js'

const RECORD = createTestRecord('2.0.0', '2024-09-01T00:00:00.000Z', {
  description: 'Second major',
  author: 'Ann',
  dependencies: 2,
})

function cellValues(sheet: Worksheet, rowNumber: number, count: number): unknown[] {
  const row = sheet.getRow(rowNumber)
  return Array.from({ length: count }, (_, i) => row.getCell(i + 1).value)
}

describe('defaultReportPath', () => {
  it('should replace the extension with a results suffix', () => {
    assert.equal(
      defaultReportPath('/tmp/reports/deps.xlsx'),
      path.join('/tmp/reports', 'deps-scan-results.xlsx'),
    )
  })

  it('should always produce a workbook path', () => {
    assert.equal(
      defaultReportPath('/tmp/reports/deps.csv'),
      path.join('/tmp/reports', 'deps-scan-results.xlsx'),
    )
  })
})

describe('report cells', () => {
  it('should lay out a version row', () => {
    assert.deepEqual(
      detailRowCells({ kind: 'version', packageName: 'a', record: RECORD }),
      ['a', '2.0.0', '2024-09-01T00:00:00.000Z', 'Second major', 'Ann', 2],
    )
  })

  it('should put notes in the version column', () => {
    assert.deepEqual(
      detailRowCells({ kind: 'note', packageName: 'b', note: 'Lookup failed: timeout' }),
      ['b', 'Lookup failed: timeout'],
    )
  })

  it('should label statuses in the summary', () => {
    assert.deepEqual(countRowCells({ packageName: 'a', status: 'found', versions: 3 }), [
      'a',
      'Found',
      3,
    ])
    assert.deepEqual(countRowCells({ packageName: 'b', status: 'failed', versions: null }), [
      'b',
      'Lookup failed',
      '',
    ])
  })
})

describe('writeReport', () => {
  let testDir: string

  before(async () => {
    testDir = await createTestDir('xlsx-test-')
  })

  after(async () => {
    await removeTestDir(testDir)
  })

  it('should write a versions sheet and a summary sheet', async () => {
    const state = createTestState(
      ['a', 'b'],
      [
        ['a', { status: 'found', versions: [RECORD] }],
        ['b', { status: 'failed', error: 'Package not found' }],
      ],
    )
    const outputPath = path.join(testDir, 'nested', 'deps-scan-results.xlsx')

    await writeReport(buildReport(state), outputPath)

    const workbook = new ExcelJS.Workbook()
    await workbook.xlsx.readFile(outputPath)

    const versions = workbook.getWorksheet('Versions')
    assert.ok(versions)
    assert.deepEqual(cellValues(versions, 1, 6), VERSION_HEADERS)
    assert.deepEqual(cellValues(versions, 2, 6), [
      'a',
      '2.0.0',
      '2024-09-01T00:00:00.000Z',
      'Second major',
      'Ann',
      2,
    ])
    assert.deepEqual(cellValues(versions, 3, 2), ['b', 'Lookup failed: Package not found'])

    const summary = workbook.getWorksheet('Summary')
    assert.ok(summary)
    assert.deepEqual(cellValues(summary, 1, 3), SUMMARY_HEADERS)
    assert.deepEqual(cellValues(summary, 2, 3), ['a', 'Found', 1])
    assert.deepEqual(cellValues(summary, 3, 2), ['b', 'Lookup failed'])
  })
})
