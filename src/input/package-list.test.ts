import { describe, it, before, after } from 'node:test'
import assert from 'node:assert/strict'
import * as fs from 'fs/promises'
import * as path from 'path'
import ExcelJS from 'exceljs'
import { InputListError, parseTextList, readPackageList } from './package-list.js'
import { createTestDir, removeTestDir } from '../test-utils.js'

describe('parseTextList', () => {
  it('should skip the header and blank first cells', () => {
    const content = [
      'Package,Notes',
      'left-pad',
      '',
      '  lodash  ,utility belt',
      ',orphan note',
      '"@scope/pkg",quoted',
    ].join('\n')

    assert.deepEqual(parseTextList(content), ['left-pad', 'lodash', '@scope/pkg'])
  })

  it('should accept CRLF line endings', () => {
    assert.deepEqual(parseTextList('name\r\nexpress\r\nkoa\r\n'), ['express', 'koa'])
  })

  it('should return nothing for a header-only file', () => {
    assert.deepEqual(parseTextList('Package\n'), [])
  })
})

describe('readPackageList', () => {
  let testDir: string

  before(async () => {
    testDir = await createTestDir('input-test-')
  })

  after(async () => {
    await removeTestDir(testDir)
  })

  it('should read the first column of the first worksheet', async () => {
    const filePath = path.join(testDir, 'deps.xlsx')
    const workbook = new ExcelJS.Workbook()
    const sheet = workbook.addWorksheet('Packages')
    sheet.addRow(['Package', 'Owner'])
    sheet.addRow(['left-pad', 'team-a'])
    sheet.addRow(['', 'no name here'])
    sheet.addRow(['  express  '])
    sheet.addRow([42])
    await workbook.xlsx.writeFile(filePath)

    assert.deepEqual(await readPackageList(filePath), ['left-pad', 'express', '42'])
  })

  it('should read CSV files', async () => {
    const filePath = path.join(testDir, 'deps.csv')
    await fs.writeFile(filePath, 'Package\nleft-pad\nlodash\n', 'utf-8')

    assert.deepEqual(await readPackageList(filePath), ['left-pad', 'lodash'])
  })

  it('should fail with InputListError for a missing file', async () => {
    await assert.rejects(
      readPackageList(path.join(testDir, 'missing.csv')),
      (err: unknown) =>
        err instanceof InputListError &&
        err.message.startsWith(`Failed to read ${path.join(testDir, 'missing.csv')}:`),
    )
  })

  it('should fail with InputListError for unsupported files', async () => {
    await assert.rejects(
      readPackageList(path.join(testDir, 'deps.json')),
      (err: unknown) =>
        err instanceof InputListError &&
        err.message === 'Unsupported input file type ".json" (expected .xlsx, .csv or .txt)',
    )
  })
})
