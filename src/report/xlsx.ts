import * as fs from 'fs/promises'
import * as path from 'path'
import ExcelJS from 'exceljs'
import type { Worksheet } from 'exceljs'
import { REPORT_SUFFIX } from '../constants.js'
import type { CountRow, DetailRow, ScanReport } from './model.js'

type CellValue = string | number

export const VERSION_HEADERS = [
  'Package',
  'Version',
  'Published',
  'Description',
  'Author',
  'Dependencies',
]

export const SUMMARY_HEADERS = ['Package', 'Status', 'Versions in window']

const STATUS_LABELS: Record<CountRow['status'], string> = {
  found: 'Found',
  failed: 'Lookup failed',
  'not-scanned': 'Not scanned',
}

const MAX_COLUMN_WIDTH = 50

/**
 * Report written next to the input: "deps.xlsx" becomes "deps-scan-results.xlsx"
 */
export function defaultReportPath(inputPath: string): string {
  const parsed = path.parse(inputPath)
  return path.join(parsed.dir, `${parsed.name}${REPORT_SUFFIX}`)
}

export function detailRowCells(row: DetailRow): CellValue[] {
  if (row.kind === 'note') {
    return [row.packageName, row.note]
  }
  const { record } = row
  return [
    row.packageName,
    record.version,
    record.publishedAt,
    record.description,
    record.author,
    record.dependencies,
  ]
}

export function countRowCells(row: CountRow): CellValue[] {
  return [row.packageName, STATUS_LABELS[row.status], row.versions ?? '']
}

function fillSheet(sheet: Worksheet, rows: CellValue[][]): void {
  const widths: number[] = []
  for (const cells of rows) {
    sheet.addRow(cells)
    cells.forEach((cell, index) => {
      widths[index] = Math.max(widths[index] ?? 0, String(cell).length)
    })
  }
  widths.forEach((width, index) => {
    sheet.getColumn(index + 1).width = Math.min(width + 2, MAX_COLUMN_WIDTH)
  })
}

/**
 * Write the per-version listing and the per-package summary as a workbook
 */
export async function writeReport(
  report: ScanReport,
  outputPath: string,
): Promise<void> {
  const workbook = new ExcelJS.Workbook()

  fillSheet(workbook.addWorksheet('Versions'), [
    VERSION_HEADERS,
    ...report.detailRows.map(detailRowCells),
  ])
  fillSheet(workbook.addWorksheet('Summary'), [
    SUMMARY_HEADERS,
    ...report.countRows.map(countRowCells),
  ])

  await fs.mkdir(path.dirname(path.resolve(outputPath)), { recursive: true })
  await workbook.xlsx.writeFile(outputPath)
}
