import * as fs from 'fs/promises'
import * as path from 'path'
import ExcelJS from 'exceljs'
import { errorMessage } from '../utils.js'

/**
 * The package list could not be read. Nothing can be scanned without it.
 */
export class InputListError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'InputListError'
  }
}

const TEXT_EXTENSIONS = new Set(['.csv', '.txt'])

/**
 * Read the first column of an input list, skipping the header row and rows
 * whose first cell is blank.
 *
 * `.xlsx` workbooks use their first worksheet; `.csv` and `.txt` files are
 * read line by line.
 */
export async function readPackageList(filePath: string): Promise<string[]> {
  const extension = path.extname(filePath).toLowerCase()
  try {
    if (extension === '.xlsx') {
      return await readWorkbookList(filePath)
    }
    if (TEXT_EXTENSIONS.has(extension)) {
      return parseTextList(await fs.readFile(filePath, 'utf-8'))
    }
  } catch (err) {
    if (err instanceof InputListError) throw err
    throw new InputListError(`Failed to read ${filePath}: ${errorMessage(err)}`)
  }
  throw new InputListError(
    `Unsupported input file type "${extension || path.basename(filePath)}" (expected .xlsx, .csv or .txt)`,
  )
}

async function readWorkbookList(filePath: string): Promise<string[]> {
  const workbook = new ExcelJS.Workbook()
  await workbook.xlsx.readFile(filePath)
  const sheet = workbook.worksheets[0]
  if (!sheet) {
    throw new InputListError(`${filePath} contains no worksheets`)
  }

  const packages: string[] = []
  sheet.eachRow((row, rowNumber) => {
    if (rowNumber === 1) return
    const name = row.getCell(1).text.trim()
    if (name) {
      packages.push(name)
    }
  })
  return packages
}

export function parseTextList(content: string): string[] {
  const packages: string[] = []
  const lines = content.split(/\r?\n/)

  for (const line of lines.slice(1)) {
    const firstCell = line.split(',')[0] ?? ''
    const name = firstCell.trim().replace(/^"(.*)"$/, '$1').trim()
    if (name) {
      packages.push(name)
    }
  }
  return packages
}
