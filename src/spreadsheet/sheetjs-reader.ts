/**
 * SheetJS Reader
 *
 * Uses SheetJS (xlsx) to decode legacy .xls workbooks and exposes them
 * through the SpreadsheetReader views.
 */

import * as XLSX from 'xlsx'
import { isFileXls } from './signature.js'
import type {
  SpreadsheetDocument,
  SpreadsheetReader,
  SpreadsheetRow,
  SpreadsheetSheet,
} from './reader.js'

/**
 * Encoding name to SheetJS codepage.
 * undefined leaves the workbook's own CODEPAGE record in charge.
 */
const ENCODING_TO_CODEPAGE: Record<string, number | undefined> = {
  'utf-8': undefined,
  'utf8': undefined,
  'windows-1252': 1252,
  'cp1252': 1252,
  'latin1': 1252,
}

interface ColumnRange {
  first: number
  last: number
}

function isCellObject(value: unknown): value is XLSX.CellObject {
  return typeof value === 'object' && value !== null && 't' in value
}

class SheetJsRow implements SpreadsheetRow {
  constructor(
    private readonly worksheet: XLSX.WorkSheet,
    private readonly rowIndex: number,
    readonly firstColumnIndex: number,
    readonly lastColumnIndexExclusive: number
  ) {}

  cellText(column: number): string {
    const cell: unknown = this.worksheet[XLSX.utils.encode_cell({ r: this.rowIndex, c: column })]
    if (!isCellObject(cell)) return ''

    return XLSX.utils.format_cell(cell)
  }
}

class SheetJsSheet implements SpreadsheetSheet {
  readonly maxRowIndex: number
  private rowRanges: Map<number, ColumnRange> | null = null

  constructor(
    readonly name: string,
    private readonly worksheet: XLSX.WorkSheet
  ) {
    const ref = worksheet['!ref']
    this.maxRowIndex = typeof ref === 'string' ? XLSX.utils.decode_range(ref).e.r : 0
  }

  row(index: number): SpreadsheetRow | null {
    const range = this.indexRows().get(index)
    if (!range) return null

    return new SheetJsRow(this.worksheet, index, range.first, range.last)
  }

  // Column extent of every row that stores at least one cell, built on first access
  private indexRows(): Map<number, ColumnRange> {
    if (this.rowRanges) return this.rowRanges

    const ranges = new Map<number, ColumnRange>()

    for (const address of Object.keys(this.worksheet)) {
      if (address.startsWith('!')) continue
      if (!isCellObject(this.worksheet[address])) continue

      const { r, c } = XLSX.utils.decode_cell(address)
      const range = ranges.get(r)

      if (!range) {
        ranges.set(r, { first: c, last: c + 1 })
      } else {
        range.first = Math.min(range.first, c)
        range.last = Math.max(range.last, c + 1)
      }
    }

    this.rowRanges = ranges
    return ranges
  }
}

class SheetJsDocument implements SpreadsheetDocument {
  constructor(private readonly workbook: XLSX.WorkBook) {}

  sheetCount(): number {
    return this.workbook.SheetNames.length
  }

  sheet(index: number): SpreadsheetSheet | null {
    const name = this.workbook.SheetNames[index]
    if (name === undefined) return null

    const worksheet = this.workbook.Sheets[name]
    if (!worksheet) return null

    return new SheetJsSheet(name, worksheet)
  }
}

/**
 * Reader for legacy compound-binary workbooks
 */
export class SheetJsReader implements SpreadsheetReader {
  open(source: Uint8Array, encoding: string): SpreadsheetDocument | null {
    const normalized = encoding.trim().toLowerCase()
    if (!(normalized in ENCODING_TO_CODEPAGE)) {
      throw new Error(`unsupported encoding: ${encoding}`)
    }

    // SheetJS reads anything as a delimited-text sheet, so gate on the container signature
    if (!isFileXls(source)) {
      console.log(`[XLS Reader] No compound file signature (${source.length} bytes), skipping`)
      return null
    }

    const options: XLSX.ParsingOptions = {
      type: 'buffer',
      sheetStubs: true, // Blank cells still widen the row's column range
      cellFormula: false,
      cellHTML: false,
    }
    const codepage = ENCODING_TO_CODEPAGE[normalized]
    if (codepage !== undefined) {
      options.codepage = codepage
    }

    const buffer = Buffer.from(source.buffer, source.byteOffset, source.byteLength)
    const workbook = XLSX.read(buffer, options)

    return new SheetJsDocument(workbook)
  }
}

export const sheetJsReader = new SheetJsReader()
