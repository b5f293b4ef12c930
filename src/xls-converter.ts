/**
 * XLS Converter
 *
 * Turns legacy .xls workbooks into plain text, CSV or a flat list of cells.
 * Decoding is left to a SpreadsheetReader (SheetJS by default); this module
 * only walks sheets, rows and columns and formats what it finds.
 *
 * Corrupt or unreadable workbooks are treated as "nothing to extract":
 * they produce empty results, not errors.
 */

import { LimitedWriter, type TextSink } from './output/limited-writer.js'
import type { SpreadsheetDocument, SpreadsheetReader, SpreadsheetRow } from './spreadsheet/reader.js'
import { sheetJsReader } from './spreadsheet/sheetjs-reader.js'

export { isFileXls, XLS_SIGNATURE } from './spreadsheet/signature.js'

const DEFAULT_ENCODING = 'utf-8'

export interface ConvertOptions {
  reader?: SpreadsheetReader
  encoding?: string
}

export interface TextExtractionResult {
  /** Bytes accepted by the sink */
  written: number
  /** Sink failure that stopped the extraction */
  error: Error | null
}

/**
 * A piece of the text rendering, tagged with the sheet it belongs to
 */
export interface SheetTextChunk {
  sheetIndex: number
  kind: 'title' | 'row'
  text: string
}

/**
 * Clean cell text: newlines become spaces, carriage returns are dropped,
 * surrounding whitespace is trimmed.
 */
export function cleanCell(text: string): string {
  return text.replaceAll('\n', ' ').replaceAll('\r', '').trim()
}

export function wrapCsvCell(cell: string): string {
  return `"${cleanCell(cell)}"`
}

/**
 * Title line for a sheet. Every sheet after the first gets a blank line before it.
 */
export function sheetTitle(name: string, sheetIndex: number, maxRowIndex: number): string {
  const separator = sheetIndex > 0 ? '\n' : ''
  return `${separator}Sheet "${name}" (${maxRowIndex} rows):\n`
}

/**
 * Non-empty cells of a row joined by ", ", newline-terminated.
 *
 * The separator depends on the column position, not on how many cells were
 * emitted: any non-empty cell right of the row's first column is preceded by
 * ", ", and empty cells are dropped without a gap marker.
 */
export function rowText(row: SpreadsheetRow): string {
  let text = ''

  for (let c = row.firstColumnIndex; c < row.lastColumnIndexExclusive; c++) {
    const cell = row.cellText(c)
    if (cell === '') continue

    if (c > row.firstColumnIndex) {
      text += ', '
    }
    text += cleanCell(cell)
  }

  return text + '\n'
}

/**
 * Open a document, mapping parser failures to null
 */
export function openDocument(source: Uint8Array, options: ConvertOptions = {}): SpreadsheetDocument | null {
  const { reader = sheetJsReader, encoding = DEFAULT_ENCODING } = options

  try {
    const document = reader.open(source, encoding)
    if (!document) {
      console.warn(`[XLS] No workbook found in ${source.length} bytes`)
    }
    return document
  } catch (error) {
    console.warn(`[XLS] Failed to open workbook (${source.length} bytes):`, error instanceof Error ? error.message : error)
    return null
  }
}

/**
 * Text rendering of a whole document, one chunk per title or row.
 * Rows run from 0 to maxRowIndex inclusive; missing rows produce nothing.
 */
export function* renderDocumentText(document: SpreadsheetDocument): Generator<SheetTextChunk> {
  for (let n = 0; n < document.sheetCount(); n++) {
    const sheet = document.sheet(n)
    if (!sheet) continue

    yield { sheetIndex: n, kind: 'title', text: sheetTitle(sheet.name, n, sheet.maxRowIndex) }

    for (let m = 0; m <= sheet.maxRowIndex; m++) {
      const row = sheet.row(m)
      if (!row) continue

      yield { sheetIndex: n, kind: 'row', text: rowText(row) }
    }
  }
}

/**
 * Extract text from an .xls workbook into sink.
 *
 * size is the maximum number of bytes (not characters) to write. The last
 * chunk is cut at the byte limit, which may split a multi-byte character.
 * The whole workbook is parsed even for partial extraction.
 */
export function xlsToText(
  source: Uint8Array,
  sink: TextSink,
  size: number,
  options: ConvertOptions = {}
): TextExtractionResult {
  const document = openDocument(source, options)
  if (!document) {
    return { written: 0, error: null }
  }

  const writer = new LimitedWriter(sink, size)

  for (const chunk of renderDocumentText(document)) {
    try {
      writer.write(Buffer.from(chunk.text, 'utf-8'))
    } catch (error) {
      console.error(`[XLS] Write failed after ${writer.written} bytes:`, error)
      return {
        written: writer.written,
        error: error instanceof Error ? error : new Error(String(error)),
      }
    }

    if (writer.exhausted) {
      return { written: writer.written, error: null }
    }
  }

  return { written: writer.written, error: null }
}

/**
 * Convert one sheet of an .xls workbook to CSV.
 *
 * Cells are wrapped in double quotes without escaping embedded quotes.
 * Rows run from 0 to maxRowIndex exclusive, so the last row of the used
 * range is not part of the output.
 *
 * @returns CSV bytes, or null when the workbook can't be opened
 * @throws Error if the sheet doesn't exist
 */
export function xlsToCsv(source: Uint8Array, sheetIndex: number, options: ConvertOptions = {}): Buffer | null {
  const document = openDocument(source, options)
  if (!document) return null

  const sheet = document.sheet(sheetIndex)
  if (!sheet) {
    throw new Error("sheet doesn't exist")
  }

  const rows: string[] = []

  for (let m = 0; m < sheet.maxRowIndex; m++) {
    const row = sheet.row(m)
    if (!row) continue

    const columns: string[] = []
    for (let c = row.firstColumnIndex; c < row.lastColumnIndexExclusive; c++) {
      columns.push(wrapCsvCell(row.cellText(c)))
    }

    rows.push(columns.join(','))
  }

  return Buffer.from(rows.join('\n'), 'utf-8')
}

/**
 * Every non-empty cell of every sheet, cleaned, in sheet/row/column order.
 * A whitespace-only cell is kept and comes out as ''.
 */
export function xlsToCells(source: Uint8Array, options: ConvertOptions = {}): string[] {
  const document = openDocument(source, options)
  if (!document) return []

  return collectCells(document)
}

/**
 * Cleaned non-empty cells of an already opened document
 */
export function collectCells(document: SpreadsheetDocument): string[] {
  const cells: string[] = []

  for (let n = 0; n < document.sheetCount(); n++) {
    const sheet = document.sheet(n)
    if (!sheet) continue

    for (let m = 0; m <= sheet.maxRowIndex; m++) {
      const row = sheet.row(m)
      if (!row) continue

      for (let c = row.firstColumnIndex; c < row.lastColumnIndexExclusive; c++) {
        const text = row.cellText(c)
        if (text !== '') {
          cells.push(cleanCell(text))
        }
      }
    }
  }

  return cells
}
