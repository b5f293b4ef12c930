/**
 * Spreadsheet Reader
 *
 * Read-only views over a parsed workbook. The converter only talks to these
 * interfaces, so any parser that can expose sheets, rows and cell text can
 * stand behind them.
 */

/**
 * One row of a sheet. Columns are a half-open range [first, last).
 */
export interface SpreadsheetRow {
  readonly firstColumnIndex: number
  readonly lastColumnIndexExclusive: number
  /** Cell text, '' when the cell has no content */
  cellText(column: number): string
}

export interface SpreadsheetSheet {
  readonly name: string
  /** Index of the last row in the sheet's used range */
  readonly maxRowIndex: number
  /** Returns null for rows that hold no cells */
  row(index: number): SpreadsheetRow | null
}

export interface SpreadsheetDocument {
  sheetCount(): number
  sheet(index: number): SpreadsheetSheet | null
}

/**
 * Opens a document from raw bytes.
 *
 * May throw on malformed input; returns null when the source holds no
 * document this reader understands.
 */
export interface SpreadsheetReader {
  open(source: Uint8Array, encoding: string): SpreadsheetDocument | null
}
