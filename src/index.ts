export {
  cleanCell,
  wrapCsvCell,
  sheetTitle,
  rowText,
  openDocument,
  renderDocumentText,
  xlsToText,
  xlsToCsv,
  xlsToCells,
  collectCells,
  isFileXls,
  XLS_SIGNATURE,
} from './xls-converter.js'
export type { ConvertOptions, SheetTextChunk, TextExtractionResult } from './xls-converter.js'

export { LimitedWriter, BufferSink } from './output/limited-writer.js'
export type { TextSink } from './output/limited-writer.js'

export type {
  SpreadsheetDocument,
  SpreadsheetReader,
  SpreadsheetRow,
  SpreadsheetSheet,
} from './spreadsheet/reader.js'
export { SheetJsReader, sheetJsReader } from './spreadsheet/sheetjs-reader.js'

export { extractWithXls, trimPartialCharacter } from './parsers/xls.js'
export type { XlsParserOptions } from './parsers/xls.js'
export {
  parseDocument,
  getSourceType,
  EXTENSION_TO_SOURCE_TYPE,
} from './parser-router.js'
export type { ParsedDocument } from './parser-router.js'
export { checkExtractionQuality, classifyError, hasCellText } from './quality-gates.js'
export type { ErrorCode, QualityResult, SheetPage } from './quality-gates.js'
export { loadConfig, config } from './config.js'
export type { WorkerConfig } from './config.js'
