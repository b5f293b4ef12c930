/**
 * Parser Router - Routes spreadsheet documents to the XLS parser
 *
 * Resolution order: MIME type, then source type, then the compound file
 * signature of the buffer itself.
 */

import { extractWithXls } from './parsers/xls.js'
import { isFileXls } from './spreadsheet/signature.js'

/**
 * Normalized parser output
 */
export interface ParsedDocument {
  pages: Array<{
    pageNumber: number
    content: string
  }>
  totalPages: number
  totalChars: number
  totalWords: number
  metadata: Record<string, unknown>
  parserUsed: string
}

type ParserFunction = (buffer: Buffer) => Promise<ParsedDocument>

/**
 * MIME type to parser mapping
 */
const PARSER_MAP: Record<string, ParserFunction> = {
  'application/vnd.ms-excel': extractWithXls,
  'application/x-msexcel': extractWithXls,
  'application/x-excel': extractWithXls,
}

/**
 * Source type to MIME fallback
 * Used when job has source_type but no mime_type
 */
const SOURCE_TYPE_FALLBACK: Record<string, string> = {
  xls: 'application/vnd.ms-excel',
}

/**
 * File extension to source type mapping
 */
export const EXTENSION_TO_SOURCE_TYPE: Record<string, string> = {
  '.xls': 'xls',
}

/**
 * Source type from MIME type, falling back to the filename extension
 */
export function getSourceType(mimeType: string, filename: string): string | null {
  if (PARSER_MAP[mimeType]) return 'xls'

  const dot = filename.lastIndexOf('.')
  if (dot === -1) return null

  return EXTENSION_TO_SOURCE_TYPE[filename.slice(dot).toLowerCase()] ?? null
}

/**
 * Parse a document buffer using the appropriate parser
 *
 * @param buffer - File contents as Buffer
 * @param mimeType - MIME type of the file
 * @param sourceType - Optional source type (xls) as fallback
 * @returns Normalized parsed document
 * @throws Error if file type is not supported
 */
export async function parseDocument(
  buffer: Buffer,
  mimeType: string,
  sourceType?: string
): Promise<ParsedDocument> {
  let parser: ParserFunction | undefined = PARSER_MAP[mimeType]

  if (!parser && sourceType) {
    const fallbackMime = SOURCE_TYPE_FALLBACK[sourceType]
    if (fallbackMime) {
      parser = PARSER_MAP[fallbackMime]
      console.log(`[Parser Router] MIME ${mimeType} not found, falling back to source_type ${sourceType} (${fallbackMime})`)
    }
  }

  // Uploads often arrive as application/octet-stream
  if (!parser && isFileXls(buffer)) {
    parser = extractWithXls
    console.log(`[Parser Router] MIME ${mimeType} not found, compound file signature detected`)
  }

  if (!parser) {
    throw new Error(`Unsupported file type: ${mimeType} (source_type: ${sourceType || 'none'})`)
  }

  console.log(`[Parser Router] Parsing ${mimeType} with ${sourceType || 'auto'} parser`)
  return parser(buffer)
}
