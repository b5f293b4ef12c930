/**
 * XLS Parser
 *
 * Renders legacy .xls workbooks through the XLS converter.
 * Each sheet becomes a logical page.
 */

import { config } from '../config.js'
import { BufferSink, LimitedWriter } from '../output/limited-writer.js'
import { checkExtractionQuality } from '../quality-gates.js'
import type { ParsedDocument } from '../parser-router.js'
import { sheetJsReader } from '../spreadsheet/sheetjs-reader.js'
import { collectCells, openDocument, renderDocumentText, type ConvertOptions } from '../xls-converter.js'

export interface XlsParserOptions extends ConvertOptions {
  /** Byte budget for the whole rendering (default: XLS_MAX_TEXT_BYTES) */
  maxTextBytes?: number
}

interface SheetSpan {
  sheetIndex: number
  start: number
}

/**
 * Drop a multi-byte character the byte budget cut in half
 */
export function trimPartialCharacter(bytes: Buffer): Buffer {
  for (let i = bytes.length - 1; i >= 0 && i >= bytes.length - 4; i--) {
    const byte = bytes[i]
    if ((byte & 0xc0) === 0x80) continue

    const expected = byte >= 0xf0 ? 4 : byte >= 0xe0 ? 3 : byte >= 0xc0 ? 2 : 1
    return bytes.length - i < expected ? bytes.subarray(0, i) : bytes
  }

  return bytes
}

function emptyDocument(metadata: Record<string, unknown>): ParsedDocument {
  return {
    pages: [],
    totalPages: 0,
    totalChars: 0,
    totalWords: 0,
    metadata,
    parserUsed: 'xls',
  }
}

/**
 * Extract text from an .xls buffer
 *
 * The rendering is the same as xlsToText and shares its byte budget
 * across all sheets; sheets past the budget are dropped.
 *
 * @param buffer - XLS file as Buffer
 * @returns Normalized parsed document
 */
export async function extractWithXls(buffer: Buffer, options: XlsParserOptions = {}): Promise<ParsedDocument> {
  const {
    maxTextBytes = config.maxTextBytes,
    reader = sheetJsReader,
    encoding = config.encoding,
  } = options

  console.log(`[XLS] Parsing XLS (${buffer.length} bytes)`)

  const document = openDocument(buffer, { reader, encoding })
  if (!document) {
    console.log('[XLS] No readable workbook')
    return emptyDocument({ sheetCount: 0, sheetNames: [] })
  }

  const sheetNames: string[] = []
  for (let n = 0; n < document.sheetCount(); n++) {
    const sheet = document.sheet(n)
    if (sheet) sheetNames.push(sheet.name)
  }

  // One shared sink; remember where each sheet starts so it can be cut into pages
  const sink = new BufferSink()
  const writer = new LimitedWriter(sink, maxTextBytes)
  const spans: SheetSpan[] = []

  for (const chunk of renderDocumentText(document)) {
    if (chunk.kind === 'title') {
      spans.push({ sheetIndex: chunk.sheetIndex, start: sink.byteLength })
    }

    writer.write(Buffer.from(chunk.text, 'utf-8'))
    if (writer.exhausted) break
  }

  const output = trimPartialCharacter(sink.toBuffer())
  const truncated = writer.exhausted
  const pages: Array<{ pageNumber: number; content: string }> = []

  spans.forEach((span, i) => {
    const end = i + 1 < spans.length ? spans[i + 1].start : output.length
    const content = output.subarray(span.start, end).toString('utf-8').trim()

    if (content) {
      pages.push({ pageNumber: pages.length + 1, content })
    }
  })

  const totalChars = pages.reduce((sum, p) => sum + p.content.length, 0)
  const totalWords = pages.reduce((sum, p) => sum + p.content.split(/\s+/).filter(Boolean).length, 0)
  const cellCount = collectCells(document).length
  const quality = checkExtractionQuality(pages)

  if (quality.issues.length > 0) {
    console.warn(`[XLS] Quality issues:`, quality.issues)
  }

  console.log(`[XLS] Extracted ${pages.length} sheets, ${totalWords} words, ${cellCount} cells${truncated ? ' (TRUNCATED)' : ''}`)

  return {
    pages,
    totalPages: pages.length,
    totalChars,
    totalWords,
    metadata: {
      sheetCount: document.sheetCount(),
      sheetNames,
      cellCount,
      truncated,
      maxTextBytes,
      quality,
    },
    parserUsed: 'xls',
  }
}
