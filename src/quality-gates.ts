/**
 * Quality Gates for Spreadsheet Extraction
 *
 * A sheet page always starts with its title line, so "has content" means
 * at least one non-blank line after the title.
 */

export interface SheetPage {
  pageNumber: number
  content: string
}

export type ErrorCode =
  | 'extraction_empty'
  | 'extraction_low_quality'
  | 'parse_failed'
  | 'unsupported_format'
  | 'file_too_large'
  | 'file_corrupted'
  | 'sheet_not_found'
  | 'write_failed'

export interface QualityResult {
  passed: boolean
  issues: string[]
  errorCode?: ErrorCode
}

/**
 * Check if a sheet page carries any cell text below its title
 */
export function hasCellText(content: string): boolean {
  return content
    .split('\n')
    .slice(1)
    .some(line => line.trim().length > 0)
}

/**
 * Check extraction quality of rendered sheets
 *
 * @param pages - One page per rendered sheet
 * @returns Quality check result with pass/fail and issues
 */
export function checkExtractionQuality(pages: SheetPage[]): QualityResult {
  const sheetCount = pages.length
  const totalChars = pages.reduce((sum, p) => sum + p.content.length, 0)
  const emptySheets = pages.filter(p => !hasCellText(p.content)).length

  console.log(`[Quality Gates] ${sheetCount} sheets, ${totalChars} chars, ${emptySheets} without cell text`)

  // Gate 1: Absolute zero extraction
  if (totalChars === 0) {
    return {
      passed: false,
      issues: ['No text extracted from any sheet'],
      errorCode: 'extraction_empty',
    }
  }

  // Gate 2: Only sheet titles, no cells anywhere
  if (emptySheets === sheetCount) {
    return {
      passed: false,
      issues: [`No cell text in any of ${sheetCount} sheets`],
      errorCode: 'extraction_low_quality',
    }
  }

  const issues: string[] = []
  if (emptySheets > 0) {
    issues.push(`${emptySheets} of ${sheetCount} sheets have no cell text`)
  }

  // Pass with warnings
  return {
    passed: true,
    issues,
  }
}

/**
 * Classify an error into an error code
 *
 * @param error - The error that occurred
 * @returns Error code for categorization
 */
export function classifyError(error: unknown): ErrorCode {
  const msg = String(error).toLowerCase()

  if (msg.includes("sheet doesn't exist")) {
    return 'sheet_not_found'
  }

  if (msg.includes('corrupt') || msg.includes('cannot find') || msg.includes('bad ')) {
    return 'file_corrupted'
  }

  if (msg.includes('unsupported') || msg.includes('unknown format') || msg.includes('not supported')) {
    return 'unsupported_format'
  }

  if (msg.includes('too large') || msg.includes('size limit') || msg.includes('memory')) {
    return 'file_too_large'
  }

  if (msg.includes('write') || msg.includes('epipe')) {
    return 'write_failed'
  }

  // Default to parse_failed for unknown errors
  return 'parse_failed'
}
