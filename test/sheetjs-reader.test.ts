import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { BufferSink } from '../src/output/limited-writer.js'
import { isFileXls } from '../src/spreadsheet/signature.js'
import { SheetJsReader } from '../src/spreadsheet/sheetjs-reader.js'
import { xlsToCells, xlsToCsv, xlsToText } from '../src/xls-converter.js'
import { buildXls } from './helpers/fake-reader.js'

const workbook = buildXls({
  People: [
    ['Name', 'City'],
    ['Ada', 'London'],
    ['Linus', null],
  ],
  Notes: [['line one\nline two']],
})

const WORKBOOK_TEXT =
  'Sheet "People" (2 rows):\n' +
  'Name, City\n' +
  'Ada, London\n' +
  'Linus\n' +
  '\n' +
  'Sheet "Notes" (0 rows):\n' +
  'line one line two\n'

describe('SheetJsReader', () => {
  const reader = new SheetJsReader()

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {})
    vi.spyOn(console, 'warn').mockImplementation(() => {})
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('writes test workbooks as compound files', () => {
    expect(isFileXls(workbook)).toBe(true)
  })

  it('exposes sheets, rows and cells', () => {
    const document = reader.open(workbook, 'utf-8')

    expect(document?.sheetCount()).toBe(2)

    const people = document?.sheet(0)
    expect(people?.name).toBe('People')
    expect(people?.maxRowIndex).toBe(2)

    const ada = people?.row(1)
    expect(ada?.firstColumnIndex).toBe(0)
    expect(ada?.lastColumnIndexExclusive).toBe(2)
    expect(ada?.cellText(0)).toBe('Ada')
    expect(ada?.cellText(1)).toBe('London')
    expect(ada?.cellText(7)).toBe('')

    const linus = people?.row(2)
    expect(linus?.lastColumnIndexExclusive).toBe(1)

    expect(people?.row(3)).toBeNull()
    expect(document?.sheet(2)).toBeNull()
  })

  it('returns null for data without the compound file signature', () => {
    expect(reader.open(Buffer.from('Name,City\nAda,London\n'), 'utf-8')).toBeNull()
  })

  it('rejects encodings it has no codepage for', () => {
    expect(() => reader.open(workbook, 'shift_jis')).toThrow('unsupported encoding: shift_jis')
  })

  it('accepts encoding names in any case', () => {
    expect(reader.open(workbook, ' UTF-8 ')?.sheetCount()).toBe(2)
  })
})

describe('converter over SheetJS', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {})
    vi.spyOn(console, 'warn').mockImplementation(() => {})
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('renders the workbook as text', () => {
    const sink = new BufferSink()

    const result = xlsToText(workbook, sink, 1_000_000)

    expect(sink.toString()).toBe(WORKBOOK_TEXT)
    expect(result).toEqual({ written: Buffer.byteLength(WORKBOOK_TEXT), error: null })
  })

  it('renders one sheet as CSV', () => {
    expect(xlsToCsv(workbook, 0)?.toString('utf-8')).toBe('"Name","City"\n"Ada","London"')
  })

  it('lists the cells', () => {
    expect(xlsToCells(workbook)).toEqual(['Name', 'City', 'Ada', 'London', 'Linus', 'line one line two'])
  })

  it('treats plain text as nothing to extract', () => {
    const sink = new BufferSink()

    expect(xlsToText(Buffer.from('just text'), sink, 100)).toEqual({ written: 0, error: null })
    expect(xlsToCsv(Buffer.from('just text'), 0)).toBeNull()
  })

  it('treats a damaged compound file as nothing to extract', () => {
    const damaged = Buffer.concat([workbook.subarray(0, 8), Buffer.alloc(504)])

    expect(xlsToCells(damaged)).toEqual([])
  })

  it('treats an unsupported encoding as nothing to extract', () => {
    expect(xlsToCells(workbook, { encoding: 'shift_jis' })).toEqual([])
  })
})
