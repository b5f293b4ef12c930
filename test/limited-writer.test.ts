import { describe, expect, it } from 'vitest'
import { BufferSink, LimitedWriter, type TextSink } from '../src/output/limited-writer.js'

const bytes = (text: string) => Buffer.from(text, 'utf-8')

describe('LimitedWriter', () => {
  it('passes chunks through while they fit', () => {
    const sink = new BufferSink()
    const writer = new LimitedWriter(sink, 10)

    writer.write(bytes('abc'))
    writer.write(bytes('def'))

    expect(sink.toString()).toBe('abcdef')
    expect(writer.written).toBe(6)
    expect(writer.remaining).toBe(4)
    expect(writer.exhausted).toBe(false)
  })

  it('cuts the chunk that crosses the budget', () => {
    const sink = new BufferSink()
    const writer = new LimitedWriter(sink, 5)

    writer.write(bytes('abc'))
    const accepted = writer.write(bytes('defgh'))

    expect(accepted).toBe(2)
    expect(sink.toString()).toBe('abcde')
    expect(writer.remaining).toBe(0)
    expect(writer.exhausted).toBe(true)
  })

  it('writes empty chunks once the budget is gone', () => {
    const seen: number[] = []
    const sink: TextSink = {
      write: chunk => {
        seen.push(chunk.length)
        return chunk.length
      },
    }
    const writer = new LimitedWriter(sink, -3)

    writer.write(bytes('abc'))

    expect(seen).toEqual([0])
    expect(writer.written).toBe(0)
    expect(writer.remaining).toBe(-3)
    expect(writer.exhausted).toBe(true)
  })

  it('charges the budget before a failing write', () => {
    const writer = new LimitedWriter({
      write: () => {
        throw new Error('EPIPE')
      },
    }, 10)

    expect(() => writer.write(bytes('abcd'))).toThrow('EPIPE')
    expect(writer.remaining).toBe(6)
    expect(writer.written).toBe(0)
  })
})

describe('BufferSink', () => {
  it('copies chunks so later changes to the source do not leak in', () => {
    const sink = new BufferSink()
    const chunk = bytes('abc')

    sink.write(chunk)
    chunk[0] = 0x7a

    expect(sink.toString()).toBe('abc')
    expect(sink.byteLength).toBe(3)
  })

  it('starts empty', () => {
    const sink = new BufferSink()

    expect(sink.byteLength).toBe(0)
    expect(sink.toBuffer().length).toBe(0)
  })
})
