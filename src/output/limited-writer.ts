/**
 * Size-bounded output
 *
 * LimitedWriter caps everything written to a sink at a byte budget.
 * Chunks that don't fit are cut to exactly the remaining budget.
 */

/**
 * Destination for extracted text. Returns bytes accepted, throws on failure.
 */
export interface TextSink {
  write(chunk: Uint8Array): number
}

export class LimitedWriter {
  private budget: number
  private bytesWritten = 0

  constructor(
    private readonly sink: TextSink,
    size: number
  ) {
    this.budget = size
  }

  get remaining(): number {
    return this.budget
  }

  get written(): number {
    return this.bytesWritten
  }

  get exhausted(): boolean {
    return this.budget <= 0
  }

  /**
   * Truncate to the remaining budget, charge the budget, then write.
   * Sink errors propagate after nothing was counted for the failed chunk.
   */
  write(chunk: Uint8Array): number {
    const allowed = Math.max(0, this.budget)
    const output = chunk.length > allowed ? chunk.subarray(0, allowed) : chunk

    this.budget -= output.length

    const accepted = this.sink.write(output)
    this.bytesWritten += accepted

    return accepted
  }
}

/**
 * In-memory sink
 */
export class BufferSink implements TextSink {
  private readonly chunks: Buffer[] = []
  private length = 0

  write(chunk: Uint8Array): number {
    // Chunks may be views into buffers the caller reuses
    this.chunks.push(Buffer.from(chunk))
    this.length += chunk.length
    return chunk.length
  }

  get byteLength(): number {
    return this.length
  }

  toBuffer(): Buffer {
    return Buffer.concat(this.chunks, this.length)
  }

  toString(): string {
    return this.toBuffer().toString('utf-8')
  }
}
