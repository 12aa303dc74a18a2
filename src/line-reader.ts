import b4a from 'b4a'

const LF = 0x0a
const CR = 0x0d

/**
 * Accumulates socket chunks and hands back complete lines, without their
 * LF or CRLF ending. Bytes are kept as-is so message data survives intact.
 */
export class LineReader {
  private pending: Buffer = b4a.alloc(0)

  push(chunk: Buffer): Buffer[] {
    const data = this.pending.length > 0 ? b4a.concat([this.pending, chunk]) : chunk
    const lines: Buffer[] = []

    let start = 0
    let end: number
    while ((end = b4a.indexOf(data, LF, start)) !== -1) {
      const lineEnd = end > start && data[end - 1] === CR ? end - 1 : end
      lines.push(data.subarray(start, lineEnd))
      start = end + 1
    }

    this.pending = start < data.length ? data.subarray(start) : b4a.alloc(0)
    return lines
  }

  /** Bytes received after the last complete line. */
  get pendingLength(): number {
    return this.pending.length
  }
}
