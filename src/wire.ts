import b4a from 'b4a'

export const CRLF = '\r\n'

const LF = 0x0a
const DOT = 0x2e
const DOT_BYTE = b4a.from('.')
const CRLF_BYTES = b4a.from(CRLF)
const TERMINATOR = b4a.from('.\r\n')

export interface CommandLine {
  verb: string
  argument: string
}

const COMMAND_PATTERN = /^(\S+)(?:\s+(.*))?$/

/**
 * Split a protocol line into its upper-cased verb and the rest of the line.
 * Returns null for blank lines.
 */
export function splitCommand(line: string): CommandLine | null {
  const trimmed = line.trim()
  if (!trimmed) return null

  const match = trimmed.match(COMMAND_PATTERN)
  if (!match || match[1] === undefined) return null

  return {
    verb: match[1].toUpperCase(),
    argument: match[2]?.trim() ?? ''
  }
}

/** True for a data line that is exactly the end-of-data marker. */
export function isTerminator(line: Buffer): boolean {
  return line.length === 1 && line[0] === DOT
}

// RFC 5321 4.5.2: a leading dot on any longer line was added by the sender
export function unstuffLine(line: Buffer): Buffer {
  return line.length > 1 && line[0] === DOT ? line.subarray(1) : line
}

export function stuffLine(line: string): string {
  return line.startsWith('.') ? `.${line}` : line
}

/** Prefix every line of `body` that begins with a dot with one more dot. */
export function dotStuff(body: Buffer): Buffer {
  const parts: Buffer[] = []
  let start = 0
  while (start < body.length) {
    if (body[start] === DOT) parts.push(DOT_BYTE)
    const end = b4a.indexOf(body, LF, start)
    const next = end === -1 ? body.length : end + 1
    parts.push(body.subarray(start, next))
    start = next
  }
  return b4a.concat(parts)
}

/**
 * Frame a message body as the payload of a multi-line reply: dot-stuffed,
 * ending in CRLF and followed by the lone-dot line.
 */
export function frameBody(body: Buffer): Buffer {
  const stuffed = dotStuff(body)
  const parts = [stuffed]
  if (stuffed.length > 0 && stuffed[stuffed.length - 1] !== LF) {
    parts.push(CRLF_BYTES)
  }
  parts.push(TERMINATOR)
  return b4a.concat(parts)
}

/** A status line followed by listing lines and the lone-dot line. */
export function multiline(status: string, lines: string[]): string {
  let response = `${status}${CRLF}`
  for (const line of lines) {
    response += `${stuffLine(line)}${CRLF}`
  }
  response += `.${CRLF}`
  return response
}
