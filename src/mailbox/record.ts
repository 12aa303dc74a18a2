import b4a from 'b4a'
import type { StoredMessage } from './types.js'

const LF = 0x0a

interface RecordHeader {
  id: string
  sender: string
  recipients: string[]
  receivedAt: number
  size: number
}

export interface DecodedMailbox {
  messages: StoredMessage[]
  /** Length of the prefix made of complete, well-formed records. */
  validLength: number
  /** Set when bytes after the valid prefix could not be decoded. */
  damagedTail: boolean
}

/**
 * Records are a one-line JSON header carrying the body length, the body
 * bytes, then a newline. The length prefix lets bodies hold any bytes.
 */
export function encodeRecord(message: StoredMessage): Buffer {
  const header: RecordHeader = {
    id: message.id,
    sender: message.sender,
    recipients: message.recipients,
    receivedAt: message.receivedAt,
    size: message.body.length
  }
  return b4a.concat([
    b4a.from(`${JSON.stringify(header)}\n`),
    message.body,
    b4a.from('\n')
  ])
}

function parseHeader(text: string): RecordHeader | null {
  let data: unknown
  try {
    data = JSON.parse(text)
  } catch {
    return null
  }

  if (typeof data !== 'object' || data === null) return null
  const h = data as Record<string, unknown>
  if (
    typeof h.id !== 'string' ||
    typeof h.sender !== 'string' ||
    !Array.isArray(h.recipients) ||
    !h.recipients.every((r): r is string => typeof r === 'string') ||
    typeof h.receivedAt !== 'number' ||
    typeof h.size !== 'number' ||
    !Number.isInteger(h.size) ||
    h.size < 0
  ) {
    return null
  }

  return {
    id: h.id,
    sender: h.sender,
    recipients: h.recipients,
    receivedAt: h.receivedAt,
    size: h.size
  }
}

export function decodeRecords(data: Buffer): DecodedMailbox {
  const messages: StoredMessage[] = []
  let pos = 0

  while (pos < data.length) {
    const headerEnd = b4a.indexOf(data, LF, pos)
    if (headerEnd === -1) break

    const header = parseHeader(b4a.toString(data, 'utf8', pos, headerEnd))
    if (!header) break

    const bodyStart = headerEnd + 1
    const bodyEnd = bodyStart + header.size
    if (bodyEnd >= data.length || data[bodyEnd] !== LF) break

    messages.push({
      id: header.id,
      sender: header.sender,
      recipients: header.recipients,
      receivedAt: header.receivedAt,
      // copy so the message does not pin the whole file buffer
      body: b4a.from(data.subarray(bodyStart, bodyEnd))
    })
    pos = bodyEnd + 1
  }

  return { messages, validLength: pos, damagedTail: pos < data.length }
}
