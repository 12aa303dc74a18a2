import b4a from 'b4a'
import { LineConnection, ProtocolError } from './connection.js'

export interface Pop3Listing {
  index: number
  size: number
}

export interface Pop3UniqueId {
  index: number
  id: string
}

const CRLF_BYTES = b4a.from('\r\n')

/** Rebuild the message bytes from retrieved lines, each ending in CRLF. */
export function joinLines(lines: Buffer[]): Buffer {
  const parts: Buffer[] = []
  for (const line of lines) {
    parts.push(line, CRLF_BYTES)
  }
  return b4a.concat(parts)
}

/** Retrieved lines as text with `\n` line endings. */
export function decodeBody(lines: Buffer[]): string {
  return lines.map(line => `${b4a.toString(line, 'utf8')}\n`).join('')
}

function parsePair(line: string): [number, string] | null {
  const match = line.match(/^(\d+)\s+(\S+)$/)
  if (!match || match[1] === undefined || match[2] === undefined) return null
  return [parseInt(match[1], 10), match[2]]
}

export class Pop3Client {
  private connection: LineConnection

  constructor(connection: LineConnection) {
    this.connection = connection
  }

  static async connect(host: string, port: number, timeoutMs?: number): Promise<Pop3Client> {
    const connection = await LineConnection.connect(host, port, timeoutMs)
    const client = new Pop3Client(connection)
    try {
      await client.readStatus()
    } catch (err) {
      connection.destroy()
      throw err
    }
    return client
  }

  /** Read a status line; resolves with the text after +OK. */
  private async readStatus(): Promise<string> {
    const line = await this.connection.readText()
    if (line === '+OK' || line.startsWith('+OK ')) {
      return line.slice(4)
    }
    if (line.startsWith('-ERR')) {
      throw new ProtocolError('Server replied with an error', line)
    }
    throw new ProtocolError('Unexpected reply', line)
  }

  async command(line: string): Promise<string> {
    this.connection.writeLine(line)
    return this.readStatus()
  }

  async login(username: string, password: string): Promise<void> {
    await this.command(`USER ${username}`)
    await this.command(`PASS ${password}`)
  }

  async stat(): Promise<{ count: number; size: number }> {
    const status = await this.command('STAT')
    const pair = parsePair(status)
    if (!pair) throw new ProtocolError('Malformed STAT reply', status)
    return { count: pair[0], size: parseInt(pair[1], 10) }
  }

  async list(): Promise<Pop3Listing[]> {
    await this.command('LIST')
    const lines = await this.connection.readMultiline()
    const listings: Pop3Listing[] = []
    for (const line of lines) {
      const pair = parsePair(b4a.toString(line, 'utf8'))
      if (pair) listings.push({ index: pair[0], size: parseInt(pair[1], 10) })
    }
    return listings
  }

  async uidl(): Promise<Pop3UniqueId[]> {
    await this.command('UIDL')
    const lines = await this.connection.readMultiline()
    const ids: Pop3UniqueId[] = []
    for (const line of lines) {
      const pair = parsePair(b4a.toString(line, 'utf8'))
      if (pair) ids.push({ index: pair[0], id: pair[1] })
    }
    return ids
  }

  /** The stored message bytes. */
  async retrieve(index: number): Promise<Buffer> {
    await this.command(`RETR ${index}`)
    return joinLines(await this.connection.readMultiline())
  }

  async retrieveText(index: number): Promise<string> {
    await this.command(`RETR ${index}`)
    return decodeBody(await this.connection.readMultiline())
  }

  async delete(index: number): Promise<void> {
    await this.command(`DELE ${index}`)
  }

  async reset(): Promise<void> {
    await this.command('RSET')
  }

  async noop(): Promise<void> {
    await this.command('NOOP')
  }

  async quit(): Promise<string> {
    const status = await this.command('QUIT')
    await this.connection.close()
    return status
  }

  destroy(): void {
    this.connection.destroy()
  }
}
