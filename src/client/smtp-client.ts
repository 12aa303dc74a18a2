import { CRLF, stuffLine } from '../wire.js'
import { LineConnection, ProtocolError } from './connection.js'

export interface SmtpReply {
  code: number
  lines: string[]
}

export interface OutgoingMail {
  from: string
  to: string[]
  body: string
}

export interface SendResult {
  accepted: string[]
  rejected: Array<{ address: string; reply: string }>
}

const REPLY_PATTERN = /^(\d{3})([ -])(.*)$/

/**
 * Turn a text body into DATA lines: `\n` or CRLF line endings become CRLF,
 * leading dots are stuffed. The terminator is not included.
 */
export function encodeBody(body: string): string {
  if (body === '') return ''
  const text = body.endsWith('\n') ? body.slice(0, body.endsWith('\r\n') ? -2 : -1) : body
  return text.split(/\r?\n/).map(line => `${stuffLine(line)}${CRLF}`).join('')
}

function formatReply(reply: SmtpReply): string {
  return `${reply.code} ${reply.lines.join(' / ')}`
}

export class SmtpClient {
  private connection: LineConnection

  constructor(connection: LineConnection) {
    this.connection = connection
  }

  static async connect(host: string, port: number, timeoutMs?: number): Promise<SmtpClient> {
    const connection = await LineConnection.connect(host, port, timeoutMs)
    const client = new SmtpClient(connection)
    try {
      await client.expect(220, 'Unexpected greeting')
    } catch (err) {
      connection.destroy()
      throw err
    }
    return client
  }

  async readReply(): Promise<SmtpReply> {
    const lines: string[] = []
    for (;;) {
      const line = await this.connection.readText()
      const match = line.match(REPLY_PATTERN)
      if (!match || match[1] === undefined) {
        throw new ProtocolError('Malformed SMTP reply', line)
      }
      lines.push(match[3] ?? '')
      if (match[2] === ' ') {
        return { code: parseInt(match[1], 10), lines }
      }
    }
  }

  private async expect(code: number, message: string): Promise<SmtpReply> {
    const reply = await this.readReply()
    if (reply.code !== code) {
      throw new ProtocolError(message, formatReply(reply))
    }
    return reply
  }

  async command(line: string): Promise<SmtpReply> {
    this.connection.writeLine(line)
    return this.readReply()
  }

  async hello(name = 'localhost'): Promise<void> {
    const reply = await this.command(`EHLO ${name}`)
    if (reply.code === 250) return

    const fallback = await this.command(`HELO ${name}`)
    if (fallback.code !== 250) {
      throw new ProtocolError('Server refused greeting', formatReply(fallback))
    }
  }

  async sendMail(mail: OutgoingMail): Promise<SendResult> {
    const mailReply = await this.command(`MAIL FROM:<${mail.from}>`)
    if (mailReply.code !== 250) {
      throw new ProtocolError('Sender rejected', formatReply(mailReply))
    }

    const result: SendResult = { accepted: [], rejected: [] }
    for (const address of mail.to) {
      const reply = await this.command(`RCPT TO:<${address}>`)
      if (reply.code === 250) {
        result.accepted.push(address)
      } else {
        result.rejected.push({ address, reply: formatReply(reply) })
      }
    }

    if (result.accepted.length === 0) {
      await this.reset()
      const reasons = result.rejected.map(r => r.reply).join('; ')
      throw new ProtocolError('No recipient accepted', reasons)
    }

    const dataReply = await this.command('DATA')
    if (dataReply.code !== 354) {
      throw new ProtocolError('DATA refused', formatReply(dataReply))
    }

    this.connection.write(`${encodeBody(mail.body)}.${CRLF}`)
    await this.expect(250, 'Message not accepted')
    return result
  }

  async reset(): Promise<void> {
    const reply = await this.command('RSET')
    if (reply.code !== 250) {
      throw new ProtocolError('RSET failed', formatReply(reply))
    }
  }

  async quit(): Promise<void> {
    const reply = await this.command('QUIT')
    await this.connection.close()
    if (reply.code !== 221) {
      throw new ProtocolError('QUIT failed', formatReply(reply))
    }
  }

  destroy(): void {
    this.connection.destroy()
  }
}
