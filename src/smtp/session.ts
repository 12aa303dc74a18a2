import b4a from 'b4a'
import type { UserDirectory } from '../directory.js'
import type { MailboxStore } from '../mailbox/store.js'
import { errorMessage } from '../utils.js'
import { isTerminator, unstuffLine } from '../wire.js'
import type { SmtpCommand, SmtpState, SmtpTransaction } from './types.js'
import { parseCommand } from './parser.js'

export interface SmtpSessionConfig {
  hostname: string
  directory: Pick<UserDirectory, 'resolveRecipient'>
  store: Pick<MailboxStore, 'append'>
  maxMessageSize?: number
}

const DEFAULT_MAX_MESSAGE_SIZE = 10 * 1024 * 1024
const CRLF_BYTES = b4a.from('\r\n')

const HELP_TOPICS: Record<string, string> = {
  HELO: 'HELO hostname',
  EHLO: 'EHLO hostname',
  MAIL: 'MAIL FROM:<address>',
  RCPT: 'RCPT TO:<address>',
  DATA: 'DATA',
  RSET: 'RSET',
  NOOP: 'NOOP',
  VRFY: 'VRFY <address>',
  HELP: 'HELP [command]',
  QUIT: 'QUIT'
}

export class SmtpSession {
  private state: SmtpState = 'GREETING'
  private transaction: SmtpTransaction = { from: null, to: [] }
  private dataBuffer: Buffer[] = []
  private dataSize = 0
  private config: SmtpSessionConfig

  constructor(config: SmtpSessionConfig) {
    this.config = config
  }

  getGreeting(): string {
    return `220 ${this.config.hostname} Service ready\r\n`
  }

  getState(): SmtpState {
    return this.state
  }

  isClosed(): boolean {
    return this.state === 'DONE'
  }

  /**
   * Handle one line from the peer (without its line ending) and resolve
   * with the reply to send, or '' while message data is being collected.
   */
  async processLine(line: Buffer | string): Promise<string> {
    if (this.state === 'DONE') return ''

    const bytes = typeof line === 'string' ? b4a.from(line) : line

    // In DATA state, collect message body
    if (this.state === 'DATA') {
      return this.processDataLine(bytes)
    }

    return this.handleCommand(parseCommand(b4a.toString(bytes, 'utf8')))
  }

  private handleCommand(cmd: SmtpCommand): string {
    switch (cmd.kind) {
      case 'HELO':
        return this.handleHelo(cmd.domain, false)
      case 'EHLO':
        return this.handleHelo(cmd.domain, true)
      case 'MAIL':
        return this.handleMail(cmd.address, cmd.hasParameters)
      case 'RCPT':
        return this.handleRcpt(cmd.address, cmd.hasParameters)
      case 'DATA':
        return this.handleData(cmd.argument)
      case 'RSET':
        return this.handleRset(cmd.argument)
      case 'NOOP':
        return '250 OK\r\n'
      case 'VRFY':
        return cmd.argument
          ? '252 Cannot VRFY user, but will accept message and attempt delivery\r\n'
          : '501 Syntax: VRFY <address>\r\n'
      case 'HELP':
        return this.handleHelp(cmd.topic)
      case 'QUIT':
        this.resetTransaction()
        this.state = 'DONE'
        return `221 ${this.config.hostname} closing connection\r\n`
      case 'EMPTY':
        return '500 Error: bad syntax\r\n'
      case 'UNKNOWN':
        return `500 Error: command "${cmd.verb}" not recognized\r\n`
      default: {
        const unreachable: never = cmd
        return unreachable
      }
    }
  }

  private handleHelo(domain: string, extended: boolean): string {
    if (!domain) {
      return `501 Syntax: ${extended ? 'EHLO' : 'HELO'} hostname\r\n`
    }
    this.state = 'READY'
    this.resetTransaction()
    if (extended) {
      return `250-${this.config.hostname} Hello ${domain}\r\n250 HELP\r\n`
    }
    return `250 ${this.config.hostname} Hello ${domain}\r\n`
  }

  private handleMail(address: string | null, hasParameters: boolean): string {
    if (this.state === 'GREETING') {
      return '503 Error: send HELO/EHLO first\r\n'
    }
    if (this.state === 'MAIL' || this.state === 'RCPT') {
      return '503 Error: nested MAIL command\r\n'
    }
    if (address === null) {
      return '501 Syntax: MAIL FROM:<address>\r\n'
    }
    if (hasParameters) {
      return '555 MAIL FROM parameters not recognized or not implemented\r\n'
    }

    this.resetTransaction()
    this.transaction.from = address
    this.state = 'MAIL'
    return '250 OK\r\n'
  }

  private handleRcpt(address: string | null, hasParameters: boolean): string {
    if (this.state === 'GREETING') {
      return '503 Error: send HELO/EHLO first\r\n'
    }
    if (this.state !== 'MAIL' && this.state !== 'RCPT') {
      return '503 Error: need MAIL command\r\n'
    }
    if (address === null) {
      return '501 Syntax: RCPT TO:<address>\r\n'
    }
    if (hasParameters) {
      return '555 RCPT TO parameters not recognized or not implemented\r\n'
    }

    const username = this.config.directory.resolveRecipient(address, this.config.hostname)
    if (username === null) {
      // the transaction carries on with the recipients accepted so far
      return `550 No such user here: <${address}>\r\n`
    }

    if (!this.transaction.to.some((r) => r.username === username)) {
      this.transaction.to.push({ address, username })
    }
    this.state = 'RCPT'
    return '250 OK\r\n'
  }

  private handleData(argument: string): string {
    if (this.state === 'GREETING') {
      return '503 Error: send HELO/EHLO first\r\n'
    }
    if (this.state === 'READY') {
      return '503 Error: need MAIL command\r\n'
    }
    if (this.state !== 'RCPT') {
      return '503 Error: need RCPT command\r\n'
    }
    if (argument) {
      return '501 Syntax: DATA\r\n'
    }
    this.state = 'DATA'
    this.dataBuffer = []
    this.dataSize = 0
    return '354 End data with <CR><LF>.<CR><LF>\r\n'
  }

  private processDataLine(line: Buffer): Promise<string> | string {
    if (isTerminator(line)) {
      return this.finishData()
    }

    const content = unstuffLine(line)
    this.dataSize += content.length + CRLF_BYTES.length
    // past the limit, keep counting but stop buffering
    if (this.dataSize <= this.maxMessageSize()) {
      this.dataBuffer.push(content, CRLF_BYTES)
    }
    return ''
  }

  private maxMessageSize(): number {
    return this.config.maxMessageSize ?? DEFAULT_MAX_MESSAGE_SIZE
  }

  private async finishData(): Promise<string> {
    const sender = this.transaction.from ?? ''
    const recipients = this.transaction.to
    const oversized = this.dataSize > this.maxMessageSize()
    const body = b4a.concat(this.dataBuffer)

    this.state = 'READY'
    this.resetTransaction()

    if (oversized) {
      return '552 Message exceeds fixed maximum message size\r\n'
    }

    const addresses = recipients.map((r) => r.address)
    let delivered = 0
    let failed = 0
    for (const recipient of recipients) {
      try {
        const result = await this.config.store.append(recipient.username, { sender, recipients: addresses, body })
        if (result === 'delivered') {
          delivered++
        } else {
          console.error(`Delivery to ${recipient.address} failed: no mailbox for ${recipient.username}`)
        }
      } catch (err) {
        failed++
        console.error(`Delivery to ${recipient.address} failed: ${errorMessage(err)}`)
      }
    }

    if (delivered > 0) {
      if (failed > 0) {
        console.warn(`Message from <${sender}> delivered to ${delivered} of ${recipients.length} recipient(s)`)
      }
      return `250 OK: message delivered to ${delivered} recipient(s)\r\n`
    }
    if (failed > 0) {
      return '451 Requested action aborted: local error in processing\r\n'
    }
    return '554 Transaction failed: no mailbox accepted the message\r\n'
  }

  private handleRset(argument: string): string {
    if (argument) {
      return '501 Syntax: RSET\r\n'
    }
    this.resetTransaction()
    if (this.state !== 'GREETING') {
      this.state = 'READY'
    }
    return '250 OK\r\n'
  }

  private handleHelp(topic: string): string {
    if (!topic) {
      return `214 Supported commands: ${Object.keys(HELP_TOPICS).join(' ')}\r\n`
    }
    const syntax = HELP_TOPICS[topic]
    if (!syntax) {
      return '504 HELP topic not recognized\r\n'
    }
    return `214 Syntax: ${syntax}\r\n`
  }

  private resetTransaction(): void {
    this.transaction = { from: null, to: [] }
    this.dataBuffer = []
    this.dataSize = 0
  }

  /** Connection went away: drop any partial message without delivering it. */
  abort(): void {
    this.resetTransaction()
    this.state = 'DONE'
  }
}
