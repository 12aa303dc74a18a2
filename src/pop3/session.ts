import b4a from 'b4a'
import type { UserDirectory } from '../directory.js'
import type { AcquireResult, MailboxStore, MailboxHandle } from '../mailbox/store.js'
import { errorMessage } from '../utils.js'
import { frameBody, multiline } from '../wire.js'
import type { MessageNumber, Pop3Command, Pop3State } from './types.js'
import { parseCommand } from './parser.js'

export interface Pop3SessionConfig {
  hostname: string
  directory: Pick<UserDirectory, 'has' | 'verify'>
  store: MailboxStore
}

const LF = 0x0a
const CAPABILITIES = ['USER', 'UIDL', 'TOP', 'RESP-CODES']

/**
 * Headers, the blank separator line and the first `count` body lines of a
 * message. A message without a blank line is all headers.
 */
export function topOfMessage(body: Buffer, count: number): Buffer {
  let pos = 0
  let inBody = false
  let bodyLines = 0

  while (pos < body.length) {
    if (inBody && bodyLines >= count) break

    const end = b4a.indexOf(body, LF, pos)
    const next = end === -1 ? body.length : end + 1
    const line = b4a.toString(body, 'utf8', pos, next)

    if (inBody) {
      bodyLines++
    } else if (line === '\r\n' || line === '\n') {
      inBody = true
    }
    pos = next
  }

  return body.subarray(0, pos)
}

export class Pop3Session {
  private state: Pop3State = 'AUTHORIZATION'
  private config: Pop3SessionConfig
  private userProvided: string | null = null
  private handle: MailboxHandle | null = null

  constructor(config: Pop3SessionConfig) {
    this.config = config
  }

  getGreeting(): string {
    return `+OK ${this.config.hostname} POP3 server ready\r\n`
  }

  getState(): Pop3State {
    return this.state
  }

  isClosed(): boolean {
    return this.state === 'CLOSED'
  }

  /** Username of the locked maildrop, once authenticated. */
  get authenticatedUser(): string | null {
    return this.handle?.username ?? null
  }

  /** Messages marked for deletion in the current transaction. */
  get deletionMarks(): number[] {
    return this.handle?.markedIndices() ?? []
  }

  async processLine(line: Buffer | string): Promise<string | Buffer> {
    if (this.state === 'CLOSED') return ''

    const text = typeof line === 'string' ? line : b4a.toString(line, 'utf8')
    const cmd: Pop3Command = parseCommand(text)

    switch (cmd.kind) {
      case 'USER': return this.handleUser(cmd.username)
      case 'PASS': return this.handlePass(cmd.password)
      case 'STAT': return this.handleStat()
      case 'LIST': return this.handleList(cmd.message)
      case 'RETR': return this.handleRetr(cmd.message)
      case 'TOP': return this.handleTop(cmd.message, cmd.lines)
      case 'DELE': return this.handleDele(cmd.message)
      case 'UIDL': return this.handleUidl(cmd.message)
      case 'NOOP': return this.handleNoop()
      case 'RSET': return this.handleRset()
      case 'CAPA': return multiline('+OK capability list follows', CAPABILITIES)
      case 'QUIT': return this.handleQuit()
      case 'UNKNOWN': return '-ERR unknown command\r\n'
      default: {
        const unreachable: never = cmd
        return unreachable
      }
    }
  }

  private handleUser(username: string): string {
    if (this.state !== 'AUTHORIZATION') {
      return '-ERR already authenticated\r\n'
    }
    if (!username) {
      return '-ERR missing username\r\n'
    }
    if (!this.config.directory.has(username)) {
      this.userProvided = null
      return `-ERR no mailbox for ${username}\r\n`
    }
    this.userProvided = username
    return `+OK ${username} is a valid mailbox\r\n`
  }

  private async handlePass(password: string): Promise<string> {
    if (this.state !== 'AUTHORIZATION') {
      return '-ERR already authenticated\r\n'
    }
    const username = this.userProvided
    if (!username) {
      return '-ERR send USER first\r\n'
    }
    if (!password) {
      return '-ERR missing password\r\n'
    }

    // A failed PASS sends the client back to USER
    this.userProvided = null

    if (!this.config.directory.verify(username, password)) {
      return '-ERR invalid credentials\r\n'
    }

    let result: AcquireResult
    try {
      result = await this.config.store.acquire(username)
    } catch (err) {
      console.error(`Failed to open maildrop for ${username}: ${errorMessage(err)}`)
      return '-ERR unable to open maildrop\r\n'
    }

    if (result.status === 'locked') {
      console.log(`Maildrop for ${username} is already locked`)
      return '-ERR [IN-USE] unable to lock maildrop\r\n'
    }
    if (result.status === 'no-such-user') {
      return '-ERR invalid credentials\r\n'
    }

    // The connection may have been torn down while the mailbox was read
    if (this.getState() !== 'AUTHORIZATION') {
      await this.config.store.release(result.handle)
      return ''
    }

    this.handle = result.handle
    this.state = 'TRANSACTION'
    const { count, size } = this.config.store.stat(result.handle)
    return `+OK maildrop locked and ready, ${count} messages (${size} octets)\r\n`
  }

  private transactionHandle(): MailboxHandle | null {
    return this.state === 'TRANSACTION' ? this.handle : null
  }

  private handleStat(): string {
    const handle = this.transactionHandle()
    if (!handle) return '-ERR not authenticated\r\n'

    const { count, size } = this.config.store.stat(handle)
    return `+OK ${count} ${size}\r\n`
  }

  private handleList(message: MessageNumber): string {
    const handle = this.transactionHandle()
    if (!handle) return '-ERR not authenticated\r\n'

    if (message === 'missing') {
      const { count, size } = this.config.store.stat(handle)
      const lines = this.config.store.list(handle).map(entry => `${entry.index} ${entry.size}`)
      return multiline(`+OK ${count} messages (${size} octets)`, lines)
    }
    if (message === 'invalid') return '-ERR invalid message number\r\n'

    const stored = this.config.store.fetch(handle, message)
    if (!stored) return '-ERR no such message\r\n'
    return `+OK ${message} ${stored.body.length}\r\n`
  }

  private handleRetr(message: MessageNumber): string | Buffer {
    const handle = this.transactionHandle()
    if (!handle) return '-ERR not authenticated\r\n'
    if (typeof message !== 'number') return '-ERR invalid message number\r\n'

    const stored = this.config.store.fetch(handle, message)
    if (!stored) return '-ERR no such message\r\n'

    return b4a.concat([
      b4a.from(`+OK ${stored.body.length} octets\r\n`),
      frameBody(stored.body)
    ])
  }

  private handleTop(message: MessageNumber, lines: MessageNumber): string | Buffer {
    const handle = this.transactionHandle()
    if (!handle) return '-ERR not authenticated\r\n'
    if (typeof message !== 'number' || typeof lines !== 'number') {
      return '-ERR syntax: TOP msg n\r\n'
    }

    const stored = this.config.store.fetch(handle, message)
    if (!stored) return '-ERR no such message\r\n'

    return b4a.concat([
      b4a.from('+OK top of message follows\r\n'),
      frameBody(topOfMessage(stored.body, lines))
    ])
  }

  private handleDele(message: MessageNumber): string {
    const handle = this.transactionHandle()
    if (!handle) return '-ERR not authenticated\r\n'
    if (typeof message !== 'number') return '-ERR invalid message number\r\n'

    if (handle.isMarked(message)) {
      return `-ERR message ${message} already deleted\r\n`
    }
    if (!this.config.store.markDelete(handle, message)) {
      return '-ERR no such message\r\n'
    }
    return `+OK message ${message} deleted\r\n`
  }

  private handleUidl(message: MessageNumber): string {
    const handle = this.transactionHandle()
    if (!handle) return '-ERR not authenticated\r\n'

    if (message === 'missing') {
      const lines = this.config.store.list(handle).map(entry => {
        const stored = handle.message(entry.index)
        return `${entry.index} ${stored?.id ?? ''}`
      })
      return multiline('+OK', lines)
    }
    if (message === 'invalid') return '-ERR invalid message number\r\n'

    const stored = this.config.store.fetch(handle, message)
    if (!stored) return '-ERR no such message\r\n'
    return `+OK ${message} ${stored.id}\r\n`
  }

  private handleNoop(): string {
    if (!this.transactionHandle()) return '-ERR not authenticated\r\n'
    return '+OK\r\n'
  }

  private handleRset(): string {
    const handle = this.transactionHandle()
    if (!handle) return '-ERR not authenticated\r\n'

    this.config.store.resetMarks(handle)
    const { count, size } = this.config.store.stat(handle)
    return `+OK maildrop has ${count} messages (${size} octets)\r\n`
  }

  private async handleQuit(): Promise<string> {
    const handle = this.transactionHandle()
    if (!handle) {
      this.state = 'CLOSED'
      this.userProvided = null
      return `+OK ${this.config.hostname} POP3 server signing off\r\n`
    }

    // Commit deletions
    this.state = 'UPDATE'
    const { count } = this.config.store.stat(handle)
    try {
      const removed = await this.config.store.commit(handle)
      if (removed > 0) {
        console.log(`Removed ${removed} message(s) from maildrop ${handle.username}`)
      }
      return `+OK ${this.config.hostname} POP3 server signing off (${count} messages left)\r\n`
    } catch (err) {
      console.error(`Failed to update maildrop ${handle.username}: ${errorMessage(err)}`)
      return '-ERR some deleted messages not removed\r\n'
    } finally {
      this.handle = null
      this.state = 'CLOSED'
    }
  }

  /**
   * The connection closed without QUIT: behave as RSET and release the
   * maildrop without applying any deletion.
   */
  async abort(): Promise<void> {
    const handle = this.handle
    this.handle = null
    this.userProvided = null
    this.state = 'CLOSED'
    if (handle) {
      await this.config.store.release(handle)
      console.log(`Released maildrop ${handle.username} without committing`)
    }
  }
}
