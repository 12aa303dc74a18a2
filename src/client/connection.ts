import net from 'net'
import b4a from 'b4a'
import { LineReader } from '../line-reader.js'
import { unstuffLine, isTerminator, CRLF } from '../wire.js'

export const DEFAULT_CLIENT_TIMEOUT_MS = 10000

/** A negative or unexpected reply from a server. */
export class ProtocolError extends Error {
  readonly reply: string

  constructor(message: string, reply: string) {
    super(`${message}: ${reply}`)
    this.name = 'ProtocolError'
    this.reply = reply
  }
}

interface Waiter {
  resolve: (line: Buffer) => void
  reject: (err: Error) => void
}

/** Client side of a line-oriented connection with awaitable reads. */
export class LineConnection {
  private socket: net.Socket
  private reader: LineReader = new LineReader()
  private lines: Buffer[] = []
  private waiter: Waiter | null = null
  private failure: Error | null = null
  private timeoutMs: number

  constructor(socket: net.Socket, timeoutMs: number = DEFAULT_CLIENT_TIMEOUT_MS) {
    this.socket = socket
    this.timeoutMs = timeoutMs

    socket.on('data', (chunk: Buffer) => {
      for (const line of this.reader.push(chunk)) {
        this.deliver(line)
      }
    })
    socket.on('error', (err: Error) => {
      this.fail(err)
    })
    socket.on('close', () => {
      this.fail(new Error('Connection closed by server'))
    })
  }

  static connect(host: string, port: number, timeoutMs?: number): Promise<LineConnection> {
    return new Promise((resolve, reject) => {
      const socket = net.createConnection({ host, port })
      const onError = (err: Error): void => {
        reject(err)
      }
      socket.once('error', onError)
      socket.once('connect', () => {
        socket.off('error', onError)
        resolve(new LineConnection(socket, timeoutMs))
      })
    })
  }

  private deliver(line: Buffer): void {
    const waiter = this.waiter
    if (waiter) {
      this.waiter = null
      waiter.resolve(line)
    } else {
      this.lines.push(line)
    }
  }

  private fail(err: Error): void {
    if (this.failure) return
    this.failure = err
    const waiter = this.waiter
    if (waiter) {
      this.waiter = null
      waiter.reject(err)
    }
  }

  readLine(): Promise<Buffer> {
    const line = this.lines.shift()
    if (line !== undefined) return Promise.resolve(line)
    if (this.failure) return Promise.reject(this.failure)

    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.waiter = null
        reject(new Error(`Timed out after ${this.timeoutMs}ms waiting for the server`))
      }, this.timeoutMs)

      this.waiter = {
        resolve: (value) => {
          clearTimeout(timer)
          resolve(value)
        },
        reject: (err) => {
          clearTimeout(timer)
          reject(err)
        }
      }
    })
  }

  async readText(): Promise<string> {
    return b4a.toString(await this.readLine(), 'utf8')
  }

  /**
   * Read the lines of a multi-line reply up to the lone dot, undoing
   * dot-stuffing.
   */
  async readMultiline(): Promise<Buffer[]> {
    const lines: Buffer[] = []
    for (;;) {
      const line = await this.readLine()
      if (isTerminator(line)) return lines
      lines.push(unstuffLine(line))
    }
  }

  write(data: string | Buffer): void {
    this.socket.write(data)
  }

  writeLine(line: string): void {
    this.socket.write(`${line}${CRLF}`)
  }

  close(): Promise<void> {
    return new Promise((resolve) => {
      if (this.socket.destroyed) {
        resolve()
        return
      }
      this.socket.once('close', () => resolve())
      this.socket.end()
    })
  }

  destroy(): void {
    this.socket.destroy()
  }
}
