import net from 'net'
import { LineReader } from './line-reader.js'
import { errorMessage } from './utils.js'

/** One protocol session, driven a line at a time by its connection. */
export interface LineSession {
  getGreeting(): string
  processLine(line: Buffer): Promise<string | Buffer>
  isClosed(): boolean
  /** The connection closed before the session finished. */
  abort(): void | Promise<void>
}

export interface LineServerConfig {
  port: number
  host?: string
  idleTimeoutMs?: number
  maxLineLength?: number
}

const DEFAULT_IDLE_TIMEOUT_MS = 300000
const DEFAULT_MAX_LINE_LENGTH = 64 * 1024

/**
 * TCP listener that gives every connection its own session and feeds it
 * complete lines strictly in order, writing each reply before the next
 * line is handled.
 */
export abstract class LineServer<C extends LineServerConfig = LineServerConfig> {
  private server: net.Server | null = null
  private connections: Set<net.Socket> = new Set()
  protected config: C

  protected abstract readonly protocol: string

  constructor(config: C) {
    this.config = config
  }

  protected abstract createSession(): LineSession

  start(): Promise<number> {
    return new Promise((resolve, reject) => {
      const server = net.createServer((socket) => {
        this.handleConnection(socket)
      })
      this.server = server

      server.once('error', reject)

      server.listen(this.config.port, this.config.host ?? '127.0.0.1', () => {
        server.off('error', reject)
        server.on('error', (err) => {
          console.error(`${this.protocol} server error: ${err.message}`)
        })
        const addr = server.address()
        const port = (addr && typeof addr === 'object') ? addr.port : this.config.port
        console.log(`${this.protocol} server listening on port ${port}`)
        resolve(port)
      })
    })
  }

  stop(): Promise<void> {
    return new Promise((resolve) => {
      const server = this.server
      if (!server) {
        resolve()
        return
      }
      for (const socket of this.connections) {
        socket.destroy()
      }
      server.close(() => {
        this.server = null
        resolve()
      })
    })
  }

  get connectionCount(): number {
    return this.connections.size
  }

  private handleConnection(socket: net.Socket): void {
    const protocol = this.protocol
    const remoteAddr = socket.remoteAddress ?? 'unknown'
    console.log(`${protocol} connection from ${remoteAddr}`)
    this.connections.add(socket)

    const session = this.createSession()

    // Send greeting
    socket.write(session.getGreeting())
    socket.setTimeout(this.config.idleTimeoutMs ?? DEFAULT_IDLE_TIMEOUT_MS)

    const reader = new LineReader()
    const maxLineLength = this.config.maxLineLength ?? DEFAULT_MAX_LINE_LENGTH
    let pending: Promise<void> = Promise.resolve()

    const handleLine = async (line: Buffer): Promise<void> => {
      if (session.isClosed() || socket.destroyed) return

      const response = await session.processLine(line)
      if (response.length > 0 && !socket.destroyed) {
        socket.write(response)
      }

      if (session.isClosed()) {
        socket.end()
      }
    }

    socket.on('data', (chunk: Buffer) => {
      for (const line of reader.push(chunk)) {
        pending = pending
          .then(() => handleLine(line))
          .catch((err: unknown) => {
            console.error(`${protocol} session error from ${remoteAddr}: ${errorMessage(err)}`)
            socket.destroy()
          })
      }

      if (reader.pendingLength > maxLineLength) {
        console.error(`${protocol} line too long from ${remoteAddr}, closing connection`)
        socket.destroy()
      }
    })

    socket.on('timeout', () => {
      console.error(`${protocol} connection from ${remoteAddr} idle, closing`)
      socket.destroy()
    })

    socket.on('error', (err: Error) => {
      console.error(`${protocol} socket error: ${err.message}`)
    })

    socket.on('close', () => {
      this.connections.delete(socket)
      pending = pending
        .then(async () => {
          if (!session.isClosed()) {
            console.log(`${protocol} session from ${remoteAddr} ended without QUIT`)
            await session.abort()
          }
          console.log(`${protocol} connection closed from ${remoteAddr}`)
        })
        .catch((err: unknown) => {
          console.error(`${protocol} cleanup failed for ${remoteAddr}: ${errorMessage(err)}`)
        })
    })
  }
}
