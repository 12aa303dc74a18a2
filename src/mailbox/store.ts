import fs from 'fs'
import path from 'path'
import b4a from 'b4a'
import lockfile, { type LockOptions } from 'proper-lockfile'
import type { UserDirectory } from '../directory.js'
import { generateId, errorMessage } from '../utils.js'
import { encodeRecord, decodeRecords } from './record.js'
import type {
  StoredMessage,
  NewMessage,
  MessageInfo,
  MailboxStats,
  AppendResult,
  AcquireOptions
} from './types.js'

const MAILBOX_FILE_NAME = 'mailbox'
// lock directories are `<target>.lock` beside the mailbox file
const WRITE_LOCK_TARGET = MAILBOX_FILE_NAME
const SESSION_LOCK_TARGET = `${MAILBOX_FILE_NAME}.session`

// Locks left behind by a crashed process are taken over after this long
const LOCK_STALE_MS = 10000

type ReleaseLock = () => Promise<void>

const WRITE_LOCK_RETRIES: LockOptions['retries'] = { retries: 50, minTimeout: 5, maxTimeout: 100 }
const SESSION_LOCK_WAIT: LockOptions['retries'] = { forever: true, minTimeout: 50, maxTimeout: 1000 }

export interface MailboxStoreConfig {
  /** Directory holding one sub-directory per user. */
  root: string
  directory: UserDirectory
  waitForLock?: boolean
}

function isLockHeld(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ELOCKED'
}

export type AcquireResult =
  | { status: 'acquired'; handle: MailboxHandle }
  | { status: 'locked' }
  | { status: 'no-such-user' }

/**
 * Exclusive view of one mailbox for the length of a retrieval session.
 * Indices are 1-based into the snapshot taken when the lock was acquired.
 */
export class MailboxHandle {
  readonly username: string
  readonly messages: readonly StoredMessage[]
  private marks: Set<number> = new Set()
  private active = true

  constructor(username: string, messages: StoredMessage[]) {
    this.username = username
    this.messages = messages
  }

  get isActive(): boolean {
    return this.active
  }

  get markCount(): number {
    return this.marks.size
  }

  message(index: number): StoredMessage | null {
    if (!Number.isInteger(index) || index < 1 || index > this.messages.length) return null
    return this.messages[index - 1] ?? null
  }

  isMarked(index: number): boolean {
    return this.marks.has(index)
  }

  markedIndices(): number[] {
    return Array.from(this.marks).sort((a, b) => a - b)
  }

  mark(index: number): void {
    this.marks.add(index)
  }

  clearMarks(): void {
    this.marks.clear()
  }

  close(): void {
    this.active = false
    this.marks.clear()
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT'
}

async function readMailboxFile(file: string): Promise<Buffer> {
  try {
    return await fs.promises.readFile(file)
  } catch (err) {
    if (isNotFound(err)) return b4a.alloc(0)
    throw err
  }
}

async function fileSize(file: string): Promise<number> {
  try {
    return (await fs.promises.stat(file)).size
  } catch (err) {
    if (isNotFound(err)) return 0
    throw err
  }
}

async function writeFileSynced(file: string, data: Buffer): Promise<void> {
  const handle = await fs.promises.open(file, 'w')
  try {
    await handle.writeFile(data)
    await handle.sync()
  } finally {
    await handle.close()
  }
}

/**
 * Per-user mailbox files. Appends and commits on one mailbox run one at a
 * time; at most one retrieval session holds a mailbox's lock. Both rules
 * hold across processes sharing the same root, through lock directories
 * next to each mailbox file.
 */
export class MailboxStore {
  private config: MailboxStoreConfig
  private locks: Set<string> = new Set()
  private waiters: Map<string, Array<() => void>> = new Map()
  private writeChains: Map<string, Promise<void>> = new Map()
  private sessionLocks: Map<string, ReleaseLock> = new Map()
  // mailbox size as this process last left it; anything else gets rescanned
  private knownSizes: Map<string, number> = new Map()

  constructor(config: MailboxStoreConfig) {
    this.config = config
  }

  getMailboxPath(username: string): string {
    return path.join(this.config.root, username, MAILBOX_FILE_NAME)
  }

  isLocked(username: string): boolean {
    return this.locks.has(username)
  }

  private async lockFile(username: string, target: string, retries: LockOptions['retries']): Promise<ReleaseLock> {
    const dir = path.join(this.config.root, username)
    await fs.promises.mkdir(dir, { recursive: true })
    return lockfile.lock(path.join(dir, target), {
      realpath: false,
      stale: LOCK_STALE_MS,
      retries,
      onCompromised: (err) => {
        console.error(`Mailbox ${username}: ${target} lock compromised: ${err.message}`)
      }
    })
  }

  // In-process chain first, then the on-disk write lock for other processes
  private serialize<T>(username: string, task: () => Promise<T>): Promise<T> {
    const previous = this.writeChains.get(username) ?? Promise.resolve()
    const result = previous.then(async () => {
      const unlockFile = await this.lockFile(username, WRITE_LOCK_TARGET, WRITE_LOCK_RETRIES)
      try {
        return await task()
      } finally {
        await unlockFile()
      }
    })
    this.writeChains.set(username, result.then(() => undefined, () => undefined))
    return result
  }

  // A crash mid-append can leave a partial record at the end of the file;
  // cut it off before writing after it.
  private async repairTail(username: string, file: string): Promise<number> {
    const size = await fileSize(file)
    if (this.knownSizes.get(username) === size) return size

    const data = await readMailboxFile(file)
    const decoded = decodeRecords(data)
    if (decoded.damagedTail) {
      console.warn(`Mailbox ${username}: truncating ${data.length - decoded.validLength} damaged trailing byte(s)`)
      await fs.promises.truncate(file, decoded.validLength)
    }
    this.knownSizes.set(username, decoded.validLength)
    return decoded.validLength
  }

  async append(username: string, message: NewMessage): Promise<AppendResult> {
    if (!this.config.directory.has(username)) return 'no-such-user'

    const stored: StoredMessage = {
      ...message,
      id: generateId(),
      receivedAt: Date.now()
    }
    const record = encodeRecord(stored)
    const file = this.getMailboxPath(username)

    await this.serialize(username, async () => {
      const size = await this.repairTail(username, file)
      try {
        await fs.promises.appendFile(file, record)
      } catch (err) {
        this.knownSizes.delete(username)
        throw err
      }
      this.knownSizes.set(username, size + record.length)
    })

    console.log(`Stored message ${stored.id.slice(0, 8)}... for ${username} (${stored.body.length} octets)`)
    return 'delivered'
  }

  async readAll(username: string): Promise<StoredMessage[]> {
    const data = await readMailboxFile(this.getMailboxPath(username))
    const decoded = decodeRecords(data)
    if (decoded.damagedTail) {
      console.warn(`Mailbox ${username}: ignoring ${data.length - decoded.validLength} undecodable trailing byte(s)`)
    }
    return decoded.messages
  }

  async acquire(username: string, options: AcquireOptions = {}): Promise<AcquireResult> {
    if (!this.config.directory.has(username)) return { status: 'no-such-user' }

    const wait = options.wait ?? this.config.waitForLock ?? false
    if (this.locks.has(username)) {
      if (!wait) return { status: 'locked' }

      // unlock() hands the lock straight to the next waiter
      await new Promise<void>((resolve) => {
        const queue = this.waiters.get(username) ?? []
        queue.push(resolve)
        this.waiters.set(username, queue)
      })
    } else {
      this.locks.add(username)
    }

    // another process may hold the maildrop
    let unlockSession: ReleaseLock
    try {
      unlockSession = await this.lockFile(username, SESSION_LOCK_TARGET, wait ? SESSION_LOCK_WAIT : 0)
    } catch (err) {
      this.unlock(username)
      if (isLockHeld(err)) return { status: 'locked' }
      throw err
    }

    try {
      const messages = await this.serialize(username, () => this.readAll(username))
      this.sessionLocks.set(username, unlockSession)
      return { status: 'acquired', handle: new MailboxHandle(username, messages) }
    } catch (err) {
      try {
        await unlockSession()
      } finally {
        this.unlock(username)
      }
      throw err
    }
  }

  private unlock(username: string): void {
    const queue = this.waiters.get(username)
    const next = queue?.shift()
    if (queue && queue.length === 0) {
      this.waiters.delete(username)
    }
    if (next) {
      next()
      return
    }
    this.locks.delete(username)
  }

  private ensureActive(handle: MailboxHandle): void {
    if (!handle.isActive) {
      throw new Error(`Mailbox handle for ${handle.username} has been released`)
    }
  }

  list(handle: MailboxHandle): MessageInfo[] {
    this.ensureActive(handle)
    const entries: MessageInfo[] = []
    handle.messages.forEach((message, i) => {
      const index = i + 1
      if (!handle.isMarked(index)) {
        entries.push({ index, size: message.body.length })
      }
    })
    return entries
  }

  stat(handle: MailboxHandle): MailboxStats {
    let count = 0
    let size = 0
    for (const entry of this.list(handle)) {
      count++
      size += entry.size
    }
    return { count, size }
  }

  fetch(handle: MailboxHandle, index: number): StoredMessage | null {
    this.ensureActive(handle)
    if (handle.isMarked(index)) return null
    return handle.message(index)
  }

  markDelete(handle: MailboxHandle, index: number): boolean {
    this.ensureActive(handle)
    if (!handle.message(index) || handle.isMarked(index)) return false
    handle.mark(index)
    return true
  }

  resetMarks(handle: MailboxHandle): void {
    this.ensureActive(handle)
    handle.clearMarks()
  }

  /**
   * Remove the marked messages from disk and release the lock. The mailbox
   * is rewritten to a temp file and renamed over the mailbox file, and records
   * are matched by id, so messages appended since acquire are kept.
   * Resolves with the number of messages removed.
   */
  async commit(handle: MailboxHandle, marks: Iterable<number> = handle.markedIndices()): Promise<number> {
    this.ensureActive(handle)
    const username = handle.username

    const ids = new Set<string>()
    for (const index of marks) {
      const message = handle.message(index)
      if (message) ids.add(message.id)
    }

    try {
      if (ids.size === 0) return 0

      return await this.serialize(username, async () => {
        const file = this.getMailboxPath(username)
        const current = await this.readAll(username)
        const kept = current.filter((message) => !ids.has(message.id))
        const temp = `${file}.${generateId()}.tmp`
        const data = b4a.concat(kept.map(encodeRecord))

        try {
          await writeFileSynced(temp, data)
          await fs.promises.rename(temp, file)
        } catch (err) {
          console.error(`Mailbox ${username}: commit failed, mailbox left unchanged: ${errorMessage(err)}`)
          await fs.promises.rm(temp, { force: true })
          throw err
        }

        this.knownSizes.set(username, data.length)
        return current.length - kept.length
      })
    } finally {
      await this.release(handle)
    }
  }

  /** Free the lock without touching storage. Safe to call more than once. */
  async release(handle: MailboxHandle): Promise<void> {
    if (!handle.isActive) return
    handle.close()

    const unlockSession = this.sessionLocks.get(handle.username)
    this.sessionLocks.delete(handle.username)
    try {
      if (unlockSession) await unlockSession()
    } catch (err) {
      // the lock directory goes stale and is taken over later
      console.error(`Mailbox ${handle.username}: failed to remove session lock: ${errorMessage(err)}`)
    } finally {
      this.unlock(handle.username)
    }
  }
}
