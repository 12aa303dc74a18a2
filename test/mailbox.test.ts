import { test, describe, beforeEach, afterEach, mock } from 'node:test'
import assert from 'node:assert'
import fs from 'node:fs'
import path from 'node:path'
import os from 'node:os'
import b4a from 'b4a'
import { UserDirectory } from '../src/directory.js'
import { MailboxStore, type MailboxHandle, type AcquireResult } from '../src/mailbox/store.js'
import { encodeRecord } from '../src/mailbox/record.js'

const directory = new UserDirectory([
  { username: 'alice', password: 'test-secret' },
  { username: 'bob', password: 'test-secret' }
])

function mail(body: string): { sender: string; recipients: string[]; body: Buffer } {
  return { sender: 'carol@mx.test', recipients: ['alice@mx.test'], body: b4a.from(body) }
}

function handleOf(result: AcquireResult): MailboxHandle {
  if (result.status !== 'acquired') {
    throw new Error(`expected acquired, got ${result.status}`)
  }
  return result.handle
}

function bodyText(store: MailboxStore, handle: MailboxHandle, index: number): string | null {
  const message = store.fetch(handle, index)
  return message ? b4a.toString(message.body) : null
}

describe('MailboxStore', () => {
  let root: string
  let store: MailboxStore

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'mailpair-store-'))
    store = new MailboxStore({ root, directory })
  })

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true })
  })

  test('append refuses unknown users', async () => {
    assert.strictEqual(await store.append('mallory', mail('x\r\n')), 'no-such-user')
    assert.strictEqual(fs.existsSync(path.join(root, 'mallory')), false)
  })

  test('acquire refuses unknown users', async () => {
    assert.deepStrictEqual(await store.acquire('mallory'), { status: 'no-such-user' })
  })

  test('an untouched mailbox is empty', async () => {
    const handle = handleOf(await store.acquire('alice'))
    assert.deepStrictEqual(store.stat(handle), { count: 0, size: 0 })
    assert.deepStrictEqual(store.list(handle), [])
    await store.release(handle)
  })

  test('appended messages are listed in arrival order', async () => {
    assert.strictEqual(await store.append('alice', mail('first\r\n')), 'delivered')
    assert.strictEqual(await store.append('alice', mail('second one\r\n')), 'delivered')

    const handle = handleOf(await store.acquire('alice'))
    assert.deepStrictEqual(store.list(handle), [{ index: 1, size: 7 }, { index: 2, size: 12 }])
    assert.deepStrictEqual(store.stat(handle), { count: 2, size: 19 })
    assert.strictEqual(bodyText(store, handle, 1), 'first\r\n')
    assert.strictEqual(bodyText(store, handle, 2), 'second one\r\n')
    assert.strictEqual(store.fetch(handle, 3), null)
    assert.strictEqual(store.fetch(handle, 0), null)

    const first = store.fetch(handle, 1)
    assert.strictEqual(first?.sender, 'carol@mx.test')
    assert.deepStrictEqual(first?.recipients, ['alice@mx.test'])
    assert.match(first?.id ?? '', /^[0-9a-f]{32}$/)
    await store.release(handle)
  })

  test('mailboxes are kept per user', async () => {
    await store.append('alice', mail('for alice\r\n'))
    await store.append('bob', mail('for bob\r\n'))

    const handle = handleOf(await store.acquire('bob'))
    assert.strictEqual(store.stat(handle).count, 1)
    assert.strictEqual(bodyText(store, handle, 1), 'for bob\r\n')
    await store.release(handle)
  })

  test('concurrent appends are all stored', async () => {
    const bodies = ['a\r\n', 'b\r\n', 'c\r\n', 'd\r\n', 'e\r\n']
    await Promise.all(bodies.map(body => store.append('alice', mail(body))))

    const handle = handleOf(await store.acquire('alice'))
    assert.strictEqual(store.stat(handle).count, 5)
    const stored = store.list(handle).map(entry => bodyText(store, handle, entry.index))
    assert.deepStrictEqual([...stored].sort(), bodies)
    await store.release(handle)
  })

  test('a second acquire fails while the lock is held', async () => {
    const handle = handleOf(await store.acquire('alice'))
    assert.strictEqual(store.isLocked('alice'), true)
    assert.deepStrictEqual(await store.acquire('alice'), { status: 'locked' })

    // other users are unaffected
    const other = handleOf(await store.acquire('bob'))
    await store.release(other)

    await store.release(handle)
    assert.strictEqual(store.isLocked('alice'), false)
    await store.release(handleOf(await store.acquire('alice')))
  })

  test('release is idempotent', async () => {
    const handle = handleOf(await store.acquire('alice'))
    await store.release(handle)
    await store.release(handle)
    assert.strictEqual(store.isLocked('alice'), false)
  })

  test('a released handle cannot be used', async () => {
    const handle = handleOf(await store.acquire('alice'))
    await store.release(handle)
    assert.throws(() => store.list(handle), /has been released/)
    assert.throws(() => store.markDelete(handle, 1), /has been released/)
  })

  test('waiting acquire gets the lock on release', async () => {
    const waiting = new MailboxStore({ root, directory, waitForLock: true })
    await waiting.append('alice', mail('queued\r\n'))

    const first = handleOf(await waiting.acquire('alice'))
    let secondResult: AcquireResult | null = null
    const second = waiting.acquire('alice').then((result) => {
      secondResult = result
      return result
    })

    await new Promise(resolve => setImmediate(resolve))
    assert.strictEqual(secondResult, null)

    await waiting.release(first)
    const handle = handleOf(await second)
    assert.strictEqual(waiting.isLocked('alice'), true)
    assert.strictEqual(waiting.stat(handle).count, 1)
    await waiting.release(handle)
    assert.strictEqual(waiting.isLocked('alice'), false)
  })

  test('wait can be asked for per call', async () => {
    const first = handleOf(await store.acquire('alice'))
    const second = store.acquire('alice', { wait: true })
    await store.release(first)
    const handle = handleOf(await second)
    await store.release(handle)
  })

  test('marks hide messages until reset', async () => {
    await store.append('alice', mail('one\r\n'))
    await store.append('alice', mail('two\r\n'))
    const handle = handleOf(await store.acquire('alice'))

    assert.strictEqual(store.markDelete(handle, 1), true)
    assert.strictEqual(store.markDelete(handle, 1), false)
    assert.strictEqual(store.markDelete(handle, 9), false)
    assert.deepStrictEqual(store.list(handle), [{ index: 2, size: 5 }])
    assert.deepStrictEqual(store.stat(handle), { count: 1, size: 5 })
    assert.strictEqual(store.fetch(handle, 1), null)

    store.resetMarks(handle)
    assert.deepStrictEqual(store.stat(handle), { count: 2, size: 10 })
    await store.release(handle)
  })

  test('release without commit keeps every message', async () => {
    await store.append('alice', mail('keep\r\n'))
    const handle = handleOf(await store.acquire('alice'))
    store.markDelete(handle, 1)
    await store.release(handle)

    const again = handleOf(await store.acquire('alice'))
    assert.strictEqual(store.stat(again).count, 1)
    await store.release(again)
  })

  test('commit removes marked messages and renumbers the rest', async () => {
    await store.append('alice', mail('one\r\n'))
    await store.append('alice', mail('two\r\n'))
    await store.append('alice', mail('three\r\n'))

    const handle = handleOf(await store.acquire('alice'))
    store.markDelete(handle, 1)
    store.markDelete(handle, 3)
    assert.strictEqual(await store.commit(handle), 2)
    assert.strictEqual(store.isLocked('alice'), false)

    const after = handleOf(await store.acquire('alice'))
    assert.deepStrictEqual(store.list(after), [{ index: 1, size: 5 }])
    assert.strictEqual(bodyText(store, after, 1), 'two\r\n')
    await store.release(after)
  })

  test('commit without marks leaves the file alone', async () => {
    await store.append('alice', mail('one\r\n'))
    const file = store.getMailboxPath('alice')
    const before = fs.readFileSync(file)

    const handle = handleOf(await store.acquire('alice'))
    assert.strictEqual(await store.commit(handle), 0)
    assert.strictEqual(store.isLocked('alice'), false)
    assert.ok(b4a.equals(fs.readFileSync(file), before))
  })

  test('messages delivered during a session survive its commit', async () => {
    await store.append('alice', mail('old\r\n'))
    const handle = handleOf(await store.acquire('alice'))
    store.markDelete(handle, 1)

    await store.append('alice', mail('new\r\n'))
    assert.strictEqual(store.stat(handle).count, 0)
    assert.strictEqual(await store.commit(handle), 1)

    const after = handleOf(await store.acquire('alice'))
    assert.strictEqual(store.stat(after).count, 1)
    assert.strictEqual(bodyText(store, after, 1), 'new\r\n')
    await store.release(after)
  })

  test('commit leaves no temp files behind', async () => {
    await store.append('alice', mail('one\r\n'))
    const handle = handleOf(await store.acquire('alice'))
    store.markDelete(handle, 1)
    await store.commit(handle)
    assert.deepStrictEqual(fs.readdirSync(path.join(root, 'alice')), ['mailbox'])
  })

  test('a failed rename leaves the mailbox as it was', async () => {
    await store.append('alice', mail('one\r\n'))
    await store.append('alice', mail('two\r\n'))
    const file = store.getMailboxPath('alice')
    const before = fs.readFileSync(file)

    const handle = handleOf(await store.acquire('alice'))
    store.markDelete(handle, 1)
    mock.method(fs.promises, 'rename', async () => {
      throw new Error('rename failed')
    })
    try {
      await assert.rejects(store.commit(handle), /rename failed/)
    } finally {
      mock.restoreAll()
    }

    assert.ok(b4a.equals(fs.readFileSync(file), before))
    assert.deepStrictEqual(fs.readdirSync(path.join(root, 'alice')), ['mailbox'])
    assert.strictEqual(store.isLocked('alice'), false)

    const again = handleOf(await store.acquire('alice'))
    assert.strictEqual(store.stat(again).count, 2)
    await store.release(again)
  })

  test('a damaged tail is cut off before the next append', async () => {
    const file = store.getMailboxPath('alice')
    fs.mkdirSync(path.dirname(file), { recursive: true })
    const intact = encodeRecord({
      id: 'intact',
      sender: 'carol@mx.test',
      recipients: ['alice'],
      body: b4a.from('survivor\r\n'),
      receivedAt: 1700000000000
    })
    fs.writeFileSync(file, b4a.concat([intact, b4a.from('{"id":"half","size":40}\npartial')]))

    await store.append('alice', mail('after crash\r\n'))

    const handle = handleOf(await store.acquire('alice'))
    assert.strictEqual(store.stat(handle).count, 2)
    assert.strictEqual(bodyText(store, handle, 1), 'survivor\r\n')
    assert.strictEqual(bodyText(store, handle, 2), 'after crash\r\n')
    await store.release(handle)
  })

  test('a damaged tail is skipped when reading', async () => {
    await store.append('alice', mail('good\r\n'))
    fs.appendFileSync(store.getMailboxPath('alice'), 'junk')

    const handle = handleOf(await store.acquire('alice'))
    assert.strictEqual(store.stat(handle).count, 1)
    await store.release(handle)
  })
})

describe('MailboxStore instances sharing one root', () => {
  let root: string
  let first: MailboxStore
  let second: MailboxStore

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'mailpair-shared-'))
    first = new MailboxStore({ root, directory })
    second = new MailboxStore({ root, directory })
  })

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true })
  })

  test('appends from both stores land in one mailbox', async () => {
    await Promise.all([
      first.append('alice', mail('a\r\n')),
      second.append('alice', mail('b\r\n')),
      first.append('alice', mail('c\r\n')),
      second.append('alice', mail('d\r\n'))
    ])

    const handle = handleOf(await second.acquire('alice'))
    const stored = handle.messages.map(message => b4a.toString(message.body))
    assert.deepStrictEqual([...stored].sort(), ['a\r\n', 'b\r\n', 'c\r\n', 'd\r\n'])
    await second.release(handle)
  })

  test('a session held by one store locks out the other', async () => {
    await first.append('alice', mail('one\r\n'))
    const handle = handleOf(await first.acquire('alice'))
    assert.strictEqual(fs.existsSync(path.join(root, 'alice', 'mailbox.session.lock')), true)

    assert.deepStrictEqual(await second.acquire('alice'), { status: 'locked' })
    assert.strictEqual(second.isLocked('alice'), false)

    // other users are unaffected
    await second.release(handleOf(await second.acquire('bob')))

    await first.release(handle)
    assert.strictEqual(fs.existsSync(path.join(root, 'alice', 'mailbox.session.lock')), false)
    await second.release(handleOf(await second.acquire('alice')))
  })

  test('a waiting acquire in the other store gets the lock on release', async () => {
    const handle = handleOf(await first.acquire('alice'))
    const pending = second.acquire('alice', { wait: true })
    await first.release(handle)

    const next = handleOf(await pending)
    assert.strictEqual(second.isLocked('alice'), true)
    await second.release(next)
  })

  test('a commit and an append from the other store both take effect', async () => {
    await first.append('alice', mail('one\r\n'))
    await second.append('alice', mail('two\r\n'))

    const handle = handleOf(await first.acquire('alice'))
    assert.strictEqual(handle.messages.length, 2)
    first.markDelete(handle, 1)

    const [removed] = await Promise.all([
      first.commit(handle),
      second.append('alice', mail('late\r\n'))
    ])
    assert.strictEqual(removed, 1)

    const after = handleOf(await second.acquire('alice'))
    assert.deepStrictEqual(after.messages.map(message => b4a.toString(message.body)), ['two\r\n', 'late\r\n'])
    await second.release(after)
    assert.deepStrictEqual(fs.readdirSync(path.join(root, 'alice')), ['mailbox'])
  })
})
