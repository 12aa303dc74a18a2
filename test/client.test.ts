import { test, describe } from 'node:test'
import assert from 'node:assert'
import b4a from 'b4a'
import { encodeBody } from '../src/client/smtp-client.js'
import { joinLines, decodeBody } from '../src/client/pop3-client.js'
import { ProtocolError } from '../src/client/connection.js'
import { retrievedText } from '../src/client/harness.js'

describe('encodeBody', () => {
  test('converts line endings to CRLF', () => {
    assert.strictEqual(encodeBody('a\nb\n'), 'a\r\nb\r\n')
    assert.strictEqual(encodeBody('a\r\nb'), 'a\r\nb\r\n')
  })

  test('stuffs leading dots', () => {
    assert.strictEqual(encodeBody('.\n..x\n'), '..\r\n...x\r\n')
  })

  test('keeps blank lines', () => {
    assert.strictEqual(encodeBody('H: v\n\nbody\n'), 'H: v\r\n\r\nbody\r\n')
  })

  test('empty body', () => {
    assert.strictEqual(encodeBody(''), '')
  })
})

describe('retrieved lines', () => {
  const lines = [b4a.from('Subject: x'), b4a.from(''), b4a.from('hi')]

  test('joinLines restores CRLF endings', () => {
    assert.strictEqual(b4a.toString(joinLines(lines)), 'Subject: x\r\n\r\nhi\r\n')
  })

  test('decodeBody uses newline endings', () => {
    assert.strictEqual(decodeBody(lines), 'Subject: x\n\nhi\n')
  })
})

describe('retrievedText', () => {
  test('adds the final newline', () => {
    assert.strictEqual(retrievedText('hello'), 'hello\n')
  })

  test('uses newline endings', () => {
    assert.strictEqual(retrievedText('a\r\nb\r\n'), 'a\nb\n')
    assert.strictEqual(retrievedText('a\nb\n'), 'a\nb\n')
  })

  test('matches what encodeBody sends', () => {
    const body = 'Subject: x\r\n\r\n.dot\n'
    assert.strictEqual(encodeBody(body).replace(/\r\n/g, '\n').replace(/^\./gm, ''), retrievedText(body))
  })

  test('empty body', () => {
    assert.strictEqual(retrievedText(''), '')
  })
})

describe('ProtocolError', () => {
  test('carries the reply', () => {
    const err = new ProtocolError('Sender rejected', '501 Syntax')
    assert.strictEqual(err.message, 'Sender rejected: 501 Syntax')
    assert.strictEqual(err.reply, '501 Syntax')
    assert.strictEqual(err.name, 'ProtocolError')
    assert.ok(err instanceof Error)
  })
})
