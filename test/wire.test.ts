import { test, describe } from 'node:test'
import assert from 'node:assert'
import b4a from 'b4a'
import {
  splitCommand,
  isTerminator,
  unstuffLine,
  stuffLine,
  dotStuff,
  frameBody,
  multiline
} from '../src/wire.js'

describe('splitCommand', () => {
  test('upper-cases the verb and trims the argument', () => {
    assert.deepStrictEqual(splitCommand('mail FROM:<a@b>  '), { verb: 'MAIL', argument: 'FROM:<a@b>' })
  })

  test('verb without argument', () => {
    assert.deepStrictEqual(splitCommand('quit'), { verb: 'QUIT', argument: '' })
  })

  test('keeps inner spaces of the argument', () => {
    assert.deepStrictEqual(splitCommand('PASS two words'), { verb: 'PASS', argument: 'two words' })
  })

  test('blank lines give null', () => {
    assert.strictEqual(splitCommand(''), null)
    assert.strictEqual(splitCommand('   '), null)
  })
})

describe('dot handling', () => {
  test('only a lone dot terminates', () => {
    assert.strictEqual(isTerminator(b4a.from('.')), true)
    assert.strictEqual(isTerminator(b4a.from('..')), false)
    assert.strictEqual(isTerminator(b4a.from('. ')), false)
    assert.strictEqual(isTerminator(b4a.from('')), false)
  })

  test('unstuffLine removes one leading dot', () => {
    assert.strictEqual(b4a.toString(unstuffLine(b4a.from('..hidden'))), '.hidden')
    assert.strictEqual(b4a.toString(unstuffLine(b4a.from('.x'))), 'x')
    assert.strictEqual(b4a.toString(unstuffLine(b4a.from('plain'))), 'plain')
  })

  test('stuffLine doubles a leading dot', () => {
    assert.strictEqual(stuffLine('.'), '..')
    assert.strictEqual(stuffLine('a.b'), 'a.b')
  })

  test('dotStuff handles every line', () => {
    const body = b4a.from('.one\r\ntwo\r\n.\r\n')
    assert.strictEqual(b4a.toString(dotStuff(body)), '..one\r\ntwo\r\n..\r\n')
  })
})

describe('frameBody', () => {
  test('appends the terminator', () => {
    assert.strictEqual(b4a.toString(frameBody(b4a.from('Hi\r\n'))), 'Hi\r\n.\r\n')
  })

  test('adds a line ending when the body lacks one', () => {
    assert.strictEqual(b4a.toString(frameBody(b4a.from('Hi'))), 'Hi\r\n.\r\n')
  })

  test('empty body is just the terminator', () => {
    assert.strictEqual(b4a.toString(frameBody(b4a.alloc(0))), '.\r\n')
  })
})

describe('multiline', () => {
  test('status, lines and terminator', () => {
    assert.strictEqual(multiline('+OK', ['1 10', '.x']), '+OK\r\n1 10\r\n..x\r\n.\r\n')
  })

  test('no lines', () => {
    assert.strictEqual(multiline('+OK 0 messages', []), '+OK 0 messages\r\n.\r\n')
  })
})
