import { splitCommand } from '../wire.js'
import type { MessageNumber, Pop3Command } from './types.js'

export function parseMessageNumber(arg: string | undefined): MessageNumber {
  if (!arg) return 'missing'
  if (!/^\d{1,9}$/.test(arg)) return 'invalid'
  return parseInt(arg, 10)
}

export function parseCommand(line: string): Pop3Command {
  const split = splitCommand(line)
  if (!split) return { kind: 'UNKNOWN', verb: '' }

  const { verb, argument } = split
  switch (verb) {
    case 'USER':
      return { kind: 'USER', username: argument }
    case 'PASS':
      // passwords may contain spaces; take the rest of the line
      return { kind: 'PASS', password: argument }
    case 'LIST':
    case 'RETR':
    case 'DELE':
    case 'UIDL':
      return { kind: verb, message: parseMessageNumber(argument) }
    case 'TOP': {
      const [message, lines, ...extra] = argument.split(/\s+/)
      if (extra.length > 0) return { kind: 'TOP', message: 'invalid', lines: 'invalid' }
      return { kind: 'TOP', message: parseMessageNumber(message), lines: parseMessageNumber(lines) }
    }
    case 'STAT':
    case 'NOOP':
    case 'RSET':
    case 'CAPA':
    case 'QUIT':
      return { kind: verb }
    default:
      return { kind: 'UNKNOWN', verb }
  }
}
