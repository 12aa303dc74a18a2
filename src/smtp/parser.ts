import { splitCommand } from '../wire.js'
import type { SmtpCommand } from './types.js'

export interface PathArgument {
  address: string
  parameters: string
}

// FROM:<address> or FROM: <address>, optionally followed by parameters
function parsePath(arg: string, keyword: 'FROM' | 'TO'): PathArgument | null {
  const pattern = keyword === 'FROM'
    ? /^FROM:\s*<([^<>]*)>(.*)$/i
    : /^TO:\s*<([^<>]*)>(.*)$/i
  const match = arg.match(pattern)
  if (!match || match[1] === undefined) return null
  return { address: match[1].trim(), parameters: (match[2] ?? '').trim() }
}

export function parseMailFrom(arg: string): PathArgument | null {
  return parsePath(arg, 'FROM')
}

export function parseRcptTo(arg: string): PathArgument | null {
  const parsed = parsePath(arg, 'TO')
  // the null reverse-path is only valid for MAIL
  if (!parsed || !parsed.address) return null
  return parsed
}

export function parseCommand(line: string): SmtpCommand {
  const split = splitCommand(line)
  if (!split) return { kind: 'EMPTY' }

  const { verb, argument } = split
  switch (verb) {
    case 'HELO':
    case 'EHLO':
      return { kind: verb, domain: argument }
    case 'MAIL': {
      const path = parseMailFrom(argument)
      return { kind: 'MAIL', address: path?.address ?? null, hasParameters: Boolean(path?.parameters) }
    }
    case 'RCPT': {
      const path = parseRcptTo(argument)
      return { kind: 'RCPT', address: path?.address ?? null, hasParameters: Boolean(path?.parameters) }
    }
    case 'DATA':
    case 'RSET':
    case 'VRFY':
      return { kind: verb, argument }
    case 'HELP':
      return { kind: 'HELP', topic: argument.toUpperCase() }
    case 'NOOP':
    case 'QUIT':
      return { kind: verb }
    default:
      return { kind: 'UNKNOWN', verb }
  }
}
