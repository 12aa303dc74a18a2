/** A message-number argument as it appeared on the command line. */
export type MessageNumber = number | 'missing' | 'invalid'

export type Pop3Command =
  | { kind: 'USER'; username: string }
  | { kind: 'PASS'; password: string }
  | { kind: 'STAT' }
  | { kind: 'LIST'; message: MessageNumber }
  | { kind: 'RETR'; message: MessageNumber }
  | { kind: 'TOP'; message: MessageNumber; lines: MessageNumber }
  | { kind: 'DELE'; message: MessageNumber }
  | { kind: 'UIDL'; message: MessageNumber }
  | { kind: 'NOOP' }
  | { kind: 'RSET' }
  | { kind: 'CAPA' }
  | { kind: 'QUIT' }
  | { kind: 'UNKNOWN'; verb: string }

export type Pop3State = 'AUTHORIZATION' | 'TRANSACTION' | 'UPDATE' | 'CLOSED'
