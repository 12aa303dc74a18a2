export interface SmtpRecipient {
  address: string
  username: string
}

export interface SmtpTransaction {
  from: string | null
  to: SmtpRecipient[]
}

export type SmtpCommand =
  | { kind: 'HELO'; domain: string }
  | { kind: 'EHLO'; domain: string }
  | { kind: 'MAIL'; address: string | null; hasParameters: boolean }
  | { kind: 'RCPT'; address: string | null; hasParameters: boolean }
  | { kind: 'DATA'; argument: string }
  | { kind: 'RSET'; argument: string }
  | { kind: 'NOOP' }
  | { kind: 'VRFY'; argument: string }
  | { kind: 'HELP'; topic: string }
  | { kind: 'QUIT' }
  | { kind: 'EMPTY' }
  | { kind: 'UNKNOWN'; verb: string }

export type SmtpState = 'GREETING' | 'READY' | 'MAIL' | 'RCPT' | 'DATA' | 'DONE'
