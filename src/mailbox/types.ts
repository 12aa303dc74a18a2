export interface StoredMessage {
  id: string
  sender: string
  recipients: string[]
  body: Buffer
  receivedAt: number
}

export type NewMessage = Omit<StoredMessage, 'id' | 'receivedAt'>

export interface MessageInfo {
  index: number
  size: number
}

export interface MailboxStats {
  count: number
  size: number
}

export type AppendResult = 'delivered' | 'no-such-user'

export interface AcquireOptions {
  wait?: boolean
}
