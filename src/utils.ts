import crypto from 'hypercore-crypto'
import b4a from 'b4a'

export function generateId(): string {
  return b4a.toString(crypto.randomBytes(16), 'hex')
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
