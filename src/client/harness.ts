import { generateId } from '../utils.js'
import { SmtpClient } from './smtp-client.js'
import { Pop3Client } from './pop3-client.js'

export interface RoundTripOptions {
  host: string
  smtpPort: number
  pop3Port: number
  sender: string
  username: string
  password: string
  /** Address given to RCPT TO; defaults to the username. */
  recipient?: string
  body?: string
  /** Subject line of the generated body; ignored when `body` is given. */
  subject?: string
  /** Delete the message again once it has been found. */
  cleanup?: boolean
  timeoutMs?: number
}

export interface RoundTripReport {
  accepted: string[]
  index: number
  size: number
  body: string
  deleted: boolean
}

export const MAX_SUBJECT_LENGTH = 150
const DEFAULT_SUBJECT = 'round trip check'

function checkSubject(subject: string): void {
  if (subject.length > MAX_SUBJECT_LENGTH) {
    throw new Error(`Subject must be ${MAX_SUBJECT_LENGTH} characters or less`)
  }
  if (/[\r\n]/.test(subject)) {
    throw new Error('Subject must be a single line')
  }
}

function defaultBody(sender: string, recipient: string, subject: string): string {
  return [
    `From: ${sender}`,
    `To: ${recipient}`,
    `Subject: ${subject}`,
    '',
    `check ${generateId()}`,
    ''
  ].join('\n')
}

/**
 * The text a POP3 retrieval gives back for a submitted body: newline line
 * endings, and a final newline on every non-empty body.
 */
export function retrievedText(body: string): string {
  if (body === '') return ''
  const text = body.endsWith('\n') ? body.slice(0, body.endsWith('\r\n') ? -2 : -1) : body
  return text.split(/\r?\n/).map(line => `${line}\n`).join('')
}

/**
 * Submit a message over SMTP, then log in over POP3 and find it again by
 * content. Rejects if either side misbehaves or the message is missing.
 */
export async function runRoundTrip(options: RoundTripOptions): Promise<RoundTripReport> {
  const recipient = options.recipient ?? options.username
  const subject = options.subject ?? DEFAULT_SUBJECT
  checkSubject(subject)
  const body = options.body ?? defaultBody(options.sender, recipient, subject)
  const expected = retrievedText(body)

  const smtp = await SmtpClient.connect(options.host, options.smtpPort, options.timeoutMs)
  let accepted: string[]
  try {
    await smtp.hello()
    const result = await smtp.sendMail({ from: options.sender, to: [recipient], body })
    accepted = result.accepted
  } catch (err) {
    smtp.destroy()
    throw err
  }
  await smtp.quit()
  console.log(`Submitted message to ${accepted.join(', ')}`)

  const pop3 = await Pop3Client.connect(options.host, options.pop3Port, options.timeoutMs)
  try {
    await pop3.login(options.username, options.password)
    const listings = await pop3.list()

    // newest messages are at the end
    for (const listing of [...listings].reverse()) {
      const text = await pop3.retrieveText(listing.index)
      if (text !== expected) continue

      console.log(`Found message ${listing.index} (${listing.size} octets) in maildrop ${options.username}`)
      if (options.cleanup) {
        await pop3.delete(listing.index)
      }
      await pop3.quit()
      return {
        accepted,
        index: listing.index,
        size: listing.size,
        body: text,
        deleted: options.cleanup ?? false
      }
    }
  } catch (err) {
    pop3.destroy()
    throw err
  }

  await pop3.quit()
  throw new Error(`Submitted message not found in maildrop ${options.username}`)
}
