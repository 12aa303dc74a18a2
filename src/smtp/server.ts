import type { UserDirectory } from '../directory.js'
import type { MailboxStore } from '../mailbox/store.js'
import { LineServer, type LineServerConfig, type LineSession } from '../line-server.js'
import { SmtpSession } from './session.js'

export interface SmtpServerConfig extends LineServerConfig {
  hostname: string
  directory: UserDirectory
  store: MailboxStore
  maxMessageSize?: number
}

export class SmtpServer extends LineServer<SmtpServerConfig> {
  protected readonly protocol = 'SMTP'

  protected createSession(): LineSession {
    return new SmtpSession({
      hostname: this.config.hostname,
      directory: this.config.directory,
      store: this.config.store,
      maxMessageSize: this.config.maxMessageSize
    })
  }
}
