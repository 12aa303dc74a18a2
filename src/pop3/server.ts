import type { UserDirectory } from '../directory.js'
import type { MailboxStore } from '../mailbox/store.js'
import { LineServer, type LineServerConfig, type LineSession } from '../line-server.js'
import { Pop3Session } from './session.js'

export interface Pop3ServerConfig extends LineServerConfig {
  hostname: string
  directory: UserDirectory
  store: MailboxStore
}

export class Pop3Server extends LineServer<Pop3ServerConfig> {
  protected readonly protocol = 'POP3'

  protected createSession(): LineSession {
    return new Pop3Session({
      hostname: this.config.hostname,
      directory: this.config.directory,
      store: this.config.store
    })
  }
}
