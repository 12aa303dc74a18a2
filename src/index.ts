#!/usr/bin/env node
import { SmtpServer } from './smtp/server.js'
import { Pop3Server } from './pop3/server.js'
import { UserDirectory } from './directory.js'
import { MailboxStore } from './mailbox/store.js'
import { runRoundTrip } from './client/harness.js'
import {
  loadConfig,
  resolveSettings,
  getDataDir,
  getConfigPath,
  getRegistryPath,
  getMailboxesDir,
  type Settings
} from './config.js'
import { errorMessage } from './utils.js'

const DATA_DIR = getDataDir()

function printUsage(): void {
  console.log(`
mailpair - paired SMTP submission and POP3 retrieval servers

Usage:
  mailpair <command> [options]

Commands:
  start                    Start the SMTP and POP3 servers
  smtp [port]              Start only the SMTP server
  pop3 [port]              Start only the POP3 server
  check <server> <pop3-port> <smtp-port> <username> <password> [sender] [subject]
                           Send a message to <username> and fetch it back
  users                    List registered users
  config                   Show the resolved settings
  help                     Show this help message

Environment Variables:
  MAIL_ROOT      Data directory (default: ~/.mailpair)
  SMTP_PORT      SMTP server port (default: 2525)
  POP3_PORT      POP3 server port (default: 1110)
  MAIL_HOST      Address to bind (default: 127.0.0.1)
  MAIL_HOSTNAME  Name used in greetings and local addresses (default: localhost)

Data directory: ${DATA_DIR}
  config.json    optional settings
  userinfo.txt   one "<username> <password>" per line
  users/         mailboxes
`)
}

function parsePort(value: string | undefined, label: string): number | undefined {
  if (value === undefined) return undefined
  const port = Number(value)
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    console.error(`Error: invalid ${label} port '${value}'`)
    process.exit(1)
  }
  return port
}

function loadDirectory(): UserDirectory {
  const registryPath = getRegistryPath(DATA_DIR)
  try {
    return UserDirectory.load(registryPath)
  } catch (err) {
    console.error(`Failed to load user registry ${registryPath}: ${errorMessage(err)}`)
    process.exit(1)
  }
}

function loadSettings(): Settings {
  return resolveSettings(loadConfig(DATA_DIR), DATA_DIR)
}

async function startServers(which: 'both' | 'smtp' | 'pop3', portArg?: string): Promise<void> {
  const settings = loadSettings()
  const directory = loadDirectory()
  const store = new MailboxStore({
    root: getMailboxesDir(settings.dataDir),
    directory,
    waitForLock: settings.waitForLock
  })

  console.log('Starting mailpair...')
  console.log(`  Data: ${settings.dataDir}`)
  console.log(`  Hostname: ${settings.hostname}`)

  const servers: Array<SmtpServer | Pop3Server> = []

  if (which !== 'pop3') {
    servers.push(new SmtpServer({
      port: parsePort(portArg, 'SMTP') ?? settings.smtpPort,
      host: settings.host,
      hostname: settings.hostname,
      directory,
      store,
      maxMessageSize: settings.maxMessageSize,
      idleTimeoutMs: settings.idleTimeoutMs
    }))
  }

  if (which !== 'smtp') {
    servers.push(new Pop3Server({
      port: parsePort(portArg, 'POP3') ?? settings.pop3Port,
      host: settings.host,
      hostname: settings.hostname,
      directory,
      store,
      idleTimeoutMs: settings.idleTimeoutMs
    }))
  }

  try {
    for (const server of servers) {
      await server.start()
    }
  } catch (err) {
    console.error('Failed to start server:', err)
    await Promise.all(servers.map(server => server.stop()))
    process.exit(1)
  }

  let isShuttingDown = false

  // Graceful shutdown
  const shutdown = async (): Promise<void> => {
    if (isShuttingDown) return
    isShuttingDown = true

    console.log('')
    console.log('Shutting down...')

    for (const server of servers) {
      try {
        await server.stop()
      } catch (err) {
        console.error('  Error stopping server:', err)
      }
    }

    console.log('Goodbye!')
    process.exit(0)
  }

  const onSignal = (): void => {
    shutdown().catch((err: unknown) => {
      console.error('Shutdown failed:', err)
      process.exit(1)
    })
  }
  process.on('SIGINT', onSignal)
  process.on('SIGTERM', onSignal)

  console.log('Ready. Waiting for connections...')
}

async function runCheck(args: string[]): Promise<void> {
  const [server, pop3Port, smtpPort, username, password, sender, subject] = args
  if (!server || !pop3Port || !smtpPort || !username || !password) {
    console.error('Usage: mailpair check <server> <pop3-port> <smtp-port> <username> <password> [sender] [subject]')
    process.exit(1)
  }

  const report = await runRoundTrip({
    host: server,
    pop3Port: parsePort(pop3Port, 'POP3') ?? 0,
    smtpPort: parsePort(smtpPort, 'SMTP') ?? 0,
    sender: sender ?? username,
    username,
    password,
    subject,
    cleanup: true
  })

  console.log(`Round trip OK: message ${report.index} (${report.size} octets) retrieved and removed`)
}

function listUsers(): void {
  const directory = loadDirectory()
  for (const username of directory.usernames()) {
    console.log(`  ${username}`)
  }
}

async function main(): Promise<void> {
  const args = process.argv.slice(2)

  if (args.length === 0) {
    printUsage()
    process.exit(0)
  }

  const command = args[0]

  switch (command) {
    case 'start':
      await startServers('both')
      break

    case 'smtp':
    case 'pop3':
      await startServers(command, args[1])
      break

    case 'check':
      await runCheck(args.slice(1))
      break

    case 'users':
      listUsers()
      break

    case 'config':
      console.log(`Config file: ${getConfigPath(DATA_DIR)}`)
      console.log(JSON.stringify(loadSettings(), null, 2))
      break

    case 'help':
    case '--help':
    case '-h':
      printUsage()
      break

    default:
      console.error(`Unknown command: ${command}`)
      console.error('Run "mailpair help" for usage.')
      process.exit(1)
  }
}

main().catch((err) => {
  console.error('Fatal error:', errorMessage(err))
  process.exit(1)
})
