import fs from 'fs'

export interface User {
  username: string
  password: string
}

export interface RegistryWarning {
  line: number
  message: string
}

export interface ParsedRegistry {
  users: Map<string, string>
  warnings: RegistryWarning[]
}

export function validateUsername(username: string): string | null {
  if (!username) return 'Username is required'
  if (username === '.' || username === '..') return 'Username cannot be a relative path'
  if (/[/\\]/.test(username)) return 'Username cannot contain path separators'
  return null
}

/**
 * Parse a user registry: one `<username> <password>` pair per line.
 * Blank lines and `#` comments are skipped. Malformed lines and repeated
 * usernames are skipped with a warning; the first entry for a name wins.
 */
export function parseRegistry(content: string): ParsedRegistry {
  const users = new Map<string, string>()
  const warnings: RegistryWarning[] = []

  for (const [i, raw] of content.split(/\r?\n/).entries()) {
    const trimmed = raw.trim()
    if (!trimmed || trimmed.startsWith('#')) continue

    const line = i + 1
    const [username, password, ...rest] = trimmed.split(/\s+/)
    if (username === undefined || password === undefined || rest.length > 0) {
      warnings.push({ line, message: 'expected "<username> <password>"' })
      continue
    }

    const usernameError = validateUsername(username)
    if (usernameError) {
      warnings.push({ line, message: usernameError })
      continue
    }

    if (users.has(username)) {
      warnings.push({ line, message: `duplicate user '${username}' ignored (first entry wins)` })
      continue
    }

    users.set(username, password)
  }

  return { users, warnings }
}

/** Read-only username/password registry, loaded once at startup. */
export class UserDirectory {
  private users: Map<string, string>

  constructor(users: Iterable<User> = []) {
    this.users = new Map()
    for (const user of users) {
      if (!this.users.has(user.username)) {
        this.users.set(user.username, user.password)
      }
    }
  }

  static fromRegistry(content: string): { directory: UserDirectory; warnings: RegistryWarning[] } {
    const { users, warnings } = parseRegistry(content)
    const directory = new UserDirectory(
      Array.from(users, ([username, password]) => ({ username, password }))
    )
    return { directory, warnings }
  }

  static load(registryPath: string): UserDirectory {
    const content = fs.readFileSync(registryPath, 'utf8')
    const { directory, warnings } = UserDirectory.fromRegistry(content)
    for (const warning of warnings) {
      console.warn(`${registryPath}:${warning.line}: ${warning.message}, line skipped`)
    }
    console.log(`Loaded ${directory.size} user(s) from ${registryPath}`)
    return directory
  }

  get size(): number {
    return this.users.size
  }

  lookup(username: string): string | null {
    return this.users.get(username) ?? null
  }

  has(username: string): boolean {
    return this.users.has(username)
  }

  verify(username: string, password: string): boolean {
    const expected = this.lookup(username)
    return expected !== null && expected === password
  }

  usernames(): string[] {
    return Array.from(this.users.keys())
  }

  /**
   * Map a recipient address to a registered username. Accepts the bare
   * username, or `local@hostname` when the local part is registered.
   */
  resolveRecipient(address: string, hostname: string): string | null {
    if (this.users.has(address)) return address

    const atIndex = address.lastIndexOf('@')
    if (atIndex <= 0) return null

    const local = address.slice(0, atIndex)
    const domain = address.slice(atIndex + 1)
    if (domain.toLowerCase() !== hostname.toLowerCase()) return null

    return this.users.has(local) ? local : null
  }
}
