/**
 * Name registry lookups
 *
 * Maps a username to the address that currently owns it.
 */

import { z } from 'zod'
import { DEFAULT_API_URL, DEFAULT_TIMEOUT_MS, USER_AGENT } from './constants'

// ============================================================================
// TYPE DEFINITIONS
// ============================================================================

export type NameLookupResult =
  | { exists: false }
  | { exists: true; address: string | null }

export interface NameRegistry {
  lookup(username: string): Promise<NameLookupResult>
}

export class RegistryError extends Error {
  /** HTTP status, when the registry answered at all */
  readonly status?: number

  constructor(message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause })
    this.name = 'RegistryError'
    this.status = options.status
  }
}

// ============================================================================
// HTTP REGISTRY
// ============================================================================

const nameRecordSchema = z
  .object({
    address: z.string().nullable().optional()
  })
  .passthrough()

export interface HttpNameRegistryOptions {
  /** Registry base URL. Defaults to DEFAULT_API_URL */
  apiUrl?: string
  /** Defaults to globalThis.fetch */
  fetch?: typeof globalThis.fetch
  /** Abort the lookup after this many milliseconds. Defaults to 10000. */
  timeoutMs?: number
  userAgent?: string
}

/**
 * Registry backed by `GET {apiUrl}/v1/names/{username}`
 *
 * 404 means the name is not registered. Any other non-2xx status, a
 * transport failure, a timeout or an unreadable body raises RegistryError.
 */
export class HttpNameRegistry implements NameRegistry {
  readonly apiUrl: string
  private readonly fetchImpl: typeof globalThis.fetch
  private readonly timeoutMs: number
  private readonly userAgent: string

  constructor(options: HttpNameRegistryOptions = {}) {
    this.apiUrl = (options.apiUrl ?? DEFAULT_API_URL).replace(/\/+$/, '')
    this.fetchImpl = options.fetch ?? globalThis.fetch
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS
    this.userAgent = options.userAgent ?? USER_AGENT
  }

  nameUrl(username: string): string {
    return `${this.apiUrl}/v1/names/${encodeURIComponent(username)}`
  }

  async lookup(username: string): Promise<NameLookupResult> {
    const url = this.nameUrl(username)
    const controller = new AbortController()
    const timer = setTimeout(() => controller.abort(), this.timeoutMs)

    let body: unknown
    try {
      let response: Response
      try {
        response = await this.fetchImpl(url, {
          headers: {
            Accept: 'application/json',
            'User-Agent': this.userAgent
          },
          signal: controller.signal
        })
      } catch (error) {
        const reason = controller.signal.aborted
          ? `timed out after ${this.timeoutMs}ms`
          : error instanceof Error ? error.message : String(error)
        throw new RegistryError(`Registry request to ${url} failed: ${reason}`, { cause: error })
      }

      if (response.status === 404) {
        return { exists: false }
      }

      if (!response.ok) {
        throw new RegistryError(`Registry responded with HTTP ${response.status} for ${url}`, {
          status: response.status
        })
      }

      try {
        body = await response.json()
      } catch (error) {
        throw new RegistryError(`Registry returned invalid JSON for ${url}`, {
          status: response.status,
          cause: error
        })
      }
    } finally {
      clearTimeout(timer)
    }

    const record = nameRecordSchema.safeParse(body)
    if (!record.success) {
      throw new RegistryError(`Registry returned an unexpected name record for ${url}`, {
        cause: record.error
      })
    }

    return { exists: true, address: record.data.address ?? null }
  }
}

// ============================================================================
// IN-MEMORY REGISTRY
// ============================================================================

/**
 * Registry held in process
 *
 * For hosts that already mirror name ownership, and for tests.
 */
export class InMemoryNameRegistry implements NameRegistry {
  private owners: Map<string, string> = new Map()

  constructor(entries: Iterable<[username: string, address: string]> = []) {
    for (const [username, address] of entries) {
      this.register(username, address)
    }
  }

  /**
   * Record the address that owns a username
   */
  register(username: string, address: string): void {
    this.owners.set(username, address)
  }

  async lookup(username: string): Promise<NameLookupResult> {
    const address = this.owners.get(username)
    if (address === undefined) {
      return { exists: false }
    }
    return { exists: true, address }
  }
}
