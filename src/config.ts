/**
 * Verifier configuration
 *
 * Settings belong to a verifier instance. They are resolved once, frozen,
 * and never shared through module state.
 */

import { z } from 'zod'
import {
  DEFAULT_API_URL,
  DEFAULT_LEEWAY,
  DEFAULT_TIMEOUT_MS,
  DEFAULT_VALID_WITHIN
} from './constants'

export const verifierConfigSchema = z.object({
  /** Name registry base URL */
  apiUrl: z.string().url(),
  /** Seconds an expired token is still accepted */
  leeway: z.number().int().nonnegative(),
  /** Maximum distance in seconds between `iat` and now */
  validWithin: z.number().int().nonnegative(),
  /** Registry lookup timeout */
  timeoutMs: z.number().int().positive(),
  network: z.enum(['mainnet', 'testnet']),
  /** Trace each verification step on the console */
  debug: z.boolean()
})

export type VerifierConfig = z.infer<typeof verifierConfigSchema>

export class ConfigError extends Error {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, { cause: options.cause })
    this.name = 'ConfigError'
  }
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ')
}

/**
 * Fill in defaults for any setting left undefined and validate the result
 *
 * @throws ConfigError
 */
export function resolveVerifierConfig(
  options: Partial<VerifierConfig> = {}
): Readonly<VerifierConfig> {
  const candidate = {
    apiUrl: options.apiUrl ?? DEFAULT_API_URL,
    leeway: options.leeway ?? DEFAULT_LEEWAY,
    validWithin: options.validWithin ?? DEFAULT_VALID_WITHIN,
    timeoutMs: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    network: options.network ?? 'mainnet',
    debug: options.debug ?? false
  }

  const result = verifierConfigSchema.safeParse(candidate)
  if (!result.success) {
    throw new ConfigError(`Invalid verifier configuration: ${describeIssues(result.error)}`, {
      cause: result.error
    })
  }
  return Object.freeze(result.data)
}

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1')

const envSchema = z.object({
  AUTH_VERIFIER_API_URL: z.string().url().optional(),
  AUTH_VERIFIER_LEEWAY: z.coerce.number().int().nonnegative().optional(),
  AUTH_VERIFIER_VALID_WITHIN: z.coerce.number().int().nonnegative().optional(),
  AUTH_VERIFIER_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  AUTH_VERIFIER_NETWORK: z.enum(['mainnet', 'testnet']).optional(),
  AUTH_VERIFIER_DEBUG: booleanFlag.optional()
})

/**
 * Read verifier settings from environment variables
 *
 * Unset variables are left out so they fall back to defaults (or to
 * explicit options spread after them).
 *
 * @example
 * new AuthResponseVerifier({ ...configFromEnv(), debug: true })
 */
export function configFromEnv(
  env: NodeJS.ProcessEnv = process.env
): Partial<VerifierConfig> {
  const result = envSchema.safeParse(env)
  if (!result.success) {
    throw new ConfigError(`Invalid environment: ${describeIssues(result.error)}`, {
      cause: result.error
    })
  }

  const vars = result.data
  const config: Partial<VerifierConfig> = {}
  if (vars.AUTH_VERIFIER_API_URL !== undefined) config.apiUrl = vars.AUTH_VERIFIER_API_URL
  if (vars.AUTH_VERIFIER_LEEWAY !== undefined) config.leeway = vars.AUTH_VERIFIER_LEEWAY
  if (vars.AUTH_VERIFIER_VALID_WITHIN !== undefined) config.validWithin = vars.AUTH_VERIFIER_VALID_WITHIN
  if (vars.AUTH_VERIFIER_TIMEOUT_MS !== undefined) config.timeoutMs = vars.AUTH_VERIFIER_TIMEOUT_MS
  if (vars.AUTH_VERIFIER_NETWORK !== undefined) config.network = vars.AUTH_VERIFIER_NETWORK
  if (vars.AUTH_VERIFIER_DEBUG !== undefined) config.debug = vars.AUTH_VERIFIER_DEBUG
  return config
}
