/**
 * Auth response verification
 *
 * Gates run in order and the first failure ends verification:
 *
 * 1. structural decode (no signature)
 * 2. required claims present
 * 3. `iat` set
 * 4. `iat` within `validWithin` seconds of now
 * 5. exactly one public key
 * 6. signature verified against that key (with `exp` leeway)
 * 7. the key's address equals the issuer DID's address
 * 8. a claimed username is owned by the issuer's address
 */

import { addressesMatch, pubkeyToAddress } from './address'
import type { NetworkType } from './address'
import { resolveVerifierConfig } from './config'
import type { VerifierConfig } from './config'
import { REQUIRED_CLAIMS } from './constants'
import { DIDFormatError, getAddressFromDID } from './did'
import { ERROR_MESSAGES, InvalidAuthResponseError } from './errors'
import type { AuthResponseErrorKind } from './errors'
import { HttpNameRegistry, RegistryError } from './registry'
import type { NameRegistry } from './registry'
import {
  authResponseClaimsSchema,
  decodeUnverified,
  selectSigningKey,
  verifyWithSignature
} from './token'
import type { AuthResponseClaims, DecodedClaims } from './token'

// ============================================================================
// TYPE DEFINITIONS
// ============================================================================

export type VerificationResult =
  | { valid: true; claims: AuthResponseClaims }
  | { valid: false; kind: AuthResponseErrorKind; error: string }

export interface AuthResponseVerifierOptions extends Partial<VerifierConfig> {
  /** Name registry. Defaults to an HttpNameRegistry on `apiUrl` */
  registry?: NameRegistry
  /** fetch used by the default registry */
  fetch?: typeof globalThis.fetch
  /** Clock for the timestamp and expiry checks */
  now?: () => Date
}

// ============================================================================
// INDIVIDUAL CHECKS
// ============================================================================

/**
 * Gates 2 and 3: every required claim is present and `iat` is set
 *
 * @throws InvalidAuthResponseError (MissingClaim)
 */
export function requireClaims(claims: DecodedClaims): AuthResponseClaims {
  for (const claim of REQUIRED_CLAIMS) {
    if (!Object.prototype.hasOwnProperty.call(claims, claim)) {
      throw InvalidAuthResponseError.missingClaim(claim)
    }
  }
  if (claims.iat === null || claims.iat === undefined) {
    throw InvalidAuthResponseError.missingClaim('iat')
  }

  const parsed = authResponseClaimsSchema.safeParse(claims)
  if (!parsed.success) {
    throw new InvalidAuthResponseError('MalformedToken', ERROR_MESSAGES.decode, {
      cause: parsed.error
    })
  }
  return parsed.data
}

/**
 * Whether `iat` lies within `validWithin` seconds of `now`, in either
 * direction
 */
export function isTimestampFresh(iat: number, now: Date, validWithin: number): boolean {
  const nowSeconds = Math.floor(now.getTime() / 1000)
  return Math.abs(nowSeconds - iat) <= validWithin
}

/**
 * Whether the sole public key derives the address named by the issuer DID
 *
 * An issuer DID of any method other than btc-addr never matches.
 *
 * @throws DIDFormatError if `iss` is not a DID
 */
export function publicKeysMatchIssuer(
  claims: AuthResponseClaims,
  network: NetworkType = 'mainnet'
): boolean {
  const publicKey = selectSigningKey(claims.public_keys)
  const addressFromIssuer = getAddressFromDID(claims.iss)
  const addressFromPublicKey = pubkeyToAddress(publicKey, network).address
  return addressesMatch(addressFromIssuer, addressFromPublicKey)
}

/**
 * Whether the claimed username belongs to the issuer's address
 *
 * A null username passes without a registry lookup.
 *
 * @throws InvalidAuthResponseError (UsernameNotFound) if the registry does
 * not know the name
 */
export async function publicKeysMatchUsername(
  claims: AuthResponseClaims,
  registry: NameRegistry
): Promise<boolean> {
  if (claims.username === null) {
    return true
  }

  const record = await registry.lookup(claims.username)
  if (!record.exists) {
    throw new InvalidAuthResponseError('UsernameNotFound', ERROR_MESSAGES.usernameNotFound)
  }

  const addressFromIssuer = getAddressFromDID(claims.iss)
  return addressesMatch(record.address, addressFromIssuer)
}

/**
 * Map anything thrown during verification onto the error taxonomy
 */
export function toAuthResponseError(error: unknown): InvalidAuthResponseError {
  if (error instanceof InvalidAuthResponseError) {
    return error
  }
  if (error instanceof DIDFormatError) {
    return new InvalidAuthResponseError('MalformedIssuer', error.message, { cause: error })
  }
  if (error instanceof RegistryError) {
    return new InvalidAuthResponseError('RegistryUnavailable', error.message, { cause: error })
  }

  const message = error instanceof Error ? error.message : String(error)
  return new InvalidAuthResponseError('Internal', message, { cause: error })
}

// ============================================================================
// VERIFIER
// ============================================================================

export class AuthResponseVerifier {
  readonly config: Readonly<VerifierConfig>
  private readonly registry: NameRegistry
  private readonly now: () => Date

  constructor(options: AuthResponseVerifierOptions = {}) {
    const { registry, fetch, now, ...settings } = options
    this.config = resolveVerifierConfig(settings)
    this.registry = registry ?? new HttpNameRegistry({
      apiUrl: this.config.apiUrl,
      timeoutMs: this.config.timeoutMs,
      fetch
    })
    this.now = now ?? (() => new Date())
  }

  /**
   * Verify an auth response
   *
   * @returns the verified claims, or the kind and reason of the first
   * failed check
   */
  async verify(token: string): Promise<VerificationResult> {
    try {
      const claims = await this.verifyOrThrow(token)
      return { valid: true, claims }
    } catch (error) {
      const failure = toAuthResponseError(error)
      return { valid: false, kind: failure.kind, error: failure.message }
    }
  }

  /**
   * Verify an auth response
   *
   * @returns the signature-verified claims
   * @throws InvalidAuthResponseError
   */
  async verifyOrThrow(token: string): Promise<AuthResponseClaims> {
    try {
      const claims = await this.runChecks(token)
      this.log('result', 'VALID ✓')
      return claims
    } catch (error) {
      const failure = toAuthResponseError(error)
      this.log('result', `INVALID ✗ (${failure.kind}) ${failure.message}`)
      throw failure
    }
  }

  private async runChecks(token: string): Promise<AuthResponseClaims> {
    const { leeway, validWithin, network } = this.config

    this.log('decode', `Decoding token: ${token.substring(0, 32)}...`)
    const unverified = requireClaims(decodeUnverified(token))

    const now = this.now()
    if (!isTimestampFresh(unverified.iat, now, validWithin)) {
      throw new InvalidAuthResponseError('StaleTimestamp', ERROR_MESSAGES.staleTimestamp)
    }

    const publicKey = selectSigningKey(unverified.public_keys)
    this.log('signature', `Verifying with public key: ${publicKey.substring(0, 16)}...`)
    const claims = await verifyWithSignature(token, [publicKey], { leeway, currentDate: now })

    this.log('issuer', `Matching public key to issuer ${claims.iss}`)
    if (!publicKeysMatchIssuer(claims, network)) {
      throw new InvalidAuthResponseError('IssuerKeyMismatch', ERROR_MESSAGES.issuerKeyMismatch)
    }

    if (claims.username !== null) {
      this.log('username', `Looking up owner of ${claims.username}`)
    }
    if (!(await publicKeysMatchUsername(claims, this.registry))) {
      throw new InvalidAuthResponseError(
        'UsernameOwnerMismatch',
        ERROR_MESSAGES.usernameOwnerMismatch
      )
    }

    return claims
  }

  private log(step: string, message: string): void {
    if (this.config.debug) {
      console.log(`[verifier:${step}] ${message}`)
    }
  }
}

// ============================================================================
// HIGH-LEVEL VERIFICATION FUNCTIONS
// ============================================================================

/**
 * Verify an auth response with a one-off verifier
 *
 * Prefer a long-lived AuthResponseVerifier when verifying many tokens.
 */
export async function verifyAuthResponse(
  token: string,
  options: AuthResponseVerifierOptions = {}
): Promise<VerificationResult> {
  return await new AuthResponseVerifier(options).verify(token)
}

/**
 * Verify an auth response with simple boolean return
 */
export async function verifyAuthResponseSimple(
  token: string,
  options: AuthResponseVerifierOptions = {}
): Promise<boolean> {
  const result = await verifyAuthResponse(token, options)
  return result.valid
}
