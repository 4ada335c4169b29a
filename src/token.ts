/**
 * Two-stage auth response decoding
 *
 * The key that signs an auth response travels inside its own claims, so a
 * token is first decoded without its signature to find the key, then
 * decoded again with the signature enforced against that key. Nothing in
 * the first stage is trusted beyond its structure.
 */

import { secp256k1 } from '@noble/curves/secp256k1'
import { decodeJwt, decodeProtectedHeader, errors, importJWK, jwtVerify } from 'jose'
import type { JWK, JWTPayload, ProtectedHeaderParameters } from 'jose'
import { z } from 'zod'
import { ALGORITHM, DEFAULT_LEEWAY } from './constants'
import { bytesToBase64Url } from './encoding'
import { ERROR_MESSAGES, InvalidAuthResponseError } from './errors'

// ============================================================================
// CLAIM SCHEMAS
// ============================================================================

/**
 * Claim types as they may appear before the required-claims gate.
 * Absent claims pass here; wrongly typed claims do not.
 */
export const decodedClaimsSchema = z
  .object({
    iss: z.string().optional(),
    iat: z.number().nullable().optional(),
    jti: z.string().optional(),
    exp: z.number().optional(),
    username: z.string().nullable().optional(),
    profile: z.unknown(),
    public_keys: z.array(z.string()).optional()
  })
  .passthrough()

export type DecodedClaims = z.infer<typeof decodedClaimsSchema>

/** A claim set with every required claim present */
export const authResponseClaimsSchema = z
  .object({
    iss: z.string(),
    iat: z.number(),
    jti: z.string(),
    exp: z.number(),
    username: z.string().nullable(),
    profile: z.unknown(),
    public_keys: z.array(z.string())
  })
  .passthrough()

export type AuthResponseClaims = z.infer<typeof authResponseClaimsSchema>

// ============================================================================
// KEY SELECTION
// ============================================================================

/**
 * Pick the key an auth response is signed with
 *
 * Exactly one key is accepted. Supporting several keys means changing
 * this function and nothing upstream of it.
 *
 * @throws InvalidAuthResponseError (UnsupportedKeyCount)
 */
export function selectSigningKey(publicKeys: readonly string[]): string {
  if (publicKeys.length !== 1) {
    throw new InvalidAuthResponseError('UnsupportedKeyCount', ERROR_MESSAGES.unsupportedKeyCount)
  }
  return publicKeys[0]
}

// ============================================================================
// UNVERIFIED DECODE
// ============================================================================

/**
 * Decode an auth response without checking its signature
 *
 * Enforces the ES256K algorithm header and the types of any claims present.
 *
 * @throws InvalidAuthResponseError (MalformedToken)
 */
export function decodeUnverified(token: string): DecodedClaims {
  let header: ProtectedHeaderParameters
  let payload: JWTPayload
  try {
    header = decodeProtectedHeader(token)
    payload = decodeJwt(token)
  } catch (error) {
    throw new InvalidAuthResponseError('MalformedToken', ERROR_MESSAGES.decode, { cause: error })
  }

  if (header.alg !== ALGORITHM) {
    throw new InvalidAuthResponseError('MalformedToken', ERROR_MESSAGES.decode, {
      cause: new Error(`expected ${ALGORITHM} algorithm, got ${String(header.alg)}`)
    })
  }

  const parsed = decodedClaimsSchema.safeParse(payload)
  if (!parsed.success) {
    throw new InvalidAuthResponseError('MalformedToken', ERROR_MESSAGES.decode, {
      cause: parsed.error
    })
  }
  return parsed.data
}

// ============================================================================
// SIGNATURE VERIFICATION
// ============================================================================

/**
 * Build an EC JWK from a hex-encoded secp256k1 public key
 *
 * @throws InvalidAuthResponseError (MalformedToken) if the key is not a
 * point on the curve
 */
export function publicKeyToJWK(publicKeyHex: string): JWK {
  let uncompressed: Uint8Array
  try {
    uncompressed = secp256k1.ProjectivePoint.fromHex(publicKeyHex).toRawBytes(false)
  } catch (error) {
    throw new InvalidAuthResponseError('MalformedToken', ERROR_MESSAGES.decode, { cause: error })
  }

  // [0x04] + [32-byte x] + [32-byte y]
  return {
    kty: 'EC',
    crv: 'secp256k1',
    x: bytesToBase64Url(uncompressed.slice(1, 33)),
    y: bytesToBase64Url(uncompressed.slice(33, 65))
  }
}

export interface SignatureVerificationOptions {
  /** Seconds an expired token is still accepted */
  leeway?: number
  /** Clock used for the `exp`/`nbf` checks */
  currentDate?: Date
}

/**
 * Decode an auth response, enforcing its signature against the sole key
 * in `publicKeys`
 *
 * @returns the signature-verified claim set
 * An `exp` more than `leeway` seconds past is a decode failure
 * (MalformedToken), like any other rejected claim.
 *
 * @throws InvalidAuthResponseError (SignatureInvalid, MalformedToken or
 * UnsupportedKeyCount)
 */
export async function verifyWithSignature(
  token: string,
  publicKeys: readonly string[],
  options: SignatureVerificationOptions = {}
): Promise<AuthResponseClaims> {
  const { leeway = DEFAULT_LEEWAY, currentDate } = options
  const jwk = publicKeyToJWK(selectSigningKey(publicKeys))

  let payload: unknown
  try {
    const key = await importJWK(jwk, ALGORITHM)
    const verified = await jwtVerify(token, key, {
      algorithms: [ALGORITHM],
      clockTolerance: leeway,
      currentDate
    })
    payload = verified.payload
  } catch (error) {
    throw toVerificationError(error)
  }

  const parsed = authResponseClaimsSchema.safeParse(payload)
  if (!parsed.success) {
    throw new InvalidAuthResponseError('MalformedToken', ERROR_MESSAGES.decode, {
      cause: parsed.error
    })
  }
  return parsed.data
}

function toVerificationError(error: unknown): InvalidAuthResponseError {
  if (error instanceof errors.JWSSignatureVerificationFailed) {
    return new InvalidAuthResponseError('SignatureInvalid', ERROR_MESSAGES.signatureInvalid, {
      cause: error
    })
  }
  if (error instanceof errors.JOSEError) {
    return new InvalidAuthResponseError('MalformedToken', ERROR_MESSAGES.decode, { cause: error })
  }

  const message = error instanceof Error ? error.message : String(error)
  return new InvalidAuthResponseError('Internal', message, { cause: error })
}
