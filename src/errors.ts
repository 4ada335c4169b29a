import type { RequiredClaim } from './constants'

/**
 * Every way an auth response can fail verification
 */
export type AuthResponseErrorKind =
  | 'MalformedToken'
  | 'MissingClaim'
  | 'StaleTimestamp'
  | 'UnsupportedKeyCount'
  | 'SignatureInvalid'
  | 'MalformedIssuer'
  | 'IssuerKeyMismatch'
  | 'UsernameNotFound'
  | 'UsernameOwnerMismatch'
  | 'RegistryUnavailable'
  | 'Internal'

export const ERROR_MESSAGES = {
  decode: 'Unable to decode JWT',
  staleTimestamp: "'iat' timestamp claim is skewed too far from present.",
  unsupportedKeyCount: 'Invalid public_keys array: only 1 key is supported',
  signatureInvalid: 'Signature on JWT is invalid',
  issuerKeyMismatch: "Public keys don't match issuer address",
  usernameNotFound: "Issuer claimed username that doesn't exist",
  usernameOwnerMismatch: "Public keys don't match owner of claimed username"
} as const

export function missingClaimMessage(claim: RequiredClaim): string {
  return `Missing required '${claim}' claim.`
}

export class InvalidAuthResponseError extends Error {
  readonly kind: AuthResponseErrorKind
  /** Set for MissingClaim */
  readonly claim?: RequiredClaim

  constructor(
    kind: AuthResponseErrorKind,
    message: string,
    options: { claim?: RequiredClaim; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause })
    this.name = 'InvalidAuthResponseError'
    this.kind = kind
    this.claim = options.claim
  }

  static missingClaim(claim: RequiredClaim): InvalidAuthResponseError {
    return new InvalidAuthResponseError('MissingClaim', missingClaimMessage(claim), { claim })
  }
}
