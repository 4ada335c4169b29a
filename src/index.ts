/**
 * auth-response-verifier
 *
 * Verifies self-issued auth responses: ES256K-signed JWTs that claim a
 * username, a public key and a did:btc-addr issuer.
 *
 * This package provides:
 * - Two-stage decoding (structure first, then signature against the
 *   token's own public key)
 * - secp256k1 public key to Bitcoin address derivation
 * - DID parsing
 * - Name registry lookups over HTTP or in memory
 * - A single error taxonomy for every failed check
 *
 * @example
 * const verifier = new AuthResponseVerifier({ ...configFromEnv() })
 * const result = await verifier.verify(token)
 * if (result.valid) {
 *   console.log(result.claims.username)
 * } else {
 *   console.log(result.kind, result.error)
 * }
 */

export * from './constants'

export { bytesToHex, hexToBytes, sha256, sha256Hex, hash160 } from './encoding'

export {
  pubkeyToAddress,
  validateAddress,
  addressesMatch,
  verifyPubkeyMatchesAddress,
  isAddress,
  isPublicKey,
  type NetworkType,
  type AddressInfo,
  type AddressValidationResult
} from './address'

export {
  parseDID,
  getDIDType,
  getAddressFromDID,
  addressToDID,
  DIDFormatError,
  type ParsedDID
} from './did'

export {
  InvalidAuthResponseError,
  ERROR_MESSAGES,
  missingClaimMessage,
  type AuthResponseErrorKind
} from './errors'

export {
  decodeUnverified,
  verifyWithSignature,
  selectSigningKey,
  publicKeyToJWK,
  type AuthResponseClaims,
  type DecodedClaims,
  type SignatureVerificationOptions
} from './token'

export {
  HttpNameRegistry,
  InMemoryNameRegistry,
  RegistryError,
  type NameRegistry,
  type NameLookupResult,
  type HttpNameRegistryOptions
} from './registry'

export {
  resolveVerifierConfig,
  configFromEnv,
  ConfigError,
  type VerifierConfig
} from './config'

export {
  AuthResponseVerifier,
  verifyAuthResponse,
  verifyAuthResponseSimple,
  requireClaims,
  isTimestampFresh,
  publicKeysMatchIssuer,
  publicKeysMatchUsername,
  toAuthResponseError,
  type AuthResponseVerifierOptions,
  type VerificationResult
} from './verifier'
