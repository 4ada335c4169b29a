// ============================================================================
// PACKAGE
// ============================================================================

export const PACKAGE_NAME = 'auth-response-verifier' as const
export const VERSION = '0.1.0' as const

/** Sent on every registry request */
export const USER_AGENT = `${PACKAGE_NAME}-${VERSION}` as const

// ============================================================================
// TOKENS
// ============================================================================

/** The only JWS algorithm an auth response may be signed with */
export const ALGORITHM = 'ES256K' as const

/**
 * Claims every auth response must carry as keys.
 * `username` and `profile` may hold null.
 */
export const REQUIRED_CLAIMS = [
  'iss',
  'iat',
  'jti',
  'exp',
  'username',
  'profile',
  'public_keys'
] as const

export type RequiredClaim = (typeof REQUIRED_CLAIMS)[number]

// ============================================================================
// DEFAULTS
// ============================================================================

/** Seconds an expired token is still accepted */
export const DEFAULT_LEEWAY = 30

/** Maximum distance in seconds between `iat` and the verifier's clock */
export const DEFAULT_VALID_WITHIN = 30

export const DEFAULT_API_URL = 'https://core.blockstack.org'

/** Upper bound for a single registry lookup */
export const DEFAULT_TIMEOUT_MS = 10_000

// ============================================================================
// DECENTRALIZED IDENTIFIERS
// ============================================================================

export const DID_SCHEME = 'did' as const

/** The DID method whose identifier is a Bitcoin address */
export const BTC_ADDRESS_DID_METHOD = 'btc-addr' as const

// ============================================================================
// ADDRESSES
// ============================================================================

/**
 * Bitcoin P2PKH version bytes
 *
 * - 0x00 (mainnet) produces addresses starting with '1'
 * - 0x6F (testnet) produces addresses starting with 'm' or 'n'
 */
export const ADDRESS_VERSION_MAINNET = 0x00 as const
export const ADDRESS_VERSION_TESTNET = 0x6f as const

/** RIPEMD-160(SHA-256(pubkey)) */
export const ADDRESS_HASH_BYTES = 20 as const

/** First 4 bytes of double SHA-256 over [version] + [hash] */
export const ADDRESS_CHECKSUM_BYTES = 4 as const

export const COMPRESSED_PUBKEY_BYTES = 33 as const
export const UNCOMPRESSED_PUBKEY_BYTES = 65 as const
