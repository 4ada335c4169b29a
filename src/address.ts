/**
 * Bitcoin P2PKH address derivation for secp256k1 public keys
 *
 * The address format is:
 * 1. RIPEMD-160(SHA-256(public key)) (20 bytes)
 * 2. Prepend version byte (0x00 mainnet, 0x6F testnet)
 * 3. Append 4-byte checksum (double SHA-256)
 * 4. Base58 encode
 */

import bs58 from 'bs58'
import {
  ADDRESS_CHECKSUM_BYTES,
  ADDRESS_HASH_BYTES,
  ADDRESS_VERSION_MAINNET,
  ADDRESS_VERSION_TESTNET,
  COMPRESSED_PUBKEY_BYTES,
  UNCOMPRESSED_PUBKEY_BYTES
} from './constants'
import { bytesToHex, hash160, hexToBytes, sha256 } from './encoding'

// ============================================================================
// TYPE DEFINITIONS
// ============================================================================

export type NetworkType = 'mainnet' | 'testnet'

export interface AddressInfo {
  /** The address string (Base58Check encoded) */
  address: string
  /** RIPEMD-160(SHA-256(pubkey)) (hex) */
  hash: string
  network: NetworkType
}

export interface AddressValidationResult {
  valid: boolean
  /** Network type if valid */
  network?: NetworkType
  /** Error message if invalid */
  error?: string
  /** The decoded hash if valid (hex) */
  hash?: string
}

function versionFor(network: NetworkType): number {
  return network === 'mainnet' ? ADDRESS_VERSION_MAINNET : ADDRESS_VERSION_TESTNET
}

function checksum(versionedPayload: Uint8Array): Uint8Array {
  return sha256(sha256(versionedPayload)).slice(0, ADDRESS_CHECKSUM_BYTES)
}

// ============================================================================
// ADDRESS ENCODING/DECODING
// ============================================================================

/**
 * Convert a hex-encoded secp256k1 public key to a Bitcoin address
 *
 * Compressed (33-byte) keys are what auth responses carry; uncompressed
 * (65-byte) keys are accepted too and produce their own, different address.
 *
 * @example
 * pubkeyToAddress('0279be667ef9dcbbac55a06295ce870b07029bfcdb2dce28d959f2815b16f81798').address
 * // "1BgGZ9tcN4rm9KBzDn7KprQz87SZ26SAMH"
 */
export function pubkeyToAddress(
  pubkey: string,
  network: NetworkType = 'mainnet'
): AddressInfo {
  const pubkeyBytes = hexToBytes(pubkey)

  if (
    pubkeyBytes.length !== COMPRESSED_PUBKEY_BYTES &&
    pubkeyBytes.length !== UNCOMPRESSED_PUBKEY_BYTES
  ) {
    throw new Error(
      `Invalid public key length: expected ${COMPRESSED_PUBKEY_BYTES} or ` +
      `${UNCOMPRESSED_PUBKEY_BYTES} bytes, got ${pubkeyBytes.length} bytes`
    )
  }

  const hash = hash160(pubkeyBytes)

  const versionedPayload = new Uint8Array(1 + ADDRESS_HASH_BYTES)
  versionedPayload[0] = versionFor(network)
  versionedPayload.set(hash, 1)

  const encoded = new Uint8Array(versionedPayload.length + ADDRESS_CHECKSUM_BYTES)
  encoded.set(versionedPayload)
  encoded.set(checksum(versionedPayload), versionedPayload.length)

  return {
    address: bs58.encode(encoded),
    hash: bytesToHex(hash),
    network
  }
}

/**
 * Validate a Bitcoin P2PKH address and extract its components
 *
 * Checks Base58 encoding, length (1 version + 20 hash + 4 checksum),
 * a known version byte and the checksum.
 */
export function validateAddress(address: string): AddressValidationResult {
  let bytes: Uint8Array
  try {
    bytes = bs58.decode(address)
  } catch {
    return { valid: false, error: 'Invalid Base58 encoding' }
  }

  const expectedLength = 1 + ADDRESS_HASH_BYTES + ADDRESS_CHECKSUM_BYTES
  if (bytes.length !== expectedLength) {
    return {
      valid: false,
      error: `Invalid address length: expected ${expectedLength} bytes, got ${bytes.length} bytes`
    }
  }

  const version = bytes[0]
  let network: NetworkType
  if (version === ADDRESS_VERSION_MAINNET) {
    network = 'mainnet'
  } else if (version === ADDRESS_VERSION_TESTNET) {
    network = 'testnet'
  } else {
    return {
      valid: false,
      error: `Unknown version byte: 0x${version.toString(16)}`
    }
  }

  const versionedPayload = bytes.slice(0, 1 + ADDRESS_HASH_BYTES)
  const expected = checksum(versionedPayload)
  const actual = bytes.slice(1 + ADDRESS_HASH_BYTES)

  if (bytesToHex(actual) !== bytesToHex(expected)) {
    return { valid: false, error: 'Invalid checksum' }
  }

  return {
    valid: true,
    network,
    hash: bytesToHex(versionedPayload.slice(1))
  }
}

/**
 * Compare two addresses
 *
 * Literal, case-sensitive comparison with no normalization. A missing
 * address (e.g. from a DID of another method) never matches.
 */
export function addressesMatch(
  a: string | null | undefined,
  b: string | null | undefined
): boolean {
  if (a === null || a === undefined || b === null || b === undefined) {
    return false
  }
  return a === b
}

/**
 * Check if a public key derives the given address
 *
 * The network is taken from the address itself.
 */
export function verifyPubkeyMatchesAddress(
  pubkey: string,
  address: string
): boolean {
  const validation = validateAddress(address)
  if (!validation.valid || validation.network === undefined) {
    return false
  }

  try {
    return addressesMatch(pubkeyToAddress(pubkey, validation.network).address, address)
  } catch {
    return false
  }
}

/**
 * Quick structural check for a P2PKH address
 *
 * Use validateAddress() for checksum verification.
 */
export function isAddress(str: string): boolean {
  if (typeof str !== 'string' || str.length < 26 || str.length > 35) {
    return false
  }

  const base58Chars = /^[123456789ABCDEFGHJKLMNPQRSTUVWXYZabcdefghijkmnopqrstuvwxyz]+$/
  return base58Chars.test(str)
}

/**
 * Check if a string looks like a hex-encoded secp256k1 public key
 */
export function isPublicKey(str: string): boolean {
  if (typeof str !== 'string') return false

  if (/^0[23][0-9a-fA-F]{64}$/.test(str)) return true
  return /^04[0-9a-fA-F]{128}$/.test(str)
}
