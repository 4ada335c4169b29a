/**
 * Byte conversion and hashing helpers
 *
 * Hashing goes through @noble/hashes so the same code runs anywhere
 * a WHATWG-compatible runtime does.
 */

import { sha256 as sha256Noble } from '@noble/hashes/sha2.js'
import { ripemd160 } from '@noble/hashes/legacy.js'

// ============================================================================
// CONVERSION UTILITIES
// ============================================================================

/**
 * Convert hex string to Uint8Array
 *
 * @param hex - Hex string to convert
 * @returns Uint8Array of bytes
 * @throws Error if hex string is invalid
 */
export function hexToBytes(hex: string): Uint8Array {
  if (!/^[0-9a-fA-F]*$/.test(hex)) {
    throw new Error(
      `Invalid hex string: contains non-hexadecimal characters. ` +
      `Input: "${hex.substring(0, 32)}${hex.length > 32 ? '...' : ''}"`
    )
  }

  if (hex.length % 2 !== 0) {
    throw new Error(
      `Invalid hex string: odd length (${hex.length} characters). ` +
      `Hex strings must have an even number of characters.`
    )
  }

  return new Uint8Array(Buffer.from(hex, 'hex'))
}

/**
 * Convert Uint8Array to lowercase hex string
 */
export function bytesToHex(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString('hex')
}

/**
 * Encode bytes as unpadded base64url, the encoding JOSE uses for
 * key coordinates and token segments
 */
export function bytesToBase64Url(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString('base64url')
}

// ============================================================================
// HASHING
// ============================================================================

/**
 * Hash a string or bytes with SHA-256
 *
 * Strings are hashed as their UTF-8 encoding.
 */
export function sha256(data: string | Uint8Array): Uint8Array {
  if (typeof data === 'string') {
    return sha256Noble(new TextEncoder().encode(data))
  }
  return sha256Noble(data)
}

export function sha256Hex(data: string | Uint8Array): string {
  return bytesToHex(sha256(data))
}

/**
 * RIPEMD-160 of SHA-256, the 20-byte payload of a P2PKH address
 */
export function hash160(data: Uint8Array): Uint8Array {
  return ripemd160(sha256(data))
}
