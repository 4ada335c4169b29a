import { describe, test, expect } from 'vitest'
import {
  bytesToBase64Url,
  bytesToHex,
  hash160,
  hexToBytes,
  sha256,
  sha256Hex
} from './encoding'

// Compressed public key of the secp256k1 generator point (private key 1)
const GENERATOR_PUBKEY = '0279be667ef9dcbbac55a06295ce870b07029bfcdb2dce28d959f2815b16f81798'

// ============================================================================
// CONVERSION UTILITIES
// ============================================================================

describe('hexToBytes', () => {
  test('converts valid hex to bytes', () => {
    expect(hexToBytes('deadbeef')).toEqual(new Uint8Array([0xde, 0xad, 0xbe, 0xef]))
  })

  test('handles uppercase and mixed case hex', () => {
    expect(hexToBytes('DEADBEEF')).toEqual(new Uint8Array([0xde, 0xad, 0xbe, 0xef]))
    expect(hexToBytes('DeAdBeEf')).toEqual(new Uint8Array([0xde, 0xad, 0xbe, 0xef]))
  })

  test('throws on invalid hex characters', () => {
    expect(() => hexToBytes('xyz123')).toThrow('non-hexadecimal')
  })

  test('throws on odd-length hex string', () => {
    expect(() => hexToBytes('abc')).toThrow('odd length')
  })

  test('handles empty string', () => {
    expect(hexToBytes('')).toEqual(new Uint8Array([]))
  })

  test('converts 33-byte compressed key', () => {
    const bytes = hexToBytes(GENERATOR_PUBKEY)
    expect(bytes.length).toBe(33)
    expect(bytes[0]).toBe(0x02)
  })
})

describe('bytesToHex', () => {
  test('converts bytes to hex', () => {
    expect(bytesToHex(new Uint8Array([0xde, 0xad, 0xbe, 0xef]))).toBe('deadbeef')
  })

  test('pads single-digit hex values with zero', () => {
    expect(bytesToHex(new Uint8Array([0x01, 0x02, 0x0f]))).toBe('01020f')
  })

  test('round-trips with hexToBytes', () => {
    expect(bytesToHex(hexToBytes('cafebabe12345678'))).toBe('cafebabe12345678')
  })
})

describe('bytesToBase64Url', () => {
  test('uses the URL-safe alphabet without padding', () => {
    expect(bytesToBase64Url(new Uint8Array([0xfb, 0xff]))).toBe('-_8')
  })
})

// ============================================================================
// HASHING
// ============================================================================

describe('sha256', () => {
  test('hashes empty string correctly', () => {
    expect(bytesToHex(sha256(''))).toBe('e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855')
  })

  test('hashes "abc" correctly', () => {
    expect(bytesToHex(sha256('abc'))).toBe('ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad')
  })

  test('string and Uint8Array with same content produce same hash', () => {
    const fromString = sha256('hello')
    const fromBytes = sha256(new TextEncoder().encode('hello'))
    expect(bytesToHex(fromString)).toBe(bytesToHex(fromBytes))
    expect(bytesToHex(fromString)).toBe('2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824')
  })

  test('returns a 32-byte Uint8Array', () => {
    const hash = sha256('test')
    expect(hash instanceof Uint8Array).toBe(true)
    expect(hash.length).toBe(32)
  })
})

describe('sha256Hex', () => {
  test('matches sha256 output as hex', () => {
    expect(sha256Hex('abc')).toBe('ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad')
  })
})

describe('hash160', () => {
  test('hashes the generator public key to its known P2PKH payload', () => {
    expect(bytesToHex(hash160(hexToBytes(GENERATOR_PUBKEY)))).toBe('751e76e8199196d454941c45d1b3a323f1433bd6')
  })

  test('returns 20 bytes', () => {
    expect(hash160(new Uint8Array([1, 2, 3])).length).toBe(20)
  })
})
