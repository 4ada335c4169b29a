import { describe, test, expect } from 'vitest'
import {
  addressesMatch,
  isAddress,
  isPublicKey,
  pubkeyToAddress,
  validateAddress,
  verifyPubkeyMatchesAddress
} from './address'
import {
  ADDRESS_CHECKSUM_BYTES,
  ADDRESS_HASH_BYTES,
  ADDRESS_VERSION_MAINNET,
  ADDRESS_VERSION_TESTNET
} from './constants'
import { createTestIdentity } from './test-helpers'

// Generator point (private key 1), compressed and uncompressed
const TEST_PUBKEY = '0279be667ef9dcbbac55a06295ce870b07029bfcdb2dce28d959f2815b16f81798'
const TEST_PUBKEY_UNCOMPRESSED =
  '0479be667ef9dcbbac55a06295ce870b07029bfcdb2dce28d959f2815b16f81798' +
  '483ada7726a3c4655da4fbfc0e1108a8fd17b448a68554199c47d08ffb10d4b8'
const TEST_ADDRESS = '1BgGZ9tcN4rm9KBzDn7KprQz87SZ26SAMH'
const TEST_ADDRESS_UNCOMPRESSED = '1EHNa6Q4Jz2uvNExL497mE43ikXhwF6kZm'

describe('Address Encoding', () => {
  test('pubkeyToAddress derives the known address of a compressed key', () => {
    const result = pubkeyToAddress(TEST_PUBKEY)

    expect(result.address).toBe(TEST_ADDRESS)
    expect(result.hash).toBe('751e76e8199196d454941c45d1b3a323f1433bd6')
    expect(result.network).toBe('mainnet')
  })

  test('pubkeyToAddress derives the known address of an uncompressed key', () => {
    expect(pubkeyToAddress(TEST_PUBKEY_UNCOMPRESSED).address).toBe(TEST_ADDRESS_UNCOMPRESSED)
  })

  test('same pubkey always generates same address', () => {
    const result1 = pubkeyToAddress(TEST_PUBKEY)
    const result2 = pubkeyToAddress(TEST_PUBKEY)

    expect(result1.address).toBe(result2.address)
    expect(result1.hash).toBe(result2.hash)
  })

  test('different networks generate different addresses', () => {
    const mainnet = pubkeyToAddress(TEST_PUBKEY, 'mainnet')
    const testnet = pubkeyToAddress(TEST_PUBKEY, 'testnet')

    expect(mainnet.address).not.toBe(testnet.address)
    expect(mainnet.hash).toBe(testnet.hash) // Same hash, different version byte
    expect(mainnet.address.startsWith('1')).toBe(true)
    expect(['m', 'n']).toContain(testnet.address[0])
  })

  test('throws on invalid pubkey length', () => {
    expect(() => pubkeyToAddress('deadbeef')).toThrow('Invalid public key length')
  })

  test('throws on non-hex pubkey', () => {
    expect(() => pubkeyToAddress('not-a-key')).toThrow('non-hexadecimal')
  })
})

describe('Address Validation', () => {
  test('validates correctly encoded address', () => {
    const result = validateAddress(TEST_ADDRESS)

    expect(result.valid).toBe(true)
    expect(result.network).toBe('mainnet')
    expect(result.hash).toBe('751e76e8199196d454941c45d1b3a323f1433bd6')
  })

  test('validates testnet address', () => {
    const { address } = pubkeyToAddress(TEST_PUBKEY, 'testnet')
    const result = validateAddress(address)

    expect(result.valid).toBe(true)
    expect(result.network).toBe('testnet')
  })

  test('rejects address with invalid checksum', () => {
    // Modify last character to break checksum
    const corrupted = TEST_ADDRESS.slice(0, -1) + 'A'

    const result = validateAddress(corrupted)
    expect(result.valid).toBe(false)
    expect(result.error).toBe('Invalid checksum')
  })

  test('rejects invalid Base58 characters', () => {
    const result = validateAddress('0OIl') // Contains invalid chars: 0, O, I, l

    expect(result.valid).toBe(false)
    expect(result.error).toBe('Invalid Base58 encoding')
  })

  test('rejects wrong length address', () => {
    const result = validateAddress('abc')

    expect(result.valid).toBe(false)
    expect(result.error).toContain('Invalid address length')
  })
})

describe('Address Comparison', () => {
  test('identical addresses match', () => {
    expect(addressesMatch(TEST_ADDRESS, TEST_ADDRESS)).toBe(true)
  })

  test('comparison is case-sensitive', () => {
    expect(addressesMatch(TEST_ADDRESS, TEST_ADDRESS.toLowerCase())).toBe(false)
  })

  test('a missing address never matches', () => {
    expect(addressesMatch(null, TEST_ADDRESS)).toBe(false)
    expect(addressesMatch(TEST_ADDRESS, undefined)).toBe(false)
    expect(addressesMatch(null, null)).toBe(false)
  })
})

describe('Address Verification', () => {
  test('verifies pubkey matches its address', () => {
    expect(verifyPubkeyMatchesAddress(TEST_PUBKEY, TEST_ADDRESS)).toBe(true)
  })

  test('verifies pubkey matches its testnet address', () => {
    const { address } = pubkeyToAddress(TEST_PUBKEY, 'testnet')
    expect(verifyPubkeyMatchesAddress(TEST_PUBKEY, address)).toBe(true)
  })

  test('rejects wrong pubkey for address', () => {
    const other = createTestIdentity()

    expect(verifyPubkeyMatchesAddress(other.publicKey, TEST_ADDRESS)).toBe(false)
  })

  test('returns false for invalid address or pubkey', () => {
    expect(verifyPubkeyMatchesAddress(TEST_PUBKEY, 'invalid')).toBe(false)
    expect(verifyPubkeyMatchesAddress('deadbeef', TEST_ADDRESS)).toBe(false)
  })
})

describe('Type Detection', () => {
  test('isAddress detects valid address format', () => {
    expect(isAddress(TEST_ADDRESS)).toBe(true)
  })

  test('isAddress rejects pubkey format', () => {
    expect(isAddress(TEST_PUBKEY)).toBe(false)
  })

  test('isPublicKey detects compressed and uncompressed keys', () => {
    expect(isPublicKey(TEST_PUBKEY)).toBe(true)
    expect(isPublicKey(TEST_PUBKEY_UNCOMPRESSED)).toBe(true)
  })

  test('isPublicKey rejects addresses and invalid strings', () => {
    expect(isPublicKey(TEST_ADDRESS)).toBe(false)
    expect(isPublicKey('')).toBe(false)
    expect(isPublicKey('05' + TEST_PUBKEY.slice(2))).toBe(false)
  })
})

describe('Integration with generated keys', () => {
  test('freshly generated key produces valid address', () => {
    const { publicKey, address } = createTestIdentity()

    expect(validateAddress(address).valid).toBe(true)
    expect(verifyPubkeyMatchesAddress(publicKey, address)).toBe(true)
  })

  test('distinct keys produce unique addresses', () => {
    const addresses = new Set<string>()

    for (let i = 0; i < 10; i++) {
      addresses.add(createTestIdentity().address)
    }

    expect(addresses.size).toBe(10)
  })
})

describe('Constants', () => {
  test('version bytes are correct', () => {
    expect(ADDRESS_VERSION_MAINNET).toBe(0x00)
    expect(ADDRESS_VERSION_TESTNET).toBe(0x6f)
  })

  test('hash and checksum sizes are correct', () => {
    expect(ADDRESS_HASH_BYTES).toBe(20)
    expect(ADDRESS_CHECKSUM_BYTES).toBe(4)
  })
})
