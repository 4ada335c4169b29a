/**
 * Fixtures for tests: in-process keys and hand-assembled ES256K tokens
 */

import { secp256k1 } from '@noble/curves/secp256k1'
import { pubkeyToAddress } from './address'
import type { NetworkType } from './address'
import { addressToDID } from './did'
import { bytesToBase64Url, bytesToHex, sha256 } from './encoding'

/** 2023-11-14T22:13:20Z */
export const FIXED_NOW_SECONDS = 1_700_000_000
export const FIXED_NOW = new Date(FIXED_NOW_SECONDS * 1000)

export interface TestIdentity {
  privateKey: Uint8Array
  /** Compressed, hex */
  publicKey: string
  address: string
  did: string
}

export function createTestIdentity(network: NetworkType = 'mainnet'): TestIdentity {
  const privateKey = secp256k1.utils.randomPrivateKey()
  const publicKey = bytesToHex(secp256k1.getPublicKey(privateKey, true))
  const { address } = pubkeyToAddress(publicKey, network)
  return { privateKey, publicKey, address, did: addressToDID(address) }
}

/**
 * A complete, valid claim set for `identity`, issued at FIXED_NOW
 */
export function authResponseClaims(
  identity: TestIdentity,
  overrides: Record<string, unknown> = {}
): Record<string, unknown> {
  return {
    jti: 'c6f2f1a0-5bb4-4a1e-9f0e-1c2d3e4f5a6b',
    iat: FIXED_NOW_SECONDS,
    exp: FIXED_NOW_SECONDS + 3600,
    iss: identity.did,
    public_keys: [identity.publicKey],
    username: null,
    profile: { name: 'Test User' },
    ...overrides
  }
}

function encodeSegment(value: unknown): string {
  return bytesToBase64Url(new TextEncoder().encode(JSON.stringify(value)))
}

/**
 * Sign `claims` as a compact JWS with raw r||s ES256K signature
 */
export function signToken(
  claims: Record<string, unknown>,
  privateKey: Uint8Array,
  header: Record<string, unknown> = { typ: 'JWT', alg: 'ES256K' }
): string {
  const signingInput = `${encodeSegment(header)}.${encodeSegment(claims)}`
  const signature = secp256k1.sign(sha256(signingInput), privateKey)
  return `${signingInput}.${bytesToBase64Url(signature.toCompactRawBytes())}`
}

/**
 * Replace one character of the signature segment, changing its bytes
 */
export function tamperSignature(token: string): string {
  const [header, payload, signature] = token.split('.')
  const index = 10
  const replacement = signature[index] === 'A' ? 'B' : 'A'
  const tampered = signature.slice(0, index) + replacement + signature.slice(index + 1)
  return `${header}.${payload}.${tampered}`
}

export interface RecordedRequest {
  url: string
  headers: Headers
}

/**
 * A fetch stand-in answering every request from `respond`
 */
export function fakeFetch(
  respond: (url: string) => Response | Promise<Response>
): { fetch: typeof globalThis.fetch; requests: RecordedRequest[] } {
  const requests: RecordedRequest[] = []
  const fetchImpl: typeof globalThis.fetch = async (input, init) => {
    const url = typeof input === 'string' ? input : input instanceof URL ? input.href : input.url
    requests.push({ url, headers: new Headers(init?.headers) })
    return await respond(url)
  }
  return { fetch: fetchImpl, requests }
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' }
  })
}
