/**
 * Decentralized identifier parsing
 *
 * did:<method>:<method-specific-id>
 */

import { BTC_ADDRESS_DID_METHOD, DID_SCHEME } from './constants'

export interface ParsedDID {
  /** Lower-cased method tag, e.g. "btc-addr" */
  method: string
  /** Method-specific identifier, kept verbatim */
  identifier: string
}

export class DIDFormatError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'DIDFormatError'
  }
}

/**
 * Parse a DID into its method and identifier
 *
 * Only the scheme tag is compared case-insensitively.
 *
 * @throws DIDFormatError if the DID does not have exactly 3 parts or does
 * not start with "did"
 */
export function parseDID(decentralizedId: string): ParsedDID {
  const parts = decentralizedId.split(':')
  if (parts.length !== 3) {
    throw new DIDFormatError('Decentralized IDs must have 3 parts')
  }

  const [scheme, method, identifier] = parts
  if (scheme.toLowerCase() !== DID_SCHEME) {
    throw new DIDFormatError('Decentralized IDs must start with "did"')
  }

  return { method: method.toLowerCase(), identifier }
}

export function getDIDType(decentralizedId: string): string {
  return parseDID(decentralizedId).method
}

/**
 * Extract the Bitcoin address from a did:btc-addr DID
 *
 * @returns the address, or null when the DID uses any other method
 */
export function getAddressFromDID(decentralizedId: string): string | null {
  const { method, identifier } = parseDID(decentralizedId)
  if (method !== BTC_ADDRESS_DID_METHOD) {
    return null
  }
  return identifier
}

export function addressToDID(address: string): string {
  return `${DID_SCHEME}:${BTC_ADDRESS_DID_METHOD}:${address}`
}
