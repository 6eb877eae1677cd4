/**
 * @file nonce.ts
 * @description Random nonces for callers that do not bring their own
 */

import {randomBytes} from 'crypto'

/**
 * Generates a cryptographically secure random nonce.
 * @returns A base64-encoded random string suitable for CSP nonces
 */
export function generateNonce(bytes = 16): string {
  return randomBytes(bytes).toString('base64')
}
