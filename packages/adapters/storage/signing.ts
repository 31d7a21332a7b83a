/**
 * Value Signing
 *
 * HMAC-SHA256 signatures for values handed to the client (cookie state,
 * management markers). Signatures are compared in constant time.
 */

import * as crypto from 'crypto';

/**
 * Compute the signature of a value.
 */
export function signature(value: string, secret: string): string {
  return crypto.createHmac('sha256', secret).update(value).digest('base64url');
}

/**
 * Check a signature in constant time.
 */
export function verifySignature(value: string, candidate: string, secret: string): boolean {
  const expected = Buffer.from(signature(value, secret));
  const actual = Buffer.from(candidate);
  return expected.length === actual.length && crypto.timingSafeEqual(expected, actual);
}

/**
 * Sign a value: `<value>.<signature>`.
 */
export function sign(value: string, secret: string): string {
  return `${value}.${signature(value, secret)}`;
}

/**
 * Verify and strip the signature of a signed value.
 *
 * @returns The original value, or null if the signature does not match
 */
export function unsign(signed: string, secret: string): string | null {
  const separator = signed.lastIndexOf('.');
  if (separator < 0) {
    return null;
  }
  const value = signed.slice(0, separator);
  const candidate = signed.slice(separator + 1);
  return verifySignature(value, candidate, secret) ? value : null;
}
