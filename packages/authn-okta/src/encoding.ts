/**
 * WebAuthn binary field encodings
 *
 * Authenticators and Okta's challenge use unpadded base64url; Okta's assertion
 * endpoint wants standard padded base64.
 */

import { ProtocolViolationError } from '@gp-okta/core';

const BASE64URL_PATTERN = /^[A-Za-z0-9_-]*={0,2}$/;

export function base64UrlToBytes(value: string, field: string): Uint8Array {
  if (!BASE64URL_PATTERN.test(value)) {
    throw new ProtocolViolationError(`${field} is not base64url encoded`);
  }
  return new Uint8Array(Buffer.from(value, 'base64url'));
}

export function bytesToBase64Url(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString('base64url');
}

/**
 * Decode a canonical base64url field and re-encode it as padded base64.
 */
export function toTransportBase64(value: string, field: string): string {
  return Buffer.from(base64UrlToBytes(value, field)).toString('base64');
}
