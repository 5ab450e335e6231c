/**
 * Time-based One-Time Password (RFC 6238) generation
 *
 * HMAC-SHA1, 30 second step, 6 digits: the parameters Okta Verify and Google
 * Authenticator enrol with. Built on Node's crypto module.
 */

import { createHmac } from 'crypto';
import { ConfigurationError } from '@gp-okta/core';

const TOTP_DEFAULTS = {
  /** Time step in seconds. */
  period: 30,
  /** Number of digits in the OTP. */
  digits: 6,
} as const;

/** Base32 alphabet (RFC 4648). */
const BASE32_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ234567';

export interface TotpOptions {
  period?: number;
  digits?: number;
}

/**
 * Generate a TOTP code for a base32 secret at the given time (ms since epoch).
 */
export function generateTotp(
  secret: string,
  time: number = Date.now(),
  options: TotpOptions = {}
): string {
  const period = options.period ?? TOTP_DEFAULTS.period;
  const digits = options.digits ?? TOTP_DEFAULTS.digits;

  const counter = Math.floor(time / 1000 / period);
  return generateHotp(base32Decode(secret), counter, digits);
}

/**
 * HMAC-based One-Time Password (RFC 4226).
 */
export function generateHotp(key: Buffer, counter: number, digits: number): string {
  const counterBuf = Buffer.alloc(8);
  counterBuf.writeBigUInt64BE(BigInt(counter));

  const hash = createHmac('sha1', key).update(counterBuf).digest();

  // Dynamic truncation
  const offset = (hash[hash.length - 1] ?? 0) & 0x0f;
  const binary = hash.readUInt32BE(offset) & 0x7fffffff;

  return (binary % 10 ** digits).toString().padStart(digits, '0');
}

/**
 * Decode a base32 secret. Spaces, dashes, padding and lower case are accepted
 * since authenticator apps display secrets that way.
 */
export function base32Decode(secret: string): Buffer {
  const normalized = secret.replace(/[\s-]/g, '').replace(/=+$/, '').toUpperCase();
  if (normalized.length === 0) {
    throw new ConfigurationError('TOTP secret is empty');
  }

  let bits = 0;
  let value = 0;
  const output: number[] = [];

  for (const char of normalized) {
    const idx = BASE32_ALPHABET.indexOf(char);
    if (idx === -1) {
      throw new ConfigurationError('TOTP secret is not valid base32');
    }
    value = (value << 5) | idx;
    bits += 5;
    if (bits >= 8) {
      output.push((value >>> (bits - 8)) & 0xff);
      bits -= 8;
    }
  }

  return Buffer.from(output);
}
