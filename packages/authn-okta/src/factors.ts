/**
 * Factor model and selection order
 *
 * Okta's factorType strings are classified once into a closed union; all
 * dispatch happens on `kind`.
 */

import type { OktaFactor } from './types.js';

export const TOTP_FACTOR_TYPE = 'token:software:totp';

export type FactorKind =
  | { kind: 'push' }
  | { kind: 'sms' }
  /** Software TOTP (Okta Verify, Google Authenticator): computable locally */
  | { kind: 'totp' }
  /** Any other `token` / `token:*` factor: the user types the code */
  | { kind: 'token' }
  | { kind: 'webauthn' }
  | { kind: 'unsupported'; factorType: string };

export type FactorKindTag = FactorKind['kind'];

export type Factor = FactorKind & {
  factorType: string;
  provider: string;
  vendorName: string | undefined;
  verifyUrl: string | undefined;
  /** Position in the provider's list; ties in priority keep this order */
  index: number;
};

export type FactorPriorities = Readonly<Record<string, number>>;

export function classifyFactorType(factorType: string): FactorKind {
  if (factorType === 'push') return { kind: 'push' };
  if (factorType === 'sms') return { kind: 'sms' };
  if (factorType === 'webauthn') return { kind: 'webauthn' };
  if (factorType === TOTP_FACTOR_TYPE) return { kind: 'totp' };
  if (/^token(?::|$)/.test(factorType)) return { kind: 'token' };
  return { kind: 'unsupported', factorType };
}

export function parseFactor(raw: OktaFactor, index: number): Factor {
  return {
    ...classifyFactorType(raw.factorType),
    factorType: raw.factorType,
    provider: raw.provider,
    vendorName: raw.vendorName,
    verifyUrl: raw._links?.verify?.href,
    index,
  };
}

/**
 * Built-in priorities: a locally computable TOTP beats push, push beats the
 * rest.
 */
export function defaultFactorPriorities(hasTotpSecret: boolean): Record<string, number> {
  return {
    [TOTP_FACTOR_TYPE]: hasTotpSecret ? 2 : 0,
    push: 1,
  };
}

export function factorPriority(factor: Factor, priorities: FactorPriorities): number {
  return priorities[factor.factorType] ?? 0;
}

/**
 * Highest priority first. Array.prototype.sort is stable, so equal priorities
 * keep the provider's order.
 */
export function orderFactors(factors: readonly Factor[], priorities: FactorPriorities): Factor[] {
  return [...factors].sort(
    (a, b) => factorPriority(b, priorities) - factorPriority(a, priorities)
  );
}

export function describeFactor(factor: Factor): string {
  return factor.vendorName ? `${factor.factorType} (${factor.vendorName})` : factor.factorType;
}
