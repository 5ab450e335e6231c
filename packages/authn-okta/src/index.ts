/**
 * @gp-okta/authn-okta
 *
 * Okta primary authentication and MFA factor negotiation (push, SMS, TOTP and
 * other token factors, webauthn).
 */

export { FactorNegotiator } from './negotiator.js';
export type { FactorNegotiatorOptions, NegotiatorCapabilities, PushPolicy } from './negotiator.js';
export { WebauthnChallenge, readChallenge } from './webauthn.js';
export type { WebauthnChallengeOptions, WebauthnChallengeData } from './webauthn.js';
export {
  TOTP_FACTOR_TYPE,
  classifyFactorType,
  parseFactor,
  defaultFactorPriorities,
  factorPriority,
  orderFactors,
  describeFactor,
  type Factor,
  type FactorKind,
  type FactorKindTag,
  type FactorPriorities,
} from './factors.js';
export { generateTotp, generateHotp, base32Decode, type TotpOptions } from './totp.js';
export { base64UrlToBytes, bytesToBase64Url, toTransportBase64 } from './encoding.js';
export {
  AuthnResponseSchema,
  OktaFactorSchema,
  parseAuthnResponse,
  toStep,
  requireStateToken,
  type AuthnResponse,
  type AuthnStep,
  type OktaFactor,
  type JsonPoster,
} from './types.js';
