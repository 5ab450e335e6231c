/**
 * Webauthn factor verification
 *
 * Uses Okta's generic webauthn verify URL rather than a factor's own verify
 * link: the challenge then lists every key enrolled on the account, so any of
 * them can answer.
 */

import {
  DeviceUnavailableError,
  ProtocolViolationError,
  UnexpectedStatusError,
  logger,
  type AllowedCredential,
  type AssertionRequest,
  type Fido2Backend,
  type Fido2Device,
  type Prompter,
  type UserInteraction,
} from '@gp-okta/core';
import { base64UrlToBytes, toTransportBase64 } from './encoding.js';
import { parseAuthnResponse, type AuthnResponse, type JsonPoster } from './types.js';

export interface WebauthnChallengeOptions {
  http: JsonPoster;
  backend: Fido2Backend;
  prompter: Prompter;
  interaction: UserInteraction;
  /** Okta host (with port, if any) */
  oktaDomain: string;
}

/**
 * A provider-issued challenge. Single use; its state token supersedes the one
 * the challenge was requested with.
 */
export interface WebauthnChallengeData {
  challenge: Uint8Array;
  allowCredentials: AllowedCredential[];
  stateToken: string;
  nextUrl: string;
}

export class WebauthnChallenge {
  constructor(private readonly options: WebauthnChallengeOptions) {}

  get verifyUrl(): string {
    return `https://${this.options.oktaDomain}/api/v1/authn/factors/webauthn/verify`;
  }

  /**
   * Run the whole factor: pick a device, fetch a challenge, sign it, submit.
   *
   * @throws DeviceUnavailableError when no key is attached and the user declines to insert one
   */
  async verify(stateToken: string): Promise<AuthnResponse> {
    const device = await this.selectDevice();

    const response = parseAuthnResponse(
      await this.options.http.postJson(this.verifyUrl, { stateToken }),
      'webauthn challenge'
    );
    if (response.status !== 'MFA_CHALLENGE') {
      throw new UnexpectedStatusError(response.status, { factorType: 'webauthn' });
    }

    const challenge = readChallenge(response);
    const origin = `https://${this.options.oktaDomain}`;
    const request: AssertionRequest = {
      origin,
      rpId: new URL(origin).hostname,
      challenge: challenge.challenge,
      allowCredentials: challenge.allowCredentials,
    };

    logger.debug(
      `[webauthn] Requesting assertion from ${device.descriptor} for ${challenge.allowCredentials.length} credential(s)`
    );
    const assertion = await this.options.backend.getAssertion(
      device,
      request,
      this.options.interaction
    );

    const payload = {
      authenticatorData: toTransportBase64(assertion.authenticatorData, 'authenticatorData'),
      clientData: toTransportBase64(assertion.clientDataJSON, 'clientDataJSON'),
      signatureData: toTransportBase64(assertion.signature, 'signature'),
      stateToken: challenge.stateToken,
    };

    return parseAuthnResponse(
      await this.options.http.postJson(challenge.nextUrl, payload),
      'webauthn assertion'
    );
  }

  /**
   * First attached authenticator. With none attached the user may insert one
   * and retry, or fall back to another factor.
   */
  async selectDevice(): Promise<Fido2Device> {
    const { backend, prompter } = this.options;

    for (;;) {
      const [device] = await backend.listDevices();
      if (device) {
        return device;
      }
      prompter.info('Please insert a suitable device if you wish to continue with webauthn MFA.');
      if (!(await prompter.confirm('Continue with webauthn MFA?'))) {
        prompter.info('Falling back to other MFA method.');
        throw new DeviceUnavailableError();
      }
    }
  }
}

export function readChallenge(response: AuthnResponse): WebauthnChallengeData {
  const rawChallenge = response._embedded?.challenge?.challenge;
  if (!rawChallenge) {
    throw new ProtocolViolationError('Webauthn challenge response has no challenge');
  }
  if (!response.stateToken) {
    throw new ProtocolViolationError('Webauthn challenge response has no stateToken');
  }
  const nextUrl = response._links?.next?.href;
  if (!nextUrl) {
    throw new ProtocolViolationError('Webauthn challenge response has no next link');
  }

  const allowCredentials: AllowedCredential[] = [];
  for (const factor of response._embedded?.factors ?? []) {
    const credentialId = factor.profile?.credentialId;
    if (credentialId) {
      allowCredentials.push({
        type: 'public-key',
        id: base64UrlToBytes(credentialId, 'credentialId'),
      });
    }
  }
  if (allowCredentials.length === 0) {
    throw new ProtocolViolationError('Webauthn challenge lists no enrolled credentials');
  }

  return {
    challenge: base64UrlToBytes(rawChallenge, 'challenge'),
    allowCredentials,
    stateToken: response.stateToken,
    nextUrl,
  };
}
