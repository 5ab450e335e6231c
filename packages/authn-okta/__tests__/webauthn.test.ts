import { describe, it, expect, vi } from 'vitest';
import {
  DeviceUnavailableError,
  ProtocolViolationError,
  type AssertionRequest,
  type Fido2Backend,
  type Fido2Device,
} from '@gp-okta/core';
import { WebauthnChallenge, readChallenge } from '../src/webauthn.js';
import { parseAuthnResponse } from '../src/types.js';
import { OKTA, ScriptedPoster, ScriptedPrompter, makeInteraction } from './helpers.js';

const AUTHENTICATOR_DATA = new Uint8Array([0xfb, 0xff, 0x00, 0x01, 0x3e]);
const CLIENT_DATA = new Uint8Array(Buffer.from('{"type":"webauthn.get"}'));
const SIGNATURE = new Uint8Array([0x30, 0x45, 0xfe, 0xbf]);

const key: Fido2Device = { descriptor: 'Test Key (hidraw0)' };

function makeBackend(deviceLists: Fido2Device[][] = [[key]]) {
  const requests: AssertionRequest[] = [];
  const lists = [...deviceLists];
  const backend: Fido2Backend = {
    id: 'fake',
    listDevices: vi.fn(async () => lists.shift() ?? []),
    getAssertion: vi.fn(async (_device: Fido2Device, request: AssertionRequest) => {
      requests.push(request);
      return {
        credentialId: 'AQID-g',
        authenticatorData: Buffer.from(AUTHENTICATOR_DATA).toString('base64url'),
        clientDataJSON: Buffer.from(CLIENT_DATA).toString('base64url'),
        signature: Buffer.from(SIGNATURE).toString('base64url'),
      };
    }),
  };
  return { backend, requests };
}

function challengeResponse() {
  return {
    status: 'MFA_CHALLENGE',
    stateToken: 'st-challenge',
    _embedded: {
      challenge: { challenge: '3q2-7w' },
      factors: [
        { factorType: 'webauthn', provider: 'FIDO', profile: { credentialId: 'AQID-g' } },
        { factorType: 'webauthn', provider: 'FIDO', profile: { credentialId: 'CQgH__4' } },
      ],
    },
    _links: { next: { href: `https://${OKTA}/api/v1/authn/factors/webauthn/verify?rememberDevice=false` } },
  };
}

describe('WebauthnChallenge', () => {
  it('signs the challenge and submits padded base64 with the challenge state token', async () => {
    const http = new ScriptedPoster([challengeResponse(), { status: 'SUCCESS', sessionToken: 'sess-1' }]);
    const { backend, requests } = makeBackend();
    const challenge = new WebauthnChallenge({
      http,
      backend,
      prompter: new ScriptedPrompter(),
      interaction: makeInteraction(),
      oktaDomain: OKTA,
    });

    const result = await challenge.verify('st-original');

    expect(result.status).toBe('SUCCESS');
    expect(http.calls[0]).toEqual({
      url: 'https://example.okta.com/api/v1/authn/factors/webauthn/verify',
      body: { stateToken: 'st-original' },
    });
    expect(http.calls[1]).toEqual({
      url: 'https://example.okta.com/api/v1/authn/factors/webauthn/verify?rememberDevice=false',
      body: {
        authenticatorData: '+/8AAT4=',
        clientData: 'eyJ0eXBlIjoid2ViYXV0aG4uZ2V0In0=',
        signatureData: 'MEX+vw==',
        stateToken: 'st-challenge',
      },
    });

    expect(requests).toHaveLength(1);
    expect(requests[0]).toEqual({
      origin: 'https://example.okta.com',
      rpId: 'example.okta.com',
      challenge: new Uint8Array([0xde, 0xad, 0xbe, 0xef]),
      allowCredentials: [
        { type: 'public-key', id: new Uint8Array([1, 2, 3, 250]) },
        { type: 'public-key', id: new Uint8Array([9, 8, 7, 255, 254]) },
      ],
    });
  });

  it('round-trips the assertion bytes through the transport encoding', async () => {
    const http = new ScriptedPoster([challengeResponse(), { status: 'SUCCESS', sessionToken: 'sess-1' }]);
    const { backend } = makeBackend();
    const challenge = new WebauthnChallenge({
      http,
      backend,
      prompter: new ScriptedPrompter(),
      interaction: makeInteraction(),
      oktaDomain: OKTA,
    });

    await challenge.verify('st-original');
    const body = http.calls[1]?.body ?? {};

    expect(new Uint8Array(Buffer.from(String(body.authenticatorData), 'base64'))).toEqual(
      AUTHENTICATOR_DATA
    );
    expect(new Uint8Array(Buffer.from(String(body.clientData), 'base64'))).toEqual(CLIENT_DATA);
    expect(new Uint8Array(Buffer.from(String(body.signatureData), 'base64'))).toEqual(SIGNATURE);
  });

  it('waits for the user to insert a key', async () => {
    const { backend } = makeBackend([[], [key]]);
    const prompter = new ScriptedPrompter({ confirm: [true] });
    const challenge = new WebauthnChallenge({
      http: new ScriptedPoster([]),
      backend,
      prompter,
      interaction: makeInteraction(),
      oktaDomain: OKTA,
    });

    await expect(challenge.selectDevice()).resolves.toBe(key);
    expect(prompter.asked).toEqual(['Continue with webauthn MFA?']);
    expect(backend.listDevices).toHaveBeenCalledTimes(2);
  });

  it('reports the device unavailable when the user declines', async () => {
    const http = new ScriptedPoster([]);
    const { backend } = makeBackend([[]]);
    const prompter = new ScriptedPrompter({ confirm: [false] });
    const challenge = new WebauthnChallenge({
      http,
      backend,
      prompter,
      interaction: makeInteraction(),
      oktaDomain: OKTA,
    });

    await expect(challenge.verify('st-1')).rejects.toBeInstanceOf(DeviceUnavailableError);
    expect(prompter.infos).toEqual([
      'Please insert a suitable device if you wish to continue with webauthn MFA.',
      'Falling back to other MFA method.',
    ]);
    expect(http.calls).toHaveLength(0);
  });
});

describe('readChallenge', () => {
  it('requires a challenge value', () => {
    const response = parseAuthnResponse(
      { status: 'MFA_CHALLENGE', stateToken: 'st', _links: { next: { href: 'https://x' } } },
      'test'
    );

    expect(() => readChallenge(response)).toThrow(ProtocolViolationError);
  });

  it('requires at least one enrolled credential', () => {
    const response = parseAuthnResponse(
      {
        status: 'MFA_CHALLENGE',
        stateToken: 'st',
        _embedded: { challenge: { challenge: '3q2-7w' }, factors: [] },
        _links: { next: { href: 'https://x' } },
      },
      'test'
    );

    expect(() => readChallenge(response)).toThrow('Webauthn challenge lists no enrolled credentials');
  });
});
