import { describe, it, expect } from 'vitest';
import {
  classifyFactorType,
  defaultFactorPriorities,
  orderFactors,
  parseFactor,
} from '../src/factors.js';
import { OktaFactorSchema } from '../src/types.js';
import { makeFactor } from './helpers.js';

function factorsOf(...types: string[]) {
  return types.map((type, index) => parseFactor(OktaFactorSchema.parse(makeFactor(type)), index));
}

describe('classifyFactorType', () => {
  it('maps known factor types to kinds', () => {
    expect(classifyFactorType('push')).toEqual({ kind: 'push' });
    expect(classifyFactorType('sms')).toEqual({ kind: 'sms' });
    expect(classifyFactorType('webauthn')).toEqual({ kind: 'webauthn' });
    expect(classifyFactorType('token:software:totp')).toEqual({ kind: 'totp' });
  });

  it('treats the whole token family as code-entry factors', () => {
    expect(classifyFactorType('token')).toEqual({ kind: 'token' });
    expect(classifyFactorType('token:hardware')).toEqual({ kind: 'token' });
    expect(classifyFactorType('token:hotp')).toEqual({ kind: 'token' });
    expect(classifyFactorType('tokenish')).toEqual({ kind: 'unsupported', factorType: 'tokenish' });
  });

  it('keeps the type of unsupported factors', () => {
    expect(classifyFactorType('question')).toEqual({ kind: 'unsupported', factorType: 'question' });
  });
});

describe('parseFactor', () => {
  it('reads the verify link and labels', () => {
    const factor = parseFactor(
      OktaFactorSchema.parse(makeFactor('token:hardware', { provider: 'YUBICO', vendorName: 'YubiKey' })),
      3
    );

    expect(factor).toEqual({
      kind: 'token',
      factorType: 'token:hardware',
      provider: 'YUBICO',
      vendorName: 'YubiKey',
      verifyUrl: 'https://example.okta.com/api/v1/authn/factors/tokenhardware-id/verify',
      index: 3,
    });
  });
});

describe('orderFactors', () => {
  it('tries totp first given {totp:2, push:1, sms:0}', () => {
    const ordered = orderFactors(factorsOf('sms', 'push', 'token:software:totp'), {
      'token:software:totp': 2,
      push: 1,
      sms: 0,
    });

    expect(ordered.map(f => f.factorType)).toEqual(['token:software:totp', 'push', 'sms']);
  });

  it('keeps provider order between equal priorities', () => {
    const ordered = orderFactors(factorsOf('question', 'sms', 'call', 'webauthn'), {});

    expect(ordered.map(f => f.index)).toEqual([0, 1, 2, 3]);
  });

  it('sorts descending with ties stable', () => {
    const ordered = orderFactors(factorsOf('sms', 'webauthn', 'push', 'call', 'token'), {
      push: 1,
      webauthn: 1,
      call: -1,
    });

    expect(ordered.map(f => f.factorType)).toEqual(['webauthn', 'push', 'sms', 'token', 'call']);
  });

  it('does not mutate its input', () => {
    const factors = factorsOf('sms', 'push');
    orderFactors(factors, { push: 1 });

    expect(factors.map(f => f.factorType)).toEqual(['sms', 'push']);
  });
});

describe('defaultFactorPriorities', () => {
  it('ranks software totp above push only with a secret', () => {
    expect(defaultFactorPriorities(true)).toEqual({ 'token:software:totp': 2, push: 1 });
    expect(defaultFactorPriorities(false)).toEqual({ 'token:software:totp': 0, push: 1 });
  });
});
