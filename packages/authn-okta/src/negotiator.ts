/**
 * Okta factor negotiation
 *
 * Init → MFA_REQUIRED → MFA_CHALLENGE → SUCCESS | LOCKED_OUT | anything else.
 * Produces the session token exchanged later at /login/sessionCookieRedirect.
 */

import {
  AccountLockedError,
  DeviceUnavailableError,
  MfaTimeoutError,
  NoSupportedFactorError,
  ProtocolViolationError,
  UnexpectedStatusError,
  UnsupportedFactorError,
  logger,
  type Fido2Backend,
  type Prompter,
  type UserInteraction,
} from '@gp-okta/core';
import {
  defaultFactorPriorities,
  describeFactor,
  orderFactors,
  parseFactor,
  type Factor,
  type FactorKindTag,
  type FactorPriorities,
} from './factors.js';
import { generateTotp } from './totp.js';
import {
  parseAuthnResponse,
  requireStateToken,
  toStep,
  type AuthnStep,
  type JsonPoster,
} from './types.js';
import { WebauthnChallenge } from './webauthn.js';

/**
 * Optional capabilities, resolved once at startup
 */
export interface NegotiatorCapabilities {
  /** Base32 TOTP secret for token:software:totp */
  totpSecret?: string;
  /** Hardware key backend; without it webauthn factors are unsupported */
  webauthn?: Fido2Backend;
}

export interface PushPolicy {
  pollIntervalMs: number;
  maxPolls: number;
}

export interface FactorNegotiatorOptions {
  http: JsonPoster;
  prompter: Prompter;
  interaction: UserInteraction;
  capabilities?: NegotiatorCapabilities;
  /** Per-factorType overrides on top of the built-in priorities */
  priorities?: FactorPriorities;
  push?: PushPolicy;
  /** Current time in ms (TOTP) */
  clock?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

const DEFAULT_PUSH_POLICY: PushPolicy = { pollIntervalMs: 2000, maxPolls: 90 };

const delay = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

function assertNever(value: never): never {
  throw new Error(`Unhandled factor kind: ${JSON.stringify(value)}`);
}

export class FactorNegotiator {
  private readonly capabilities: NegotiatorCapabilities;
  private readonly priorities: FactorPriorities;
  private readonly push: PushPolicy;
  private readonly clock: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(private readonly options: FactorNegotiatorOptions) {
    this.capabilities = options.capabilities ?? {};
    this.priorities = {
      ...defaultFactorPriorities(this.capabilities.totpSecret !== undefined),
      ...options.priorities,
    };
    this.push = options.push ?? DEFAULT_PUSH_POLICY;
    this.clock = options.clock ?? Date.now;
    this.sleep = options.sleep ?? delay;
  }

  /**
   * Primary authentication plus whatever factor it takes.
   *
   * @param oktaDomain Okta host taken from the SAML request URL
   * @returns Okta session token
   */
  async authenticate(oktaDomain: string, username: string, password: string): Promise<string> {
    logger.info(`[negotiator] Authenticating ${username} at ${oktaDomain}`);

    const first = toStep(
      parseAuthnResponse(
        await this.options.http.postJson(`https://${oktaDomain}/api/v1/authn`, {
          username,
          password,
        }),
        'primary authentication'
      )
    );
    logger.debug(`[negotiator] Primary authentication returned ${first.status}`);

    const final = first.status === 'MFA_REQUIRED' ? await this.negotiate(oktaDomain, first) : first;
    return this.finish(final);
  }

  /**
   * Candidate factors in the order they will be tried
   */
  rankFactors(step: AuthnStep): Factor[] {
    const factors = (step.response._embedded?.factors ?? []).map(parseFactor);
    return orderFactors(factors, this.priorities);
  }

  private async negotiate(oktaDomain: string, step: AuthnStep): Promise<AuthnStep> {
    const ranked = this.rankFactors(step);
    const unavailable = new Set<FactorKindTag>();

    for (const factor of ranked) {
      if (unavailable.has(factor.kind)) {
        logger.debug(`[negotiator] Skipping ${describeFactor(factor)}: device unavailable`);
        continue;
      }

      logger.info(`[negotiator] Trying factor ${describeFactor(factor)}`);
      try {
        return await this.attempt(oktaDomain, factor, step);
      } catch (error) {
        if (error instanceof DeviceUnavailableError) {
          unavailable.add(factor.kind);
          logger.info(`[negotiator] ${describeFactor(factor)} unavailable, trying next factor`);
          continue;
        }
        if (error instanceof UnsupportedFactorError) {
          logger.debug(`[negotiator] ${error.message}`);
          continue;
        }
        throw error;
      }
    }

    throw new NoSupportedFactorError(ranked.map(factor => factor.factorType));
  }

  private attempt(oktaDomain: string, factor: Factor, step: AuthnStep): Promise<AuthnStep> {
    switch (factor.kind) {
      case 'push':
        return this.verifyPush(factor, step);
      case 'sms':
        return this.verifySms(factor, step);
      case 'totp':
      case 'token':
        return this.verifyToken(factor, step);
      case 'webauthn':
        return this.verifyWebauthn(oktaDomain, step);
      case 'unsupported':
        return Promise.reject(new UnsupportedFactorError(factor.factorType));
      default:
        return assertNever(factor);
    }
  }

  private async verifyPush(factor: Factor, step: AuthnStep): Promise<AuthnStep> {
    const url = requireVerifyUrl(factor);
    const { pollIntervalMs, maxPolls } = this.push;
    let current = step;
    let answerShown = false;

    for (let poll = 1; ; poll++) {
      const next = toStep(
        parseAuthnResponse(
          await this.options.http.postJson(url, { stateToken: requireStateToken(current) }),
          'push verification'
        )
      );
      if (next.status !== 'MFA_CHALLENGE' || next.response.factorResult !== 'WAITING') {
        return next;
      }

      if (!answerShown) {
        const answer = next.response._embedded?.factor?._embedded?.challenge?.correctAnswer;
        if (answer !== undefined) {
          this.options.prompter.info(`Correct 3-number answer is: ${answer}`);
          answerShown = true;
        }
      }

      if (poll >= maxPolls) {
        throw new MfaTimeoutError(factor.factorType, poll);
      }
      await this.sleep(pollIntervalMs);
      current = next;
    }
  }

  private async verifySms(factor: Factor, step: AuthnStep): Promise<AuthnStep> {
    const url = requireVerifyUrl(factor);

    const challenge = toStep(
      parseAuthnResponse(
        await this.options.http.postJson(url, { stateToken: requireStateToken(step) }),
        'SMS challenge'
      )
    );
    if (challenge.status !== 'MFA_CHALLENGE') {
      throw new UnexpectedStatusError(challenge.status, { factorType: factor.factorType });
    }

    const code = (await this.options.prompter.text('SMS code')).trim();
    return toStep(
      parseAuthnResponse(
        await this.options.http.postJson(url, {
          stateToken: requireStateToken(challenge),
          passCode: code,
        }),
        'SMS verification'
      )
    );
  }

  private async verifyToken(factor: Factor, step: AuthnStep): Promise<AuthnStep> {
    const url = requireVerifyUrl(factor);
    const { totpSecret } = this.capabilities;

    let code: string;
    if (factor.kind === 'totp' && totpSecret !== undefined) {
      code = generateTotp(totpSecret, this.clock());
      logger.debug('[negotiator] Using locally generated TOTP code');
    } else {
      const label = factor.vendorName ? `${factor.provider} (${factor.vendorName})` : factor.provider;
      code = (await this.options.prompter.text(`One-time code for ${label}`)).trim();
    }

    return toStep(
      parseAuthnResponse(
        await this.options.http.postJson(url, { stateToken: requireStateToken(step), passCode: code }),
        `${factor.factorType} verification`
      )
    );
  }

  private async verifyWebauthn(oktaDomain: string, step: AuthnStep): Promise<AuthnStep> {
    const backend = this.capabilities.webauthn;
    if (!backend) {
      throw new UnsupportedFactorError('webauthn', 'no FIDO2 backend configured');
    }

    const challenge = new WebauthnChallenge({
      http: this.options.http,
      backend,
      prompter: this.options.prompter,
      interaction: this.options.interaction,
      oktaDomain,
    });
    return toStep(await challenge.verify(requireStateToken(step)));
  }

  private finish(step: AuthnStep): string {
    switch (step.status) {
      case 'SUCCESS':
        if (!step.response.sessionToken) {
          throw new ProtocolViolationError('Okta reported SUCCESS without a sessionToken');
        }
        logger.info('[negotiator] Authentication succeeded');
        return step.response.sessionToken;
      case 'LOCKED_OUT':
        throw new AccountLockedError();
      default:
        throw new UnexpectedStatusError(step.status, {
          factorResult: step.response.factorResult,
        });
    }
  }
}

function requireVerifyUrl(factor: Factor): string {
  if (!factor.verifyUrl) {
    throw new ProtocolViolationError(`Factor ${factor.factorType} has no verify link`);
  }
  return factor.verifyUrl;
}
