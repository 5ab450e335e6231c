/**
 * GlobalProtect SAML login
 *
 * prelogin.esp → Okta (SAMLRequest) → authn + MFA → sessionCookieRedirect
 * (SAMLResponse) → gateway ACS, whose reply headers carry the credential
 * openconnect needs.
 */

import { ProtocolViolationError, logger } from '@gp-okta/core';
import type { HttpSession } from '../http/session.js';
import { extractForm, extractPreloginRequest, requireField, type SamlForm } from './form-extractor.js';

export type GatewayInterface = 'gateway' | 'portal';

export interface GatewayCredential {
  /** Value of the saml-username header */
  username: string;
  /** Value of the prelogin-cookie header, written to openconnect's stdin */
  preloginCookie: string;
}

/**
 * Anything that turns Okta credentials into a session token.
 * FactorNegotiator is the implementation.
 */
export interface OktaAuthenticator {
  authenticate(oktaDomain: string, username: string, password: string): Promise<string>;
}

export interface SamlFlowOptions {
  http: HttpSession;
  authenticator: OktaAuthenticator;
  interface?: GatewayInterface;
}

const PRELOGIN_PATHS: Record<GatewayInterface, string> = {
  gateway: '/ssl-vpn/prelogin.esp',
  portal: '/global-protect/prelogin.esp',
};

export class SamlFlowController {
  private readonly http: HttpSession;
  private readonly authenticator: OktaAuthenticator;
  readonly interface: GatewayInterface;

  constructor(options: SamlFlowOptions) {
    this.http = options.http;
    this.authenticator = options.authenticator;
    this.interface = options.interface ?? 'gateway';
  }

  async login(gateway: string, username: string, password: string): Promise<GatewayCredential> {
    const samlRequestUrl = await this.prelogin(gateway);
    const oktaDomain = new URL(samlRequestUrl).host;

    // Only sets Okta's device-tracking cookie; the page itself is not used
    await this.http.get(samlRequestUrl);

    const sessionToken = await this.authenticator.authenticate(oktaDomain, username, password);
    const samlResponse = await this.exchangeSessionToken(oktaDomain, sessionToken, samlRequestUrl);
    return this.submitResponse(samlResponse);
  }

  /**
   * @returns URL of the Okta SAML endpoint, SAMLRequest included in the query
   */
  async prelogin(gateway: string): Promise<string> {
    const url = `https://${gateway}${PRELOGIN_PATHS[this.interface]}`;
    logger.info(`[saml] Prelogin at ${url}`);

    const result = await this.http.request('POST', url);
    const prelogin = extractPreloginRequest(result.body);
    const form = extractForm(prelogin.samlRequestHtml, result.url);
    requireField(form, 'SAMLRequest', 'SAML request');

    const target = new URL(form.action);
    for (const [name, value] of Object.entries(form.fields)) {
      target.searchParams.append(name, value);
    }
    logger.debug(`[saml] SAML request goes to ${target.origin}${target.pathname}`);
    return target.href;
  }

  private async exchangeSessionToken(
    oktaDomain: string,
    sessionToken: string,
    samlRequestUrl: string
  ): Promise<SamlForm> {
    const result = await this.http.get(`https://${oktaDomain}/login/sessionCookieRedirect`, {
      token: sessionToken,
      redirectUrl: samlRequestUrl,
    });
    const form = extractForm(result.body, result.url);
    requireField(form, 'SAMLResponse', 'SAML response');
    return form;
  }

  private async submitResponse(form: SamlForm): Promise<GatewayCredential> {
    logger.info('[saml] Submitting SAML response to the gateway');
    const result = await this.http.postForm(form.action, form.fields);

    const username = result.headers.get('saml-username');
    const preloginCookie = result.headers.get('prelogin-cookie');
    if (!username || !preloginCookie) {
      throw new ProtocolViolationError(
        'Gateway reply lacks the saml-username or prelogin-cookie header',
        { hasUsername: Boolean(username), hasPreloginCookie: Boolean(preloginCookie) }
      );
    }

    logger.info(`[saml] Gateway accepted SAML login for ${username}`);
    return { username, preloginCookie };
  }
}
