/**
 * HTTPS session shared by every request of a login
 *
 * One cookie jar for the gateway and Okta, redirects followed by hand so the
 * cookies set on intermediate hops are kept, and a timeout per request.
 */

import { constants } from 'crypto';
import { CookieJar } from 'tough-cookie';
import { Agent, fetch as undiciFetch } from 'undici';
import { ProtocolViolationError, TransportError, logger } from '@gp-okta/core';
import type { JsonPoster } from '@gp-okta/authn-okta';

export interface TransportRequest {
  method: string;
  headers: Record<string, string>;
  body?: string;
  redirect: 'manual';
  signal: AbortSignal;
}

export interface HeaderReader {
  get(name: string): string | null;
}

export interface TransportResponse {
  status: number;
  headers: HeaderReader & { getSetCookie(): string[] };
  text(): Promise<string>;
}

/**
 * The subset of fetch() the session relies on. Tests pass a scripted one.
 */
export type FetchLike = (url: string, init: TransportRequest) => Promise<TransportResponse>;

export interface HttpResult {
  /** URL of the final hop, after redirects */
  url: string;
  status: number;
  headers: HeaderReader;
  body: string;
}

export interface RequestOptions {
  query?: Record<string, string>;
  headers?: Record<string, string>;
  body?: string;
}

export interface HttpSessionOptions {
  fetch: FetchLike;
  timeoutMs?: number;
  jar?: CookieJar;
  maxRedirects?: number;
}

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

/**
 * fetch() over an undici Agent. Some gateways still need unsafe legacy TLS
 * renegotiation, which OpenSSL 3 refuses unless asked.
 */
export function createTransportFetch(options: { legacyRenegotiation: boolean }): FetchLike {
  const dispatcher = new Agent({
    connect: options.legacyRenegotiation
      ? { secureOptions: constants.SSL_OP_LEGACY_SERVER_CONNECT }
      : {},
  });

  return async (url, init) => undiciFetch(url, { ...init, dispatcher });
}

/**
 * Drop query and fragment, which carry tokens on the SAML hops
 */
export function redactUrl(url: string): string {
  try {
    const parsed = new URL(url);
    return `${parsed.origin}${parsed.pathname}`;
  } catch {
    return '<invalid url>';
  }
}

export class HttpSession implements JsonPoster {
  readonly jar: CookieJar;
  private readonly fetchImpl: FetchLike;
  private readonly timeoutMs: number;
  private readonly maxRedirects: number;

  constructor(options: HttpSessionOptions) {
    this.fetchImpl = options.fetch;
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.jar = options.jar ?? new CookieJar();
    this.maxRedirects = options.maxRedirects ?? 10;
  }

  /**
   * POST a JSON body and parse the JSON reply
   */
  async postJson(url: string, body: Record<string, unknown>): Promise<unknown> {
    const result = await this.request('POST', url, {
      headers: { 'Content-Type': 'application/json', Accept: 'application/json' },
      body: JSON.stringify(body),
    });
    try {
      const parsed: unknown = JSON.parse(result.body);
      return parsed;
    } catch {
      throw new ProtocolViolationError(`Response from ${redactUrl(result.url)} is not JSON`);
    }
  }

  async get(url: string, query?: Record<string, string>): Promise<HttpResult> {
    return this.request('GET', url, { query });
  }

  /**
   * POST fields as application/x-www-form-urlencoded
   */
  async postForm(url: string, fields: Record<string, string>): Promise<HttpResult> {
    return this.request('POST', url, {
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body: new URLSearchParams(fields).toString(),
    });
  }

  async request(method: string, url: string, options: RequestOptions = {}): Promise<HttpResult> {
    let currentUrl = withQuery(url, options.query);
    let currentMethod = method;
    let body = options.body;
    let headers = { ...options.headers };

    for (let hop = 0; ; hop++) {
      const response = await this.send(currentMethod, currentUrl, headers, body);
      await this.storeCookies(currentUrl, response);

      const location = response.headers.get('location');
      if (REDIRECT_STATUSES.has(response.status) && location) {
        if (hop >= this.maxRedirects) {
          throw new TransportError(`Too many redirects from ${redactUrl(url)}`, {
            method,
            url: redactUrl(url),
            maxRedirects: this.maxRedirects,
          });
        }

        await response.text();
        const nextUrl = new URL(location, currentUrl).href;
        if (response.status !== 307 && response.status !== 308) {
          currentMethod = 'GET';
          body = undefined;
          headers = withoutContentType(headers);
        }
        logger.debug(
          `[http] ${response.status} redirect ${redactUrl(currentUrl)} -> ${redactUrl(nextUrl)}`
        );
        currentUrl = nextUrl;
        continue;
      }

      if (response.status < 200 || response.status >= 300) {
        throw new TransportError(
          `${currentMethod} ${redactUrl(currentUrl)} failed with HTTP ${response.status}`,
          { status: response.status, method: currentMethod, url: redactUrl(currentUrl) }
        );
      }

      return {
        url: currentUrl,
        status: response.status,
        headers: response.headers,
        body: await response.text(),
      };
    }
  }

  private async send(
    method: string,
    url: string,
    headers: Record<string, string>,
    body: string | undefined
  ): Promise<TransportResponse> {
    const cookie = await this.jar.getCookieString(url);
    const requestHeaders = cookie ? { ...headers, Cookie: cookie } : headers;

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    logger.debug(`[http] ${method} ${redactUrl(url)}`);
    try {
      return await this.fetchImpl(url, {
        method,
        headers: requestHeaders,
        body,
        redirect: 'manual',
        signal: controller.signal,
      });
    } catch (error) {
      const reason = controller.signal.aborted
        ? `timed out after ${this.timeoutMs}ms`
        : error instanceof Error
          ? error.message
          : String(error);
      throw new TransportError(`${method} ${redactUrl(url)} failed: ${reason}`, {
        method,
        url: redactUrl(url),
      });
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private async storeCookies(url: string, response: TransportResponse): Promise<void> {
    for (const header of response.headers.getSetCookie()) {
      await this.jar.setCookie(header, url, { ignoreError: true });
    }
  }
}

function withQuery(url: string, query: Record<string, string> | undefined): string {
  if (!query) {
    return url;
  }
  const parsed = new URL(url);
  for (const [key, value] of Object.entries(query)) {
    parsed.searchParams.set(key, value);
  }
  return parsed.href;
}

function withoutContentType(headers: Record<string, string>): Record<string, string> {
  const rest: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() !== 'content-type') {
      rest[key] = value;
    }
  }
  return rest;
}
