import { EventEmitter } from 'events';
import { PassThrough } from 'stream';
import type { Prompter } from '@gp-okta/core';
import type { FetchLike, TransportResponse } from '../src/http/session.js';
import type { ChildLike } from '../src/process/supervisor.js';
import type { SignalSource } from '../src/process/signal-forwarder.js';

export interface ScriptedReply {
  status?: number;
  body?: string | Record<string, unknown>;
  headers?: [string, string][];
}

export interface RecordedRequest {
  url: string;
  method: string;
  headers: Record<string, string>;
  body: string | undefined;
}

/**
 * In-process stand-in for fetch(), answering from a list of replies
 */
export class ScriptedFetch {
  readonly requests: RecordedRequest[] = [];
  private readonly replies: ScriptedReply[];

  constructor(replies: ScriptedReply[]) {
    this.replies = [...replies];
  }

  readonly fetch: FetchLike = async (url, init) => {
    this.requests.push({ url, method: init.method, headers: init.headers, body: init.body });
    const reply = this.replies.shift();
    if (!reply) {
      throw new Error(`Unexpected request to ${url}`);
    }
    return toResponse(reply);
  };
}

function toResponse(reply: ScriptedReply): TransportResponse {
  const body =
    reply.body === undefined
      ? ''
      : typeof reply.body === 'string'
        ? reply.body
        : JSON.stringify(reply.body);
  return {
    status: reply.status ?? 200,
    headers: new Headers(reply.headers ?? []),
    text: async () => body,
  };
}

export class FakeSignalSource extends EventEmitter implements SignalSource {
  readonly pid = 4242;
  readonly raised: { pid: number; signal: NodeJS.Signals; listeners: number }[] = [];

  kill(pid: number, signal: NodeJS.Signals): boolean {
    this.raised.push({ pid, signal, listeners: this.listenerCount(signal) });
    return true;
  }

  send(signal: NodeJS.Signals): void {
    this.emit(signal, signal);
  }
}

export class FakeChild extends EventEmitter implements ChildLike {
  readonly pid = 999;
  readonly stdin = new PassThrough();
  readonly killed: NodeJS.Signals[] = [];
  input = '';

  constructor() {
    super();
    this.stdin.on('data', (chunk: Buffer) => {
      this.input += chunk.toString();
    });
  }

  kill(signal: NodeJS.Signals): boolean {
    this.killed.push(signal);
    return true;
  }

  exit(code: number | null, signal: NodeJS.Signals | null = null): void {
    this.emit('exit', code, signal);
  }
}

export class ScriptedPrompter implements Prompter {
  readonly asked: string[] = [];
  readonly infos: string[] = [];
  closed = false;
  private readonly answers: string[];

  constructor(answers: string[] = []) {
    this.answers = [...answers];
  }

  async text(message: string): Promise<string> {
    return this.next(message);
  }

  async secret(message: string): Promise<string> {
    return this.next(message);
  }

  async confirm(message: string): Promise<boolean> {
    return (await this.next(message)) === 'y';
  }

  info(message: string): void {
    this.infos.push(message);
  }

  close(): void {
    this.closed = true;
  }

  private next(message: string): string {
    this.asked.push(message);
    const answer = this.answers.shift();
    if (answer === undefined) {
      throw new Error(`Unexpected prompt: ${message}`);
    }
    return answer;
  }
}

export const GATEWAY = 'vpn.example.com';
export const OKTA = 'example.okta.com';
export const SAML_REQUEST_URL = `https://${OKTA}/app/gp/sso/saml?SAMLRequest=req-123&RelayState=relay`;

export const SAML_REQUEST_PAGE =
  '<html><body onload="document.forms[0].submit()">' +
  `<form method="post" action="https://${OKTA}/app/gp/sso/saml">` +
  '<input type="hidden" name="SAMLRequest" value="req-123"/>' +
  '<input type="hidden" name="RelayState" value="relay"/>' +
  '</form></body></html>';

export const SAML_RESPONSE_PAGE =
  '<html><body>' +
  `<form id="appForm" method="POST" action="https://${GATEWAY}/SAML20/SP/ACS">` +
  '<input name="SAMLResponse" type="hidden" value="resp-456"/>' +
  '<input name="RelayState" type="hidden" value="relay"/>' +
  '</form></body></html>';

export function preloginXml(samlRequestPage: string = SAML_REQUEST_PAGE): string {
  return (
    '<?xml version="1.0" encoding="UTF-8" ?>\n' +
    '<prelogin-response><status>Success</status>' +
    '<saml-auth-method>POST</saml-auth-method>' +
    `<saml-request>${Buffer.from(samlRequestPage).toString('base64')}</saml-request>` +
    '</prelogin-response>'
  );
}

export function preloginError(message: string): string {
  return (
    '<?xml version="1.0" encoding="UTF-8" ?>\n' +
    `<prelogin-response><status>Error</status><msg>${message}</msg></prelogin-response>`
  );
}
