import { vi } from 'vitest';
import type { Prompter, UserInteraction } from '@gp-okta/core';
import type { JsonPoster } from '../src/types.js';

export interface RecordedPost {
  url: string;
  body: Record<string, unknown>;
}

/**
 * JsonPoster answering from a fixed list of replies, in order
 */
export class ScriptedPoster implements JsonPoster {
  readonly calls: RecordedPost[] = [];
  private readonly replies: unknown[];

  constructor(replies: unknown[]) {
    this.replies = [...replies];
  }

  async postJson(url: string, body: Record<string, unknown>): Promise<unknown> {
    this.calls.push({ url, body });
    if (this.replies.length === 0) {
      throw new Error(`Unexpected request to ${url}`);
    }
    return this.replies.shift();
  }
}

export interface PrompterScript {
  text?: string[];
  secret?: string[];
  confirm?: boolean[];
}

export class ScriptedPrompter implements Prompter {
  readonly asked: string[] = [];
  readonly infos: string[] = [];
  private readonly script: Required<PrompterScript>;

  constructor(script: PrompterScript = {}) {
    this.script = {
      text: [...(script.text ?? [])],
      secret: [...(script.secret ?? [])],
      confirm: [...(script.confirm ?? [])],
    };
  }

  async text(message: string): Promise<string> {
    this.asked.push(message);
    return next(this.script.text, message);
  }

  async secret(message: string): Promise<string> {
    this.asked.push(message);
    return next(this.script.secret, message);
  }

  async confirm(message: string): Promise<boolean> {
    this.asked.push(message);
    return next(this.script.confirm, message);
  }

  info(message: string): void {
    this.infos.push(message);
  }
}

function next<T>(queue: T[], message: string): T {
  const value = queue.shift();
  if (value === undefined) {
    throw new Error(`Unexpected prompt: ${message}`);
  }
  return value;
}

export function makeInteraction(): UserInteraction {
  return {
    promptPresence: vi.fn(),
    requestPin: vi.fn(async () => undefined),
    requestUserVerification: vi.fn(async () => true),
  };
}

export const OKTA = 'example.okta.com';

export function makeFactor(
  factorType: string,
  overrides: Record<string, unknown> = {}
): Record<string, unknown> {
  const id = `${factorType.replace(/[^a-z]/g, '')}-id`;
  return {
    id,
    factorType,
    provider: 'OKTA',
    vendorName: 'OKTA',
    _links: {
      verify: { href: `https://${OKTA}/api/v1/authn/factors/${id}/verify` },
    },
    ...overrides,
  };
}

export function mfaRequired(factors: Record<string, unknown>[], stateToken = 'st-1') {
  return {
    status: 'MFA_REQUIRED',
    stateToken,
    _embedded: { factors },
  };
}

export function success(sessionToken = 'sess-1') {
  return { status: 'SUCCESS', sessionToken };
}
