/**
 * Okta authn API response shapes
 *
 * Only the fields the negotiator reads are declared; everything else passes
 * through untouched.
 */

import { z } from 'zod';
import { ProtocolViolationError } from '@gp-okta/core';

const LinkSchema = z.object({ href: z.string() }).passthrough();

export const OktaFactorSchema = z
  .object({
    id: z.string().optional(),
    factorType: z.string(),
    provider: z.string().default('OKTA'),
    vendorName: z.string().optional(),
    profile: z.object({ credentialId: z.string().optional() }).passthrough().optional(),
    _links: z.object({ verify: LinkSchema.optional() }).passthrough().optional(),
  })
  .passthrough();

const PushChallengeSchema = z
  .object({ correctAnswer: z.union([z.number(), z.string()]).optional() })
  .passthrough();

export const AuthnResponseSchema = z
  .object({
    status: z.string(),
    stateToken: z.string().optional(),
    sessionToken: z.string().optional(),
    factorResult: z.string().optional(),
    _embedded: z
      .object({
        factors: z.array(OktaFactorSchema).optional(),
        factor: z
          .object({
            _embedded: z.object({ challenge: PushChallengeSchema.optional() }).passthrough().optional(),
          })
          .passthrough()
          .optional(),
        challenge: z.object({ challenge: z.string() }).passthrough().optional(),
      })
      .passthrough()
      .optional(),
    _links: z.object({ next: LinkSchema.optional() }).passthrough().optional(),
  })
  .passthrough();

export type OktaFactor = z.infer<typeof OktaFactorSchema>;
export type AuthnResponse = z.infer<typeof AuthnResponseSchema>;

/**
 * Validate a JSON body from the authn API
 *
 * @param context Short label for the request, used in the error message
 */
export function parseAuthnResponse(body: unknown, context: string): AuthnResponse {
  const result = AuthnResponseSchema.safeParse(body);
  if (!result.success) {
    throw new ProtocolViolationError(`Malformed Okta response to ${context}`, {
      issues: result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
    });
  }
  return result.data;
}

/**
 * One step of a login attempt. Every request produces a new step; steps are
 * never mutated.
 */
export interface AuthnStep {
  readonly status: string;
  readonly stateToken: string | undefined;
  readonly response: AuthnResponse;
}

export function toStep(response: AuthnResponse): AuthnStep {
  return Object.freeze({
    status: response.status,
    stateToken: response.stateToken,
    response,
  });
}

export function requireStateToken(step: AuthnStep): string {
  if (!step.stateToken) {
    throw new ProtocolViolationError(`Okta response with status ${step.status} has no stateToken`);
  }
  return step.stateToken;
}

/**
 * Minimal HTTP capability the negotiator needs. HttpSession in
 * @gp-okta/client implements it.
 */
export interface JsonPoster {
  postJson(url: string, body: Record<string, unknown>): Promise<unknown>;
}
