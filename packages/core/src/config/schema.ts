/**
 * Configuration schema (Zod)
 *
 * Validates the gp-okta YAML file. Keys are snake_case; unknown keys are
 * rejected so typos surface at startup.
 */

import { z } from 'zod';

// ===== Push polling =====

const PushConfigSchema = z
  .object({
    poll_interval_ms: z.number().int().min(100).max(60000).default(2000),
    max_polls: z.number().int().min(1).max(10000).default(90),
  })
  .strict();

// ===== HTTP transport =====

const HttpConfigSchema = z
  .object({
    timeout_ms: z.number().int().min(1000).max(600000).default(30000),
    /** Allow TLS renegotiation with gateways that lack RFC 5746 support */
    legacy_renegotiation: z.boolean().default(true),
  })
  .strict();

// ===== Hardware keys =====

const WebauthnConfigSchema = z
  .object({
    /** Package name or module path exporting createFido2Backend() */
    backend: z.string().min(1).optional(),
  })
  .strict();

// ===== Root Configuration Schema =====

export const GpOktaConfigSchema = z
  .object({
    gateway: z.string().min(1).optional(),
    interface: z.enum(['gateway', 'portal']).optional(),
    username: z.string().min(1).optional(),
    password: z.string().optional(),
    password_cmd: z.string().min(1).optional(),
    totp_key: z.string().min(1).optional(),
    totp_key_cmd: z.string().min(1).optional(),
    sudo: z.boolean().optional(),
    openconnect_path: z.string().min(1).optional(),
    openconnect_args: z.union([z.array(z.string()), z.string()]).optional(),
    factor_priority: z.record(z.number().int()).optional(),
    push: PushConfigSchema.optional(),
    http: HttpConfigSchema.optional(),
    webauthn: WebauthnConfigSchema.optional(),
  })
  .strict();

export type GpOktaConfig = z.infer<typeof GpOktaConfigSchema>;
export type PushConfig = z.infer<typeof PushConfigSchema>;
export type HttpConfig = z.infer<typeof HttpConfigSchema>;

export const PushConfigDefaults: PushConfig = PushConfigSchema.parse({});
export const HttpConfigDefaults: HttpConfig = HttpConfigSchema.parse({});

// ===== Credential fields =====

/** Keys whose literal values are secrets and should come from ${ENV:} or ${file:} */
export const CREDENTIAL_FIELDS = ['password', 'totp_key'] as const;

const credentialFields: ReadonlySet<string> = new Set(CREDENTIAL_FIELDS);

export function isCredentialField(key: string): boolean {
  return credentialFields.has(key);
}
