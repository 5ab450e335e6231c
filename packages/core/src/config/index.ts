/**
 * Configuration loader with secrets resolution
 *
 * Reads the YAML config file, resolves ${ENV:VAR} and ${file:/path} references
 * and validates the result with Zod.
 */

import fs from 'fs/promises';
import { existsSync } from 'fs';
import os from 'os';
import path from 'path';
import yaml from 'yaml';
import { ZodError } from 'zod';
import { GpOktaConfigSchema, isCredentialField, type GpOktaConfig } from './schema.js';
import { logger } from '../utils/logger.js';
import { ConfigurationError, GpOktaError } from '../utils/errors.js';

export type { GpOktaConfig, PushConfig, HttpConfig } from './schema.js';
export {
  GpOktaConfigSchema,
  PushConfigDefaults,
  HttpConfigDefaults,
  CREDENTIAL_FIELDS,
  isCredentialField,
} from './schema.js';

const MAX_CONFIG_SIZE = 1024 * 1024;

/**
 * Configuration loading options
 */
export interface ConfigLoadOptions {
  /** Base directory for relative ${file:} references (default: config file directory) */
  secrets_base_dir?: string;
  /** Environment used for ${ENV:} references (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

/**
 * Load configuration from YAML file with secrets resolution
 *
 * @throws ConfigurationError if the file is unreadable, malformed or invalid
 */
export async function loadConfig(
  configPath: string,
  options: ConfigLoadOptions = {}
): Promise<GpOktaConfig> {
  const { secrets_base_dir, env = process.env } = options;

  logger.debug(`[config] Loading configuration from ${configPath}`);

  try {
    const stats = await fs.stat(configPath);
    if (stats.size > MAX_CONFIG_SIZE) {
      throw new ConfigurationError(`Config file ${configPath} exceeds 1MB size limit`);
    }

    const fileContent = await fs.readFile(configPath, 'utf-8');
    const rawConfig: unknown =
      yaml.parse(fileContent, {
        maxAliasCount: 50,
        schema: 'core',
        uniqueKeys: true,
      }) ?? {};

    const baseDir = secrets_base_dir || path.dirname(path.resolve(configPath));
    const resolvedConfig = await resolveSecrets(rawConfig, baseDir, env);

    const validatedConfig = GpOktaConfigSchema.parse(resolvedConfig);

    logger.debug('[config] Configuration loaded successfully');
    return validatedConfig;
  } catch (error) {
    if (error instanceof GpOktaError) {
      throw error;
    }
    if (error instanceof ZodError) {
      const issues = error.issues.map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
      throw new ConfigurationError(`Invalid config ${configPath}: ${issues.join('; ')}`, { issues });
    }
    if (error instanceof Error) {
      throw new ConfigurationError(`Failed to load config: ${error.message}`);
    }
    throw error;
  }
}

/**
 * Default config location: $XDG_CONFIG_HOME/gp-okta/config.yaml, falling back
 * to ~/.config/gp-okta/config.yaml. Returns null when neither exists.
 */
export function findConfigFile(env: NodeJS.ProcessEnv = process.env): string | null {
  const configHome = env.XDG_CONFIG_HOME || path.join(os.homedir(), '.config');
  const candidate = path.join(configHome, 'gp-okta', 'config.yaml');
  return existsSync(candidate) ? candidate : null;
}

/**
 * Resolve ${ENV:VAR} and ${file:/path} references in config
 */
async function resolveSecrets(
  obj: unknown,
  secretsBaseDir: string,
  env: NodeJS.ProcessEnv
): Promise<unknown> {
  if (typeof obj === 'string') {
    const envMatch = obj.match(/^\$\{ENV:([A-Z_][A-Z0-9_]*)\}$/);
    if (envMatch?.[1]) {
      const value = env[envMatch[1]];
      if (value === undefined) {
        throw new ConfigurationError(`Environment variable ${envMatch[1]} not found`);
      }
      return value;
    }

    const fileMatch = obj.match(/^\$\{file:(.+)\}$/);
    if (fileMatch?.[1]) {
      return await resolveFileReference(fileMatch[1], secretsBaseDir);
    }

    return obj;
  }

  if (Array.isArray(obj)) {
    return Promise.all(obj.map(item => resolveSecrets(item, secretsBaseDir, env)));
  }

  if (obj !== null && typeof obj === 'object') {
    const resolved: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      if (typeof value === 'string' && isCredentialField(key) && !value.startsWith('${')) {
        logger.warn(
          `[config] '${key}' contains a literal value - consider \${ENV:VAR}, \${file:/path} or ${key}_cmd`
        );
      }
      resolved[key] = await resolveSecrets(value, secretsBaseDir, env);
    }
    return resolved;
  }

  return obj;
}

/**
 * Resolve ${file:/path} reference
 *
 * Relative paths are taken from the config file directory; a leading ~ is the
 * home directory. Returns the trimmed file content.
 */
async function resolveFileReference(filePath: string, secretsBaseDir: string): Promise<string> {
  const expanded = filePath.startsWith('~/') ? path.join(os.homedir(), filePath.slice(2)) : filePath;
  const absolutePath = path.isAbsolute(expanded) ? expanded : path.resolve(secretsBaseDir, expanded);

  try {
    const stats = await fs.stat(absolutePath);

    if (stats.size > MAX_CONFIG_SIZE) {
      throw new ConfigurationError(`Secret file ${absolutePath} exceeds 1MB`);
    }

    const mode = stats.mode & 0o777;
    if (mode & 0o077) {
      logger.warn(
        `[config] Secret file ${absolutePath} has permissive permissions (${mode.toString(8)}) - should be 0600 or 0400`
      );
    }

    const content = await fs.readFile(absolutePath, 'utf-8');
    return content.trim();
  } catch (error) {
    if (error instanceof GpOktaError) {
      throw error;
    }
    if (error instanceof Error) {
      throw new ConfigurationError(`Cannot read secret file ${filePath}: ${error.message}`);
    }
    throw error;
  }
}
