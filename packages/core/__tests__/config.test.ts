/**
 * Config loader tests
 *
 * Tests ${ENV:VAR} and ${file:/path} resolution, schema validation and the
 * default config location.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import path from 'path';
import os from 'os';
import { loadConfig, findConfigFile } from '../src/config/index.js';
import { ConfigurationError } from '../src/utils/errors.js';

describe('Config Loader', () => {
  let tempDir: string;
  let configPath: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'gp-okta-test-'));
    configPath = path.join(tempDir, 'config.yaml');
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should load valid configuration', async () => {
    const configYaml = `
gateway: vpn.example.com
interface: portal
username: alice
sudo: true
openconnect_args:
  - --os=linux-64
factor_priority:
  webauthn: 3
  sms: -1
push:
  poll_interval_ms: 500
`;

    await fs.writeFile(configPath, configYaml);
    const config = await loadConfig(configPath);

    expect(config.gateway).toBe('vpn.example.com');
    expect(config.interface).toBe('portal');
    expect(config.username).toBe('alice');
    expect(config.sudo).toBe(true);
    expect(config.openconnect_args).toEqual(['--os=linux-64']);
    expect(config.factor_priority).toEqual({ webauthn: 3, sms: -1 });
    expect(config.push).toEqual({ poll_interval_ms: 500, max_polls: 90 });
  });

  it('should treat an empty file as an empty configuration', async () => {
    await fs.writeFile(configPath, '');
    const config = await loadConfig(configPath);

    expect(config).toEqual({});
  });

  it('should resolve ${ENV:VAR} references', async () => {
    await fs.writeFile(configPath, 'password: ${ENV:GP_OKTA_TEST_PASSWORD}\n');
    const config = await loadConfig(configPath, {
      env: { GP_OKTA_TEST_PASSWORD: 'test-password' },
    });

    expect(config.password).toBe('test-password');
  });

  it('should fail when a referenced environment variable is missing', async () => {
    await fs.writeFile(configPath, 'password: ${ENV:GP_OKTA_MISSING}\n');

    await expect(loadConfig(configPath, { env: {} })).rejects.toThrow(
      'Environment variable GP_OKTA_MISSING not found'
    );
  });

  it('should resolve ${file:path} relative to the config directory', async () => {
    await fs.writeFile(path.join(tempDir, 'totp.txt'), 'JBSWY3DPEHPK3PXP\n', { mode: 0o600 });
    await fs.writeFile(configPath, 'totp_key: ${file:totp.txt}\n');

    const config = await loadConfig(configPath);

    expect(config.totp_key).toBe('JBSWY3DPEHPK3PXP');
  });

  it('should reject unknown keys', async () => {
    await fs.writeFile(configPath, 'gatewy: vpn.example.com\n');

    await expect(loadConfig(configPath)).rejects.toBeInstanceOf(ConfigurationError);
  });

  it('should reject invalid values with the offending path', async () => {
    await fs.writeFile(configPath, 'push:\n  max_polls: 0\n');

    await expect(loadConfig(configPath)).rejects.toThrow(/push\.max_polls/);
  });

  it('should wrap a missing file in ConfigurationError', async () => {
    await expect(loadConfig(path.join(tempDir, 'absent.yaml'))).rejects.toBeInstanceOf(
      ConfigurationError
    );
  });

  it('should find the default config under XDG_CONFIG_HOME', async () => {
    expect(findConfigFile({ XDG_CONFIG_HOME: tempDir })).toBeNull();

    await fs.mkdir(path.join(tempDir, 'gp-okta'));
    await fs.writeFile(path.join(tempDir, 'gp-okta', 'config.yaml'), 'gateway: vpn.example.com\n');

    expect(findConfigFile({ XDG_CONFIG_HOME: tempDir })).toBe(
      path.join(tempDir, 'gp-okta', 'config.yaml')
    );
  });
});
