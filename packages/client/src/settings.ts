/**
 * Run settings: command line merged over the config file
 *
 * Precedence is CLI > config file > defaults. openconnect pass-through
 * arguments are the CLI's followed by the config file's.
 */

import { spawn } from 'child_process';
import { parse as parseShellWords } from 'shell-quote';
import {
  ConfigurationError,
  HttpConfigDefaults,
  PushConfigDefaults,
  logger,
  type GpOktaConfig,
  type HttpConfig,
  type Prompter,
  type PushConfig,
} from '@gp-okta/core';
import type { GatewayCredential, GatewayInterface } from './saml/flow.js';

/**
 * Options as parsed by commander
 */
export interface CliOptions {
  config?: string;
  username?: string;
  password?: string;
  passwordCmd?: string;
  factorPriority?: string[];
  totpKey?: string;
  totpKeyCmd?: string;
  sudo?: boolean;
  portal?: boolean;
  openconnect?: string;
  logLevel?: string;
}

export interface Settings {
  gateway: string;
  interface: GatewayInterface;
  username: string;
  password: string;
  totpKey: string | undefined;
  sudo: boolean;
  openconnectPath: string;
  openconnectArgs: string[];
  factorPriorities: Record<string, number>;
  push: PushConfig;
  http: HttpConfig;
  webauthnBackend: string | undefined;
}

export interface CommandResult {
  code: number;
  stdout: string;
  stderr: string;
}

export type CommandRunner = (command: string, args: string[]) => Promise<CommandResult>;

export interface ResolveOptions {
  prompter: Prompter;
  runCommand?: CommandRunner;
}

/**
 * Run a command without a shell, capturing stdout and stderr
 */
export const execCommand: CommandRunner = (command, args) =>
  new Promise(resolve => {
    const proc = spawn(command, args, { stdio: ['inherit', 'pipe', 'pipe'] });

    let stdout = '';
    let stderr = '';
    proc.stdout?.on('data', (data: Buffer) => {
      stdout += data.toString();
    });
    proc.stderr?.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    proc.on('close', code => {
      resolve({ code: code ?? 1, stdout, stderr });
    });
    proc.on('error', err => {
      resolve({ code: 127, stdout, stderr: err.message });
    });
  });

/**
 * Split a command line into words; shell operators and globs are refused
 */
export function splitCommandLine(line: string, what: string): string[] {
  const words: string[] = [];
  for (const entry of parseShellWords(line)) {
    if (typeof entry !== 'string') {
      throw new ConfigurationError(`${what} must be plain words; shell operators are not supported`);
    }
    words.push(entry);
  }
  return words;
}

/**
 * First line printed by a secret command such as `pass show vpn`
 *
 * @returns undefined when the command fails or prints nothing
 */
export async function runSecretCommand(
  commandLine: string,
  label: string,
  runCommand: CommandRunner = execCommand
): Promise<string | undefined> {
  const [command, ...args] = splitCommandLine(commandLine, `${label} command`);
  if (!command) {
    throw new ConfigurationError(`${label} command is empty`);
  }

  const result = await runCommand(command, args);
  const lines = result.stdout.split(/\r?\n/).filter(line => line !== '');
  if (result.code !== 0 || lines.length === 0) {
    logger.error(
      { stderr: result.stderr.trim() },
      `[config] ${label} command failed with return status ${result.code}`
    );
    return undefined;
  }
  if (lines.length > 1) {
    logger.warn(`[config] ${label} command produced more than one line of output, using the first one`);
  }
  return lines[0];
}

/**
 * Parse `type=priority`
 */
export function parseFactorPriority(value: string): [string, number] {
  const match = value.match(/^([^=\s]+)=(-?\d+)$/);
  if (!match?.[1] || !match[2]) {
    throw new ConfigurationError(
      `Invalid factor priority "${value}", expected <factorType>=<integer>`
    );
  }
  return [match[1], Number.parseInt(match[2], 10)];
}

async function resolveSecret(
  cliValue: string | undefined,
  cliCommand: string | undefined,
  configValue: string | undefined,
  configCommand: string | undefined,
  label: string,
  runCommand: CommandRunner
): Promise<string | undefined> {
  if (cliCommand !== undefined) {
    return runSecretCommand(cliCommand, label, runCommand);
  }
  if (cliValue !== undefined) {
    return cliValue;
  }
  if (configCommand !== undefined) {
    return runSecretCommand(configCommand, label, runCommand);
  }
  return configValue;
}

export async function resolveSettings(
  gatewayArg: string | undefined,
  passthroughArgs: readonly string[],
  cli: CliOptions,
  config: GpOktaConfig,
  options: ResolveOptions
): Promise<Settings> {
  const runCommand = options.runCommand ?? execCommand;

  const gateway = gatewayArg ?? config.gateway;
  if (!gateway) {
    throw new ConfigurationError('No gateway provided');
  }

  const configArgs =
    typeof config.openconnect_args === 'string'
      ? splitCommandLine(config.openconnect_args, 'openconnect_args')
      : (config.openconnect_args ?? []);

  const factorPriorities: Record<string, number> = { ...config.factor_priority };
  for (const entry of cli.factorPriority ?? []) {
    const [factorType, priority] = parseFactorPriority(entry);
    factorPriorities[factorType] = priority;
  }

  const totpKey = await resolveSecret(
    cli.totpKey,
    cli.totpKeyCmd,
    config.totp_key,
    config.totp_key_cmd,
    'TOTP',
    runCommand
  );

  const username =
    cli.username ?? config.username ?? (await options.prompter.text('Username')).trim();

  const password =
    (await resolveSecret(
      cli.password,
      cli.passwordCmd,
      config.password,
      config.password_cmd,
      'Password',
      runCommand
    )) ?? (await options.prompter.secret('Password'));

  return {
    gateway,
    interface: cli.portal ? 'portal' : (config.interface ?? 'gateway'),
    username,
    password,
    totpKey,
    sudo: cli.sudo ?? config.sudo ?? false,
    openconnectPath: cli.openconnect ?? config.openconnect_path ?? 'openconnect',
    openconnectArgs: [...passthroughArgs, ...configArgs],
    factorPriorities,
    push: config.push ?? PushConfigDefaults,
    http: config.http ?? HttpConfigDefaults,
    webauthnBackend: config.webauthn?.backend,
  };
}

/**
 * openconnect argv, prefixed with sudo when asked
 */
export function buildOpenconnectCommand(
  settings: Pick<Settings, 'gateway' | 'interface' | 'sudo' | 'openconnectPath' | 'openconnectArgs'>,
  credential: Pick<GatewayCredential, 'username'>
): { command: string; args: string[] } {
  const argv = [
    settings.openconnectPath,
    settings.gateway,
    '--protocol=gp',
    `--user=${credential.username}`,
    `--usergroup=${settings.interface}:prelogin-cookie`,
    '--passwd-on-stdin',
    ...settings.openconnectArgs,
  ];

  return settings.sudo
    ? { command: 'sudo', args: argv }
    : { command: settings.openconnectPath, args: argv.slice(1) };
}
