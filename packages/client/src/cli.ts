/**
 * gp-okta command line
 *
 * Usage:
 *   gp-okta [options] [gateway] [openconnect-args...]
 *
 * Everything after the gateway is passed to openconnect untouched.
 */

import { Command, CommanderError } from 'commander';
import {
  ConfigurationError,
  GpOktaError,
  findConfigFile as defaultFindConfigFile,
  isLogLevel,
  loadConfig as defaultLoadConfig,
  loadFido2Backend,
  logger,
  setLogLevel,
  type Fido2Backend,
  type GpOktaConfig,
  type Prompter,
} from '@gp-okta/core';
import { FactorNegotiator, base32Decode } from '@gp-okta/authn-okta';
import { HttpSession, createTransportFetch, type FetchLike } from './http/session.js';
import { supervise as defaultSupervise, type SuperviseOptions } from './process/supervisor.js';
import { ConsoleInteraction, TerminalPrompter } from './prompts/terminal.js';
import { SamlFlowController, type GatewayCredential } from './saml/flow.js';
import {
  buildOpenconnectCommand,
  resolveSettings,
  type CliOptions,
  type CommandRunner,
  type Settings,
} from './settings.js';

export interface CliDependencies {
  prompter?: Prompter;
  fetch?: FetchLike;
  runCommand?: CommandRunner;
  supervise?: (options: SuperviseOptions) => Promise<number>;
  loadConfig?: (path: string) => Promise<GpOktaConfig>;
  findConfigFile?: () => string | null;
  loadBackend?: (specifier: string) => Promise<Fido2Backend>;
  stderr?: { write(message: string): unknown };
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export function createProgram(): Command {
  return new Command()
    .name('gp-okta')
    .description('Log in to a GlobalProtect gateway through Okta SAML and start openconnect')
    .argument('[gateway]', 'GlobalProtect gateway host')
    .argument('[openconnect-args...]', 'arguments passed through to openconnect')
    .option('--config <path>', 'YAML config file (default: $XDG_CONFIG_HOME/gp-okta/config.yaml)')
    .option('--username <username>', 'Okta username')
    .option('--password <password>', 'Okta password')
    .option('--password-cmd <command>', 'command printing the Okta password')
    .option(
      '--factor-priority <type=priority>',
      'priority of an MFA factor type, highest first (repeatable)',
      collect,
      []
    )
    .option('--totp-key <key>', 'base32 secret for token:software:totp')
    .option('--totp-key-cmd <command>', 'command printing the TOTP secret')
    .option('--sudo', 'run openconnect through sudo')
    .option('--no-sudo', 'run openconnect directly')
    .option('--portal', 'use the portal prelogin endpoint instead of the gateway one')
    .option('--openconnect <path>', 'openconnect executable')
    .option('--log-level <level>', 'trace|debug|info|warn|error|fatal|silent')
    .passThroughOptions()
    .exitOverride();
}

async function connect(
  gatewayArg: string | undefined,
  passthroughArgs: string[],
  cli: CliOptions,
  deps: CliDependencies
): Promise<number> {
  if (cli.logLevel !== undefined) {
    if (!isLogLevel(cli.logLevel)) {
      throw new ConfigurationError(`Unknown log level: ${cli.logLevel}`);
    }
    setLogLevel(cli.logLevel);
  }

  const configPath = cli.config ?? (deps.findConfigFile ?? defaultFindConfigFile)();
  const config: GpOktaConfig = configPath
    ? await (deps.loadConfig ?? defaultLoadConfig)(configPath)
    : {};
  if (configPath) {
    logger.info(`[config] Using ${configPath}`);
  }

  const prompter = deps.prompter ?? new TerminalPrompter();
  let settings: Settings;
  let credential: GatewayCredential;
  try {
    settings = await resolveSettings(gatewayArg, passthroughArgs, cli, config, {
      prompter,
      runCommand: deps.runCommand,
    });
    if (settings.totpKey !== undefined) {
      base32Decode(settings.totpKey);
    }
    credential = await login(settings, prompter, deps);
  } finally {
    prompter.close?.();
  }

  const { command, args } = buildOpenconnectCommand(settings, credential);
  return (deps.supervise ?? defaultSupervise)({
    command,
    args,
    writeInput: stdin => {
      stdin.write(credential.preloginCookie);
    },
  });
}

async function login(
  settings: Settings,
  prompter: Prompter,
  deps: CliDependencies
): Promise<GatewayCredential> {
  const webauthn = settings.webauthnBackend
    ? await (deps.loadBackend ?? loadFido2Backend)(settings.webauthnBackend)
    : undefined;

  const http = new HttpSession({
    fetch:
      deps.fetch ??
      createTransportFetch({ legacyRenegotiation: settings.http.legacy_renegotiation }),
    timeoutMs: settings.http.timeout_ms,
  });

  const negotiator = new FactorNegotiator({
    http,
    prompter,
    interaction: new ConsoleInteraction(prompter),
    capabilities: { totpSecret: settings.totpKey, webauthn },
    priorities: settings.factorPriorities,
    push: {
      pollIntervalMs: settings.push.poll_interval_ms,
      maxPolls: settings.push.max_polls,
    },
  });

  const flow = new SamlFlowController({
    http,
    authenticator: negotiator,
    interface: settings.interface,
  });
  return flow.login(settings.gateway, settings.username, settings.password);
}

/**
 * Parse `argv` (as in process.argv), log in and run openconnect
 *
 * @returns the process exit status
 */
export async function main(argv: string[], deps: CliDependencies = {}): Promise<number> {
  const program = createProgram();
  const stderr = deps.stderr ?? process.stderr;
  let exitCode = 0;

  program.action(async (gateway: string | undefined, passthrough: string[], options: CliOptions) => {
    exitCode = await connect(gateway, passthrough, options, deps);
  });

  try {
    await program.parseAsync(argv);
    return exitCode;
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    if (error instanceof GpOktaError) {
      logger.error({ code: error.code, details: error.details }, error.message);
      stderr.write(`gp-okta: ${error.message}\n`);
      return error.exitCode;
    }
    logger.error({ err: error }, 'Unexpected failure');
    stderr.write(`gp-okta: ${error instanceof Error ? error.message : String(error)}\n`);
    return 1;
  }
}
