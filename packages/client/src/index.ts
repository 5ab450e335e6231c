/**
 * @gp-okta/client
 *
 * HTTP session, SAML flow, openconnect supervision and the gp-okta CLI.
 */

export {
  HttpSession,
  createTransportFetch,
  redactUrl,
  type FetchLike,
  type HttpResult,
  type HttpSessionOptions,
  type RequestOptions,
  type TransportRequest,
  type TransportResponse,
} from './http/session.js';
export {
  extractForm,
  extractPreloginRequest,
  requireField,
  type PreloginResponse,
  type SamlForm,
} from './saml/form-extractor.js';
export {
  SamlFlowController,
  type GatewayCredential,
  type GatewayInterface,
  type OktaAuthenticator,
  type SamlFlowOptions,
} from './saml/flow.js';
export {
  SignalForwarder,
  DEFAULT_FORWARDED_SIGNALS,
  exitStatus,
  withSignalForwarding,
  type SignalSource,
  type SignalTarget,
} from './process/signal-forwarder.js';
export { supervise, type ChildLike, type SpawnFn, type SuperviseOptions } from './process/supervisor.js';
export { TerminalPrompter, ConsoleInteraction } from './prompts/terminal.js';
export {
  resolveSettings,
  runSecretCommand,
  splitCommandLine,
  parseFactorPriority,
  buildOpenconnectCommand,
  execCommand,
  type CliOptions,
  type CommandResult,
  type CommandRunner,
  type Settings,
} from './settings.js';
export { main, createProgram, type CliDependencies } from './cli.js';
