/**
 * Custom error classes
 *
 * All gp-okta errors extend GpOktaError. The CLI maps `exitCode` to the
 * process exit status; everything else defaults to 1.
 */

export class GpOktaError extends Error {
  constructor(
    message: string,
    public code: string,
    public exitCode: number = 1,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'GpOktaError';
  }
}

export class TransportError extends GpOktaError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'transport_error', 1, details);
    this.name = 'TransportError';
  }
}

export class ProtocolViolationError extends GpOktaError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'protocol_violation', 1, details);
    this.name = 'ProtocolViolationError';
  }
}

export class UnsupportedFactorError extends GpOktaError {
  constructor(factorType: string, reason?: string) {
    super(
      reason ? `Factor ${factorType} is not supported: ${reason}` : `Factor ${factorType} is not supported`,
      'unsupported_factor',
      1,
      { factorType }
    );
    this.name = 'UnsupportedFactorError';
  }
}

export class NoSupportedFactorError extends GpOktaError {
  constructor(offered: string[]) {
    super('No supported authentication factors', 'no_supported_factor', 1, { offered });
    this.name = 'NoSupportedFactorError';
  }
}

export class AccountLockedError extends GpOktaError {
  constructor() {
    super('Locked out of Okta', 'account_locked', 1);
    this.name = 'AccountLockedError';
  }
}

export class UnexpectedStatusError extends GpOktaError {
  constructor(status: string, details?: Record<string, unknown>) {
    super(`Unexpected authentication status: ${status}`, 'unexpected_status', 1, {
      status,
      ...details,
    });
    this.name = 'UnexpectedStatusError';
  }
}

export class DeviceUnavailableError extends GpOktaError {
  constructor(message = 'No usable hardware authenticator') {
    super(message, 'device_unavailable', 1);
    this.name = 'DeviceUnavailableError';
  }
}

export class UserCancelledError extends GpOktaError {
  constructor(message = 'Cancelled by user') {
    super(message, 'user_cancelled', 130);
    this.name = 'UserCancelledError';
  }
}

export class MfaTimeoutError extends GpOktaError {
  constructor(factorType: string, polls: number) {
    super(`Gave up waiting for ${factorType} verification after ${polls} polls`, 'mfa_timeout', 1, {
      factorType,
      polls,
    });
    this.name = 'MfaTimeoutError';
  }
}

export class ConfigurationError extends GpOktaError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'configuration_error', 2, details);
    this.name = 'ConfigurationError';
  }
}

export class SpawnError extends GpOktaError {
  constructor(command: string, cause: string) {
    super(`Failed to launch ${command}: ${cause}`, 'spawn_failed', 127, { command });
    this.name = 'SpawnError';
  }
}
