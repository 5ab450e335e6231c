/**
 * FIDO2 backend loading
 *
 * The authenticator backend is an optional plugin: a package (or module path)
 * exporting `createFido2Backend()` or a default factory. It is loaded once at
 * startup and handed to the negotiator as a capability.
 */

import path from 'path';
import { pathToFileURL } from 'url';
import type { Fido2Backend } from '../spi/index.js';
import { logger } from '../utils/logger.js';
import { ConfigurationError, GpOktaError } from '../utils/errors.js';

export type ModuleImporter = (specifier: string) => Promise<unknown>;

const defaultImporter: ModuleImporter = specifier => import(specifier);

/**
 * Load the backend named in `webauthn.backend`
 *
 * @param specifier npm package name, or a path starting with `.` or `/`
 * @param importer Module importer (tests substitute one)
 * @throws ConfigurationError when the module cannot be loaded or has the wrong shape
 */
export async function loadFido2Backend(
  specifier: string,
  importer: ModuleImporter = defaultImporter
): Promise<Fido2Backend> {
  const target = isPathSpecifier(specifier)
    ? pathToFileURL(path.resolve(specifier)).href
    : specifier;

  logger.info(`[registry] Loading FIDO2 backend from ${specifier}`);

  let module: unknown;
  try {
    module = await importer(target);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Cannot load FIDO2 backend ${specifier}: ${reason}`);
  }

  const factory = getFactory(module);
  if (!factory) {
    throw new ConfigurationError(
      `FIDO2 backend ${specifier} does not export createFido2Backend() or a default factory`
    );
  }

  try {
    const backend: unknown = await factory();
    if (!isFido2Backend(backend)) {
      throw new ConfigurationError(`FIDO2 backend ${specifier} returned an invalid backend`);
    }
    logger.debug(`[registry] FIDO2 backend ${backend.id} ready`);
    return backend;
  } catch (error) {
    if (error instanceof GpOktaError) {
      throw error;
    }
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`FIDO2 backend ${specifier} failed to initialize: ${reason}`);
  }
}

function isPathSpecifier(specifier: string): boolean {
  return specifier.startsWith('.') || path.isAbsolute(specifier);
}

function getFactory(module: unknown): (() => unknown) | null {
  if (module === null || typeof module !== 'object') {
    return null;
  }
  const named: unknown = Reflect.get(module, 'createFido2Backend');
  if (typeof named === 'function') {
    return () => Reflect.apply(named, undefined, []);
  }
  const fallback: unknown = Reflect.get(module, 'default');
  if (typeof fallback === 'function') {
    return () => Reflect.apply(fallback, undefined, []);
  }
  return null;
}

export function isFido2Backend(value: unknown): value is Fido2Backend {
  if (value === null || typeof value !== 'object') {
    return false;
  }
  return (
    typeof Reflect.get(value, 'id') === 'string' &&
    typeof Reflect.get(value, 'listDevices') === 'function' &&
    typeof Reflect.get(value, 'getAssertion') === 'function'
  );
}
