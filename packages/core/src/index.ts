/**
 * @gp-okta/core
 *
 * Core package exports: capability interfaces, config loader, FIDO2 backend
 * loading, errors and logger.
 */

// Capability interfaces
export * from './spi/index.js';

// Configuration loader with secrets resolution
export * from './config/index.js';

// FIDO2 backend loading
export * from './providers/registry.js';

// Utilities
export * from './utils/errors.js';
export * from './utils/logger.js';
