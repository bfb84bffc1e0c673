/**
 * rbw-lookup: template lookup adapter for credentials held by the rbw
 * Bitwarden client.
 *
 * Re-exports all public API surface from a single entry point.
 */

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export {
  type Config,
  type RbwConfig,
  type LookupConfig,
  parseConfig,
  parseConfigValue,
  DEFAULT_CONFIG,
  DEFAULT_RBW_CONFIG,
  DEFAULT_LOOKUP_CONFIG,
} from './config.js';
export { type LoadedConfig, defaultConfigPath, loadConfig } from './app/config.js';

// ---------------------------------------------------------------------------
// Credentials
// ---------------------------------------------------------------------------

export * from './credentials/index.js';

// ---------------------------------------------------------------------------
// Lookup surface
// ---------------------------------------------------------------------------

export * from './lookup/index.js';
