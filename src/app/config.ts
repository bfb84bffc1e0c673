/**
 * CLI-specific config loading utilities.
 *
 * Wraps the library-level config parsing (`../config.js`) with file-system
 * awareness: locating the config file, reading TOML, and producing the JSON
 * output shape expected by the `config` command.
 */

import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';

import { type Config, parseConfig, DEFAULT_CONFIG } from '../config.js';

export const CONFIG_FILE_NAME = 'rbw-lookup.toml';

// ---------------------------------------------------------------------------
// Default config path discovery
// ---------------------------------------------------------------------------

/**
 * Determine the default configuration file path.
 *
 * Resolution order:
 * 1. `./rbw-lookup.toml` if it exists in the current working directory.
 * 2. `$XDG_CONFIG_HOME/rbw-lookup/rbw-lookup.toml` (or
 *    `~/.config/rbw-lookup/rbw-lookup.toml` when `XDG_CONFIG_HOME` is not
 *    set), whether or not it exists.
 */
export function defaultConfigPath(): string {
  const localConfig = path.resolve(CONFIG_FILE_NAME);
  if (fs.existsSync(localConfig)) {
    return localConfig;
  }

  const xdgConfigHome = process.env.XDG_CONFIG_HOME || path.join(os.homedir(), '.config');
  return path.join(xdgConfigHome, 'rbw-lookup', CONFIG_FILE_NAME);
}

// ---------------------------------------------------------------------------
// Config loading
// ---------------------------------------------------------------------------

export interface LoadedConfig {
  configPath: string;
  /** Whether `configPath` existed and was read. */
  found: boolean;
  config: Config;
}

/**
 * Load the rbw-lookup configuration.
 *
 * @param configPath - Explicit path to a TOML config file. When omitted the
 *   result of {@link defaultConfigPath} is used.
 * @returns The path that was used, whether it existed, and the parsed config
 *   (defaults when the file is absent).
 */
export async function loadConfig(configPath?: string): Promise<LoadedConfig> {
  const resolvedPath = configPath ? path.resolve(configPath) : defaultConfigPath();

  if (!fs.existsSync(resolvedPath)) {
    return { configPath: resolvedPath, found: false, config: structuredClone(DEFAULT_CONFIG) };
  }

  const tomlStr = await fs.promises.readFile(resolvedPath, 'utf-8');
  return { configPath: resolvedPath, found: true, config: parseConfig(tomlStr) };
}

// ---------------------------------------------------------------------------
// Config output (for the `config` CLI command)
// ---------------------------------------------------------------------------

export interface ConfigOutput {
  config_file: string;
  config_found: boolean;
  rbw: Config['rbw'];
  lookup: Config['lookup'];
}

export function configOutput(loaded: LoadedConfig): ConfigOutput {
  return {
    config_file: loaded.configPath,
    config_found: loaded.found,
    rbw: loaded.config.rbw,
    lookup: loaded.config.lookup,
  };
}
