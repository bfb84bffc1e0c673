/**
 * Configuration module for rbw-lookup.
 *
 * Parses TOML configuration and provides defaults. Invalid values fall back to
 * the default, except an empty `locked_markers` list, which is rejected.
 */

import toml from 'toml';

// ---------------------------------------------------------------------------
// Interfaces
// ---------------------------------------------------------------------------

export interface RbwConfig {
  /** Executable name or path of the rbw client. */
  cli_path: string;
  /** Case-insensitive stderr substrings that mean the vault is locked. */
  locked_markers: string[];
}

export interface LookupConfig {
  /** Whether to run `rbw unlocked` before each lookup call. */
  check_unlocked: boolean;
}

export interface Config {
  rbw: RbwConfig;
  lookup: LookupConfig;
}

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

export const DEFAULT_RBW_CONFIG: RbwConfig = {
  cli_path: 'rbw',
  locked_markers: ['locked'],
};

export const DEFAULT_LOOKUP_CONFIG: LookupConfig = {
  check_unlocked: true,
};

export const DEFAULT_CONFIG: Config = {
  rbw: { ...DEFAULT_RBW_CONFIG, locked_markers: [...DEFAULT_RBW_CONFIG.locked_markers] },
  lookup: { ...DEFAULT_LOOKUP_CONFIG },
};

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

function isTable(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function table(value: unknown): Record<string, unknown> {
  return isTable(value) ? value : {};
}

/**
 * Parse a TOML configuration string into a `Config`.
 *
 * ```toml
 * [rbw]
 * cli_path = "/usr/local/bin/rbw"
 * locked_markers = ["locked", "agent not running"]
 *
 * [lookup]
 * check_unlocked = false
 * ```
 *
 * @throws Error if the TOML is invalid or `locked_markers` is empty.
 */
export function parseConfig(tomlStr: string): Config {
  // toml.parse throws on invalid TOML; an empty string yields an empty object.
  const raw = tomlStr.trim().length === 0 ? {} : table(toml.parse(tomlStr));
  return parseConfigValue(raw);
}

/** Build a `Config` from an already-parsed table. */
export function parseConfigValue(input: unknown): Config {
  const raw = table(input);
  const rbwRaw = table(raw.rbw);
  const lookupRaw = table(raw.lookup);

  const rbw: RbwConfig = {
    cli_path:
      typeof rbwRaw.cli_path === 'string' && rbwRaw.cli_path.trim() !== ''
        ? rbwRaw.cli_path
        : DEFAULT_RBW_CONFIG.cli_path,
    locked_markers: [...DEFAULT_RBW_CONFIG.locked_markers],
  };
  if (Array.isArray(rbwRaw.locked_markers)) {
    const markers = rbwRaw.locked_markers.filter(
      (v): v is string => typeof v === 'string' && v.trim() !== '',
    );
    if (markers.length === 0) {
      throw new Error('"rbw.locked_markers" must contain at least one non-empty string');
    }
    rbw.locked_markers = markers;
  }

  const lookup: LookupConfig = {
    check_unlocked:
      typeof lookupRaw.check_unlocked === 'boolean'
        ? lookupRaw.check_unlocked
        : DEFAULT_LOOKUP_CONFIG.check_unlocked,
  };

  return { rbw, lookup };
}
