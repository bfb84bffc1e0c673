import { describe, expect, it } from 'vitest';
import {
  DEFAULT_CONFIG,
  DEFAULT_LOOKUP_CONFIG,
  DEFAULT_RBW_CONFIG,
  parseConfig,
  parseConfigValue,
} from './config.js';

describe('default constants', () => {
  it('uses rbw from PATH', () => {
    expect(DEFAULT_RBW_CONFIG.cli_path).toBe('rbw');
  });

  it('recognises "locked" on stderr', () => {
    expect(DEFAULT_RBW_CONFIG.locked_markers).toEqual(['locked']);
  });

  it('checks the lock state before lookups', () => {
    expect(DEFAULT_LOOKUP_CONFIG.check_unlocked).toBe(true);
  });

  it('combines the section defaults', () => {
    expect(DEFAULT_CONFIG).toEqual({ rbw: DEFAULT_RBW_CONFIG, lookup: DEFAULT_LOOKUP_CONFIG });
  });
});

describe('parseConfig', () => {
  it('returns defaults for empty string', () => {
    expect(parseConfig('')).toEqual(DEFAULT_CONFIG);
    expect(parseConfig('   \n')).toEqual(DEFAULT_CONFIG);
  });

  it('parses the rbw section', () => {
    const toml = `
[rbw]
cli_path = "/opt/rbw/bin/rbw"
locked_markers = ["locked", "agent not running"]
`;
    const config = parseConfig(toml);
    expect(config.rbw).toEqual({
      cli_path: '/opt/rbw/bin/rbw',
      locked_markers: ['locked', 'agent not running'],
    });
    expect(config.lookup).toEqual(DEFAULT_LOOKUP_CONFIG);
  });

  it('parses the lookup section', () => {
    const config = parseConfig('[lookup]\ncheck_unlocked = false\n');
    expect(config.lookup.check_unlocked).toBe(false);
    expect(config.rbw).toEqual(DEFAULT_RBW_CONFIG);
  });

  it('falls back to defaults for values of the wrong type', () => {
    const toml = `
[rbw]
cli_path = 42

[lookup]
check_unlocked = "no"
`;
    expect(parseConfig(toml)).toEqual(DEFAULT_CONFIG);
  });

  it('falls back to the default for a blank cli_path', () => {
    expect(parseConfig('[rbw]\ncli_path = "  "\n').rbw.cli_path).toBe('rbw');
  });

  it('drops blank and non-string locked markers', () => {
    const config = parseConfig('[rbw]\nlocked_markers = ["", "sealed", "  "]\n');
    expect(config.rbw.locked_markers).toEqual(['sealed']);
  });

  it('rejects an empty locked_markers list', () => {
    expect(() => parseConfig('[rbw]\nlocked_markers = []\n')).toThrow(
      '"rbw.locked_markers" must contain at least one non-empty string',
    );
  });

  it('throws on invalid TOML', () => {
    expect(() => parseConfig('[rbw\ncli_path = ')).toThrow();
  });

  it('does not share the default markers array', () => {
    const config = parseConfig('');
    config.rbw.locked_markers.push('extra');
    expect(DEFAULT_RBW_CONFIG.locked_markers).toEqual(['locked']);
  });
});

describe('parseConfigValue', () => {
  it('treats a non-table input as empty', () => {
    expect(parseConfigValue(null)).toEqual(DEFAULT_CONFIG);
    expect(parseConfigValue(['rbw'])).toEqual(DEFAULT_CONFIG);
  });

  it('reads an already-parsed table', () => {
    expect(parseConfigValue({ rbw: { cli_path: 'rbw-dev' } }).rbw.cli_path).toBe('rbw-dev');
  });
});
