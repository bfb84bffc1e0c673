import type { CredentialStore, RevealOptions } from './credential-store.js';
import { DEFAULT_FIELD, type Entry } from './entry.js';
import {
  FieldNotFoundError,
  ParseError,
  StoreLockedError,
  ToolExecutionError,
} from './errors.js';
import { DEFAULT_LOCKED_MARKERS, runTool, type ToolOutput } from './invoker.js';
import {
  LISTING_FIELDS,
  parseListing,
  parseRecord,
  parseSecret,
  pickField,
  unwrapParse,
} from './parser.js';

export interface RbwStoreConfig {
  /** Executable name or path. */
  cliPath: string;
  /** Case-insensitive stderr substrings that mean the vault is locked. */
  lockedMarkers: readonly string[];
}

export const DEFAULT_RBW_STORE_CONFIG: RbwStoreConfig = {
  cliPath: 'rbw',
  lockedMarkers: DEFAULT_LOCKED_MARKERS,
};

/**
 * Credential store backed by the `rbw` Bitwarden client.
 *
 * - `rbw list --fields name,folder,id` enumerates entries.
 * - `rbw get <id>` reveals the password.
 * - `rbw get --raw <id>` dumps the entry as JSON; other fields are read from
 *   it (custom fields first, then login data, then top-level keys).
 * - `rbw unlocked` exits 0 when the agent holds the vault key.
 *
 * Holds no state besides its configuration.
 */
export class RbwCredentialStore implements CredentialStore {
  private readonly config: RbwStoreConfig;

  constructor(config: Partial<RbwStoreConfig> = {}) {
    this.config = { ...DEFAULT_RBW_STORE_CONFIG, ...config };
  }

  private run(subcommand: string, args: readonly string[]): Promise<ToolOutput> {
    return runTool(this.config.cliPath, subcommand, args, {
      lockedMarkers: this.config.lockedMarkers,
    });
  }

  async listEntries(): Promise<Entry[]> {
    const { stdout } = await this.run('list', ['--fields', LISTING_FIELDS.join(',')]);
    return unwrapParse(parseListing(stdout));
  }

  async revealField(id: string, field: string = DEFAULT_FIELD, options: RevealOptions = {}): Promise<string> {
    const allowEmpty = options.allowEmpty ?? false;

    if (field === DEFAULT_FIELD) {
      const { stdout } = await this.run('get', [id]);
      return unwrapParse(parseSecret(stdout, { allowEmpty }));
    }

    const { stdout } = await this.run('get', ['--raw', id]);
    const record = unwrapParse(parseRecord(stdout));
    const pick = pickField(record, field);
    switch (pick.type) {
      case 'missing':
        throw new FieldNotFoundError(field, id);
      case 'malformed':
        throw pick.error;
      case 'found':
        if (pick.value === '' && !allowEmpty) {
          throw new ParseError(`field ${JSON.stringify(field)} of entry ${id} is empty`);
        }
        return pick.value;
    }
  }

  async isUnlocked(): Promise<boolean> {
    try {
      await this.run('unlocked', []);
      return true;
    } catch (err) {
      if (err instanceof StoreLockedError || err instanceof ToolExecutionError) {
        return false;
      }
      throw err;
    }
  }
}
