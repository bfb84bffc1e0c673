import type { CredentialStore, RevealOptions } from './credential-store.js';
import { DEFAULT_FIELD, type Entry, makeEntry } from './entry.js';
import { CredentialError, FieldNotFoundError, ParseError } from './errors.js';

/**
 * In-memory credential store.
 *
 * Entries keep insertion order, like a listing. Field values are keyed by
 * entry id, then field name.
 */
export class MemoryCredentialStore implements CredentialStore {
  private readonly entries: Entry[] = [];
  private readonly values = new Map<string, Map<string, string>>();
  private locked = false;

  /** Add an entry with its field values (e.g. `{ password: 'x', username: 'y' }`). */
  add(name: string, folder: string | undefined, id: string, fields: Record<string, string> = {}): this {
    this.entries.push(makeEntry(name, folder, id));
    this.values.set(id, new Map(Object.entries(fields)));
    return this;
  }

  setLocked(locked: boolean): this {
    this.locked = locked;
    return this;
  }

  async listEntries(): Promise<Entry[]> {
    return [...this.entries];
  }

  async revealField(id: string, field: string = DEFAULT_FIELD, options: RevealOptions = {}): Promise<string> {
    const fields = this.values.get(id);
    if (fields === undefined) {
      throw new CredentialError(`No entry with id ${id}`);
    }
    const value = fields.get(field);
    if (value === undefined) {
      throw new FieldNotFoundError(field, id);
    }
    if (value === '' && !options.allowEmpty) {
      throw new ParseError(`field ${JSON.stringify(field)} of entry ${id} is empty`);
    }
    return value;
  }

  async isUnlocked(): Promise<boolean> {
    return !this.locked;
  }
}
