/**
 * CredentialStore abstraction.
 *
 * Enumerates entry metadata and reveals one field of one entry at a time.
 * Implementations may be backed by `rbw`, an in-memory table, etc.
 */
import type { Entry } from './entry.js';

export interface RevealOptions {
  /** Accept an empty value instead of failing with `ParseError`. */
  allowEmpty?: boolean;
}

export interface CredentialStore {
  /** Every entry in the store. Metadata only, never secrets. */
  listEntries(): Promise<Entry[]>;

  /**
   * Reveal a field of the entry with the given id. `field` defaults to the
   * password.
   */
  revealField(id: string, field?: string, options?: RevealOptions): Promise<string>;

  /** Whether the store can currently be read without user interaction. */
  isUnlocked(): Promise<boolean>;
}
