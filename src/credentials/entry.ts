/**
 * Credential records and lookup queries.
 *
 * Both are plain frozen objects: an `Entry` is a snapshot of one line of the
 * store listing, a `LookupQuery` is one caller request.
 */

/** Name of the field returned when a query does not ask for one. */
export const DEFAULT_FIELD = 'password';

export interface Entry {
  /** User-facing name. Not unique across the store. */
  readonly name: string;
  /** Folder the entry lives in, if any. */
  readonly folder?: string;
  /** Opaque identifier assigned by the store. Unique. */
  readonly id: string;
}

export interface LookupQuery {
  readonly name: string;
  readonly folder?: string;
  /** Field to reveal. Absent means {@link DEFAULT_FIELD}. */
  readonly field?: string;
  /** Whether an empty secret is an acceptable answer. */
  readonly allowEmpty: boolean;
}

export function makeEntry(name: string, folder: string | undefined, id: string): Entry {
  return Object.freeze(folder === undefined || folder === '' ? { name, id } : { name, folder, id });
}

export function makeLookupQuery(
  name: string,
  qualifiers: { folder?: string; field?: string; allowEmpty?: boolean } = {},
): LookupQuery {
  const query: { -readonly [K in keyof LookupQuery]: LookupQuery[K] } = {
    name,
    allowEmpty: qualifiers.allowEmpty ?? false,
  };
  if (qualifiers.folder !== undefined) query.folder = qualifiers.folder;
  if (qualifiers.field !== undefined) query.field = qualifiers.field;
  return Object.freeze(query);
}

/** The field a query reveals, with the default filled in. */
export function queryField(query: LookupQuery): string {
  return query.field ?? DEFAULT_FIELD;
}

/** Human-readable form used in error messages, e.g. `GitHub (folder Work, field username)`. */
export function describeQuery(query: LookupQuery): string {
  const parts: string[] = [];
  if (query.folder !== undefined) parts.push(`folder ${JSON.stringify(query.folder)}`);
  if (query.field !== undefined) parts.push(`field ${JSON.stringify(query.field)}`);
  const name = JSON.stringify(query.name);
  return parts.length === 0 ? name : `${name} (${parts.join(', ')})`;
}
