import type { Entry, LookupQuery } from './entry.js';

export type Selection =
  | { type: 'unique'; entry: Entry }
  | { type: 'not_found' }
  | { type: 'ambiguous'; candidateIds: string[] };

/**
 * Pick the single entry a query refers to.
 *
 * Names are compared exactly (case-sensitive). A folder on the query narrows
 * the match to entries in that folder. Several matches are reported with their
 * ids in listing order; the first one is never chosen on the caller's behalf.
 */
export function selectEntry(query: LookupQuery, entries: readonly Entry[]): Selection {
  let matches = entries.filter((entry) => entry.name === query.name);
  if (query.folder !== undefined) {
    matches = matches.filter((entry) => entry.folder === query.folder);
  }

  if (matches.length === 0) {
    return { type: 'not_found' };
  }
  if (matches.length > 1) {
    return { type: 'ambiguous', candidateIds: matches.map((entry) => entry.id) };
  }
  return { type: 'unique', entry: matches[0] };
}
