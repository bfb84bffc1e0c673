import type { CredentialStore } from './credential-store.js';
import type { LookupQuery } from './entry.js';
import { AmbiguousMatchError, NotFoundError } from './errors.js';
import { selectEntry } from './selector.js';

/**
 * Resolves one query to one secret: list the store, select the entry, then
 * reveal the requested field by id.
 *
 * The listing is fetched fresh for every call and the secret is not kept.
 */
export class CredentialResolver {
  private readonly store: CredentialStore;

  constructor(store: CredentialStore) {
    this.store = store;
  }

  async resolve(query: LookupQuery): Promise<string> {
    const entries = await this.store.listEntries();
    const selection = selectEntry(query, entries);

    switch (selection.type) {
      case 'not_found':
        throw new NotFoundError(query);
      case 'ambiguous':
        throw new AmbiguousMatchError(query, selection.candidateIds);
      case 'unique':
        return this.store.revealField(selection.entry.id, query.field, {
          allowEmpty: query.allowEmpty,
        });
    }
  }
}
