import { type Config, DEFAULT_CONFIG } from '../config.js';
import type { CredentialStore } from '../credentials/credential-store.js';
import { StoreLockedError } from '../credentials/errors.js';
import { RbwCredentialStore } from '../credentials/rbw.js';
import { CredentialResolver } from '../credentials/resolver.js';
import { parseLookupOptions, queryForTerm } from './options.js';

/** What a host templating engine calls to expand `lookup('rbw', ...)`. */
export interface LookupPlugin {
  readonly name: string;
  /**
   * Resolve every term to one value, in order. The first failure rejects the
   * whole call; no partial results are returned.
   */
  run(terms: readonly unknown[], options?: unknown): Promise<string[]>;
}

export interface LookupDeps {
  /** Builds the store for one `run` call. Defaults to an `RbwCredentialStore` from config. */
  createStore?: (config: Config) => CredentialStore;
}

function defaultStore(config: Config): CredentialStore {
  return new RbwCredentialStore({
    cliPath: config.rbw.cli_path,
    lockedMarkers: config.rbw.locked_markers,
  });
}

/**
 * Create the rbw lookup plugin.
 *
 * Nothing is registered globally: the host keeps the returned object. Every
 * `run` builds a fresh store and resolver, so concurrent calls share no state.
 */
export function createRbwLookup(config: Config = DEFAULT_CONFIG, deps: LookupDeps = {}): LookupPlugin {
  const createStore = deps.createStore ?? defaultStore;

  return {
    name: 'rbw',

    async run(terms: readonly unknown[], rawOptions?: unknown): Promise<string[]> {
      const options = parseLookupOptions(rawOptions);
      const queries = terms.map((term) => queryForTerm(term, options));
      if (queries.length === 0) {
        return [];
      }

      const store = createStore(config);
      if (config.lookup.check_unlocked && !(await store.isUnlocked())) {
        throw new StoreLockedError();
      }

      const resolver = new CredentialResolver(store);
      const values: string[] = [];
      for (const query of queries) {
        values.push(await resolver.resolve(query));
      }
      return values;
    },
  };
}
