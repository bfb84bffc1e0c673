export { type LookupOptions, parseLookupOptions, queryForTerm } from './options.js';
export { type LookupPlugin, type LookupDeps, createRbwLookup } from './plugin.js';
