export type { CredentialStore, RevealOptions } from './credential-store.js';
export {
  DEFAULT_FIELD,
  type Entry,
  type LookupQuery,
  makeEntry,
  makeLookupQuery,
  queryField,
  describeQuery,
} from './entry.js';
export {
  CredentialError,
  ToolNotFoundError,
  StoreLockedError,
  ToolExecutionError,
  ParseError,
  NotFoundError,
  AmbiguousMatchError,
  FieldNotFoundError,
  LookupOptionsError,
} from './errors.js';
export { type ToolOutput, type RunToolOptions, DEFAULT_LOCKED_MARKERS, runTool } from './invoker.js';
export {
  type ParseResult,
  type RbwRecord,
  type CustomField,
  type FieldPick,
  LISTING_FIELDS,
  parseListing,
  parseSecret,
  parseRecord,
  pickField,
  unwrapParse,
} from './parser.js';
export { type Selection, selectEntry } from './selector.js';
export { CredentialResolver } from './resolver.js';
export { MemoryCredentialStore } from './memory.js';
export { type RbwStoreConfig, DEFAULT_RBW_STORE_CONFIG, RbwCredentialStore } from './rbw.js';
