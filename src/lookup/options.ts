/**
 * Validation of the options mapping a host framework passes alongside lookup
 * terms.
 */
import { type LookupQuery, makeLookupQuery } from '../credentials/entry.js';
import { LookupOptionsError } from '../credentials/errors.js';

/** Validated lookup options. */
export interface LookupOptions {
  /** Only match entries in this folder. */
  folder?: string;
  /** Field to return instead of the password. */
  field?: string;
  /** Accept an empty secret. */
  allow_empty?: boolean;
}

const KNOWN_OPTIONS: ReadonlySet<string> = new Set(['folder', 'field', 'allow_empty']);

function optionalName(raw: Record<string, unknown>, key: 'folder' | 'field'): string | undefined {
  const value = raw[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    throw new LookupOptionsError(`Option "${key}" must be a string, got ${typeof value}`);
  }
  if (value === '') {
    throw new LookupOptionsError(`Option "${key}" must not be empty`);
  }
  return value;
}

/**
 * Validate a raw options mapping.
 *
 * `undefined` and `null` mean no options. Unknown keys are rejected so a
 * misspelt qualifier cannot silently widen a match.
 *
 * @throws LookupOptionsError on anything else.
 */
export function parseLookupOptions(input: unknown): LookupOptions {
  if (input === undefined || input === null) {
    return {};
  }
  if (typeof input !== 'object' || Array.isArray(input)) {
    throw new LookupOptionsError('Lookup options must be a mapping');
  }

  const raw: Record<string, unknown> = { ...input };
  const unknown = Object.keys(raw).filter((key) => !KNOWN_OPTIONS.has(key));
  if (unknown.length > 0) {
    throw new LookupOptionsError(
      `Unknown lookup option(s): ${unknown.join(', ')}. Supported: ${[...KNOWN_OPTIONS].join(', ')}`,
    );
  }

  const options: LookupOptions = {};
  const folder = optionalName(raw, 'folder');
  if (folder !== undefined) options.folder = folder;
  const field = optionalName(raw, 'field');
  if (field !== undefined) options.field = field;

  const allowEmpty = raw.allow_empty;
  if (allowEmpty !== undefined && allowEmpty !== null) {
    if (typeof allowEmpty !== 'boolean') {
      throw new LookupOptionsError(`Option "allow_empty" must be a boolean, got ${typeof allowEmpty}`);
    }
    options.allow_empty = allowEmpty;
  }

  return options;
}

/** Build the query for one lookup term. */
export function queryForTerm(term: unknown, options: LookupOptions): LookupQuery {
  if (typeof term !== 'string' || term === '') {
    throw new LookupOptionsError(`Lookup terms must be non-empty strings, got ${JSON.stringify(term)}`);
  }
  return makeLookupQuery(term, {
    folder: options.folder,
    field: options.field,
    allowEmpty: options.allow_empty,
  });
}
