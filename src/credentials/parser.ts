/**
 * Parsers for rbw output.
 *
 * Every parser is pure and returns a tagged {@link ParseResult} rather than
 * throwing; {@link unwrapParse} turns a malformed result into a thrown
 * `ParseError` at the call site that wants one.
 *
 * Listings are parsed strictly: one malformed line rejects the whole listing.
 */
import { type Entry, makeEntry } from './entry.js';
import { ParseError } from './errors.js';

export type ParseResult<T> =
  | { type: 'parsed'; value: T }
  | { type: 'malformed'; error: ParseError };

/** Fields requested from `rbw list --fields`, in column order. */
export const LISTING_FIELDS = ['name', 'folder', 'id'] as const;

const FIELD_DELIMITER = '\t';

export interface CustomField {
  name: string;
  value: unknown;
}

/** Structured dump of one entry as printed by `rbw get --raw`. */
export interface RbwRecord {
  id?: string;
  name?: string;
  folder?: string | null;
  notes?: string | null;
  data: Record<string, unknown>;
  fields: CustomField[];
  /** Every top-level key of the dump, including the ones above. */
  raw: Record<string, unknown>;
}

export type FieldPick =
  | { type: 'found'; value: string }
  | { type: 'missing' }
  | { type: 'malformed'; error: ParseError };

function parsed<T>(value: T): ParseResult<T> {
  return { type: 'parsed', value };
}

function malformed<T>(message: string, line: number | null = null): ParseResult<T> {
  return { type: 'malformed', error: new ParseError(message, line) };
}

export function unwrapParse<T>(result: ParseResult<T>): T {
  if (result.type === 'malformed') {
    throw result.error;
  }
  return result.value;
}

function decode(raw: Buffer | string): ParseResult<string> {
  if (typeof raw === 'string') return parsed(raw);
  try {
    return parsed(new TextDecoder('utf-8', { fatal: true }).decode(raw));
  } catch (err) {
    return malformed(`output is not valid UTF-8: ${String(err)}`);
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Parse `rbw list --fields name,folder,id` output into entries.
 *
 * Blank lines are skipped. An empty folder column means the entry has no
 * folder.
 */
export function parseListing(raw: Buffer | string): ParseResult<Entry[]> {
  const text = decode(raw);
  if (text.type === 'malformed') return text;

  const entries: Entry[] = [];
  const lines = text.value.split('\n');
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].endsWith('\r') ? lines[i].slice(0, -1) : lines[i];
    if (line.trim() === '') continue;

    const columns = line.split(FIELD_DELIMITER);
    if (columns.length !== LISTING_FIELDS.length) {
      return malformed(
        `expected ${LISTING_FIELDS.length} tab-separated fields (${LISTING_FIELDS.join(', ')}), got ${columns.length}`,
        i + 1,
      );
    }

    const [name, folder, id] = columns;
    if (name === '') return malformed('entry has an empty name', i + 1);
    if (id === '') return malformed('entry has an empty id', i + 1);
    entries.push(makeEntry(name, folder, id));
  }
  return parsed(entries);
}

/**
 * Parse the output of `rbw get <id>`.
 *
 * Exactly one trailing newline is removed. Anything else, including other
 * trailing whitespace, is part of the secret.
 */
export function parseSecret(
  raw: Buffer | string,
  options: { allowEmpty?: boolean } = {},
): ParseResult<string> {
  const text = decode(raw);
  if (text.type === 'malformed') return text;

  const secret = text.value.endsWith('\n') ? text.value.slice(0, -1) : text.value;
  if (secret === '' && !options.allowEmpty) {
    return malformed('credential tool returned an empty value');
  }
  return parsed(secret);
}

/** Parse the JSON printed by `rbw get --raw <id>`. */
export function parseRecord(raw: Buffer | string): ParseResult<RbwRecord> {
  const text = decode(raw);
  if (text.type === 'malformed') return text;

  let value: unknown;
  try {
    value = JSON.parse(text.value);
  } catch (err) {
    return malformed(`raw entry is not valid JSON: ${String(err)}`);
  }
  if (!isPlainObject(value)) {
    return malformed('raw entry must be a JSON object');
  }

  let data: Record<string, unknown> = {};
  if (value.data !== undefined && value.data !== null) {
    if (!isPlainObject(value.data)) return malformed('"data" must be an object');
    data = value.data;
  }

  const fields: CustomField[] = [];
  if (value.fields !== undefined && value.fields !== null) {
    if (!Array.isArray(value.fields)) return malformed('"fields" must be an array');
    for (const item of value.fields) {
      if (!isPlainObject(item) || typeof item.name !== 'string') {
        return malformed('every custom field must be an object with a string "name"');
      }
      fields.push({ name: item.name, value: item.value });
    }
  }

  const record: RbwRecord = { data, fields, raw: value };
  if (typeof value.id === 'string') record.id = value.id;
  if (typeof value.name === 'string') record.name = value.name;
  if (typeof value.folder === 'string' || value.folder === null) record.folder = value.folder;
  if (typeof value.notes === 'string' || value.notes === null) record.notes = value.notes;
  return parsed(record);
}

/**
 * Find a field in a raw record.
 *
 * Custom fields win over `data` entries, which win over top-level keys. A null
 * value counts as absent and falls through to the next level.
 */
export function pickField(record: RbwRecord, field: string): FieldPick {
  const candidates: unknown[] = [];
  const custom = record.fields.find((f) => f.name === field);
  if (custom !== undefined) candidates.push(custom.value);
  if (Object.hasOwn(record.data, field)) candidates.push(record.data[field]);
  if (Object.hasOwn(record.raw, field)) candidates.push(record.raw[field]);

  for (const value of candidates) {
    if (value === null || value === undefined) continue;
    if (typeof value !== 'string') {
      return {
        type: 'malformed',
        error: new ParseError(`field ${JSON.stringify(field)} is not a string (got ${typeof value})`),
      };
    }
    return { type: 'found', value };
  }
  return { type: 'missing' };
}
