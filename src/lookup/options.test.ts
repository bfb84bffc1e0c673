import { describe, it, expect } from 'vitest';

import { LookupOptionsError } from '../credentials/errors.js';
import { parseLookupOptions, queryForTerm } from './options.js';

describe('parseLookupOptions', () => {
  it('returns no options for undefined or null', () => {
    expect(parseLookupOptions(undefined)).toEqual({});
    expect(parseLookupOptions(null)).toEqual({});
  });

  it('accepts folder, field and allow_empty', () => {
    expect(parseLookupOptions({ folder: 'Work', field: 'username', allow_empty: true })).toEqual({
      folder: 'Work',
      field: 'username',
      allow_empty: true,
    });
  });

  it('drops options explicitly set to undefined or null', () => {
    expect(parseLookupOptions({ folder: undefined, field: null, allow_empty: undefined })).toEqual(
      {},
    );
  });

  it('rejects unknown options', () => {
    expect(() => parseLookupOptions({ folder: 'Work', fodler: 'Work' })).toThrow(
      'Unknown lookup option(s): fodler. Supported: folder, field, allow_empty',
    );
  });

  it('rejects non-string folder and field', () => {
    expect(() => parseLookupOptions({ folder: 3 })).toThrow('Option "folder" must be a string, got number');
    expect(() => parseLookupOptions({ field: ['password'] })).toThrow(
      'Option "field" must be a string, got object',
    );
  });

  it('rejects empty folder and field', () => {
    expect(() => parseLookupOptions({ folder: '' })).toThrow('Option "folder" must not be empty');
    expect(() => parseLookupOptions({ field: '' })).toThrow('Option "field" must not be empty');
  });

  it('rejects a non-boolean allow_empty', () => {
    expect(() => parseLookupOptions({ allow_empty: 'yes' })).toThrow(
      'Option "allow_empty" must be a boolean, got string',
    );
  });

  it('rejects options that are not a mapping', () => {
    expect(() => parseLookupOptions('folder=Work')).toThrow(LookupOptionsError);
    expect(() => parseLookupOptions(['Work'])).toThrow('Lookup options must be a mapping');
  });
});

describe('queryForTerm', () => {
  it('builds a query from a term and options', () => {
    expect(queryForTerm('GitHub', { folder: 'Work', field: 'username' })).toEqual({
      name: 'GitHub',
      folder: 'Work',
      field: 'username',
      allowEmpty: false,
    });
  });

  it('leaves absent qualifiers out of the query', () => {
    const query = queryForTerm('GitHub', { allow_empty: true });
    expect(query).toEqual({ name: 'GitHub', allowEmpty: true });
    expect(query).not.toHaveProperty('folder');
    expect(Object.isFrozen(query)).toBe(true);
  });

  it('rejects empty and non-string terms', () => {
    expect(() => queryForTerm('', {})).toThrow('Lookup terms must be non-empty strings, got ""');
    expect(() => queryForTerm(42, {})).toThrow('Lookup terms must be non-empty strings, got 42');
    expect(() => queryForTerm(null, {})).toThrow(LookupOptionsError);
  });
});
