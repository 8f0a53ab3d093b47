import { describe, it, expect } from 'vitest';
import {
  flattenHeaders,
  hasHeader,
  headerNameEquals,
  headersFromRaw,
  lookupHeader,
  lookupHeaderAll,
  removeHeader,
  replaceHeader,
} from '../../src/headers.js';
import type { HeaderList } from '../../src/headers.js';

const HEADERS: HeaderList = [
  ['Content-Type', 'text/plain'],
  ['set-cookie', 'a=1'],
  ['Set-Cookie', 'b=2'],
  ['X-Empty', ''],
];

describe('AQ: header lookup', () => {
  it('AQ-HDR-001: names compare case-insensitively', () => {
    expect(headerNameEquals('WWW-Authenticate', 'www-authenticate')).toBe(true);
    expect(headerNameEquals('Accept', 'Accept-Encoding')).toBe(false);
  });

  it('AQ-HDR-002: lookupHeader returns the first match', () => {
    expect(lookupHeader(HEADERS, 'SET-COOKIE')).toBe('a=1');
    expect(lookupHeader(HEADERS, 'content-type')).toBe('text/plain');
    expect(lookupHeader(HEADERS, 'Missing')).toBeUndefined();
  });

  it('AQ-HDR-003: lookupHeaderAll keeps order', () => {
    expect(lookupHeaderAll(HEADERS, 'set-cookie')).toEqual(['a=1', 'b=2']);
    expect(lookupHeaderAll(HEADERS, 'Missing')).toEqual([]);
  });

  it('AQ-HDR-004: an empty value still counts as present', () => {
    expect(hasHeader(HEADERS, 'x-empty')).toBe(true);
    expect(hasHeader(HEADERS, 'x-other')).toBe(false);
  });
});

describe('AQ: header edits', () => {
  it('AQ-HDR-010: removeHeader drops every casing', () => {
    expect(removeHeader(HEADERS, 'SET-COOKIE')).toEqual([
      ['Content-Type', 'text/plain'],
      ['X-Empty', ''],
    ]);
  });

  it('AQ-HDR-011: replaceHeader puts the new header first', () => {
    expect(replaceHeader(HEADERS, 'Set-Cookie', 'c=3')).toEqual([
      ['Set-Cookie', 'c=3'],
      ['Content-Type', 'text/plain'],
      ['X-Empty', ''],
    ]);
  });

  it('AQ-HDR-012: edits return new lists', () => {
    const copy = [...HEADERS];
    replaceHeader(HEADERS, 'Content-Type', 'application/json');
    removeHeader(HEADERS, 'X-Empty');
    expect(HEADERS).toEqual(copy);
  });
});

describe('AQ: header conversion', () => {
  it('AQ-HDR-020: headersFromRaw pairs names with values in order', () => {
    expect(headersFromRaw([
      Buffer.from('Content-Type'), Buffer.from('text/html'),
      Buffer.from('Set-Cookie'), Buffer.from('a=1'),
      Buffer.from('Set-Cookie'), Buffer.from('b=2'),
    ])).toEqual([
      ['Content-Type', 'text/html'],
      ['Set-Cookie', 'a=1'],
      ['Set-Cookie', 'b=2'],
    ]);
  });

  it('AQ-HDR-022: headersFromRaw keeps every byte', () => {
    const [[, value]] = headersFromRaw([Buffer.from('X-Realm'), Buffer.from([0x63, 0xc3, 0xa9, 0xe9])]);
    expect(Buffer.from(value, 'latin1')).toEqual(Buffer.from([0x63, 0xc3, 0xa9, 0xe9]));
  });

  it('AQ-HDR-021: flattenHeaders alternates names and values', () => {
    expect(flattenHeaders([['A', '1'], ['B', '2'], ['A', '3']])).toEqual(['A', '1', 'B', '2', 'A', '3']);
  });
});
