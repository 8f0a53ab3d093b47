import { DIGEST_PREFIX } from './constants.js';

// ── Types ──────────────────────────────────────────────────────────

/** One `key` or `key=value` item of a challenge, in appearance order. */
export type ChallengeParam = readonly [key: string, value: string];

export type DigestChallenge = readonly ChallengeParam[];

// ── Helpers ────────────────────────────────────────────────────────

/** Trim spaces only. Tabs and other whitespace are kept. */
function stripSpaces(input: string): string {
  let start = 0;
  let end = input.length;
  while (start < end && input[start] === ' ') start++;
  while (end > start && input[end - 1] === ' ') end--;
  return input.slice(start, end);
}

function dropLeadingSpaces(input: string): string {
  let i = 0;
  while (i < input.length && input[i] === ' ') i++;
  return input.slice(i);
}

/** Rest of the input after the next comma, or `''` when there is none. */
function afterComma(input: string, from: number): string {
  const comma = input.indexOf(',', from);
  return comma === -1 ? '' : input.slice(comma + 1);
}

/**
 * Read a value that starts right after `=`.
 *
 * A quoted value runs to the next `"` with no escape handling; whatever
 * follows the closing quote is skipped up to and including the next comma.
 * An opening quote with no closing one is read as an unquoted value.
 */
function readValue(input: string): [value: string, rest: string] {
  if (input.startsWith('"')) {
    const close = input.indexOf('"', 1);
    if (close !== -1) {
      return [input.slice(1, close), afterComma(input, close)];
    }
  }

  const comma = input.indexOf(',');
  if (comma === -1) return [input, ''];
  return [input.slice(0, comma), input.slice(comma + 1)];
}

// ── Public API ─────────────────────────────────────────────────────

/**
 * Strip the `Digest ` scheme prefix, compared case-insensitively.
 *
 * @returns The parameter list, or `null` if the value is not a Digest challenge.
 */
export function stripDigestPrefix(value: string): string | null {
  const head = value.slice(0, DIGEST_PREFIX.length);
  if (head.toLowerCase() !== DIGEST_PREFIX.toLowerCase()) return null;
  return value.slice(DIGEST_PREFIX.length);
}

/**
 * Split a challenge parameter list into ordered `[key, value]` pairs.
 *
 * - `key` alone yields `''` as its value
 * - keys and values are trimmed of surrounding spaces
 * - duplicate keys are kept in order
 *
 * Not a full auth-param grammar: backslash escapes
 * inside quotes are not interpreted.
 */
export function parseDigestChallenge(params: string): DigestChallenge {
  const pairs: ChallengeParam[] = [];
  let rest = params;

  while (rest.length > 0) {
    const input = dropLeadingSpaces(rest);
    let end = 0;
    while (end < input.length && input[end] !== '=' && input[end] !== ',') end++;
    const key = input.slice(0, end);

    if (end === input.length) {
      pairs.push([stripSpaces(key), '']);
      break;
    }

    if (input[end] === '=') {
      const [value, remaining] = readValue(input.slice(end + 1));
      pairs.push([stripSpaces(key), stripSpaces(value)]);
      rest = remaining;
    } else {
      pairs.push([stripSpaces(key), '']);
      rest = input.slice(end + 1);
    }
  }

  return pairs;
}

/** First value recorded for `key`. Keys are compared exactly. */
export function lookupChallengeParam(challenge: DigestChallenge, key: string): string | undefined {
  for (const [k, v] of challenge) {
    if (k === key) return v;
  }
  return undefined;
}
