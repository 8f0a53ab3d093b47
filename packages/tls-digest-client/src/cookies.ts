/**
 * Cookie jar snapshots.
 *
 * A jar is a read-only name → value map. Every update returns a new jar, so a
 * request or response never sees cookies added after it was built.
 */

export type CookieJar = ReadonlyMap<string, string>;

export function createCookieJar(entries?: Iterable<readonly [string, string]>): CookieJar {
  return new Map(entries ?? []);
}

interface ParsedSetCookie {
  name: string;
  value: string;
  expired: boolean;
}

function parseSetCookie(line: string, now: number): ParsedSetCookie | null {
  const [pair, ...attributes] = line.split(';');
  const eq = pair.indexOf('=');
  if (eq <= 0) return null;

  const name = pair.slice(0, eq).trim();
  const value = pair.slice(eq + 1).trim();
  if (name.length === 0) return null;

  let expired = false;
  for (const attribute of attributes) {
    const attrEq = attribute.indexOf('=');
    const attrName = (attrEq === -1 ? attribute : attribute.slice(0, attrEq)).trim().toLowerCase();
    const attrValue = attrEq === -1 ? '' : attribute.slice(attrEq + 1).trim();

    if (attrName === 'max-age') {
      const seconds = Number.parseInt(attrValue, 10);
      if (!Number.isNaN(seconds) && seconds <= 0) expired = true;
    } else if (attrName === 'expires') {
      const at = Date.parse(attrValue);
      if (!Number.isNaN(at) && at <= now) expired = true;
    }
  }

  return { name, value, expired };
}

/**
 * Apply `Set-Cookie` lines to a jar. Expired cookies are removed; lines
 * without a `name=value` pair are ignored.
 */
export function updateCookieJar(
  jar: CookieJar,
  setCookies: readonly string[],
  now: number = Date.now(),
): CookieJar {
  if (setCookies.length === 0) return jar;

  const next = new Map(jar);
  for (const line of setCookies) {
    const parsed = parseSetCookie(line, now);
    if (!parsed) continue;
    if (parsed.expired) {
      next.delete(parsed.name);
    } else {
      next.set(parsed.name, parsed.value);
    }
  }
  return next;
}

/** Serialise as a `Cookie` header value, or `undefined` for an empty jar. */
export function cookieHeaderValue(jar: CookieJar): string | undefined {
  if (jar.size === 0) return undefined;
  return Array.from(jar.entries())
    .map(([name, value]) => `${name}=${value}`)
    .join('; ');
}
