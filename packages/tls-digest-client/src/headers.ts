// ── Types ──────────────────────────────────────────────────────────

/** One header line. Names keep the casing they were given. */
export type Header = readonly [name: string, value: string];

export type HeaderList = readonly Header[];

// ── Helpers ────────────────────────────────────────────────────────

export function headerNameEquals(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

/**
 * Case-insensitive header lookup. Returns the first value when the name
 * appears more than once.
 */
export function lookupHeader(headers: HeaderList, name: string): string | undefined {
  const lowerName = name.toLowerCase();
  for (const [key, value] of headers) {
    if (key.toLowerCase() === lowerName) return value;
  }
  return undefined;
}

/** Every value of `name`, in order. */
export function lookupHeaderAll(headers: HeaderList, name: string): string[] {
  const lowerName = name.toLowerCase();
  const values: string[] = [];
  for (const [key, value] of headers) {
    if (key.toLowerCase() === lowerName) values.push(value);
  }
  return values;
}

export function hasHeader(headers: HeaderList, name: string): boolean {
  return lookupHeader(headers, name) !== undefined;
}

/** Drop every header called `name`, whatever its casing. */
export function removeHeader(headers: HeaderList, name: string): Header[] {
  return headers.filter(([key]) => !headerNameEquals(key, name));
}

/**
 * Put `name: value` first and drop any other header of that name.
 */
export function replaceHeader(headers: HeaderList, name: string, value: string): Header[] {
  return [[name, value], ...removeHeader(headers, name)];
}

/**
 * Convert raw header lines (`[name, value, name, value, ...]` as received)
 * to an ordered list. Bytes map one to one onto characters, so a value
 * written back out goes on the wire unchanged.
 */
export function headersFromRaw(raw: readonly Buffer[]): Header[] {
  const list: Header[] = [];
  for (let i = 0; i + 1 < raw.length; i += 2) {
    list.push([raw[i].toString('latin1'), raw[i + 1].toString('latin1')]);
  }
  return list;
}

/** Flatten to the `[name, value, name, value, ...]` form undici takes. */
export function flattenHeaders(headers: HeaderList): string[] {
  const flat: string[] = [];
  for (const [key, value] of headers) {
    flat.push(key, value);
  }
  return flat;
}
