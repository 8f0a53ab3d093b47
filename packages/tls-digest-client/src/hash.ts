import { createHash } from 'node:crypto';

/** A credential: text is UTF-8 encoded, bytes are used as-is. */
export type HashInput = string | Uint8Array;

/**
 * MD5 of the concatenated parts, returned as lowercase hex.
 *
 * String parts are header text, one byte per character (latin1), which is
 * how they travel on the wire.
 */
export function md5Hex(...parts: Array<string | Uint8Array>): string {
  const hash = createHash('md5');
  for (const part of parts) {
    if (typeof part === 'string') {
      hash.update(part, 'latin1');
    } else {
      hash.update(part);
    }
  }
  return hash.digest('hex');
}

export function credentialBytes(value: HashInput): Uint8Array {
  return typeof value === 'string' ? Buffer.from(value, 'utf8') : value;
}

/**
 * Render a credential as header text: its bytes, one character each, so
 * the header carries exactly the bytes that were hashed.
 */
export function credentialText(value: HashInput): string {
  return Buffer.from(credentialBytes(value)).toString('latin1');
}
