// tls-digest-client constants

/** Library version. */
export const SDK_VERSION = '0.3.3';

// ── Header Names ────────────────────────────────────────────────────

export const AUTHORIZATION = 'Authorization';
export const WWW_AUTHENTICATE = 'WWW-Authenticate';
export const COOKIE = 'Cookie';
export const SET_COOKIE = 'Set-Cookie';
export const LOCATION = 'Location';

// ── Digest ──────────────────────────────────────────────────────────

/** Scheme prefix of a Digest challenge, matched case-insensitively. */
export const DIGEST_PREFIX = 'Digest ';

/** Status a server answers with when it wants credentials. */
export const STATUS_UNAUTHORIZED = 401;

/**
 * Nonce count sent with qop=auth. Always the first use of the nonce.
 */
export const DIGEST_NONCE_COUNT = '00000001';

/**
 * Client nonce sent with qop=auth.
 *
 * Fixed, not random: a server that tracks client nonces can't rely on it for
 * replay protection. Kept so digests stay reproducible.
 */
export const DIGEST_CLIENT_NONCE = 'deadbeef';

/** The only quality of protection supported. */
export const DIGEST_QOP = 'auth';

/** Expected length of an MD5 digest in hex (16 bytes = 32 hex chars). */
export const MD5_HEX_LENGTH = 32;

// ── Requests ────────────────────────────────────────────────────────

/** Redirects followed by default before the redirect response is returned. */
export const DEFAULT_REDIRECT_COUNT = 10;

/** Methods retried once after a retryable transport error. */
export const IDEMPOTENT_METHODS: ReadonlySet<string> = new Set([
  'GET',
  'HEAD',
  'OPTIONS',
  'PUT',
  'DELETE',
  'TRACE',
]);

export const REDIRECT_STATUSES: ReadonlySet<number> = new Set([301, 302, 303, 307, 308]);

// ── Timeouts ────────────────────────────────────────────────────────

/** Default TCP/TLS connect timeout (30 seconds). */
export const DEFAULT_CONNECT_TIMEOUT_MS = 30 * 1000;

/** Default time to wait for response headers (5 minutes). */
export const DEFAULT_HEADERS_TIMEOUT_MS = 5 * 60 * 1000;

/** Maximum size of a proxy's CONNECT reply head. */
export const MAX_TUNNEL_RESPONSE_BYTES = 16 * 1024;
