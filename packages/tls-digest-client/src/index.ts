// ── Constants ────────────────────────────────────────────────────────
export {
  SDK_VERSION,
  AUTHORIZATION,
  WWW_AUTHENTICATE,
  COOKIE,
  SET_COOKIE,
  LOCATION,
  DIGEST_PREFIX,
  DIGEST_NONCE_COUNT,
  DIGEST_CLIENT_NONCE,
  DIGEST_QOP,
  MD5_HEX_LENGTH,
  DEFAULT_REDIRECT_COUNT,
  DEFAULT_CONNECT_TIMEOUT_MS,
  DEFAULT_HEADERS_TIMEOUT_MS,
} from './constants.js';

// ── Errors ───────────────────────────────────────────────────────────
export {
  DigestAuthError,
  DigestAuthErrorCode,
  HttpClientError,
  HttpClientErrorCode,
  ConfigurationError,
  ConfigurationErrorCode,
} from './errors.js';

// ── Headers ──────────────────────────────────────────────────────────
export type { Header, HeaderList } from './headers.js';
export {
  headerNameEquals,
  lookupHeader,
  lookupHeaderAll,
  hasHeader,
  removeHeader,
  replaceHeader,
} from './headers.js';

// ── Cookies ──────────────────────────────────────────────────────────
export type { CookieJar } from './cookies.js';
export { createCookieJar, updateCookieJar, cookieHeaderValue } from './cookies.js';

// ── Requests ─────────────────────────────────────────────────────────
export type {
  HttpRequest,
  HttpResponse,
  HttpResponseWithBody,
  HttpIssuer,
  RequestBody,
  RequestInit,
  ProxyConfig,
} from './request.js';
export {
  parseRequest,
  setRequestHeaders,
  setCookieJar,
  setRequestBody,
  requestUrl,
} from './request.js';

// ── Hashing ──────────────────────────────────────────────────────────
export type { HashInput } from './hash.js';
export { md5Hex } from './hash.js';

// ── Digest ───────────────────────────────────────────────────────────
export type { ChallengeParam, DigestChallenge } from './challenge.js';
export { parseDigestChallenge, stripDigestPrefix, lookupChallengeParam } from './challenge.js';
export type { DigestAuthResult, DigestResponseInput, DigestAuthorizationInput } from './digest.js';
export {
  applyDigestAuth,
  applyDigestAuthOrThrow,
  answerDigestChallenge,
  computeDigestResponse,
  buildDigestAuthorization,
} from './digest.js';

// ── Transport ────────────────────────────────────────────────────────
export type {
  TlsSettings,
  SocksSettings,
  ConnectionContext,
  ConnectionParams,
  ProxyTunnelParams,
} from './transport.js';
export {
  Connection,
  initConnectionContext,
  connectTo,
  connectViaProxyTunnel,
  buildConnectBytes,
  validateTunnelResponse,
} from './transport.js';

// ── Manager settings ─────────────────────────────────────────────────
export type { ManagerSettings, ConnectionFactory, ProxyConnectionFactory } from './settings.js';
export {
  mkManagerSettings,
  mkManagerSettingsContext,
  tlsManagerSettings,
  defaultRetryableException,
  tlsRetryableException,
  tlsWrapException,
} from './settings.js';

// ── Manager ──────────────────────────────────────────────────────────
export type { ManagerOptions } from './manager.js';
export { Manager } from './manager.js';
export { getGlobalManager, setGlobalManager, resetGlobalManager } from './global.js';

// ── Debug ────────────────────────────────────────────────────────────
export type { TraceStep, DigestAuthDebugResult } from './debug.js';
export { applyDigestAuthDebug, formatTrace } from './debug.js';
