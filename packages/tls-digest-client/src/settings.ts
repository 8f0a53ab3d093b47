import { ConfigurationError, HttpClientError } from './errors.js';
import {
  connectTo,
  connectViaProxyTunnel,
  initConnectionContext,
} from './transport.js';
import type {
  Connection,
  ConnectionContext,
  SocksSettings,
  TlsSettings,
} from './transport.js';
import type { HttpRequest } from './request.js';

// ── Types ──────────────────────────────────────────────────────────

export type ConnectionFactory = (host: string, port: number) => Promise<Connection>;

export type ProxyConnectionFactory = (
  connectBytes: Uint8Array,
  validate: (connection: Connection) => Promise<void>,
  serverName: string,
  proxyHost: string,
  proxyPort: number,
) => Promise<Connection>;

/**
 * Everything the Manager needs to know about connections and failures.
 */
export interface ManagerSettings {
  /** Plain connections (http://, and requests sent to an HTTP proxy). */
  rawConnection: ConnectionFactory;
  /** TLS connections (https://). */
  tlsConnection: ConnectionFactory;
  /** TLS connections through an HTTP CONNECT proxy. */
  tlsProxyConnection: ProxyConnectionFactory;
  /** Whether an idempotent request that failed with `err` may be sent again. */
  retryableException: (err: unknown) => boolean;
  /** What the caller sees when `request` fails with `err`. */
  wrapException: (request: HttpRequest, err: unknown) => unknown;
  /** SOCKS settings the raw and TLS factories were built with, if any. */
  socks: SocksSettings | null;
}

// ── Error classification ──────────────────────────────────────────

function errorCode(err: unknown): string | undefined {
  if (typeof err !== 'object' || err === null || !('code' in err)) return undefined;
  const code = err.code;
  return typeof code === 'string' ? code : undefined;
}

/** The peer closed a connection that looked alive; resending is safe. */
const DEFAULT_RETRYABLE_CODES = new Set(['ECONNRESET', 'EPIPE', 'UND_ERR_SOCKET']);

/** TLS end of stream shows up as a reset before the handshake completes. */
function isTlsEof(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  return err.message.includes('socket disconnected before secure TLS connection');
}

/** Connection-level failures: handshake, termination, never established. */
const WRAPPED_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'EPIPE',
  'ETIMEDOUT',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'ENOTFOUND',
  'EAI_AGAIN',
  'UND_ERR_SOCKET',
  'UND_ERR_CONNECT_TIMEOUT',
  // certificate verification (node:tls)
  'CERT_HAS_EXPIRED',
  'CERT_NOT_YET_VALID',
  'CERT_UNTRUSTED',
  'DEPTH_ZERO_SELF_SIGNED_CERT',
  'SELF_SIGNED_CERT_IN_CHAIN',
  'UNABLE_TO_GET_ISSUER_CERT',
  'UNABLE_TO_GET_ISSUER_CERT_LOCALLY',
  'UNABLE_TO_VERIFY_LEAF_SIGNATURE',
]);

export function defaultRetryableException(err: unknown): boolean {
  const code = errorCode(err);
  return code !== undefined && DEFAULT_RETRYABLE_CODES.has(code);
}

export function tlsRetryableException(err: unknown): boolean {
  return isTlsEof(err) || defaultRetryableException(err);
}

/**
 * Wrap I/O and TLS failures in HttpClientError(INTERNAL_EXCEPTION); pass
 * everything else through unchanged.
 */
export function tlsWrapException(request: HttpRequest, err: unknown): unknown {
  if (err instanceof HttpClientError || err instanceof ConfigurationError) return err;
  const code = errorCode(err);
  if (code === undefined) return err;
  if (WRAPPED_CODES.has(code) || code.startsWith('ERR_SSL_') || code.startsWith('ERR_TLS_')) {
    return HttpClientError.internalException(request, err);
  }
  return err;
}

// ── Settings ──────────────────────────────────────────────────────

/**
 * TLS-enabled settings that share `context` (or a fresh one) between all
 * their connections.
 *
 * With `socks`, raw and TLS connections go through the SOCKS proxy, and
 * asking for an HTTP-proxy tunnel throws ConfigurationError right away.
 */
export function mkManagerSettingsContext(
  context: ConnectionContext | null,
  tlsSettings: TlsSettings,
  socks: SocksSettings | null,
): ManagerSettings {
  const ctx = context ?? initConnectionContext();

  return {
    rawConnection: (host, port) => connectTo(ctx, { hostname: host, port, secure: null, socks }),
    tlsConnection: (host, port) => connectTo(ctx, { hostname: host, port, secure: tlsSettings, socks }),
    tlsProxyConnection: (connectBytes, validate, serverName, proxyHost, proxyPort) => {
      if (socks) throw ConfigurationError.socksAndTlsProxy();
      return connectViaProxyTunnel(ctx, {
        connectBytes,
        validate,
        serverName,
        proxyHost,
        proxyPort,
        tls: tlsSettings,
      });
    },
    retryableException: tlsRetryableException,
    wrapException: tlsWrapException,
    socks,
  };
}

/** Same as mkManagerSettingsContext with a fresh connection context. */
export function mkManagerSettings(tlsSettings: TlsSettings, socks: SocksSettings | null): ManagerSettings {
  return mkManagerSettingsContext(null, tlsSettings, socks);
}

/** Default TLS-enabled settings: verified certificates, no SOCKS. */
export function tlsManagerSettings(): ManagerSettings {
  return mkManagerSettings({}, null);
}
