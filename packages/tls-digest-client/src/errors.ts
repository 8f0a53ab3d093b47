import type { HttpRequest, HttpResponse } from './request.js';

/**
 * Reasons a Digest challenge could not be answered.
 * Closed set: callers switch on `DigestAuthError.code`.
 */
export enum DigestAuthErrorCode {
  UNEXPECTED_STATUS_CODE = 'UNEXPECTED_STATUS_CODE',
  MISSING_WWW_AUTHENTICATE_HEADER = 'MISSING_WWW_AUTHENTICATE_HEADER',
  WWW_AUTHENTICATE_IS_NOT_DIGEST = 'WWW_AUTHENTICATE_IS_NOT_DIGEST',
  MISSING_REALM = 'MISSING_REALM',
  MISSING_NONCE = 'MISSING_NONCE',
}

const DIGEST_MESSAGES: Record<DigestAuthErrorCode, string> = {
  [DigestAuthErrorCode.UNEXPECTED_STATUS_CODE]: 'Expected a 401 response to the probe request',
  [DigestAuthErrorCode.MISSING_WWW_AUTHENTICATE_HEADER]: 'Response has no WWW-Authenticate header',
  [DigestAuthErrorCode.WWW_AUTHENTICATE_IS_NOT_DIGEST]: 'WWW-Authenticate is not a Digest challenge',
  [DigestAuthErrorCode.MISSING_REALM]: 'Digest challenge has no realm',
  [DigestAuthErrorCode.MISSING_NONCE]: 'Digest challenge has no nonce',
};

/**
 * Produced by applyDigestAuth when the credentials can't be applied.
 * Carries the request that was probed and the response that came back.
 * The message never contains credentials.
 */
export class DigestAuthError extends Error {
  readonly code: DigestAuthErrorCode;
  readonly request: HttpRequest;
  readonly response: HttpResponse;
  readonly retryable = false;

  constructor(code: DigestAuthErrorCode, request: HttpRequest, response: HttpResponse) {
    super(`${DIGEST_MESSAGES[code]} (status ${response.status})`);
    this.name = 'DigestAuthError';
    this.code = code;
    this.request = request;
    this.response = response;
  }
}

// ── HTTP client errors ─────────────────────────────────────────────

export enum HttpClientErrorCode {
  INVALID_URL = 'INVALID_URL',
  INTERNAL_EXCEPTION = 'INTERNAL_EXCEPTION',
  PROXY_TUNNEL_FAILED = 'PROXY_TUNNEL_FAILED',
}

/**
 * Errors raised by the HTTP engine and the transport adapter.
 * `cause` holds the underlying socket or TLS error where there is one.
 */
export class HttpClientError extends Error {
  readonly code: HttpClientErrorCode;
  readonly request: HttpRequest | null;

  constructor(
    code: HttpClientErrorCode,
    message: string,
    request: HttpRequest | null,
    options?: { cause?: unknown },
  ) {
    super(message);
    this.name = 'HttpClientError';
    this.code = code;
    this.request = request;
    if (options?.cause !== undefined) this.cause = options.cause;
  }

  // ── Convenience factories ──────────────────────────────────────────

  static invalidUrl(url: string, reason: string): HttpClientError {
    return new HttpClientError(HttpClientErrorCode.INVALID_URL, `Invalid URL ${url}: ${reason}`, null);
  }

  static internalException(request: HttpRequest, cause: unknown): HttpClientError {
    const detail = cause instanceof Error ? cause.message : String(cause);
    return new HttpClientError(
      HttpClientErrorCode.INTERNAL_EXCEPTION,
      `${request.method} ${request.host}:${request.port}${request.path} failed: ${detail}`,
      request,
      { cause },
    );
  }

  static proxyTunnelFailed(statusLine: string): HttpClientError {
    return new HttpClientError(
      HttpClientErrorCode.PROXY_TUNNEL_FAILED,
      `Proxy refused CONNECT: ${statusLine}`,
      null,
    );
  }
}

// ── Configuration errors ───────────────────────────────────────────

export enum ConfigurationErrorCode {
  SOCKS_AND_TLS_PROXY = 'SOCKS_AND_TLS_PROXY',
}

/** Raised as soon as an impossible combination of settings is used. */
export class ConfigurationError extends Error {
  readonly code: ConfigurationErrorCode;

  constructor(code: ConfigurationErrorCode, message: string) {
    super(message);
    this.name = 'ConfigurationError';
    this.code = code;
  }

  static socksAndTlsProxy(): ConfigurationError {
    return new ConfigurationError(
      ConfigurationErrorCode.SOCKS_AND_TLS_PROXY,
      'Cannot use SOCKS and TLS proxying together',
    );
  }
}
