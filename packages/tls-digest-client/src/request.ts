import { DEFAULT_REDIRECT_COUNT } from './constants.js';
import { HttpClientError } from './errors.js';
import type { CookieJar } from './cookies.js';
import type { Header, HeaderList } from './headers.js';

// ── Types ──────────────────────────────────────────────────────────

export type RequestBody = string | Uint8Array | null;

/** HTTP proxy the request is sent through. */
export interface ProxyConfig {
  host: string;
  port: number;
}

/**
 * A request value. Never mutated: the helpers below return copies.
 */
export interface HttpRequest {
  readonly method: string;
  readonly secure: boolean;
  readonly host: string;
  readonly port: number;
  /** Path without the query string, e.g. `/dir/index.html`. */
  readonly path: string;
  /** `''` or a string starting with `?`. */
  readonly queryString: string;
  readonly headers: HeaderList;
  readonly body: RequestBody;
  readonly cookieJar: CookieJar | null;
  readonly redirectCount: number;
  readonly proxy: ProxyConfig | null;
}

export interface HttpResponse {
  readonly status: number;
  readonly statusMessage: string;
  readonly headers: HeaderList;
  readonly cookieJar: CookieJar;
  /** The request that produced this response, after any redirects. */
  readonly request: HttpRequest;
}

export interface HttpResponseWithBody extends HttpResponse {
  readonly body: Buffer;
}

/**
 * Anything that can run a request end to end (transport, TLS, redirects)
 * and hand back the response.
 */
export interface HttpIssuer {
  issue(request: HttpRequest): Promise<HttpResponseWithBody>;
  /** Status, headers and cookies only; the body is read and discarded. */
  issueNoBody(request: HttpRequest): Promise<HttpResponse>;
}

export interface RequestInit {
  method?: string;
  headers?: HeaderList;
  body?: RequestBody;
  cookieJar?: CookieJar | null;
  redirectCount?: number;
  proxy?: ProxyConfig | null;
}

// ── Construction ───────────────────────────────────────────────────

/**
 * Build a request from an absolute http(s) URL.
 *
 * @throws HttpClientError(INVALID_URL) for unparseable or non-http URLs.
 */
export function parseRequest(url: string, init?: RequestInit): HttpRequest {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw HttpClientError.invalidUrl(url, 'not an absolute URL');
  }

  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw HttpClientError.invalidUrl(url, `unsupported scheme ${parsed.protocol}`);
  }

  const secure = parsed.protocol === 'https:';
  const port = parsed.port.length > 0 ? Number(parsed.port) : secure ? 443 : 80;
  // URL keeps IPv6 hosts bracketed; sockets want them bare.
  const host = parsed.hostname.startsWith('[') ? parsed.hostname.slice(1, -1) : parsed.hostname;

  return {
    method: (init?.method ?? 'GET').toUpperCase(),
    secure,
    host,
    port,
    path: parsed.pathname.length > 0 ? parsed.pathname : '/',
    queryString: parsed.search,
    headers: init?.headers ?? [],
    body: init?.body ?? null,
    cookieJar: init?.cookieJar ?? null,
    redirectCount: init?.redirectCount ?? DEFAULT_REDIRECT_COUNT,
    proxy: init?.proxy ?? null,
  };
}

export function setRequestHeaders(request: HttpRequest, headers: readonly Header[]): HttpRequest {
  return { ...request, headers };
}

export function setCookieJar(request: HttpRequest, cookieJar: CookieJar | null): HttpRequest {
  return { ...request, cookieJar };
}

export function setRequestBody(request: HttpRequest, body: RequestBody): HttpRequest {
  return { ...request, body };
}

// ── Rendering ──────────────────────────────────────────────────────

function isDefaultPort(request: HttpRequest): boolean {
  return request.secure ? request.port === 443 : request.port === 80;
}

/** `host[:port]` as it appears in a Host header or an origin. */
export function requestAuthority(request: HttpRequest): string {
  const host = request.host.includes(':') ? `[${request.host}]` : request.host;
  return isDefaultPort(request) ? host : `${host}:${request.port}`;
}

export function requestOrigin(request: HttpRequest): string {
  return `${request.secure ? 'https' : 'http'}://${requestAuthority(request)}`;
}

export function requestUrl(request: HttpRequest): string {
  return `${requestOrigin(request)}${request.path}${request.queryString}`;
}

/**
 * Resolve a Location header against the request that got it and carry
 * everything else over. Method and body are the caller's business.
 */
export function redirectTarget(request: HttpRequest, location: string): HttpRequest {
  const target = new URL(location, requestUrl(request));
  return parseRequest(target.toString(), {
    method: request.method,
    headers: request.headers,
    body: request.body,
    cookieJar: request.cookieJar,
    redirectCount: request.redirectCount - 1,
    proxy: request.proxy,
  });
}
