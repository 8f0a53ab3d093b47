import { STATUS_CODES } from 'node:http';
import { Agent } from 'undici';
import type { Dispatcher, buildConnector } from 'undici';
import {
  COOKIE,
  DEFAULT_HEADERS_TIMEOUT_MS,
  IDEMPOTENT_METHODS,
  LOCATION,
  REDIRECT_STATUSES,
  SET_COOKIE,
  AUTHORIZATION,
} from './constants.js';
import { ConfigurationError } from './errors.js';
import { cookieHeaderValue, createCookieJar, updateCookieJar } from './cookies.js';
import {
  flattenHeaders,
  hasHeader,
  headersFromRaw,
  lookupHeader,
  lookupHeaderAll,
  removeHeader,
} from './headers.js';
import type { Header } from './headers.js';
import { redirectTarget, requestAuthority, requestOrigin, requestUrl } from './request.js';
import type {
  HttpIssuer,
  HttpRequest,
  HttpResponse,
  HttpResponseWithBody,
  ProxyConfig,
} from './request.js';
import { tlsManagerSettings } from './settings.js';
import type { ManagerSettings } from './settings.js';
import { buildConnectBytes, validateTunnelResponse } from './transport.js';
import type { Connection } from './transport.js';

// ── Types ──────────────────────────────────────────────────────────

export interface ManagerOptions {
  /** Time to wait for response headers. Default: 5 minutes */
  headersTimeoutMs?: number;
  /** Idle time allowed between body chunks. Default: same as headersTimeoutMs */
  bodyTimeoutMs?: number;
}

interface Exchange {
  response: HttpResponse;
  body: Buffer;
}

/** One response as it came off the wire. */
interface RawResponse {
  status: number;
  statusText: string;
  rawHeaders: Buffer[];
  body: Buffer;
}

const HTTP_METHODS = new Set<string>([
  'GET', 'HEAD', 'POST', 'PUT', 'DELETE', 'CONNECT', 'OPTIONS', 'TRACE', 'PATCH',
]);

// ── Helpers ────────────────────────────────────────────────────────

function isHttpMethod(method: string): method is Dispatcher.HttpMethod {
  return HTTP_METHODS.has(method);
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

function bareHost(hostname: string): string {
  return hostname.startsWith('[') && hostname.endsWith(']') ? hostname.slice(1, -1) : hostname;
}

/**
 * Send one request and collect the response with its header bytes as
 * received. The body is read either way; `keepBody` decides whether it is
 * kept.
 */
function dispatchRaw(agent: Agent, options: Dispatcher.DispatchOptions, keepBody: boolean): Promise<RawResponse> {
  return new Promise((resolve, reject) => {
    let status = 0;
    let statusText = '';
    let rawHeaders: Buffer[] = [];
    const chunks: Buffer[] = [];

    agent.dispatch(options, {
      onConnect: () => undefined,
      onError: reject,
      onHeaders: (statusCode, headers, _resume, text) => {
        status = statusCode;
        statusText = text;
        rawHeaders = headers;
        return true;
      },
      onData: (chunk) => {
        if (keepBody) chunks.push(chunk);
        return true;
      },
      onComplete: () => {
        resolve({ status, statusText, rawHeaders, body: Buffer.concat(chunks) });
      },
    });
  });
}

/**
 * Method and body for the request that follows a redirect.
 * 303, and 301/302 after a POST, turn into a GET without a body.
 */
function redirectMethod(status: number, request: HttpRequest): { method: string; dropBody: boolean } {
  if (status === 303 && request.method !== 'HEAD') return { method: 'GET', dropBody: true };
  if ((status === 301 || status === 302) && request.method === 'POST') {
    return { method: 'GET', dropBody: true };
  }
  return { method: request.method, dropBody: false };
}

// ── Manager ────────────────────────────────────────────────────────

/**
 * The HTTP engine. Opens connections through its settings, keeps one
 * undici agent per route (direct, or through a given proxy), follows
 * redirects and tracks cookies.
 */
export class Manager implements HttpIssuer {
  readonly settings: ManagerSettings;
  private readonly _options: Required<ManagerOptions>;
  private readonly _agents = new Map<string, Agent>();

  constructor(settings?: ManagerSettings, options?: ManagerOptions) {
    this.settings = settings ?? tlsManagerSettings();
    const headersTimeoutMs = options?.headersTimeoutMs ?? DEFAULT_HEADERS_TIMEOUT_MS;
    this._options = {
      headersTimeoutMs,
      bodyTimeoutMs: options?.bodyTimeoutMs ?? headersTimeoutMs,
    };
  }

  async issue(request: HttpRequest): Promise<HttpResponseWithBody> {
    const { response, body } = await this._follow(request, true);
    return { ...response, body };
  }

  async issueNoBody(request: HttpRequest): Promise<HttpResponse> {
    const { response } = await this._follow(request, false);
    return response;
  }

  /** Close every pooled connection. */
  async close(): Promise<void> {
    const agents = [...this._agents.values()];
    this._agents.clear();
    await Promise.all(agents.map((agent) => agent.close()));
  }

  // ── Redirects ──────────────────────────────────────────────────

  private async _follow(request: HttpRequest, keepBody: boolean): Promise<Exchange> {
    let current = request;

    for (;;) {
      const exchange = await this._send(current, keepBody);
      const { response } = exchange;
      const location = lookupHeader(response.headers, LOCATION);

      if (!REDIRECT_STATUSES.has(response.status) || location === undefined || current.redirectCount <= 0) {
        return exchange;
      }

      current = this._redirect(current, response, location);
    }
  }

  private _redirect(request: HttpRequest, response: HttpResponse, location: string): HttpRequest {
    const { method, dropBody } = redirectMethod(response.status, request);
    const next = redirectTarget(request, location);
    const sameOrigin = requestOrigin(next) === requestOrigin(request);

    // Credentials and cookies stay with the origin that set them.
    let headers: Header[] = removeHeader(next.headers, COOKIE);
    if (!sameOrigin) headers = removeHeader(headers, AUTHORIZATION);

    return {
      ...next,
      method,
      headers,
      body: dropBody ? null : next.body,
      cookieJar: sameOrigin ? response.cookieJar : createCookieJar(),
    };
  }

  // ── Single exchange ────────────────────────────────────────────

  private async _send(request: HttpRequest, keepBody: boolean): Promise<Exchange> {
    if (request.proxy && request.secure && this.settings.socks) {
      throw ConfigurationError.socksAndTlsProxy();
    }

    try {
      return await this._dispatch(request, keepBody);
    } catch (err: unknown) {
      if (IDEMPOTENT_METHODS.has(request.method) && this.settings.retryableException(err)) {
        try {
          return await this._dispatch(request, keepBody);
        } catch (retryErr: unknown) {
          throw this.settings.wrapException(request, retryErr);
        }
      }
      throw this.settings.wrapException(request, err);
    }
  }

  private async _dispatch(request: HttpRequest, keepBody: boolean): Promise<Exchange> {
    if (!isHttpMethod(request.method)) {
      throw new TypeError(`Unsupported HTTP method: ${request.method}`);
    }

    let headers: Header[] = [...request.headers];
    if (request.cookieJar && !hasHeader(headers, COOKIE)) {
      const cookie = cookieHeaderValue(request.cookieJar);
      if (cookie !== undefined) headers.push([COOKIE, cookie]);
    }

    let origin = requestOrigin(request);
    let path = `${request.path}${request.queryString}`;
    let agent = this._agent(null);

    if (request.proxy && request.secure) {
      agent = this._agent(request.proxy);
    } else if (request.proxy) {
      // Plain HTTP through a proxy: absolute-form request line to the proxy.
      origin = `http://${request.proxy.host}:${request.proxy.port}`;
      path = requestUrl(request);
      if (!hasHeader(headers, 'Host')) {
        headers = [['Host', requestAuthority(request)], ...headers];
      }
    }

    const data = await dispatchRaw(agent, {
      origin,
      path,
      method: request.method,
      headers: flattenHeaders(headers),
      body: request.body,
    }, keepBody);

    const responseHeaders = headersFromRaw(data.rawHeaders);
    const response: HttpResponse = {
      status: data.status,
      statusMessage: data.statusText || (STATUS_CODES[data.status] ?? ''),
      headers: responseHeaders,
      cookieJar: updateCookieJar(
        request.cookieJar ?? createCookieJar(),
        lookupHeaderAll(responseHeaders, SET_COOKIE),
      ),
      request,
    };
    return { response, body: data.body };
  }

  // ── Connections ────────────────────────────────────────────────

  private _agent(proxy: ProxyConfig | null): Agent {
    const key = proxy ? `${proxy.host}:${proxy.port}` : '';
    const existing = this._agents.get(key);
    if (existing) return existing;

    const agent = new Agent({
      connect: this._connector(proxy),
      headersTimeout: this._options.headersTimeoutMs,
      bodyTimeout: this._options.bodyTimeoutMs,
    });
    this._agents.set(key, agent);
    return agent;
  }

  private _connector(proxy: ProxyConfig | null): buildConnector.connector {
    const open = (opts: buildConnector.Options): Promise<Connection> => {
      const host = bareHost(opts.hostname);
      const port = Number(opts.port) || (opts.protocol === 'https:' ? 443 : 80);

      if (proxy && opts.protocol === 'https:') {
        return this.settings.tlsProxyConnection(
          buildConnectBytes(host, port),
          validateTunnelResponse,
          host,
          proxy.host,
          proxy.port,
        );
      }
      return opts.protocol === 'https:'
        ? this.settings.tlsConnection(host, port)
        : this.settings.rawConnection(host, port);
    };

    return (opts, callback) => {
      let pending: Promise<Connection>;
      try {
        pending = open(opts);
      } catch (err: unknown) {
        callback(toError(err), null);
        return;
      }
      void pending.then(
        (connection) => callback(null, connection.socket),
        (err: unknown) => callback(toError(err), null),
      );
    };
  }
}
