/**
 * Shared test doubles: an in-memory issuer and an independent MD5 helper.
 */
import { createHash } from 'node:crypto';
import { createCookieJar } from '../../src/cookies.js';
import type { CookieJar } from '../../src/cookies.js';
import type { HeaderList } from '../../src/headers.js';
import type {
  HttpIssuer,
  HttpRequest,
  HttpResponse,
  HttpResponseWithBody,
} from '../../src/request.js';

export interface CannedResponse {
  status: number;
  headers?: HeaderList;
  cookieJar?: CookieJar;
}

/** Answers every request with the same canned response and records calls. */
export class FakeIssuer implements HttpIssuer {
  readonly calls: HttpRequest[] = [];
  private readonly reply: (request: HttpRequest) => CannedResponse;

  constructor(reply: CannedResponse | ((request: HttpRequest) => CannedResponse)) {
    this.reply = typeof reply === 'function' ? reply : () => reply;
  }

  async issueNoBody(request: HttpRequest): Promise<HttpResponse> {
    this.calls.push(request);
    const canned = this.reply(request);
    return {
      status: canned.status,
      statusMessage: '',
      headers: canned.headers ?? [],
      cookieJar: canned.cookieJar ?? createCookieJar(),
      request,
    };
  }

  async issue(request: HttpRequest): Promise<HttpResponseWithBody> {
    return { ...(await this.issueNoBody(request)), body: Buffer.alloc(0) };
  }
}

/** Issuer whose every call fails with `error`. */
export class FailingIssuer implements HttpIssuer {
  constructor(private readonly error: Error) {}

  async issueNoBody(): Promise<HttpResponse> {
    throw this.error;
  }

  async issue(): Promise<HttpResponseWithBody> {
    throw this.error;
  }
}

export function challenge401(challenge: string, cookieJar?: CookieJar): CannedResponse {
  return { status: 401, headers: [['WWW-Authenticate', challenge]], cookieJar };
}

/** MD5 hex straight from node:crypto, joined with ':'. */
export function md5(...parts: Array<string | Uint8Array>): string {
  const hash = createHash('md5');
  parts.forEach((part, i) => {
    if (i > 0) hash.update(':');
    hash.update(part);
  });
  return hash.digest('hex');
}
