import {
  AUTHORIZATION,
  DIGEST_CLIENT_NONCE,
  DIGEST_NONCE_COUNT,
  DIGEST_QOP,
  STATUS_UNAUTHORIZED,
  WWW_AUTHENTICATE,
} from './constants.js';
import { DigestAuthError, DigestAuthErrorCode } from './errors.js';
import { lookupChallengeParam, parseDigestChallenge, stripDigestPrefix } from './challenge.js';
import { credentialBytes, credentialText, md5Hex } from './hash.js';
import type { HashInput } from './hash.js';
import { lookupHeader, replaceHeader } from './headers.js';
import { getGlobalManager } from './global.js';
import type { HttpIssuer, HttpRequest, HttpResponse } from './request.js';

// ── Types ──────────────────────────────────────────────────────────

/** Everything but the credentials is header text, one byte per character. */
export interface DigestResponseInput {
  username: HashInput;
  password: HashInput;
  realm: string;
  nonce: string;
  method: string;
  path: string;
  /** Whether the challenge carried a qop directive. */
  qop: boolean;
}

export interface DigestAuthorizationInput extends DigestResponseInput {
  opaque?: string;
}

export type DigestAuthResult =
  | { ok: true; request: HttpRequest }
  | { ok: false; error: DigestAuthError };

// ── Digest computation ─────────────────────────────────────────────

/**
 * Compute the `response` directive.
 *
 *   HA1 = MD5(username:realm:password)
 *   HA2 = MD5(method:path)
 *   qop:    MD5(HA1:nonce:00000001:deadbeef:auth:HA2)
 *   no qop: MD5(HA1:nonce:HA2)
 */
export function computeDigestResponse(input: DigestResponseInput): string {
  const username = credentialBytes(input.username);
  const ha1 = md5Hex(username, ':', input.realm, ':', credentialBytes(input.password));
  // Only qop=auth or no qop, so HA2 never covers the body.
  const ha2 = md5Hex(input.method, ':', input.path);

  if (input.qop) {
    return md5Hex(
      ha1, ':', input.nonce, ':', DIGEST_NONCE_COUNT, ':', DIGEST_CLIENT_NONCE, ':', DIGEST_QOP, ':', ha2,
    );
  }
  return md5Hex(ha1, ':', input.nonce, ':', ha2);
}

/**
 * Build the `Authorization` header value for a challenge.
 */
export function buildDigestAuthorization(input: DigestAuthorizationInput): string {
  const response = computeDigestResponse(input);
  let value =
    `Digest username="${credentialText(input.username)}", realm="${input.realm}", ` +
    `nonce="${input.nonce}", uri="${input.path}", response="${response}"`;

  // TODO: echo the challenge's algorithm directive once non-MD5 algorithms are supported
  if (input.opaque !== undefined) {
    value += `, opaque="${input.opaque}"`;
  }
  if (input.qop) {
    value += `, qop=${DIGEST_QOP}, nc=${DIGEST_NONCE_COUNT}, cnonce="${DIGEST_CLIENT_NONCE}"`;
  }
  return value;
}

// ── Negotiation ────────────────────────────────────────────────────

/**
 * Answer the challenge in `response` for `request` without any I/O.
 *
 * Checks, in order: status 401, a WWW-Authenticate header, a Digest scheme,
 * a realm, a nonce. The first failing check decides the error.
 */
export function answerDigestChallenge(
  username: HashInput,
  password: HashInput,
  request: HttpRequest,
  response: HttpResponse,
): DigestAuthResult {
  const fail = (code: DigestAuthErrorCode): DigestAuthResult => ({
    ok: false,
    error: new DigestAuthError(code, request, response),
  });

  if (response.status !== STATUS_UNAUTHORIZED) {
    return fail(DigestAuthErrorCode.UNEXPECTED_STATUS_CODE);
  }

  const header = lookupHeader(response.headers, WWW_AUTHENTICATE);
  if (header === undefined) {
    return fail(DigestAuthErrorCode.MISSING_WWW_AUTHENTICATE_HEADER);
  }

  const params = stripDigestPrefix(header);
  if (params === null) {
    return fail(DigestAuthErrorCode.WWW_AUTHENTICATE_IS_NOT_DIGEST);
  }

  const challenge = parseDigestChallenge(params);
  const realm = lookupChallengeParam(challenge, 'realm');
  if (realm === undefined) {
    return fail(DigestAuthErrorCode.MISSING_REALM);
  }
  const nonce = lookupChallengeParam(challenge, 'nonce');
  if (nonce === undefined) {
    return fail(DigestAuthErrorCode.MISSING_NONCE);
  }

  const authorization = buildDigestAuthorization({
    username,
    password,
    realm,
    nonce,
    method: request.method,
    path: request.path,
    qop: lookupChallengeParam(challenge, 'qop') !== undefined,
    opaque: lookupChallengeParam(challenge, 'opaque'),
  });

  return {
    ok: true,
    request: {
      ...request,
      headers: replaceHeader(request.headers, AUTHORIZATION, authorization),
      cookieJar: response.cookieJar,
    },
  };
}

/**
 * Apply digest authentication to a request.
 *
 * Sends `request` once, unmodified, to get the server's challenge, so its
 * body goes over the wire. If the body can only be read once, pass a request
 * with a placeholder body and put the real one back on the result.
 *
 * Errors thrown by the issuer (connection, TLS, proxy) propagate as they are.
 * Everything wrong with the challenge itself comes back as `{ ok: false }`.
 *
 * @param issuer Defaults to the global manager.
 */
export async function applyDigestAuth(
  username: HashInput,
  password: HashInput,
  request: HttpRequest,
  issuer: HttpIssuer = getGlobalManager(),
): Promise<DigestAuthResult> {
  const response = await issuer.issueNoBody(request);
  return answerDigestChallenge(username, password, request, response);
}

/**
 * Same as applyDigestAuth, but throws the DigestAuthError.
 */
export async function applyDigestAuthOrThrow(
  username: HashInput,
  password: HashInput,
  request: HttpRequest,
  issuer: HttpIssuer = getGlobalManager(),
): Promise<HttpRequest> {
  const result = await applyDigestAuth(username, password, request, issuer);
  if (!result.ok) throw result.error;
  return result.request;
}
