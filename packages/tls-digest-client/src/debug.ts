/**
 * Debug tracing for applyDigestAuth.
 *
 * Records every step of a negotiation with timing, inputs, outputs and the
 * error that stopped it. The password never appears in a trace; the
 * username and the digest response are redacted.
 */
import { performance } from 'node:perf_hooks';
import {
  AUTHORIZATION,
  STATUS_UNAUTHORIZED,
  WWW_AUTHENTICATE,
} from './constants.js';
import { DigestAuthError, DigestAuthErrorCode } from './errors.js';
import { lookupChallengeParam, parseDigestChallenge, stripDigestPrefix } from './challenge.js';
import { buildDigestAuthorization, computeDigestResponse } from './digest.js';
import type { DigestAuthResult } from './digest.js';
import { getGlobalManager } from './global.js';
import { credentialText } from './hash.js';
import type { HashInput } from './hash.js';
import { hasHeader, lookupHeader, replaceHeader } from './headers.js';
import { requestUrl } from './request.js';
import type { HttpIssuer, HttpRequest, HttpResponse } from './request.js';

// ── Types ──────────────────────────────────────────────────────────

export interface TraceStep {
  step: number;
  name: string;
  input: Record<string, unknown>;
  output: unknown;
  durationMs: number;
  ok: boolean;
  error?: string;
}

export type DigestAuthDebugResult = DigestAuthResult & {
  trace: TraceStep[];
  totalDurationMs: number;
};

const TOTAL_STEPS = 8;

// ── Helpers ────────────────────────────────────────────────────────

function redact(value: string): string {
  if (value.length <= 8) return '[REDACTED]';
  return value.slice(0, 8) + '...';
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function traceStep<T>(
  trace: TraceStep[],
  stepNum: number,
  name: string,
  inputData: Record<string, unknown>,
  fn: () => T,
  describe?: (output: T) => unknown,
): T {
  const start = performance.now();
  try {
    const output = fn();
    trace.push({
      step: stepNum,
      name,
      input: inputData,
      output: describe ? describe(output) : output,
      durationMs: performance.now() - start,
      ok: true,
    });
    return output;
  } catch (err: unknown) {
    trace.push({
      step: stepNum,
      name,
      input: inputData,
      output: null,
      durationMs: performance.now() - start,
      ok: false,
      error: errorMessage(err),
    });
    throw err;
  }
}

async function traceProbe(
  trace: TraceStep[],
  request: HttpRequest,
  issuer: HttpIssuer,
): Promise<HttpResponse> {
  const input = { method: request.method, url: requestUrl(request) };
  const start = performance.now();
  try {
    const response = await issuer.issueNoBody(request);
    trace.push({
      step: 1,
      name: 'probe',
      input,
      output: { status: response.status, headerCount: response.headers.length },
      durationMs: performance.now() - start,
      ok: true,
    });
    return response;
  } catch (err: unknown) {
    trace.push({
      step: 1,
      name: 'probe',
      input,
      output: null,
      durationMs: performance.now() - start,
      ok: false,
      error: errorMessage(err),
    });
    throw err;
  }
}

// ── applyDigestAuthDebug ──────────────────────────────────────────

/**
 * applyDigestAuth with a step trace.
 *
 * Digest failures come back as `{ ok: false }` with the trace up to the
 * failing step. Issuer errors are rethrown, as applyDigestAuth does.
 */
export async function applyDigestAuthDebug(
  username: HashInput,
  password: HashInput,
  request: HttpRequest,
  issuer: HttpIssuer = getGlobalManager(),
): Promise<DigestAuthDebugResult> {
  const totalStart = performance.now();
  const trace: TraceStep[] = [];

  // Step 1: Probe
  const response = await traceProbe(trace, request, issuer);
  const fail = (code: DigestAuthErrorCode) => new DigestAuthError(code, request, response);

  try {
    // Step 2: Check status
    traceStep(trace, 2, 'check_status', { status: response.status }, () => {
      if (response.status !== STATUS_UNAUTHORIZED) {
        throw fail(DigestAuthErrorCode.UNEXPECTED_STATUS_CODE);
      }
      return { expected: STATUS_UNAUTHORIZED };
    });

    // Step 3: Find WWW-Authenticate
    const header = traceStep(
      trace, 3, 'find_header',
      { header: WWW_AUTHENTICATE, headerCount: response.headers.length },
      () => {
        const h = lookupHeader(response.headers, WWW_AUTHENTICATE);
        if (h === undefined) throw fail(DigestAuthErrorCode.MISSING_WWW_AUTHENTICATE_HEADER);
        return h;
      },
      (h) => ({ length: h.length }),
    );

    // Step 4: Strip the scheme
    const params = traceStep(trace, 4, 'strip_prefix', { scheme: header.split(' ', 1)[0] }, () => {
      const p = stripDigestPrefix(header);
      if (p === null) throw fail(DigestAuthErrorCode.WWW_AUTHENTICATE_IS_NOT_DIGEST);
      return p;
    }, (p) => ({ params: p }));

    // Step 5: Parse
    const challenge = traceStep(
      trace, 5, 'parse_challenge', { length: params.length },
      () => parseDigestChallenge(params),
      (c) => ({ keys: c.map(([k]) => k) }),
    );

    // Step 6: Extract realm, nonce, qop, opaque
    const fields = traceStep(trace, 6, 'extract_params', { pairCount: challenge.length }, () => {
      const realm = lookupChallengeParam(challenge, 'realm');
      if (realm === undefined) throw fail(DigestAuthErrorCode.MISSING_REALM);
      const nonce = lookupChallengeParam(challenge, 'nonce');
      if (nonce === undefined) throw fail(DigestAuthErrorCode.MISSING_NONCE);
      return {
        realm,
        nonce,
        qop: lookupChallengeParam(challenge, 'qop') !== undefined,
        opaque: lookupChallengeParam(challenge, 'opaque'),
      };
    });

    const digestInput = {
      username,
      password,
      ...fields,
      method: request.method,
      path: request.path,
    };

    // Step 7: Compute the digest
    traceStep(
      trace, 7, 'compute_digest',
      { username: redact(credentialText(username)), method: request.method, path: request.path, qop: fields.qop },
      () => computeDigestResponse(digestInput),
      (digest) => ({ response: redact(digest) }),
    );

    // Step 8: Build the authenticated request
    const authenticated = traceStep(
      trace, 8, 'build_request',
      { replacesAuthorization: hasHeader(request.headers, AUTHORIZATION) },
      (): HttpRequest => ({
        ...request,
        headers: replaceHeader(request.headers, AUTHORIZATION, buildDigestAuthorization(digestInput)),
        cookieJar: response.cookieJar,
      }),
      (r) => ({ headerCount: r.headers.length, cookieCount: r.cookieJar?.size ?? 0 }),
    );

    return {
      ok: true,
      request: authenticated,
      trace,
      totalDurationMs: performance.now() - totalStart,
    };
  } catch (err: unknown) {
    if (!(err instanceof DigestAuthError)) throw err;
    return {
      ok: false,
      error: err,
      trace,
      totalDurationMs: performance.now() - totalStart,
    };
  }
}

// ── formatTrace ───────────────────────────────────────────────────

export function formatTrace(trace: TraceStep[]): string {
  if (trace.length === 0) return '(empty trace)';

  const lines: string[] = [];

  for (const step of trace) {
    const status = step.ok ? 'OK' : 'FAIL';
    const duration = step.durationMs.toFixed(2);
    const dots = '.'.repeat(Math.max(1, 30 - step.name.length));
    lines.push(`[${step.step}/${TOTAL_STEPS}] ${step.name} ${dots} ${status} (${duration}ms)`);

    if (step.output && typeof step.output === 'object') {
      for (const [key, value] of Object.entries(step.output)) {
        const display = typeof value === 'string' ? `"${value}"` : JSON.stringify(value);
        lines.push(`      ${key}: ${display}`);
      }
    }

    if (step.error) {
      lines.push(`      error: "${step.error}"`);
    }
  }

  return lines.join('\n');
}
