/**
 * tls-digest CLI
 *
 * Commands: parse, response, header, request, version, help
 * Argument parsing is Node.js built-in parseArgs.
 */
import { realpathSync } from 'node:fs';
import { pathToFileURL } from 'node:url';
import { parseArgs } from 'node:util';
import { AUTHORIZATION, SDK_VERSION, WWW_AUTHENTICATE } from './constants.js';
import { parseDigestChallenge, stripDigestPrefix } from './challenge.js';
import { createCookieJar } from './cookies.js';
import { answerDigestChallenge, applyDigestAuth, computeDigestResponse } from './digest.js';
import type { DigestAuthResult } from './digest.js';
import { applyDigestAuthDebug, formatTrace } from './debug.js';
import type { TraceStep } from './debug.js';
import { ConfigurationError, DigestAuthError, HttpClientError } from './errors.js';
import { lookupHeader } from './headers.js';
import { Manager } from './manager.js';
import { parseRequest } from './request.js';
import type { HttpRequest, HttpResponse, ProxyConfig } from './request.js';
import { mkManagerSettings } from './settings.js';

// ── Exit codes ────────────────────────────────────────────────────

export const EXIT_OK = 0;
export const EXIT_DIGEST_FAILED = 1;
export const EXIT_USAGE = 2;
export const EXIT_ERROR = 3;

// ── IO ────────────────────────────────────────────────────────────

/** Where the CLI writes. Each call is one line. */
export interface CliIo {
  out(text: string): void;
  err(text: string): void;
}

const processIo: CliIo = {
  out: (text) => {
    process.stdout.write(text + '\n');
  },
  err: (text) => {
    process.stderr.write(text + '\n');
  },
};

/** Unwinds a command with an exit code once its output is written. */
class CliExit extends Error {
  readonly exitCode: number;

  constructor(exitCode: number) {
    super(`exit ${exitCode}`);
    this.exitCode = exitCode;
  }
}

// ── Helpers ───────────────────────────────────────────────────────

function exitUsage(io: CliIo, message: string, jsonMode: boolean): never {
  if (jsonMode) {
    io.out(JSON.stringify({ error: 'USAGE_ERROR', message }));
  } else {
    io.err(`Error: ${message}`);
    io.err('Run "tls-digest help" for usage information.');
  }
  throw new CliExit(EXIT_USAGE);
}

function errorCode(err: unknown): string {
  if (
    err instanceof DigestAuthError ||
    err instanceof HttpClientError ||
    err instanceof ConfigurationError
  ) {
    return err.code;
  }
  return 'INTERNAL_ERROR';
}

function exitError(io: CliIo, err: unknown, jsonMode: boolean): never {
  const message = err instanceof Error ? err.message : String(err);
  const code = errorCode(err);
  if (jsonMode) {
    io.out(JSON.stringify({ error: code, message }));
  } else {
    io.err(`Error: ${message} (${code})`);
  }
  throw new CliExit(EXIT_ERROR);
}

function exitDigestFailed(io: CliIo, error: DigestAuthError, jsonMode: boolean): never {
  if (jsonMode) {
    io.out(JSON.stringify({ ok: false, error: error.code, status: error.response.status }));
  } else {
    io.out(`FAILED: ${error.code} (status ${error.response.status})`);
  }
  throw new CliExit(EXIT_DIGEST_FAILED);
}

function required(io: CliIo, value: string | undefined, flag: string, jsonMode: boolean): string {
  if (value === undefined || value.length === 0) {
    exitUsage(io, `Missing required argument: --${flag}`, jsonMode);
  }
  return value;
}

function parseHostPort(io: CliIo, value: string, flag: string, jsonMode: boolean): ProxyConfig {
  const colon = value.lastIndexOf(':');
  const host = colon > 0 ? value.slice(0, colon).replace(/^\[(.*)\]$/, '$1') : '';
  const port = colon > 0 ? Number(value.slice(colon + 1)) : Number.NaN;
  if (host.length === 0 || !Number.isInteger(port) || port < 1 || port > 65535) {
    exitUsage(io, `--${flag} must be host:port, got "${value}"`, jsonMode);
  }
  return { host, port };
}

/** Command-line text (UTF-8) as header text, one character per byte. */
function toHeaderText(text: string): string {
  return Buffer.from(text, 'utf8').toString('latin1');
}

function fromHeaderText(text: string): string {
  return Buffer.from(text, 'latin1').toString('utf8');
}

/** A 401 carrying `challenge`, for answering a challenge offline. */
function offlineChallenge(request: HttpRequest, challenge: string): HttpResponse {
  return {
    status: 401,
    statusMessage: 'Unauthorized',
    headers: [[WWW_AUTHENTICATE, challenge]],
    cookieJar: createCookieJar(),
    request,
  };
}

// ── Command: parse ────────────────────────────────────────────────

function cmdParse(io: CliIo, argv: string[]): number {
  const { values } = parseArgs({
    args: argv,
    options: {
      challenge: { type: 'string' },
      json: { type: 'boolean', default: false },
      help: { type: 'boolean', default: false },
    },
    strict: true,
  });

  if (values.help) {
    io.out(`Usage: tls-digest parse --challenge 'Digest realm="r", nonce="n"' [--json]

Split a WWW-Authenticate Digest challenge into its parameters.`);
    return EXIT_OK;
  }

  const jsonMode = values.json ?? false;
  const challenge = required(io, values.challenge, 'challenge', jsonMode);

  const params = stripDigestPrefix(toHeaderText(challenge));
  if (params === null) {
    exitUsage(io, 'Challenge must start with "Digest "', jsonMode);
  }
  const pairs = parseDigestChallenge(params)
    .map(([key, value]): [string, string] => [fromHeaderText(key), fromHeaderText(value)]);

  if (jsonMode) {
    io.out(JSON.stringify({ pairs }));
  } else {
    for (const [key, value] of pairs) {
      io.out(`${key}: ${JSON.stringify(value)}`);
    }
  }
  return EXIT_OK;
}

// ── Command: response ─────────────────────────────────────────────

function cmdResponse(io: CliIo, argv: string[]): number {
  const { values } = parseArgs({
    args: argv,
    options: {
      username: { type: 'string' },
      password: { type: 'string' },
      realm: { type: 'string' },
      nonce: { type: 'string' },
      method: { type: 'string', default: 'GET' },
      path: { type: 'string', default: '/' },
      qop: { type: 'boolean', default: false },
      json: { type: 'boolean', default: false },
      help: { type: 'boolean', default: false },
    },
    strict: true,
  });

  if (values.help) {
    io.out(`Usage: tls-digest response --username <u> --password <p> --realm <r> --nonce <n>
  [--method GET] [--path /] [--qop] [--json]

Compute the digest response value (lowercase hex).`);
    return EXIT_OK;
  }

  const jsonMode = values.json ?? false;
  const response = computeDigestResponse({
    username: required(io, values.username, 'username', jsonMode),
    password: required(io, values.password, 'password', jsonMode),
    realm: toHeaderText(required(io, values.realm, 'realm', jsonMode)),
    nonce: toHeaderText(required(io, values.nonce, 'nonce', jsonMode)),
    method: values.method ?? 'GET',
    path: toHeaderText(values.path ?? '/'),
    qop: values.qop ?? false,
  });

  io.out(jsonMode ? JSON.stringify({ response }) : response);
  return EXIT_OK;
}

// ── Command: header ───────────────────────────────────────────────

function cmdHeader(io: CliIo, argv: string[]): number {
  const { values } = parseArgs({
    args: argv,
    options: {
      challenge: { type: 'string' },
      username: { type: 'string' },
      password: { type: 'string' },
      method: { type: 'string', default: 'GET' },
      path: { type: 'string', default: '/' },
      json: { type: 'boolean', default: false },
      help: { type: 'boolean', default: false },
    },
    strict: true,
  });

  if (values.help) {
    io.out(`Usage: tls-digest header --challenge <www-authenticate> --username <u> --password <p>
  [--method GET] [--path /] [--json]

Build the Authorization header that answers a challenge, without a network
round trip.`);
    return EXIT_OK;
  }

  const jsonMode = values.json ?? false;
  const challenge = required(io, values.challenge, 'challenge', jsonMode);
  const username = required(io, values.username, 'username', jsonMode);
  const password = required(io, values.password, 'password', jsonMode);
  const path = toHeaderText(values.path ?? '/');
  if (!path.startsWith('/')) exitUsage(io, '--path must start with "/"', jsonMode);

  const request: HttpRequest = {
    ...parseRequest('http://localhost/', { method: values.method }),
    path,
  };
  const offline = offlineChallenge(request, toHeaderText(challenge));
  const result = answerDigestChallenge(username, password, request, offline);
  if (!result.ok) exitDigestFailed(io, result.error, jsonMode);

  const header = fromHeaderText(lookupHeader(result.request.headers, AUTHORIZATION) ?? '');
  io.out(jsonMode ? JSON.stringify({ authorization: header }) : header);
  return EXIT_OK;
}

// ── Command: request ──────────────────────────────────────────────

async function cmdRequest(io: CliIo, argv: string[]): Promise<number> {
  const { values } = parseArgs({
    args: argv,
    options: {
      url: { type: 'string' },
      username: { type: 'string' },
      password: { type: 'string' },
      method: { type: 'string', default: 'GET' },
      socks: { type: 'string' },
      proxy: { type: 'string' },
      insecure: { type: 'boolean', default: false },
      debug: { type: 'boolean', default: false },
      json: { type: 'boolean', default: false },
      help: { type: 'boolean', default: false },
    },
    strict: true,
  });

  if (values.help) {
    io.out(`Usage: tls-digest request --url <url> --username <u> --password <p>
  [--method GET] [--socks host:port] [--proxy host:port]
  [--insecure] [--debug] [--json]

Probe the URL, answer its Digest challenge and send the request again.`);
    return EXIT_OK;
  }

  const jsonMode = values.json ?? false;
  const url = required(io, values.url, 'url', jsonMode);
  const username = required(io, values.username, 'username', jsonMode);
  const password = required(io, values.password, 'password', jsonMode);
  const socks = values.socks ? parseHostPort(io, values.socks, 'socks', jsonMode) : null;
  const proxy = values.proxy ? parseHostPort(io, values.proxy, 'proxy', jsonMode) : null;

  let request: HttpRequest;
  try {
    request = parseRequest(url, { method: values.method, proxy });
  } catch (err: unknown) {
    exitUsage(io, err instanceof Error ? err.message : String(err), jsonMode);
  }

  const manager = new Manager(mkManagerSettings({ rejectUnauthorized: !values.insecure }, socks));
  try {
    let result: DigestAuthResult;
    let trace: TraceStep[] | undefined;
    if (values.debug) {
      const debugResult = await applyDigestAuthDebug(username, password, request, manager);
      trace = debugResult.trace;
      result = debugResult;
      if (!jsonMode) {
        io.err(formatTrace(trace));
        io.err('');
      }
    } else {
      result = await applyDigestAuth(username, password, request, manager);
    }

    if (!result.ok) exitDigestFailed(io, result.error, jsonMode);

    const response = await manager.issue(result.request);
    const body = response.body.toString('utf8');
    if (jsonMode) {
      io.out(JSON.stringify({
        ok: true,
        status: response.status,
        statusMessage: response.statusMessage,
        body,
        trace,
      }));
    } else {
      io.out(`${response.status} ${response.statusMessage}`);
      if (body.length > 0) io.out(body);
    }
    return EXIT_OK;
  } catch (err: unknown) {
    if (err instanceof CliExit) throw err;
    exitError(io, err, jsonMode);
  } finally {
    await manager.close();
  }
}

// ── Command: version ──────────────────────────────────────────────

function cmdVersion(io: CliIo): number {
  io.out(`tls-digest-client v${SDK_VERSION}`);
  return EXIT_OK;
}

// ── Command: help ─────────────────────────────────────────────────

function cmdHelp(io: CliIo): number {
  io.out(`tls-digest-client v${SDK_VERSION}: HTTP Digest authentication over TLS and SOCKS

Commands:
  tls-digest parse      Split a Digest challenge into parameters
  tls-digest response   Compute a digest response value
  tls-digest header     Build the Authorization header for a challenge
  tls-digest request    Authenticate against a live server
  tls-digest version    Print the library version
  tls-digest help       Print this help message

Use "tls-digest <command> --help" for more information on a specific command.

Exit codes:
  0  Success
  1  Challenge could not be answered
  2  Usage error (missing args, unknown command)
  3  Connection or internal error`);
  return EXIT_OK;
}

// ── Main ──────────────────────────────────────────────────────────

function isParseArgsError(err: unknown): err is Error {
  return err instanceof Error && 'code' in err &&
    typeof err.code === 'string' && err.code.startsWith('ERR_PARSE_ARGS_');
}

async function dispatch(io: CliIo, args: string[]): Promise<number> {
  const command = args[0];
  const commandArgs = args.slice(1);

  if (!command || command === 'help' || command === '--help') {
    return cmdHelp(io);
  }

  switch (command) {
    case 'parse':
      return cmdParse(io, commandArgs);
    case 'response':
      return cmdResponse(io, commandArgs);
    case 'header':
      return cmdHeader(io, commandArgs);
    case 'request':
      return cmdRequest(io, commandArgs);
    case 'version':
    case '--version':
    case '-v':
      return cmdVersion(io);
    default:
      exitUsage(io, `Unknown command: ${command}`, args.includes('--json'));
  }
}

/**
 * Run the CLI with `args` (without the node and script paths).
 * Resolves to the process exit code.
 */
export async function runCli(args: string[], io: CliIo = processIo): Promise<number> {
  try {
    return await dispatch(io, args);
  } catch (err: unknown) {
    if (err instanceof CliExit) return err.exitCode;
    if (isParseArgsError(err)) {
      io.err(`Error: ${err.message}`);
      io.err('Run "tls-digest help" for usage information.');
      return EXIT_USAGE;
    }
    io.err(`Fatal: ${err instanceof Error ? err.message : String(err)}`);
    return EXIT_ERROR;
  }
}

function invokedDirectly(): boolean {
  const script = process.argv[1];
  if (script === undefined) return false;
  try {
    return import.meta.url === pathToFileURL(realpathSync(script)).href;
  } catch {
    return false;
  }
}

if (invokedDirectly()) {
  void runCli(process.argv.slice(2)).then((code) => {
    process.exitCode = code;
  });
}
