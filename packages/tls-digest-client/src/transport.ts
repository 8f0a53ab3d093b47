/**
 * Transport adapter: opens the byte streams the HTTP engine writes to.
 *
 * Plain TCP, TLS, SOCKS (optionally with TLS on top) and HTTP CONNECT
 * tunnels upgraded to TLS in place. TLS itself is node:tls; SOCKS is the
 * `socks` package.
 */
import net from 'node:net';
import tls from 'node:tls';
import { SocksClient } from 'socks';
import { DEFAULT_CONNECT_TIMEOUT_MS, MAX_TUNNEL_RESPONSE_BYTES } from './constants.js';
import { HttpClientError } from './errors.js';

// ── Types ──────────────────────────────────────────────────────────

export interface TlsSettings {
  /** Verify the server certificate. Default: true */
  rejectUnauthorized?: boolean;
  /** Extra trusted CA certificates (PEM). */
  ca?: string | Buffer | Array<string | Buffer>;
  minVersion?: tls.SecureVersion;
  /** SNI name when it differs from the host connected to. */
  servername?: string;
}

export interface SocksSettings {
  host: string;
  port: number;
  /** Default: 5 */
  type?: 4 | 5;
  userId?: string;
  password?: string;
}

/**
 * State shared by every connection opened through one settings bundle.
 * Holds TLS sessions so reconnects to the same server can resume.
 */
export interface ConnectionContext {
  readonly sessions: Map<string, Buffer>;
  readonly connectTimeoutMs: number;
}

export interface ConnectionParams {
  hostname: string;
  port: number;
  /** TLS settings, or null for a plain connection. */
  secure: TlsSettings | null;
  socks: SocksSettings | null;
}

export interface ProxyTunnelParams {
  /** Bytes written to the proxy before anything else (the CONNECT request). */
  connectBytes: Uint8Array;
  /** Inspects the proxy's reply. A rejection aborts the connection. */
  validate: (connection: Connection) => Promise<void>;
  /** SNI name for the TLS upgrade. */
  serverName: string;
  proxyHost: string;
  proxyPort: number;
  tls: TlsSettings;
}

// ── Connection ─────────────────────────────────────────────────────

const EMPTY = Buffer.alloc(0);

/**
 * A live duplex byte stream. `socket` is what the HTTP engine drives;
 * read/write are for handshakes that happen before it takes over.
 */
export class Connection {
  readonly socket: net.Socket;

  constructor(socket: net.Socket) {
    this.socket = socket;
  }

  /** Next available chunk, or an empty buffer once the peer has closed. */
  read(): Promise<Buffer> {
    const socket = this.socket;
    return new Promise((resolve, reject) => {
      const take = (): boolean => {
        const chunk: unknown = socket.read();
        if (Buffer.isBuffer(chunk)) {
          cleanup();
          resolve(chunk);
          return true;
        }
        return false;
      };
      const onEnd = () => {
        cleanup();
        resolve(EMPTY);
      };
      const onError = (err: Error) => {
        cleanup();
        reject(err);
      };
      const onReadable = () => {
        take();
      };
      const cleanup = () => {
        socket.off('readable', onReadable);
        socket.off('end', onEnd);
        socket.off('close', onEnd);
        socket.off('error', onError);
      };

      socket.on('readable', onReadable);
      socket.on('end', onEnd);
      socket.on('close', onEnd);
      socket.on('error', onError);

      if (!take() && (socket.readableEnded || socket.destroyed)) onEnd();
    });
  }

  write(bytes: Uint8Array | string): Promise<void> {
    return new Promise((resolve, reject) => {
      this.socket.write(bytes, (err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  /**
   * Close the stream. A TLS close writes to the socket, which may already be
   * gone; errors from that are ignored.
   */
  close(): void {
    this.socket.on('error', () => undefined);
    this.socket.destroy();
  }
}

// ── Helpers ────────────────────────────────────────────────────────

function sessionKey(hostname: string, port: number): string {
  return `${hostname}:${port}`;
}

/** Per proxy, tunnel target and server name. Never equal to a direct key. */
function tunnelSessionKey(params: ProxyTunnelParams): string {
  const head = Buffer.from(params.connectBytes).toString('latin1');
  const requestLine = head.split('\r\n', 1)[0];
  return `${params.proxyHost}:${params.proxyPort} ${requestLine} ${params.serverName}`;
}

/**
 * Resolve once `event` fires, reject on error or after `timeoutMs`.
 */
function waitForSocket(socket: net.Socket, event: 'connect' | 'secureConnect', timeoutMs: number): Promise<void> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => {
      cleanup();
      socket.destroy();
      reject(Object.assign(new Error(`Connection timed out after ${timeoutMs}ms`), { code: 'ETIMEDOUT' }));
    }, timeoutMs);
    timer.unref();

    const onReady = () => {
      cleanup();
      resolve();
    };
    const onError = (err: Error) => {
      cleanup();
      reject(err);
    };
    const cleanup = () => {
      clearTimeout(timer);
      socket.off(event, onReady);
      socket.off('error', onError);
    };

    socket.once(event, onReady);
    socket.once('error', onError);
  });
}

async function openTcp(context: ConnectionContext, hostname: string, port: number): Promise<net.Socket> {
  const socket = net.connect({ host: hostname, port });
  await waitForSocket(socket, 'connect', context.connectTimeoutMs);
  return socket;
}

async function openSocks(
  context: ConnectionContext,
  socks: SocksSettings,
  hostname: string,
  port: number,
): Promise<net.Socket> {
  const { socket } = await SocksClient.createConnection({
    proxy: {
      host: socks.host,
      port: socks.port,
      type: socks.type ?? 5,
      userId: socks.userId,
      password: socks.password,
    },
    command: 'connect',
    destination: { host: hostname, port },
    timeout: context.connectTimeoutMs,
  });
  return socket;
}

async function startTls(
  context: ConnectionContext,
  socket: net.Socket,
  hostname: string,
  key: string,
  settings: TlsSettings,
): Promise<tls.TLSSocket> {
  const servername = settings.servername ?? hostname;
  const secure = tls.connect({
    socket,
    servername: net.isIP(servername) === 0 ? servername : undefined,
    rejectUnauthorized: settings.rejectUnauthorized ?? true,
    ca: settings.ca,
    minVersion: settings.minVersion,
    session: context.sessions.get(key),
  });
  secure.on('session', (session: Buffer) => {
    context.sessions.set(key, session);
  });
  await waitForSocket(secure, 'secureConnect', context.connectTimeoutMs);
  return secure;
}

// ── Public API ─────────────────────────────────────────────────────

export function initConnectionContext(options?: { connectTimeoutMs?: number }): ConnectionContext {
  return {
    sessions: new Map(),
    connectTimeoutMs: options?.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS,
  };
}

/**
 * Open a connection to `hostname:port`, through SOCKS when `socks` is set,
 * with TLS on top when `secure` is set.
 */
export async function connectTo(context: ConnectionContext, params: ConnectionParams): Promise<Connection> {
  const socket = params.socks
    ? await openSocks(context, params.socks, params.hostname, params.port)
    : await openTcp(context, params.hostname, params.port);

  if (!params.secure) return new Connection(socket);

  try {
    return new Connection(await startTls(
      context, socket, params.hostname, sessionKey(params.hostname, params.port), params.secure,
    ));
  } catch (err) {
    socket.destroy();
    throw err;
  }
}

/**
 * Open a TLS connection through an HTTP proxy.
 *
 * 1. TCP to the proxy
 * 2. Write `connectBytes`
 * 3. Let `validate` read the proxy's reply
 * 4. Upgrade the same stream to TLS with `serverName` as SNI
 */
export async function connectViaProxyTunnel(
  context: ConnectionContext,
  params: ProxyTunnelParams,
): Promise<Connection> {
  const socket = await openTcp(context, params.proxyHost, params.proxyPort);
  const raw = new Connection(socket);

  try {
    await raw.write(params.connectBytes);
    await params.validate(raw);
    const secure = await startTls(context, socket, params.serverName, tunnelSessionKey(params), {
      ...params.tls,
      servername: params.tls.servername ?? params.serverName,
    });
    return new Connection(secure);
  } catch (err) {
    raw.close();
    throw err;
  }
}

// ── CONNECT handshake ─────────────────────────────────────────────

/** The request line and headers that open a tunnel to `host:port`. */
export function buildConnectBytes(host: string, port: number, headers?: readonly (readonly [string, string])[]): Buffer {
  const authority = host.includes(':') ? `[${host}]:${port}` : `${host}:${port}`;
  let head = `CONNECT ${authority} HTTP/1.1\r\nHost: ${authority}\r\n`;
  for (const [name, value] of headers ?? []) {
    head += `${name}: ${value}\r\n`;
  }
  head += '\r\n';
  return Buffer.from(head, 'latin1');
}

/**
 * Default tunnel validator: read the proxy's reply head and accept any 2xx.
 *
 * @throws HttpClientError(PROXY_TUNNEL_FAILED) on another status, a malformed
 *   reply, or a proxy that closes before answering.
 */
export async function validateTunnelResponse(connection: Connection): Promise<void> {
  let head = EMPTY;
  let end = -1;

  while (end === -1) {
    const chunk = await connection.read();
    if (chunk.length === 0) {
      throw HttpClientError.proxyTunnelFailed('connection closed before a reply');
    }
    head = Buffer.concat([head, chunk]);
    end = head.indexOf('\r\n\r\n');
    if (end === -1 && head.length > MAX_TUNNEL_RESPONSE_BYTES) {
      throw HttpClientError.proxyTunnelFailed('reply head too large');
    }
  }

  // Anything past the head already belongs to the tunnelled stream.
  const extra = head.subarray(end + 4);
  if (extra.length > 0) connection.socket.unshift(extra);

  const statusLine = head.subarray(0, head.indexOf('\r\n')).toString('latin1');
  const match = /^HTTP\/1\.[01] (\d{3})/.exec(statusLine);
  if (!match || !match[1].startsWith('2')) {
    throw HttpClientError.proxyTunnelFailed(statusLine);
  }
}
