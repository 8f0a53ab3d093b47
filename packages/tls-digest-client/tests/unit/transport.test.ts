/**
 * Transport adapter tests against in-process TCP servers on 127.0.0.1.
 *
 * Coverage: AQ (plain, TLS and SOCKS connections, CONNECT request bytes,
 *               tunnel validation, TLS upgrade of a tunnel, session cache)
 *           PT (refused tunnels, proxies that hang up, refused connections,
 *               untrusted certificates, handshake timeouts)
 */
import { describe, it, expect, afterEach } from 'vitest';
import net from 'node:net';
import type { AddressInfo } from 'node:net';
import {
  Connection,
  buildConnectBytes,
  connectTo,
  connectViaProxyTunnel,
  initConnectionContext,
  validateTunnelResponse,
} from '../../src/transport.js';
import { HttpClientError, HttpClientErrorCode } from '../../src/errors.js';
import { TEST_CERT, connectProxy, listenOn, socks5Server, tlsEchoServer } from './servers.js';
import type { TestServer } from './servers.js';

const servers: net.Server[] = [];
const testServers: TestServer[] = [];

async function track(pending: Promise<TestServer>): Promise<TestServer> {
  const server = await pending;
  testServers.push(server);
  return server;
}

function isAddressInfo(address: AddressInfo | string | null): address is AddressInfo {
  return typeof address === 'object' && address !== null;
}

async function listen(onSocket: (socket: net.Socket) => void): Promise<number> {
  const server = net.createServer(onSocket);
  servers.push(server);
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const address = server.address();
  if (!isAddressInfo(address)) throw new Error('server has no port');
  return address.port;
}

/** A port nothing listens on. */
async function closedPort(): Promise<number> {
  const server = net.createServer();
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const address = server.address();
  if (!isAddressInfo(address)) throw new Error('server has no port');
  await new Promise<void>((resolve) => server.close(() => resolve()));
  return address.port;
}

/** Collect bytes until the end of an HTTP head, then answer with `reply`. */
function proxyReplying(reply: string, received: string[] = []): (socket: net.Socket) => void {
  return (socket) => {
    let head = '';
    socket.on('data', (chunk: Buffer) => {
      head += chunk.toString('latin1');
      if (head.includes('\r\n\r\n')) {
        received.push(head);
        socket.write(reply);
      }
    });
    socket.on('error', () => undefined);
  };
}

afterEach(async () => {
  await Promise.all(testServers.splice(0).map((server) => server.close()));
  const open = servers.splice(0);
  await Promise.all(open.map((server) => new Promise<void>((resolve) => {
    server.close(() => resolve());
  })));
});

async function rawConnection(port: number): Promise<Connection> {
  return connectTo(initConnectionContext(), { hostname: '127.0.0.1', port, secure: null, socks: null });
}

// ── AQ: CONNECT bytes ─────────────────────────────────────────────

describe('AQ: buildConnectBytes', () => {
  it('AQ-TR-001: request line and Host header', () => {
    expect(buildConnectBytes('example.com', 443).toString('latin1'))
      .toBe('CONNECT example.com:443 HTTP/1.1\r\nHost: example.com:443\r\n\r\n');
  });

  it('AQ-TR-002: IPv6 hosts are bracketed', () => {
    expect(buildConnectBytes('::1', 8443).toString('latin1'))
      .toBe('CONNECT [::1]:8443 HTTP/1.1\r\nHost: [::1]:8443\r\n\r\n');
  });

  it('AQ-TR-003: extra headers follow Host', () => {
    expect(buildConnectBytes('example.com', 443, [['Proxy-Authorization', 'Basic test-token']]).toString('latin1'))
      .toBe('CONNECT example.com:443 HTTP/1.1\r\nHost: example.com:443\r\nProxy-Authorization: Basic test-token\r\n\r\n');
  });
});

// ── AQ: Connections ───────────────────────────────────────────────

describe('AQ: connectTo', () => {
  it('AQ-TR-010: plain connection reads and writes', async () => {
    const port = await listen((socket) => {
      socket.on('data', (chunk: Buffer) => socket.write(chunk));
    });
    const connection = await rawConnection(port);

    await connection.write('ping');
    expect((await connection.read()).toString()).toBe('ping');
    connection.close();
  });

  it('AQ-TR-011: read returns an empty buffer once the peer closes', async () => {
    const port = await listen((socket) => {
      socket.end('bye');
    });
    const connection = await rawConnection(port);

    expect((await connection.read()).toString()).toBe('bye');
    expect((await connection.read()).length).toBe(0);
    connection.close();
  });

  it('PT-TR-001: refused connections reject with ECONNREFUSED', async () => {
    const port = await closedPort();
    await expect(rawConnection(port)).rejects.toMatchObject({ code: 'ECONNREFUSED' });
  });
});

// ── AQ: Tunnel validation ─────────────────────────────────────────

describe('AQ: validateTunnelResponse', () => {
  it('AQ-TR-020: a 200 reply is accepted and trailing bytes stay readable', async () => {
    const port = await listen(proxyReplying('HTTP/1.1 200 Connection established\r\n\r\nEXTRA'));
    const connection = await rawConnection(port);
    await connection.write(buildConnectBytes('example.com', 443));

    await validateTunnelResponse(connection);
    expect((await connection.read()).toString()).toBe('EXTRA');
    connection.close();
  });

  it('AQ-TR-021: any 2xx is accepted', async () => {
    const port = await listen(proxyReplying('HTTP/1.0 204 No Content\r\nVia: test\r\n\r\n'));
    const connection = await rawConnection(port);
    await connection.write(buildConnectBytes('example.com', 443));

    await expect(validateTunnelResponse(connection)).resolves.toBeUndefined();
    connection.close();
  });
});

// ── PT: Tunnel failures ───────────────────────────────────────────

describe('PT: validateTunnelResponse failures', () => {
  it('PT-TR-010: non-2xx status is refused with the status line', async () => {
    const port = await listen(proxyReplying('HTTP/1.1 407 Proxy Authentication Required\r\n\r\n'));
    const connection = await rawConnection(port);
    await connection.write(buildConnectBytes('example.com', 443));

    await expect(validateTunnelResponse(connection)).rejects.toMatchObject({
      code: HttpClientErrorCode.PROXY_TUNNEL_FAILED,
      message: 'Proxy refused CONNECT: HTTP/1.1 407 Proxy Authentication Required',
    });
    connection.close();
  });

  it('PT-TR-011: a malformed status line is refused', async () => {
    const port = await listen(proxyReplying('SSH-2.0-OpenSSH\r\n\r\n'));
    const connection = await rawConnection(port);
    await connection.write(buildConnectBytes('example.com', 443));

    await expect(validateTunnelResponse(connection)).rejects.toThrow('Proxy refused CONNECT: SSH-2.0-OpenSSH');
    connection.close();
  });

  it('PT-TR-012: a proxy that hangs up before answering', async () => {
    const port = await listen((socket) => {
      socket.end();
    });
    const connection = await rawConnection(port);

    await expect(validateTunnelResponse(connection))
      .rejects.toThrow('Proxy refused CONNECT: connection closed before a reply');
    connection.close();
  });
});

// ── PT: connectViaProxyTunnel ─────────────────────────────────────

describe('PT: connectViaProxyTunnel', () => {
  it('PT-TR-020: sends the CONNECT bytes and surfaces the refusal', async () => {
    const received: string[] = [];
    const port = await listen(proxyReplying('HTTP/1.1 403 Forbidden\r\n\r\n', received));
    const connectBytes = buildConnectBytes('example.com', 443);

    const attempt = connectViaProxyTunnel(initConnectionContext(), {
      connectBytes,
      validate: validateTunnelResponse,
      serverName: 'example.com',
      proxyHost: '127.0.0.1',
      proxyPort: port,
      tls: {},
    });

    await expect(attempt).rejects.toBeInstanceOf(HttpClientError);
    await expect(attempt).rejects.toThrow('Proxy refused CONNECT: HTTP/1.1 403 Forbidden');
    expect(received).toEqual([connectBytes.toString('latin1')]);
  });

  it('PT-TR-021: validator rejections propagate unchanged', async () => {
    const port = await listen(proxyReplying('HTTP/1.1 200 OK\r\n\r\n'));
    const rejection = new Error('validator said no');

    await expect(connectViaProxyTunnel(initConnectionContext(), {
      connectBytes: buildConnectBytes('example.com', 443),
      validate: async () => {
        throw rejection;
      },
      serverName: 'example.com',
      proxyHost: '127.0.0.1',
      proxyPort: port,
      tls: {},
    })).rejects.toBe(rejection);
  });
});

// ── AQ: TLS ───────────────────────────────────────────────────────

const TRUSTED = { ca: TEST_CERT, servername: 'localhost' };

describe('AQ: connectTo with TLS', () => {
  it('AQ-TR-030: a trusted certificate completes the handshake', async () => {
    const { port } = await track(tlsEchoServer());
    const connection = await connectTo(initConnectionContext(), {
      hostname: '127.0.0.1',
      port,
      secure: TRUSTED,
      socks: null,
    });

    await connection.write('over tls');
    expect((await connection.read()).toString()).toBe('over tls');
    connection.close();
  });

  it('AQ-TR-031: sessions are cached per host and port', async () => {
    const { port } = await track(tlsEchoServer());
    const context = initConnectionContext();
    const connection = await connectTo(context, { hostname: '127.0.0.1', port, secure: TRUSTED, socks: null });

    await connection.write('x');
    await connection.read();
    expect([...context.sessions.keys()]).toEqual([`127.0.0.1:${port}`]);
    connection.close();
  });

  it('AQ-TR-032: rejectUnauthorized: false accepts a self-signed certificate', async () => {
    const { port } = await track(tlsEchoServer());
    const connection = await connectTo(initConnectionContext(), {
      hostname: '127.0.0.1',
      port,
      secure: { rejectUnauthorized: false },
      socks: null,
    });

    await connection.write('unverified');
    expect((await connection.read()).toString()).toBe('unverified');
    connection.close();
  });
});

describe('PT: connectTo with TLS', () => {
  it('PT-TR-030: an untrusted certificate is refused', async () => {
    const { port } = await track(tlsEchoServer());
    await expect(connectTo(initConnectionContext(), {
      hostname: '127.0.0.1',
      port,
      secure: {},
      socks: null,
    })).rejects.toMatchObject({ code: 'DEPTH_ZERO_SELF_SIGNED_CERT' });
  });

  it('PT-TR-031: a handshake that never completes times out', async () => {
    const { port } = await track(listenOn(net.createServer(() => undefined)));
    await expect(connectTo(initConnectionContext({ connectTimeoutMs: 100 }), {
      hostname: '127.0.0.1',
      port,
      secure: TRUSTED,
      socks: null,
    })).rejects.toMatchObject({ code: 'ETIMEDOUT', message: 'Connection timed out after 100ms' });
  });
});

// ── AQ: Tunnel upgraded to TLS ────────────────────────────────────

describe('AQ: connectViaProxyTunnel', () => {
  it('AQ-TR-040: upgrades the tunnel to TLS after a 200', async () => {
    const target = await track(tlsEchoServer());
    const received: string[] = [];
    const proxy = await track(connectProxy(received));
    const connectBytes = buildConnectBytes('127.0.0.1', target.port);

    const connection = await connectViaProxyTunnel(initConnectionContext(), {
      connectBytes,
      validate: validateTunnelResponse,
      serverName: 'localhost',
      proxyHost: '127.0.0.1',
      proxyPort: proxy.port,
      tls: { ca: TEST_CERT },
    });

    await connection.write('through the tunnel');
    expect((await connection.read()).toString()).toBe('through the tunnel');
    expect(received).toEqual([connectBytes.toString('latin1')]);
    connection.close();
  });

  it('AQ-TR-041: tunnel sessions never share a key with direct connections', async () => {
    const target = await track(tlsEchoServer());
    const proxy = await track(connectProxy());
    const context = initConnectionContext();

    const connection = await connectViaProxyTunnel(context, {
      connectBytes: buildConnectBytes('127.0.0.1', target.port),
      validate: validateTunnelResponse,
      serverName: 'localhost',
      proxyHost: '127.0.0.1',
      proxyPort: proxy.port,
      tls: { ca: TEST_CERT },
    });
    await connection.write('x');
    await connection.read();

    expect([...context.sessions.keys()]).toEqual([
      `127.0.0.1:${proxy.port} CONNECT 127.0.0.1:${target.port} HTTP/1.1 localhost`,
    ]);
    connection.close();
  });
});

// ── AQ: SOCKS ─────────────────────────────────────────────────────

describe('AQ: connectTo through SOCKS5', () => {
  it('AQ-TR-050: plain connection through the proxy', async () => {
    const echo = await listen((socket) => {
      socket.on('data', (chunk: Buffer) => socket.write(chunk));
    });
    const targets: string[] = [];
    const socks = await track(socks5Server(targets));

    const connection = await connectTo(initConnectionContext(), {
      hostname: '127.0.0.1',
      port: echo,
      secure: null,
      socks: { host: '127.0.0.1', port: socks.port },
    });

    await connection.write('via socks');
    expect((await connection.read()).toString()).toBe('via socks');
    expect(targets).toEqual([`127.0.0.1:${echo}`]);
    connection.close();
  });

  it('AQ-TR-051: TLS on top of the SOCKS stream', async () => {
    const target = await track(tlsEchoServer());
    const socks = await track(socks5Server());

    const connection = await connectTo(initConnectionContext(), {
      hostname: '127.0.0.1',
      port: target.port,
      secure: TRUSTED,
      socks: { host: '127.0.0.1', port: socks.port },
    });

    await connection.write('socks and tls');
    expect((await connection.read()).toString()).toBe('socks and tls');
    connection.close();
  });
});
