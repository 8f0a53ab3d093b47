/**
 * tls-digest-client: Express Integration Example
 *
 * Demonstrates the full client → server flow:
 *   1. Express answers an unauthenticated request with a Digest challenge
 *   2. applyDigestAuth probes the route and computes the Authorization header
 *   3. The client resends the authenticated request through the same Manager
 *   4. Express checks the response value and serves the resource
 *
 * Run:
 *   npx tsx examples/express-example.ts
 */

import express from 'express';
import crypto from 'node:crypto';
import type { AddressInfo } from 'node:net';
import {
  Manager,
  applyDigestAuth,
  computeDigestResponse,
  lookupChallengeParam,
  parseDigestChallenge,
  parseRequest,
  stripDigestPrefix,
  tlsManagerSettings,
} from 'tls-digest-client';

// ── Setup ───────────────────────────────────────────────────────

const REALM = 'example-realm';
const USERS = new Map([['alice', 'test-secret']]);

const app = express();

// Nonces the server has handed out and not yet seen used
const issuedNonces = new Set<string>();

function challenge(res: express.Response): void {
  const nonce = crypto.randomBytes(16).toString('hex');
  issuedNonces.add(nonce);
  res
    .status(401)
    .set('WWW-Authenticate', `Digest realm="${REALM}", nonce="${nonce}", qop="auth"`)
    .json({ error: 'authentication required' });
}

// ── Step 1: Digest check ────────────────────────────────────────

app.use('/api', (req, res, next) => {
  const params = stripDigestPrefix(req.get('authorization') ?? '');
  if (params === null) {
    challenge(res);
    return;
  }

  const fields = parseDigestChallenge(params);
  const username = lookupChallengeParam(fields, 'username') ?? '';
  const nonce = lookupChallengeParam(fields, 'nonce') ?? '';
  const password = USERS.get(username);

  if (password === undefined || !issuedNonces.has(nonce)) {
    challenge(res);
    return;
  }

  const expected = computeDigestResponse({
    username,
    password,
    realm: REALM,
    nonce,
    method: req.method,
    path: req.originalUrl.split('?')[0],
    qop: lookupChallengeParam(fields, 'qop') !== undefined,
  });

  if (lookupChallengeParam(fields, 'response') !== expected) {
    challenge(res);
    return;
  }

  issuedNonces.delete(nonce);
  next();
});

// ── Step 2: Protected route ─────────────────────────────────────

app.get('/api/profile', (_req, res) => {
  res.json({ user: 'alice', plan: 'pro' });
});

// ── Step 3: Client flow ─────────────────────────────────────────

function isAddressInfo(address: AddressInfo | string | null): address is AddressInfo {
  return typeof address === 'object' && address !== null;
}

async function main(): Promise<void> {
  const server = app.listen(0, '127.0.0.1');
  await new Promise<void>((resolve) => server.once('listening', () => resolve()));
  const address = server.address();
  if (!isAddressInfo(address)) throw new Error('server is not listening on a port');
  const { port } = address;

  const manager = new Manager(tlsManagerSettings());
  try {
    const request = parseRequest(`http://127.0.0.1:${port}/api/profile`);

    const result = await applyDigestAuth('alice', 'test-secret', request, manager);
    if (!result.ok) {
      console.error(`Digest negotiation failed: ${result.error.code}`);
      return;
    }

    const response = await manager.issue(result.request);
    console.log(`${response.status} ${response.statusMessage}`);
    console.log(response.body.toString('utf8'));
  } finally {
    await manager.close();
    server.close();
  }
}

main().catch((err: unknown) => {
  console.error(err);
  process.exitCode = 1;
});
