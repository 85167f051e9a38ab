import { describe, it, expect } from 'vitest';
import jwt from 'jsonwebtoken';
import { ZodError } from 'zod';
import {
  issueConnectedAppToken,
  verifyConnectedAppToken,
  TOKEN_TTL_SECONDS,
} from '../../src/application/connected-app-token.js';

const credentials = {
  clientId: 'client-123',
  secretId: 'secret-id-456',
  secretValue: 'test-secret',
  username: 'analyst@example.com',
};

const NOW = new Date('2026-03-01T10:00:00Z');
const NOW_SECONDS = Math.floor(NOW.getTime() / 1000);

describe('issueConnectedAppToken', () => {
  it.each([
    { username: 'analyst@example.com', clientId: 'client-123' },
    { username: 'ops', clientId: '7f3c2a10-5b4e-4d6f-9a81-0c2d3e4f5a6b' },
    { username: 'zoë.müller@example.de', clientId: 'client-äöü' },
    { username: '山田太郎', clientId: 'クライアント' },
    { username: 'first last+alerts@example.com', clientId: 'client with spaces' },
  ])('round-trips subject $username and issuer $clientId', ({ username, clientId }) => {
    const token = issueConnectedAppToken({ ...credentials, username, clientId });
    const claims = verifyConnectedAppToken(token, 'test-secret');

    expect(claims.sub).toBe(username);
    expect(claims.iss).toBe(clientId);
    expect(claims.aud).toBe('tableau');
    expect(claims.scp).toEqual(['tableau:content:read', 'tableau:workbooks:create']);
  });

  it('expires five minutes after issue', () => {
    const token = issueConnectedAppToken(credentials, NOW);
    const claims = verifyConnectedAppToken(token, 'test-secret', NOW);

    expect(TOKEN_TTL_SECONDS).toBe(300);
    expect(claims.iat).toBe(NOW_SECONDS);
    expect(claims.exp).toBe(NOW_SECONDS + 300);
  });

  it('puts alg, kid and iss in the header', () => {
    const token = issueConnectedAppToken(credentials, NOW);
    const decoded = jwt.decode(token, { complete: true });

    expect(decoded?.header).toEqual({
      alg: 'HS256',
      typ: 'JWT',
      kid: 'secret-id-456',
      iss: 'client-123',
    });
  });

  it('uses a fresh jti for every token', () => {
    const first = verifyConnectedAppToken(issueConnectedAppToken(credentials, NOW), 'test-secret', NOW);
    const second = verifyConnectedAppToken(issueConnectedAppToken(credentials, NOW), 'test-secret', NOW);

    expect(first.jti).not.toBe(second.jti);
  });

  it('gives later tokens a later expiry', () => {
    const later = new Date(NOW.getTime() + 60_000);
    const first = verifyConnectedAppToken(issueConnectedAppToken(credentials, NOW), 'test-secret', NOW);
    const second = verifyConnectedAppToken(issueConnectedAppToken(credentials, later), 'test-secret', later);

    expect(second.exp - first.exp).toBe(60);
  });
});

describe('verifyConnectedAppToken', () => {
  it('rejects a token signed with another secret', () => {
    const token = issueConnectedAppToken(credentials);

    expect(() => verifyConnectedAppToken(token, 'other-secret')).toThrow('invalid signature');
  });

  it('rejects a token for another audience', () => {
    const token = jwt.sign(
      { iss: 'client-123', sub: 'analyst@example.com', aud: 'elsewhere' },
      'test-secret',
      { algorithm: 'HS256', expiresIn: 300 },
    );

    expect(() => verifyConnectedAppToken(token, 'test-secret')).toThrow(jwt.JsonWebTokenError);
  });

  it('accepts a token just before expiry', () => {
    const token = issueConnectedAppToken(credentials, NOW);
    const almost = new Date(NOW.getTime() + 299_000);

    expect(() => verifyConnectedAppToken(token, 'test-secret', almost)).not.toThrow();
  });

  it('rejects an expired token', () => {
    const token = issueConnectedAppToken(credentials, NOW);
    const after = new Date(NOW.getTime() + 301_000);

    expect(() => verifyConnectedAppToken(token, 'test-secret', after)).toThrow(jwt.TokenExpiredError);
  });

  it('rejects claims that are not the connected-app shape', () => {
    const token = jwt.sign({ sub: 'analyst@example.com', aud: 'tableau' }, 'test-secret', {
      algorithm: 'HS256',
    });

    expect(() => verifyConnectedAppToken(token, 'test-secret')).toThrow(ZodError);
  });
});
