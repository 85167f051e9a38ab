import { randomUUID } from 'node:crypto';
import jwt from 'jsonwebtoken';
import type { JwtHeader } from 'jsonwebtoken';
import { z } from 'zod';

export const TOKEN_AUDIENCE = 'tableau';
export const TOKEN_ALGORITHM = 'HS256';
export const TOKEN_TTL_SECONDS = 5 * 60;
export const TOKEN_SCOPES = ['tableau:content:read', 'tableau:workbooks:create'] as const;

/** Identity used to sign connected-app tokens. */
export interface ConnectedAppCredentials {
  readonly clientId: string;
  readonly secretId: string;
  readonly secretValue: string;
  readonly username: string;
}

const claimsSchema = z.object({
  iss: z.string().min(1),
  sub: z.string().min(1),
  aud: z.literal(TOKEN_AUDIENCE),
  iat: z.number().int(),
  exp: z.number().int(),
  jti: z.string().uuid(),
  scp: z.array(z.string()),
});

export type ConnectedAppClaims = z.infer<typeof claimsSchema>;

/**
 * Signs a short-lived JWT for Tableau's connected-app sign-in.
 *
 * Every call gets a fresh `jti`, so a captured token cannot be replayed
 * once Tableau has seen it. The header repeats the issuer alongside
 * the key id, which is what Tableau uses to pick the secret.
 */
export function issueConnectedAppToken(
  credentials: ConnectedAppCredentials,
  now: Date = new Date(),
): string {
  const issuedAt = Math.floor(now.getTime() / 1000);

  const claims: ConnectedAppClaims = {
    iss: credentials.clientId,
    sub: credentials.username,
    aud: TOKEN_AUDIENCE,
    iat: issuedAt,
    exp: issuedAt + TOKEN_TTL_SECONDS,
    jti: randomUUID(),
    scp: [...TOKEN_SCOPES],
  };

  const header: JwtHeader & { iss: string } = {
    alg: TOKEN_ALGORITHM,
    kid: credentials.secretId,
    iss: credentials.clientId,
  };

  return jwt.sign(claims, credentials.secretValue, {
    algorithm: TOKEN_ALGORITHM,
    header,
  });
}

/**
 * Decodes and checks a token issued by {@link issueConnectedAppToken}.
 *
 * Throws a `jsonwebtoken` error on a bad signature, audience or expiry,
 * and a ZodError if the claims are not the connected-app shape.
 */
export function verifyConnectedAppToken(
  token: string,
  secret: string,
  now?: Date,
): ConnectedAppClaims {
  const decoded = jwt.verify(token, secret, {
    audience: TOKEN_AUDIENCE,
    algorithms: [TOKEN_ALGORITHM],
    ...(now ? { clockTimestamp: Math.floor(now.getTime() / 1000) } : {}),
  });

  return claimsSchema.parse(decoded);
}
