import { type Storage, StorageError } from '@davlane/core';

export interface Credentials {
  username: string;
  password: string;
}

export interface AuthFailure {
  ok: false;
  status: 400 | 401;
  message: string;
}

export type ParsedAuthorization = { ok: true; credentials: Credentials } | AuthFailure;

export type AuthOutcome = { ok: true; user: string } | AuthFailure;

const BASE64 = /^[A-Za-z0-9+/]+={0,2}$/;

const failure = (status: 400 | 401, message: string): AuthFailure => ({
  ok: false,
  status,
  message,
});

/** Decodes an HTTP Basic `Authorization` header. */
export function parseBasicAuth(header: string | undefined): ParsedAuthorization {
  if (!header) return failure(401, 'authentication required');

  const [scheme, token = ''] = header.trim().split(/\s+/, 2);
  if (scheme.toLowerCase() !== 'basic') {
    return failure(400, `unsupported authorization scheme: ${scheme}`);
  }
  if (!BASE64.test(token) || token.length % 4 !== 0) {
    return failure(400, 'malformed basic credentials');
  }

  const decoded = Buffer.from(token, 'base64').toString('utf8');
  const colon = decoded.indexOf(':');
  if (colon < 0) return failure(400, 'malformed basic credentials');

  return {
    ok: true,
    credentials: {
      username: decoded.slice(0, colon),
      password: decoded.slice(colon + 1),
    },
  };
}

export async function authenticate(
  header: string | undefined,
  storage: Pick<Storage, 'authUser'>,
): Promise<AuthOutcome> {
  const parsed = parseBasicAuth(header);
  if (!parsed.ok) return parsed;

  const { username, password } = parsed.credentials;
  if (!username) return failure(401, 'empty username');

  try {
    return { ok: true, user: await storage.authUser(username, password) };
  } catch (error) {
    if (error instanceof StorageError && error.kind === 'permission-denied') {
      return failure(401, 'invalid credentials');
    }
    throw error;
  }
}
