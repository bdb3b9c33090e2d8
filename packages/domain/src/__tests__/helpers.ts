import { vi } from 'vitest';
import { type TokenClaims } from '../token';
import { type RevokedToken, type Role, type User, type Application } from '../user';
import { type Logger, type RevokedTokenRepository, type TokenSigner } from '../ports';

export function makeApplication(overrides: Partial<Application> = {}): Application {
  return {
    id: 'app-1',
    name: 'docs',
    description: null,
    enabled: true,
    createdAt: new Date('2026-01-01'),
    updatedAt: new Date('2026-01-01'),
    ...overrides,
  };
}

export function makeUser(overrides: Partial<User> = {}): User {
  return {
    id: 'user-1',
    applicationId: 'app-1',
    login: 'u1',
    passwordHash: 'hashed:correct-pw',
    enabled: true,
    createdAt: new Date('2026-01-01'),
    updatedAt: new Date('2026-01-01'),
    ...overrides,
  };
}

export function makeRole(overrides: Partial<Role> = {}): Role {
  return {
    id: 'role-1',
    applicationId: 'app-1',
    name: 'editor',
    description: null,
    permissions: ['doc:read', 'doc:write'],
    createdAt: new Date('2026-01-01'),
    updatedAt: new Date('2026-01-01'),
    ...overrides,
  };
}

/** Unsigned stand-in: the token is the JSON payload, prefixed so tampering is detectable. */
export function createFakeSigner(): TokenSigner {
  return {
    sign: vi.fn(async (claims: TokenClaims) => `fake.${Buffer.from(JSON.stringify(claims)).toString('base64url')}`),
    verify: vi.fn(async (token: string) => {
      const [prefix, body] = token.split('.');
      if (prefix !== 'fake' || !body) throw new Error('bad signature');
      const claims: TokenClaims = JSON.parse(Buffer.from(body, 'base64url').toString('utf8'));
      return claims;
    }),
  };
}

export function createRevocationRepo(): RevokedTokenRepository<unknown> & { rows: Map<string, RevokedToken> } {
  const rows = new Map<string, RevokedToken>();
  return {
    rows,
    insert: vi.fn(async (_tx: unknown, token: RevokedToken) => {
      if (rows.has(token.jti)) return false;
      rows.set(token.jti, token);
      return true;
    }),
    isRevoked: vi.fn(async (_tx: unknown, jti: string) => rows.has(jti)),
    deleteExpired: vi.fn(async (_tx: unknown, now: Date) => {
      let count = 0;
      for (const [jti, row] of rows) {
        if (row.expiresAt.getTime() <= now.getTime()) {
          rows.delete(jti);
          count++;
        }
      }
      return count;
    }),
  };
}

export function createLogger(): Logger {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
}

export const runInline = async <T>(fn: (tx: unknown) => Promise<T>): Promise<T> => fn({});

export function sequentialIds(prefix = 'id'): () => string {
  let counter = 0;
  return () => `${prefix}-${++counter}`;
}
