import { describe, it, expect } from 'vitest';
import {
  LoginSchema,
  PasswordSchema,
  LoginRequestSchema,
  RefreshRequestSchema,
  AuthorizeRequestSchema,
} from '../api/auth';

const APP_ID = '3f6c2a9e-8d1b-4c7a-9e2f-5b8d0c1a7e43';

describe('LoginSchema', () => {
  it('trims but keeps case', () => {
    expect(LoginSchema.parse('  Alice.Smith  ')).toBe('Alice.Smith');
  });

  it('rejects too short', () => {
    expect(() => LoginSchema.parse('ab')).toThrow();
  });

  it('rejects too long', () => {
    expect(() => LoginSchema.parse('a'.repeat(65))).toThrow();
  });

  it('rejects invalid characters', () => {
    expect(() => LoginSchema.parse('user name')).toThrow();
    expect(() => LoginSchema.parse('user!name')).toThrow();
  });

  it('accepts valid logins', () => {
    expect(LoginSchema.parse('alice')).toBe('alice');
    expect(LoginSchema.parse('alice@example.test')).toBe('alice@example.test');
    expect(LoginSchema.parse('user_name-1')).toBe('user_name-1');
  });
});

describe('PasswordSchema', () => {
  it('rejects too short', () => {
    expect(() => PasswordSchema.parse('short')).toThrow();
  });

  it('rejects too long', () => {
    expect(() => PasswordSchema.parse('a'.repeat(129))).toThrow();
  });

  it('accepts valid password', () => {
    expect(PasswordSchema.parse('securepassword123')).toBe('securepassword123');
  });
});

describe('LoginRequestSchema', () => {
  it('accepts credentials without applying creation rules', () => {
    const result = LoginRequestSchema.parse({ applicationId: APP_ID, login: 'ab', password: 'x' });
    expect(result).toEqual({ applicationId: APP_ID, login: 'ab', password: 'x' });
  });

  it('requires a UUID application id', () => {
    const result = LoginRequestSchema.safeParse({ applicationId: 'docs', login: 'alice', password: 'pw' });
    expect(result.success).toBe(false);
  });

  it('rejects an empty password', () => {
    expect(() => LoginRequestSchema.parse({ applicationId: APP_ID, login: 'alice', password: '' })).toThrow();
  });
});

describe('RefreshRequestSchema', () => {
  it('requires a refresh token', () => {
    expect(RefreshRequestSchema.safeParse({}).success).toBe(false);
    expect(RefreshRequestSchema.parse({ refreshToken: 'abc' })).toEqual({ refreshToken: 'abc' });
  });
});

describe('AuthorizeRequestSchema', () => {
  it('makes the target application optional', () => {
    expect(AuthorizeRequestSchema.parse({ permission: 'doc:read' })).toEqual({ permission: 'doc:read' });
    expect(AuthorizeRequestSchema.safeParse({ permission: 'doc:read', applicationId: 'x' }).success).toBe(false);
  });
});
