import { describe, it, expect } from 'vitest';
import { AuthzError } from '@tollgate/domain';
import { translateDbError } from '../errors';

function driverError(code: string, extra: Record<string, string> = {}): Error {
  return Object.assign(new Error('driver failure'), { code }, extra);
}

describe('translateDbError', () => {
  it('maps unique violations to CONFLICT with the constraint name', () => {
    const err = translateDbError(driverError('23505', { constraint: 'tg_users_application_id_login_key' }));

    expect(err).toBeInstanceOf(AuthzError);
    expect(err).toMatchObject({
      kind: 'CONFLICT',
      safeMeta: { constraint: 'tg_users_application_id_login_key' },
    });
  });

  it.each(['08006', '08001', '57P01', '57P03', 'ECONNREFUSED', 'ECONNRESET', 'ETIMEDOUT'])(
    'maps %s to STORE_UNAVAILABLE',
    (code) => {
      expect(translateDbError(driverError(code))).toMatchObject({ kind: 'STORE_UNAVAILABLE' });
    },
  );

  it('passes other errors through unchanged', () => {
    const syntax = driverError('42601');
    const plain = new Error('boom');

    expect(translateDbError(syntax)).toBe(syntax);
    expect(translateDbError(plain)).toBe(plain);
  });

  it('leaves domain errors alone', () => {
    const domain = new AuthzError('NOT_FOUND', 'Role not found');
    expect(translateDbError(domain)).toBe(domain);
  });
});
