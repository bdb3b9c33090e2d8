import { AuthzError } from '@tollgate/domain';

const UNIQUE_VIOLATION = '23505';
const CONNECTION_CODES = new Set([
  '57P01', // admin_shutdown
  '57P02', // crash_shutdown
  '57P03', // cannot_connect_now
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
]);

function errorCode(err: unknown): string | null {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return null;
}

export function isConnectionError(err: unknown): boolean {
  const code = errorCode(err);
  if (code === null) return false;
  return code.startsWith('08') || CONNECTION_CODES.has(code);
}

/** Maps driver errors onto domain kinds; anything unrecognised is returned unchanged. */
export function translateDbError(err: unknown): unknown {
  if (err instanceof AuthzError) return err;
  const code = errorCode(err);
  if (code === UNIQUE_VIOLATION) {
    const constraint =
      err instanceof Error && 'constraint' in err && typeof err.constraint === 'string'
        ? err.constraint
        : undefined;
    return new AuthzError('CONFLICT', 'Record already exists', { constraint });
  }
  if (isConnectionError(err)) {
    return new AuthzError('STORE_UNAVAILABLE', 'Store unavailable', { code });
  }
  return err;
}
