export type AuthzErrorKind =
  | 'INVALID_CREDENTIALS'
  | 'TOKEN_INVALID'
  | 'PERMISSION_DENIED'
  | 'NOT_FOUND'
  | 'CONFLICT'
  | 'STORE_UNAVAILABLE'
  | 'VALIDATION';

export class AuthzError extends Error {
  constructor(
    public readonly kind: AuthzErrorKind,
    message: string,
    public readonly safeMeta: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = 'AuthzError';
  }
}

export function isAuthzError(err: unknown, kind?: AuthzErrorKind): err is AuthzError {
  return err instanceof AuthzError && (kind === undefined || err.kind === kind);
}
