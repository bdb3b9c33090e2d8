import { type AuthzError, type AuthzErrorKind } from '@tollgate/domain';

export enum ErrorCode {
  INTERNAL = 'INTERNAL',
  NOT_FOUND = 'NOT_FOUND',
  UNAUTHORIZED = 'UNAUTHORIZED',
  FORBIDDEN = 'FORBIDDEN',
  VALIDATION = 'VALIDATION',
  RATE_LIMITED = 'RATE_LIMITED',
  CONFLICT = 'CONFLICT',
  BAD_REQUEST = 'BAD_REQUEST',
  UNAVAILABLE = 'UNAVAILABLE',
}

const HTTP_STATUS_MAP: Record<ErrorCode, number> = {
  [ErrorCode.INTERNAL]: 500,
  [ErrorCode.NOT_FOUND]: 404,
  [ErrorCode.UNAUTHORIZED]: 401,
  [ErrorCode.FORBIDDEN]: 403,
  [ErrorCode.VALIDATION]: 422,
  [ErrorCode.RATE_LIMITED]: 429,
  [ErrorCode.CONFLICT]: 409,
  [ErrorCode.BAD_REQUEST]: 400,
  [ErrorCode.UNAVAILABLE]: 503,
};

// Bad credentials and bad tokens share one code so callers cannot tell them apart.
const KIND_TO_CODE: Record<AuthzErrorKind, ErrorCode> = {
  INVALID_CREDENTIALS: ErrorCode.UNAUTHORIZED,
  TOKEN_INVALID: ErrorCode.UNAUTHORIZED,
  PERMISSION_DENIED: ErrorCode.FORBIDDEN,
  NOT_FOUND: ErrorCode.NOT_FOUND,
  CONFLICT: ErrorCode.CONFLICT,
  VALIDATION: ErrorCode.VALIDATION,
  STORE_UNAVAILABLE: ErrorCode.UNAVAILABLE,
};

// Keys of a domain error's metadata that may reach a response body.
const PUBLIC_META_KEYS: readonly string[] = ['traceId', 'entity', 'id', 'field', 'invalid', 'missing'];

export interface AppErrorBody {
  code: ErrorCode;
  message: string;
  [key: string]: unknown;
}

/** Error carrying a transport code; `safeMeta` is serialized as-is. */
export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly httpStatus: number;
  public readonly safeMeta: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, safeMeta: Record<string, unknown> = {}) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.httpStatus = HTTP_STATUS_MAP[code];
    this.safeMeta = safeMeta;
  }

  /** Maps a domain error by kind, keeping only the public metadata keys. */
  static fromAuthzError(err: AuthzError): AppError {
    const publicMeta: Record<string, unknown> = {};
    for (const key of PUBLIC_META_KEYS) {
      if (err.safeMeta[key] !== undefined) publicMeta[key] = err.safeMeta[key];
    }
    return new AppError(KIND_TO_CODE[err.kind], err.message, publicMeta);
  }

  toJSON(): AppErrorBody {
    return {
      ...this.safeMeta,
      code: this.code,
      message: this.message,
    };
  }
}
