import { type Application, type User } from './user';

/**
 * Subject of the configured super-user. Real subjects are UUIDs, so this
 * value can never collide with a stored user.
 */
export const SUPER_USER_ID = 'super-user';

const PERMISSION_REGEX = /^[A-Za-z0-9_.-]+:[A-Za-z0-9_.*-]+$/;

export function isSuperUser(subject: string): boolean {
  return subject === SUPER_USER_ID;
}

export function isTokenExpired(expSeconds: number, now: Date): boolean {
  return expSeconds * 1000 <= now.getTime();
}

export function toEpochSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

export function isValidPermission(permission: string): boolean {
  return PERMISSION_REGEX.test(permission);
}

/**
 * Keeps the first occurrence of each permission, in input order.
 * Returns the offending entries instead of a list when any is malformed.
 */
export function normalizePermissions(
  permissions: readonly string[],
): { ok: true; permissions: string[] } | { ok: false; invalid: string[] } {
  const invalid = permissions.filter((p) => !isValidPermission(p));
  if (invalid.length > 0) return { ok: false, invalid };
  return { ok: true, permissions: [...new Set(permissions)] };
}

export function canLogin(user: User | null, application: Application | null): boolean {
  return user !== null && user.enabled && application !== null && application.enabled;
}
