import { type Role } from './user';

export type PermissionSet =
  | { kind: 'all' }
  | { kind: 'set'; permissions: ReadonlySet<string> };

export const ALL_PERMISSIONS: PermissionSet = { kind: 'all' };

/** Union of the permissions of every role, restricted to one application. */
export function collectPermissions(roles: readonly Role[], applicationId: string): PermissionSet {
  const permissions = new Set<string>();
  for (const role of roles) {
    if (role.applicationId !== applicationId) continue;
    for (const permission of role.permissions) {
      permissions.add(permission);
    }
  }
  return { kind: 'set', permissions };
}

export function hasPermission(set: PermissionSet, permission: string): boolean {
  if (set.kind === 'all') return true;
  return set.permissions.has(permission);
}

export function listPermissions(set: PermissionSet): string[] | '*' {
  if (set.kind === 'all') return '*';
  return [...set.permissions].sort();
}

/** Permissions checked by the directory routes, within the caller's application. */
export const DIRECTORY_PERMISSIONS = {
  USERS_READ: 'users:read',
  USERS_WRITE: 'users:write',
  ROLES_READ: 'roles:read',
  ROLES_WRITE: 'roles:write',
  GRANTS_READ: 'grants:read',
  GRANTS_WRITE: 'grants:write',
} as const;
