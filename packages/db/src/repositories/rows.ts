import { type Application, type Role, type User } from '@tollgate/domain';

export type ApplicationRow = {
  id: string;
  name: string;
  description: string | null;
  enabled: boolean;
  created_at: Date;
  updated_at: Date;
};

export type UserRow = {
  id: string;
  application_id: string;
  login: string;
  password_hash: string;
  enabled: boolean;
  created_at: Date;
  updated_at: Date;
};

export type RoleRow = {
  id: string;
  application_id: string;
  name: string;
  description: string | null;
  permissions: string[];
  created_at: Date;
  updated_at: Date;
};

export const APPLICATION_COLUMNS = 'id, name, description, enabled, created_at, updated_at';
export const USER_COLUMNS =
  'id, application_id, login, password_hash, enabled, created_at, updated_at';
export const ROLE_COLUMNS =
  'id, application_id, name, description, permissions, created_at, updated_at';

export function mapApplicationRow(row: ApplicationRow): Application {
  return {
    id: row.id,
    name: row.name,
    description: row.description,
    enabled: row.enabled,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export function mapUserRow(row: UserRow): User {
  return {
    id: row.id,
    applicationId: row.application_id,
    login: row.login,
    passwordHash: row.password_hash,
    enabled: row.enabled,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export function mapRoleRow(row: RoleRow): Role {
  return {
    id: row.id,
    applicationId: row.application_id,
    name: row.name,
    description: row.description,
    permissions: row.permissions,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}
