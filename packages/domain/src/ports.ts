import {
  type Application,
  type User,
  type Role,
  type RevokedToken,
  type DirectoryStats,
} from './user';
import { type TokenClaims } from './token';

export type TransactionRunner<TTx> = <T>(fn: (tx: TTx) => Promise<T>) => Promise<T>;

export interface ApplicationRepository<TTx> {
  create(
    tx: TTx,
    application: { id: string; name: string; description: string | null },
  ): Promise<Application>;
  findById(tx: TTx, id: string): Promise<Application | null>;
  findByName(tx: TTx, name: string): Promise<Application | null>;
  list(tx: TTx): Promise<Application[]>;
  update(
    tx: TTx,
    id: string,
    changes: { name?: string; description?: string | null; enabled?: boolean },
  ): Promise<Application | null>;
  /** Removes the application with its users, roles and grants. */
  delete(tx: TTx, id: string): Promise<boolean>;
}

export interface UserRepository<TTx> {
  create(
    tx: TTx,
    user: { id: string; applicationId: string; login: string; passwordHash: string },
  ): Promise<User>;
  findById(tx: TTx, applicationId: string, id: string): Promise<User | null>;
  findByLogin(tx: TTx, applicationId: string, login: string): Promise<User | null>;
  listByApplication(tx: TTx, applicationId: string): Promise<User[]>;
  setEnabled(tx: TTx, applicationId: string, id: string, enabled: boolean): Promise<User | null>;
  updatePasswordHash(
    tx: TTx,
    applicationId: string,
    id: string,
    passwordHash: string,
  ): Promise<boolean>;
}

export interface RoleRepository<TTx> {
  create(
    tx: TTx,
    role: {
      id: string;
      applicationId: string;
      name: string;
      description: string | null;
      permissions: string[];
    },
  ): Promise<Role>;
  findById(tx: TTx, applicationId: string, id: string): Promise<Role | null>;
  findByName(tx: TTx, applicationId: string, name: string): Promise<Role | null>;
  findByIds(tx: TTx, applicationId: string, ids: readonly string[]): Promise<Role[]>;
  listByApplication(tx: TTx, applicationId: string): Promise<Role[]>;
  update(
    tx: TTx,
    applicationId: string,
    id: string,
    changes: { name?: string; description?: string | null; permissions?: string[] },
  ): Promise<Role | null>;
  delete(tx: TTx, applicationId: string, id: string): Promise<boolean>;
}

export interface GrantRepository<TTx> {
  /** Returns false when the (user, role) pair already exists. */
  create(tx: TTx, grant: { applicationId: string; userId: string; roleId: string }): Promise<boolean>;
  delete(tx: TTx, applicationId: string, userId: string, roleId: string): Promise<boolean>;
  deleteByRole(tx: TTx, applicationId: string, roleId: string): Promise<number>;
  deleteByUser(tx: TTx, applicationId: string, userId: string): Promise<number>;
  /** Roles granted to the user, joined within the same application only. */
  listRolesForUser(tx: TTx, applicationId: string, userId: string): Promise<Role[]>;
}

export interface RevokedTokenRepository<TTx> {
  /** Idempotent insert; true only when this call created the row. */
  insert(tx: TTx, token: RevokedToken): Promise<boolean>;
  isRevoked(tx: TTx, jti: string): Promise<boolean>;
  deleteExpired(tx: TTx, now: Date): Promise<number>;
}

export interface StatsRepository<TTx> {
  collect(tx: TTx): Promise<DirectoryStats>;
}

export interface PasswordHasher {
  hash(password: string): Promise<string>;
  verify(password: string, hash: string): Promise<boolean>;
}

export interface TokenSigner {
  sign(claims: TokenClaims): Promise<string>;
  /** Verifies signature and payload shape; expiry and revocation are the engine's concern. */
  verify(token: string): Promise<TokenClaims>;
}

export interface Logger {
  info(meta: Record<string, unknown>, msg: string): void;
  warn(meta: Record<string, unknown>, msg: string): void;
  error(meta: Record<string, unknown>, msg: string): void;
  debug(meta: Record<string, unknown>, msg: string): void;
}
