import {
  AuthzError,
  type Application,
  type ApplicationRepository,
  type DirectoryStats,
  type Grant,
  type GrantRepository,
  type RevokedToken,
  type RevokedTokenRepository,
  type Role,
  type RoleRepository,
  type StatsRepository,
  type TransactionRunner,
  type User,
  type UserRepository,
} from '@tollgate/domain';

interface MemoryState {
  applications: Map<string, Application>;
  users: Map<string, User>;
  roles: Map<string, Role>;
  grants: Map<string, Grant>;
  revokedTokens: Map<string, RevokedToken>;
}

/** Working copy of the store; committed only if the transaction body resolves. */
export interface MemoryTx {
  state: MemoryState;
  now: Date;
}

function emptyState(): MemoryState {
  return {
    applications: new Map(),
    users: new Map(),
    roles: new Map(),
    grants: new Map(),
    revokedTokens: new Map(),
  };
}

// Rows are replaced, never mutated, so copying the maps is enough.
function cloneState(state: MemoryState): MemoryState {
  return {
    applications: new Map(state.applications),
    users: new Map(state.users),
    roles: new Map(state.roles),
    grants: new Map(state.grants),
    revokedTokens: new Map(state.revokedTokens),
  };
}

const grantKey = (applicationId: string, userId: string, roleId: string): string =>
  `${applicationId}/${userId}/${roleId}`;

const copyRole = (role: Role): Role => ({ ...role, permissions: [...role.permissions] });

const byName = <T extends { name: string }>(a: T, b: T): number => a.name.localeCompare(b.name);

function dropApplicationRows<T extends { applicationId: string }>(
  table: Map<string, T>,
  applicationId: string,
): void {
  for (const [key, row] of table) {
    if (row.applicationId === applicationId) table.delete(key);
  }
}

function conflict(message: string): AuthzError {
  return new AuthzError('CONFLICT', message);
}

class MemoryApplicationRepository implements ApplicationRepository<MemoryTx> {
  async create(
    tx: MemoryTx,
    application: { id: string; name: string; description: string | null },
  ): Promise<Application> {
    for (const existing of tx.state.applications.values()) {
      if (existing.name === application.name) throw conflict('Record already exists');
    }
    const row: Application = { ...application, enabled: true, createdAt: tx.now, updatedAt: tx.now };
    tx.state.applications.set(row.id, row);
    return { ...row };
  }

  async findById(tx: MemoryTx, id: string): Promise<Application | null> {
    const row = tx.state.applications.get(id);
    return row ? { ...row } : null;
  }

  async findByName(tx: MemoryTx, name: string): Promise<Application | null> {
    for (const row of tx.state.applications.values()) {
      if (row.name === name) return { ...row };
    }
    return null;
  }

  async list(tx: MemoryTx): Promise<Application[]> {
    return [...tx.state.applications.values()].sort(byName).map((row) => ({ ...row }));
  }

  async update(
    tx: MemoryTx,
    id: string,
    changes: { name?: string; description?: string | null; enabled?: boolean },
  ): Promise<Application | null> {
    const row = tx.state.applications.get(id);
    if (!row) return null;
    const next: Application = {
      ...row,
      name: changes.name ?? row.name,
      description: changes.description === undefined ? row.description : changes.description,
      enabled: changes.enabled ?? row.enabled,
      updatedAt: tx.now,
    };
    tx.state.applications.set(id, next);
    return { ...next };
  }

  async delete(tx: MemoryTx, id: string): Promise<boolean> {
    if (!tx.state.applications.delete(id)) return false;
    dropApplicationRows(tx.state.users, id);
    dropApplicationRows(tx.state.roles, id);
    dropApplicationRows(tx.state.grants, id);
    return true;
  }
}

class MemoryUserRepository implements UserRepository<MemoryTx> {
  async create(
    tx: MemoryTx,
    user: { id: string; applicationId: string; login: string; passwordHash: string },
  ): Promise<User> {
    if (await this.findByLogin(tx, user.applicationId, user.login)) {
      throw conflict('Record already exists');
    }
    const row: User = { ...user, enabled: true, createdAt: tx.now, updatedAt: tx.now };
    tx.state.users.set(row.id, row);
    return { ...row };
  }

  async findById(tx: MemoryTx, applicationId: string, id: string): Promise<User | null> {
    const row = tx.state.users.get(id);
    return row && row.applicationId === applicationId ? { ...row } : null;
  }

  async findByLogin(tx: MemoryTx, applicationId: string, login: string): Promise<User | null> {
    for (const row of tx.state.users.values()) {
      if (row.applicationId === applicationId && row.login === login) return { ...row };
    }
    return null;
  }

  async listByApplication(tx: MemoryTx, applicationId: string): Promise<User[]> {
    return [...tx.state.users.values()]
      .filter((row) => row.applicationId === applicationId)
      .sort((a, b) => a.login.localeCompare(b.login))
      .map((row) => ({ ...row }));
  }

  async setEnabled(
    tx: MemoryTx,
    applicationId: string,
    id: string,
    enabled: boolean,
  ): Promise<User | null> {
    const row = await this.findById(tx, applicationId, id);
    if (!row) return null;
    const next: User = { ...row, enabled, updatedAt: tx.now };
    tx.state.users.set(id, next);
    return { ...next };
  }

  async updatePasswordHash(
    tx: MemoryTx,
    applicationId: string,
    id: string,
    passwordHash: string,
  ): Promise<boolean> {
    const row = await this.findById(tx, applicationId, id);
    if (!row) return false;
    tx.state.users.set(id, { ...row, passwordHash, updatedAt: tx.now });
    return true;
  }
}

class MemoryRoleRepository implements RoleRepository<MemoryTx> {
  async create(
    tx: MemoryTx,
    role: {
      id: string;
      applicationId: string;
      name: string;
      description: string | null;
      permissions: string[];
    },
  ): Promise<Role> {
    if (await this.findByName(tx, role.applicationId, role.name)) {
      throw conflict('Record already exists');
    }
    const row: Role = { ...role, permissions: [...role.permissions], createdAt: tx.now, updatedAt: tx.now };
    tx.state.roles.set(row.id, row);
    return copyRole(row);
  }

  async findById(tx: MemoryTx, applicationId: string, id: string): Promise<Role | null> {
    const row = tx.state.roles.get(id);
    return row && row.applicationId === applicationId ? copyRole(row) : null;
  }

  async findByName(tx: MemoryTx, applicationId: string, name: string): Promise<Role | null> {
    for (const row of tx.state.roles.values()) {
      if (row.applicationId === applicationId && row.name === name) return copyRole(row);
    }
    return null;
  }

  async findByIds(tx: MemoryTx, applicationId: string, ids: readonly string[]): Promise<Role[]> {
    const roles: Role[] = [];
    for (const id of ids) {
      const role = await this.findById(tx, applicationId, id);
      if (role) roles.push(role);
    }
    return roles;
  }

  async listByApplication(tx: MemoryTx, applicationId: string): Promise<Role[]> {
    return [...tx.state.roles.values()]
      .filter((row) => row.applicationId === applicationId)
      .sort(byName)
      .map(copyRole);
  }

  async update(
    tx: MemoryTx,
    applicationId: string,
    id: string,
    changes: { name?: string; description?: string | null; permissions?: string[] },
  ): Promise<Role | null> {
    const row = await this.findById(tx, applicationId, id);
    if (!row) return null;
    const next: Role = {
      ...row,
      name: changes.name ?? row.name,
      description: changes.description === undefined ? row.description : changes.description,
      permissions: changes.permissions ? [...changes.permissions] : row.permissions,
      updatedAt: tx.now,
    };
    tx.state.roles.set(id, next);
    return copyRole(next);
  }

  async delete(tx: MemoryTx, applicationId: string, id: string): Promise<boolean> {
    if (!(await this.findById(tx, applicationId, id))) return false;
    tx.state.roles.delete(id);
    for (const [key, grant] of tx.state.grants) {
      if (grant.applicationId === applicationId && grant.roleId === id) tx.state.grants.delete(key);
    }
    return true;
  }
}

class MemoryGrantRepository implements GrantRepository<MemoryTx> {
  async create(
    tx: MemoryTx,
    grant: { applicationId: string; userId: string; roleId: string },
  ): Promise<boolean> {
    const key = grantKey(grant.applicationId, grant.userId, grant.roleId);
    if (tx.state.grants.has(key)) return false;
    tx.state.grants.set(key, { ...grant, createdAt: tx.now });
    return true;
  }

  async delete(tx: MemoryTx, applicationId: string, userId: string, roleId: string): Promise<boolean> {
    return tx.state.grants.delete(grantKey(applicationId, userId, roleId));
  }

  async deleteByRole(tx: MemoryTx, applicationId: string, roleId: string): Promise<number> {
    return this.deleteWhere(tx, (g) => g.applicationId === applicationId && g.roleId === roleId);
  }

  async deleteByUser(tx: MemoryTx, applicationId: string, userId: string): Promise<number> {
    return this.deleteWhere(tx, (g) => g.applicationId === applicationId && g.userId === userId);
  }

  async listRolesForUser(tx: MemoryTx, applicationId: string, userId: string): Promise<Role[]> {
    const roles: Role[] = [];
    for (const grant of this.grantsOf(tx, applicationId, userId)) {
      const role = tx.state.roles.get(grant.roleId);
      if (role && role.applicationId === applicationId) roles.push(copyRole(role));
    }
    return roles.sort(byName);
  }

  private grantsOf(tx: MemoryTx, applicationId: string, userId: string): Grant[] {
    return [...tx.state.grants.values()].filter(
      (g) => g.applicationId === applicationId && g.userId === userId,
    );
  }

  private deleteWhere(tx: MemoryTx, match: (grant: Grant) => boolean): number {
    let count = 0;
    for (const [key, grant] of tx.state.grants) {
      if (match(grant)) {
        tx.state.grants.delete(key);
        count++;
      }
    }
    return count;
  }
}

class MemoryRevokedTokenRepository implements RevokedTokenRepository<MemoryTx> {
  async insert(tx: MemoryTx, token: RevokedToken): Promise<boolean> {
    if (tx.state.revokedTokens.has(token.jti)) return false;
    tx.state.revokedTokens.set(token.jti, { ...token });
    return true;
  }

  async isRevoked(tx: MemoryTx, jti: string): Promise<boolean> {
    return tx.state.revokedTokens.has(jti);
  }

  async deleteExpired(tx: MemoryTx, now: Date): Promise<number> {
    let count = 0;
    for (const [jti, row] of tx.state.revokedTokens) {
      if (row.expiresAt.getTime() <= now.getTime()) {
        tx.state.revokedTokens.delete(jti);
        count++;
      }
    }
    return count;
  }
}

class MemoryStatsRepository implements StatsRepository<MemoryTx> {
  async collect(tx: MemoryTx): Promise<DirectoryStats> {
    const { applications, users, roles, grants, revokedTokens } = tx.state;
    const usersWithGrants = new Set([...grants.values()].map((g) => g.userId));
    return {
      applications: applications.size,
      users: users.size,
      usersWithoutRoles: [...users.keys()].filter((id) => !usersWithGrants.has(id)).length,
      roles: roles.size,
      rolesWithoutPermissions: [...roles.values()].filter((r) => r.permissions.length === 0).length,
      grants: grants.size,
      revokedTokens: revokedTokens.size,
    };
  }
}

/**
 * Process-local store implementing every repository port. Transactions run
 * one at a time against a copy of the state and are not re-entrant.
 */
export class MemoryStore {
  readonly applications = new MemoryApplicationRepository();
  readonly users = new MemoryUserRepository();
  readonly roles = new MemoryRoleRepository();
  readonly grants = new MemoryGrantRepository();
  readonly revokedTokens = new MemoryRevokedTokenRepository();
  readonly stats = new MemoryStatsRepository();

  private state = emptyState();
  private queue: Promise<void> = Promise.resolve();

  constructor(private readonly now: () => Date = () => new Date()) {}

  readonly withTransaction: TransactionRunner<MemoryTx> = <T>(
    fn: (tx: MemoryTx) => Promise<T>,
  ): Promise<T> => {
    const run = this.queue.then(async () => {
      const tx: MemoryTx = { state: cloneState(this.state), now: this.now() };
      const result = await fn(tx);
      this.state = tx.state;
      return result;
    });
    // The queue only orders transactions; each caller still sees its own failure.
    this.queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  };
}
