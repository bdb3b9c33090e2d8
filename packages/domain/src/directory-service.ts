import { normalizePermissions } from './auth';
import { AuthzError } from './errors';
import { type PermissionResolver } from './permission-resolver';
import {
  type ApplicationRepository,
  type GrantRepository,
  type PasswordHasher,
  type RoleRepository,
  type StatsRepository,
  type TransactionRunner,
  type UserRepository,
} from './ports';
import { type Application, type DirectoryStats, type Role, type User } from './user';

export interface DirectoryServiceDeps<TTx> {
  applicationRepo: ApplicationRepository<TTx>;
  userRepo: UserRepository<TTx>;
  roleRepo: RoleRepository<TTx>;
  grantRepo: GrantRepository<TTx>;
  statsRepo: StatsRepository<TTx>;
  passwordHasher: PasswordHasher;
  permissionResolver: PermissionResolver<TTx>;
  withTransaction: TransactionRunner<TTx>;
  generateId: () => string;
  /** Login held by the configured super-user; no tenant user may take it. */
  reservedLogin: string | null;
}

export type PublicUser = Omit<User, 'passwordHash'>;

export function toPublicUser(user: User): PublicUser {
  const { passwordHash: _omit, ...rest } = user;
  return rest;
}

/**
 * Management of applications, users, roles and grants. Every role or grant
 * mutation invalidates the resolver cache after its transaction commits.
 */
export class DirectoryService<TTx> {
  constructor(private readonly deps: DirectoryServiceDeps<TTx>) {}

  // Applications

  async createApplication(input: { name: string; description?: string | null }): Promise<Application> {
    const { applicationRepo, generateId } = this.deps;
    return this.deps.withTransaction(async (tx) => {
      const existing = await applicationRepo.findByName(tx, input.name);
      if (existing) {
        throw new AuthzError('CONFLICT', 'Application name is already taken', { field: 'name' });
      }
      return applicationRepo.create(tx, {
        id: generateId(),
        name: input.name,
        description: input.description ?? null,
      });
    });
  }

  async getApplication(applicationId: string): Promise<Application> {
    return this.deps.withTransaction((tx) => this.requireApplication(tx, applicationId));
  }

  async listApplications(): Promise<Application[]> {
    return this.deps.withTransaction((tx) => this.deps.applicationRepo.list(tx));
  }

  async updateApplication(
    applicationId: string,
    changes: { name?: string; description?: string | null; enabled?: boolean },
  ): Promise<Application> {
    const { applicationRepo } = this.deps;
    return this.deps.withTransaction(async (tx) => {
      if (changes.name !== undefined) {
        const clash = await applicationRepo.findByName(tx, changes.name);
        if (clash && clash.id !== applicationId) {
          throw new AuthzError('CONFLICT', 'Application name is already taken', { field: 'name' });
        }
      }
      const updated = await applicationRepo.update(tx, applicationId, changes);
      if (!updated) throw notFound('Application', applicationId);
      return updated;
    });
  }

  /** Deletes the application with its users, roles and grants. */
  async deleteApplication(applicationId: string): Promise<void> {
    const deleted = await this.deps.withTransaction((tx) =>
      this.deps.applicationRepo.delete(tx, applicationId),
    );
    if (!deleted) throw notFound('Application', applicationId);
    this.deps.permissionResolver.invalidateApplication(applicationId);
  }

  // Users

  async createUser(
    applicationId: string,
    input: { login: string; password: string },
  ): Promise<PublicUser> {
    const { userRepo, passwordHasher, generateId, reservedLogin } = this.deps;
    if (reservedLogin !== null && input.login === reservedLogin) {
      throw new AuthzError('CONFLICT', 'Login is not available', { field: 'login' });
    }

    const passwordHash = await passwordHasher.hash(input.password);

    return this.deps.withTransaction(async (tx) => {
      await this.requireApplication(tx, applicationId);
      const existing = await userRepo.findByLogin(tx, applicationId, input.login);
      if (existing) {
        throw new AuthzError('CONFLICT', 'Login is not available', { field: 'login' });
      }
      const user = await userRepo.create(tx, {
        id: generateId(),
        applicationId,
        login: input.login,
        passwordHash,
      });
      return toPublicUser(user);
    });
  }

  async getUser(applicationId: string, userId: string): Promise<PublicUser> {
    return this.deps.withTransaction(async (tx) =>
      toPublicUser(await this.requireUser(tx, applicationId, userId)),
    );
  }

  async listUsers(applicationId: string): Promise<PublicUser[]> {
    return this.deps.withTransaction(async (tx) => {
      await this.requireApplication(tx, applicationId);
      const users = await this.deps.userRepo.listByApplication(tx, applicationId);
      return users.map(toPublicUser);
    });
  }

  /** Applies both changes in one transaction; the new password is hashed before it opens. */
  async updateUser(
    applicationId: string,
    userId: string,
    changes: { enabled?: boolean; password?: string },
  ): Promise<PublicUser> {
    const { userRepo, passwordHasher } = this.deps;
    const passwordHash =
      changes.password === undefined ? undefined : await passwordHasher.hash(changes.password);

    return this.deps.withTransaction(async (tx) => {
      await this.requireUser(tx, applicationId, userId);
      if (passwordHash !== undefined) {
        await userRepo.updatePasswordHash(tx, applicationId, userId, passwordHash);
      }
      if (changes.enabled !== undefined) {
        await userRepo.setEnabled(tx, applicationId, userId, changes.enabled);
      }
      return toPublicUser(await this.requireUser(tx, applicationId, userId));
    });
  }

  // Roles

  async createRole(
    applicationId: string,
    input: { name: string; description?: string | null; permissions: readonly string[] },
  ): Promise<Role> {
    const permissions = requireValidPermissions(input.permissions);
    const { roleRepo, generateId } = this.deps;

    return this.deps.withTransaction(async (tx) => {
      await this.requireApplication(tx, applicationId);
      const existing = await roleRepo.findByName(tx, applicationId, input.name);
      if (existing) {
        throw new AuthzError('CONFLICT', 'Role name is already taken', { field: 'name' });
      }
      return roleRepo.create(tx, {
        id: generateId(),
        applicationId,
        name: input.name,
        description: input.description ?? null,
        permissions,
      });
    });
  }

  async getRole(applicationId: string, roleId: string): Promise<Role> {
    return this.deps.withTransaction((tx) => this.requireRole(tx, applicationId, roleId));
  }

  async listRoles(applicationId: string): Promise<Role[]> {
    return this.deps.withTransaction(async (tx) => {
      await this.requireApplication(tx, applicationId);
      return this.deps.roleRepo.listByApplication(tx, applicationId);
    });
  }

  async updateRole(
    applicationId: string,
    roleId: string,
    changes: { name?: string; description?: string | null; permissions?: readonly string[] },
  ): Promise<Role> {
    const { roleRepo } = this.deps;
    const permissions =
      changes.permissions === undefined ? undefined : requireValidPermissions(changes.permissions);

    const role = await this.deps.withTransaction(async (tx) => {
      if (changes.name !== undefined) {
        const clash = await roleRepo.findByName(tx, applicationId, changes.name);
        if (clash && clash.id !== roleId) {
          throw new AuthzError('CONFLICT', 'Role name is already taken', { field: 'name' });
        }
      }
      const updated = await roleRepo.update(tx, applicationId, roleId, {
        name: changes.name,
        description: changes.description,
        permissions,
      });
      if (!updated) throw notFound('Role', roleId);
      return updated;
    });

    this.deps.permissionResolver.invalidateApplication(applicationId);
    return role;
  }

  async deleteRole(applicationId: string, roleId: string): Promise<void> {
    const { roleRepo, grantRepo } = this.deps;
    await this.deps.withTransaction(async (tx) => {
      await this.requireRole(tx, applicationId, roleId);
      await grantRepo.deleteByRole(tx, applicationId, roleId);
      await roleRepo.delete(tx, applicationId, roleId);
    });
    this.deps.permissionResolver.invalidateApplication(applicationId);
  }

  // Grants

  async grantRole(applicationId: string, userId: string, roleId: string): Promise<Role[]> {
    const { grantRepo } = this.deps;
    const roles = await this.deps.withTransaction(async (tx) => {
      await this.requireUser(tx, applicationId, userId);
      await this.requireRole(tx, applicationId, roleId);
      const created = await grantRepo.create(tx, { applicationId, userId, roleId });
      if (!created) {
        throw new AuthzError('CONFLICT', 'Role is already granted to this user', { roleId, userId });
      }
      return grantRepo.listRolesForUser(tx, applicationId, userId);
    });
    this.deps.permissionResolver.invalidateUser(applicationId, userId);
    return roles;
  }

  async revokeRole(applicationId: string, userId: string, roleId: string): Promise<Role[]> {
    const { grantRepo } = this.deps;
    const roles = await this.deps.withTransaction(async (tx) => {
      const deleted = await grantRepo.delete(tx, applicationId, userId, roleId);
      if (!deleted) {
        throw new AuthzError('NOT_FOUND', 'Grant not found', { roleId, userId });
      }
      return grantRepo.listRolesForUser(tx, applicationId, userId);
    });
    this.deps.permissionResolver.invalidateUser(applicationId, userId);
    return roles;
  }

  async listUserRoles(applicationId: string, userId: string): Promise<Role[]> {
    return this.deps.withTransaction(async (tx) => {
      await this.requireUser(tx, applicationId, userId);
      return this.deps.grantRepo.listRolesForUser(tx, applicationId, userId);
    });
  }

  /** Replaces the user's whole role set; nothing changes if any role is unknown. */
  async replaceUserRoles(
    applicationId: string,
    userId: string,
    roleIds: readonly string[],
  ): Promise<Role[]> {
    const { roleRepo, grantRepo } = this.deps;
    const wanted = [...new Set(roleIds)];

    const roles = await this.deps.withTransaction(async (tx) => {
      await this.requireUser(tx, applicationId, userId);
      const found = await roleRepo.findByIds(tx, applicationId, wanted);
      const foundIds = new Set(found.map((r) => r.id));
      const missing = wanted.filter((id) => !foundIds.has(id));
      if (missing.length > 0) {
        throw new AuthzError('NOT_FOUND', 'Some roles do not exist', { missing });
      }

      await grantRepo.deleteByUser(tx, applicationId, userId);
      for (const roleId of wanted) {
        await grantRepo.create(tx, { applicationId, userId, roleId });
      }
      return grantRepo.listRolesForUser(tx, applicationId, userId);
    });

    this.deps.permissionResolver.invalidateUser(applicationId, userId);
    return roles;
  }

  async getStats(): Promise<DirectoryStats> {
    return this.deps.withTransaction((tx) => this.deps.statsRepo.collect(tx));
  }

  private async requireApplication(tx: TTx, applicationId: string): Promise<Application> {
    const application = await this.deps.applicationRepo.findById(tx, applicationId);
    if (!application) throw notFound('Application', applicationId);
    return application;
  }

  private async requireUser(tx: TTx, applicationId: string, userId: string): Promise<User> {
    const user = await this.deps.userRepo.findById(tx, applicationId, userId);
    if (!user) throw notFound('User', userId);
    return user;
  }

  private async requireRole(tx: TTx, applicationId: string, roleId: string): Promise<Role> {
    const role = await this.deps.roleRepo.findById(tx, applicationId, roleId);
    if (!role) throw notFound('Role', roleId);
    return role;
  }
}

function notFound(entity: 'Application' | 'User' | 'Role', id: string): AuthzError {
  return new AuthzError('NOT_FOUND', `${entity} not found`, { entity: entity.toLowerCase(), id });
}

function requireValidPermissions(permissions: readonly string[]): string[] {
  const result = normalizePermissions(permissions);
  if (!result.ok) {
    throw new AuthzError('VALIDATION', 'Permissions must look like resource:action', {
      invalid: result.invalid,
    });
  }
  return result.permissions;
}
