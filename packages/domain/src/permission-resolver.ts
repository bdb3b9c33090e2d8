import { isSuperUser } from './auth';
import { ALL_PERMISSIONS, collectPermissions, type PermissionSet } from './permissions';
import { type GrantRepository, type TransactionRunner } from './ports';

/**
 * Process-local cache of resolved permission sets.
 *
 * Contract: every committed role, grant or application mutation must call one of the
 * invalidate methods before the mutating call returns. Entries carry no TTL
 * and are only ever dropped by invalidation, so a missed call means a stale
 * grant. Other processes sharing the store are not notified.
 *
 * Every invalidation bumps `generation`. A set read from the store is only
 * stored if no invalidation happened since the caller took its generation.
 */
export class PermissionCache {
  private readonly entries = new Map<string, Map<string, PermissionSet>>();
  private currentGeneration = 0;

  get generation(): number {
    return this.currentGeneration;
  }

  get(applicationId: string, userId: string): PermissionSet | undefined {
    return this.entries.get(applicationId)?.get(userId);
  }

  /** Returns false and stores nothing when `generation` is no longer current. */
  set(applicationId: string, userId: string, set: PermissionSet, generation: number): boolean {
    if (generation !== this.currentGeneration) return false;
    let byUser = this.entries.get(applicationId);
    if (!byUser) {
      byUser = new Map();
      this.entries.set(applicationId, byUser);
    }
    byUser.set(userId, set);
    return true;
  }

  invalidateUser(applicationId: string, userId: string): void {
    this.currentGeneration++;
    this.entries.get(applicationId)?.delete(userId);
  }

  invalidateApplication(applicationId: string): void {
    this.currentGeneration++;
    this.entries.delete(applicationId);
  }

  get size(): number {
    let total = 0;
    for (const byUser of this.entries.values()) total += byUser.size;
    return total;
  }
}

export interface PermissionResolverDeps<TTx> {
  grantRepo: GrantRepository<TTx>;
  withTransaction: TransactionRunner<TTx>;
  cache?: PermissionCache;
}

export class PermissionResolver<TTx> {
  constructor(private readonly deps: PermissionResolverDeps<TTx>) {}

  async resolve(userId: string, applicationId: string): Promise<PermissionSet> {
    if (isSuperUser(userId)) return ALL_PERMISSIONS;

    const { cache } = this.deps;
    const cached = cache?.get(applicationId, userId);
    if (cached) return cached;

    // Taken before the read so an invalidation racing the read discards its result.
    const generation = cache?.generation ?? 0;
    const roles = await this.deps.withTransaction((tx) =>
      this.deps.grantRepo.listRolesForUser(tx, applicationId, userId),
    );
    const set = collectPermissions(roles, applicationId);
    cache?.set(applicationId, userId, set, generation);
    return set;
  }

  /** Current role names, re-read at refresh time. */
  async resolveRoleNames(userId: string, applicationId: string): Promise<string[]> {
    if (isSuperUser(userId)) return [];
    const roles = await this.deps.withTransaction((tx) =>
      this.deps.grantRepo.listRolesForUser(tx, applicationId, userId),
    );
    return roles.filter((r) => r.applicationId === applicationId).map((r) => r.name);
  }

  invalidateUser(applicationId: string, userId: string): void {
    this.deps.cache?.invalidateUser(applicationId, userId);
  }

  invalidateApplication(applicationId: string): void {
    this.deps.cache?.invalidateApplication(applicationId);
  }
}
