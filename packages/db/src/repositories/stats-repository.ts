import { type PoolClient } from 'pg';
import { type DirectoryStats, type StatsRepository } from '@tollgate/domain';
import { type TableNames } from '../tables';

type StatsRow = {
  applications: number;
  users: number;
  users_without_roles: number;
  roles: number;
  roles_without_permissions: number;
  grants: number;
  revoked_tokens: number;
};

export class PgStatsRepository implements StatsRepository<PoolClient> {
  constructor(private readonly tables: TableNames) {}

  async collect(client: PoolClient): Promise<DirectoryStats> {
    const t = this.tables;
    const result = await client.query<StatsRow>(
      `SELECT
         (SELECT COUNT(*)::int FROM ${t.applications}) AS applications,
         (SELECT COUNT(*)::int FROM ${t.users}) AS users,
         (SELECT COUNT(*)::int FROM ${t.users} u
            WHERE NOT EXISTS (
              SELECT 1 FROM ${t.grants} g
              WHERE g.application_id = u.application_id AND g.user_id = u.id
            )) AS users_without_roles,
         (SELECT COUNT(*)::int FROM ${t.roles}) AS roles,
         (SELECT COUNT(*)::int FROM ${t.roles} WHERE cardinality(permissions) = 0)
           AS roles_without_permissions,
         (SELECT COUNT(*)::int FROM ${t.grants}) AS grants,
         (SELECT COUNT(*)::int FROM ${t.revokedTokens}) AS revoked_tokens`,
    );
    const row = result.rows[0];
    return {
      applications: row.applications,
      users: row.users,
      usersWithoutRoles: row.users_without_roles,
      roles: row.roles,
      rolesWithoutPermissions: row.roles_without_permissions,
      grants: row.grants,
      revokedTokens: row.revoked_tokens,
    };
  }
}
