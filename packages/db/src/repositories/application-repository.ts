import { type PoolClient } from 'pg';
import { type Application, type ApplicationRepository } from '@tollgate/domain';
import { type TableNames } from '../tables';
import { APPLICATION_COLUMNS, mapApplicationRow, type ApplicationRow } from './rows';

export class PgApplicationRepository implements ApplicationRepository<PoolClient> {
  constructor(private readonly tables: TableNames) {}

  async create(
    client: PoolClient,
    application: { id: string; name: string; description: string | null },
  ): Promise<Application> {
    const result = await client.query<ApplicationRow>(
      `INSERT INTO ${this.tables.applications} (id, name, description)
       VALUES ($1, $2, $3)
       RETURNING ${APPLICATION_COLUMNS}`,
      [application.id, application.name, application.description],
    );
    return mapApplicationRow(result.rows[0]);
  }

  async findById(client: PoolClient, id: string): Promise<Application | null> {
    const result = await client.query<ApplicationRow>(
      `SELECT ${APPLICATION_COLUMNS} FROM ${this.tables.applications} WHERE id = $1`,
      [id],
    );
    return result.rows[0] ? mapApplicationRow(result.rows[0]) : null;
  }

  async findByName(client: PoolClient, name: string): Promise<Application | null> {
    const result = await client.query<ApplicationRow>(
      `SELECT ${APPLICATION_COLUMNS} FROM ${this.tables.applications} WHERE name = $1`,
      [name],
    );
    return result.rows[0] ? mapApplicationRow(result.rows[0]) : null;
  }

  async list(client: PoolClient): Promise<Application[]> {
    const result = await client.query<ApplicationRow>(
      `SELECT ${APPLICATION_COLUMNS} FROM ${this.tables.applications} ORDER BY name`,
    );
    return result.rows.map(mapApplicationRow);
  }

  async update(
    client: PoolClient,
    id: string,
    changes: { name?: string; description?: string | null; enabled?: boolean },
  ): Promise<Application | null> {
    // COALESCE keeps the stored value for omitted fields; description uses a flag so null can be set.
    const result = await client.query<ApplicationRow>(
      `UPDATE ${this.tables.applications}
       SET name = COALESCE($2, name),
           description = CASE WHEN $3::boolean THEN $4 ELSE description END,
           enabled = COALESCE($5, enabled),
           updated_at = NOW()
       WHERE id = $1
       RETURNING ${APPLICATION_COLUMNS}`,
      [
        id,
        changes.name ?? null,
        changes.description !== undefined,
        changes.description ?? null,
        changes.enabled ?? null,
      ],
    );
    return result.rows[0] ? mapApplicationRow(result.rows[0]) : null;
  }

  // Users, roles and grants go with it through ON DELETE CASCADE.
  async delete(client: PoolClient, id: string): Promise<boolean> {
    const result = await client.query(`DELETE FROM ${this.tables.applications} WHERE id = $1`, [id]);
    return result.rowCount === 1;
  }
}
