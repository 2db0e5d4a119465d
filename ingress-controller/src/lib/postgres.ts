import pg from 'pg';
import { z } from 'zod';
import type { StateStore } from '../repositories/state-store';
import type { RelationPayload } from '../types/ingress';
import { parseOrThrow, pickRelationPayload, storedPayloadSchema } from '../utils/validation';

const TABLE_NAME = 'controller_state';

const stateRowSchema = z.object({
  ingress_relation_data: storedPayloadSchema,
});

// Only the query surface of pg.Pool the store needs.
export interface Queryable {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
}

export class PostgresStateStore implements StateStore {
  private readonly db: Queryable;
  private readonly controllerId: string;
  private schemaReady = false;

  constructor(db: Queryable, controllerId: string) {
    this.db = db;
    this.controllerId = controllerId;
  }

  static fromUrl(connectionString: string, controllerId: string): PostgresStateStore {
    const pool = new pg.Pool({ connectionString });
    return new PostgresStateStore({ query: (text, values) => pool.query(text, values) }, controllerId);
  }

  private async ensureSchema(): Promise<void> {
    if (this.schemaReady) {
      return;
    }

    await this.db.query(
      `CREATE TABLE IF NOT EXISTS ${TABLE_NAME} (
        controller_id TEXT PRIMARY KEY,
        ingress_relation_data JSONB NOT NULL DEFAULT '{}'::jsonb,
        updated_at TIMESTAMPTZ NOT NULL DEFAULT now()
      )`
    );
    this.schemaReady = true;
  }

  async load(): Promise<RelationPayload> {
    await this.ensureSchema();
    const result = await this.db.query(
      `SELECT ingress_relation_data FROM ${TABLE_NAME} WHERE controller_id = $1`,
      [this.controllerId]
    );

    const row = result.rows[0];
    if (!row) {
      return {};
    }

    return pickRelationPayload(parseOrThrow(stateRowSchema, row).ingress_relation_data);
  }

  async save(payload: RelationPayload): Promise<void> {
    await this.ensureSchema();
    await this.db.query(
      `INSERT INTO ${TABLE_NAME} (controller_id, ingress_relation_data, updated_at)
       VALUES ($1, $2::jsonb, now())
       ON CONFLICT (controller_id)
       DO UPDATE SET ingress_relation_data = EXCLUDED.ingress_relation_data, updated_at = EXCLUDED.updated_at`,
      [this.controllerId, JSON.stringify(payload)]
    );
  }
}
