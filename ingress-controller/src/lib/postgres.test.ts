import { describe, expect, it } from 'vitest';
import { PostgresStateStore, type Queryable } from './postgres';

class FakeDatabase implements Queryable {
  readonly statements: string[] = [];
  readonly rows = new Map<string, unknown>();

  async query(text: string, values: unknown[] = []): Promise<{ rows: unknown[] }> {
    const statement = text.trim().split(/\s+/).slice(0, 2).join(' ');
    this.statements.push(statement);

    if (statement === 'SELECT ingress_relation_data') {
      const row = this.rows.get(String(values[0]));
      return { rows: row === undefined ? [] : [{ ingress_relation_data: row }] };
    }

    if (statement === 'INSERT INTO') {
      this.rows.set(String(values[0]), JSON.parse(String(values[1])));
    }

    return { rows: [] };
  }
}

describe('PostgresStateStore', () => {
  it('loads an empty payload when the controller has no row', async () => {
    const db = new FakeDatabase();
    await expect(new PostgresStateStore(db, 'ingress').load()).resolves.toEqual({});
  });

  it('upserts the payload under the controller id', async () => {
    const db = new FakeDatabase();
    const store = new PostgresStateStore(db, 'ingress');

    await store.save({ 'service-name': 'web', 'service-port': '8080' });
    await store.save({ 'service-name': 'api', 'service-port': '9000' });

    expect(db.rows.get('ingress')).toEqual({ 'service-name': 'api', 'service-port': '9000' });
    await expect(new PostgresStateStore(db, 'ingress').load()).resolves.toEqual({
      'service-name': 'api',
      'service-port': '9000',
    });
    await expect(new PostgresStateStore(db, 'other').load()).resolves.toEqual({});
  });

  it('creates the table once per store', async () => {
    const db = new FakeDatabase();
    const store = new PostgresStateStore(db, 'ingress');

    await store.load();
    await store.save({ 'service-name': 'web' });
    await store.load();

    expect(db.statements).toEqual([
      'CREATE TABLE',
      'SELECT ingress_relation_data',
      'INSERT INTO',
      'SELECT ingress_relation_data',
    ]);
  });
});
