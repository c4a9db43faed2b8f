import { PGlite } from '@electric-sql/pglite';
import type pg from 'pg';
import { z } from 'zod';
import { col } from '../../src/schema/columns.js';
import { defineTable } from '../../src/schema/table.js';

export const Users = defineTable('users', {
  id: col.serial().primaryKey(),
  name: col.varchar(50).notNull(),
  secret_token: col.varchar(50),
});

export const UserSchema = z.object({ id: z.number(), name: z.string() });

interface QueryInput {
  text: string;
  values?: unknown[];
  rowMode?: 'array';
}

/**
 * Exposes an in-process PGlite database through the slice of the pg.Pool
 * surface the engine uses: query(), connect()/release() and end().
 * PGlite is a single connection, so every "client" shares it.
 */
export function createPglitePool(db: PGlite): pg.Pool {
  const query = async (input: string | QueryInput, values?: unknown[]) => {
    const text = typeof input === 'string' ? input : input.text;
    const params = (typeof input === 'string' ? values : input.values) ?? [];
    const rowMode = typeof input === 'string' ? 'object' : (input.rowMode ?? 'object');
    const result = await db.query(text, params, { rowMode });
    return {
      rows: result.rows,
      fields: result.fields,
      rowCount: result.affectedRows ?? result.rows.length,
    };
  };
  const client = { query, release: () => undefined };

  return {
    query,
    connect: async () => client,
    end: async () => db.close(),
  } as unknown as pg.Pool;
}

export async function seedUsers(db: PGlite, count: number): Promise<void> {
  for (let i = 0; i < count; i++) {
    await db.query('INSERT INTO users (name, secret_token) VALUES ($1, $2)', [`user_${i}`, 'test-secret']);
  }
}
