// ──────────────────────────────────────────
// Database connection — Knex instance
// ──────────────────────────────────────────

import path from 'path';
import knex, { Knex } from 'knex';

let db: Knex | undefined;

export function getDb(databaseUrl = process.env.DATABASE_URL): Knex {
  if (!db) {
    db = knex({
      client: 'pg',
      connection: databaseUrl,
      pool: { min: 0, max: 4 },
    });
  }
  return db;
}

export async function closeDb(): Promise<void> {
  if (db) {
    await db.destroy();
    db = undefined;
  }
}

export async function migrateLatest(instance: Knex): Promise<void> {
  await instance.migrate.latest({
    directory: path.resolve(__dirname, 'migrations'),
    loadExtensions: ['.ts', '.js'],
  });
}
