// ──────────────────────────────────────────
// Script: Reset — drop warehouse tables and re-run migrations
// ──────────────────────────────────────────

import dotenv from 'dotenv';
dotenv.config();

import { getDb, closeDb, migrateLatest } from '../src/db/connection';

async function reset() {
  if (!process.env.DATABASE_URL) {
    console.error('[Reset] DATABASE_URL is not set');
    process.exit(1);
  }

  const db = getDb();
  console.log('[Reset] Dropping warehouse tables...');

  await db.raw('DROP TABLE IF EXISTS resumen_ventas CASCADE');
  await db.raw('DROP TABLE IF EXISTS mart_ventas CASCADE');
  await db.raw('DROP TABLE IF EXISTS knex_migrations CASCADE');
  await db.raw('DROP TABLE IF EXISTS knex_migrations_lock CASCADE');

  console.log('[Reset] Running migrations...');
  await migrateLatest(db);

  console.log('[Reset] ✅ Done — warehouse tables recreated');
  await closeDb();
}

reset().catch((err) => {
  console.error('[Reset] Error:', err);
  process.exit(1);
});
