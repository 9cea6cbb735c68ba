// ──────────────────────────────────────────
// App entry point — one batch run, then exit
// 1. Load configuration
// 2. Connect to Postgres and migrate (only with DATABASE_URL)
// 3. Run the pipeline
// ──────────────────────────────────────────

import dotenv from 'dotenv';
dotenv.config();

import { loadConfig } from './config';
import { closeDb, getDb, migrateLatest } from './db/connection';
import { MartRepo } from './domains/analytics';
import { runPipeline } from './pipeline';
import { WarehouseContract } from './shared/contracts';

async function main() {
  const config = loadConfig();
  console.log(`[App] Input: ${config.inputDir} → output: ${config.outputDir}`);

  let warehouse: WarehouseContract | null = null;
  if (config.databaseUrl) {
    const db = getDb(config.databaseUrl);
    await migrateLatest(db);
    warehouse = new MartRepo(db);
  }

  try {
    const result = await runPipeline(config, warehouse);
    console.log(`[App] Done: ${result.enriched.length} rows, ${result.mart.length} mart groups`);
  } finally {
    await closeDb();
  }
}

main().catch((err) => {
  console.error('[App] Fatal error:', err);
  process.exit(1);
});
