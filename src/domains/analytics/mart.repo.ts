// ──────────────────────────────────────────
// Analytics: warehouse repository for the data mart
// ──────────────────────────────────────────

import { Knex } from 'knex';
import { WarehouseContract } from '../../shared/contracts';
import { Table } from '../../shared/table';
import { BusinessSummary, MartRow } from '../../shared/types';

const INSERT_CHUNK = 500;

export class MartRepo implements WarehouseContract {
  constructor(private db: Knex) {}

  /** Replaces the previous load with this run's mart and summary in one transaction. */
  async replaceRun(params: {
    runId: string;
    generatedAt: Date;
    mart: Table<MartRow>;
    summary: BusinessSummary;
  }): Promise<void> {
    const { runId, generatedAt, mart, summary } = params;

    await this.db.transaction(async (trx) => {
      await trx('mart_ventas').del();
      await trx('resumen_ventas').del();

      const rows = mart.rows.map((row) => ({ run_id: runId, generated_at: generatedAt, ...row }));
      if (rows.length > 0) {
        await trx.batchInsert('mart_ventas', rows, INSERT_CHUNK);
      }

      await trx('resumen_ventas').insert({
        run_id: runId,
        generated_at: generatedAt,
        ...summary,
      });
    });

    console.log(`[Warehouse] Loaded run ${runId}: ${mart.length} mart rows`);
  }
}
