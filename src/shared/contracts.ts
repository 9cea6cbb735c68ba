// ──────────────────────────────────────────
// Stage contracts — typed interfaces between domains
// ──────────────────────────────────────────

import { BusinessSummary, MartRow } from './types';
import { Table } from './table';

/**
 * Warehouse contract — exposed to the pipeline runner.
 * Receives the terminal mart and summary of a run; write-only.
 */
export interface WarehouseContract {
  replaceRun(params: { runId: string; generatedAt: Date; mart: Table<MartRow>; summary: BusinessSummary }): Promise<void>;
}
