// ──────────────────────────────────────────
// Analytics domain — barrel export
// ──────────────────────────────────────────

export { computeQuality, logQuality } from './quality';
export { buildDataMart, MART_COLUMNS } from './aggregation';
export { SummaryService } from './summary.service';
export { MartRepo } from './mart.repo';
