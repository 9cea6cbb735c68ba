// ──────────────────────────────────────────
// Ingestion domain — barrel export
// ──────────────────────────────────────────

export { loadCsv, loadTransactions, loadSources } from './loader';
export { TRANSACTION_SCHEMA } from './schema';
