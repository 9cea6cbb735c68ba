// ──────────────────────────────────────────
// Modeling domain — barrel export
// ──────────────────────────────────────────

export { TransactionCleaner, UNKNOWN_CUSTOMER } from './transformers/transaction.transformer';
export { EnrichmentTransformer, totalAmount, saleSize, SALE_SIZE_BINS } from './transformers/enrichment.transformer';
export { normalizeDate, parseDate, calendarFields, DATE_STRATEGIES, WEEKDAY_NAMES } from './date-normalizer';
export { dropDuplicates } from './deduplicator';
