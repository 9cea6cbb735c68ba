// ──────────────────────────────────────────
// Modeling: transaction cleaner
// ──────────────────────────────────────────

import { CleanResult, TransactionRow } from '../../../shared/types';
import { Table } from '../../../shared/table';
import { DateStrategy, DATE_STRATEGIES, normalizeDate } from '../date-normalizer';
import { dropDuplicates } from '../deduplicator';

export const UNKNOWN_CUSTOMER = 'UNKNOWN_CUSTOMER';

export class TransactionCleaner {
  constructor(private strategies: readonly DateStrategy[] = DATE_STRATEGIES) {}

  transform(raw: Table<TransactionRow>): CleanResult {
    const normalized = raw.map(
      (row): TransactionRow => ({
        ...row,
        fecha: normalizeDate(row.fecha, this.strategies),
        cliente_id: row.cliente_id ?? UNKNOWN_CUSTOMER,
      })
    );

    const { table, droppedKeys } = dropDuplicates(normalized, 'order_id');

    const invalidDates = table.column('fecha').filter((f) => f === null).length;
    console.log(
      `[Cleaner] ${raw.length} rows in, ${droppedKeys.length} duplicates dropped, ${invalidDates} unparseable dates`
    );

    return { table, droppedKeys };
  }
}
