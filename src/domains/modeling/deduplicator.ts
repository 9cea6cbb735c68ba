// ──────────────────────────────────────────
// Modeling: deduplicator — first occurrence wins
// ──────────────────────────────────────────

import { Cell, Row, Table } from '../../shared/table';

export interface DedupResult<R extends Row, K extends keyof R & string> {
  table: Table<R>;
  droppedKeys: R[K][];
}

/**
 * Keeps the first row for every key value in input order. Null keys are
 * equal to each other, so only the first null-keyed row survives.
 */
export function dropDuplicates<R extends Row, K extends keyof R & string>(table: Table<R>, key: K): DedupResult<R, K> {
  const seen = new Set<Cell>();
  const droppedKeys: R[K][] = [];

  const kept = table.filter((row) => {
    const value = row[key];
    if (seen.has(value)) {
      droppedKeys.push(value);
      return false;
    }
    seen.add(value);
    return true;
  });

  return { table: kept, droppedKeys };
}
