// ──────────────────────────────────────────
// Reporting: CSV output
// ──────────────────────────────────────────

import fs from 'fs';
import path from 'path';
import { stringify } from 'csv-stringify/sync';
import { Row, Table } from '../../shared/table';

export function toCsv<R extends Row>(table: Table<R>): string {
  const records = table.rows.map((row) => table.columns.map((c) => row[c] ?? ''));
  return stringify(records, { header: true, columns: [...table.columns] });
}

export function writeCsv<R extends Row>(filePath: string, table: Table<R>): string {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, toCsv(table), 'utf-8');
  console.log(`[Reporting] Wrote ${table.length} rows to ${filePath}`);
  return filePath;
}
