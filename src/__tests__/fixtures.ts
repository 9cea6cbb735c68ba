import fs from 'fs';
import os from 'os';
import path from 'path';
import { Row, Table } from '../shared/table';
import { EnrichedTransaction, TransactionRow } from '../shared/types';
import { TRANSACTION_COLUMNS } from '../domains/ingestion/schema';
import { TransactionCleaner } from '../domains/modeling/transformers/transaction.transformer';
import { EnrichmentTransformer } from '../domains/modeling/transformers/enrichment.transformer';

export function tx(overrides: Partial<TransactionRow> = {}): TransactionRow {
  return {
    order_id: 1,
    producto_id: 'P1',
    cantidad: 1,
    precio_unitario: 10,
    cliente_id: 'C1',
    tienda_id: 'T1',
    fecha: '2024-03-15',
    ...overrides,
  };
}

export function transactions(rows: TransactionRow[]): Table<TransactionRow> {
  return new Table<TransactionRow>(TRANSACTION_COLUMNS, rows);
}

export function products(rows: Row[] = [
  { producto_id: 'P1', nombre: 'Leche', categoria: 'Lácteos' },
  { producto_id: 'P2', nombre: 'Pan', categoria: 'Panadería' },
]): Table<Row> {
  return new Table<Row>(['producto_id', 'nombre', 'categoria'], rows);
}

export function stores(rows: Row[] = [
  { tienda_id: 'T1', ciudad: 'Bogotá', region: 'Andina' },
  { tienda_id: 'T2', ciudad: 'Cali', region: 'Pacífica' },
]): Table<Row> {
  return new Table<Row>(['tienda_id', 'ciudad', 'region'], rows);
}

/** Clean + enrich against the default catalogs. */
export function enrich(rows: TransactionRow[]): Table<EnrichedTransaction> {
  const cleaned = new TransactionCleaner().transform(transactions(rows));
  return new EnrichmentTransformer().transform(cleaned.table, products(), stores());
}

export function tempDir(prefix = 'supermart-etl-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function writeFile(dir: string, name: string, lines: string[]): string {
  const file = path.join(dir, name);
  fs.writeFileSync(file, lines.join('\n') + '\n', 'utf-8');
  return file;
}
