// ──────────────────────────────────────────
// Ingestion: CSV loader
// Every failure comes back as a LoadStatus with an empty table.
// ──────────────────────────────────────────

import fs from 'fs';
import { parse } from 'csv-parse/sync';
import { PipelineConfig } from '../../config';
import { errorMessage } from '../../shared/errors';
import { Row, Table } from '../../shared/table';
import { ColumnSchema, LoadResult, LoadStatus, LoadedSources, SourceName, TransactionRow } from '../../shared/types';
import {
  PRODUCT_KEY,
  PRODUCT_REQUIRED,
  STORE_KEY,
  STORE_REQUIRED,
  TRANSACTION_COLUMNS,
  TRANSACTION_SCHEMA,
  coerceCell,
  inferSchema,
  toTransactionRow,
} from './schema';

export interface LoadOptions {
  /** Explicit column types. Columns it names are required. */
  schema?: ColumnSchema;
  /** Required columns when types are inferred. */
  required?: readonly string[];
  /** Columns inference must leave as strings (join keys). */
  keepAsString?: readonly string[];
}

export function loadCsv(source: SourceName, filePath: string, options: LoadOptions = {}): LoadResult<Row> {
  const result = readTable(filePath, options);
  const status: LoadStatus = result instanceof Table ? { kind: 'ok' } : result;
  const table = result instanceof Table ? result : Table.empty<Row>();

  const label = status.kind === 'ok' ? 'OK' : `${status.kind}: ${status.message}`;
  if (status.kind === 'ok') {
    console.log(`[Loader] ${source}: ${table.length} rows (${label})`);
  } else {
    console.error(`[Loader] ${source}: ${table.length} rows (${label})`);
  }

  return { source, path: filePath, table, status, rowCount: table.length };
}

export function loadTransactions(filePath: string): LoadResult<TransactionRow> {
  const loaded = loadCsv('transacciones', filePath, { schema: TRANSACTION_SCHEMA });
  return {
    ...loaded,
    table: loaded.table.map(toTransactionRow, TRANSACTION_COLUMNS),
  };
}

export function loadSources(config: PipelineConfig): LoadedSources {
  return {
    transactions: loadTransactions(config.files.transactions),
    products: loadCsv('productos', config.files.products, {
      required: PRODUCT_REQUIRED,
      keepAsString: [PRODUCT_KEY],
    }),
    stores: loadCsv('tiendas', config.files.stores, {
      required: STORE_REQUIRED,
      keepAsString: [STORE_KEY],
    }),
  };
}

// ── Helpers ──

type LoadFailure = Exclude<LoadStatus, { kind: 'ok' }>;

function readTable(filePath: string, options: LoadOptions): Table<Row> | LoadFailure {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return { kind: 'not_found', message: `File not found: ${filePath}` };
    }
    return { kind: 'parse_error', message: errorMessage(err) };
  }

  let records: string[][];
  try {
    const parsed: unknown = parse(raw, { bom: true, skip_empty_lines: true });
    if (!isStringMatrix(parsed)) {
      return { kind: 'parse_error', message: 'Unexpected parser output' };
    }
    records = parsed;
  } catch (err) {
    return { kind: 'parse_error', message: errorMessage(err) };
  }

  const [header, ...body] = records;
  if (!header) {
    return { kind: 'parse_error', message: 'No columns to parse from file' };
  }

  const required = options.schema ? Object.keys(options.schema) : options.required ?? [];
  const missing = required.filter((c) => !header.includes(c));
  if (missing.length > 0) {
    return { kind: 'schema_error', message: `Missing required columns: ${missing.join(', ')}` };
  }

  const schema = options.schema ?? inferSchema(header, body, options.keepAsString ?? []);

  try {
    const rows = body.map((record, i) => {
      const row: Row = {};
      header.forEach((column, j) => {
        // header is line 1
        row[column] = coerceCell(record[j], schema[column] ?? 'string', column, i + 2);
      });
      return row;
    });
    return new Table<Row>(header, rows);
  } catch (err) {
    return { kind: 'parse_error', message: errorMessage(err) };
  }
}

function isStringMatrix(value: unknown): value is string[][] {
  return (
    Array.isArray(value) &&
    value.every((record) => Array.isArray(record) && record.every((cell) => typeof cell === 'string'))
  );
}
