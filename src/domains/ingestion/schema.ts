// ──────────────────────────────────────────
// Ingestion: column schemas and cell coercion
// ──────────────────────────────────────────

import { Cell, Row } from '../../shared/table';
import { ColumnSchema, ColumnType, TransactionRow } from '../../shared/types';

export const TRANSACTION_SCHEMA = {
  order_id: 'int',
  producto_id: 'string',
  cantidad: 'int',
  precio_unitario: 'float',
  cliente_id: 'string',
  tienda_id: 'string',
  fecha: 'string',
} as const satisfies ColumnSchema;

export const TRANSACTION_COLUMNS = Object.keys(TRANSACTION_SCHEMA);
export const PRODUCT_KEY = 'producto_id';
export const STORE_KEY = 'tienda_id';
export const PRODUCT_REQUIRED = [PRODUCT_KEY, 'categoria'];
export const STORE_REQUIRED = [STORE_KEY, 'ciudad', 'region'];

const INT_PATTERN = /^[+-]?\d+(\.0*)?$/;
const FLOAT_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export class CellTypeError extends Error {
  constructor(column: string, line: number, type: ColumnType, raw: string) {
    super(`Column "${column}", line ${line}: cannot convert "${raw}" to ${type}`);
    this.name = 'CellTypeError';
  }
}

/** Empty cells become null; numbers must parse completely. */
export function coerceCell(raw: string, type: ColumnType, column: string, line: number): Cell {
  if (raw === '') return null;
  if (type === 'string') return raw;

  const text = raw.trim();
  const pattern = type === 'int' ? INT_PATTERN : FLOAT_PATTERN;
  if (!pattern.test(text)) {
    throw new CellTypeError(column, line, type, raw);
  }
  return type === 'int' ? parseInt(text, 10) : parseFloat(text);
}

/**
 * Numeric when every non-empty value parses as a float.
 * Columns listed in `keepAsString` are never converted.
 */
export function inferSchema(header: readonly string[], records: readonly string[][], keepAsString: readonly string[]): ColumnSchema {
  const schema: ColumnSchema = {};
  header.forEach((column, i) => {
    if (keepAsString.includes(column)) {
      schema[column] = 'string';
      return;
    }
    const values = records.map((r) => r[i]).filter((v) => v !== '');
    const numeric = values.length > 0 && values.every((v) => FLOAT_PATTERN.test(v.trim()));
    schema[column] = numeric ? 'float' : 'string';
  });
  return schema;
}

function asNumber(value: Cell): number | null {
  return typeof value === 'number' ? value : null;
}

function asString(value: Cell): string | null {
  return value === null ? null : String(value);
}

export function toTransactionRow(row: Row): TransactionRow {
  return {
    order_id: asNumber(row.order_id),
    producto_id: asString(row.producto_id),
    cantidad: asNumber(row.cantidad),
    precio_unitario: asNumber(row.precio_unitario),
    cliente_id: asString(row.cliente_id),
    tienda_id: asString(row.tienda_id),
    fecha: asString(row.fecha),
  };
}
