// ──────────────────────────────────────────
// Modeling: enrichment transformer
// total amount → sale size → catalog joins → calendar fields
// ──────────────────────────────────────────

import { roundHalfEven } from '../../../shared/numbers';
import { Row, Table, leftJoin } from '../../../shared/table';
import { EnrichedTransaction, SaleSize, TransactionRow } from '../../../shared/types';
import { PRODUCT_KEY, STORE_KEY } from '../../ingestion/schema';
import { calendarFields } from '../date-normalizer';

export interface SaleSizeBin {
  label: SaleSize;
  /** Inclusive. */
  min: number;
  /** Exclusive. */
  max: number;
}

export const SALE_SIZE_BINS: readonly SaleSizeBin[] = [
  { label: 'Low', min: -Infinity, max: 20 },
  { label: 'Medium', min: 20, max: 50 },
  { label: 'High', min: 50, max: Infinity },
];

export const CALENDAR_COLUMNS = ['anio', 'mes', 'dia_semana'];

export function totalAmount(quantity: number | null, unitPrice: number | null): number | null {
  if (quantity === null || unitPrice === null) return null;
  return roundHalfEven(quantity * unitPrice, 2);
}

export function saleSize(amount: number | null, bins: readonly SaleSizeBin[] = SALE_SIZE_BINS): SaleSize | null {
  if (amount === null || Number.isNaN(amount)) return null;
  const bin = bins.find((b) => amount >= b.min && amount < b.max);
  return bin ? bin.label : null;
}

export class EnrichmentTransformer {
  transform(
    transactions: Table<TransactionRow>,
    products: Table<Row>,
    stores: Table<Row>
  ): Table<EnrichedTransaction> {
    const withAmounts = transactions.map(
      (row) => {
        const total_venta = totalAmount(row.cantidad, row.precio_unitario);
        return { ...row, total_venta, categoria_venta: saleSize(total_venta) };
      },
      [...transactions.columns, 'total_venta', 'categoria_venta']
    );

    const withProducts = leftJoin(withAmounts, products, {
      relation: 'productos',
      leftKey: PRODUCT_KEY,
      rightKey: PRODUCT_KEY,
      suffix: '_producto',
      reserved: CALENDAR_COLUMNS,
    });

    const withStores = leftJoin(withProducts, stores, {
      relation: 'tiendas',
      leftKey: STORE_KEY,
      rightKey: STORE_KEY,
      suffix: '_tienda',
      reserved: CALENDAR_COLUMNS,
    });

    const enriched = withStores.map(
      (row): EnrichedTransaction => ({
        ...row,
        categoria: row.categoria ?? null,
        ciudad: row.ciudad ?? null,
        region: row.region ?? null,
        ...calendarFields(row.fecha),
      }),
      withCatalogDefaults([...withStores.columns, ...CALENDAR_COLUMNS])
    );

    console.log(`[Enricher] ${enriched.length} rows enriched (${enriched.columns.length} columns)`);
    return enriched;
  }
}

// Catalogs that failed to load contribute no columns; keep the ones downstream reads.
function withCatalogDefaults(columns: string[]): string[] {
  const result = [...columns];
  for (const c of ['categoria', 'ciudad', 'region']) {
    if (!result.includes(c)) result.splice(result.indexOf('anio'), 0, c);
  }
  return result;
}
