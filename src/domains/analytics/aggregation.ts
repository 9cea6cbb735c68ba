// ──────────────────────────────────────────
// Analytics: data mart aggregation
// ──────────────────────────────────────────

import { roundHalfEven } from '../../shared/numbers';
import { Cell, Table, compareKeys, groupBy } from '../../shared/table';
import { EnrichedTransaction, MartRow } from '../../shared/types';

export const MART_KEYS = ['fecha', 'anio', 'mes', 'dia_semana', 'ciudad', 'region', 'categoria'] as const;
export const MART_COLUMNS = [...MART_KEYS, 'num_transacciones', 'unidades_vendidas', 'ingresos_totales'];

interface MartAccumulator {
  transactions: number;
  units: number;
  revenue: number;
}

export function buildDataMart(enriched: Table<EnrichedTransaction>): Table<MartRow> {
  const groups = groupBy<EnrichedTransaction, MartAccumulator>(enriched, MART_KEYS, {
    init: () => ({ transactions: 0, units: 0, revenue: 0 }),
    step: (acc, row) => ({
      transactions: acc.transactions + 1,
      units: acc.units + (row.cantidad ?? 0),
      revenue: acc.revenue + (row.total_venta ?? 0),
    }),
  });

  const rows = groups
    .sort((a, b) => compareKeys(a.key, b.key))
    .map(({ key, value }): MartRow => {
      const [fecha, anio, mes, dia_semana, ciudad, region, categoria] = key;
      return {
        fecha: asString(fecha),
        anio: asNumber(anio),
        mes: asNumber(mes),
        dia_semana: asString(dia_semana),
        ciudad,
        region,
        categoria,
        num_transacciones: value.transactions,
        unidades_vendidas: value.units,
        ingresos_totales: roundHalfEven(value.revenue, 2),
      };
    });

  console.log(`[Aggregation] ${enriched.length} rows → ${rows.length} mart groups`);
  return new Table<MartRow>(MART_COLUMNS, rows);
}

function asString(value: Cell): string | null {
  return value === null ? null : String(value);
}

function asNumber(value: Cell): number | null {
  return typeof value === 'number' ? value : null;
}
