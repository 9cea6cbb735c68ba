// ──────────────────────────────────────────
// Analytics: headline business summary
// ──────────────────────────────────────────

import { roundHalfEven, sum } from '../../shared/numbers';
import { Cell, Table, compareCells, groupBy } from '../../shared/table';
import { BusinessSummary, EnrichedTransaction, SummaryRow } from '../../shared/types';

export const SUMMARY_COLUMNS = ['Métrica', 'Valor'];

export class SummaryService {
  summarize(enriched: Table<EnrichedTransaction>): BusinessSummary {
    const amounts = enriched.column('total_venta').filter((v): v is number => v !== null);
    const revenue = sum(amounts);

    return {
      ingresos_totales: roundHalfEven(revenue, 2),
      total_transacciones: distinctCount(enriched.column('order_id')),
      // null when no row has an amount
      ticket_promedio: amounts.length > 0 ? roundHalfEven(revenue / amounts.length, 2) : null,
      clientes_unicos: distinctCount(enriched.column('cliente_id')),
      ciudad_top: topByRevenue(enriched, 'ciudad'),
      categoria_top: topByRevenue(enriched, 'categoria'),
    };
  }

  toTable(summary: BusinessSummary): Table<SummaryRow> {
    const rows: SummaryRow[] = [
      { 'Métrica': 'Ingresos totales', Valor: summary.ingresos_totales },
      { 'Métrica': 'Total transacciones', Valor: summary.total_transacciones },
      { 'Métrica': 'Ticket promedio', Valor: summary.ticket_promedio },
      { 'Métrica': 'Clientes únicos', Valor: summary.clientes_unicos },
      { 'Métrica': 'Ciudad con más ventas', Valor: summary.ciudad_top },
      { 'Métrica': 'Categoría más vendida', Valor: summary.categoria_top },
    ];
    return new Table<SummaryRow>(SUMMARY_COLUMNS, rows);
  }
}

// ── Helpers ──

function distinctCount(values: readonly Cell[]): number {
  return new Set(values.filter((v) => v !== null)).size;
}

/**
 * Key with the largest summed total_venta. Null keys are skipped, groups are
 * visited in ascending key order and the first maximum wins.
 */
export function topByRevenue(enriched: Table<EnrichedTransaction>, key: 'ciudad' | 'categoria'): string | null {
  const groups = groupBy<EnrichedTransaction, number>(enriched, [key], {
    init: () => 0,
    step: (acc, row) => acc + (row.total_venta ?? 0),
  })
    .filter((g) => g.key[0] !== null)
    .sort((a, b) => compareCells(a.key[0], b.key[0]));

  let best: { key: Cell; revenue: number } | null = null;
  for (const group of groups) {
    if (best === null || group.value > best.revenue) {
      best = { key: group.key[0], revenue: group.value };
    }
  }
  return best === null || best.key === null ? null : String(best.key);
}
