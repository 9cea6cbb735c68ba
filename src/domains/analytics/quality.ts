// ──────────────────────────────────────────
// Analytics: data-quality counters
// ──────────────────────────────────────────

import { Table } from '../../shared/table';
import { EnrichedTransaction, QualityReport } from '../../shared/types';

export function computeQuality(enriched: Table<EnrichedTransaction>, droppedKeys: readonly unknown[]): QualityReport {
  const rows = enriched.rows;
  const count = (predicate: (row: EnrichedTransaction) => boolean) => rows.filter(predicate).length;

  const fechasValidas = count((r) => r.fecha !== null);

  return {
    total_registros: rows.length,
    duplicados_eliminados: droppedKeys.length,
    fechas_validas: fechasValidas,
    fechas_invalidas: rows.length - fechasValidas,
    cantidades_positivas: count((r) => r.cantidad !== null && r.cantidad > 0),
    precios_positivos: count((r) => r.precio_unitario !== null && r.precio_unitario > 0),
    productos_sin_match: count((r) => r.categoria === null),
    tiendas_sin_match: count((r) => r.ciudad === null),
  };
}

export function logQuality(report: QualityReport): void {
  console.log('[Quality] Data quality report:');
  for (const [key, value] of Object.entries(report)) {
    console.log(`[Quality]   ${key}: ${value}`);
  }
}
