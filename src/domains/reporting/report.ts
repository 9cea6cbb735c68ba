// ──────────────────────────────────────────
// Reporting: plain-text run report
// ──────────────────────────────────────────

import fs from 'fs';
import path from 'path';
import { format } from 'date-fns';
import { BusinessSummary, QualityReport } from '../../shared/types';

export interface ReportInput {
  generatedAt: Date;
  summary: BusinessSummary;
  quality: QualityReport;
  /** Paths of every artifact written before the report. */
  files: readonly string[];
  reportPath: string;
}

const RULE = '='.repeat(60);

export function renderReport(input: ReportInput): string {
  const { generatedAt, summary, quality, files, reportPath } = input;
  const show = (v: string | number | null) => (v === null ? 'N/D' : String(v));
  const money = (v: number | null) => (v === null ? 'N/D' : `$${v.toFixed(2)}`);

  return [
    RULE,
    'REPORTE DE VENTAS - SUPERMART',
    RULE,
    `Generado: ${format(generatedAt, 'yyyy-MM-dd HH:mm:ss')}`,
    '',
    'MÉTRICAS PRINCIPALES',
    `  Ingresos totales: ${money(summary.ingresos_totales)}`,
    `  Total transacciones: ${summary.total_transacciones}`,
    `  Ticket promedio: ${money(summary.ticket_promedio)}`,
    `  Clientes únicos: ${summary.clientes_unicos}`,
    '',
    'TOP PERFORMERS',
    `  Ciudad con más ventas: ${show(summary.ciudad_top)}`,
    `  Categoría más vendida: ${show(summary.categoria_top)}`,
    '',
    'CALIDAD DE DATOS',
    ...Object.entries(quality).map(([key, value]) => `  ${key}: ${value}`),
    '',
    'ARCHIVOS GENERADOS',
    ...[...files, reportPath].map((f) => `  - ${f}`),
    RULE,
    '',
  ].join('\n');
}

export function writeReport(input: ReportInput): string {
  fs.mkdirSync(path.dirname(input.reportPath), { recursive: true });
  fs.writeFileSync(input.reportPath, renderReport(input), 'utf-8');
  console.log(`[Reporting] Wrote report ${input.reportPath}`);
  return input.reportPath;
}
