// ──────────────────────────────────────────
// Shared type definitions for the SuperMart ETL
// ──────────────────────────────────────────

import { Cell, Row, Table } from './table';

export type SourceName = 'transacciones' | 'productos' | 'tiendas';
export type ColumnType = 'int' | 'float' | 'string';
export type ColumnSchema = Record<string, ColumnType>;

export type SaleSize = 'Low' | 'Medium' | 'High';
export type WeekdayName = 'Lunes' | 'Martes' | 'Miércoles' | 'Jueves' | 'Viernes' | 'Sábado' | 'Domingo';

// ── Loading ──

export type LoadStatus =
  | { kind: 'ok' }
  | { kind: 'not_found'; message: string }
  | { kind: 'parse_error'; message: string }
  | { kind: 'schema_error'; message: string };

export interface LoadResult<R extends Row> {
  source: SourceName;
  path: string;
  table: Table<R>;
  status: LoadStatus;
  rowCount: number;
}

export interface LoadedSources {
  transactions: LoadResult<TransactionRow>;
  products: LoadResult<Row>;
  stores: LoadResult<Row>;
}

// ── Rows ──

export type TransactionRow = {
  order_id: number | null;
  producto_id: string | null;
  cantidad: number | null;
  precio_unitario: number | null;
  cliente_id: string | null;
  tienda_id: string | null;
  fecha: string | null;
};

export type EnrichedTransaction = TransactionRow &
  Row & {
    total_venta: number | null;
    categoria_venta: SaleSize | null;
    categoria: Cell;
    ciudad: Cell;
    region: Cell;
    anio: number | null;
    mes: number | null;
    dia_semana: WeekdayName | null;
  };

export type MartRow = {
  fecha: string | null;
  anio: number | null;
  mes: number | null;
  dia_semana: string | null;
  ciudad: Cell;
  region: Cell;
  categoria: Cell;
  num_transacciones: number;
  unidades_vendidas: number;
  ingresos_totales: number;
};

export type SummaryRow = {
  'Métrica': string;
  Valor: Cell;
};

// ── Stage outputs ──

export interface CleanResult {
  table: Table<TransactionRow>;
  droppedKeys: (number | null)[];
}

export interface QualityReport {
  total_registros: number;
  duplicados_eliminados: number;
  fechas_validas: number;
  fechas_invalidas: number;
  cantidades_positivas: number;
  precios_positivos: number;
  productos_sin_match: number;
  tiendas_sin_match: number;
}

export interface BusinessSummary {
  ingresos_totales: number;
  total_transacciones: number;
  ticket_promedio: number | null;
  clientes_unicos: number;
  ciudad_top: string | null;
  categoria_top: string | null;
}

export interface ArtifactManifest {
  dataset: string;
  mart: string;
  summary: string;
  charts: string[];
  report: string;
}

export interface PipelineResult {
  runId: string;
  generatedAt: Date;
  sources: LoadedSources;
  enriched: Table<EnrichedTransaction>;
  mart: Table<MartRow>;
  quality: QualityReport;
  summary: BusinessSummary;
  artifacts: ArtifactManifest;
  warehouseLoaded: boolean;
}
