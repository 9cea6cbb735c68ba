// ──────────────────────────────────────────
// Configuration — fixed file names, overridable directories
// ──────────────────────────────────────────

import path from 'path';

export interface PipelineConfig {
  inputDir: string;
  outputDir: string;
  files: {
    transactions: string;
    products: string;
    stores: string;
  };
  outputs: {
    dataset: string;
    mart: string;
    summary: string;
    report: string;
    charts: {
      revenueByCity: string;
      categoryShare: string;
      transactionsByWeekday: string;
      amountHistogram: string;
    };
  };
  databaseUrl: string | null;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): PipelineConfig {
  const inputDir = path.resolve(env.INPUT_DIR || '.');
  const outputDir = path.resolve(env.OUTPUT_DIR || './output');

  return {
    inputDir,
    outputDir,
    files: {
      transactions: path.join(inputDir, 'ventas_crudas.csv'),
      products: path.join(inputDir, 'productos.csv'),
      stores: path.join(inputDir, 'tiendas.csv'),
    },
    outputs: {
      dataset: path.join(outputDir, 'ventas_transformadas.csv'),
      mart: path.join(outputDir, 'data_mart_ventas.csv'),
      summary: path.join(outputDir, 'resumen_ventas.csv'),
      report: path.join(outputDir, 'reporte_ventas.txt'),
      charts: {
        revenueByCity: path.join(outputDir, 'ventas_por_ciudad.svg'),
        categoryShare: path.join(outputDir, 'participacion_categorias.svg'),
        transactionsByWeekday: path.join(outputDir, 'transacciones_por_dia.svg'),
        amountHistogram: path.join(outputDir, 'distribucion_montos.svg'),
      },
    },
    databaseUrl: env.DATABASE_URL || null,
  };
}
