// ──────────────────────────────────────────
// Pipeline: single-pass batch run
// load → clean → enrich → quality → mart → summary → outputs → warehouse
// ──────────────────────────────────────────

import { v4 as uuidv4 } from 'uuid';
import { PipelineConfig } from './config';
import { WarehouseContract } from './shared/contracts';
import { errorMessage } from './shared/errors';
import { Table } from './shared/table';
import { ArtifactManifest, BusinessSummary, EnrichedTransaction, MartRow, PipelineResult, QualityReport } from './shared/types';
import { loadSources } from './domains/ingestion';
import { EnrichmentTransformer, TransactionCleaner } from './domains/modeling';
import { buildDataMart, computeQuality, logQuality, SummaryService } from './domains/analytics';
import {
  amountHistogram,
  categoryShare,
  renderBarChart,
  renderHistogram,
  renderPieChart,
  revenueByCity,
  transactionsByWeekday,
  writeCsv,
  writeReport,
  writeSvg,
} from './domains/reporting';

export class Pipeline {
  private cleaner = new TransactionCleaner();
  private enricher = new EnrichmentTransformer();
  private summaryService = new SummaryService();

  constructor(
    private config: PipelineConfig,
    private warehouse: WarehouseContract | null = null,
    private clock: () => Date = () => new Date()
  ) {}

  async run(): Promise<PipelineResult> {
    const runId = uuidv4();
    const generatedAt = this.clock();
    console.log(`[Pipeline] Starting run ${runId}`);

    // ── Extract ──
    const sources = loadSources(this.config);

    // ── Transform ──
    const cleaned = this.cleaner.transform(sources.transactions.table);
    const enriched = this.enricher.transform(cleaned.table, sources.products.table, sources.stores.table);

    const quality = computeQuality(enriched, cleaned.droppedKeys);
    logQuality(quality);

    const mart = buildDataMart(enriched);
    const summary = this.summaryService.summarize(enriched);

    // ── Load ──
    const artifacts = this.writeArtifacts({ generatedAt, enriched, mart, summary, quality });
    const warehouseLoaded = await this.loadWarehouse(runId, generatedAt, mart, summary);

    console.log(`[Pipeline] Completed run ${runId}`);
    return { runId, generatedAt, sources, enriched, mart, quality, summary, artifacts, warehouseLoaded };
  }

  private writeArtifacts(params: {
    generatedAt: Date;
    enriched: Table<EnrichedTransaction>;
    mart: Table<MartRow>;
    summary: BusinessSummary;
    quality: QualityReport;
  }): ArtifactManifest {
    const { generatedAt, enriched, mart, summary, quality } = params;
    const out = this.config.outputs;

    const dataset = writeCsv(out.dataset, enriched);
    const martPath = writeCsv(out.mart, mart);
    const summaryPath = writeCsv(out.summary, this.summaryService.toTable(summary));

    const charts = [
      writeSvg(out.charts.revenueByCity, renderBarChart('Ventas por ciudad', revenueByCity(enriched), 'Ventas ($)')),
      writeSvg(out.charts.categoryShare, renderPieChart('Participación por categoría', categoryShare(enriched))),
      writeSvg(
        out.charts.transactionsByWeekday,
        renderBarChart('Transacciones por día de la semana', transactionsByWeekday(enriched), 'Transacciones')
      ),
      writeSvg(
        out.charts.amountHistogram,
        renderHistogram('Distribución del monto por transacción', amountHistogram(enriched), 'Total venta ($)')
      ),
    ];

    const report = writeReport({
      generatedAt,
      summary,
      quality,
      files: [dataset, martPath, summaryPath, ...charts],
      reportPath: out.report,
    });

    return { dataset, mart: martPath, summary: summaryPath, charts, report };
  }

  private async loadWarehouse(
    runId: string,
    generatedAt: Date,
    mart: Table<MartRow>,
    summary: BusinessSummary
  ): Promise<boolean> {
    if (!this.warehouse) {
      console.log('[Warehouse] No DATABASE_URL configured, skipping warehouse load');
      return false;
    }

    try {
      await this.warehouse.replaceRun({ runId, generatedAt, mart, summary });
      return true;
    } catch (err) {
      console.error('[Warehouse] Load failed:', errorMessage(err));
      return false;
    }
  }
}

export async function runPipeline(
  config: PipelineConfig,
  warehouse: WarehouseContract | null = null
): Promise<PipelineResult> {
  return new Pipeline(config, warehouse).run();
}
