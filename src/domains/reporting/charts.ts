// ──────────────────────────────────────────
// Reporting: chart data + SVG rendering
// ──────────────────────────────────────────

import fs from 'fs';
import path from 'path';
import { roundHalfEven } from '../../shared/numbers';
import { Table, compareCells, groupBy } from '../../shared/table';
import { EnrichedTransaction } from '../../shared/types';
import { WEEKDAY_NAMES } from '../modeling/date-normalizer';

export interface BarChartDataPoint {
  label: string;
  value: number;
}

export interface PieChartDataPoint {
  label: string;
  value: number;
  /** 0–100 */
  percentage: number;
}

export interface HistogramBin {
  from: number;
  to: number;
  count: number;
}

export const HISTOGRAM_BINS = 20;

const WIDTH = 800;
const HEIGHT = 480;
const MARGIN = { top: 50, right: 30, bottom: 90, left: 80 };
const PALETTE = ['#4e79a7', '#f28e2b', '#e15759', '#76b7b2', '#59a14f', '#edc948', '#b07aa1', '#ff9da7', '#9c755f', '#bab0ac'];

// ── Data ──

export function revenueByCity(enriched: Table<EnrichedTransaction>): BarChartDataPoint[] {
  return groupBy<EnrichedTransaction, number>(enriched, ['ciudad'], {
    init: () => 0,
    step: (acc, row) => acc + (row.total_venta ?? 0),
  })
    .filter((g) => g.key[0] !== null)
    .map((g) => ({ label: String(g.key[0]), value: roundHalfEven(g.value, 2) }))
    .sort((a, b) => b.value - a.value || compareCells(a.label, b.label));
}

export function categoryShare(enriched: Table<EnrichedTransaction>): PieChartDataPoint[] {
  const totals = groupBy<EnrichedTransaction, number>(enriched, ['categoria'], {
    init: () => 0,
    step: (acc, row) => acc + (row.total_venta ?? 0),
  }).filter((g) => g.key[0] !== null && g.value > 0);

  const grand = totals.reduce((s, g) => s + g.value, 0);
  return totals
    .map((g) => ({
      label: String(g.key[0]),
      value: roundHalfEven(g.value, 2),
      percentage: grand > 0 ? roundHalfEven((g.value / grand) * 100, 2) : 0,
    }))
    .sort((a, b) => b.value - a.value || compareCells(a.label, b.label));
}

export function transactionsByWeekday(enriched: Table<EnrichedTransaction>): BarChartDataPoint[] {
  const counts = new Map<string, number>(WEEKDAY_NAMES.map((d): [string, number] => [d, 0]));
  for (const row of enriched.rows) {
    if (row.dia_semana !== null) {
      counts.set(row.dia_semana, (counts.get(row.dia_semana) ?? 0) + 1);
    }
  }
  return WEEKDAY_NAMES.map((d) => ({ label: d, value: counts.get(d) ?? 0 }));
}

export function amountHistogram(enriched: Table<EnrichedTransaction>, bins = HISTOGRAM_BINS): HistogramBin[] {
  const values = enriched.column('total_venta').filter((v): v is number => v !== null);
  if (values.length === 0) return [];

  let min = values[0];
  let max = values[0];
  for (const v of values) {
    if (v < min) min = v;
    if (v > max) max = v;
  }
  // A single distinct value still gets one non-empty bin
  const width = max > min ? (max - min) / bins : 1;

  const result: HistogramBin[] = Array.from({ length: bins }, (_, i) => ({
    from: min + i * width,
    to: min + (i + 1) * width,
    count: 0,
  }));
  for (const v of values) {
    const i = Math.min(Math.floor((v - min) / width), bins - 1);
    result[i].count += 1;
  }
  return result;
}

// ── SVG ──

export function renderBarChart(title: string, points: readonly BarChartDataPoint[], yLabel: string): string {
  const plotW = WIDTH - MARGIN.left - MARGIN.right;
  const plotH = HEIGHT - MARGIN.top - MARGIN.bottom;
  const maxValue = points.reduce((m, p) => Math.max(m, p.value), 0);
  const slot = points.length > 0 ? plotW / points.length : plotW;
  const barW = slot * 0.7;

  const bars = points
    .map((p, i) => {
      const h = maxValue > 0 ? (p.value / maxValue) * plotH : 0;
      const x = MARGIN.left + i * slot + (slot - barW) / 2;
      const y = MARGIN.top + plotH - h;
      return [
        `<rect x="${fmt(x)}" y="${fmt(y)}" width="${fmt(barW)}" height="${fmt(h)}" fill="${PALETTE[0]}"/>`,
        `<text x="${fmt(x + barW / 2)}" y="${fmt(y - 4)}" font-size="11" text-anchor="middle">${escapeXml(formatValue(p.value))}</text>`,
        `<text x="${fmt(x + barW / 2)}" y="${MARGIN.top + plotH + 16}" font-size="12" text-anchor="end" transform="rotate(-35 ${fmt(x + barW / 2)} ${MARGIN.top + plotH + 16})">${escapeXml(p.label)}</text>`,
      ].join('');
    })
    .join('\n');

  return frame(title, [axes(plotW, plotH), axisLabel(yLabel, plotH), bars]);
}

export function renderPieChart(title: string, points: readonly PieChartDataPoint[]): string {
  const cx = WIDTH / 2 - 120;
  const cy = HEIGHT / 2 + 10;
  const r = 170;
  const parts: string[] = [];

  let angle = -Math.PI / 2;
  points.forEach((p, i) => {
    const sweep = (p.percentage / 100) * Math.PI * 2;
    const color = PALETTE[i % PALETTE.length];
    if (points.length === 1) {
      parts.push(`<circle cx="${cx}" cy="${cy}" r="${r}" fill="${color}"/>`);
    } else {
      const x1 = cx + r * Math.cos(angle);
      const y1 = cy + r * Math.sin(angle);
      const x2 = cx + r * Math.cos(angle + sweep);
      const y2 = cy + r * Math.sin(angle + sweep);
      const large = sweep > Math.PI ? 1 : 0;
      parts.push(
        `<path d="M${fmt(cx)},${fmt(cy)} L${fmt(x1)},${fmt(y1)} A${r},${r} 0 ${large} 1 ${fmt(x2)},${fmt(y2)} Z" fill="${color}"/>`
      );
    }
    const ly = 80 + i * 22;
    parts.push(
      `<rect x="${WIDTH - 260}" y="${ly - 11}" width="14" height="14" fill="${color}"/>` +
        `<text x="${WIDTH - 240}" y="${ly}" font-size="13">${escapeXml(`${p.label} (${p.percentage.toFixed(1)}%)`)}</text>`
    );
    angle += sweep;
  });

  return frame(title, parts);
}

export function renderHistogram(title: string, bins: readonly HistogramBin[], xLabel: string): string {
  const plotW = WIDTH - MARGIN.left - MARGIN.right;
  const plotH = HEIGHT - MARGIN.top - MARGIN.bottom;
  const maxCount = bins.reduce((m, b) => Math.max(m, b.count), 0);
  const barW = bins.length > 0 ? plotW / bins.length : plotW;

  const bars = bins
    .map((b, i) => {
      const h = maxCount > 0 ? (b.count / maxCount) * plotH : 0;
      const x = MARGIN.left + i * barW;
      const y = MARGIN.top + plotH - h;
      return `<rect x="${fmt(x)}" y="${fmt(y)}" width="${fmt(barW)}" height="${fmt(h)}" fill="${PALETTE[3]}" stroke="#ffffff"/>`;
    })
    .join('\n');

  const ticks =
    bins.length > 0
      ? [
          `<text x="${MARGIN.left}" y="${MARGIN.top + plotH + 18}" font-size="12" text-anchor="middle">${formatValue(bins[0].from)}</text>`,
          `<text x="${MARGIN.left + plotW}" y="${MARGIN.top + plotH + 18}" font-size="12" text-anchor="middle">${formatValue(bins[bins.length - 1].to)}</text>`,
        ].join('')
      : '';

  const label = `<text x="${MARGIN.left + plotW / 2}" y="${HEIGHT - 30}" font-size="13" text-anchor="middle">${escapeXml(xLabel)}</text>`;

  return frame(title, [axes(plotW, plotH), axisLabel('Frecuencia', plotH), bars, ticks, label]);
}

export function writeSvg(filePath: string, svg: string): string {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, svg, 'utf-8');
  console.log(`[Reporting] Wrote chart ${filePath}`);
  return filePath;
}

// ── Helpers ──

function frame(title: string, body: readonly string[]): string {
  return [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${WIDTH}" height="${HEIGHT}" viewBox="0 0 ${WIDTH} ${HEIGHT}" font-family="sans-serif">`,
    `<rect width="${WIDTH}" height="${HEIGHT}" fill="#ffffff"/>`,
    `<text x="${WIDTH / 2}" y="30" font-size="18" font-weight="bold" text-anchor="middle">${escapeXml(title)}</text>`,
    ...body.filter((part) => part !== ''),
    '</svg>',
    '',
  ].join('\n');
}

function axes(plotW: number, plotH: number): string {
  const x0 = MARGIN.left;
  const y0 = MARGIN.top + plotH;
  return (
    `<line x1="${x0}" y1="${MARGIN.top}" x2="${x0}" y2="${y0}" stroke="#333333"/>` +
    `<line x1="${x0}" y1="${y0}" x2="${x0 + plotW}" y2="${y0}" stroke="#333333"/>`
  );
}

function axisLabel(label: string, plotH: number): string {
  const y = MARGIN.top + plotH / 2;
  return `<text x="20" y="${y}" font-size="13" text-anchor="middle" transform="rotate(-90 20 ${y})">${escapeXml(label)}</text>`;
}

function fmt(n: number): string {
  return n.toFixed(2);
}

function formatValue(n: number): string {
  return Number.isInteger(n) ? String(n) : n.toFixed(2);
}

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}
