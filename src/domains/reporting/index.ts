// ──────────────────────────────────────────
// Reporting domain — barrel export
// ──────────────────────────────────────────

export { toCsv, writeCsv } from './csv-writer';
export {
  revenueByCity,
  categoryShare,
  transactionsByWeekday,
  amountHistogram,
  renderBarChart,
  renderPieChart,
  renderHistogram,
  writeSvg,
} from './charts';
export { renderReport, writeReport } from './report';
