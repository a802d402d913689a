import type { DatasetSplitReport } from './dataset-splitter'

export interface SplitTotals {
  classes: number
  total: number
  train: number
  val: number
  test: number
}

export function summarizeReport(report: DatasetSplitReport): SplitTotals {
  const totals: SplitTotals = { classes: report.length, total: 0, train: 0, val: 0, test: 0 }
  for (const entry of report) {
    totals.total += entry.total
    totals.train += entry.train
    totals.val += entry.val
    totals.test += entry.test
  }
  return totals
}

const HEADER = ['Class', 'Total', 'Train', 'Val', 'Test'] as const

/**
 * Plain-text table: one row per class and a trailing TOTAL row.
 */
export function formatReportTable(report: DatasetSplitReport): string {
  const totals = summarizeReport(report)
  const rows: string[][] = [
    [...HEADER],
    ...report.map(entry => [entry.className, ...counts(entry)]),
    ['TOTAL', ...counts(totals)],
  ]

  const widths = HEADER.map((_, col) => Math.max(...rows.map(row => row[col].length)))

  return rows
    .map(row => row
      .map((cell, col) => col === 0 ? cell.padEnd(widths[col]) : cell.padStart(widths[col]))
      .join('  '))
    .join('\n')
}

export function serializeReport(report: DatasetSplitReport): string {
  return JSON.stringify({ classes: report, totals: summarizeReport(report) }, null, 2)
}

function counts(entry: { total: number, train: number, val: number, test: number }): string[] {
  return [entry.total, entry.train, entry.val, entry.test].map(String)
}
