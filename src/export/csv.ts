/**
 * CSV export of the combined analysis table
 *
 * `toCsv` writes one header row with the combined column names followed by
 * one line per task; undefined values become empty cells. Numbers are
 * written in their shortest round-trip form, so `fromCsv(toCsv(rows))`
 * reproduces the rows exactly.
 *
 * @module export/csv
 */

import { formatCsv, parseCsv } from '../utils/csv'
import type { CombinedAnalysisRow, CombinedTable } from '../types/tables'
import { COMBINED_COLUMNS, COMBINED_HEADERS, assertCombinedHeaders, readCombinedRow } from './columns'

/**
 * Format a cell value for CSV output
 */
function formatCell(value: string | number | undefined): string {
  if (value === undefined) return ''
  if (typeof value === 'number') {
    return Number.isFinite(value) ? String(value) : ''
  }
  return value
}

export function toCsv(rows: CombinedTable): string {
  const body = rows.map(row => COMBINED_COLUMNS.map(column => formatCell(row[column.key])))
  return formatCsv(COMBINED_HEADERS, body)
}

/**
 * Parse CSV produced by `toCsv` (or any CSV with the same headers, in any
 * column order) back into combined rows
 */
export function fromCsv(text: string): CombinedAnalysisRow[] {
  const doc = parseCsv(text)
  assertCombinedHeaders(doc.headers)

  return doc.records.map((record, i) => {
    const cell = (header: string): string | undefined => {
      const value = record[header]
      return value === undefined || value === '' ? undefined : value
    }
    return readCombinedRow(
      {
        string: cell,
        number: header => {
          const raw = cell(header)
          return raw === undefined ? undefined : Number(raw.trim())
        },
      },
      i + 1
    )
  })
}
