/**
 * CLI Utilities
 *
 * Plain-text formatting for command output, and the shared step that loads
 * and joins the tables for a command.
 */

import { prepareAnalysis, type RowFilter } from '../analysis'
import type { LoadResult } from '../loader'
import type { CombinedTable } from '../types/tables'
import type { CommandContext, ParsedArgs } from './types'

// =============================================================================
// Formatting
// =============================================================================

/**
 * Format a rating with two decimals, or "-" when absent
 */
export function formatRating(value: number | undefined): string {
  return value === undefined ? '-' : value.toFixed(2)
}

/**
 * Truncate text to a maximum length with ellipsis
 */
export function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text
  return text.slice(0, maxLength - 3) + '...'
}

/**
 * Key-value lines with keys padded to a common width
 */
export function keyValueLines(entries: Record<string, string | number>, indent: number = 2): string[] {
  const keys = Object.keys(entries)
  const width = Math.max(0, ...keys.map(k => k.length))
  const prefix = ' '.repeat(indent)
  return Object.entries(entries).map(([key, value]) => `${prefix}${key.padEnd(width)}  ${value}`)
}

/**
 * Create a simple ASCII table from data
 */
export function simpleTable(
  headers: string[],
  rows: (string | number)[][],
  options: { padding?: number | undefined } = {}
): string {
  const { padding = 2 } = options
  const gap = ' '.repeat(padding)

  const widths = headers.map((h, i) => {
    const cellWidths = rows.map(row => String(row[i] ?? '').length)
    return Math.max(h.length, ...cellWidths)
  })

  const line = (cells: (string | number)[]): string =>
    cells.map((cell, i) => String(cell).padEnd(widths[i] ?? 0)).join(gap).trimEnd()

  const separator = widths.map(w => '-'.repeat(w)).join(gap)

  return [line(headers), separator, ...rows.map(line)].join('\n')
}

// =============================================================================
// Data
// =============================================================================

/**
 * Loaded tables joined into the combined table, with their provenance
 */
export interface LoadedAnalysis {
  result: LoadResult
  combined: CombinedTable
}

export async function loadAnalysis(ctx: CommandContext): Promise<LoadedAnalysis> {
  const result = await ctx.loader.loadRawTables()
  const { worker, expert, task } = result.tables
  return { result, combined: prepareAnalysis(worker, expert, task) }
}

/**
 * Provenance lines for a load result
 */
export function describeSource(result: LoadResult, datasetId: string): Record<string, string> {
  if (result.source === 'remote') {
    return { Source: result.cached ? `${datasetId} (cached)` : datasetId }
  }
  return { Source: 'built-in fallback tables', Reason: result.reason }
}

/**
 * Row filter from the --domain, --occupation and desire bound options
 */
export function rowFilterFromArgs(options: ParsedArgs['options']): RowFilter {
  const { minDesire, maxDesire } = options
  return {
    domains: options.domains,
    occupations: options.occupations,
    desireRange:
      minDesire === undefined && maxDesire === undefined
        ? undefined
        : [minDesire ?? -Infinity, maxDesire ?? Infinity],
  }
}
