/**
 * Export Command
 *
 * Write the combined table, optionally filtered, to a file.
 *
 * Supported formats:
 *   - CSV: one header row, empty cells for missing values
 *   - Parquet: same columns, nulls for missing values
 *
 * Usage:
 *   workbank export <file> [--format csv|parquet] [--domain <d>]... [--occupation <o>]...
 */

import { extname } from 'node:path'
import { promises as fs } from 'node:fs'
import { filterRows } from '../../analysis'
import { toCsv, toParquet } from '../../export'
import type { CommandContext, ExportFormat, ParsedArgs } from '../types'
import { print, printError, printSuccess } from '../types'
import { loadAnalysis, rowFilterFromArgs } from '../utils'

/**
 * Format from the --format option, else from the file extension
 */
export function resolveExportFormat(filePath: string, explicit: ExportFormat | undefined): ExportFormat | undefined {
  if (explicit) return explicit
  const ext = extname(filePath).toLowerCase()
  if (ext === '.csv') return 'csv'
  if (ext === '.parquet' || ext === '.pq') return 'parquet'
  return undefined
}

export async function exportCommand(parsed: ParsedArgs, ctx: CommandContext): Promise<number> {
  const filePath = parsed.args[0]
  if (!filePath) {
    printError('Missing output file')
    print('Usage: workbank export <file> [--format csv|parquet]')
    return 1
  }

  const format = resolveExportFormat(filePath, parsed.options.format)
  if (!format) {
    printError(`Cannot infer export format from "${filePath}"; use --format csv|parquet`)
    return 1
  }

  try {
    const { combined } = await loadAnalysis(ctx)
    const rows = filterRows(combined, rowFilterFromArgs(parsed.options))
    if (rows.length === 0) {
      print('No tasks match the filter; nothing exported.')
      return 0
    }

    if (format === 'csv') {
      await fs.writeFile(filePath, toCsv(rows), 'utf-8')
    } else {
      await fs.writeFile(filePath, new Uint8Array(toParquet(rows)))
    }

    printSuccess(`Exported ${rows.length} tasks to ${filePath} (${format})`)
    return 0
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    printError(`Export failed: ${message}`)
    return 1
  }
}
