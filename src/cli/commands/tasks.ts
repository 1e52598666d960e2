/**
 * Tasks Command
 *
 * List tasks of the combined table, filtered and ranked.
 *
 * Usage:
 *   workbank tasks [--sort <field>] [--order asc|desc] [--limit <n>]
 *                  [--domain <d>]... [--occupation <o>]...
 *                  [--min-desire <x>] [--max-desire <x>]
 */

import { filterRows, sortRows } from '../../analysis'
import type { CombinedAnalysisRow } from '../../types/tables'
import type { CommandContext, ParsedArgs } from '../types'
import { print, printError } from '../types'
import { formatRating, loadAnalysis, rowFilterFromArgs, simpleTable, truncate } from '../utils'

const TASK_TEXT_WIDTH = 48

export const TASK_TABLE_HEADERS = [
  'Task ID',
  'Desire',
  'Capability',
  'Readiness',
  'Gap',
  'Workers',
  'Domain',
  'Task',
]

export function taskTableRow(row: CombinedAnalysisRow): string[] {
  return [
    row.taskId,
    formatRating(row.automationDesireRating),
    formatRating(row.expertCapabilityRating),
    formatRating(row.automationReadiness),
    formatRating(row.desireCapabilityGap),
    String(row.workerCount),
    row.domain,
    truncate(row.task, TASK_TEXT_WIDTH),
  ]
}

export async function tasksCommand(parsed: ParsedArgs, ctx: CommandContext): Promise<number> {
  try {
    const { combined } = await loadAnalysis(ctx)
    const { options } = parsed

    const filtered = filterRows(combined, rowFilterFromArgs(options))
    if (filtered.length === 0) {
      print('No tasks match the filter.')
      return 0
    }

    const sorted = sortRows(filtered, options.sort ?? 'automationDesireRating', options.order)
    const shown = options.limit === undefined ? sorted : sorted.slice(0, options.limit)

    print(simpleTable(TASK_TABLE_HEADERS, shown.map(taskTableRow)))
    print(`\n${shown.length} of ${filtered.length} tasks`)

    return 0
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    printError(`Failed to list tasks: ${message}`)
    return 1
  }
}
