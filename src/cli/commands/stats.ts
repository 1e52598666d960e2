/**
 * Stats Command
 *
 * Show summary statistics of the combined table and where the data came
 * from.
 *
 * Usage:
 *   workbank stats [--offline]
 */

import { summaryStatistics } from '../../analysis'
import type { CommandContext, ParsedArgs } from '../types'
import { print, printError } from '../types'
import { describeSource, formatRating, keyValueLines, loadAnalysis } from '../utils'

export async function statsCommand(_parsed: ParsedArgs, ctx: CommandContext): Promise<number> {
  try {
    const { result, combined } = await loadAnalysis(ctx)
    const stats = summaryStatistics(combined)

    print('WORKBank summary')
    const lines = keyValueLines({
      ...describeSource(result, ctx.datasetId),
      'Tasks': stats.totalTasks,
      'Workers': stats.totalWorkers,
      'Occupations': stats.uniqueOccupations,
      'Domains': stats.uniqueDomains,
      'Avg automation desire': formatRating(stats.avgAutomationDesire),
      'Avg expert capability': formatRating(stats.avgExpertCapability),
      'Avg automation readiness': formatRating(stats.avgAutomationReadiness),
    })
    for (const line of lines) print(line)

    return 0
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    printError(`Failed to compute stats: ${message}`)
    return 1
  }
}
