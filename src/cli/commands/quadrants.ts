/**
 * Quadrants Command
 *
 * Split tasks by worker desire against expert-rated capability and show the
 * most desired tasks of each quadrant.
 *
 * Usage:
 *   workbank quadrants [--threshold <t>] [--limit <n>] [--domain <d>]...
 */

import { filterRows, quadrantAnalysis, topRows, type Quadrant } from '../../analysis'
import { DEFAULT_QUADRANT_THRESHOLD } from '../../constants'
import type { CommandContext, ParsedArgs } from '../types'
import { print, printError } from '../types'
import { formatRating, keyValueLines, loadAnalysis, rowFilterFromArgs, truncate } from '../utils'

const DEFAULT_TASKS_PER_QUADRANT = 5

export const QUADRANT_LABELS: Record<Quadrant, string> = {
  ready: 'Ready (high desire, high capability)',
  wanted: 'Wanted (high desire, low capability)',
  feasible: 'Feasible (low desire, high capability)',
  low: 'Low (low desire, low capability)',
  unrated: 'Unrated (desire or capability missing)',
}

const QUADRANT_ORDER: readonly Quadrant[] = ['ready', 'wanted', 'feasible', 'low', 'unrated']

export async function quadrantsCommand(parsed: ParsedArgs, ctx: CommandContext): Promise<number> {
  try {
    const { combined } = await loadAnalysis(ctx)
    const rows = filterRows(combined, rowFilterFromArgs(parsed.options))
    const analysis = quadrantAnalysis(rows, parsed.options.threshold ?? DEFAULT_QUADRANT_THRESHOLD)
    const perQuadrant = parsed.options.limit ?? DEFAULT_TASKS_PER_QUADRANT

    print(`Quadrants at threshold ${analysis.threshold.toFixed(2)}`)
    const counts: Record<string, number> = {}
    for (const q of QUADRANT_ORDER) counts[QUADRANT_LABELS[q]] = analysis[q].length
    for (const line of keyValueLines(counts)) print(line)

    for (const q of QUADRANT_ORDER) {
      const top = topRows(analysis[q], 'automationDesireRating', perQuadrant)
      if (top.length === 0) continue
      print(`\n${QUADRANT_LABELS[q]}:`)
      for (const row of top) {
        print(
          `  ${row.taskId}  ${truncate(row.task, 48)}` +
          ` (desire ${formatRating(row.automationDesireRating)}, capability ${formatRating(row.expertCapabilityRating)})`
        )
      }
    }

    return 0
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    printError(`Failed to analyze quadrants: ${message}`)
    return 1
  }
}
