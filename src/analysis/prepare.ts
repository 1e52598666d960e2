/**
 * Analysis Transformer
 *
 * Joins the three raw tables into the task-level combined analysis table
 * and computes dashboard summary statistics from it. Both operations are
 * pure: inputs are never mutated and the returned table is frozen.
 *
 * @module analysis/prepare
 */

import type {
  CombinedAnalysisRow,
  CombinedTable,
  ExpertRating,
  SummaryStatistics,
  TaskMetadata,
  WorkerResponse,
} from '../types/tables'
import { aggregateExperts, aggregateWorkers, meanDefined } from './aggregate'

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value === '' ? undefined : value
}

/**
 * Build the combined analysis table.
 *
 * - Worker responses drive the join: one output row per task id present in
 *   `worker`, in first-seen order. Tasks found only in `expert` or `task`
 *   are dropped.
 * - Expert fields are undefined for tasks without expert ratings.
 * - Only the occupation code and task category are taken from `task`; the
 *   first metadata row wins if a task id repeats. A blank cell there counts
 *   as missing.
 * - Readiness and gap are undefined whenever mean desire or expert
 *   capability is.
 *
 * @example
 * ```typescript
 * const combined = prepareAnalysis(tables.worker, tables.expert, tables.task)
 * combined[0].automationReadiness // min(desire, capability)
 * ```
 */
export function prepareAnalysis(
  worker: readonly WorkerResponse[],
  expert: readonly ExpertRating[],
  task: readonly TaskMetadata[]
): CombinedTable {
  const experts = aggregateExperts(expert)

  const metadata = new Map<string, TaskMetadata>()
  for (const row of task) {
    if (!metadata.has(row.taskId)) metadata.set(row.taskId, row)
  }

  const rows = aggregateWorkers(worker).map((agg): CombinedAnalysisRow => {
    const exp = experts.get(agg.taskId)
    const meta = metadata.get(agg.taskId)
    const desire = agg.automationDesireMean
    const capability = exp?.expertCapabilityMean
    const both = desire !== undefined && capability !== undefined

    return Object.freeze({
      taskId: agg.taskId,
      task: agg.task,
      occupation: agg.occupation,
      domain: agg.domain,
      taskCategory: nonEmpty(meta?.taskCategory),
      onetSocCode: nonEmpty(meta?.onetSocCode),
      automationDesireRating: desire,
      automationDesireStd: agg.automationDesireStd,
      workerCount: agg.workerCount,
      jobSecurityRating: agg.jobSecurityMean,
      enjoymentRating: agg.enjoymentMean,
      expertCapabilityRating: capability,
      confidence: exp?.confidenceMean,
      automationReadiness: both ? Math.min(desire, capability) : undefined,
      desireCapabilityGap: both ? desire - capability : undefined,
    })
  })

  return Object.freeze(rows)
}

/**
 * Summary statistics over a combined table. Means skip rows where the field
 * is undefined and are themselves undefined when no row has a value.
 */
export function summaryStatistics(combined: CombinedTable): SummaryStatistics {
  let totalWorkers = 0
  const occupations = new Set<string>()
  const domains = new Set<string>()

  for (const row of combined) {
    totalWorkers += row.workerCount
    occupations.add(row.occupation)
    domains.add(row.domain)
  }

  return {
    totalTasks: combined.length,
    totalWorkers,
    avgAutomationDesire: meanDefined(combined.map(r => r.automationDesireRating)),
    avgExpertCapability: meanDefined(combined.map(r => r.expertCapabilityRating)),
    avgAutomationReadiness: meanDefined(combined.map(r => r.automationReadiness)),
    uniqueOccupations: occupations.size,
    uniqueDomains: domains.size,
  }
}
