/**
 * Typed group-by aggregation
 *
 * Groups raw rows by task identifier and reduces each group to a typed
 * aggregate record. Groups keep the order in which their key was first
 * seen, and `first`-style fields take the value of the group's first row.
 *
 * @module analysis/aggregate
 */

import type { ExpertRating, WorkerResponse } from '../types/tables'

// =============================================================================
// Numeric Accumulators
// =============================================================================

/**
 * Arithmetic mean, or undefined for an empty list
 */
export function mean(values: readonly number[]): number | undefined {
  if (values.length === 0) return undefined
  let sum = 0
  for (const v of values) sum += v
  return sum / values.length
}

/**
 * Sample standard deviation (n - 1 denominator), or undefined for fewer
 * than two values
 */
export function sampleStdDev(values: readonly number[]): number | undefined {
  if (values.length < 2) return undefined
  const m = mean(values)
  if (m === undefined) return undefined
  let squares = 0
  for (const v of values) squares += (v - m) * (v - m)
  return Math.sqrt(squares / (values.length - 1))
}

/**
 * Defined, non-NaN entries of a list
 */
export function definedValues(values: readonly (number | undefined)[]): number[] {
  const result: number[] = []
  for (const v of values) {
    if (v !== undefined && !Number.isNaN(v)) result.push(v)
  }
  return result
}

/**
 * Mean over the defined entries of a list, or undefined if there are none
 */
export function meanDefined(values: readonly (number | undefined)[]): number | undefined {
  return mean(definedValues(values))
}

// =============================================================================
// Group By
// =============================================================================

/**
 * Group rows by a string key, preserving first-seen key order
 */
export function groupBy<T>(rows: readonly T[], key: (row: T) => string): Map<string, T[]> {
  const groups = new Map<string, T[]>()
  for (const row of rows) {
    const k = key(row)
    const group = groups.get(k)
    if (group) {
      group.push(row)
    } else {
      groups.set(k, [row])
    }
  }
  return groups
}

// =============================================================================
// Task Aggregates
// =============================================================================

/**
 * Worker responses reduced to one record per task. Means and the standard
 * deviation skip blank ratings.
 */
export interface WorkerAggregate {
  taskId: string
  task: string
  occupation: string
  domain: string
  automationDesireMean: number | undefined
  automationDesireStd: number | undefined
  workerCount: number
  jobSecurityMean: number | undefined
  enjoymentMean: number | undefined
}

/**
 * Expert ratings reduced to one record per task
 */
export interface ExpertAggregate {
  taskId: string
  expertCapabilityMean: number | undefined
  confidenceMean: number | undefined
}

/**
 * Aggregate worker responses per task. Task text, occupation and domain are
 * taken from the first row of each group without checking the rest agree.
 */
export function aggregateWorkers(rows: readonly WorkerResponse[]): WorkerAggregate[] {
  const result: WorkerAggregate[] = []

  for (const [taskId, group] of groupBy(rows, r => r.taskId)) {
    const [first] = group
    if (!first) continue

    const desire = definedValues(group.map(r => r.automationDesireRating))

    result.push({
      taskId,
      task: first.task,
      occupation: first.occupation,
      domain: first.domain,
      automationDesireMean: mean(desire),
      automationDesireStd: sampleStdDev(desire),
      workerCount: group.length,
      jobSecurityMean: meanDefined(group.map(r => r.jobSecurityRating)),
      enjoymentMean: meanDefined(group.map(r => r.enjoymentRating)),
    })
  }

  return result
}

/**
 * Aggregate expert ratings per task, keyed by task id
 */
export function aggregateExperts(rows: readonly ExpertRating[]): Map<string, ExpertAggregate> {
  const result = new Map<string, ExpertAggregate>()

  for (const [taskId, group] of groupBy(rows, r => r.taskId)) {
    result.set(taskId, {
      taskId,
      expertCapabilityMean: meanDefined(group.map(r => r.expertCapabilityRating)),
      confidenceMean: meanDefined(group.map(r => r.confidence)),
    })
  }

  return result
}
