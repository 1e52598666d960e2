/**
 * Table Types
 *
 * Typed records for the three raw WORKBank tables and for the combined
 * task-level analysis table derived from them.
 *
 * @module types/tables
 */

// =============================================================================
// Raw Tables
// =============================================================================

/**
 * One worker's ratings for one task. `taskId` is not unique in this table.
 * A rating is undefined where the worker left the cell blank.
 */
export interface WorkerResponse {
  readonly taskId: string
  readonly task: string
  readonly occupation: string
  readonly domain: string
  /** Desire for the task to be automated by AI (1-5) */
  readonly automationDesireRating: number | undefined
  /** Perceived job security if the task were automated (1-5) */
  readonly jobSecurityRating: number | undefined
  /** Enjoyment of doing the task (1-5) */
  readonly enjoymentRating: number | undefined
  readonly workerId: string
}

/**
 * One expert's assessment of AI capability for one task.
 * `taskId` is not unique in this table.
 */
export interface ExpertRating {
  readonly taskId: string
  readonly task: string
  /** Current AI technological capability for the task (1-5) */
  readonly expertCapabilityRating: number | undefined
  /** Expert's confidence in the rating (1-5) */
  readonly confidence: number | undefined
  readonly expertId: string
}

/**
 * Task metadata, one row per task
 */
export interface TaskMetadata {
  readonly taskId: string
  readonly task: string
  readonly occupation: string
  /** Standardized O*NET-SOC occupation code, e.g. "11-2021.00" */
  readonly onetSocCode: string
  readonly domain: string
  readonly taskCategory: string
}

/**
 * The three raw tables, always loaded together
 */
export interface RawTables {
  readonly worker: readonly WorkerResponse[]
  readonly expert: readonly ExpertRating[]
  readonly task: readonly TaskMetadata[]
}

export type TableName = keyof RawTables

// =============================================================================
// Combined Table
// =============================================================================

/**
 * Task-level row of the combined analysis table.
 *
 * Optional fields are undefined when the underlying data does not exist:
 * no expert ratings, no metadata row, no rating in any contributing row, or
 * fewer than two desire ratings (no sample standard deviation).
 */
export interface CombinedAnalysisRow {
  readonly taskId: string
  readonly task: string
  readonly occupation: string
  readonly domain: string
  readonly taskCategory: string | undefined
  readonly onetSocCode: string | undefined
  /** Mean automation desire across workers */
  readonly automationDesireRating: number | undefined
  /** Sample standard deviation of automation desire (n - 1) */
  readonly automationDesireStd: number | undefined
  /** Worker response rows for the task */
  readonly workerCount: number
  readonly jobSecurityRating: number | undefined
  readonly enjoymentRating: number | undefined
  /** Mean expert capability rating */
  readonly expertCapabilityRating: number | undefined
  /** Mean expert confidence */
  readonly confidence: number | undefined
  /** min(automation desire, expert capability) */
  readonly automationReadiness: number | undefined
  /** automation desire - expert capability */
  readonly desireCapabilityGap: number | undefined
}

export type CombinedTable = readonly CombinedAnalysisRow[]

/**
 * Dashboard-level statistics over the combined table.
 * Means are undefined when no row has a value for the field.
 */
export interface SummaryStatistics {
  readonly totalTasks: number
  readonly totalWorkers: number
  readonly avgAutomationDesire: number | undefined
  readonly avgExpertCapability: number | undefined
  readonly avgAutomationReadiness: number | undefined
  readonly uniqueOccupations: number
  readonly uniqueDomains: number
}

/**
 * Numeric columns of the combined table that rows can be ranked by
 */
export type SortableField =
  | 'automationDesireRating'
  | 'expertCapabilityRating'
  | 'automationReadiness'
  | 'desireCapabilityGap'
  | 'workerCount'

export const SORTABLE_FIELDS: readonly SortableField[] = [
  'automationDesireRating',
  'expertCapabilityRating',
  'automationReadiness',
  'desireCapabilityGap',
  'workerCount',
]

export function isSortableField(value: string): value is SortableField {
  return SORTABLE_FIELDS.some(field => field === value)
}
