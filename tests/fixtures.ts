/**
 * Test fixtures
 *
 * Row builders for the raw tables, and writers that render rows as CSV in
 * the remote resource layout.
 */

import { EXPERT_COLUMNS, TASK_COLUMNS, WORKER_COLUMNS } from '../src/loader/schema'
import { formatCsv } from '../src/utils/csv'
import type {
  CombinedAnalysisRow,
  ExpertRating,
  RawTables,
  TaskMetadata,
  WorkerResponse,
} from '../src/types/tables'

// =============================================================================
// Row Builders
// =============================================================================

export function workerRow(
  taskId: string,
  automationDesireRating: number | undefined,
  overrides: Partial<WorkerResponse> = {}
): WorkerResponse {
  return {
    taskId,
    task: `Task ${taskId}`,
    occupation: 'Analysts',
    domain: 'Research',
    automationDesireRating,
    jobSecurityRating: 3,
    enjoymentRating: 3,
    workerId: `W-${taskId}`,
    ...overrides,
  }
}

export function expertRow(
  taskId: string,
  expertCapabilityRating: number | undefined,
  overrides: Partial<ExpertRating> = {}
): ExpertRating {
  return {
    taskId,
    task: `Task ${taskId}`,
    expertCapabilityRating,
    confidence: 4,
    expertId: `E-${taskId}`,
    ...overrides,
  }
}

export function taskRow(taskId: string, overrides: Partial<TaskMetadata> = {}): TaskMetadata {
  return {
    taskId,
    task: `Task ${taskId}`,
    occupation: 'Analysts',
    onetSocCode: '15-2041.00',
    domain: 'Research',
    taskCategory: 'Analytical',
    ...overrides,
  }
}

/**
 * A combined row with every optional field undefined
 */
export function combinedRow(overrides: Partial<CombinedAnalysisRow> = {}): CombinedAnalysisRow {
  return {
    taskId: 'T9',
    task: 'Review, edit "draft" copy',
    occupation: 'Editors',
    domain: 'Media',
    taskCategory: undefined,
    onetSocCode: '27-3041.00',
    automationDesireRating: 3.5,
    automationDesireStd: undefined,
    workerCount: 1,
    jobSecurityRating: 2,
    enjoymentRating: 4.25,
    expertCapabilityRating: undefined,
    confidence: undefined,
    automationReadiness: undefined,
    desireCapabilityGap: undefined,
    ...overrides,
  }
}

// =============================================================================
// CSV Writers
// =============================================================================

function cell(value: number | undefined): string {
  return value === undefined ? '' : String(value)
}

export function workerCsv(rows: readonly WorkerResponse[]): string {
  return formatCsv(
    Object.values(WORKER_COLUMNS),
    rows.map(r => [
      r.taskId,
      r.task,
      r.occupation,
      cell(r.automationDesireRating),
      cell(r.jobSecurityRating),
      cell(r.enjoymentRating),
      r.workerId,
      r.domain,
    ])
  )
}

export function expertCsv(rows: readonly ExpertRating[]): string {
  return formatCsv(
    Object.values(EXPERT_COLUMNS),
    rows.map(r => [r.taskId, r.task, cell(r.expertCapabilityRating), r.expertId, cell(r.confidence)])
  )
}

export function taskCsv(rows: readonly TaskMetadata[]): string {
  return formatCsv(
    Object.values(TASK_COLUMNS),
    rows.map(r => [r.taskId, r.task, r.occupation, r.onetSocCode, r.domain, r.taskCategory])
  )
}

/**
 * Small remote table set, distinct from the fallback tables
 */
export const REMOTE_TABLES: RawTables = {
  worker: [
    workerRow('R1', 5, { workerId: 'W1' }),
    workerRow('R1', 3, { workerId: 'W2' }),
    workerRow('R2', 2, { workerId: 'W3', domain: 'Legal', occupation: 'Paralegals' }),
  ],
  expert: [expertRow('R1', 4.5)],
  task: [taskRow('R1'), taskRow('R2', { domain: 'Legal', occupation: 'Paralegals' })],
}

/**
 * The remote table set as CSV files keyed by resource path
 */
export function remoteFiles(tables: RawTables = REMOTE_TABLES): Record<string, string> {
  return {
    'worker_data/domain_worker_desires.csv': workerCsv(tables.worker),
    'expert_ratings/expert_rated_technological_capability.csv': expertCsv(tables.expert),
    'task_data/task_statement_with_metadata.csv': taskCsv(tables.task),
  }
}
