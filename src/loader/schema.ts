/**
 * Raw table schemas
 *
 * Column contracts of the three remote CSV resources and the parsers that
 * turn their string cells into typed records. Every remote table passes
 * through here, so a drifted remote schema surfaces as a
 * SchemaMismatchError at load time instead of as undefined values deep in
 * the aggregation. Blank rating cells are allowed and read as undefined.
 *
 * @module loader/schema
 */

import { RATING_MIN, RATING_MAX } from '../constants'
import { SchemaMismatchError } from '../errors'
import type { CsvDocument } from '../utils/csv'
import type {
  ExpertRating,
  TableName,
  TaskMetadata,
  WorkerResponse,
} from '../types/tables'

// =============================================================================
// Column Names
// =============================================================================

export const WORKER_COLUMNS = {
  taskId: 'Task ID',
  task: 'Task',
  occupation: 'Occupation (O*NET-SOC Title)',
  automationDesireRating: 'Automation Desire Rating',
  jobSecurityRating: 'Job Security Rating',
  enjoymentRating: 'Enjoyment Rating',
  workerId: 'Worker ID',
  domain: 'Domain',
} as const satisfies Record<keyof WorkerResponse, string>

export const EXPERT_COLUMNS = {
  taskId: 'Task ID',
  task: 'Task',
  expertCapabilityRating: 'Expert Capability Rating',
  expertId: 'Expert ID',
  confidence: 'Confidence',
} as const satisfies Record<keyof ExpertRating, string>

export const TASK_COLUMNS = {
  taskId: 'Task ID',
  task: 'Task',
  occupation: 'Occupation (O*NET-SOC Title)',
  onetSocCode: 'O*NET-SOC Code',
  domain: 'Domain',
  taskCategory: 'Task Category',
} as const satisfies Record<keyof TaskMetadata, string>

// =============================================================================
// Row Reader
// =============================================================================

/**
 * Reads typed cells out of one CSV record, reporting failures against the
 * table and 1-based data row they came from
 */
class RowReader {
  constructor(
    private readonly table: TableName,
    private readonly record: Record<string, string>,
    private readonly row: number
  ) {}

  /** Non-empty string cell (identifiers) */
  key(column: string): string {
    const value = this.text(column)
    if (value === '') {
      throw new SchemaMismatchError(this.table, `empty value in column "${column}"`, {
        column,
        row: this.row,
      })
    }
    return value
  }

  /** String cell, surrounding whitespace removed */
  text(column: string): string {
    return (this.record[column] ?? '').trim()
  }

  /** Numeric cell on the bounded rating scale; undefined when blank */
  rating(column: string): number | undefined {
    const raw = this.text(column)
    if (raw === '') return undefined
    const value = Number(raw)
    if (!Number.isFinite(value)) {
      throw new SchemaMismatchError(this.table, `non-numeric value in column "${column}"`, {
        column,
        row: this.row,
        value: raw,
      })
    }
    if (value < RATING_MIN || value > RATING_MAX) {
      throw new SchemaMismatchError(
        this.table,
        `value ${value} in column "${column}" outside [${RATING_MIN}, ${RATING_MAX}]`,
        { column, row: this.row, value }
      )
    }
    return value
  }
}

/**
 * Throw if any contract column is absent from the header row
 */
export function assertColumns(
  table: TableName,
  headers: readonly string[],
  columns: Record<string, string>
): void {
  const present = new Set(headers)
  const missing = Object.values(columns).filter(column => !present.has(column))
  if (missing.length > 0) {
    throw new SchemaMismatchError(
      table,
      `missing column${missing.length > 1 ? 's' : ''} ${missing.map(c => `"${c}"`).join(', ')}`,
      { column: missing[0] ?? table }
    )
  }
}

// =============================================================================
// Parsers
// =============================================================================

export function parseWorkerTable(doc: CsvDocument): WorkerResponse[] {
  assertColumns('worker', doc.headers, WORKER_COLUMNS)
  return doc.records.map((record, i) => {
    const r = new RowReader('worker', record, i + 1)
    return {
      taskId: r.key(WORKER_COLUMNS.taskId),
      task: r.text(WORKER_COLUMNS.task),
      occupation: r.text(WORKER_COLUMNS.occupation),
      domain: r.text(WORKER_COLUMNS.domain),
      automationDesireRating: r.rating(WORKER_COLUMNS.automationDesireRating),
      jobSecurityRating: r.rating(WORKER_COLUMNS.jobSecurityRating),
      enjoymentRating: r.rating(WORKER_COLUMNS.enjoymentRating),
      workerId: r.key(WORKER_COLUMNS.workerId),
    }
  })
}

export function parseExpertTable(doc: CsvDocument): ExpertRating[] {
  assertColumns('expert', doc.headers, EXPERT_COLUMNS)
  return doc.records.map((record, i) => {
    const r = new RowReader('expert', record, i + 1)
    return {
      taskId: r.key(EXPERT_COLUMNS.taskId),
      task: r.text(EXPERT_COLUMNS.task),
      expertCapabilityRating: r.rating(EXPERT_COLUMNS.expertCapabilityRating),
      confidence: r.rating(EXPERT_COLUMNS.confidence),
      expertId: r.key(EXPERT_COLUMNS.expertId),
    }
  })
}

export function parseTaskTable(doc: CsvDocument): TaskMetadata[] {
  assertColumns('task', doc.headers, TASK_COLUMNS)
  return doc.records.map((record, i) => {
    const r = new RowReader('task', record, i + 1)
    return {
      taskId: r.key(TASK_COLUMNS.taskId),
      task: r.text(TASK_COLUMNS.task),
      occupation: r.text(TASK_COLUMNS.occupation),
      onetSocCode: r.text(TASK_COLUMNS.onetSocCode),
      domain: r.text(TASK_COLUMNS.domain),
      taskCategory: r.text(TASK_COLUMNS.taskCategory),
    }
  })
}
