/**
 * Column layout of the exported combined table
 *
 * Shared by the CSV and Parquet exporters so both formats carry the same
 * headers in the same order, and rebuild rows the same way.
 *
 * @module export/columns
 */

import { SchemaMismatchError } from '../errors'
import type { CombinedAnalysisRow } from '../types/tables'

export type ColumnKind = 'string' | 'number' | 'integer'

export interface CombinedColumn {
  key: keyof CombinedAnalysisRow
  header: string
  kind: ColumnKind
}

export const COMBINED_COLUMNS = [
  { key: 'taskId', header: 'Task ID', kind: 'string' },
  { key: 'task', header: 'Task', kind: 'string' },
  { key: 'occupation', header: 'Occupation', kind: 'string' },
  { key: 'domain', header: 'Domain', kind: 'string' },
  { key: 'taskCategory', header: 'Task Category', kind: 'string' },
  { key: 'onetSocCode', header: 'O*NET-SOC Code', kind: 'string' },
  { key: 'automationDesireRating', header: 'Automation Desire Rating', kind: 'number' },
  { key: 'automationDesireStd', header: 'Automation Desire Std', kind: 'number' },
  { key: 'workerCount', header: 'Worker Count', kind: 'integer' },
  { key: 'jobSecurityRating', header: 'Job Security Rating', kind: 'number' },
  { key: 'enjoymentRating', header: 'Enjoyment Rating', kind: 'number' },
  { key: 'expertCapabilityRating', header: 'Expert Capability Rating', kind: 'number' },
  { key: 'confidence', header: 'Confidence', kind: 'number' },
  { key: 'automationReadiness', header: 'Automation Readiness', kind: 'number' },
  { key: 'desireCapabilityGap', header: 'Desire Capability Gap', kind: 'number' },
] as const satisfies readonly CombinedColumn[]

export const COMBINED_HEADERS: readonly string[] = COMBINED_COLUMNS.map(c => c.header)

/**
 * Typed access to the cells of one exported row, by header
 */
export interface CellReader {
  /** String cell; undefined when empty or absent */
  string(header: string): string | undefined
  /** Numeric cell; undefined when empty or absent, NaN when unparseable */
  number(header: string): number | undefined
}

/**
 * Rebuild a combined row from its exported cells. Only the task id and the
 * worker count must be present. An empty task, occupation or domain cell
 * reads back as '', every other empty cell as undefined.
 *
 * @param row - 1-based row number for error messages
 */
export function readCombinedRow(cells: CellReader, row: number): CombinedAnalysisRow {
  const requireString = (header: string): string => {
    const value = cells.string(header)
    if (value === undefined) {
      throw new SchemaMismatchError('combined', `empty value in column "${header}"`, { column: header, row })
    }
    return value
  }

  const optionalNumber = (header: string): number | undefined => {
    const value = cells.number(header)
    if (value !== undefined && Number.isNaN(value)) {
      throw new SchemaMismatchError('combined', `non-numeric value in column "${header}"`, { column: header, row })
    }
    return value
  }

  const requireNumber = (header: string): number => {
    const value = optionalNumber(header)
    if (value === undefined) {
      throw new SchemaMismatchError('combined', `empty value in column "${header}"`, { column: header, row })
    }
    return value
  }

  const workerCount = requireNumber('Worker Count')
  if (!Number.isInteger(workerCount) || workerCount < 1) {
    throw new SchemaMismatchError('combined', `invalid worker count ${workerCount}`, {
      column: 'Worker Count',
      row,
      value: workerCount,
    })
  }

  return {
    taskId: requireString('Task ID'),
    task: cells.string('Task') ?? '',
    occupation: cells.string('Occupation') ?? '',
    domain: cells.string('Domain') ?? '',
    taskCategory: cells.string('Task Category'),
    onetSocCode: cells.string('O*NET-SOC Code'),
    automationDesireRating: optionalNumber('Automation Desire Rating'),
    automationDesireStd: optionalNumber('Automation Desire Std'),
    workerCount,
    jobSecurityRating: optionalNumber('Job Security Rating'),
    enjoymentRating: optionalNumber('Enjoyment Rating'),
    expertCapabilityRating: optionalNumber('Expert Capability Rating'),
    confidence: optionalNumber('Confidence'),
    automationReadiness: optionalNumber('Automation Readiness'),
    desireCapabilityGap: optionalNumber('Desire Capability Gap'),
  }
}

/**
 * Throw unless every exported column is present
 */
export function assertCombinedHeaders(headers: readonly string[]): void {
  const present = new Set(headers)
  const missing = COMBINED_HEADERS.filter(h => !present.has(h))
  if (missing.length > 0) {
    throw new SchemaMismatchError(
      'combined',
      `missing column${missing.length > 1 ? 's' : ''} ${missing.map(h => `"${h}"`).join(', ')}`,
      { column: missing[0] ?? 'combined' }
    )
  }
}
