/**
 * Parquet Export Tests
 */

import { describe, it, expect } from 'vitest'
import { parquetReadObjects } from 'hyparquet'
import { prepareAnalysis } from '../../../src/analysis'
import { ValidationError } from '../../../src/errors'
import { COMBINED_HEADERS, fromParquet, toParquet } from '../../../src/export'
import { FALLBACK_TABLES } from '../../../src/loader'
import type { CombinedAnalysisRow } from '../../../src/types/tables'
import { combinedRow } from '../../fixtures'

const combined = prepareAnalysis(FALLBACK_TABLES.worker, FALLBACK_TABLES.expert, FALLBACK_TABLES.task)

describe('toParquet / fromParquet', () => {
  it('reads back the combined table', async () => {
    const rows = await fromParquet(toParquet(combined))

    expect(rows).toEqual(combined)
  })

  it('keeps undefined values undefined', async () => {
    const withGaps: CombinedAnalysisRow[] = [...combined, combinedRow()]

    const rows = await fromParquet(toParquet(withGaps))

    expect(rows).toHaveLength(6)
    expect(rows[5]).toEqual(combinedRow())
  })

  it('reads back blank text and rating fields', async () => {
    const row = combinedRow({ occupation: '', domain: '', automationDesireRating: undefined })

    const rows = await fromParquet(toParquet([...combined, row]))

    expect(rows[5]).toEqual(row)
  })

  it('accepts a Uint8Array view', async () => {
    const rows = await fromParquet(new Uint8Array(toParquet(combined)))

    expect(rows.map(r => r.taskId)).toEqual(['T001', 'T002', 'T003', 'T004', 'T005'])
  })

  it('names columns like the CSV export', async () => {
    const records = await parquetReadObjects({ file: toParquet(combined) })

    expect(Object.keys(records[0] ?? {}).sort()).toEqual([...COMBINED_HEADERS].sort())
  })

  it('refuses to write an empty table', () => {
    expect(() => toParquet([])).toThrow(ValidationError)
    expect(() => toParquet([])).toThrow('Cannot write an empty table to Parquet')
  })
})
