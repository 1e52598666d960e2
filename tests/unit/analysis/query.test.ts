/**
 * Query Helper Tests
 */

import { describe, it, expect } from 'vitest'
import {
  bottomRows,
  classifyQuadrant,
  filterRows,
  listDomains,
  listOccupations,
  prepareAnalysis,
  quadrantAnalysis,
  sortRows,
  topRows,
} from '../../../src/analysis'
import { ValidationError } from '../../../src/errors'
import { FALLBACK_TABLES } from '../../../src/loader'
import type { CombinedTable } from '../../../src/types/tables'
import { combinedRow, expertRow, workerRow } from '../../fixtures'

const combined: CombinedTable = prepareAnalysis(
  FALLBACK_TABLES.worker,
  FALLBACK_TABLES.expert,
  FALLBACK_TABLES.task
)

const ids = (rows: CombinedTable): string[] => rows.map(r => r.taskId)

describe('filterRows', () => {
  it('returns every row, as a new array, for an empty filter', () => {
    const result = filterRows(combined)

    expect(ids(result)).toEqual(['T001', 'T002', 'T003', 'T004', 'T005'])
    expect(result).not.toBe(combined)
  })

  it('filters by domain', () => {
    expect(ids(filterRows(combined, { domains: ['Healthcare', 'Technical'] }))).toEqual(['T004', 'T005'])
  })

  it('filters by occupation', () => {
    expect(ids(filterRows(combined, { occupations: ['Technical Writers'] }))).toEqual(['T005'])
  })

  it('treats empty lists as no restriction', () => {
    expect(filterRows(combined, { domains: [], occupations: [] })).toHaveLength(5)
  })

  it('filters by an inclusive desire range', () => {
    expect(ids(filterRows(combined, { desireRange: [3.5, 4.9] }))).toEqual(['T001', 'T002', 'T003'])
  })

  it('combines filters', () => {
    const result = filterRows(combined, { domains: ['Marketing', 'Healthcare'], desireRange: [1, 2] })
    expect(ids(result)).toEqual(['T004'])
  })

  it('drops rows without a desire rating only when a range is set', () => {
    const rows = [combinedRow({ taskId: 'A', automationDesireRating: undefined }), combinedRow({ taskId: 'B' })]

    expect(ids(filterRows(rows))).toEqual(['A', 'B'])
    expect(ids(filterRows(rows, { desireRange: [1, 5] }))).toEqual(['B'])
  })

  it('rejects an inverted desire range', () => {
    expect(() => filterRows(combined, { desireRange: [4, 2] })).toThrow(ValidationError)
    expect(() => filterRows(combined, { desireRange: [4, 2] })).toThrow('Invalid desire range: 4 > 2')
  })
})

describe('sortRows', () => {
  it('sorts descending by default', () => {
    expect(ids(sortRows(combined, 'automationReadiness'))).toEqual(['T003', 'T002', 'T001', 'T005', 'T004'])
  })

  it('sorts ascending', () => {
    expect(ids(sortRows(combined, 'automationReadiness', 'asc'))).toEqual(['T004', 'T005', 'T001', 'T002', 'T003'])
  })

  it('keeps input order for ties', () => {
    expect(ids(sortRows(combined, 'workerCount', 'desc'))).toEqual(['T001', 'T002', 'T003', 'T004', 'T005'])
    expect(ids(sortRows(combined, 'workerCount', 'asc'))).toEqual(['T003', 'T004', 'T005', 'T001', 'T002'])
  })

  it('puts undefined values last in both directions', () => {
    const rows = prepareAnalysis(
      [workerRow('A', 3), workerRow('B', 4), workerRow('C', 5)],
      [expertRow('B', 2), expertRow('C', 4)],
      []
    )

    expect(ids(sortRows(rows, 'expertCapabilityRating', 'desc'))).toEqual(['C', 'B', 'A'])
    expect(ids(sortRows(rows, 'expertCapabilityRating', 'asc'))).toEqual(['B', 'C', 'A'])
  })

  it('does not reorder its input', () => {
    const input = [combinedRow({ taskId: 'X', workerCount: 1 }), combinedRow({ taskId: 'Y', workerCount: 2 })]
    sortRows(input, 'workerCount')
    expect(ids(input)).toEqual(['X', 'Y'])
  })
})

describe('topRows / bottomRows', () => {
  it('returns the highest rows', () => {
    expect(ids(topRows(combined, 'automationDesireRating', 2))).toEqual(['T003', 'T002'])
  })

  it('returns the lowest rows', () => {
    expect(ids(bottomRows(combined, 'automationDesireRating', 2))).toEqual(['T004', 'T005'])
  })

  it('returns every row when n exceeds the table', () => {
    expect(topRows(combined, 'automationDesireRating', 10)).toHaveLength(5)
  })

  it('rejects negative or fractional counts', () => {
    expect(() => topRows(combined, 'automationDesireRating', -1)).toThrow('Invalid row count: -1')
    expect(() => bottomRows(combined, 'automationDesireRating', 1.5)).toThrow('Invalid row count: 1.5')
  })
})

describe('quadrantAnalysis', () => {
  it('partitions at the default threshold', () => {
    const result = quadrantAnalysis(combined)

    expect(result.threshold).toBe(3.5)
    expect(ids(result.ready)).toEqual(['T001', 'T002', 'T003'])
    expect(ids(result.wanted)).toEqual([])
    expect(ids(result.feasible)).toEqual(['T005'])
    expect(ids(result.low)).toEqual(['T004'])
    expect(ids(result.unrated)).toEqual([])
  })

  it('partitions at a custom threshold', () => {
    const result = quadrantAnalysis(combined, 4.5)

    expect(ids(result.ready)).toEqual(['T003'])
    expect(ids(result.wanted)).toEqual(['T002'])
    expect(ids(result.feasible)).toEqual([])
    expect(ids(result.low)).toEqual(['T001', 'T004', 'T005'])
  })

  it('rejects thresholds outside the rating scale', () => {
    expect(() => quadrantAnalysis(combined, 0)).toThrow(ValidationError)
    expect(() => quadrantAnalysis(combined, 5.5)).toThrow(
      'Quadrant threshold must be within [1, 5], got 5.5'
    )
  })
})

describe('classifyQuadrant', () => {
  it('counts values at the threshold as high', () => {
    const row = combinedRow({ automationDesireRating: 3.5, expertCapabilityRating: 3.5 })
    expect(classifyQuadrant(row, 3.5)).toBe('ready')
  })

  it('marks rows without expert capability as unrated', () => {
    expect(classifyQuadrant(combinedRow({ automationDesireRating: 5 }))).toBe('unrated')
  })

  it('marks rows without a desire rating as unrated', () => {
    const row = combinedRow({ automationDesireRating: undefined, expertCapabilityRating: 4 })
    expect(classifyQuadrant(row)).toBe('unrated')
  })

  it('separates wanted from feasible', () => {
    expect(classifyQuadrant(combinedRow({ automationDesireRating: 4, expertCapabilityRating: 2 }))).toBe('wanted')
    expect(classifyQuadrant(combinedRow({ automationDesireRating: 2, expertCapabilityRating: 4 }))).toBe('feasible')
  })
})

describe('listDomains / listOccupations', () => {
  it('lists distinct values in first-seen order', () => {
    expect(listDomains(combined)).toEqual(['Marketing', 'Research', 'Administration', 'Healthcare', 'Technical'])
    expect(listOccupations(combined)).toEqual([
      'Marketing Managers',
      'Market Research Analysts',
      'Administrative Assistants',
      'Clinical Social Workers',
      'Technical Writers',
    ])
  })
})
