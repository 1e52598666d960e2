/**
 * Query helpers over the combined analysis table
 *
 * Filtering, ranking and quadrant classification used by the presentation
 * layer. All helpers return new arrays and leave their input untouched.
 *
 * @module analysis/query
 */

import { DEFAULT_QUADRANT_THRESHOLD, RATING_MAX, RATING_MIN } from '../constants'
import { assertValid } from '../errors'
import type { CombinedAnalysisRow, CombinedTable, SortableField } from '../types/tables'

// =============================================================================
// Filtering
// =============================================================================

/**
 * Row filter. Absent or empty lists do not restrict.
 */
export interface RowFilter {
  domains?: readonly string[] | undefined
  occupations?: readonly string[] | undefined
  /** Inclusive [min, max] bounds on mean automation desire; rows without one are dropped */
  desireRange?: readonly [number, number] | undefined
}

export function filterRows(rows: CombinedTable, filter: RowFilter = {}): CombinedAnalysisRow[] {
  const domains = filter.domains && filter.domains.length > 0 ? new Set(filter.domains) : undefined
  const occupations = filter.occupations && filter.occupations.length > 0
    ? new Set(filter.occupations)
    : undefined

  const range = filter.desireRange
  if (range) {
    assertValid(range[0] <= range[1], `Invalid desire range: ${range[0]} > ${range[1]}`, {
      field: 'desireRange',
      actualValue: range,
    })
  }

  const inRange = (desire: number | undefined): boolean =>
    !range || (desire !== undefined && desire >= range[0] && desire <= range[1])

  return rows.filter(row =>
    (!domains || domains.has(row.domain)) &&
    (!occupations || occupations.has(row.occupation)) &&
    inRange(row.automationDesireRating)
  )
}

// =============================================================================
// Sorting
// =============================================================================

export type SortOrder = 'asc' | 'desc'

/**
 * Stable sort by a numeric field. Rows where the field is undefined sort
 * last in both directions.
 */
export function sortRows(
  rows: CombinedTable,
  field: SortableField,
  order: SortOrder = 'desc'
): CombinedAnalysisRow[] {
  const direction = order === 'asc' ? 1 : -1
  return [...rows].sort((a, b) => {
    const av = a[field]
    const bv = b[field]
    if (av === undefined && bv === undefined) return 0
    if (av === undefined) return 1
    if (bv === undefined) return -1
    return (av - bv) * direction
  })
}

/**
 * The `n` rows with the highest value of `field`
 */
export function topRows(rows: CombinedTable, field: SortableField, n: number): CombinedAnalysisRow[] {
  assertValid(Number.isInteger(n) && n >= 0, `Invalid row count: ${n}`, { field: 'n', actualValue: n })
  return sortRows(rows, field, 'desc').slice(0, n)
}

/**
 * The `n` rows with the lowest value of `field`
 */
export function bottomRows(rows: CombinedTable, field: SortableField, n: number): CombinedAnalysisRow[] {
  assertValid(Number.isInteger(n) && n >= 0, `Invalid row count: ${n}`, { field: 'n', actualValue: n })
  return sortRows(rows, field, 'asc').slice(0, n)
}

// =============================================================================
// Quadrant Analysis
// =============================================================================

/**
 * Tasks partitioned by worker desire against AI capability
 */
export interface QuadrantAnalysis {
  threshold: number
  /** High desire, high capability */
  ready: CombinedAnalysisRow[]
  /** High desire, low capability */
  wanted: CombinedAnalysisRow[]
  /** Low desire, high capability */
  feasible: CombinedAnalysisRow[]
  /** Low desire, low capability */
  low: CombinedAnalysisRow[]
  /** No expert capability rating or no desire rating */
  unrated: CombinedAnalysisRow[]
}

export type Quadrant = Exclude<keyof QuadrantAnalysis, 'threshold'>

/**
 * Quadrant of one row; "high" means at or above the threshold
 */
export function classifyQuadrant(
  row: CombinedAnalysisRow,
  threshold: number = DEFAULT_QUADRANT_THRESHOLD
): Quadrant {
  const capability = row.expertCapabilityRating
  const desire = row.automationDesireRating
  if (capability === undefined || desire === undefined) return 'unrated'
  const highDesire = desire >= threshold
  const highCapability = capability >= threshold
  if (highDesire) return highCapability ? 'ready' : 'wanted'
  return highCapability ? 'feasible' : 'low'
}

/**
 * Partition rows into quadrants, preserving input order within each
 */
export function quadrantAnalysis(
  rows: CombinedTable,
  threshold: number = DEFAULT_QUADRANT_THRESHOLD
): QuadrantAnalysis {
  assertValid(
    threshold >= RATING_MIN && threshold <= RATING_MAX,
    `Quadrant threshold must be within [${RATING_MIN}, ${RATING_MAX}], got ${threshold}`,
    { field: 'threshold', actualValue: threshold }
  )

  const result: QuadrantAnalysis = {
    threshold,
    ready: [],
    wanted: [],
    feasible: [],
    low: [],
    unrated: [],
  }
  for (const row of rows) {
    result[classifyQuadrant(row, threshold)].push(row)
  }
  return result
}

// =============================================================================
// Distinct Values
// =============================================================================

function distinct(values: readonly string[]): string[] {
  return [...new Set(values)]
}

/**
 * Distinct domains in first-seen order
 */
export function listDomains(rows: CombinedTable): string[] {
  return distinct(rows.map(r => r.domain))
}

/**
 * Distinct occupations in first-seen order
 */
export function listOccupations(rows: CombinedTable): string[] {
  return distinct(rows.map(r => r.occupation))
}
