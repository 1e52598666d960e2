/**
 * Analysis Transformer
 *
 * @module analysis
 */

export { prepareAnalysis, summaryStatistics } from './prepare'

export {
  aggregateWorkers,
  aggregateExperts,
  groupBy,
  mean,
  meanDefined,
  sampleStdDev,
  type WorkerAggregate,
  type ExpertAggregate,
} from './aggregate'

export {
  filterRows,
  sortRows,
  topRows,
  bottomRows,
  classifyQuadrant,
  quadrantAnalysis,
  listDomains,
  listOccupations,
  type RowFilter,
  type SortOrder,
  type Quadrant,
  type QuadrantAnalysis,
} from './query'
