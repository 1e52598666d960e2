/**
 * WORKBank analysis - worker automation desire against expert-rated AI
 * capability, joined per occupational task
 *
 * @packageDocumentation
 */

// =============================================================================
// Loading
// =============================================================================

export {
  DatasetLoader,
  createDatasetLoader,
  loadRawTables,
  describeCounts,
  HuggingFaceSource,
  FALLBACK_TABLES,
  fallbackTables,
  WORKER_COLUMNS,
  EXPERT_COLUMNS,
  TASK_COLUMNS,
  parseWorkerTable,
  parseExpertTable,
  parseTaskTable,
  type DatasetLoaderOptions,
  type LoadResult,
  type RemoteLoadResult,
  type FallbackLoadResult,
  type HuggingFaceSourceOptions,
  type TableSource,
  type FetchFn,
} from './loader'

// =============================================================================
// Analysis
// =============================================================================

export {
  prepareAnalysis,
  summaryStatistics,
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
} from './analysis'

// =============================================================================
// Export
// =============================================================================

export { toCsv, fromCsv, toParquet, fromParquet, COMBINED_HEADERS } from './export'

// =============================================================================
// Types
// =============================================================================

export type {
  WorkerResponse,
  ExpertRating,
  TaskMetadata,
  RawTables,
  TableName,
  CombinedAnalysisRow,
  CombinedTable,
  SummaryStatistics,
  SortableField,
} from './types/tables'
export { SORTABLE_FIELDS, isSortableField } from './types/tables'

// =============================================================================
// Configuration, Errors, Logging
// =============================================================================

export { loadConfig, type WorkbankConfig, type EnvSource } from './config'

export {
  ErrorCode,
  WorkbankError,
  ValidationError,
  SchemaMismatchError,
  SourceError,
  NetworkError,
  TimeoutError,
  ConfigurationError,
  isWorkbankError,
  isValidationError,
  isSchemaMismatchError,
  isSourceError,
  isTimeoutError,
  type SerializedError,
} from './errors'

export {
  type Logger,
  type LogLevel,
  consoleLogger,
  noopLogger,
  createLeveledLogger,
  setLogger,
  getLogger,
} from './utils/logger'

export { TTLCache, type TTLCacheOptions } from './utils/ttl-cache'

export * from './constants'
