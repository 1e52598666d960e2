/**
 * Data Source Loader
 *
 * @module loader
 */

export {
  DatasetLoader,
  loadRawTables,
  createDatasetLoader,
  describeCounts,
  type DatasetLoaderOptions,
  type LoadResult,
  type RemoteLoadResult,
  type FallbackLoadResult,
} from './DatasetLoader'

export {
  HuggingFaceSource,
  type HuggingFaceSourceOptions,
  type TableSource,
  type FetchFn,
} from './remote'

export { FALLBACK_TABLES, fallbackTables, freezeTables } from './fallback'

export {
  WORKER_COLUMNS,
  EXPERT_COLUMNS,
  TASK_COLUMNS,
  parseWorkerTable,
  parseExpertTable,
  parseTaskTable,
} from './schema'
