/**
 * WORKBank Analysis Constants
 *
 * Centralized constants used throughout the codebase.
 */

// =============================================================================
// Remote Dataset
// =============================================================================

/**
 * HuggingFace dataset holding the WORKBank survey tables
 */
export const DEFAULT_DATASET_ID = 'SALT-NLP/WORKBank'

/**
 * Base URL the dataset id is resolved against
 */
export const DEFAULT_BASE_URL = 'https://huggingface.co/datasets'

/**
 * Git revision the resource files are read from
 */
export const DEFAULT_REVISION = 'main'

/**
 * Relative paths of the three raw tables inside the dataset repository
 */
export const RESOURCE_PATHS = {
  worker: 'worker_data/domain_worker_desires.csv',
  expert: 'expert_ratings/expert_rated_technological_capability.csv',
  task: 'task_data/task_statement_with_metadata.csv',
} as const

// =============================================================================
// Cache & Timeouts
// =============================================================================

/**
 * How long remotely fetched tables stay cached, in milliseconds (1 hour)
 */
export const DEFAULT_CACHE_TTL_MS = 60 * 60 * 1000

/**
 * Timeout for a single remote resource request, in milliseconds (30 seconds)
 */
export const DEFAULT_FETCH_TIMEOUT_MS = 30000

// =============================================================================
// Ratings
// =============================================================================

/**
 * Lower bound of every survey rating scale
 */
export const RATING_MIN = 1.0

/**
 * Upper bound of every survey rating scale
 */
export const RATING_MAX = 5.0

/**
 * Desire/capability cut-off used by quadrant analysis
 */
export const DEFAULT_QUADRANT_THRESHOLD = 3.5
