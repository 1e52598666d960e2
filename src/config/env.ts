/**
 * Environment Configuration
 *
 * Reads WORKBANK_* variables into a typed configuration. Unset or empty
 * variables take their defaults; anything else must parse or a
 * ConfigurationError is thrown naming the variable.
 *
 * @example
 * ```typescript
 * const config = loadConfig()
 * const loader = new DatasetLoader({ offline: config.offline, cacheTtlMs: config.cacheTtlMs })
 * ```
 */

import {
  DEFAULT_BASE_URL,
  DEFAULT_CACHE_TTL_MS,
  DEFAULT_DATASET_ID,
  DEFAULT_FETCH_TIMEOUT_MS,
} from '../constants'
import { ConfigurationError } from '../errors'
import { LOG_LEVELS, isLogLevel, type LogLevel } from '../utils/logger'

// =============================================================================
// Types
// =============================================================================

export type EnvSource = Readonly<Record<string, string | undefined>>

export interface WorkbankConfig {
  /** Dataset repository id */
  datasetId: string
  /** Base URL the dataset id is resolved against */
  baseUrl: string
  /** Access token for gated datasets */
  token: string | undefined
  /** Remote cache window in milliseconds */
  cacheTtlMs: number
  /** Per-request timeout in milliseconds */
  fetchTimeoutMs: number
  /** Skip the remote fetch */
  offline: boolean
  logLevel: LogLevel
}

export const ENV_KEYS = {
  datasetId: 'WORKBANK_DATASET',
  baseUrl: 'WORKBANK_BASE_URL',
  token: 'WORKBANK_TOKEN',
  cacheTtlMs: 'WORKBANK_CACHE_TTL_MS',
  fetchTimeoutMs: 'WORKBANK_FETCH_TIMEOUT_MS',
  offline: 'WORKBANK_OFFLINE',
  logLevel: 'WORKBANK_LOG_LEVEL',
} as const satisfies Record<keyof WorkbankConfig, string>

// =============================================================================
// Parsers
// =============================================================================

function read(env: EnvSource, key: string): string | undefined {
  const value = env[key]?.trim()
  return value === undefined || value === '' ? undefined : value
}

function readMillis(env: EnvSource, key: string, fallback: number): number {
  const raw = read(env, key)
  if (raw === undefined) return fallback
  const value = Number(raw)
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigurationError(`${key} must be a non-negative integer, got "${raw}"`, {
      configKey: key,
      expectedValue: 'non-negative integer',
      actualValue: raw,
    })
  }
  return value
}

function readBoolean(env: EnvSource, key: string, fallback: boolean): boolean {
  const raw = read(env, key)
  if (raw === undefined) return fallback
  switch (raw.toLowerCase()) {
    case 'true':
    case '1':
      return true
    case 'false':
    case '0':
      return false
    default:
      throw new ConfigurationError(`${key} must be one of true, false, 1, 0, got "${raw}"`, {
        configKey: key,
        expectedValue: ['true', 'false', '1', '0'],
        actualValue: raw,
      })
  }
}

function readLogLevel(env: EnvSource, key: string, fallback: LogLevel): LogLevel {
  const raw = read(env, key)
  if (raw === undefined) return fallback
  const level = raw.toLowerCase()
  if (!isLogLevel(level)) {
    throw new ConfigurationError(`${key} must be one of ${LOG_LEVELS.join(', ')}, got "${raw}"`, {
      configKey: key,
      expectedValue: LOG_LEVELS,
      actualValue: raw,
    })
  }
  return level
}

function readUrl(env: EnvSource, key: string, fallback: string): string {
  const raw = read(env, key)
  if (raw === undefined) return fallback
  if (!/^https?:\/\//.test(raw)) {
    throw new ConfigurationError(`${key} must be an http(s) URL, got "${raw}"`, {
      configKey: key,
      expectedValue: 'http(s) URL',
      actualValue: raw,
    })
  }
  return raw
}

// =============================================================================
// Loading
// =============================================================================

export function loadConfig(env: EnvSource = process.env): WorkbankConfig {
  return {
    datasetId: read(env, ENV_KEYS.datasetId) ?? DEFAULT_DATASET_ID,
    baseUrl: readUrl(env, ENV_KEYS.baseUrl, DEFAULT_BASE_URL),
    token: read(env, ENV_KEYS.token),
    cacheTtlMs: readMillis(env, ENV_KEYS.cacheTtlMs, DEFAULT_CACHE_TTL_MS),
    fetchTimeoutMs: readMillis(env, ENV_KEYS.fetchTimeoutMs, DEFAULT_FETCH_TIMEOUT_MS),
    offline: readBoolean(env, ENV_KEYS.offline, false),
    logLevel: readLogLevel(env, ENV_KEYS.logLevel, 'silent'),
  }
}
