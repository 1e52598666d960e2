/**
 * CLI Types and Utilities
 *
 * Shared types, the argument parser and output helpers for the WORKBank
 * CLI. Commands import from here rather than from the entry point so the
 * two never import each other.
 */

import type { DatasetLoader } from '../loader'
import type { SortOrder } from '../analysis'
import { ValidationError } from '../errors'
import { SORTABLE_FIELDS, isSortableField, type SortableField } from '../types/tables'

// =============================================================================
// Types
// =============================================================================

export type ExportFormat = 'csv' | 'parquet'

/**
 * Parsed CLI arguments
 */
export interface ParsedArgs {
  command: string
  args: string[]
  options: {
    help: boolean
    version: boolean
    offline: boolean
    verbose: boolean
    sort?: SortableField | undefined
    order: SortOrder
    limit?: number | undefined
    domains: string[]
    occupations: string[]
    minDesire?: number | undefined
    maxDesire?: number | undefined
    threshold?: number | undefined
    format?: ExportFormat | undefined
  }
}

/**
 * What every command runs against
 */
export interface CommandContext {
  loader: DatasetLoader
  /** Dataset id shown in provenance output */
  datasetId: string
}

// =============================================================================
// Argument Parser
// =============================================================================

function invalidOption(option: string, value: string | undefined, expected: string): ValidationError {
  return new ValidationError(
    value === undefined ? `Missing value for ${option}` : `Invalid ${option}: ${value}. Expected ${expected}`,
    { field: option, expectedType: expected, actualValue: value, operation: 'parseArgs' }
  )
}

function parseNumber(option: string, value: string | undefined): number {
  const n = value === undefined || value.trim() === '' ? NaN : Number(value)
  if (!Number.isFinite(n)) {
    throw invalidOption(option, value, 'a number')
  }
  return n
}

/**
 * Parse command line arguments
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const result: ParsedArgs = {
    command: '',
    args: [],
    options: {
      help: false,
      version: false,
      offline: false,
      verbose: false,
      order: 'desc',
      domains: [],
      occupations: [],
    },
  }

  let i = 0
  while (i < argv.length) {
    const arg = argv[i]

    if (!arg) {
      i++
      continue
    }

    if (arg.startsWith('-')) {
      switch (arg) {
        case '-h':
        case '--help':
          result.options.help = true
          break
        case '-v':
        case '--version':
          result.options.version = true
          break
        case '--offline':
          result.options.offline = true
          break
        case '--verbose':
          result.options.verbose = true
          break
        case '-s':
        case '--sort': {
          const field = argv[++i]
          if (field === undefined || !isSortableField(field)) {
            throw invalidOption('--sort', field, `one of ${SORTABLE_FIELDS.join(', ')}`)
          }
          result.options.sort = field
          break
        }
        case '--order': {
          const order = argv[++i]
          if (order !== 'asc' && order !== 'desc') {
            throw invalidOption('--order', order, 'asc or desc')
          }
          result.options.order = order
          break
        }
        case '-l':
        case '--limit': {
          const value = argv[++i]
          const limit = parseNumber('--limit', value)
          if (!Number.isInteger(limit) || limit < 0) {
            throw invalidOption('--limit', value, 'a non-negative integer')
          }
          result.options.limit = limit
          break
        }
        case '--domain': {
          const domain = argv[++i]
          if (domain === undefined) throw invalidOption('--domain', domain, 'a domain name')
          result.options.domains.push(domain)
          break
        }
        case '--occupation': {
          const occupation = argv[++i]
          if (occupation === undefined) throw invalidOption('--occupation', occupation, 'an occupation title')
          result.options.occupations.push(occupation)
          break
        }
        case '--min-desire':
          result.options.minDesire = parseNumber('--min-desire', argv[++i])
          break
        case '--max-desire':
          result.options.maxDesire = parseNumber('--max-desire', argv[++i])
          break
        case '-t':
        case '--threshold':
          result.options.threshold = parseNumber('--threshold', argv[++i])
          break
        case '-f':
        case '--format': {
          const format = argv[++i]
          if (format !== 'csv' && format !== 'parquet') {
            throw invalidOption('--format', format, 'csv or parquet')
          }
          result.options.format = format
          break
        }
        default:
          throw new ValidationError(`Unknown option: ${arg}`, { field: arg, operation: 'parseArgs' })
      }
    } else if (!result.command) {
      // First non-option is the command
      result.command = arg
    } else {
      result.args.push(arg)
    }
    i++
  }

  return result
}

// =============================================================================
// Output Utilities
// =============================================================================

/**
 * Print to stdout
 */
export function print(message: string): void {
  process.stdout.write(message + '\n')
}

/**
 * Print to stderr
 */
export function printError(message: string): void {
  process.stderr.write('Error: ' + message + '\n')
}

/**
 * Print success message
 */
export function printSuccess(message: string): void {
  process.stdout.write('OK ' + message + '\n')
}
