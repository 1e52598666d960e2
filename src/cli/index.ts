#!/usr/bin/env npx tsx
/**
 * WORKBank CLI
 *
 * Command-line interface over the WORKBank analysis tables.
 *
 * Commands:
 *   stats           Show summary statistics and data provenance
 *   tasks           List tasks, filtered and ranked
 *   quadrants       Split tasks by desire against capability
 *   export          Write the combined table to CSV or Parquet
 */

import { config as loadDotenv } from 'dotenv'
import { loadConfig, type EnvSource } from '../config'
import { createDatasetLoader } from '../loader'
import type { FetchFn } from '../loader'
import { createLeveledLogger, getLogger, type Logger } from '../utils/logger'
import { SORTABLE_FIELDS } from '../types/tables'
import { exportCommand } from './commands/export'
import { quadrantsCommand } from './commands/quadrants'
import { statsCommand } from './commands/stats'
import { tasksCommand } from './commands/tasks'
import { parseArgs, print, printError, type CommandContext } from './types'

export { parseArgs, print, printError, printSuccess } from './types'
export type { CommandContext, ExportFormat, ParsedArgs } from './types'

// =============================================================================
// Constants
// =============================================================================

const VERSION = '0.1.0'

const HELP_TEXT = `
WORKBank CLI v${VERSION}

Worker desire against expert-rated AI capability, per occupational task.

USAGE:
  workbank <command> [options]

COMMANDS:
  stats                         Show summary statistics and data provenance
  tasks                         List tasks, filtered and ranked
  quadrants                     Split tasks by desire against capability
  export <file>                 Write the combined table to CSV or Parquet

OPTIONS:
  -h, --help                    Show this help message
  -v, --version                 Show version number
  --offline                     Skip the remote dataset, use built-in tables
  --verbose                     Log loader activity to the console
  -s, --sort <field>            Sort field: ${SORTABLE_FIELDS.join(', ')}
  --order <asc|desc>            Sort order (default: desc)
  -l, --limit <n>               Limit number of tasks shown
  --domain <name>               Keep only this domain (repeatable)
  --occupation <title>          Keep only this occupation (repeatable)
  --min-desire <x>              Minimum mean automation desire
  --max-desire <x>              Maximum mean automation desire
  -t, --threshold <t>           Quadrant threshold (default: 3.5)
  -f, --format <csv|parquet>    Export format (default: from file extension)

ENVIRONMENT:
  WORKBANK_DATASET, WORKBANK_BASE_URL, WORKBANK_TOKEN, WORKBANK_CACHE_TTL_MS,
  WORKBANK_FETCH_TIMEOUT_MS, WORKBANK_OFFLINE, WORKBANK_LOG_LEVEL

EXAMPLES:
  # Summary of the remote dataset
  workbank stats

  # Ten tasks with the highest automation readiness
  workbank tasks --sort automationReadiness --limit 10

  # Quadrants with a stricter threshold
  workbank quadrants --threshold 4

  # Export healthcare tasks to Parquet
  workbank export healthcare.parquet --domain Healthcare
`

// =============================================================================
// Main Entry Point
// =============================================================================

/**
 * Dependencies of the entry point, overridable in tests
 */
export interface MainOptions {
  env?: EnvSource | undefined
  fetch?: FetchFn | undefined
  logger?: Logger | undefined
}

/**
 * Main CLI entry point
 */
export async function main(
  argv: string[] = process.argv.slice(2),
  options: MainOptions = {}
): Promise<number> {
  try {
    const parsed = parseArgs(argv)

    if (parsed.options.help) {
      print(HELP_TEXT)
      return 0
    }

    if (parsed.options.version) {
      print(`workbank v${VERSION}`)
      return 0
    }

    if (!parsed.command) {
      print(HELP_TEXT)
      return 0
    }

    const config = loadConfig(options.env ?? process.env)
    if (parsed.options.offline) config.offline = true

    const logger = options.logger ?? (parsed.options.verbose
      ? createLeveledLogger('info')
      : config.logLevel === 'silent' ? getLogger() : createLeveledLogger(config.logLevel))

    const ctx: CommandContext = {
      loader: createDatasetLoader(config, { fetch: options.fetch, logger }),
      datasetId: config.datasetId,
    }

    switch (parsed.command) {
      case 'stats':
        return await statsCommand(parsed, ctx)
      case 'tasks':
        return await tasksCommand(parsed, ctx)
      case 'quadrants':
        return await quadrantsCommand(parsed, ctx)
      case 'export':
        return await exportCommand(parsed, ctx)
      case 'help':
        print(HELP_TEXT)
        return 0
      default:
        printError(`Unknown command: ${parsed.command}`)
        print('\nRun "workbank --help" for usage.')
        return 1
    }
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    printError(message)
    return 1
  }
}

// Run CLI if this is the main module
if (process.argv[1]?.endsWith('/cli/index.js') || process.argv[1]?.endsWith('/cli/index.ts')) {
  loadDotenv()
  main().then(code => process.exit(code))
}
