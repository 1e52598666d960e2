/**
 * Vitest Test Setup
 *
 * This file is loaded before all tests run.
 */

import { beforeEach } from 'vitest'
import { config } from 'dotenv'
import { noopLogger, setLogger } from '../src/utils/logger'

// Load environment variables from .env file
config()

// Library code logs through the global logger; keep test output clean
beforeEach(() => {
  setLogger(noopLogger)
})
