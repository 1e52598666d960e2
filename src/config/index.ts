/**
 * WORKBank Configuration
 */

export {
  loadConfig,
  ENV_KEYS,
  type EnvSource,
  type WorkbankConfig,
} from './env'
