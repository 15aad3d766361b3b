/**
 * Configuration module.
 * Loads and validates runtime config from env and config files.
 * Zod-validated, frozen after load, passed explicitly to every consumer.
 */

export {
  TIMEOUTS,
  TIMEOUT_FLOORS,
  LIMITS,
  OUTPUT_GUARDS,
  SERVER,
  EXTERNAL_TOOL,
  ENGINE,
} from './defaults.js';
export { effectiveBudget, resolveTimeouts, TimeoutBudgets } from './budgets.js';
export type { BoundedWork } from './budgets.js';
export {
  loadConfigFile,
  loadOptionalConfigFile,
  loadServiceConfig,
  qualifyModelName,
} from './loader.js';
export type { Env } from './loader.js';
