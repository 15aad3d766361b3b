/**
 * Report module.
 * Maps orchestration results to the snake_case wire contract and the terminal summary.
 */

export { toWireSuccess, toWireError, serializeJSON, formatSummary } from './reporter.js';
export type { WireAttempt, WireError, WireSuccess } from './reporter.js';
export { describeConfig, SERVICE_NAME } from './health.js';
export type { HealthReport } from './health.js';
