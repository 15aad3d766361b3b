/**
 * Subprocess module.
 * Runs shell commands under a hard kill; reports process-level outcome only.
 */

export { runProcess, hasSuccessMarker, combineOutput } from './runner.js';
export type { ProcessOutput, RunProcessOptions } from './runner.js';
