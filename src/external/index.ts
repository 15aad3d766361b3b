/**
 * External CLI automation tool.
 * Builds the browser-use pipeline and infers success from its output text.
 */

export {
  runExternalTool,
  buildExternalToolCommand,
  createSessionName,
  clampToolSteps,
  shellQuote,
} from './tool.js';
export type {
  ExternalToolSettings,
  ExternalToolRun,
  ExternalToolDeps,
  ProcessRunner,
} from './tool.js';
