/**
 * CLI module: thin wrapper over core.
 * Parses arguments, delegates to core and the server, handles exit codes.
 * No business logic lives here.
 */

export { registerServeCommand, registerRunCommand, registerConfigCommand } from './run.js';
