import type { Command } from 'commander';

import { loadOptionalConfigFile, loadServiceConfig } from '../config/index.js';
import type { Env } from '../config/index.js';
import { Orchestrator, createTaskRequest } from '../core/index.js';
import { createEngine } from '../engine/index.js';
import { describeConfig, formatSummary, serializeJSON, toWireError, toWireSuccess } from '../report/index.js';
import type { ServiceConfig } from '../schema/index.js';
import { startServer } from '../server/index.js';
import { errorMessage } from '../utils/errors.js';

const DEFAULT_CONFIG_PATH = '.taskrelay.yaml';

// ── Exit codes ───────────────────────────────────────────────

const EXIT = {
  OK: 0,
  ALL_FAILED: 1,
  USAGE: 4,
} as const;

// ── Runtime assembly ─────────────────────────────────────────

async function loadConfig(
  configPath: string,
  overrides: Env = {},
): Promise<Readonly<ServiceConfig>> {
  const file = await loadOptionalConfigFile(configPath);
  return loadServiceConfig({ ...process.env, ...overrides }, file);
}

function createOrchestrator(config: Readonly<ServiceConfig>): Orchestrator {
  return new Orchestrator(config, { engine: createEngine(config) });
}

// ── serve ────────────────────────────────────────────────────

export function registerServeCommand(program: Command): void {
  program
    .command('serve')
    .description('Start the HTTP service (POST /api/browser/run, GET /health)')
    .option('--host <host>', 'Interface to bind')
    .option('--port <port>', 'Port to listen on')
    .option('--config <path>', 'Path to config file', DEFAULT_CONFIG_PATH)
    .action(async (opts: { host?: string; port?: string; config: string }) => {
      try {
        const config = await loadConfig(opts.config, {
          ...(opts.host !== undefined ? { BROWSER_SERVICE_HOST: opts.host } : {}),
          ...(opts.port !== undefined ? { BROWSER_SERVICE_PORT: opts.port } : {}),
        });
        const app = await startServer({ config, orchestrator: createOrchestrator(config) });

        const shutdown = (): void => {
          app.close().then(
            () => {
              process.exitCode = EXIT.OK;
            },
            (err: unknown) => {
              process.stderr.write(`Error during shutdown: ${errorMessage(err)}\n`);
              process.exitCode = EXIT.USAGE;
            },
          );
        };
        process.once('SIGINT', shutdown);
        process.once('SIGTERM', shutdown);
      } catch (err) {
        process.stderr.write(`Error: ${errorMessage(err)}\n`);
        process.exitCode = EXIT.USAGE;
      }
    });
}

// ── run ──────────────────────────────────────────────────────

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Run one browser instruction in process and report what happened')
    .argument('<instruction>', 'Natural language browser instruction')
    .option('--context <text>', 'Extra context for the instruction')
    .option('--start-url <url>', 'URL to open first (derived from the text when omitted)')
    .option('--max-steps <n>', 'Step budget, clamped to [1, 200]')
    .option('--keep-alive', 'Leave the engine session open afterwards')
    .option('--json', 'Output the response JSON to stdout')
    .option('--config <path>', 'Path to config file', DEFAULT_CONFIG_PATH)
    .action(
      async (
        instruction: string,
        opts: {
          context?: string;
          startUrl?: string;
          maxSteps?: string;
          keepAlive?: true;
          json?: true;
          config: string;
        },
      ) => {
        try {
          const config = await loadConfig(opts.config);
          const request = createTaskRequest({
            instruction,
            context: opts.context,
            startUrl: opts.startUrl,
            maxSteps: opts.maxSteps,
            keepAlive: opts.keepAlive ?? false,
          });

          const startedAt = Date.now();
          const result = await createOrchestrator(config).execute(request);

          if (opts.json) {
            const body = result.ok ? toWireSuccess(result) : toWireError(result.error);
            process.stdout.write(serializeJSON(body) + '\n');
          }
          process.stderr.write(formatSummary(result, Date.now() - startedAt));

          process.exitCode = result.ok ? EXIT.OK : EXIT.ALL_FAILED;
        } catch (err) {
          process.stderr.write(`Error: ${errorMessage(err)}\n`);
          process.exitCode = EXIT.USAGE;
        }
      },
    );
}

// ── config ───────────────────────────────────────────────────

export function registerConfigCommand(program: Command): void {
  program
    .command('config')
    .description('Print the effective configuration (same document as GET /health)')
    .option('--config <path>', 'Path to config file', DEFAULT_CONFIG_PATH)
    .action(async (opts: { config: string }) => {
      try {
        const config = await loadConfig(opts.config);
        process.stdout.write(serializeJSON(describeConfig(config)) + '\n');
      } catch (err) {
        process.stderr.write(`Config error: ${errorMessage(err)}\n`);
        process.exitCode = EXIT.USAGE;
      }
    });
}
