import Fastify from 'fastify';
import type { FastifyError, FastifyInstance } from 'fastify';

import { SERVER } from '../config/defaults.js';
import { toWireError } from '../report/index.js';
import * as log from '../utils/logger.js';
import { registerBrowserRoutes } from './routes/browser.js';
import type { BrowserRoutesOptions } from './routes/browser.js';

export type { BrowserRoutesOptions } from './routes/browser.js';
export { registerBrowserRoutes } from './routes/browser.js';

/** Build the HTTP app without listening; tests drive it through `inject`. */
export function buildServer(options: BrowserRoutesOptions): FastifyInstance {
  const app = Fastify({ logger: false, bodyLimit: SERVER.BODY_LIMIT });

  // Body-parser and framework errors keep the `{ ok, error }` contract.
  app.setErrorHandler((error: FastifyError, _request, reply) => {
    const status = error.statusCode ?? 500;
    if (status >= 500) log.error(`Unhandled server error: ${error.message}`);
    return reply.code(status).send(toWireError(error.message));
  });

  registerBrowserRoutes(app, options);
  return app;
}

export async function startServer(options: BrowserRoutesOptions): Promise<FastifyInstance> {
  const app = buildServer(options);
  const { host, port } = options.config.server;
  const address = await app.listen({ host, port });
  log.listening(address);
  return app;
}
