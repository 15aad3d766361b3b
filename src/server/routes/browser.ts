/**
 * Browser task routes.
 *
 * Handles:
 * - POST /api/browser/run: run one instruction through the orchestrator
 * - GET  /health: effective configuration, no side effects
 */
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';

import type { Orchestrator } from '../../core/index.js';
import { parseRunBody } from '../../core/index.js';
import { describeConfig, toWireError, toWireSuccess } from '../../report/index.js';
import type { ServiceConfig, TaskRequest } from '../../schema/index.js';
import { InvalidRequestError, errorMessage } from '../../utils/errors.js';
import * as log from '../../utils/logger.js';

export interface BrowserRoutesOptions {
  config: Readonly<ServiceConfig>;
  orchestrator: Pick<Orchestrator, 'execute'>;
}

const HTTP_STATUS = {
  OK: 200,
  BAD_REQUEST: 400,
  INTERNAL_SERVER_ERROR: 500,
} as const;

export function registerBrowserRoutes(
  fastify: FastifyInstance,
  options: BrowserRoutesOptions,
): void {
  const { config, orchestrator } = options;

  fastify.get('/health', async (_request, reply) => {
    return reply.code(HTTP_STATUS.OK).send(describeConfig(config));
  });

  fastify.post('/api/browser/run', async (request: FastifyRequest, reply: FastifyReply) => {
    let task: TaskRequest;
    try {
      task = parseRunBody(request.body);
    } catch (err) {
      const status =
        err instanceof InvalidRequestError
          ? HTTP_STATUS.BAD_REQUEST
          : HTTP_STATUS.INTERNAL_SERVER_ERROR;
      return reply.code(status).send(toWireError(errorMessage(err)));
    }

    try {
      const result = await orchestrator.execute(task);
      if (!result.ok) {
        return reply.code(HTTP_STATUS.INTERNAL_SERVER_ERROR).send(toWireError(result.error));
      }
      return reply.code(HTTP_STATUS.OK).send(toWireSuccess(result));
    } catch (err) {
      const message = errorMessage(err);
      log.error(`Browser task failed: ${message}`);
      const status =
        err instanceof InvalidRequestError
          ? HTTP_STATUS.BAD_REQUEST
          : HTTP_STATUS.INTERNAL_SERVER_ERROR;
      return reply.code(status).send(toWireError(message));
    }
  });
}
