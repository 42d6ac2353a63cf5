import Fastify, { type FastifyInstance } from 'fastify';
import type { AxiosInstance } from 'axios';
import type { Server } from '@modelcontextprotocol/sdk/server/index.js';
import type { AppConfig } from './config/env.js';
import { GhostDispatcher } from './services/ghost-dispatcher.service.js';
import { PostOperations } from './services/post-operations.service.js';
import { MetricsService } from './services/metrics.service.js';
import type { StructuredLogger } from './services/logger.service.js';
import { createGhostMcpServer } from './mcp/server.js';
import { mcpRoutes, SessionRegistry } from './routes/mcp.routes.js';

/**
 * Composition root: wires config, dispatcher, operations and the MCP server.
 */

export interface AppServices {
  dispatcher: GhostDispatcher;
  operations: PostOperations;
  metrics: MetricsService;
  logger: StructuredLogger;
  createMcpServer: () => Server;
}

export function createServices(
  config: Pick<AppConfig, 'ghostBaseUrl' | 'ghostAdminApiKey'>,
  logger: StructuredLogger,
  http?: AxiosInstance
): AppServices {
  const metrics = new MetricsService();
  const dispatcher = new GhostDispatcher({
    config: { baseUrl: config.ghostBaseUrl, adminApiKey: config.ghostAdminApiKey },
    logger: logger.child({ component: 'dispatcher' }),
    http,
    metrics,
  });
  const operations = new PostOperations({
    dispatcher,
    logger: logger.child({ component: 'operations' }),
  });

  return {
    dispatcher,
    operations,
    metrics,
    logger,
    createMcpServer: () => createGhostMcpServer({ operations, logger: logger.child({ component: 'mcp' }), metrics }),
  };
}

/**
 * Fastify app for the SSE transport
 */
export async function buildHttpApp(
  services: AppServices,
  sessions: SessionRegistry = new SessionRegistry()
): Promise<FastifyInstance> {
  const fastify = Fastify({ logger: false });

  fastify.addHook('onResponse', async (request, reply) => {
    services.logger.debug(`${request.method} ${request.url} -> ${reply.statusCode}`, {
      method: request.method,
      url: request.url,
      http_status: reply.statusCode,
    });
  });

  await fastify.register(mcpRoutes, {
    createServer: services.createMcpServer,
    sessions,
    metrics: services.metrics,
    logger: services.logger.child({ component: 'http' }),
  });

  return fastify;
}
