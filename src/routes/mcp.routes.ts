import type { FastifyInstance } from 'fastify';
import type { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { SSEServerTransport } from '@modelcontextprotocol/sdk/server/sse.js';
import type { StructuredLogger } from '../services/logger.service.js';
import type { MetricsService } from '../services/metrics.service.js';

/**
 * HTTP surface for the SSE transport.
 *
 * GET  /sse       opens a session (one MCP server instance per session)
 * POST /messages  delivers a client message to the session named by ?sessionId=
 * GET  /health    liveness
 * GET  /metrics   Prometheus metrics
 */

interface McpSession {
  transport: SSEServerTransport;
  server: Server;
}

/**
 * Open SSE sessions, keyed by transport session id
 */
export class SessionRegistry {
  private sessions = new Map<string, McpSession>();

  add(session: McpSession): void {
    this.sessions.set(session.transport.sessionId, session);
  }

  get(sessionId: string): McpSession | undefined {
    return this.sessions.get(sessionId);
  }

  remove(sessionId: string): void {
    this.sessions.delete(sessionId);
  }

  get size(): number {
    return this.sessions.size;
  }

  async closeAll(): Promise<void> {
    const sessions = Array.from(this.sessions.values());
    this.sessions.clear();
    await Promise.allSettled(sessions.map((session) => session.server.close()));
  }
}

export interface McpRoutesOptions {
  createServer: () => Server;
  sessions: SessionRegistry;
  metrics: MetricsService;
  logger: StructuredLogger;
}

export async function mcpRoutes(fastify: FastifyInstance, options: McpRoutesOptions) {
  const { sessions, metrics, logger } = options;

  fastify.get('/health', async () => {
    return {
      status: 'ok',
      service: 'ghost-mcp-server',
      activeSessions: sessions.size,
      timestamp: new Date().toISOString(),
    };
  });

  fastify.get('/metrics', async (_request, reply) => {
    reply.header('Content-Type', metrics.getContentType());
    return metrics.getMetrics();
  });

  fastify.get('/sse', async (request, reply) => {
    reply.hijack();

    const transport = new SSEServerTransport('/messages', reply.raw);
    const server = options.createServer();
    const sessionId = transport.sessionId;
    sessions.add({ transport, server });
    logger.info(`🔌 SSE session opened: ${sessionId}`, { sessionId });

    request.raw.on('close', () => {
      sessions.remove(sessionId);
      logger.info(`SSE session closed: ${sessionId}`, { sessionId });
      server.close().catch((error: unknown) => {
        logger.error('Failed to close MCP session', { sessionId, error });
      });
    });

    try {
      await server.connect(transport);
    } catch (error) {
      logger.error('Failed to start SSE session', { sessionId, error });
      sessions.remove(sessionId);
      reply.raw.end();
    }
  });

  fastify.post<{ Querystring: { sessionId?: string } }>('/messages', async (request, reply) => {
    const sessionId = request.query.sessionId;
    const session = sessionId ? sessions.get(sessionId) : undefined;

    if (!session) {
      return reply.code(400).send({
        error: 'No active SSE session',
        message: 'Connect to /sse first and post to the endpoint it announces',
      });
    }

    reply.hijack();
    await session.transport.handlePostMessage(request.raw, reply.raw, request.body);
  });
}
