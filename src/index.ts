#!/usr/bin/env node
/**
 * Ghost MCP Server entry point
 *
 * Usage:
 *   ghost-mcp-server                      # SSE transport on HOST:PORT (default 0.0.0.0:8053)
 *   ghost-mcp-server --transport stdio    # MCP over stdin/stdout
 *
 * Environment Variables:
 *   GHOST_BASE_URL       - Ghost site root, without the API path (required)
 *   GHOST_ADMIN_API_KEY  - Admin API key in ID:SECRET form
 *   HOST / PORT          - bind address for the SSE transport
 *   LOG_LEVEL            - pino level (default: debug, info in production)
 */

import { Command, Option } from 'commander';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadConfig } from './config/env.js';
import { createBaseLogger, StructuredLogger } from './services/logger.service.js';
import { GracefulShutdownService, type ShutdownStep } from './services/graceful-shutdown.service.js';
import { buildHttpApp, createServices } from './app.js';
import { SessionRegistry } from './routes/mcp.routes.js';

type TransportKind = 'stdio' | 'sse';

const program = new Command()
  .name('ghost-mcp-server')
  .description('MCP server exposing Ghost Admin API post tools')
  .addOption(new Option('--transport <type>', 'transport type').choices(['stdio', 'sse']).default('sse'))
  .parse();

const start = async () => {
  const config = loadConfig();
  const logger = new StructuredLogger(createBaseLogger({ nodeEnv: config.nodeEnv, level: config.logLevel }));
  const transport: TransportKind = program.opts<{ transport: TransportKind }>().transport;

  if (!config.ghostAdminApiKey) {
    logger.warn('⚠️  GHOST_ADMIN_API_KEY is not set; every API call will be rejected');
  }

  const services = createServices(config, logger);
  const steps: ShutdownStep[] = [];

  if (transport === 'stdio') {
    const server = services.createMcpServer();
    await server.connect(new StdioServerTransport());
    steps.push({ name: 'MCP server', run: () => server.close() });
    logger.info(`✅ Ghost MCP server running on stdio (${config.ghostBaseUrl})`);
  } else {
    const sessions = new SessionRegistry();
    const app = await buildHttpApp(services, sessions);
    await app.listen({ host: config.host, port: config.port });
    steps.push({ name: 'SSE sessions', run: () => sessions.closeAll() });
    steps.push({ name: 'HTTP server', run: () => app.close() });
    logger.info(`✅ Ghost MCP server listening on http://${config.host}:${config.port}/sse (${config.ghostBaseUrl})`);
  }

  new GracefulShutdownService({
    forceTimeout: config.shutdownTimeoutMs,
    logger,
    steps,
  }).registerHandlers();
};

start().catch((error: unknown) => {
  process.stderr.write(`❌ Failed to start: ${error instanceof Error ? error.message : String(error)}\n`);
  process.exit(1);
});
