/**
 * Ghost MCP Server
 *
 * Registers the post tools with the MCP SDK and routes each call to the
 * matching operation. Every call answers with a single text item.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import type { PostOperations } from '../services/post-operations.service.js';
import type { StructuredLogger } from '../services/logger.service.js';
import type { MetricsService } from '../services/metrics.service.js';
import { describeZodError } from '../services/ghost-response.schemas.js';
import {
  TOOLS,
  createPostArgsSchema,
  debugApiConnectionArgsSchema,
  editPostArgsSchema,
  isToolName,
  listPostsArgsSchema,
  type ToolName,
} from './tool-definitions.js';

export const SERVER_NAME = 'ghost';
export const SERVER_VERSION = '1.0.0';

export interface GhostMcpServerDeps {
  operations: PostOperations;
  logger: StructuredLogger;
  metrics?: MetricsService;
}

interface ToolOutcome {
  text: string;
  isError: boolean;
}

type ToolHandler = (args: unknown) => Promise<ToolOutcome>;

function invalidArguments(message: string): ToolOutcome {
  return { text: `Invalid arguments: ${message}`, isError: true };
}

function buildHandlers(operations: PostOperations): Record<ToolName, ToolHandler> {
  return {
    create_post: async (args) => {
      const parsed = createPostArgsSchema.safeParse(args ?? {});
      if (!parsed.success) return invalidArguments(describeZodError(parsed.error));
      return { text: await operations.createPost(parsed.data), isError: false };
    },

    list_posts: async (args) => {
      const parsed = listPostsArgsSchema.safeParse(args ?? {});
      if (!parsed.success) return invalidArguments(describeZodError(parsed.error));
      return { text: await operations.listPosts(parsed.data), isError: false };
    },

    edit_post: async (args) => {
      const parsed = editPostArgsSchema.safeParse(args ?? {});
      if (!parsed.success) return invalidArguments(describeZodError(parsed.error));
      return { text: await operations.editPost(parsed.data), isError: false };
    },

    debug_api_connection: async (args) => {
      const parsed = debugApiConnectionArgsSchema.safeParse(args ?? {});
      if (!parsed.success) return invalidArguments(describeZodError(parsed.error));
      return { text: await operations.debugApiConnection(), isError: false };
    },
  };
}

export function createGhostMcpServer(deps: GhostMcpServerDeps): Server {
  const { logger, metrics } = deps;
  const handlers = buildHandlers(deps.operations);

  const server = new Server(
    { name: SERVER_NAME, version: SERVER_VERSION },
    { capabilities: { tools: {} } }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: TOOLS }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    const startTime = Date.now();

    if (!isToolName(name)) {
      return {
        content: [{ type: 'text' as const, text: `Unknown tool: ${name}` }],
        isError: true,
      };
    }

    logger.toolInvoked({ tool: name });
    const outcome = await handlers[name](args);
    const label = outcome.isError ? 'error' : 'success';

    metrics?.recordToolCall(name, label);
    logger.toolCompleted({ tool: name, outcome: label, duration: Date.now() - startTime });

    return {
      content: [{ type: 'text' as const, text: outcome.text }],
      ...(outcome.isError ? { isError: true } : {}),
    };
  });

  return server;
}
