/**
 * Structured Logger Service
 *
 * Provides structured JSON logging with named events for observability.
 *
 * Common fields per event:
 * - timestamp: ISO 8601 timestamp
 * - level: log level (info, warn, error, debug)
 * - event: dotted event name (ghost.request, tool.invoked, ...)
 * - method / url / http_status: outbound request details (when applicable)
 * - tool: MCP tool name (when applicable)
 * - error_kind: error taxonomy kind (when applicable)
 * - message: human-readable message
 *
 * Everything is written to stderr: under the stdio transport, stdout
 * carries the MCP protocol stream.
 */

import pino from 'pino';

export interface LoggerSettings {
  nodeEnv: string;
  level: string;
}

/**
 * Log context for request and tool events
 */
export interface RequestLogContext {
  method?: string;
  url?: string;
  tool?: string;
  http_status?: number;
  error_kind?: string;
  duration?: number;
  [key: string]: unknown;
}

/**
 * Creates the base pino instance
 */
export function createBaseLogger(settings: LoggerSettings): pino.Logger {
  const options: pino.LoggerOptions = {
    level: settings.level,

    formatters: {
      level: (label) => {
        return { level: label };
      },
    },

    base: {
      service: 'ghost-mcp-server',
      environment: settings.nodeEnv,
    },

    timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,
  };

  // Pretty print in development
  if (settings.nodeEnv === 'development') {
    return pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss.l',
          ignore: 'pid,hostname',
          destination: 2,
        },
      },
    });
  }

  return pino(options, pino.destination(2));
}

/**
 * Masks a token for logging (first 6 and last 4 characters)
 */
export function maskToken(token: string): string {
  if (token.length <= 10) {
    return '***';
  }
  return `${token.substring(0, 6)}...${token.substring(token.length - 4)}`;
}

/**
 * Structured Logger
 */
export class StructuredLogger {
  private logger: pino.Logger;

  constructor(logger: pino.Logger) {
    this.logger = logger;
  }

  /**
   * Creates a child logger with additional context
   */
  child(bindings: Record<string, unknown>): StructuredLogger {
    return new StructuredLogger(this.logger.child(bindings));
  }

  /**
   * Logs an outbound Ghost API request
   */
  ghostRequest(context: RequestLogContext & { method: string; url: string; token?: string }) {
    this.logger.debug({
      event: 'ghost.request',
      method: context.method,
      url: context.url,
      token: context.token ? maskToken(context.token) : undefined,
      message: `➡️  ${context.method} ${context.url}`,
    });
  }

  /**
   * Logs a completed Ghost API request
   */
  ghostResponse(context: RequestLogContext & { method: string; url: string; http_status: number }) {
    this.logger.info({
      event: 'ghost.response',
      method: context.method,
      url: context.url,
      http_status: context.http_status,
      duration: context.duration,
      message: `✅ ${context.method} ${context.url} -> ${context.http_status}`,
    });
  }

  /**
   * Logs a Ghost API request that did not produce a usable response
   */
  ghostRequestFailed(context: RequestLogContext & { error_kind: string; error: string }) {
    this.logger.warn({
      event: 'ghost.request_failed',
      method: context.method,
      url: context.url,
      http_status: context.http_status,
      error_kind: context.error_kind,
      error: context.error,
      duration: context.duration,
      message: `❌ Ghost request failed (${context.error_kind}): ${context.error}`,
    });
  }

  /**
   * Logs an MCP tool invocation
   */
  toolInvoked(context: { tool: string }) {
    this.logger.info({
      event: 'tool.invoked',
      tool: context.tool,
      message: `🔧 Tool invoked: ${context.tool}`,
    });
  }

  /**
   * Logs an MCP tool result
   */
  toolCompleted(context: { tool: string; outcome: string; duration: number }) {
    this.logger.info({
      event: 'tool.completed',
      tool: context.tool,
      outcome: context.outcome,
      duration: context.duration,
      message: `Tool ${context.tool} finished (${context.outcome}, ${context.duration}ms)`,
    });
  }

  /**
   * Logs graceful shutdown
   */
  shutdownStarted(context: { signal: string }) {
    this.logger.warn({
      event: 'shutdown.started',
      signal: context.signal,
      message: `🛑 Graceful shutdown initiated (${context.signal})`,
    });
  }

  /**
   * Logs shutdown completion
   */
  shutdownCompleted(context: { duration: number }) {
    this.logger.info({
      event: 'shutdown.completed',
      duration: context.duration,
      message: `Graceful shutdown completed (${context.duration}ms)`,
    });
  }

  info(message: string, context?: RequestLogContext) {
    this.logger.info({ ...context, message });
  }

  warn(message: string, context?: RequestLogContext) {
    this.logger.warn({ ...context, message });
  }

  error(message: string, context?: RequestLogContext & { error?: unknown }) {
    const error = context?.error;
    this.logger.error({
      ...context,
      error: error instanceof Error ? error.message : error,
      stack: error instanceof Error ? error.stack : undefined,
      message,
    });
  }

  debug(message: string, context?: RequestLogContext) {
    this.logger.debug({ ...context, message });
  }
}

/**
 * Logger that drops everything, for tests and embedding
 */
export function createSilentLogger(): StructuredLogger {
  return new StructuredLogger(pino({ level: 'silent' }));
}
