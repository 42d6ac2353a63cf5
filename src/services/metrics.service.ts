/**
 * Prometheus Metrics Service
 *
 * Metrics:
 * - ghost_api_requests_total{method, status_code}: outbound Ghost API requests
 * - ghost_api_request_duration_seconds{method, status_code}: outbound request latency
 * - mcp_tool_calls_total{tool, outcome}: tool invocations by outcome
 *
 * Requests that never got a response (signing, transport or method errors)
 * are recorded with status_code "0".
 */

import { Registry, Counter, Histogram } from 'prom-client';

export class MetricsService {
  private registry: Registry;

  public ghostRequestsTotal: Counter<'method' | 'status_code'>;
  public ghostRequestDuration: Histogram<'method' | 'status_code'>;
  public toolCallsTotal: Counter<'tool' | 'outcome'>;

  constructor() {
    this.registry = new Registry();

    this.registry.setDefaultLabels({
      app: 'ghost-mcp-server',
    });

    this.ghostRequestsTotal = new Counter({
      name: 'ghost_api_requests_total',
      help: 'Total number of Ghost Admin API requests by status code',
      labelNames: ['method', 'status_code'] as const,
      registers: [this.registry],
    });

    this.ghostRequestDuration = new Histogram({
      name: 'ghost_api_request_duration_seconds',
      help: 'Ghost Admin API request duration in seconds',
      labelNames: ['method', 'status_code'] as const,
      buckets: [0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10, 30], // seconds
      registers: [this.registry],
    });

    this.toolCallsTotal = new Counter({
      name: 'mcp_tool_calls_total',
      help: 'Total number of MCP tool calls by outcome',
      labelNames: ['tool', 'outcome'] as const,
      registers: [this.registry],
    });
  }

  /**
   * Records an outbound Ghost API request
   */
  recordGhostRequest(method: string, statusCode: number, durationSeconds: number) {
    const labels = { method, status_code: statusCode.toString() };
    this.ghostRequestsTotal.inc(labels);
    this.ghostRequestDuration.observe(labels, durationSeconds);
  }

  /**
   * Records a tool call
   */
  recordToolCall(tool: string, outcome: 'success' | 'error') {
    this.toolCallsTotal.inc({ tool, outcome });
  }

  /**
   * Gets metrics in Prometheus format
   */
  async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }

  getContentType(): string {
    return this.registry.contentType;
  }
}
