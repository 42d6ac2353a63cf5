/**
 * Graceful Shutdown Service
 *
 * Handles application shutdown gracefully:
 * - Captures SIGTERM and SIGINT signals
 * - Runs the registered close steps in order (sessions, HTTP server, ...)
 * - Forces exit when the steps take longer than the configured timeout
 */

import type { StructuredLogger } from './logger.service.js';

export interface ShutdownStep {
  name: string;
  run: () => PromiseLike<unknown>;
}

export interface ShutdownConfig {
  /** Force shutdown timeout in milliseconds (safety net) */
  forceTimeout: number;
  logger: StructuredLogger;
  steps: ShutdownStep[];
  /** Process exit, replaceable in tests */
  exit?: (code: number) => void;
}

export class GracefulShutdownService {
  private isShuttingDown = false;
  private config: ShutdownConfig;
  private forceShutdownTimeout?: NodeJS.Timeout;

  constructor(config: ShutdownConfig) {
    this.config = config;
  }

  /**
   * Registers signal handlers for graceful shutdown
   */
  registerHandlers(): void {
    process.on('SIGTERM', () => {
      void this.shutdown('SIGTERM');
    });

    process.on('SIGINT', () => {
      void this.shutdown('SIGINT');
    });

    process.on('unhandledRejection', (reason) => {
      this.config.logger.error('Unhandled rejection', { error: reason });
      void this.shutdown('UNHANDLED_REJECTION', 1);
    });
  }

  /**
   * Runs every close step, then exits. Later calls are ignored.
   */
  async shutdown(signal: string, exitCode = 0): Promise<void> {
    if (this.isShuttingDown) {
      this.config.logger.warn('⚠️  Shutdown already in progress...');
      return;
    }

    this.isShuttingDown = true;
    const { logger } = this.config;
    const exit = this.config.exit ?? ((code: number) => process.exit(code));

    logger.shutdownStarted({ signal });
    this.forceShutdownTimeout = setTimeout(() => {
      logger.error('❌ Force shutdown timeout expired, exiting');
      exit(1);
    }, this.config.forceTimeout);
    this.forceShutdownTimeout.unref();

    const startTime = Date.now();
    let failed = false;

    for (const step of this.config.steps) {
      try {
        await step.run();
        logger.debug(`✅ ${step.name} closed`);
      } catch (error) {
        failed = true;
        logger.error(`❌ Failed to close ${step.name}`, { error });
      }
    }

    clearTimeout(this.forceShutdownTimeout);
    logger.shutdownCompleted({ duration: Date.now() - startTime });
    exit(failed ? 1 : exitCode);
  }

  isShutdownInProgress(): boolean {
    return this.isShuttingDown;
  }
}
