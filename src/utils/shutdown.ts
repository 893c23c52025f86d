/**
 * Graceful shutdown handling for the repodoc CLI
 *
 * The first SIGINT/SIGTERM aborts the current run through its AbortSignal, so
 * the pipeline stops at the next stage boundary without calling the backend.
 * A second signal quits immediately.
 */

import { errorMessage } from './errors.js';
import logger from './logger.js';

type CleanupCallback = () => void | Promise<void>;

export type ShutdownSignal = 'SIGINT' | 'SIGTERM';

export interface ShutdownOptions {
  /** Do not attach process signal handlers */
  skipHandlers?: boolean;
}

/**
 * Manages cancellation and cleanup callbacks for one CLI run
 */
export class ShutdownManager {
  private callbacks: CleanupCallback[] = [];
  private isShuttingDown = false;
  private controller = new AbortController();
  private handlers: Map<ShutdownSignal, () => void> = new Map();
  private handlersAttached = false;

  constructor(options?: ShutdownOptions) {
    // Skip handlers in test environment or when explicitly disabled
    if (!options?.skipHandlers && process.env.NODE_ENV !== 'test') {
      this.setupHandlers();
    }
  }

  /**
   * Aborted once shutdown starts
   */
  get signal(): AbortSignal {
    return this.controller.signal;
  }

  private setupHandlers(): void {
    if (this.handlersAttached) return;
    this.handlersAttached = true;

    const sigintHandler = (): void => {
      void this.handleShutdown('SIGINT');
    };
    const sigtermHandler = (): void => {
      void this.handleShutdown('SIGTERM');
    };

    this.handlers.set('SIGINT', sigintHandler);
    this.handlers.set('SIGTERM', sigtermHandler);

    process.on('SIGINT', sigintHandler);
    process.on('SIGTERM', sigtermHandler);
  }

  /**
   * Remove all registered signal handlers
   */
  removeHandlers(): void {
    for (const [event, handler] of this.handlers) {
      process.removeListener(event, handler);
    }
    this.handlers.clear();
    this.handlersAttached = false;
  }

  /**
   * Start shutdown: abort the run and run cleanup callbacks in reverse order
   */
  async handleShutdown(signal: ShutdownSignal): Promise<void> {
    if (this.isShuttingDown) {
      logger.warning('Force quitting...');
      process.exit(130);
    }

    this.isShuttingDown = true;
    logger.warning(`Interrupted (${signal}), cancelling...`);
    this.controller.abort();
    process.exitCode = signal === 'SIGINT' ? 130 : 143;

    for (const callback of [...this.callbacks].reverse()) {
      try {
        await callback();
      } catch (error) {
        logger.error(`Cleanup failed: ${errorMessage(error)}`);
      }
    }
  }

  /**
   * Register a cleanup callback to run on shutdown
   */
  onCleanup(callback: CleanupCallback): void {
    this.callbacks.push(callback);
  }

  /**
   * Remove a cleanup callback
   */
  removeCleanup(callback: CleanupCallback): void {
    const index = this.callbacks.indexOf(callback);
    if (index !== -1) {
      this.callbacks.splice(index, 1);
    }
  }

  /**
   * Check if shutdown is in progress
   */
  isInProgress(): boolean {
    return this.isShuttingDown;
  }
}
