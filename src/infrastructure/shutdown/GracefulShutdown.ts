import { TaskCancelledError } from '../../domain/errors/AppErrors';
import { Logger, getLogger } from '../logging';

export type ShutdownHandler = () => Promise<void>;

export type ExitFn = (code: number) => void;

/**
 * Owns the task's AbortController and the cleanup that must run when the
 * process is interrupted: the running task is cancelled first, then the
 * handlers run last-registered first.
 */
export class GracefulShutdown {
  private static instance: GracefulShutdown | null = null;
  private logger: Logger;
  private handlers: ShutdownHandler[] = [];
  private controller = new AbortController();
  private isShuttingDown = false;
  private registered = false;
  private exit: ExitFn = code => process.exit(code);

  private constructor() {
    this.logger = getLogger('Shutdown');
  }

  static getInstance(): GracefulShutdown {
    if (!GracefulShutdown.instance) {
      GracefulShutdown.instance = new GracefulShutdown();
    }
    return GracefulShutdown.instance;
  }

  /**
   * Signal that aborts when shutdown begins.
   */
  get signal(): AbortSignal {
    return this.controller.signal;
  }

  /**
   * Register a cleanup handler to run during shutdown.
   * Handlers are called in LIFO order (last registered first).
   */
  registerHandler(handler: ShutdownHandler): void {
    this.handlers.push(handler);
  }

  removeHandler(handler: ShutdownHandler): void {
    const index = this.handlers.indexOf(handler);
    if (index > -1) {
      this.handlers.splice(index, 1);
    }
  }

  /**
   * Replace the exit call, for tests.
   */
  setExit(exit: ExitFn): void {
    this.exit = exit;
  }

  /**
   * Listen for SIGINT and SIGTERM. A second signal during shutdown exits
   * immediately.
   */
  register(): void {
    if (this.registered) {
      return;
    }
    this.registered = true;

    const onSignal = (name: NodeJS.Signals): void => {
      if (this.isShuttingDown) {
        this.logger.warn(`Received ${name} again, exiting now`);
        this.exit(130);
        return;
      }
      this.logger.info(`Received ${name} signal`);
      void this.shutdown(name);
    };
    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);

    this.logger.debug('Graceful shutdown handlers registered');
  }

  /**
   * Cancel the running task and run cleanup. Exits when `exitCode` is given.
   */
  async shutdown(reason: string, exitCode?: number): Promise<void> {
    if (this.isShuttingDown) {
      this.logger.warn('Shutdown already in progress');
      return;
    }
    this.isShuttingDown = true;
    this.logger.info(`Starting graceful shutdown (reason: ${reason})`);

    if (!this.controller.signal.aborted) {
      this.controller.abort(new TaskCancelledError(`task cancelled (${reason})`));
    }
    await this.runHandlers();

    this.logger.info('Graceful shutdown complete');
    const code = exitCode ?? (reason === 'SIGINT' || reason === 'SIGTERM' ? 130 : undefined);
    if (code !== undefined) {
      this.exit(code);
    }
  }

  /**
   * Run every handler once, newest first. Failures are logged and the
   * remaining handlers still run.
   */
  async runHandlers(): Promise<void> {
    const handlersToRun = [...this.handlers].reverse();
    this.handlers = [];

    for (let i = 0; i < handlersToRun.length; i++) {
      try {
        this.logger.debug(`Running shutdown handler ${i + 1}/${handlersToRun.length}`);
        await handlersToRun[i]();
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        this.logger.error(`Shutdown handler ${i + 1} failed`, { error: message });
      }
    }
  }

  isInProgress(): boolean {
    return this.isShuttingDown;
  }

  /**
   * Reset instance (for testing).
   */
  static reset(): void {
    GracefulShutdown.instance = null;
  }
}

/**
 * Convenience function to register a shutdown handler.
 */
export function onShutdown(handler: ShutdownHandler): void {
  GracefulShutdown.getInstance().registerHandler(handler);
}

/**
 * Initialize graceful shutdown handling.
 */
export function initGracefulShutdown(): GracefulShutdown {
  const shutdown = GracefulShutdown.getInstance();
  shutdown.register();
  return shutdown;
}
