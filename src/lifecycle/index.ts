import type { Logger } from '../logger/index.js';

/**
 * Server lifecycle manager
 * Runs startup and shutdown hooks; shutdown is triggered by signals or by the transport closing
 */

export interface LifecycleHook {
  name: string;
  handler: () => Promise<void>;
}

export interface LifecycleOptions {
  shutdownTimeout?: number;
  /** Called with the exit code once shutdown finishes */
  exit?: (code: number) => void;
}

export class LifecycleManager {
  private logger: Logger;
  private startupHooks: LifecycleHook[] = [];
  private shutdownHooks: LifecycleHook[] = [];
  private isShuttingDown = false;
  private shutdownTimeout: number;
  private exit: (code: number) => void;

  constructor(logger: Logger, options: LifecycleOptions = {}) {
    this.logger = logger;
    this.shutdownTimeout = options.shutdownTimeout ?? 10000;
    this.exit = options.exit ?? ((code) => process.exit(code));
  }

  /**
   * Register a startup hook
   */
  onStartup(name: string, handler: () => Promise<void>): void {
    this.startupHooks.push({ name, handler });
  }

  /**
   * Register a shutdown hook
   */
  onShutdown(name: string, handler: () => Promise<void>): void {
    this.shutdownHooks.push({ name, handler });
  }

  /**
   * Execute all startup hooks in registration order; the first failure aborts startup
   */
  async startup(): Promise<void> {
    this.logger.debug('Starting server lifecycle');

    for (const hook of this.startupHooks) {
      try {
        this.logger.debug(`Executing startup hook: ${hook.name}`);
        await hook.handler();
      } catch (error) {
        this.logger.error(`Startup hook failed: ${hook.name}`, error);
        throw error;
      }
    }

    this.logger.debug('Server startup complete');
  }

  /**
   * Execute all shutdown hooks, then exit
   */
  async shutdown(reason?: string): Promise<void> {
    if (this.isShuttingDown) {
      this.logger.warn('Shutdown already in progress');
      return;
    }

    this.isShuttingDown = true;
    this.logger.info(`Shutting down${reason ? ` (${reason})` : ''}`);

    let timer: NodeJS.Timeout | undefined;
    const timeoutPromise = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(new Error(`Shutdown timeout after ${this.shutdownTimeout}ms`));
      }, this.shutdownTimeout);
    });

    try {
      await Promise.race([this.executeShutdownHooks(), timeoutPromise]);
      this.logger.info('Shutdown complete');
      this.exit(0);
    } catch (error) {
      this.logger.error('Error during shutdown', error);
      this.exit(1);
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * Execute all shutdown hooks in reverse order
   */
  private async executeShutdownHooks(): Promise<void> {
    const hooks = [...this.shutdownHooks].reverse();

    for (const hook of hooks) {
      try {
        this.logger.debug(`Executing shutdown hook: ${hook.name}`);
        await hook.handler();
      } catch (error) {
        // Remaining hooks still run
        this.logger.error(`Shutdown hook failed: ${hook.name}`, error);
      }
    }
  }

  /**
   * Install process signal handlers; only the entry point does this
   */
  handleSignals(): void {
    const signals: NodeJS.Signals[] = ['SIGTERM', 'SIGINT'];

    signals.forEach((signal) => {
      process.on(signal, () => {
        void this.shutdown(signal);
      });
    });

    process.on('uncaughtException', (error: Error) => {
      this.logger.error('Uncaught exception', error);
      void this.shutdown('uncaughtException');
    });

    process.on('unhandledRejection', (reason: unknown) => {
      this.logger.error('Unhandled rejection', reason);
      void this.shutdown('unhandledRejection');
    });
  }
}
