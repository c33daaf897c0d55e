import { createLogger } from './Logger';
import type { OutputPluginFactory } from './PluginHost';
import { PluginHost } from './PluginHost';
import { ConfigLoader } from '../config/ConfigLoader';
import type { HostConfig } from '../config/schemas/config.schema';

const logger = createLogger('Orchestrator');

/**
 * Orchestrator is the main coordinator that ties everything together.
 * It owns the plugin host, runs the plugin lifecycle and handles graceful shutdown.
 */
export class Orchestrator {
  private host: PluginHost;
  private config: HostConfig;
  private isRunning = false;
  private shutdownPromise: Promise<void> | null = null;

  constructor(config: HostConfig) {
    this.config = config;
    this.host = new PluginHost(config.interval);
  }

  /**
   * Register output plugin factories before starting
   */
  registerOutputs(outputPlugins: Map<string, OutputPluginFactory>): void {
    for (const [type, factory] of outputPlugins) {
      this.host.registerOutputPlugin(type, factory);
    }
  }

  /**
   * Start outputs, run the plugin's config and init hooks, then begin reading
   */
  async start(): Promise<void> {
    if (this.isRunning) {
      logger.warn('Orchestrator is already running');
      return;
    }

    logger.info('Starting collector orchestrator...');

    this.setupSignalHandlers();

    try {
      this.host.configure(ConfigLoader.toConfigEntries(this.config.plugin));

      await this.host.initializeOutputs(this.config.outputs);
      await this.host.initialize();

      const healthResults = await this.host.healthCheck();
      for (const [type, healthy] of healthResults) {
        if (healthy) {
          logger.info(`Output ${type}: healthy`);
        } else {
          logger.warn(`Output ${type}: unhealthy`);
        }
      }

      this.host.startScheduler();

      this.isRunning = true;
      const stats = this.host.getStats();
      logger.info(
        `Collector started with ${stats.activeOutputPlugins} output(s), reading every ${this.config.interval}s`
      );
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      logger.error(`Failed to start collector: ${message}`);
      await this.host.shutdown();
      throw error;
    }
  }

  /**
   * Stop the orchestrator gracefully
   */
  async stop(): Promise<void> {
    // If already shutting down, wait for that to complete
    if (this.shutdownPromise) {
      return this.shutdownPromise;
    }

    if (!this.isRunning) {
      return;
    }

    this.shutdownPromise = this.performShutdown();
    return this.shutdownPromise;
  }

  private async performShutdown(): Promise<void> {
    logger.info('Stopping collector orchestrator...');
    this.isRunning = false;

    try {
      await this.host.shutdown();
      logger.info('Collector stopped successfully');
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      logger.error(`Error during shutdown: ${message}`);
      throw error;
    }
  }

  /**
   * Setup signal handlers for graceful shutdown
   */
  private setupSignalHandlers(): void {
    const signals: NodeJS.Signals[] = ['SIGTERM', 'SIGINT'];

    for (const signal of signals) {
      process.on(signal, async () => {
        logger.info(`Received ${signal}, initiating graceful shutdown...`);

        try {
          await this.stop();
          process.exit(0);
        } catch (error) {
          const message = error instanceof Error ? error.message : 'Unknown error';
          logger.error(`Shutdown failed: ${message}`);
          process.exit(1);
        }
      });
    }

    process.on('uncaughtException', async (error) => {
      logger.error(`Uncaught exception: ${error.message}`);
      logger.error(error.stack || '');
      await this.stopBeforeExit();
    });

    process.on('unhandledRejection', async (reason) => {
      const message = reason instanceof Error ? reason.message : String(reason);
      logger.error(`Unhandled rejection: ${message}`);
      await this.stopBeforeExit();
    });
  }

  private async stopBeforeExit(): Promise<void> {
    try {
      await this.stop();
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      logger.error(`Shutdown after fatal error failed: ${message}`);
    }

    process.exit(1);
  }

  /**
   * Check if the orchestrator is running
   */
  isActive(): boolean {
    return this.isRunning;
  }

  /**
   * Get the plugin host that plugins register their hooks with
   */
  getHost(): PluginHost {
    return this.host;
  }
}
