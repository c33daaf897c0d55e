import { createLogger } from './Logger';
import type {
  ConfigCallback,
  ConfigEntry,
  Host,
  LifecycleCallback,
  MeasurementRecord,
  OutputPlugin,
  ValueList,
} from '../types/plugin.types';
import type { OutputsConfig } from '../config/schemas/config.schema';

const logger = createLogger('PluginHost');
const pluginLogger = createLogger('Plugin');

/**
 * Plugin factory type for creating output plugin instances
 */
export type OutputPluginFactory = new () => OutputPlugin;

const STOP_TIMEOUT_MS = 30000;

/**
 * PluginHost drives a plugin through its registered hooks: configuration,
 * initialization, periodic reads and shutdown. Records dispatched during a
 * read are stamped with the cycle time and written to every output.
 */
export class PluginHost implements Host {
  private configCallback: ConfigCallback | null = null;
  private initCallback: LifecycleCallback | null = null;
  private readCallback: LifecycleCallback | null = null;
  private shutdownCallback: LifecycleCallback | null = null;

  private outputFactories: Map<string, OutputPluginFactory> = new Map();
  private outputPlugins: Map<string, OutputPlugin> = new Map();

  private pending: MeasurementRecord[] = [];
  private intervalSeconds: number;
  private timer: NodeJS.Timeout | null = null;
  private isReading = false;
  private readCount = 0;

  constructor(intervalSeconds: number) {
    this.intervalSeconds = intervalSeconds;
  }

  // ===========================================================================
  // Host contract
  // ===========================================================================

  registerConfig(callback: ConfigCallback): void {
    if (this.configCallback) logger.warn('Replacing registered config callback');
    this.configCallback = callback;
  }

  registerInit(callback: LifecycleCallback): void {
    if (this.initCallback) logger.warn('Replacing registered init callback');
    this.initCallback = callback;
  }

  registerRead(callback: LifecycleCallback): void {
    if (this.readCallback) logger.warn('Replacing registered read callback');
    this.readCallback = callback;
  }

  registerShutdown(callback: LifecycleCallback): void {
    if (this.shutdownCallback) logger.warn('Replacing registered shutdown callback');
    this.shutdownCallback = callback;
  }

  dispatch(record: MeasurementRecord): void {
    this.pending.push({ ...record, values: [...record.values] });
  }

  warning(message: string): void {
    pluginLogger.warn(message);
  }

  // ===========================================================================
  // Outputs
  // ===========================================================================

  /**
   * Register an output plugin factory
   */
  registerOutputPlugin(type: string, factory: OutputPluginFactory): void {
    logger.debug(`Registering output plugin type: ${type}`);
    this.outputFactories.set(type, factory);
  }

  /**
   * Initialize output plugins from config
   */
  async initializeOutputs(outputs: OutputsConfig): Promise<void> {
    for (const [type, outputConfig] of Object.entries(outputs)) {
      if (!outputConfig) continue;

      const factory = this.outputFactories.get(type);
      if (!factory) {
        logger.warn(`No registered factory for output type: ${type}`);
        continue;
      }

      try {
        const plugin = new factory();
        await plugin.initialize(outputConfig);
        this.outputPlugins.set(type, plugin);
        logger.info(`Initialized output plugin: ${type}`);
      } catch (error) {
        const message = error instanceof Error ? error.message : 'Unknown error';
        logger.error(`Failed to initialize output plugin ${type}: ${message}`);
        throw error;
      }
    }

    if (this.outputPlugins.size === 0) {
      throw new Error('No output plugins were initialized');
    }
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  /**
   * Deliver configuration entries to the config hook
   */
  configure(entries: ConfigEntry[]): void {
    if (!this.configCallback) {
      logger.debug('No config callback registered');
      return;
    }
    this.configCallback(entries);
  }

  /**
   * Run the init hook. A failure here is fatal and propagates.
   */
  async initialize(): Promise<void> {
    if (!this.initCallback) {
      logger.debug('No init callback registered');
      return;
    }

    try {
      await this.initCallback();
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      logger.error(`Plugin initialization failed: ${message}`);
      throw error;
    }
  }

  /**
   * Run the read hook once and write what it dispatched to all outputs
   * @returns The value lists written in this cycle
   */
  async read(): Promise<ValueList[]> {
    if (!this.readCallback) {
      logger.debug('No read callback registered');
      return [];
    }

    const time = new Date();
    const startTime = Date.now();

    try {
      await this.readCallback();
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      logger.error(`Read callback failed: ${message}`);
    }

    const values: ValueList[] = this.pending.map((record) => ({
      ...record,
      time,
      interval: this.intervalSeconds,
    }));
    this.pending = [];
    this.readCount++;

    if (values.length > 0) {
      await this.writeToOutputs(values);
      logger.debug(`Read collected ${values.length} values in ${Date.now() - startTime}ms`);
    } else {
      logger.debug('Read collected no data');
    }

    return values;
  }

  /**
   * Write value lists to all output plugins
   */
  private async writeToOutputs(values: ValueList[]): Promise<void> {
    const writePromises = Array.from(this.outputPlugins.entries()).map(
      async ([type, plugin]) => {
        try {
          await plugin.write(values);
          logger.debug(`Wrote ${values.length} values to ${type}`);
        } catch (error) {
          const message = error instanceof Error ? error.message : 'Unknown error';
          logger.error(`Failed to write to output ${type}: ${message}`);
          // Don't throw - continue with other outputs
        }
      }
    );

    await Promise.all(writePromises);
  }

  // ===========================================================================
  // Scheduling
  // ===========================================================================

  /**
   * Read immediately, then every interval
   */
  startScheduler(): void {
    if (this.timer) {
      logger.warn('Scheduler is already running');
      return;
    }

    this.timer = setInterval(() => {
      void this.executeRead();
    }, this.intervalSeconds * 1000);
    void this.executeRead();

    logger.info(`Started scheduler (every ${this.intervalSeconds}s)`);
  }

  /**
   * Run a read unless the previous one is still in progress
   */
  private async executeRead(): Promise<void> {
    if (this.isReading) {
      logger.debug('Previous read is still running, skipping');
      return;
    }

    this.isReading = true;
    try {
      await this.read();
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      logger.error(`Read failed: ${message}`);
    } finally {
      this.isReading = false;
    }
  }

  /**
   * Stop the scheduler and wait for a running read to complete
   */
  async stopScheduler(): Promise<void> {
    if (!this.timer) {
      return;
    }

    clearInterval(this.timer);
    this.timer = null;

    if (this.isReading) {
      logger.info('Waiting for the running read to complete...');
      const startTime = Date.now();

      while (this.isReading) {
        if (Date.now() - startTime > STOP_TIMEOUT_MS) {
          logger.warn('Timeout waiting for read to complete');
          break;
        }
        await new Promise((resolve) => setTimeout(resolve, 100));
      }
    }

    logger.info('Scheduler stopped');
  }

  /**
   * Run health checks on all output plugins
   */
  async healthCheck(): Promise<Map<string, boolean>> {
    const results = new Map<string, boolean>();

    for (const [type, plugin] of this.outputPlugins) {
      try {
        results.set(type, await plugin.healthCheck());
      } catch {
        results.set(type, false);
      }
    }

    return results;
  }

  /**
   * Stop reading, run the shutdown hook and shut down all outputs
   */
  async shutdown(): Promise<void> {
    logger.info('Shutting down PluginHost...');

    await this.stopScheduler();

    if (this.shutdownCallback) {
      try {
        await this.shutdownCallback();
      } catch (error) {
        const message = error instanceof Error ? error.message : 'Unknown error';
        logger.error(`Plugin shutdown failed: ${message}`);
      }
    }

    for (const [type, plugin] of this.outputPlugins) {
      try {
        await plugin.shutdown();
      } catch (error) {
        const message = error instanceof Error ? error.message : 'Unknown error';
        logger.error(`Error shutting down output plugin ${type}: ${message}`);
      }
    }

    this.outputPlugins.clear();
    this.pending = [];

    logger.info('PluginHost shutdown complete');
  }

  /**
   * Get statistics about registered hooks and active outputs
   */
  getStats(): {
    registeredHooks: number;
    registeredOutputTypes: number;
    activeOutputPlugins: number;
    schedulerRunning: boolean;
    reads: number;
  } {
    const hooks = [this.configCallback, this.initCallback, this.readCallback, this.shutdownCallback];

    return {
      registeredHooks: hooks.filter((hook) => hook !== null).length,
      registeredOutputTypes: this.outputFactories.size,
      activeOutputPlugins: this.outputPlugins.size,
      schedulerRunning: this.timer !== null,
      reads: this.readCount,
    };
  }
}
