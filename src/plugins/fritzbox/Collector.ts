import { createLogger } from '../../core/Logger';
import { ConnectionConfigSchema } from '../../config/schemas/config.schema';
import type { CollectorState, ConnectionConfig, FieldMapping, MetricQuery } from '../../types/fritzbox.types';
import type { MeasurementRecord, MetricSink } from '../../types/plugin.types';
import type { ConnectFunction, QueryResult, ResultValue, RouterConnection } from '../../types/tr064.types';
import { METRIC_CATALOG, lookupField } from './catalog';
import { InitFailure } from './errors';

export const PLUGIN_NAME = 'fritzbox';

/**
 * Polls the metric catalog over one router connection and dispatches
 * a measurement record per field.
 *
 * Lifecycle: uninitialized -> ready (init) -> shutdown (shutdown).
 * A failing action only drops the records of that action for the cycle.
 */
export class Collector {
  private state: CollectorState = 'uninitialized';
  private connection: RouterConnection | null = null;
  private config: ConnectionConfig | null = null;
  private sink: MetricSink;
  private connect: ConnectFunction;
  private catalog: readonly MetricQuery[];
  private logger = createLogger('Collector');

  constructor(sink: MetricSink, connect: ConnectFunction, catalog: readonly MetricQuery[] = METRIC_CATALOG) {
    this.sink = sink;
    this.connect = connect;
    this.catalog = catalog;
  }

  /**
   * Open the router connection
   * @throws InitFailure if the configuration is invalid or the router cannot be reached
   */
  async init(config: ConnectionConfig): Promise<void> {
    if (this.state !== 'uninitialized') {
      throw new Error(`Collector cannot be initialized in state ${this.state}`);
    }

    const result = ConnectionConfigSchema.safeParse(config);
    if (!result.success) {
      const errors = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ');
      throw new InitFailure(`Invalid connection configuration: ${errors}`);
    }

    const { address, port, user, password } = result.data;

    try {
      this.connection = await this.connect({ address, port, user, password });
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      throw new InitFailure(`Could not connect to ${address}:${port}: ${message}`, { cause: error });
    }

    this.config = result.data;
    this.state = 'ready';
    this.logger.info(`Collecting from ${this.connection.modelName} at ${address}:${port}`);
  }

  /**
   * Run every catalog query once and dispatch the records, in catalog order
   * then field order. Never throws because of a failing query.
   */
  async poll(): Promise<MeasurementRecord[]> {
    if (this.state !== 'ready' || !this.connection || !this.config) {
      throw new Error(`Collector cannot poll in state ${this.state}`);
    }

    const connection = this.connection;
    const host = this.config.reportHostname || connection.modelName;
    const pluginInstance = this.config.instanceLabel ?? '';
    const records: MeasurementRecord[] = [];

    for (const query of this.catalog) {
      let result: QueryResult;
      try {
        result = await connection.call(query.service, query.action);
      } catch (error) {
        const message = error instanceof Error ? error.message : 'Unknown error';
        this.sink.warning(`${query.service}.${query.action} failed: ${message}`);
        continue;
      }

      for (const field of query.fields) {
        const value = this.toValue(field, lookupField(result, field.source));
        if (value === undefined) {
          this.logger.debug(`${query.service}.${query.action}: no numeric ${field.source} in result`);
          continue;
        }

        const record: MeasurementRecord = {
          host,
          plugin: PLUGIN_NAME,
          pluginInstance,
          type: field.type,
          typeInstance: field.typeInstance,
          values: [value],
        };
        this.sink.dispatch(record);
        records.push(record);
      }
    }

    this.logger.debug(`Dispatched ${records.length} records`);
    return records;
  }

  /**
   * Release the router connection
   */
  async shutdown(): Promise<void> {
    const connection = this.connection;
    this.connection = null;
    this.state = 'shutdown';

    if (connection) {
      await connection.close();
      this.logger.info(`Closed connection to ${connection.modelName}`);
    }
  }

  getState(): CollectorState {
    return this.state;
  }

  private toValue(field: FieldMapping, raw: ResultValue | undefined): number | undefined {
    if (raw === undefined) {
      return undefined;
    }
    if (field.convert) {
      return field.convert(raw);
    }
    return typeof raw === 'number' && Number.isFinite(raw) ? raw : undefined;
  }
}
