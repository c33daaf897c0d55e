import { InfluxDB, IPoint, ISingleHostConfig } from 'influx';
import * as https from 'https';
import { BaseOutputPlugin } from './BaseOutputPlugin';
import { PluginMetadata, ValueList } from '../../types/plugin.types';
import { z } from 'zod';
import { InfluxDB1ConfigSchema } from '../../config/schemas/config.schema';

export type InfluxDB1Config = z.infer<typeof InfluxDB1ConfigSchema>;

/**
 * InfluxDB 1.x output plugin
 * Uses the legacy InfluxDB API with username/password authentication
 */
export class InfluxDB1Plugin extends BaseOutputPlugin<InfluxDB1Config> {
  readonly metadata: PluginMetadata = {
    name: 'InfluxDB1',
    version: '1.0.0',
    description: 'InfluxDB 1.x output plugin using legacy API',
  };

  private client!: InfluxDB;

  /**
   * Initialize the InfluxDB 1.x client
   */
  async initialize(config: InfluxDB1Config): Promise<void> {
    await super.initialize(config);

    const protocol = this.config.ssl ? 'https' : 'http';

    const options: ISingleHostConfig = {
      host: this.config.url,
      port: this.config.port,
      protocol,
      database: this.config.database,
      username: this.config.username,
      password: this.config.password,
    };

    // Handle SSL verification
    if (this.config.ssl && !this.config.verifySsl) {
      options.options = {
        agent: new https.Agent({
          rejectUnauthorized: false,
        }),
      };
    }

    this.client = new InfluxDB(options);

    // Ensure database exists
    await this.ensureDatabase();

    this.logger.info(
      `Connected to InfluxDB 1.x at ${protocol}://${this.config.url}:${this.config.port}/${this.config.database}`
    );
  }

  /**
   * Ensure the database exists, create if not
   */
  private async ensureDatabase(): Promise<void> {
    try {
      const databases = await this.client.getDatabaseNames();
      if (!databases.includes(this.config.database)) {
        this.logger.info(`Creating database: ${this.config.database}`);
        await this.client.createDatabase(this.config.database);
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      this.logger.warn(`Could not check/create database: ${message}`);
    }
  }

  /**
   * Write value lists to InfluxDB
   */
  async write(values: ValueList[]): Promise<void> {
    if (values.length === 0) {
      return;
    }

    try {
      const influxPoints = values.map((valueList) => this.convertToInfluxPoint(valueList));
      await this.client.writePoints(influxPoints);
      this.logger.debug(`Wrote ${values.length} points to InfluxDB 1.x`);
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      this.logger.error(`Failed to write to InfluxDB 1.x: ${message}`);
      throw error;
    }
  }

  /**
   * Convert a value list to InfluxDB IPoint format
   */
  private convertToInfluxPoint(valueList: ValueList): IPoint {
    return {
      measurement: this.toMeasurement(valueList),
      tags: this.toTags(valueList),
      fields: this.toFields(valueList),
      timestamp: valueList.time,
    };
  }

  /**
   * Check if InfluxDB is healthy
   */
  async healthCheck(): Promise<boolean> {
    try {
      const hosts = await this.client.ping(5000);
      return hosts.some((host) => host.online);
    } catch {
      return false;
    }
  }
}
