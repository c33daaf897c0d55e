import { createLogger } from '../../core/Logger';
import { OutputPlugin, PluginMetadata, ValueList } from '../../types/plugin.types';

/**
 * Abstract base class for all output plugins.
 * Provides common functionality like logging and the mapping of value lists
 * onto measurement/tags/fields.
 */
export abstract class BaseOutputPlugin<TConfig = unknown> implements OutputPlugin<TConfig> {
  protected config!: TConfig;
  protected logger = createLogger(this.constructor.name);

  /**
   * Plugin metadata - must be implemented by subclasses
   */
  abstract readonly metadata: PluginMetadata;

  /**
   * Initialize the plugin with configuration
   */
  async initialize(config: TConfig): Promise<void> {
    this.config = config;
    this.logger.info(`Initialized ${this.metadata.name} plugin`);
  }

  /**
   * Write value lists to the output - must be implemented by subclasses
   */
  abstract write(values: ValueList[]): Promise<void>;

  /**
   * Check if the output is healthy - must be implemented by subclasses
   */
  abstract healthCheck(): Promise<boolean>;

  /**
   * Shutdown the plugin
   */
  async shutdown(): Promise<void> {
    this.logger.info(`Shutting down ${this.metadata.name} plugin`);
  }

  /**
   * Measurement name, following InfluxDB's collectd input: `<plugin>_value`
   */
  protected toMeasurement(valueList: ValueList): string {
    return `${valueList.plugin}_value`;
  }

  /**
   * Tags of a value list; empty instances are left out
   */
  protected toTags(valueList: ValueList): Record<string, string> {
    const tags: Record<string, string> = {
      host: valueList.host,
      type: valueList.type,
    };
    if (valueList.pluginInstance) {
      tags.instance = valueList.pluginInstance;
    }
    if (valueList.typeInstance) {
      tags.type_instance = valueList.typeInstance;
    }
    return tags;
  }

  /**
   * Fields of a value list: `value`, then `value_1`, `value_2`, ... for further values
   */
  protected toFields(valueList: ValueList): Record<string, number> {
    const fields: Record<string, number> = {};
    valueList.values.forEach((value, index) => {
      fields[index === 0 ? 'value' : `value_${index}`] = value;
    });
    return fields;
  }
}
