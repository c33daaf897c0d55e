/**
 * Plugin system types
 */

export interface PluginMetadata {
  name: string;
  version: string;
  description: string;
}

// =============================================================================
// Host contract
// =============================================================================

export type ConfigValue = string | number | boolean;

/**
 * One raw configuration entry as delivered to the config hook.
 * The host always passes exactly one value per key.
 */
export interface ConfigEntry {
  key: string;
  values: ConfigValue[];
}

/**
 * One reported data point, tagged the way collectd tags a value list
 */
export interface MeasurementRecord {
  host: string;
  plugin: string;
  pluginInstance: string;
  type: string;
  typeInstance: string;
  values: number[];
}

/**
 * A dispatched record stamped by the host with the cycle time and interval
 */
export interface ValueList extends MeasurementRecord {
  time: Date;
  interval: number;
}

export interface WarningSink {
  warning(message: string): void;
}

export interface MetricSink extends WarningSink {
  dispatch(record: MeasurementRecord): void;
}

export type ConfigCallback = (entries: ConfigEntry[]) => void;
export type LifecycleCallback = () => Promise<void>;

/**
 * Capabilities a host offers to a plugin: four registration hooks,
 * a report sink and a warning channel.
 */
export interface Host extends MetricSink {
  registerConfig(callback: ConfigCallback): void;
  registerInit(callback: LifecycleCallback): void;
  registerRead(callback: LifecycleCallback): void;
  registerShutdown(callback: LifecycleCallback): void;
}

// =============================================================================
// Outputs
// =============================================================================

export interface OutputPlugin<TConfig = unknown> {
  readonly metadata: PluginMetadata;
  initialize(config: TConfig): Promise<void>;
  write(values: ValueList[]): Promise<void>;
  healthCheck(): Promise<boolean>;
  shutdown(): Promise<void>;
}
