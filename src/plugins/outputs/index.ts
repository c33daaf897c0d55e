import type { OutputPluginFactory } from '../../core/PluginHost';

// Plugin imports
import { ExecPlugin } from './ExecPlugin';
import { InfluxDB1Plugin } from './InfluxDB1Plugin';
import { InfluxDB2Plugin } from './InfluxDB2Plugin';

// Re-exports for direct usage
export { BaseOutputPlugin } from './BaseOutputPlugin';
export { ExecPlugin } from './ExecPlugin';
export { InfluxDB1Plugin } from './InfluxDB1Plugin';
export { InfluxDB2Plugin } from './InfluxDB2Plugin';
export type { ExecConfig } from './ExecPlugin';
export type { InfluxDB1Config } from './InfluxDB1Plugin';
export type { InfluxDB2Config } from './InfluxDB2Plugin';

/**
 * All available output plugin classes
 * The config key is derived from metadata.name.toLowerCase()
 */
const outputPluginClasses: OutputPluginFactory[] = [
  ExecPlugin,
  InfluxDB1Plugin,
  InfluxDB2Plugin,
];

/**
 * Build registry automatically from plugin metadata
 */
export function getOutputPluginRegistry(): Map<string, OutputPluginFactory> {
  const registry = new Map<string, OutputPluginFactory>();

  for (const PluginClass of outputPluginClasses) {
    const instance = new PluginClass();
    const configKey = instance.metadata.name.toLowerCase();
    registry.set(configKey, PluginClass);
  }

  return registry;
}
