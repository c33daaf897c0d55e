import type { Writable } from 'stream';
import { z } from 'zod';
import { BaseOutputPlugin } from './BaseOutputPlugin';
import { PluginMetadata, ValueList } from '../../types/plugin.types';
import { ExecConfigSchema } from '../../config/schemas/config.schema';

export type ExecConfig = z.infer<typeof ExecConfigSchema>;

/**
 * collectd exec plugin output
 * Writes one `PUTVAL` line per value list, for collectd to read from our stdout
 */
export class ExecPlugin extends BaseOutputPlugin<ExecConfig> {
  readonly metadata: PluginMetadata = {
    name: 'Exec',
    version: '1.0.0',
    description: 'collectd exec plugin output (PUTVAL on stdout)',
  };

  private stream: Writable;

  constructor(stream: Writable = process.stdout) {
    super();
    this.stream = stream;
  }

  async write(values: ValueList[]): Promise<void> {
    if (values.length === 0) {
      return;
    }

    const lines = values.map((valueList) => this.toPutval(valueList)).join('\n') + '\n';

    await new Promise<void>((resolve, reject) => {
      this.stream.write(lines, (error) => {
        if (error) {
          this.logger.error(`Failed to write PUTVAL lines: ${error.message}`);
          reject(error);
        } else {
          resolve();
        }
      });
    });

    this.logger.debug(`Wrote ${values.length} PUTVAL lines`);
  }

  /**
   * Format: PUTVAL "host/plugin-instance/type-instance" interval=N time:value[:value...]
   */
  toPutval(valueList: ValueList): string {
    const plugin = valueList.pluginInstance
      ? `${valueList.plugin}-${valueList.pluginInstance}`
      : valueList.plugin;
    const type = valueList.typeInstance
      ? `${valueList.type}-${valueList.typeInstance}`
      : valueList.type;
    const identifier = [valueList.host, plugin, type].map((part) => this.escape(part)).join('/');

    const time = this.config.useServerTime ? 'N' : String(Math.floor(valueList.time.getTime() / 1000));
    const values = valueList.values.map((value) => String(value)).join(':');

    return `PUTVAL "${identifier}" interval=${valueList.interval} ${time}:${values}`;
  }

  async healthCheck(): Promise<boolean> {
    return this.stream.writable;
  }

  private escape(part: string): string {
    return part.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
  }
}
