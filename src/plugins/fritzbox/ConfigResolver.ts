import { createLogger } from '../../core/Logger';
import { DEFAULT_ADDRESS, DEFAULT_PORT } from '../../config/schemas/config.schema';
import type { ConnectionConfig } from '../../types/fritzbox.types';
import type { ConfigEntry, ConfigValue, WarningSink } from '../../types/plugin.types';

const logger = createLogger('ConfigResolver');

/**
 * Recognized keys (case-sensitive) and the field each one sets
 */
export const CONFIG_KEYS = {
  Address: 'address',
  Port: 'port',
  User: 'user',
  Password: 'password',
  Hostname: 'reportHostname',
  Instance: 'instanceLabel',
} as const satisfies Record<string, keyof ConnectionConfig>;

type ConfigKey = keyof typeof CONFIG_KEYS;

function isConfigKey(key: string): key is ConfigKey {
  return Object.prototype.hasOwnProperty.call(CONFIG_KEYS, key);
}

/**
 * Turns the raw entries of the config hook into a ConnectionConfig.
 * Never throws: problems are reported through the warning channel.
 */
export class ConfigResolver {
  private sink: WarningSink;

  constructor(sink: WarningSink) {
    this.sink = sink;
  }

  resolve(entries: readonly ConfigEntry[]): ConnectionConfig {
    const config: ConnectionConfig = {
      address: DEFAULT_ADDRESS,
      port: DEFAULT_PORT,
      user: '',
      password: '',
    };

    for (const { key, values } of entries) {
      if (!isConfigKey(key)) {
        this.sink.warning(`Unknown config key: ${key}`);
        continue;
      }

      if (values.length === 0) {
        this.sink.warning(`No value given for config key: ${key}`);
        continue;
      }

      const value = values[0];
      const field = CONFIG_KEYS[key];

      if (field === 'port') {
        config.port = this.toPort(value);
      } else {
        config[field] = String(value);
      }
    }

    logger.debug(`Resolved connection to ${config.address}:${config.port}`);
    return config;
  }

  /**
   * Best-effort integer coercion. A non-integer is kept as is and
   * rejected when the connection is opened.
   */
  private toPort(value: ConfigValue): number {
    let port = NaN;
    if (typeof value === 'number') {
      port = value;
    } else if (typeof value === 'string' && /^\s*\d+\s*$/.test(value)) {
      port = parseInt(value, 10);
    }

    if (!Number.isInteger(port)) {
      this.sink.warning(`Port value "${String(value)}" is not an integer`);
    }
    return port;
  }
}
