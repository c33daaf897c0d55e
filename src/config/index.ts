export { ConfigLoader, CONFIG_FILE } from './ConfigLoader';
export {
  HostConfigSchema,
  ConnectionConfigSchema,
  DEFAULT_ADDRESS,
  DEFAULT_PORT,
} from './schemas/config.schema';
export type { HostConfig, OutputsConfig, ConnectionConfig } from './schemas/config.schema';
