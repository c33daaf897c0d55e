import { createLogger } from '../../core/Logger';
import { FritzConnection } from '../../transport/FritzConnection';
import type { ConnectionConfig } from '../../types/fritzbox.types';
import type { Host } from '../../types/plugin.types';
import type { ConnectFunction } from '../../types/tr064.types';
import { Collector } from './Collector';
import { ConfigResolver } from './ConfigResolver';

export { Collector, PLUGIN_NAME } from './Collector';
export { ConfigResolver, CONFIG_KEYS } from './ConfigResolver';
export { METRIC_CATALOG, lookupField, statusGauge } from './catalog';
export { InitFailure } from './errors';

const logger = createLogger('FritzBoxPlugin');

/**
 * Register the FRITZ!Box plugin's config, init, read and shutdown hooks on a host
 * @param connect - Opens the router connection; TR-064 over HTTP by default
 * @returns The collector driven by the hooks
 */
export function registerFritzBoxPlugin(
  host: Host,
  connect: ConnectFunction = FritzConnection.connect
): Collector {
  const resolver = new ConfigResolver(host);
  const collector = new Collector(host, connect);
  let config: ConnectionConfig | null = null;

  host.registerConfig((entries) => {
    config = resolver.resolve(entries);
  });

  host.registerInit(async () => {
    if (!config) {
      logger.info('No plugin configuration given, using defaults');
    }
    await collector.init(config ?? resolver.resolve([]));
  });

  host.registerRead(async () => {
    await collector.poll();
  });

  host.registerShutdown(async () => {
    await collector.shutdown();
  });

  return collector;
}
