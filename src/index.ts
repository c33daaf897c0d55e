import { createLogger } from './core/Logger';
import { ConfigLoader } from './config';
import { Orchestrator } from './core/Orchestrator';
import { getOutputPluginRegistry } from './plugins/outputs';
import { registerFritzBoxPlugin } from './plugins/fritzbox';

const VERSION = '1.0.0';
const logger = createLogger('Main');

async function main(): Promise<void> {
  const configFolder = process.env.CONFIG_FOLDER || './config';

  logger.info(`fritzbox-collector v${VERSION} starting...`);
  logger.info(`Config folder: ${configFolder}`);

  // Load and validate configuration
  const configLoader = new ConfigLoader(configFolder);
  const config = configLoader.load();

  logger.debug('Configuration loaded');

  const orchestrator = new Orchestrator(config);

  const outputPlugins = getOutputPluginRegistry();
  logger.info(`Discovered ${outputPlugins.size} output plugins: ${[...outputPlugins.keys()].join(', ')}`);
  orchestrator.registerOutputs(outputPlugins);

  registerFritzBoxPlugin(orchestrator.getHost());

  await orchestrator.start();

  logger.info('Collector is running. Press Ctrl+C to stop.');
}

main().catch((error) => {
  logger.error('Fatal error:', error);
  process.exit(1);
});
