import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'yaml';
import { createLogger } from '../core/Logger';
import { HostConfigSchema, HostConfig, PluginSection } from './schemas/config.schema';
import type { ConfigEntry } from '../types/plugin.types';

const logger = createLogger('ConfigLoader');

export const CONFIG_FILE = 'fritzbox.yaml';
const ENV_PREFIX = 'FRITZBOX_';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * ConfigLoader handles loading, validation, and environment variable overrides
 * for the YAML configuration.
 */
export class ConfigLoader {
  private configFolder: string;

  constructor(configFolder: string) {
    this.configFolder = configFolder;
  }

  /**
   * Load configuration from YAML file with environment variable overrides
   * @returns Validated configuration object
   * @throws Error if configuration is invalid
   */
  load(): HostConfig {
    const yamlPath = path.join(this.configFolder, CONFIG_FILE);

    // Check if YAML config exists
    if (!fs.existsSync(yamlPath)) {
      this.handleMissingConfig(yamlPath);
    }

    // Parse YAML file
    logger.info(`Loading configuration from: ${yamlPath}`);
    const fileContent = fs.readFileSync(yamlPath, 'utf-8');
    let parsed: unknown;

    try {
      parsed = yaml.parse(fileContent);
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      throw new Error(`Failed to parse YAML configuration: ${message}`);
    }

    // Apply environment variable overrides
    const rawConfig = this.applyEnvOverrides(isRecord(parsed) ? parsed : {});

    // Validate with Zod schema
    const result = HostConfigSchema.safeParse(rawConfig);

    if (!result.success) {
      const errors = result.error.errors
        .map((e) => `  - ${e.path.join('.')}: ${e.message}`)
        .join('\n');
      throw new Error(`Configuration validation failed:\n${errors}`);
    }

    logger.info('Configuration loaded and validated successfully');
    this.logConfigSummary(result.data);

    return result.data;
  }

  /**
   * Turn the plugin section into the entries handed to the config hook
   */
  static toConfigEntries(section: PluginSection): ConfigEntry[] {
    return Object.entries(section).map(([key, value]) => ({ key, values: [value] }));
  }

  /**
   * Write a template for the missing configuration file and exit
   */
  private handleMissingConfig(yamlPath: string): never {
    this.createFromTemplate(yamlPath);
    logger.info('');
    logger.info('='.repeat(60));
    logger.info('CONFIGURATION REQUIRED');
    logger.info('='.repeat(60));
    logger.info(`A template configuration has been created at: ${yamlPath}`);
    logger.info('Please edit this file to configure the router connection and outputs.');
    logger.info('='.repeat(60));
    process.exit(0);
  }

  /**
   * Create configuration file from template
   */
  private createFromTemplate(yamlPath: string): void {
    const templatePath = path.join(__dirname, '../../config/fritzbox.example.yaml');
    const fallbackTemplatePath = path.join(this.configFolder, 'fritzbox.example.yaml');

    let templateContent: string;

    if (fs.existsSync(templatePath)) {
      templateContent = fs.readFileSync(templatePath, 'utf-8');
    } else if (fs.existsSync(fallbackTemplatePath)) {
      templateContent = fs.readFileSync(fallbackTemplatePath, 'utf-8');
    } else {
      // Generate minimal template
      templateContent = this.generateMinimalTemplate();
    }

    if (!fs.existsSync(this.configFolder)) {
      fs.mkdirSync(this.configFolder, { recursive: true });
    }

    fs.writeFileSync(yamlPath, templateContent, 'utf-8');
  }

  /**
   * Generate minimal configuration template
   */
  private generateMinimalTemplate(): string {
    return `# FRITZ!Box collector configuration

# Seconds between two polls
interval: 60

# Router connection (TR-064). Keys are case-sensitive.
plugin:
  Address: "169.254.1.1"
  Port: 49000
  # User: "monitor"
  # Password: "change-me"
  # Hostname: "fritzbox"
  # Instance: ""

# At least one output must be configured
outputs:
  # collectd exec plugin protocol (PUTVAL lines on stdout)
  exec:
    useServerTime: false
`;
  }

  // Mapping of lowercase env var keys to config keys
  private static readonly KEY_MAPPINGS: Record<string, string> = {
    verifyssl: 'verifySsl',
    useservertime: 'useServerTime',
  };

  // Keys of the plugin section, which the plugin matches case-sensitively
  private static readonly PLUGIN_KEY_MAPPINGS: Record<string, string> = {
    address: 'Address',
    port: 'Port',
    user: 'User',
    password: 'Password',
    hostname: 'Hostname',
    instance: 'Instance',
  };

  /**
   * Apply FRITZBOX_* environment variable overrides to configuration
   * Format: FRITZBOX_SECTION_SUBSECTION_KEY (e.g., FRITZBOX_OUTPUTS_INFLUXDB2_TOKEN)
   */
  private applyEnvOverrides(config: Record<string, unknown>): Record<string, unknown> {
    const envVars = Object.entries(process.env).filter(([key]) => key.startsWith(ENV_PREFIX));

    for (const [key, value] of envVars) {
      if (!value) continue;

      const parts = key.substring(ENV_PREFIX.length).toLowerCase().split('_');

      if (parts[0] === 'plugin' && parts.length === 2) {
        // Plugin values stay strings; the plugin coerces them itself
        const pluginKey = ConfigLoader.PLUGIN_KEY_MAPPINGS[parts[1]] || parts[1];
        this.setNestedValue(config, ['plugin', pluginKey], value);
      } else {
        const pathParts = parts.map((part) => ConfigLoader.KEY_MAPPINGS[part] || part);
        this.setNestedValue(config, pathParts, this.parseEnvValue(value));
      }
      logger.debug(`Applied env override: ${key}`);
    }

    return config;
  }

  /**
   * Set a nested value in an object using path parts
   */
  private setNestedValue(obj: Record<string, unknown>, pathParts: string[], value: unknown): void {
    let current = obj;

    for (const part of pathParts.slice(0, -1)) {
      const next = current[part];
      if (isRecord(next)) {
        current = next;
      } else {
        const created: Record<string, unknown> = {};
        current[part] = created;
        current = created;
      }
    }

    current[pathParts[pathParts.length - 1]] = value;
  }

  /**
   * Parse environment variable value to appropriate type
   */
  private parseEnvValue(value: string): unknown {
    // Boolean
    if (value.toLowerCase() === 'true') return true;
    if (value.toLowerCase() === 'false') return false;

    // Number
    const num = Number(value);
    if (!isNaN(num) && value.trim() !== '') return num;

    // String (default)
    return value;
  }

  /**
   * Log configuration summary (without sensitive data)
   */
  private logConfigSummary(config: HostConfig): void {
    logger.info('Configuration summary:');
    logger.info(`  Interval: ${config.interval}s`);

    const outputs = Object.entries(config.outputs)
      .filter(([, value]) => value !== undefined)
      .map(([key]) => key);
    logger.info(`  Outputs: ${outputs.join(', ') || 'none'}`);
    logger.info(`  Plugin keys: ${Object.keys(config.plugin).join(', ') || 'none'}`);
  }
}
