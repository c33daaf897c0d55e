import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { PluginHost } from '../../src/core/PluginHost';
import { BaseOutputPlugin } from '../../src/plugins/outputs/BaseOutputPlugin';
import type { MeasurementRecord, PluginMetadata, ValueList } from '../../src/types/plugin.types';
import type { OutputsConfig } from '../../src/config/schemas/config.schema';

const { mockLogger } = vi.hoisted(() => ({
  mockLogger: {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

// Mock the logger
vi.mock('../../src/core/Logger', () => ({
  createLogger: () => mockLogger,
}));

// Test output plugin implementation
class MockOutputPlugin extends BaseOutputPlugin {
  static instances: MockOutputPlugin[] = [];

  readonly metadata: PluginMetadata = {
    name: 'MockOutput',
    version: '1.0.0',
    description: 'Mock output for testing',
  };

  public written: ValueList[][] = [];
  public writeError: Error | null = null;
  public healthy = true;
  public shutdownCalled = false;

  constructor() {
    super();
    MockOutputPlugin.instances.push(this);
  }

  async write(values: ValueList[]): Promise<void> {
    if (this.writeError) {
      throw this.writeError;
    }
    this.written.push(values);
  }

  async healthCheck(): Promise<boolean> {
    return this.healthy;
  }

  async shutdown(): Promise<void> {
    this.shutdownCalled = true;
  }
}

class FailingOutputPlugin extends MockOutputPlugin {
  async initialize(): Promise<void> {
    throw new Error('Connection refused');
  }
}

const OUTPUTS: OutputsConfig = {
  exec: { useServerTime: false },
};

const TWO_OUTPUTS: OutputsConfig = {
  exec: { useServerTime: false },
  influxdb2: {
    url: 'localhost',
    port: 8086,
    token: 'test-token',
    org: 'home',
    bucket: 'fritzbox',
    ssl: false,
    verifySsl: false,
  },
};

function record(typeInstance: string, value: number): MeasurementRecord {
  return {
    host: 'FRITZ!Box 7490',
    plugin: 'fritzbox',
    pluginInstance: '',
    type: 'bytes',
    typeInstance,
    values: [value],
  };
}

describe('PluginHost', () => {
  let host: PluginHost;

  beforeEach(() => {
    vi.clearAllMocks();
    vi.useFakeTimers();
    MockOutputPlugin.instances = [];
    host = new PluginHost(30);
    host.registerOutputPlugin('exec', MockOutputPlugin);
    host.registerOutputPlugin('influxdb2', MockOutputPlugin);
  });

  afterEach(async () => {
    vi.useRealTimers();
    await host.shutdown();
  });

  describe('hook registration', () => {
    it('should count registered hooks', () => {
      host.registerConfig(() => undefined);
      host.registerInit(async () => undefined);
      host.registerRead(async () => undefined);

      expect(host.getStats().registeredHooks).toBe(3);
    });

    it('should replace a hook registered twice', async () => {
      const first = vi.fn(async () => undefined);
      const second = vi.fn(async () => undefined);

      host.registerInit(first);
      host.registerInit(second);
      await host.initialize();

      expect(first).not.toHaveBeenCalled();
      expect(second).toHaveBeenCalledTimes(1);
      expect(mockLogger.warn).toHaveBeenCalledWith('Replacing registered init callback');
    });

    it('should log plugin warnings', () => {
      host.warning('Unknown config key: Verbose');
      expect(mockLogger.warn).toHaveBeenCalledWith('Unknown config key: Verbose');
    });
  });

  describe('configure / initialize', () => {
    it('should hand entries to the config hook', () => {
      const config = vi.fn();
      host.registerConfig(config);

      host.configure([{ key: 'Address', values: ['localhost'] }]);

      expect(config).toHaveBeenCalledWith([{ key: 'Address', values: ['localhost'] }]);
    });

    it('should do nothing without hooks', async () => {
      expect(() => host.configure([])).not.toThrow();
      await expect(host.initialize()).resolves.toBeUndefined();
    });

    it('should propagate init failures', async () => {
      host.registerInit(async () => {
        throw new Error('Could not connect');
      });

      await expect(host.initialize()).rejects.toThrow('Could not connect');
    });
  });

  describe('initializeOutputs', () => {
    it('should initialize configured outputs', async () => {
      await host.initializeOutputs(TWO_OUTPUTS);

      expect(host.getStats().activeOutputPlugins).toBe(2);
    });

    it('should skip outputs without a factory', async () => {
      const bare = new PluginHost(30);
      bare.registerOutputPlugin('exec', MockOutputPlugin);

      await bare.initializeOutputs(TWO_OUTPUTS);

      expect(bare.getStats().activeOutputPlugins).toBe(1);
      expect(mockLogger.warn).toHaveBeenCalledWith('No registered factory for output type: influxdb2');
      await bare.shutdown();
    });

    it('should throw when no output was initialized', async () => {
      const bare = new PluginHost(30);

      await expect(bare.initializeOutputs(OUTPUTS)).rejects.toThrow('No output plugins were initialized');
    });

    it('should rethrow output initialization errors', async () => {
      host.registerOutputPlugin('exec', FailingOutputPlugin);

      await expect(host.initializeOutputs(OUTPUTS)).rejects.toThrow('Connection refused');
    });
  });

  describe('read', () => {
    beforeEach(async () => {
      await host.initializeOutputs(OUTPUTS);
    });

    it('should return nothing without a read hook', async () => {
      await expect(host.read()).resolves.toEqual([]);
    });

    it('should stamp dispatched records and write them', async () => {
      vi.setSystemTime(new Date('2024-05-01T12:00:00Z'));
      host.registerRead(async () => {
        host.dispatch(record('lan_tx', 23004321));
        host.dispatch(record('lan_rx', 12045));
      });

      const values = await host.read();

      expect(values).toEqual([
        { ...record('lan_tx', 23004321), time: new Date('2024-05-01T12:00:00Z'), interval: 30 },
        { ...record('lan_rx', 12045), time: new Date('2024-05-01T12:00:00Z'), interval: 30 },
      ]);
      expect(MockOutputPlugin.instances[0].written).toEqual([values]);
    });

    it('should copy dispatched records', async () => {
      const dispatched = record('lan_tx', 1);
      host.registerRead(async () => {
        host.dispatch(dispatched);
        dispatched.values.push(2);
      });

      const values = await host.read();

      expect(values[0].values).toEqual([1]);
    });

    it('should start each cycle empty', async () => {
      let cycle = 0;
      host.registerRead(async () => {
        cycle++;
        host.dispatch(record('lan_tx', cycle));
      });

      await host.read();
      const second = await host.read();

      expect(second.map((v) => v.values[0])).toEqual([2]);
      expect(host.getStats().reads).toBe(2);
    });

    it('should keep records dispatched before a read hook error', async () => {
      host.registerRead(async () => {
        host.dispatch(record('lan_tx', 1));
        throw new Error('boom');
      });

      const values = await host.read();

      expect(values).toHaveLength(1);
      expect(mockLogger.error).toHaveBeenCalledWith('Read callback failed: boom');
    });

    it('should not write empty cycles', async () => {
      host.registerRead(async () => undefined);

      await host.read();

      expect(MockOutputPlugin.instances[0].written).toEqual([]);
    });
  });

  describe('output failures', () => {
    it('should keep writing to other outputs when one fails', async () => {
      await host.initializeOutputs(TWO_OUTPUTS);
      const [failing, working] = MockOutputPlugin.instances;
      failing.writeError = new Error('disk full');
      host.registerRead(async () => {
        host.dispatch(record('lan_tx', 1));
      });

      await expect(host.read()).resolves.toHaveLength(1);

      expect(working.written).toHaveLength(1);
      expect(mockLogger.error).toHaveBeenCalledWith('Failed to write to output exec: disk full');
    });
  });

  describe('scheduler', () => {
    beforeEach(async () => {
      await host.initializeOutputs(OUTPUTS);
    });

    it('should read immediately and then every interval', async () => {
      const read = vi.fn(async () => undefined);
      host.registerRead(read);

      host.startScheduler();
      expect(read).toHaveBeenCalledTimes(1);

      await vi.advanceTimersByTimeAsync(30000);
      expect(read).toHaveBeenCalledTimes(2);

      await vi.advanceTimersByTimeAsync(60000);
      expect(read).toHaveBeenCalledTimes(4);
      expect(host.getStats().schedulerRunning).toBe(true);
    });

    it('should skip a tick while the previous read is running', async () => {
      let release: () => void = () => undefined;
      const read = vi.fn(
        () =>
          new Promise<void>((resolve) => {
            release = resolve;
          })
      );
      host.registerRead(read);

      host.startScheduler();
      await vi.advanceTimersByTimeAsync(30000);
      expect(read).toHaveBeenCalledTimes(1);

      release();
      await vi.advanceTimersByTimeAsync(30000);
      expect(read).toHaveBeenCalledTimes(2);
      release();
    });

    it('should wait for the running read when stopped', async () => {
      let release: () => void = () => undefined;
      let finished = false;
      host.registerRead(async () => {
        await new Promise<void>((resolve) => {
          release = resolve;
        });
        finished = true;
      });

      host.startScheduler();
      const stopped = host.stopScheduler();
      release();
      await vi.advanceTimersByTimeAsync(500);
      await stopped;

      expect(finished).toBe(true);
      expect(host.getStats().schedulerRunning).toBe(false);
    });

    it('should not start twice', () => {
      host.startScheduler();
      host.startScheduler();

      expect(mockLogger.warn).toHaveBeenCalledWith('Scheduler is already running');
    });
  });

  describe('healthCheck', () => {
    it('should report each output', async () => {
      await host.initializeOutputs(TWO_OUTPUTS);
      MockOutputPlugin.instances[1].healthy = false;

      const results = await host.healthCheck();

      expect(results.get('exec')).toBe(true);
      expect(results.get('influxdb2')).toBe(false);
    });

    it('should report a throwing health check as unhealthy', async () => {
      await host.initializeOutputs(OUTPUTS);
      vi.spyOn(MockOutputPlugin.instances[0], 'healthCheck').mockRejectedValue(new Error('timeout'));

      const results = await host.healthCheck();

      expect(results.get('exec')).toBe(false);
    });
  });

  describe('shutdown', () => {
    it('should run the shutdown hook and shut down outputs', async () => {
      await host.initializeOutputs(OUTPUTS);
      const shutdownHook = vi.fn(async () => undefined);
      host.registerShutdown(shutdownHook);

      await host.shutdown();

      expect(shutdownHook).toHaveBeenCalledTimes(1);
      expect(MockOutputPlugin.instances[0].shutdownCalled).toBe(true);
      expect(host.getStats().activeOutputPlugins).toBe(0);
    });

    it('should shut down outputs when the shutdown hook fails', async () => {
      await host.initializeOutputs(OUTPUTS);
      host.registerShutdown(async () => {
        throw new Error('already closed');
      });

      await expect(host.shutdown()).resolves.toBeUndefined();
      expect(MockOutputPlugin.instances[0].shutdownCalled).toBe(true);
      expect(mockLogger.error).toHaveBeenCalledWith('Plugin shutdown failed: already closed');
    });
  });
});
