import { describe, it, expect, vi, beforeEach } from 'vitest';
import { InfluxDB, HttpError } from '@influxdata/influxdb-client';
import { InfluxDB2Plugin } from '../../../src/plugins/outputs/InfluxDB2Plugin';
import { CYCLE_TIME, valueList } from '../../fixtures/values';

// Mock the logger
vi.mock('../../../src/core/Logger', () => ({
  createLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }),
}));

const { mockWriteApi, mockGetWriteApi, mockGetHealth } = vi.hoisted(() => {
  const writeApi = {
    writePoint: vi.fn(),
    flush: vi.fn(),
    close: vi.fn(),
  };
  return {
    mockWriteApi: writeApi,
    mockGetWriteApi: vi.fn(() => writeApi),
    mockGetHealth: vi.fn(),
  };
});

// Mock InfluxDB client; points record what they were given
vi.mock('@influxdata/influxdb-client', () => {
  class Point {
    tags: Record<string, string> = {};
    intFields: Record<string, number> = {};
    floatFields: Record<string, number> = {};
    time: Date | undefined;

    constructor(public measurement: string) {}

    tag(key: string, value: string): this {
      this.tags[key] = value;
      return this;
    }

    intField(key: string, value: number): this {
      this.intFields[key] = value;
      return this;
    }

    floatField(key: string, value: number): this {
      this.floatFields[key] = value;
      return this;
    }

    timestamp(value: Date): this {
      this.time = value;
      return this;
    }
  }

  class HttpError extends Error {
    constructor(
      public statusCode: number,
      message: string
    ) {
      super(message);
    }
  }

  return {
    InfluxDB: vi.fn().mockImplementation(() => ({ getWriteApi: mockGetWriteApi })),
    Point,
    HttpError,
  };
});

// Mock Health API
vi.mock('@influxdata/influxdb-client-apis', () => ({
  HealthAPI: vi.fn().mockImplementation(() => ({ getHealth: mockGetHealth })),
}));

describe('InfluxDB2Plugin', () => {
  let plugin: InfluxDB2Plugin;
  const testConfig = {
    url: 'localhost',
    port: 8086,
    token: 'test-token',
    org: 'home',
    bucket: 'fritzbox',
    ssl: false,
    verifySsl: false,
  };

  beforeEach(() => {
    vi.clearAllMocks();
    mockWriteApi.flush.mockResolvedValue(undefined);
    mockWriteApi.close.mockResolvedValue(undefined);
    mockGetHealth.mockResolvedValue({ status: 'pass' });
    plugin = new InfluxDB2Plugin();
  });

  describe('metadata', () => {
    it('should have correct metadata', () => {
      expect(plugin.metadata.name).toBe('InfluxDB2');
      expect(plugin.metadata.version).toBe('1.0.0');
    });
  });

  describe('initialize', () => {
    it('should build the URL from host and port', async () => {
      await plugin.initialize(testConfig);

      expect(InfluxDB).toHaveBeenCalledWith({
        url: 'http://localhost:8086',
        token: 'test-token',
        transportOptions: { rejectUnauthorized: false },
      });
      expect(mockGetWriteApi).toHaveBeenCalledWith('home', 'fritzbox', 's');
    });

    it('should use https when SSL is enabled', async () => {
      await plugin.initialize({ ...testConfig, ssl: true, verifySsl: true });

      expect(InfluxDB).toHaveBeenCalledWith({
        url: 'https://localhost:8086',
        token: 'test-token',
        transportOptions: { rejectUnauthorized: true },
      });
    });

    it('should keep a full URL as given', async () => {
      await plugin.initialize({ ...testConfig, url: 'http://influx.local:9999' });

      expect(InfluxDB).toHaveBeenCalledWith(expect.objectContaining({ url: 'http://influx.local:9999' }));
    });
  });

  describe('write', () => {
    beforeEach(async () => {
      await plugin.initialize(testConfig);
    });

    it('should write one point per value list and flush once', async () => {
      await plugin.write([valueList(), valueList({ typeInstance: 'rx', values: [67435] })]);

      expect(mockWriteApi.writePoint).toHaveBeenCalledTimes(2);
      expect(mockWriteApi.flush).toHaveBeenCalledTimes(1);
    });

    it('should convert tags, integer fields and the cycle time', async () => {
      await plugin.write([valueList({ pluginInstance: 'home' })]);

      const point = mockWriteApi.writePoint.mock.calls[0][0];
      expect(point).toHaveProperty('measurement', 'fritzbox_value');
      expect(point).toHaveProperty('tags', {
        host: 'fritz.box',
        type: 'if_octets',
        instance: 'home',
        type_instance: 'tx',
      });
      expect(point).toHaveProperty('intFields', { value: 3438 });
      expect(point).toHaveProperty('floatFields', {});
      expect(point).toHaveProperty('time', CYCLE_TIME);
    });

    it('should write fractional values as float fields', async () => {
      await plugin.write([valueList({ values: [12.5, 3] })]);

      const point = mockWriteApi.writePoint.mock.calls[0][0];
      expect(point).toHaveProperty('floatFields', { value: 12.5 });
      expect(point).toHaveProperty('intFields', { value_1: 3 });
    });

    it('should skip an empty batch', async () => {
      await plugin.write([]);

      expect(mockWriteApi.writePoint).not.toHaveBeenCalled();
      expect(mockWriteApi.flush).not.toHaveBeenCalled();
    });

    it('should rethrow HTTP errors from the flush', async () => {
      mockWriteApi.flush.mockRejectedValueOnce(new HttpError(401, 'unauthorized access'));

      await expect(plugin.write([valueList()])).rejects.toThrow('unauthorized access');
    });
  });

  describe('healthCheck', () => {
    beforeEach(async () => {
      await plugin.initialize(testConfig);
    });

    it('should return true when the server passes', async () => {
      await expect(plugin.healthCheck()).resolves.toBe(true);
    });

    it('should return false when the server fails', async () => {
      mockGetHealth.mockResolvedValueOnce({ status: 'fail' });

      await expect(plugin.healthCheck()).resolves.toBe(false);
    });

    it('should return false when the health request throws', async () => {
      mockGetHealth.mockRejectedValueOnce(new Error('Connection refused'));

      await expect(plugin.healthCheck()).resolves.toBe(false);
    });
  });

  describe('shutdown', () => {
    beforeEach(async () => {
      await plugin.initialize(testConfig);
    });

    it('should close write API on shutdown', async () => {
      await plugin.shutdown();
      expect(mockWriteApi.close).toHaveBeenCalledTimes(1);
    });

    it('should not throw when closing fails', async () => {
      mockWriteApi.close.mockRejectedValueOnce(new Error('flush failed'));

      await expect(plugin.shutdown()).resolves.toBeUndefined();
    });
  });
});
