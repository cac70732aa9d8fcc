import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '../../errors';
import {
  DEFAULT_COMPRESSION_THRESHOLD,
  DEFAULT_METRICS_PATH,
  DEFAULT_METRICS_PORT,
  ExporterConfig,
  ExporterConfigBuilder,
} from '../index';

describe('ExporterConfig', () => {
  describe('create', () => {
    it('should apply defaults', () => {
      const config = ExporterConfig.create();

      expect(config.namespace).toBe('');
      expect(config.constLabels).toEqual({});
      expect(config.resource).toBeUndefined();
      expect(config.errorHandling).toBe('http-error');
      expect(config.path).toBe(DEFAULT_METRICS_PATH);
      expect(config.port).toBe(DEFAULT_METRICS_PORT);
      expect(config.enableCompression).toBe(true);
      expect(config.compressionThreshold).toBe(DEFAULT_COMPRESSION_THRESHOLD);
    });

    it('should reject an invalid namespace', () => {
      expect(() => ExporterConfig.create({ namespace: '1app' })).toThrow(
        'Invalid exporter configuration: namespace: Namespace must match [a-zA-Z_:][a-zA-Z0-9_:]*'
      );
    });

    it('should reject a path without a leading slash', () => {
      expect(() => ExporterConfig.create({ path: 'metrics' })).toThrow(ConfigurationError);
    });

    it('should reject ports out of range', () => {
      expect(() => ExporterConfig.create({ port: -1 })).toThrow(ConfigurationError);
      expect(() => ExporterConfig.create({ port: 70000 })).toThrow(ConfigurationError);
      expect(ExporterConfig.create({ port: 0 }).port).toBe(0);
    });

    it('should copy constant labels', () => {
      const labels = { service: 'api' };
      const config = ExporterConfig.create({ constLabels: labels });
      labels.service = 'changed';

      expect(config.constLabels).toEqual({ service: 'api' });
    });
  });

  describe('fromEnv', () => {
    it('should read every variable', () => {
      const config = ExporterConfig.fromEnv({
        METRICS_NAMESPACE: 'shop',
        METRICS_CONST_LABELS: '{"team":"payments"}',
        METRICS_PATH: '/internal/metrics',
        METRICS_PORT: '9100',
        METRICS_ERROR_HANDLING: 'continue',
        METRICS_ENABLE_COMPRESSION: 'false',
        METRICS_COMPRESSION_THRESHOLD: '2048',
        RESOURCE_TYPE: 'container',
        RESOURCE_LABELS: 'pod=web-1,zone="a, b"',
      });

      expect(config.namespace).toBe('shop');
      expect(config.constLabels).toEqual({ team: 'payments' });
      expect(config.path).toBe('/internal/metrics');
      expect(config.port).toBe(9100);
      expect(config.errorHandling).toBe('continue');
      expect(config.enableCompression).toBe(false);
      expect(config.compressionThreshold).toBe(2048);
      expect(config.resource).toEqual({ type: 'container', labels: { pod: 'web-1', zone: 'a, b' } });
    });

    it('should fall back to defaults for an empty environment', () => {
      const config = ExporterConfig.fromEnv({});

      expect(config.port).toBe(9464);
      expect(config.resource).toBeUndefined();
    });

    it('should reject a non-integer port', () => {
      expect(() => ExporterConfig.fromEnv({ METRICS_PORT: 'abc' })).toThrow('METRICS_PORT must be a valid integer');
    });

    it('should reject malformed constant labels', () => {
      expect(() => ExporterConfig.fromEnv({ METRICS_CONST_LABELS: '{' })).toThrow(
        'METRICS_CONST_LABELS must be valid JSON'
      );
      expect(() => ExporterConfig.fromEnv({ METRICS_CONST_LABELS: '{"n":1}' })).toThrow(
        'METRICS_CONST_LABELS must be a JSON object of string values'
      );
    });

    it('should reject an unknown error handling mode', () => {
      expect(() => ExporterConfig.fromEnv({ METRICS_ERROR_HANDLING: 'ignore' })).toThrow(ConfigurationError);
    });
  });
});

describe('ExporterConfigBuilder', () => {
  it('should build a configuration', () => {
    const config = new ExporterConfigBuilder()
      .namespace('app')
      .addConstLabel('env', 'test')
      .addConstLabel('team', 'core')
      .resource({ type: 'host', labels: { host: 'node-1' } })
      .errorHandling('continue')
      .path('/m')
      .port(8080)
      .enableCompression(false)
      .compressionThreshold(0)
      .build();

    expect(config.namespace).toBe('app');
    expect(config.constLabels).toEqual({ env: 'test', team: 'core' });
    expect(config.resource).toEqual({ type: 'host', labels: { host: 'node-1' } });
    expect(config.errorHandling).toBe('continue');
    expect(config.path).toBe('/m');
    expect(config.port).toBe(8080);
    expect(config.enableCompression).toBe(false);
    expect(config.compressionThreshold).toBe(0);
  });

  it('should replace labels set earlier', () => {
    const config = new ExporterConfigBuilder().addConstLabel('a', '1').constLabels({ b: '2' }).build();

    expect(config.constLabels).toEqual({ b: '2' });
  });
});
