import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '../../errors';
import { mergeResources, parseResourceLabels, resourceFromEnv } from '../index';

describe('parseResourceLabels', () => {
  it('should parse comma separated pairs', () => {
    expect(parseResourceLabels('host=node-1,zone=a')).toEqual({ host: 'node-1', zone: 'a' });
  });

  it('should trim whitespace around keys and values', () => {
    expect(parseResourceLabels(' host = node-1 , zone=a ')).toEqual({ host: 'node-1', zone: 'a' });
  });

  it('should keep commas inside quoted values', () => {
    expect(parseResourceLabels('owners="alice, bob",tier=gold')).toEqual({ owners: 'alice, bob', tier: 'gold' });
  });

  it('should accept empty input', () => {
    expect(parseResourceLabels('')).toEqual({});
  });

  it('should reject entries without a key', () => {
    expect(() => parseResourceLabels('=value')).toThrow(ConfigurationError);
  });

  it('should reject entries without "="', () => {
    expect(() => parseResourceLabels('novalue')).toThrow(ConfigurationError);
  });
});

describe('resourceFromEnv', () => {
  it('should return undefined when nothing is set', () => {
    expect(resourceFromEnv({})).toBeUndefined();
  });

  it('should read type and labels', () => {
    expect(resourceFromEnv({ RESOURCE_TYPE: ' k8s.pod ', RESOURCE_LABELS: 'pod=web-0' })).toEqual({
      type: 'k8s.pod',
      labels: { pod: 'web-0' },
    });
  });

  it('should read labels without a type', () => {
    expect(resourceFromEnv({ RESOURCE_LABELS: 'pod=web-0' })).toEqual({ labels: { pod: 'web-0' } });
  });
});

describe('mergeResources', () => {
  it('should let earlier resources win', () => {
    const merged = mergeResources(
      { type: 'container', labels: { zone: 'a' } },
      { type: 'host', labels: { zone: 'b', host: 'node-1' } }
    );

    expect(merged).toEqual({ type: 'container', labels: { zone: 'a', host: 'node-1' } });
  });

  it('should take the type from a later resource when missing', () => {
    expect(mergeResources(undefined, { labels: { a: '1' } }, { type: 'host', labels: {} })).toEqual({
      type: 'host',
      labels: { a: '1' },
    });
  });

  it('should return undefined for no resources', () => {
    expect(mergeResources(undefined)).toBeUndefined();
  });
});
