import { describe, it, expect } from 'vitest';
import {
  CollectionError,
  ConfigurationError,
  formatError,
  GatherError,
  getErrorCategory,
  isMetricsError,
  isRetryableError,
  MetricsError,
  NegativeBucketBoundsError,
  RegistrationError,
  ValidationError,
  ViewNotFoundError,
} from '../index';

describe('error types', () => {
  it('should carry category, name and status', () => {
    const error = new ValidationError('bad key', { field: 'key' });

    expect(error).toBeInstanceOf(MetricsError);
    expect(error.name).toBe('ValidationError');
    expect(error.category).toBe('validation');
    expect(error.statusCode).toBe(400);
    expect(error.field).toBe('key');
  });

  it('should keep the cause', () => {
    const cause = new Error('root');
    const error = new ConfigurationError('wrapped', { cause });

    expect(error.cause).toBe(cause);
  });

  it('should describe negative bounds', () => {
    const error = new NegativeBucketBoundsError([-1, 2]);

    expect(error.message).toBe('negative bucket bounds not supported: [-1, 2]');
    expect(error.bounds).toEqual([-1, 2]);
  });

  it('should name the missing view', () => {
    const error = new ViewNotFoundError('latency');

    expect(error.viewName).toBe('latency');
    expect(error.statusCode).toBe(404);
  });

  it('should list every gathered error', () => {
    const error = new GatherError([new Error('one'), new Error('two')], ['family']);

    expect(error.message).toBe('2 error(s) occurred:\n* one\n* two');
    expect(error.families).toEqual(['family']);
  });
});

describe('error helpers', () => {
  it('should classify errors', () => {
    expect(isMetricsError(new RegistrationError('taken'))).toBe(true);
    expect(isMetricsError(new Error('plain'))).toBe(false);
    expect(getErrorCategory(new RegistrationError('taken'))).toBe('registration');
    expect(getErrorCategory('text')).toBeUndefined();
  });

  it('should report retryability', () => {
    expect(isRetryableError(new CollectionError('failed'))).toBe(true);
    expect(isRetryableError(new ConfigurationError('bad'))).toBe(false);
    expect(isRetryableError(new Error('plain'))).toBe(false);
  });

  it('should format errors for logs', () => {
    expect(formatError(new CollectionError('failed', { metricName: 'm' }))).toBe(
      '[COLLECTION] CollectionError : failed (HTTP 500)'
    );
    expect(formatError(new RegistrationError('taken'))).toBe('[REGISTRATION] RegistrationError : taken');
    expect(formatError(new TypeError('oops'))).toBe('TypeError: oops');
    expect(formatError(42)).toBe('42');
  });
});
