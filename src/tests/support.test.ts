import { describe, test, expect, afterEach, jest } from '@jest/globals';
import { DEFAULT_CONFIG, loadConfig } from '../config.js';
import { getLogLevel, Logger } from '../logger.js';
import { createMetrics, percentile, recordOperation, recordRequestDuration, renderMetrics } from '../metrics.js';
import { coerceNumericString } from '../types.js';

describe('loadConfig', () => {
  test('returns the defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual(DEFAULT_CONFIG);
  });

  test('reads every variable', () => {
    expect(
      loadConfig({
        PORT: '9090',
        CORS_ORIGIN: 'http://example.test',
        ENABLE_METRICS: 'false',
        LOG_LEVEL: 'debug',
        RATE_LIMIT_MAX: '5',
        RATE_LIMIT_WINDOW: '60000',
      }),
    ).toEqual({
      port: 9090,
      corsOrigin: 'http://example.test',
      enableMetrics: false,
      logLevel: 'debug',
      rateLimitMax: 5,
      rateLimitWindow: 60000,
    });
  });

  test('falls back to defaults for unparseable numbers', () => {
    const config = loadConfig({ PORT: 'eighty', RATE_LIMIT_MAX: '' });

    expect(config.port).toBe(8000);
    expect(config.rateLimitMax).toBe(1000);
  });
});

describe('getLogLevel', () => {
  test('accepts known levels in any case', () => {
    expect(getLogLevel('WARN')).toBe('warn');
    expect(getLogLevel(' error ')).toBe('error');
  });

  test('defaults to info', () => {
    expect(getLogLevel(undefined)).toBe('info');
    expect(getLogLevel('verbose')).toBe('info');
  });
});

describe('Logger', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  test('writes one JSON line with context and data', () => {
    const spy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    const logger = new Logger('info').withContext({ requestId: 'req-1' });

    logger.info('Calculation completed', { result: 5 });

    expect(spy).toHaveBeenCalledTimes(1);
    const entry: unknown = JSON.parse(String(spy.mock.calls[0]?.[0]));
    expect(entry).toMatchObject({
      level: 'info',
      message: 'Calculation completed',
      context: { requestId: 'req-1' },
      result: 5,
    });
  });

  test('drops entries below the configured level', () => {
    const spy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    const logger = new Logger('warn');

    logger.debug('ignored');
    logger.info('ignored');
    logger.warn('kept');
    logger.error('kept');

    expect(spy).toHaveBeenCalledTimes(2);
  });

  test('withContext leaves the parent logger untouched', () => {
    const parent = new Logger('info', { service: 'calc' });
    const child = parent.withContext({ requestId: 'req-2' });

    expect(parent.context).toEqual({ service: 'calc' });
    expect(child.context).toEqual({ service: 'calc', requestId: 'req-2' });
    expect(child.level).toBe('info');
  });
});

describe('metrics', () => {
  test('percentile uses the nearest rank', () => {
    expect(percentile([], 0.5)).toBe(0);
    expect(percentile([5, 1, 3], 0.5)).toBe(3);
    expect(percentile([5, 1, 3], 0.95)).toBe(5);
  });

  test('keeps only the most recent 1000 durations', () => {
    const metrics = createMetrics();
    for (let i = 0; i <= 1000; i++) recordRequestDuration(metrics, i);

    expect(metrics.requestDuration).toHaveLength(1000);
    expect(metrics.requestDuration[0]).toBe(1);
  });

  test('renders counters for every operation', () => {
    const metrics = createMetrics();
    recordOperation(metrics, 'multiply');
    recordOperation(metrics, 'multiply');
    recordRequestDuration(metrics, 4);

    const text = renderMetrics(metrics);

    expect(text.split('\n')).toEqual([
      '# HELP calculator_request_duration_milliseconds HTTP request duration summary',
      '# TYPE calculator_request_duration_milliseconds summary',
      'calculator_request_duration_milliseconds{quantile="0.5"} 4',
      'calculator_request_duration_milliseconds{quantile="0.95"} 4',
      'calculator_request_duration_milliseconds{quantile="0.99"} 4',
      'calculator_request_duration_milliseconds_count 1',
      '',
      '# HELP calculator_operations_total Successful calculations by operation',
      '# TYPE calculator_operations_total counter',
      'calculator_operations_total{operation="add"} 0',
      'calculator_operations_total{operation="subtract"} 0',
      'calculator_operations_total{operation="multiply"} 2',
      'calculator_operations_total{operation="divide"} 0',
      '',
    ]);
  });
});

describe('coerceNumericString', () => {
  test('turns decimal float strings into numbers', () => {
    expect(coerceNumericString('2')).toBe(2);
    expect(coerceNumericString(' .5 ')).toBe(0.5);
    expect(coerceNumericString('-1.5e3')).toBe(-1500);
    expect(coerceNumericString('+3.')).toBe(3);
  });

  test('leaves strings that do not spell a finite float alone', () => {
    expect(coerceNumericString('')).toBe('');
    expect(coerceNumericString('two')).toBe('two');
    expect(coerceNumericString('0x10')).toBe('0x10');
    expect(coerceNumericString('Infinity')).toBe('Infinity');
    expect(coerceNumericString('1e400')).toBe('1e400');
  });

  test('passes non-strings through', () => {
    expect(coerceNumericString(4)).toBe(4);
    expect(coerceNumericString(null)).toBeNull();
    expect(coerceNumericString(undefined)).toBeUndefined();
    expect(coerceNumericString(true)).toBe(true);
  });
});
