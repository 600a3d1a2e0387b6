import { getLogLevel } from './logger.js';
import type { ServerConfig } from './types.js';

export const DEFAULT_CONFIG: ServerConfig = {
  port: 8000,
  corsOrigin: '*',
  enableMetrics: true,
  logLevel: 'info',
  rateLimitMax: 1000,
  rateLimitWindow: 900000, // 15 minutes
};

function parseInteger(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = parseInt(raw, 10);
  return Number.isNaN(value) ? fallback : value;
}

/**
 * Builds the server configuration from environment variables. Missing or
 * unparseable values take their defaults.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  return {
    port: parseInteger(env['PORT'], DEFAULT_CONFIG.port),
    corsOrigin: env['CORS_ORIGIN'] || DEFAULT_CONFIG.corsOrigin,
    enableMetrics: env['ENABLE_METRICS'] !== 'false',
    logLevel: getLogLevel(env['LOG_LEVEL']),
    rateLimitMax: parseInteger(env['RATE_LIMIT_MAX'], DEFAULT_CONFIG.rateLimitMax),
    rateLimitWindow: parseInteger(env['RATE_LIMIT_WINDOW'], DEFAULT_CONFIG.rateLimitWindow),
  };
}
