/**
 * Server configuration read once from the environment
 */

function optional(key: string, fallback: string): string {
  return process.env[key] ?? fallback;
}

function positiveNumber(key: string, fallback: number): number {
  const parsed = Number(optional(key, String(fallback)));
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new Error(`Environment variable ${key} must be a positive number`);
  }
  return parsed;
}

export interface ServerConfig {
  port: number;
  nodeEnv: string;
  bodyLimit: string;
  maxGridPixels: number;
  corsOrigins: string[] | '*';
}

export function loadConfig(): ServerConfig {
  const origins = optional('CORS_ORIGINS', '*');

  return {
    port: positiveNumber('PORT', 8080),
    nodeEnv: optional('NODE_ENV', 'development'),
    bodyLimit: optional('BODY_LIMIT', '10mb'),
    maxGridPixels: positiveNumber('MAX_GRID_PIXELS', 4_000_000),
    corsOrigins: origins === '*' ? '*' : origins.split(',').map(origin => origin.trim()),
  };
}

export const config = loadConfig();
