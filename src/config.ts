import type { EngineConfig } from './engine.js';

/**
 * Engine config from environment variables:
 * - DATABASE_URL (required)
 * - DATABASE_POOL_MAX (optional positive integer)
 */
export function engineConfigFromEnv(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const connectionString = env['DATABASE_URL'];
  if (!connectionString) {
    throw new Error('DATABASE_URL is not set');
  }

  const rawMax = env['DATABASE_POOL_MAX'];
  if (rawMax === undefined || rawMax === '') {
    return { connectionString };
  }

  const max = Number(rawMax);
  if (!Number.isInteger(max) || max <= 0) {
    throw new Error(`DATABASE_POOL_MAX must be a positive integer, got "${rawMax}"`);
  }
  return { connectionString, max };
}
