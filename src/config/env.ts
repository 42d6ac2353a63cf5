import dotenv from 'dotenv';
import { fileURLToPath } from 'url';
import { dirname, resolve } from 'path';
import { ConfigurationError } from '../types/errors.types.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Load .env from project root
dotenv.config({ path: resolve(__dirname, '../../.env') });

export interface AppConfig {
  host: string;
  port: number;
  nodeEnv: string;
  logLevel: string;
  ghostBaseUrl: string;
  ghostAdminApiKey: string;
  shutdownTimeoutMs: number;
}

type Env = Record<string, string | undefined>;

function intFromEnv(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (!raw) {
    return fallback;
  }

  const parsed = parseInt(raw, 10);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new ConfigurationError(`${name} must be a positive integer (got "${raw}")`);
  }
  return parsed;
}

/**
 * Builds the immutable application config from environment variables.
 * Called once at startup; the result is passed to whatever needs it.
 */
export function loadConfig(env: Env = process.env): Readonly<AppConfig> {
  const baseUrl = (env.GHOST_BASE_URL || '').trim().replace(/\/+$/, '');
  if (!baseUrl) {
    throw new ConfigurationError('GHOST_BASE_URL is required');
  }

  try {
    new URL(baseUrl);
  } catch {
    throw new ConfigurationError(`GHOST_BASE_URL is not a valid URL: ${baseUrl}`);
  }

  const nodeEnv = env.NODE_ENV || 'development';

  return Object.freeze({
    host: env.HOST || '0.0.0.0',
    port: intFromEnv(env, 'PORT', 8053),
    nodeEnv,
    logLevel: env.LOG_LEVEL || (nodeEnv === 'production' ? 'info' : 'debug'),
    ghostBaseUrl: baseUrl,
    ghostAdminApiKey: (env.GHOST_ADMIN_API_KEY || '').trim(),
    shutdownTimeoutMs: intFromEnv(env, 'SHUTDOWN_TIMEOUT_MS', 10000),
  });
}
