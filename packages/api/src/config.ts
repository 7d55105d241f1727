// API configuration — environment variables, read once at startup.

export interface ApiConfig {
  port: number;
  host: string;
  /** JSON allowlist for the provider registry (relative to cwd) */
  registryConfigPath: string;
  /** Requests per minute per IP */
  rateLimitMax: number;
  corsOrigins: Array<string | RegExp>;
}

export type Env = Record<string, string | undefined>;

const LOCALHOST = /^http:\/\/localhost(:\d+)?$/;

function positiveInt(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${name} must be a positive integer (got "${raw}")`);
  }
  return value;
}

export function loadApiConfig(env: Env = process.env): ApiConfig {
  const origins = (env['CORS_ORIGINS'] ?? '')
    .split(',')
    .map((o) => o.trim())
    .filter(Boolean);

  return {
    port: positiveInt(env, 'PORT', 3000),
    host: env['HOST'] || '0.0.0.0',
    registryConfigPath: env['PROVIDER_REGISTRY_CONFIG'] || 'config/provider-registry.json',
    rateLimitMax: positiveInt(env, 'RATE_LIMIT_MAX', 60),
    corsOrigins: [...origins, LOCALHOST],
  };
}
