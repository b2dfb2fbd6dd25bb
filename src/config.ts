import dotenv from 'dotenv';

export interface JwtConfig {
  key: string;
  issuer: string;
  audience: string;
}

export interface AppConfig {
  port: number;
  nodeEnv: string;
  databaseUrl: string;
  corsOrigin: string;
  jwt: JwtConfig;
  /** HTTP access logs through morgan */
  logRequests: boolean;
}

export class ConfigError extends Error {
  constructor(public readonly missing: string[]) {
    super(`Missing required configuration: ${missing.join(', ')}`);
    this.name = 'ConfigError';
  }
}

type Env = Record<string, string | undefined>;

const REQUIRED = ['JWT_KEY', 'JWT_ISSUER', 'JWT_AUDIENCE', 'DATABASE_URL'] as const;

type RequiredKey = (typeof REQUIRED)[number];

/**
 * Builds the immutable application configuration.
 *
 * Every missing required variable is reported at once; the caller is expected
 * to abort startup on a ConfigError.
 */
export function loadConfig(env: Env = process.env): Readonly<AppConfig> {
  const values: Partial<Record<RequiredKey, string>> = {};
  const missing: string[] = [];

  for (const name of REQUIRED) {
    const value = env[name]?.trim();
    if (!value) {
      missing.push(name);
    } else {
      values[name] = value;
    }
  }

  const { JWT_KEY, JWT_ISSUER, JWT_AUDIENCE, DATABASE_URL } = values;
  if (!JWT_KEY || !JWT_ISSUER || !JWT_AUDIENCE || !DATABASE_URL) {
    throw new ConfigError(missing);
  }

  const port = Number(env.PORT ?? 5000);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new Error(`PORT must be a valid port number, got "${env.PORT}"`);
  }

  const nodeEnv = env.NODE_ENV?.trim() || 'development';

  return Object.freeze({
    port,
    nodeEnv,
    databaseUrl: DATABASE_URL,
    corsOrigin: env.CORS_ORIGIN?.trim() || 'http://localhost:5039',
    jwt: Object.freeze({ key: JWT_KEY, issuer: JWT_ISSUER, audience: JWT_AUDIENCE }),
    logRequests: nodeEnv !== 'test',
  });
}

/** Reads `.env` into process.env before loading. */
export function loadConfigFromEnvironment(): Readonly<AppConfig> {
  dotenv.config();
  return loadConfig(process.env);
}
