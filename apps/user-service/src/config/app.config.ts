import { registerAs } from '@nestjs/config';
import type { ConfigType } from '@nestjs/config';

/**
 * Process-wide configuration, built once at startup from environment
 * variables and injected by reference into every component that needs it:
 *
 * ```ts
 * constructor(@Inject(appConfig.KEY) private readonly config: AppConfig) {}
 * ```
 */
export interface AppConfigShape {
  nodeEnv: string;
  http: {
    port: number;
    globalPrefix: string;
  };
  grpc: {
    host: string;
    port: number;
  };
  database: {
    host: string;
    port: number;
    username: string;
    password: string;
    name: string;
  };
  redis: {
    host: string;
    port: number;
  };
  jwt: {
    secret: string;
    accessTtlSeconds: number;
    refreshTtlSeconds: number;
  };
  bcryptSaltRounds: number;
}

type Env = Record<string, string | undefined>;

/** Parses a positive integer, falling back to `fallback` on anything else. */
export function positiveInt(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  return Number.isInteger(value) && value > 0 ? value : fallback;
}

function str(env: Env, key: string, fallback: string): string {
  const value = env[key];
  return value !== undefined && value !== '' ? value : fallback;
}

/**
 * Builds the configuration struct from an environment map.
 *
 * @throws Error when JWT_SECRET is missing
 */
export function buildAppConfig(env: Env): AppConfigShape {
  const secret = env['JWT_SECRET'];
  if (!secret) {
    throw new Error('JWT_SECRET is not defined. Check your .env file.');
  }

  return {
    nodeEnv: str(env, 'NODE_ENV', 'development'),
    http: {
      port: positiveInt(env['USER_SERVICE_HTTP_PORT'], 8000),
      globalPrefix: str(env, 'USER_SERVICE_HTTP_PREFIX', 'api'),
    },
    grpc: {
      host: str(env, 'USER_SERVICE_GRPC_HOST', '0.0.0.0'),
      port: positiveInt(env['USER_SERVICE_GRPC_PORT'], 50051),
    },
    database: {
      host: str(env, 'POSTGRES_HOST', 'localhost'),
      port: positiveInt(env['POSTGRES_PORT'], 5432),
      username: str(env, 'POSTGRES_USER', 'users'),
      password: str(env, 'POSTGRES_PASSWORD', 'users_secret'),
      name: str(env, 'POSTGRES_DB', 'users'),
    },
    redis: {
      host: str(env, 'REDIS_HOST', 'localhost'),
      port: positiveInt(env['REDIS_PORT'], 6379),
    },
    jwt: {
      secret,
      accessTtlSeconds: positiveInt(env['JWT_ACCESS_EXPIRATION'], 900),
      refreshTtlSeconds: positiveInt(env['JWT_REFRESH_EXPIRATION'], 604_800),
    },
    bcryptSaltRounds: positiveInt(env['BCRYPT_SALT_ROUNDS'], 12),
  };
}

export const appConfig = registerAs('app', () => buildAppConfig(process.env));

export type AppConfig = ConfigType<typeof appConfig>;
