import type { LevelWithSilent } from "pino";
import { ConfigurationError } from "./lib/errors";
import type { RetryOptions } from "./lib/retry";

type Env = Record<string, string | undefined>;

export type DataDriver = "remote" | "memory";

export interface DatabaseSettings {
  host?: string;
  user?: string;
  password?: string;
  database?: string;
  port: number;
  ssl: boolean;
  poolMax: number;
  connectionTimeoutMs: number;
  statementTimeoutMs: number;
}

export type DatabaseConfig = Required<DatabaseSettings>;

export interface StorageSettings {
  accessKeyId?: string;
  secretAccessKey?: string;
  bucket?: string;
  region: string;
  endpoint?: string;
  forcePathStyle: boolean;
  uploadTimeoutMs: number;
  presignExpiresIn: number;
}

export interface StorageConfig extends StorageSettings {
  accessKeyId: string;
  secretAccessKey: string;
  bucket: string;
}

export interface AppConfig {
  port: number;
  host: string;
  env: string;
  logLevel: LevelWithSilent;
  dataDriver: DataDriver;
  database: DatabaseSettings;
  storage: StorageSettings;
  uploadRetry: RetryOptions;
}

const LOG_LEVELS: readonly LevelWithSilent[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];
const DATA_DRIVERS: readonly DataDriver[] = ["remote", "memory"];

const optional = (env: Env, key: string): string | undefined => {
  const value = env[key]?.trim();
  return value ? value : undefined;
};

const numberEnv = (env: Env, key: string, fallback: number): number => {
  const raw = optional(env, key);
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigurationError(`${key} must be a non-negative integer, got "${raw}"`);
  }
  return value;
};

const booleanEnv = (env: Env, key: string, fallback: boolean): boolean => {
  const raw = optional(env, key);
  if (raw === undefined) return fallback;
  if (raw === "true" || raw === "1") return true;
  if (raw === "false" || raw === "0") return false;
  throw new ConfigurationError(`${key} must be true or false, got "${raw}"`);
};

const oneOf = <T extends string>(env: Env, key: string, allowed: readonly T[], fallback: T): T => {
  const raw = optional(env, key);
  if (raw === undefined) return fallback;
  const match = allowed.find((candidate) => candidate === raw);
  if (!match) {
    throw new ConfigurationError(`${key} must be one of ${allowed.join(", ")}, got "${raw}"`);
  }
  return match;
};

/**
 * Reads the process environment once. Required connection settings may be
 * left unset here; they are checked when a component first needs them.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  return {
    port: numberEnv(env, "PORT", 8080),
    host: optional(env, "HOST") ?? "0.0.0.0",
    env: optional(env, "NODE_ENV") ?? "development",
    logLevel: oneOf(env, "LOG_LEVEL", LOG_LEVELS, "info"),
    dataDriver: oneOf(env, "DATA_DRIVER", DATA_DRIVERS, "remote"),
    database: {
      host: optional(env, "DB_HOST"),
      user: optional(env, "DB_USER"),
      password: optional(env, "DB_PASS"),
      database: optional(env, "DB_NAME"),
      port: numberEnv(env, "DB_PORT", 5432),
      ssl: booleanEnv(env, "DB_SSL", false),
      poolMax: numberEnv(env, "DB_POOL_MAX", 20),
      connectionTimeoutMs: numberEnv(env, "DB_CONNECT_TIMEOUT_MS", 5_000),
      statementTimeoutMs: numberEnv(env, "DB_STATEMENT_TIMEOUT_MS", 15_000),
    },
    storage: {
      accessKeyId: optional(env, "AWS_ACCESS_KEY_ID"),
      secretAccessKey: optional(env, "AWS_SECRET_ACCESS_KEY"),
      bucket: optional(env, "S3_BUCKET_NAME"),
      region: optional(env, "AWS_REGION") ?? "us-east-1",
      endpoint: optional(env, "AWS_ENDPOINT"),
      forcePathStyle: booleanEnv(env, "S3_FORCE_PATH_STYLE", false),
      uploadTimeoutMs: numberEnv(env, "UPLOAD_TIMEOUT_MS", 300_000),
      presignExpiresIn: numberEnv(env, "PRESIGN_EXPIRES_IN", 3600),
    },
    uploadRetry: {
      maxAttempts: numberEnv(env, "UPLOAD_MAX_ATTEMPTS", 3),
      baseDelayMs: numberEnv(env, "UPLOAD_RETRY_BASE_MS", 200),
      maxDelayMs: numberEnv(env, "UPLOAD_RETRY_MAX_MS", 5_000),
    },
  };
}

const missingKeys = (values: Record<string, string | undefined>): string[] =>
  Object.entries(values)
    .filter(([, value]) => !value)
    .map(([key]) => key);

export function requireDatabaseConfig(settings: DatabaseSettings): DatabaseConfig {
  const { host, user, password, database } = settings;
  if (!host || !user || !password || !database) {
    throw ConfigurationError.missingVariables(
      missingKeys({ DB_HOST: host, DB_USER: user, DB_PASS: password, DB_NAME: database }),
    );
  }
  return { ...settings, host, user, password, database };
}

export function requireStorageConfig(settings: StorageSettings): StorageConfig {
  const { accessKeyId, secretAccessKey, bucket } = settings;
  if (!accessKeyId || !secretAccessKey || !bucket) {
    throw ConfigurationError.missingVariables(
      missingKeys({
        AWS_ACCESS_KEY_ID: accessKeyId,
        AWS_SECRET_ACCESS_KEY: secretAccessKey,
        S3_BUCKET_NAME: bucket,
      }),
    );
  }
  return { ...settings, accessKeyId, secretAccessKey, bucket };
}
