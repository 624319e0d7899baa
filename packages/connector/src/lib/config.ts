/**
 * Configuration
 *
 * Settings come from environment variables, with a local .env file loaded
 * through dotenv. The same file holds the Strava refresh token and is
 * rewritten when Strava rotates it (see env-file.ts).
 *
 * Every required setting is validated up front; a run never starts with a
 * partial configuration.
 */

import { config as loadDotenv } from "dotenv";
import { ConfigError } from "./errors.js";
import { isLogLevel, type LogLevel } from "./logger.js";

const DEFAULT_ENV_PATH = ".env";

// Types
export interface DbConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
}

export interface StravaAppConfig {
  clientId: string;
  clientSecret: string;
  refreshToken: string;
}

export interface AppConfig {
  /** File the refresh token was loaded from and is persisted back to */
  envPath: string;
  db: DbConfig;
  strava: StravaAppConfig;
  logLevel: LogLevel | null;
}

export const REQUIRED_KEYS = [
  "DB_HOST",
  "DB_PORT",
  "DB_NAME",
  "DB_USER",
  "DB_PASSWORD",
  "STRAVA_CLIENT_ID",
  "STRAVA_CLIENT_SECRET",
  "STRAVA_REFRESH_TOKEN",
] as const;

type RequiredKey = (typeof REQUIRED_KEYS)[number];

/**
 * Resolve the credential file path (STRAVA_ENV_PATH, default ".env")
 */
export function resolveEnvPath(env: NodeJS.ProcessEnv = process.env): string {
  return env.STRAVA_ENV_PATH || DEFAULT_ENV_PATH;
}

/**
 * Load the .env file into process.env.
 * Variables already set in the environment win over the file.
 */
export function loadEnvFile(envPath: string = resolveEnvPath()): void {
  loadDotenv({ path: envPath });
}

/**
 * Validate and assemble configuration from environment variables
 *
 * @param env - Variables to read (defaults to process.env)
 * @returns Typed configuration
 * @throws ConfigError listing every missing or invalid key
 */
export function readConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const missing = REQUIRED_KEYS.filter((key) => !env[key]);
  if (missing.length > 0) {
    throw new ConfigError([...missing]);
  }

  const get = (key: RequiredKey): string => env[key] ?? "";

  const port = Number(get("DB_PORT"));
  if (!Number.isInteger(port) || port <= 0 || port > 65535) {
    throw new ConfigError(["DB_PORT"], `Invalid DB_PORT: ${get("DB_PORT")}`);
  }

  const logLevelValue = env.LOG_LEVEL;
  let logLevel: LogLevel | null = null;
  if (logLevelValue) {
    if (!isLogLevel(logLevelValue)) {
      throw new ConfigError(["LOG_LEVEL"], `Invalid LOG_LEVEL: ${logLevelValue}`);
    }
    logLevel = logLevelValue;
  }

  return {
    envPath: resolveEnvPath(env),
    db: {
      host: get("DB_HOST"),
      port,
      database: get("DB_NAME"),
      user: get("DB_USER"),
      password: get("DB_PASSWORD"),
    },
    strava: {
      clientId: get("STRAVA_CLIENT_ID"),
      clientSecret: get("STRAVA_CLIENT_SECRET"),
      refreshToken: get("STRAVA_REFRESH_TOKEN"),
    },
    logLevel,
  };
}

/**
 * Load the .env file, then validate
 */
export function loadConfig(): AppConfig {
  loadEnvFile();
  return readConfig();
}
