/**
 * Global Configuration
 */

import { ConfigError } from "./utils/errors";

export const API_URLS = {
  mainnet: "https://api.hyperliquid.xyz",
  testnet: "https://api.hyperliquid-testnet.xyz",
  telegram: "https://api.telegram.org",
};

export const API_CONFIG = {
  keepAliveTimeout: 30_000,      // Keep idle connections alive for 30s
  keepAliveMaxTimeout: 60_000,   // Max keep-alive duration
  connections: 4,                // Max concurrent connections per origin
};

export const DEFAULTS = {
  checkIntervalSeconds: 300,
  fillsLimit: 100,
  sizeEpsilon: 1e-9,
  requestTimeoutMs: 30_000,
  maxRetries: 2,
  maxConsecutiveErrors: 5,
  shutdownGraceMs: 10_000,
  telegramTimeoutMs: 10_000,
};

export interface TelegramConfig {
  botToken: string;
  chatId: string;
}

export interface MonitorConfig {
  address: string;
  isTestnet: boolean;
  apiUrl: string;
  intervalMs: number;
  fillsLimit: number;
  sizeEpsilon: number;
  requestTimeoutMs: number;
  maxRetries: number;
  maxConsecutiveErrors: number;
  shutdownGraceMs: number;
  telegram: TelegramConfig;
  logLevel: string;
  logFile: string | null;
}

type Env = Record<string, string | undefined>;

const ADDRESS_PATTERN = /^0x[0-9a-fA-F]{40}$/;

/** Longest delay a Node timer honours; anything above fires after 1ms */
export const MAX_TIMER_MS = 2_147_483_647;
const LOG_LEVELS = ["error", "warn", "info", "http", "verbose", "debug", "silly"];

function getEnvVar(env: Env, key: string): string | null {
  const value = env[key]?.trim();
  return value ? value : null;
}

function requireEnvVar(env: Env, key: string): string {
  const value = getEnvVar(env, key);
  if (value === null) {
    throw new ConfigError(`Missing required environment variable: ${key}`);
  }
  return value;
}

function getEnvNumber(
  env: Env,
  key: string,
  defaultValue: number,
  min: number,
  max: number = Number.POSITIVE_INFINITY
): number {
  const value = getEnvVar(env, key);
  if (value === null) return defaultValue;
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < min) {
    throw new ConfigError(`${key} must be a number >= ${min}, got "${value}"`);
  }
  if (parsed > max) {
    throw new ConfigError(`${key} must be at most ${max}, got "${value}"`);
  }
  return parsed;
}

function getEnvInteger(
  env: Env,
  key: string,
  defaultValue: number,
  min: number,
  max: number = Number.POSITIVE_INFINITY
): number {
  const parsed = getEnvNumber(env, key, defaultValue, min, max);
  if (!Number.isInteger(parsed)) {
    throw new ConfigError(`${key} must be an integer, got "${parsed}"`);
  }
  return parsed;
}

function getEnvBoolean(env: Env, key: string, defaultValue: boolean): boolean {
  const value = getEnvVar(env, key);
  if (value === null) return defaultValue;
  return value.toLowerCase() === "true";
}

/**
 * Build the monitor configuration from environment variables.
 * Throws ConfigError on missing or invalid values.
 */
export function loadConfig(env: Env = process.env): MonitorConfig {
  const address = requireEnvVar(env, "HYPERLIQUID_ADDRESS");
  if (!ADDRESS_PATTERN.test(address)) {
    throw new ConfigError(`HYPERLIQUID_ADDRESS is not a valid address: "${address}"`);
  }

  const logLevel = getEnvVar(env, "LOG_LEVEL") ?? "info";
  if (!LOG_LEVELS.includes(logLevel)) {
    throw new ConfigError(`LOG_LEVEL must be one of ${LOG_LEVELS.join(", ")}, got "${logLevel}"`);
  }

  const isTestnet = getEnvBoolean(env, "USE_TESTNET", false);

  return {
    address,
    isTestnet,
    apiUrl: isTestnet ? API_URLS.testnet : API_URLS.mainnet,
    intervalMs: getEnvNumber(env, "CHECK_INTERVAL", DEFAULTS.checkIntervalSeconds, 1, Math.floor(MAX_TIMER_MS / 1000)) * 1000,
    fillsLimit: getEnvInteger(env, "FILLS_LIMIT", DEFAULTS.fillsLimit, 1),
    sizeEpsilon: getEnvNumber(env, "SIZE_EPSILON", DEFAULTS.sizeEpsilon, 0),
    requestTimeoutMs: getEnvInteger(env, "REQUEST_TIMEOUT_MS", DEFAULTS.requestTimeoutMs, 1, MAX_TIMER_MS),
    maxRetries: getEnvInteger(env, "MAX_RETRIES", DEFAULTS.maxRetries, 0),
    maxConsecutiveErrors: getEnvInteger(env, "MAX_CONSECUTIVE_ERRORS", DEFAULTS.maxConsecutiveErrors, 1),
    shutdownGraceMs: getEnvInteger(env, "SHUTDOWN_GRACE_MS", DEFAULTS.shutdownGraceMs, 0, MAX_TIMER_MS),
    telegram: {
      botToken: requireEnvVar(env, "TELEGRAM_BOT_TOKEN"),
      chatId: requireEnvVar(env, "TELEGRAM_CHAT_ID"),
    },
    logLevel,
    logFile: getEnvVar(env, "LOG_FILE"),
  };
}
