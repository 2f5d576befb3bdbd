/**
 * Environment configuration, read once at import.
 *
 * Every setting has a default so the runtime endpoint and the tests start
 * without a .env file. Scripts that cannot run without a value call
 * `required()` for it.
 */

import "dotenv/config";

export function required(key: string): string {
  const val = process.env[key];
  if (!val) {
    throw new Error(
      `Missing required environment variable: ${key}. ` +
        "Set it in .env or your deployment configuration.",
    );
  }
  return val;
}

function optional(key: string, fallback: string): string {
  return process.env[key] || fallback;
}

function secret(key: string): string | undefined {
  return process.env[key] || undefined;
}

function positiveNumber(key: string, fallback: number): number {
  const parsed = Number(process.env[key]);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

/** Counts and ports: fractional values fall back like any other bad value. */
function positiveInteger(key: string, fallback: number): number {
  const parsed = positiveNumber(key, fallback);
  return Number.isInteger(parsed) ? parsed : fallback;
}

const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

function logLevel(): LogLevel {
  const raw = optional("LOG_LEVEL", "info").toLowerCase();
  return LOG_LEVELS.find((l) => l === raw) ?? "info";
}

const PORT = positiveInteger("PORT", 8080);
const BEER_CATALOG_URL = optional(
  "BEER_CATALOG_URL",
  "https://cervezafortuna.com/inicio/cervezas/",
);

export const env = {
  PORT,
  NODE_ENV: optional("NODE_ENV", "development"),
  LOG_LEVEL: logLevel(),

  // Catalog + cache
  CACHE_DIR: optional("CACHE_DIR", ".cache"),
  CACHE_TTL_HOURS: positiveNumber("CACHE_TTL_HOURS", 24),
  BEER_CATALOG_URL,
  ALLOWED_DOMAIN: new URL(BEER_CATALOG_URL).hostname,
  REQUEST_TIMEOUT_MS: positiveNumber("REQUEST_TIMEOUT_MS", 10_000),
  MAX_RETRIES: positiveInteger("MAX_RETRIES", 2),

  // Sessions
  SESSION_TIMEOUT_HOURS: positiveNumber("SESSION_TIMEOUT_HOURS", 24),

  // Agent
  AGENT_MODEL: optional("AGENT_MODEL", "claude-sonnet-4-20250514"),
  AGENT_MAX_STEPS: positiveInteger("AGENT_MAX_STEPS", 8),

  // Front-ends
  AGENT_RUNTIME_URL: optional("AGENT_RUNTIME_URL", `http://localhost:${PORT}`),
  AGENT_TIMEOUT_MS: positiveNumber("AGENT_TIMEOUT_MS", 30_000),
  TELEGRAM_BOT_TOKEN: secret("TELEGRAM_BOT_TOKEN"),
  OPENAI_API_KEY: secret("OPENAI_API_KEY"),
  JWT_SECRET: secret("JWT_SECRET"),
  APP_BASE_URL: secret("APP_BASE_URL"),
} as const;
