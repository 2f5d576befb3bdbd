/**
 * Structured JSON logging, one line per event.
 *
 * info/debug go to stdout, warn/error to stderr. Events below LOG_LEVEL are
 * dropped.
 */

import type { Context, Next } from "hono";
import { env, type LogLevel } from "./env";

const RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

type Fields = Record<string, unknown>;

export interface Logger {
  debug(msg: string, fields?: Fields): void;
  info(msg: string, fields?: Fields): void;
  warn(msg: string, fields?: Fields): void;
  error(msg: string, fields?: Fields): void;
}

export function createLogger(scope: string): Logger {
  const emit = (level: LogLevel, msg: string, fields?: Fields) => {
    if (RANK[level] < RANK[env.LOG_LEVEL]) return;

    const line =
      JSON.stringify({
        ts: new Date().toISOString(),
        level,
        scope,
        msg,
        ...fields,
      }) + "\n";

    if (RANK[level] >= RANK.warn) process.stderr.write(line);
    else process.stdout.write(line);
  };

  return {
    debug: (msg, fields) => emit("debug", msg, fields),
    info: (msg, fields) => emit("info", msg, fields),
    warn: (msg, fields) => emit("warn", msg, fields),
    error: (msg, fields) => emit("error", msg, fields),
  };
}

// ── HTTP request logging ────────────────────────────────────────────

const http = createLogger("http");

/** Hono middleware: one line per request with status and duration. */
export function requestLogger() {
  return async (c: Context, next: Next): Promise<void> => {
    const start = performance.now();
    await next();
    const ms = Number((performance.now() - start).toFixed(1));

    http.info("request", {
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      ms,
    });
  };
}
