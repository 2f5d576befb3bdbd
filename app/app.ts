import { Hono } from "hono";
import type { Bot } from "grammy";
import { HTTPException } from "hono/http-exception";
import { hasChatSecret } from "../lib/auth";
import { env } from "../lib/env";
import type { InvocationDeps } from "../lib/invocation";
import { createLogger, requestLogger } from "../lib/logger";
import { createChatRoutes, type ChatRouteDeps } from "./api/chat/route";
import { createInvocationRoutes } from "./api/invocations/route";
import { createTelegramRoutes } from "./api/telegram/route";

const log = createLogger("app");

export interface AppDeps {
  invocation?: InvocationDeps;
  chat?: ChatRouteDeps;
  /** Mounted at /api/telegram when present. */
  telegramBot?: Bot;
}

export function createApp(deps: AppDeps = {}) {
  const app = new Hono();

  // ── Global error handling ─────────────────────────────────────────

  app.onError((err, c) => {
    if (err instanceof HTTPException && err.status < 500) {
      return c.json({ error: err.message }, err.status);
    }
    log.error("unhandled error", {
      method: c.req.method,
      path: c.req.path,
      error: err.message,
      stack: env.NODE_ENV !== "production" ? err.stack : undefined,
    });
    return c.json({ error: "Internal server error." }, 500);
  });

  app.notFound((c) => c.json({ error: "Not found." }, 404));

  app.use("*", requestLogger());

  // ── Routes ────────────────────────────────────────────────────────

  app.route("/", createInvocationRoutes(deps.invocation));
  if (hasChatSecret()) {
    app.route("/api/chat", createChatRoutes(deps.chat));
  } else {
    log.warn("web chat disabled: set JWT_SECRET to enable it");
  }
  if (deps.telegramBot) {
    app.route("/api/telegram", createTelegramRoutes(deps.telegramBot));
  }

  app.get("/", (c) => c.json({ name: "cicerone-bot", version: "0.1.0" }));

  return app;
}
