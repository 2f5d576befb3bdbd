import { serve } from "@hono/node-server";
import { createApp } from "./app/app";
import { createBot } from "./app/api/telegram/bot";
import { hasChatSecret } from "./lib/auth";
import { env } from "./lib/env";
import { createLogger } from "./lib/logger";

const log = createLogger("server");

const telegramBot = env.TELEGRAM_BOT_TOKEN
  ? createBot({ token: env.TELEGRAM_BOT_TOKEN })
  : undefined;

const app = createApp({ telegramBot });

// ── Server start + graceful shutdown ────────────────────────────────

const server = serve({ fetch: app.fetch, port: env.PORT }, (info) => {
  log.info("server started", {
    port: info.port,
    env: env.NODE_ENV,
    telegram: telegramBot !== undefined,
    webChat: hasChatSecret(),
  });
});

function shutdown(signal: string) {
  log.info("shutdown", { signal });
  server.close(() => process.exit(0));
  setTimeout(() => process.exit(1), 10_000).unref();
}

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));
