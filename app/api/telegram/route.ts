/**
 * POST /api/telegram: Telegram webhook endpoint
 *
 * Telegram POSTs every update (message, callback_query, etc.) here.
 * grammY's webhookCallback converts the incoming Request into a bot update.
 */

import { webhookCallback, type Bot } from "grammy";
import { Hono } from "hono";
import { env } from "../../../lib/env";

export function createTelegramRoutes(bot: Bot) {
  // Answer Telegram before the agent runtime's own timeout would.
  const handler = webhookCallback(bot, "std/http", {
    timeoutMilliseconds: env.AGENT_TIMEOUT_MS + 5_000,
  });

  const routes = new Hono();
  routes.post("/", (c) => handler(c.req.raw));
  return routes;
}
