/**
 * Register the Telegram webhook.
 *
 * Run once after deploy (or whenever the URL changes):
 *   npm run webhook:set
 *
 * Requires:
 *   TELEGRAM_BOT_TOKEN  – bot token from BotFather
 *   APP_BASE_URL        – public HTTPS URL of the server
 */

import { Bot } from "grammy";
import { required } from "../lib/env";
import { createLogger } from "../lib/logger";

const log = createLogger("webhook");

const token = required("TELEGRAM_BOT_TOKEN");
const baseUrl = required("APP_BASE_URL").replace(/\/+$/, "");

const webhookUrl = `${baseUrl}/api/telegram`;

const bot = new Bot(token);

await bot.api.setWebhook(webhookUrl);
log.info("webhook set", { url: webhookUrl });
