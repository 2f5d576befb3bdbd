/**
 * Cicerone: Telegram bot
 *
 * Pipeline:
 *   message (text/voice) -> [transcribe] -> agent runtime -> reply
 *
 * Each chat gets its own runtime session (`telegram-<chatId>-<uuid>`),
 * renewed by /nueva.
 *
 * Includes:
 *   - Message deduplication (idempotency guard against Telegram re-deliveries)
 *   - Voice transcription via OpenAI Whisper
 */

import { randomUUID } from "crypto";
import { Bot, type Context } from "grammy";
import OpenAI from "openai";
import { HELP_TEXT, NEW_SESSION_TEXT, WELCOME_TEXT } from "../../../lib/copy";
import { env } from "../../../lib/env";
import { errorMessage } from "../../../lib/errors";
import { createLogger } from "../../../lib/logger";
import {
  describeRuntimeError,
  invokeAgentRuntime,
  type RuntimeClientOptions,
} from "../../../lib/runtime-client";

const log = createLogger("telegram");

// ── Idempotency guard ──────────────────────────────────────────────
// Prevents duplicate processing when Telegram re-delivers updates.

export const MAX_PROCESSED = 1000;

export function createUpdateGuard(max = MAX_PROCESSED) {
  const processedUpdates = new Set<string>();

  /** True when this message was already handled. */
  return function markProcessed(chatId: number, messageId: number): boolean {
    const key = `${chatId}:${messageId}`;
    if (processedUpdates.has(key)) return true;
    processedUpdates.add(key);
    // Evict oldest to prevent unbounded growth
    if (processedUpdates.size > max) {
      const first = processedUpdates.values().next().value;
      if (first) processedUpdates.delete(first);
    }
    return false;
  };
}

// ── Chat sessions + runtime relay ───────────────────────────────────

export function createChatRelay(runtime: RuntimeClientOptions = {}) {
  const chatSessions = new Map<number, string>();

  function renew(chatId: number): string {
    const sessionId = `telegram-${chatId}-${randomUUID()}`;
    chatSessions.set(chatId, sessionId);
    return sessionId;
  }

  function sessionFor(chatId: number): string {
    return chatSessions.get(chatId) ?? renew(chatId);
  }

  /** The text to send back for one user message. Never throws. */
  async function reply(chatId: number, text: string): Promise<string> {
    const sessionId = sessionFor(chatId);
    try {
      const result = await invokeAgentRuntime(text, sessionId, runtime);
      return result.response;
    } catch (err) {
      log.error("runtime call failed", { chatId, sessionId, error: errorMessage(err) });
      return describeRuntimeError(err);
    }
  }

  return { sessionFor, renew, reply };
}

// ── Bot factory ─────────────────────────────────────────────────────

export interface BotOptions {
  token: string;
  openaiApiKey?: string;
  runtime?: RuntimeClientOptions;
}

export function createBot({ token, openaiApiKey = env.OPENAI_API_KEY, runtime }: BotOptions) {
  const bot = new Bot(token);
  const markProcessed = createUpdateGuard();
  const relay = createChatRelay(runtime);
  const openai = openaiApiKey ? new OpenAI({ apiKey: openaiApiKey }) : null;

  async function processMessage(ctx: Context, chatId: number, text: string) {
    await ctx.replyWithChatAction("typing");
    await ctx.reply(await relay.reply(chatId, text));
  }

  // ── Commands ──────────────────────────────────────────────────────

  bot.command("start", async (ctx) => {
    relay.sessionFor(ctx.chat.id);
    await ctx.reply(WELCOME_TEXT);
  });

  bot.command("nueva", async (ctx) => {
    const sessionId = relay.renew(ctx.chat.id);
    log.info("chat session renewed", { chatId: ctx.chat.id, sessionId });
    await ctx.reply(NEW_SESSION_TEXT);
  });

  bot.command("ayuda", async (ctx) => {
    await ctx.reply(HELP_TEXT);
  });

  // ── Text messages ───────────────────────────────────────────────────

  bot.on("message:text", async (ctx) => {
    const chatId = ctx.chat.id;
    if (markProcessed(chatId, ctx.message.message_id)) return;

    const text = ctx.message.text.trim();
    if (!text) return;

    await processMessage(ctx, chatId, text);
  });

  // ── Voice notes ─────────────────────────────────────────────────────

  bot.on("message:voice", async (ctx) => {
    const chatId = ctx.chat.id;
    if (markProcessed(chatId, ctx.message.message_id)) return;

    if (!openai) {
      await ctx.reply("Por ahora solo entiendo mensajes de texto. ¿Me lo escribes? 🍺");
      return;
    }

    await ctx.reply("🎙️ Nota de voz recibida, transcribiendo...");

    try {
      const file = await ctx.api.getFile(ctx.message.voice.file_id);
      const fileUrl = `https://api.telegram.org/file/bot${token}/${file.file_path}`;
      const response = await fetch(fileUrl);
      const arrayBuffer = await response.arrayBuffer();

      const transcription = await openai.audio.transcriptions.create({
        file: new File([arrayBuffer], "voice.ogg", { type: "audio/ogg" }),
        model: "whisper-1",
        language: "es",
      });

      const text = transcription.text.trim();
      if (!text) {
        await ctx.reply("No entendí la nota de voz. ¿Puedes repetirla?");
        return;
      }

      await ctx.reply(`"${text}"`);
      await processMessage(ctx, chatId, text);
    } catch (err) {
      log.error("voice transcription failed", { chatId, error: errorMessage(err) });
      await ctx.reply("No pude procesar la nota de voz. Inténtalo por texto.");
    }
  });

  bot.catch((err) => {
    log.error("unhandled bot error", {
      updateId: err.ctx.update.update_id,
      error: errorMessage(err.error),
    });
  });

  return bot;
}
