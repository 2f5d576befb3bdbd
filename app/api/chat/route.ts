/**
 * Web chat relay.
 *
 *   POST /api/chat          { message } -> { response, sessionId, metadata }
 *   POST /api/chat/reset    -> { sessionId }
 *   GET  /api/chat/welcome  -> { message }
 *
 * The runtime session id lives in a signed HTTP-only cookie, so a browser
 * keeps its tasting across page loads without any server-side user table.
 */

import { Hono, type Context } from "hono";
import { getCookie, setCookie } from "hono/cookie";
import { z } from "zod";
import {
  newWebSessionId,
  SESSION_COOKIE,
  SESSION_MAX_AGE,
  signChatSession,
  verifyChatSession,
} from "../../../lib/auth";
import { WELCOME_TEXT } from "../../../lib/copy";
import { env } from "../../../lib/env";
import { errorMessage } from "../../../lib/errors";
import { createLogger } from "../../../lib/logger";
import {
  describeRuntimeError,
  invokeAgentRuntime,
  type RuntimeClientOptions,
} from "../../../lib/runtime-client";

const log = createLogger("chat");

const chatBody = z.object({
  message: z.string().trim().min(1, "Message must not be empty"),
});

export interface ChatRouteDeps {
  runtime?: RuntimeClientOptions;
}

async function startSession(c: Context): Promise<string> {
  const sessionId = newWebSessionId();
  setCookie(c, SESSION_COOKIE, await signChatSession(sessionId), {
    httpOnly: true,
    secure: env.NODE_ENV === "production",
    sameSite: "Lax",
    maxAge: SESSION_MAX_AGE,
    path: "/",
  });
  return sessionId;
}

export function createChatRoutes(deps: ChatRouteDeps = {}) {
  const routes = new Hono();

  routes.post("/", async (c) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return c.json({ error: "Invalid JSON body." }, 400);
    }

    const parsed = chatBody.safeParse(body);
    if (!parsed.success) {
      return c.json({ error: parsed.error.issues[0]?.message ?? "Invalid body." }, 400);
    }

    const sessionId =
      (await verifyChatSession(getCookie(c, SESSION_COOKIE))) ?? (await startSession(c));

    try {
      const result = await invokeAgentRuntime(parsed.data.message, sessionId, deps.runtime);
      if (result.status === "error") {
        return c.json({ response: result.response, sessionId, error: result.error });
      }
      return c.json({ response: result.response, sessionId, metadata: result.metadata ?? null });
    } catch (err) {
      log.error("runtime call failed", { sessionId, error: errorMessage(err) });
      return c.json({ error: describeRuntimeError(err), sessionId }, 502);
    }
  });

  routes.post("/reset", async (c) => {
    const sessionId = await startSession(c);
    log.info("chat session reset", { sessionId });
    return c.json({ sessionId });
  });

  routes.get("/welcome", (c) => c.json({ message: WELCOME_TEXT }));

  return routes;
}
