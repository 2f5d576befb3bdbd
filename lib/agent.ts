import { generateText, stepCountIs, type LanguageModel, type ModelMessage } from "ai";
import { anthropic } from "@ai-sdk/anthropic";
import { buildSystemPrompt } from "./ai/prompt";
import { buildContext } from "./context";
import { env } from "./env";
import { createLogger } from "./logger";
import type { TastingSession } from "./models";
import { createTools, type ToolContext } from "./tools";

const log = createLogger("agent");

export interface AgentRequest {
  message: string;
  session: TastingSession;
  /** Defaults to Anthropic's `AGENT_MODEL`. */
  model?: LanguageModel;
  /** Overrides for the tool dependencies (scraper, stores, randomness). */
  tools?: Omit<ToolContext, "session">;
}

export interface AgentReply {
  text: string;
  toolsUsed: string[];
}

/**
 * Run the cicerone for a single user message. The model calls tools as needed
 * and returns a natural-language reply. Tool writes land on `session`.
 */
export async function runAgent({
  message,
  session,
  model,
  tools: toolOverrides,
}: AgentRequest): Promise<AgentReply> {
  const tools = createTools({ ...toolOverrides, session });

  const history: ModelMessage[] = session.conversationHistory.map((m) =>
    m.role === "user"
      ? { role: "user", content: m.content }
      : { role: "assistant", content: m.content },
  );

  const { text, steps } = await generateText({
    model: model ?? anthropic(env.AGENT_MODEL),
    system: buildSystemPrompt(buildContext(session)),
    tools,
    stopWhen: stepCountIs(env.AGENT_MAX_STEPS),
    messages: [...history, { role: "user", content: message }],
  });

  const toolsUsed = [
    ...new Set(steps.flatMap((step) => step.toolCalls.map((call) => call.toolName))),
  ];

  log.info("agent replied", {
    sessionId: session.sessionId,
    steps: steps.length,
    toolsUsed,
  });

  return { text: text || "Listo.", toolsUsed };
}
