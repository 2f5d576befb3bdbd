/**
 * Terminal chat against a running agent runtime.
 *
 *   npm run chat
 *
 * Talks to AGENT_RUNTIME_URL (default: the local server). /nueva starts a new
 * session, /salir exits.
 */

import { randomUUID } from "crypto";
import { createInterface } from "readline/promises";
import { WELCOME_TEXT } from "../lib/copy";
import { describeRuntimeError, invokeAgentRuntime } from "../lib/runtime-client";

const newSessionId = () => `cli-session-${randomUUID()}`;

const rl = createInterface({ input: process.stdin, output: process.stdout });
let sessionId = newSessionId();

process.stdout.write(`${WELCOME_TEXT}\n\n`);

for (;;) {
  const line = (await rl.question("tú> ")).trim();
  if (!line) continue;
  if (line === "/salir") break;
  if (line === "/nueva") {
    sessionId = newSessionId();
    process.stdout.write("🔄 Nueva sesión.\n\n");
    continue;
  }

  try {
    const result = await invokeAgentRuntime(line, sessionId);
    process.stdout.write(`\ncicerone> ${result.response}\n\n`);
  } catch (err) {
    process.stdout.write(`\n${describeRuntimeError(err)}\n\n`);
  }
}

rl.close();
