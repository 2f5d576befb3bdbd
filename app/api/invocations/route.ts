/**
 * POST /invocations: agent runtime endpoint
 * GET  /ping: liveness probe
 *
 * Always answers HTTP 200; failures travel in the envelope's `status`.
 */

import { Hono } from "hono";
import { handleInvocation, rejectPayload, type InvocationDeps } from "../../../lib/invocation";

export function createInvocationRoutes(deps: InvocationDeps = {}) {
  const routes = new Hono();

  routes.post("/invocations", async (c) => {
    let payload: unknown;
    try {
      payload = await c.req.json();
    } catch {
      return c.json(rejectPayload("Invalid JSON body"));
    }

    return c.json(await handleInvocation(payload, deps));
  });

  routes.get("/ping", (c) => c.json({ status: "Healthy" }));

  return routes;
}
