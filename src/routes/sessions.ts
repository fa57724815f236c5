/**
 * Test Session Routes
 *
 * Adaptive sessions advance one answer at a time; fixed-form sessions
 * receive the whole form up front and are scored on submission.
 */

import { Hono } from "hono";
import type { Engine } from "../engine.ts";
import { parseJsonBody } from "../middleware/validation.ts";
import type { TestSession } from "../repositories/types.ts";
import {
  startFixedSessionSchema,
  startSessionSchema,
  submitFixedSessionSchema,
  submitResponseSchema,
} from "../schemas/measurement.ts";

export interface SessionRouteDeps {
  engine: Pick<Engine, "adaptive" | "fixedForm">;
}

/** Public view of a session */
function sessionView(session: TestSession) {
  return {
    id: session.id,
    userId: session.userId,
    mode: session.mode,
    status: session.status,
    itemsAdministered: session.itemsAdministered,
    stoppingReason: session.stoppingReason,
    startedAt: session.startedAt.toISOString(),
    completedAt: session.completedAt ? session.completedAt.toISOString() : null,
  };
}

export function createSessionRoutes({ engine }: SessionRouteDeps): Hono {
  const sessionRoutes = new Hono();

  // ---------------------------------------------------------------------------
  // Adaptive
  // ---------------------------------------------------------------------------

  sessionRoutes.post("/adaptive", async (c) => {
    const body = await parseJsonBody(c, startSessionSchema);
    if (!body.success) return body.response;

    const start = await engine.adaptive.startAdaptive(body.data.userId);
    return c.json(
      {
        session: sessionView(start.session),
        firstItem: start.firstItem,
        theta: start.theta,
        se: start.se,
        testComplete: start.session.status === "completed",
        result: start.result,
      },
      201,
    );
  });

  sessionRoutes.post("/adaptive/:sessionId/responses", async (c) => {
    const body = await parseJsonBody(c, submitResponseSchema);
    if (!body.success) return body.response;

    const outcome = await engine.adaptive.submitAndAdvance(
      c.req.param("sessionId"),
      body.data.itemId,
      body.data.isCorrect,
    );
    return c.json(outcome);
  });

  sessionRoutes.post("/adaptive/:sessionId/abandon", async (c) => {
    const session = await engine.adaptive.abandon(c.req.param("sessionId"));
    return c.json({ session: sessionView(session) });
  });

  // ---------------------------------------------------------------------------
  // Fixed form
  // ---------------------------------------------------------------------------

  sessionRoutes.post("/fixed", async (c) => {
    const body = await parseJsonBody(c, startFixedSessionSchema);
    if (!body.success) return body.response;

    const start = await engine.fixedForm.start(body.data.userId, body.data.totalItems);
    return c.json(
      {
        session: sessionView(start.session),
        items: start.items,
        targets: start.targets,
      },
      201,
    );
  });

  sessionRoutes.post("/fixed/:sessionId/submit", async (c) => {
    const body = await parseJsonBody(c, submitFixedSessionSchema);
    if (!body.success) return body.response;

    const submission = await engine.fixedForm.submit(c.req.param("sessionId"), body.data.responses);
    return c.json(submission);
  });

  return sessionRoutes;
}
