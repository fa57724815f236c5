/**
 * Integration tests for the session API
 *
 * - adaptive sessions: start, answer, abandon
 * - fixed-form sessions: start, submit
 * - error responses for unknown sessions and invalid bodies
 */

import { describe, it, expect, beforeEach } from "vitest";
import { z } from "zod";
import { clearAuditLog } from "../services/audit-log.ts";
import { makeItem } from "../services/__tests__/fixtures.ts";
import { NOW, createTestApp, type TestApp } from "./test-app.ts";

const startedSchema = z.object({ session: z.object({ id: z.string() }) });

describe("session routes", () => {
  let t: TestApp;

  beforeEach(() => {
    clearAuditLog();
    t = createTestApp();
  });

  async function startedSessionId(res: Response): Promise<string> {
    return startedSchema.parse(await res.json()).session.id;
  }

  describe("adaptive", () => {
    beforeEach(() => {
      for (const item of [
        makeItem({ id: "easy", difficultyLevel: "easy", questionType: "verbal" }),
        makeItem({ id: "medium", difficultyLevel: "medium", questionType: "logic" }),
        makeItem({ id: "hard", difficultyLevel: "hard", questionType: "math" }),
      ]) {
        t.store.items.set(item.id, item);
      }
    });

    it("starts a session with the first item", async () => {
      const res = await t.request("POST", "/api/v1/sessions/adaptive", { body: { userId: "user-1" } });

      expect(res.status).toBe(201);
      expect(await res.clone().json()).toMatchObject({
        session: {
          userId: "user-1",
          mode: "adaptive",
          status: "in_progress",
          itemsAdministered: 0,
          stoppingReason: null,
          startedAt: NOW.toISOString(),
          completedAt: null,
        },
        firstItem: { id: "medium", questionType: "logic", difficultyLevel: "medium" },
        theta: 0,
        se: 1,
        testComplete: false,
        result: null,
      });
      expect(t.store.sessions.has(await startedSessionId(res))).toBe(true);
    });

    it("advances on an answer and replays a repeated one", async () => {
      const sessionId = await startedSessionId(
        await t.request("POST", "/api/v1/sessions/adaptive", { body: { userId: "user-1" } }),
      );
      const path = `/api/v1/sessions/adaptive/${sessionId}/responses`;

      const first = await t.request("POST", path, { body: { itemId: "medium", isCorrect: true } });
      expect(first.status).toBe(200);
      expect(await first.json()).toMatchObject({
        sessionId,
        nextItem: { id: "hard" },
        testComplete: false,
        itemsAdministered: 1,
        replayed: false,
      });

      const again = await t.request("POST", path, { body: { itemId: "medium", isCorrect: true } });
      expect(again.status).toBe(200);
      expect(await again.json()).toMatchObject({ itemsAdministered: 1, replayed: true });
      expect(t.store.responses).toHaveLength(1);
    });

    it("refuses an item that is not the current one", async () => {
      const sessionId = await startedSessionId(
        await t.request("POST", "/api/v1/sessions/adaptive", { body: { userId: "user-1" } }),
      );

      const res = await t.request("POST", `/api/v1/sessions/adaptive/${sessionId}/responses`, {
        body: { itemId: "easy", isCorrect: false },
      });

      expect(res.status).toBe(409);
      expect(await res.json()).toMatchObject({
        code: "CONFLICTING_STATE",
        details: { currentItemId: "medium" },
      });
    });

    it("abandons a session", async () => {
      const sessionId = await startedSessionId(
        await t.request("POST", "/api/v1/sessions/adaptive", { body: { userId: "user-1" } }),
      );

      const res = await t.request("POST", `/api/v1/sessions/adaptive/${sessionId}/abandon`);

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        session: { id: sessionId, status: "abandoned", completedAt: null },
      });
    });

    it("returns 404 for an unknown session", async () => {
      const res = await t.request("POST", "/api/v1/sessions/adaptive/missing/responses", {
        body: { itemId: "medium", isCorrect: true },
      });

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({
        error: "session missing not found",
        code: "NOT_FOUND",
        status: 404,
        details: { entity: "session", id: "missing" },
      });
    });

    it("validates the body", async () => {
      const res = await t.request("POST", "/api/v1/sessions/adaptive", { body: { userId: "" } });

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({
        code: "VALIDATION_FAILED",
        details: { issues: [{ path: "userId" }] },
      });
    });
  });

  describe("fixed form", () => {
    beforeEach(() => {
      for (const item of [
        makeItem({ id: "e1", difficultyLevel: "easy", questionType: "logic", discrimination: 0.5 }),
        makeItem({ id: "m1", difficultyLevel: "medium", questionType: "math", discrimination: 0.4 }),
        makeItem({ id: "m2", difficultyLevel: "medium", questionType: "math", discrimination: 0.35 }),
        makeItem({ id: "h1", difficultyLevel: "hard", questionType: "verbal", discrimination: 0.45 }),
      ]) {
        t.store.items.set(item.id, item);
      }
    });

    it("composes a form and scores the submission", async () => {
      const start = await t.request("POST", "/api/v1/sessions/fixed", {
        body: { userId: "user-2", totalItems: 4 },
      });
      expect(start.status).toBe(201);
      expect(await start.clone().json()).toMatchObject({
        session: { mode: "fixed", status: "in_progress" },
        items: [{ id: "e1" }, { id: "m1" }, { id: "m2" }, { id: "h1" }],
        targets: { easy: 1, medium: 2, hard: 1 },
      });
      const sessionId = await startedSessionId(start);

      const res = await t.request("POST", `/api/v1/sessions/fixed/${sessionId}/submit`, {
        body: {
          responses: [
            { itemId: "e1", isCorrect: true },
            { itemId: "m1", isCorrect: true },
            { itemId: "m2", isCorrect: true },
            { itemId: "h1", isCorrect: false },
          ],
        },
      });

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        sessionId,
        score: 108,
        confidenceInterval: null,
        result: { percentile: 70.3, correctAnswers: 3, totalQuestions: 4 },
      });
    });

    it("rejects an empty submission", async () => {
      const res = await t.request("POST", "/api/v1/sessions/fixed/any/submit", { body: { responses: [] } });
      expect(res.status).toBe(400);
    });

    it("rejects a second submission", async () => {
      const sessionId = await startedSessionId(
        await t.request("POST", "/api/v1/sessions/fixed", { body: { userId: "user-2", totalItems: 4 } }),
      );
      const body = { responses: [{ itemId: "e1", isCorrect: true }] };

      await t.request("POST", `/api/v1/sessions/fixed/${sessionId}/submit`, { body });
      const res = await t.request("POST", `/api/v1/sessions/fixed/${sessionId}/submit`, { body });

      expect(res.status).toBe(409);
      expect(await res.json()).toMatchObject({ code: "CONFLICTING_STATE", details: { status: "completed" } });
    });
  });

  it("answers unknown routes with a JSON 404", async () => {
    const res = await t.request("GET", "/api/v1/nothing-here");
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({
      error: "Route GET /api/v1/nothing-here not found",
      code: "NOT_FOUND",
      status: 404,
    });
  });
});
