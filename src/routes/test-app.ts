/**
 * In-memory app for route tests.
 */

import { createApp } from "../app.ts";
import { createEngine, type Engine } from "../engine.ts";
import { createMemoryRepositories, createMemoryStore, type MemoryStore } from "../repositories/memory.ts";
import type { HealthRouteDeps } from "./health.ts";

export const ADMIN_PASSWORD = "test-secret";
export const NOW = new Date("2026-03-01T00:00:00.000Z");

export interface TestApp {
  store: MemoryStore;
  engine: Engine;
  request: (method: string, path: string, options?: { body?: unknown; headers?: Record<string, string> }) => Promise<Response>;
}

export function createTestApp(health: Partial<HealthRouteDeps> = {}): TestApp {
  const store = createMemoryStore();
  const engine = createEngine(createMemoryRepositories(store), { now: () => NOW });
  const app = createApp({
    engine,
    adminPassword: ADMIN_PASSWORD,
    health: { storage: "memory", ping: async () => {}, ...health },
  });

  const request: TestApp["request"] = async (method, path, options = {}) => {
    const headers: Record<string, string> = { ...options.headers };
    let body: string | undefined;
    if (options.body !== undefined) {
      body = typeof options.body === "string" ? options.body : JSON.stringify(options.body);
      headers["Content-Type"] = "application/json";
    }
    return app.request(path, { method, headers, body });
  };

  return { store, engine, request };
}
