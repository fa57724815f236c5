import { serve } from "@hono/node-server";
import { sql } from "drizzle-orm";
import { createApp } from "./app.ts";
import { env } from "./config/env.ts";
import { createDb } from "./db/index.ts";
import { createEngine } from "./engine.ts";
import { createDrizzleRepositories } from "./repositories/drizzle.ts";
import { createMemoryRepositories } from "./repositories/memory.ts";
import type { Repositories } from "./repositories/types.ts";
import { logSystemEvent } from "./services/audit-log.ts";

interface Backend {
  repositories: Repositories;
  ping: () => Promise<void>;
}

function createBackend(): Backend {
  if (env.STORAGE_BACKEND === "postgres") {
    const { db } = createDb(env.DATABASE_URL);
    return {
      repositories: createDrizzleRepositories(db),
      ping: async () => {
        await db.execute(sql`SELECT 1`);
      },
    };
  }

  console.warn("[Startup] STORAGE_BACKEND=memory: data is lost on restart");
  return { repositories: createMemoryRepositories(), ping: async () => {} };
}

const backend = createBackend();

const engine = createEngine(backend.repositories, {
  reliabilityCacheTtlMs: env.RELIABILITY_CACHE_TTL_SECONDS * 1000,
  seThreshold: env.CAT_SE_THRESHOLD,
  maxItems: env.CAT_MAX_ITEMS,
  informationModel: env.INFORMATION_MODEL,
});

if (!env.ADMIN_PASSWORD) {
  console.warn("[Startup] ADMIN_PASSWORD is not set; admin routes will reject every request");
}

const app = createApp({
  engine,
  adminPassword: env.ADMIN_PASSWORD,
  health: { storage: env.STORAGE_BACKEND, ping: backend.ping },
});

// Start server
serve(
  {
    fetch: app.fetch,
    port: env.PORT,
  },
  (info) => {
    console.log(`Aptitude metrics API listening on port ${info.port}`);
    logSystemEvent("server_started", `API listening on port ${info.port}`, "info", {
      storage: env.STORAGE_BACKEND,
      informationModel: env.INFORMATION_MODEL,
    });
  },
);

export default app;
