import { Hono } from "hono";
import type { Engine } from "./engine.ts";
import { globalErrorHandler, notFoundHandler } from "./middleware/error-handler.ts";
import { createAdminRoutes } from "./routes/admin.ts";
import { createHealthRoutes, type HealthRouteDeps } from "./routes/health.ts";
import { createSessionRoutes } from "./routes/sessions.ts";

export interface AppDeps {
  engine: Engine;
  adminPassword: string;
  health: HealthRouteDeps;
}

export function createApp({ engine, adminPassword, health }: AppDeps): Hono {
  const app = new Hono();

  app.onError(globalErrorHandler);
  app.notFound(notFoundHandler);

  // Health check (public)
  app.route("/health", createHealthRoutes(health));

  // Test sessions
  app.route("/api/v1/sessions", createSessionRoutes({ engine }));

  // Admin routes (X-Admin-Password)
  app.route("/api/v1/admin", createAdminRoutes({ engine, adminPassword }));

  return app;
}
