import { Hono } from "hono";
import { errorMessage } from "../lib/errors.ts";

export interface HealthRouteDeps {
  storage: "memory" | "postgres";
  /** Round-trip to the storage backend; resolves when it is reachable */
  ping: () => Promise<void>;
}

/**
 * GET /health - liveness plus a storage round-trip
 *
 * Returns:
 * - status: "ok" or "degraded"
 * - uptime: milliseconds since the routes were created
 * - storage: { backend, connected, latency?, error? }
 * - timestamp: current ISO timestamp
 */
export function createHealthRoutes({ storage, ping }: HealthRouteDeps): Hono {
  const healthRoutes = new Hono();
  const serverStartTime = Date.now();

  healthRoutes.get("/", async (c) => {
    let connected = false;
    let latency: number | undefined;
    let storageError: string | undefined;

    try {
      const checkStart = Date.now();
      await ping();
      latency = Date.now() - checkStart;
      connected = true;
    } catch (err) {
      storageError = errorMessage(err);
    }

    return c.json({
      status: connected ? "ok" : "degraded",
      uptime: Date.now() - serverStartTime,
      storage: {
        backend: storage,
        connected,
        ...(latency !== undefined && { latency }),
        ...(storageError !== undefined && { error: storageError }),
      },
      timestamp: new Date().toISOString(),
    });
  });

  return healthRoutes;
}
