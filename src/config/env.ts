import { z } from "zod";

const envSchema = z.object({
  // Only read when STORAGE_BACKEND=postgres
  DATABASE_URL: z.string().default(""),
  ADMIN_PASSWORD: z.string().default(""),
  PORT: z.coerce.number().default(3000),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  STORAGE_BACKEND: z.enum(["memory", "postgres"]).default("memory"),

  // Psychometric tunables
  RELIABILITY_CACHE_TTL_SECONDS: z.coerce.number().int().positive().default(300),
  CAT_SE_THRESHOLD: z.coerce.number().positive().max(1).default(0.3),
  CAT_MAX_ITEMS: z.coerce.number().int().positive().default(15),
  INFORMATION_MODEL: z.enum(["1pl", "2pl", "3pl"]).default("2pl"),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Validate an environment record. Throws with one line per invalid variable.
 */
export function loadEnv(source: Record<string, string | undefined> = process.env): Env {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `  ${issue.path.join(".")}: ${issue.message}`)
      .join("\n");
    throw new Error(`Environment validation failed:\n${issues}`);
  }

  if (result.data.STORAGE_BACKEND === "postgres" && !result.data.DATABASE_URL) {
    throw new Error(
      "Environment validation failed:\n  DATABASE_URL: required when STORAGE_BACKEND=postgres",
    );
  }

  return result.data;
}

export const env = loadEnv();
