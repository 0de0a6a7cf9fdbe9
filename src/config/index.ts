import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

const envSchema = z
  .object({
    NODE_ENV: z
      .enum(["development", "test", "production"])
      .default("development"),
    HTTP_HOST: z.string().default("0.0.0.0"),
    HTTP_PORT: z.coerce.number().int().positive().default(4700),
    HTTP_BODY_LIMIT: z.coerce.number().int().positive().default(1_048_576),
    LOG_LEVEL: z
      .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
      .default("info"),
    SERVICE_AUTH_TOKEN: z
      .string()
      .optional()
      .transform((value) =>
        value && value.trim().length > 0 ? value : undefined
      ),
    CATALOG_REPOSITORY_BACKEND: z.enum(["memory", "postgres"]).default("memory"),
    POSTGRES_DSN: z.string().optional(),
    REDIS_URL: z.string().url().optional(),
    CATALOG_EVENT_STREAM_KEY: z.string().default("catalog:events"),
    OTEL_SERVICE_NAME: z.string().default("catalog-identity-service"),
  })
  .refine(
    (env) =>
      env.CATALOG_REPOSITORY_BACKEND !== "postgres" || Boolean(env.POSTGRES_DSN),
    {
      message: "POSTGRES_DSN is required for the postgres backend",
      path: ["POSTGRES_DSN"],
    }
  );

export type Env = z.infer<typeof envSchema>;

let cachedConfig: Env | null = null;

export function loadConfig(): Env {
  if (cachedConfig) {
    return cachedConfig;
  }
  const parsed = envSchema.safeParse(process.env);
  if (!parsed.success) {
    const message = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Catalog configuration invalid: ${message}`);
  }
  cachedConfig = parsed.data;
  return cachedConfig;
}

export function resetConfigCache() {
  cachedConfig = null;
}
