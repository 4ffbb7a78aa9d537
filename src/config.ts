import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

const envSchema = z.object({
  DATABASE_URL: z.string().default("postgres://localhost/moderation"),
  TRANSLATION_URL: z.string().url().default("http://api-translation-service:7000"),
  SCORING_URL: z.string().url().default("http://api-scoring-service:8000"),
  TRANSLATION_ENABLED: booleanFlag.default("true"),
  TARGET_LANGUAGE: z.string().trim().toLowerCase().min(1).default("en"),
  TRANSLATE_UNKNOWN_LANGUAGE: booleanFlag.default("true"),
  WORKER_CONCURRENCY: z.coerce.number().int().min(1).default(4),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  RETRY_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(3),
  RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(200),
  RETRY_MAX_DELAY_MS: z.coerce.number().int().min(0).default(5000),
  AGGREGATION_RULE: z.enum(["sum", "average", "max"]).default("average"),
  FLAG_THRESHOLD: z.coerce.number().default(0.5)
});

export type AppConfig = z.infer<typeof envSchema>;

export function parseConfig(env: NodeJS.ProcessEnv): AppConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    throw new Error(
      `Invalid environment configuration:\n${parsed.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("\n")}`
    );
  }

  return parsed.data;
}

export const config = parseConfig(process.env);
