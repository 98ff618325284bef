import { z } from "zod";

/**
 * Runtime configuration, read once from the environment.
 * Without DATABASE_URL or OBJECT_STORAGE_BUCKET the server falls back to
 * in-memory storage, which is what local development and tests use.
 */
const envSchema = z.object({
  NODE_ENV: z.string().default("development"),
  PORT: z.coerce.number().int().positive().default(5000),
  DATABASE_URL: z.string().optional(),

  CLASSIFIER_API_URL: z.string().url().default("http://127.0.0.1:8001"),
  CLASSIFIER_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),

  IDENTIFIER_API_KEY: z.string().optional(),
  GEMINI_API_KEY: z.string().optional(),
  IDENTIFIER_BASE_URL: z.string().url().default("https://generativelanguage.googleapis.com/v1beta/openai/"),
  IDENTIFIER_MODEL: z.string().default("gemini-2.5-flash"),
  IDENTIFIER_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),

  IMAGE_GEN_API_KEY: z.string().optional(),
  OPENAI_API_KEY: z.string().optional(),
  IMAGE_GEN_MODEL: z.string().default("gpt-image-1"),
  // Three attempts of this plus backoff must fit in SIMULATION_JOB_TIMEOUT_MS
  IMAGE_GEN_TIMEOUT_MS: z.coerce.number().int().positive().default(90_000),

  OBJECT_STORAGE_BUCKET: z.string().optional(),
  OBJECT_STORAGE_PUBLIC_URL: z.string().optional(),

  SIMULATION_JOB_TIMEOUT_MS: z.coerce.number().int().positive().default(300_000),
  SIMULATION_JOB_ATTEMPTS: z.coerce.number().int().min(1).default(2),
  SIMULATION_CONCURRENCY: z.coerce.number().int().min(1).default(2),
});

export interface AppConfig {
  env: string;
  port: number;
  databaseUrl?: string;
  classifier: { baseUrl: string; timeoutMs: number };
  identifier: { apiKey?: string; baseUrl: string; model: string; timeoutMs: number };
  imageGeneration: { apiKey?: string; model: string; timeoutMs: number };
  objectStorage: { bucket?: string; publicUrl?: string };
  simulation: { jobTimeoutMs: number; jobAttempts: number; concurrency: number };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);
  return {
    env: parsed.NODE_ENV,
    port: parsed.PORT,
    databaseUrl: parsed.DATABASE_URL || undefined,
    classifier: {
      baseUrl: parsed.CLASSIFIER_API_URL.replace(/\/+$/, ""),
      timeoutMs: parsed.CLASSIFIER_TIMEOUT_MS,
    },
    identifier: {
      apiKey: parsed.IDENTIFIER_API_KEY || parsed.GEMINI_API_KEY,
      baseUrl: parsed.IDENTIFIER_BASE_URL,
      model: parsed.IDENTIFIER_MODEL,
      timeoutMs: parsed.IDENTIFIER_TIMEOUT_MS,
    },
    imageGeneration: {
      apiKey: parsed.IMAGE_GEN_API_KEY || parsed.OPENAI_API_KEY,
      model: parsed.IMAGE_GEN_MODEL,
      timeoutMs: parsed.IMAGE_GEN_TIMEOUT_MS,
    },
    objectStorage: {
      bucket: parsed.OBJECT_STORAGE_BUCKET || undefined,
      publicUrl: parsed.OBJECT_STORAGE_PUBLIC_URL || undefined,
    },
    simulation: {
      jobTimeoutMs: parsed.SIMULATION_JOB_TIMEOUT_MS,
      jobAttempts: parsed.SIMULATION_JOB_ATTEMPTS,
      concurrency: parsed.SIMULATION_CONCURRENCY,
    },
  };
}
