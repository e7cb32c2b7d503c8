import "dotenv/config";
import { z } from "zod";
import { ConfigError } from "./errors.js";

function booleanFlag(defaultValue: boolean) {
  return z.preprocess((value) => {
    if (value === undefined || value === null || value === "") {
      return defaultValue;
    }

    if (typeof value === "boolean") {
      return value;
    }

    if (typeof value === "string") {
      const normalized = value.trim().toLowerCase();
      if (["1", "true", "yes", "on"].includes(normalized)) {
        return true;
      }
      if (["0", "false", "no", "off"].includes(normalized)) {
        return false;
      }
    }

    return value;
  }, z.boolean());
}

function optionalString() {
  return z.preprocess((value) => {
    if (typeof value === "string" && value.trim() === "") {
      return undefined;
    }
    return value;
  }, z.string().optional());
}

const EnvSchema = z.object({
  GPT_API_KEY: optionalString(),
  MODEL_NAME: z.string().default("gpt-5.2"),
  MODEL_API_URL: z.string().url().default("https://api.openai.com/v1/chat/completions"),
  MODEL_MAX_OUTPUT_TOKENS: z.coerce.number().int().positive().default(16000),
  MODEL_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.7),
  MODEL_TIMEOUT_MS: z.coerce.number().int().positive().default(300_000),
  MODEL_RETRY_COUNT: z.coerce.number().int().min(0).default(3),
  MODEL_RETRY_BACKOFF_MS: z.coerce.number().int().positive().default(1000),
  MODEL_TLS_INSECURE_FALLBACK: booleanFlag(true),
  STORE_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  STORE_INSERT_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  SUPABASE_URL: optionalString(),
  SUPABASE_SERVICE_ROLE_KEY: optionalString(),
  SITE_URL: optionalString(),
  REVALIDATE_SECRET: optionalString(),
  HR_SUPABASE_URL: optionalString(),
  HR_SUPABASE_SERVICE_ROLE_KEY: optionalString(),
  HR_SITE_URL: optionalString(),
  HR_REVALIDATE_SECRET: optionalString(),
  TELEGRAM_BOT_TOKEN: optionalString(),
  ADMIN_CHAT_ID: optionalString(),
  TOPICS_DIR: z.string().default("."),
  OUTPUT_DIR: z.string().default("./generated"),
  REPORTS_DIR: z.string().default("./reports"),
  PROMPT_DIR: z.string().default("./apps/producer/prompts"),
  BATCH_DELAY_SECONDS: z.coerce.number().int().min(0).default(30),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
});

export type AppEnv = z.infer<typeof EnvSchema>;

export type CredentialKey =
  | "SUPABASE_URL"
  | "SUPABASE_SERVICE_ROLE_KEY"
  | "SITE_URL"
  | "REVALIDATE_SECRET"
  | "HR_SUPABASE_URL"
  | "HR_SUPABASE_SERVICE_ROLE_KEY"
  | "HR_SITE_URL"
  | "HR_REVALIDATE_SECRET";

let cachedEnv: AppEnv | null = null;

export function parseEnv(source: Record<string, string | undefined>): AppEnv {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    throw new ConfigError(
      `Invalid environment variables: ${parsed.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join(", ")}`,
    );
  }
  return parsed.data;
}

export function getEnv(): AppEnv {
  if (cachedEnv) {
    return cachedEnv;
  }

  cachedEnv = parseEnv(process.env);
  return cachedEnv;
}

export function resetEnvForTests(): void {
  cachedEnv = null;
}
