import { z } from "zod";
import { ConfigError } from "./errors.js";

const requiredString = (name: string) =>
  z
    .string({ required_error: `${name} is required.` })
    .trim()
    .min(1, `${name} is required.`);

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const positiveInt = (fallback: number, min: number) =>
  z
    .string()
    .trim()
    .optional()
    .transform((value, ctx) => {
      if (!value) {
        return fallback;
      }
      const parsed = Number(value);
      if (!Number.isInteger(parsed) || parsed < min) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `must be an integer >= ${min}` });
        return z.NEVER;
      }
      return parsed;
    });

const baseEnvSchema = z.object({
  OPENAI_API_KEY: requiredString("OPENAI_API_KEY"),
  OPENAI_MODEL: optionalString.transform((value) => value ?? "gpt-4.1-mini"),
  OPENAI_BASE_URL: optionalString.transform((value) => value ?? "https://api.openai.com/v1"),
  GITHUB_TOKEN: requiredString("GITHUB_TOKEN"),
  GITHUB_API_URL: optionalString.transform((value) => value ?? "https://api.github.com"),
  HEROKU_API_KEY: requiredString("HEROKU_API_KEY"),
  HEROKU_API_URL: optionalString.transform((value) => value ?? "https://api.heroku.com"),
  AUX_WEBHOOK_URL: requiredString("AUX_WEBHOOK_URL").url("AUX_WEBHOOK_URL must be a URL."),
  DEFAULT_REPO_NAME: optionalString.transform((value) => value ?? "generated-streamlit-app"),
  UNMAPPED_IMPORT_POLICY: z
    .enum(["drop", "passthrough"])
    .optional()
    .transform((value) => value ?? "drop"),
  CI_TRIGGER: z
    .enum(["dispatch", "recommit"])
    .optional()
    .transform((value) => value ?? "dispatch"),
  DEPLOY_POLL_INTERVAL_MS: positiveInt(10_000, 100),
  DEPLOY_POLL_TIMEOUT_MS: positiveInt(600_000, 0),
  PORT: positiveInt(3000, 1),
  SESSION_TTL_MS: positiveInt(3_600_000, 1_000),
  SESSION_MAX_ENTRIES: positiveInt(500, 1),
  CORS_ALLOWED_ORIGINS: optionalString,
  LEDGER_DRIVER: z
    .enum(["airtable", "postgres"])
    .optional()
    .transform((value) => value ?? "airtable"),
  AIRTABLE_API_KEY: optionalString,
  AIRTABLE_BASE_ID: optionalString,
  AIRTABLE_TABLE_NAME: optionalString,
  AIRTABLE_API_URL: optionalString.transform((value) => value ?? "https://api.airtable.com"),
  DATABASE_URL: optionalString
});

type Env = z.infer<typeof baseEnvSchema>;

export type LedgerConfig =
  | { driver: "airtable"; apiKey: string; baseId: string; tableName: string; apiUrl: string }
  | { driver: "postgres"; databaseUrl: string };

export interface AppConfig {
  openai: { apiKey: string; model: string; baseUrl: string };
  github: { token: string; apiUrl: string };
  heroku: { apiKey: string; apiUrl: string };
  webhookUrl: string;
  defaultRepoName: string;
  unmappedImportPolicy: "drop" | "passthrough";
  ciTrigger: "dispatch" | "recommit";
  deployPoll: { intervalMs: number; timeoutMs: number };
  port: number;
  sessions: { ttlMs: number; maxEntries: number };
  corsAllowedOrigins: string[];
  ledger: LedgerConfig;
}

function resolveLedger(env: Env, issues: string[]): LedgerConfig | null {
  if (env.LEDGER_DRIVER === "postgres") {
    if (!env.DATABASE_URL) {
      issues.push("DATABASE_URL is required when LEDGER_DRIVER=postgres.");
      return null;
    }
    return { driver: "postgres", databaseUrl: env.DATABASE_URL };
  }

  const missing = (["AIRTABLE_API_KEY", "AIRTABLE_BASE_ID", "AIRTABLE_TABLE_NAME"] as const).filter((key) => !env[key]);
  for (const key of missing) {
    issues.push(`${key} is required when LEDGER_DRIVER=airtable.`);
  }
  if (!env.AIRTABLE_API_KEY || !env.AIRTABLE_BASE_ID || !env.AIRTABLE_TABLE_NAME) {
    return null;
  }

  return {
    driver: "airtable",
    apiKey: env.AIRTABLE_API_KEY,
    baseId: env.AIRTABLE_BASE_ID,
    tableName: env.AIRTABLE_TABLE_NAME,
    apiUrl: env.AIRTABLE_API_URL
  };
}

function parseOrigins(raw: string | undefined, issues: string[]): string[] {
  const origins = (raw || "")
    .split(",")
    .map((entry) => entry.trim())
    .filter(Boolean);

  if (origins.includes("*")) {
    issues.push("CORS_ALLOWED_ORIGINS cannot include '*'. Use explicit origins.");
  }

  return origins;
}

/**
 * Reads and validates the process environment. Every problem is collected so a
 * single failed start reports all of them.
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = baseEnvSchema.safeParse(source);

  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => {
        const key = issue.path.join(".");
        return issue.message.startsWith(key) ? issue.message : `${key}: ${issue.message}`;
      })
    );
  }

  const env = parsed.data;
  const issues: string[] = [];
  const ledger = resolveLedger(env, issues);
  const corsAllowedOrigins = parseOrigins(env.CORS_ALLOWED_ORIGINS, issues);

  if (issues.length > 0 || !ledger) {
    throw new ConfigError(issues);
  }

  return {
    openai: { apiKey: env.OPENAI_API_KEY, model: env.OPENAI_MODEL, baseUrl: env.OPENAI_BASE_URL.replace(/\/$/, "") },
    github: { token: env.GITHUB_TOKEN, apiUrl: env.GITHUB_API_URL.replace(/\/$/, "") },
    heroku: { apiKey: env.HEROKU_API_KEY, apiUrl: env.HEROKU_API_URL.replace(/\/$/, "") },
    webhookUrl: env.AUX_WEBHOOK_URL,
    defaultRepoName: env.DEFAULT_REPO_NAME,
    unmappedImportPolicy: env.UNMAPPED_IMPORT_POLICY,
    ciTrigger: env.CI_TRIGGER,
    deployPoll: { intervalMs: env.DEPLOY_POLL_INTERVAL_MS, timeoutMs: env.DEPLOY_POLL_TIMEOUT_MS },
    port: env.PORT,
    sessions: { ttlMs: env.SESSION_TTL_MS, maxEntries: env.SESSION_MAX_ENTRIES },
    corsAllowedOrigins,
    ledger
  };
}
