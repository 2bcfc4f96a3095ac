import fs from "node:fs";
import path from "node:path";
import { z } from "zod";

export function parseDotEnvLine(line: string): [string, string] | null {
  const trimmed = line.trim();
  if (!trimmed || trimmed.startsWith("#")) {
    return null;
  }

  const separatorIndex = trimmed.indexOf("=");
  if (separatorIndex <= 0) {
    return null;
  }

  const key = trimmed.slice(0, separatorIndex).trim();
  let value = trimmed.slice(separatorIndex + 1).trim();

  if (
    (value.startsWith('"') && value.endsWith('"')) ||
    (value.startsWith("'") && value.endsWith("'"))
  ) {
    value = value.slice(1, -1);
  }

  return [key, value];
}

export interface LoadModeEnvFileOptions {
  cwd?: string;
  processEnv?: NodeJS.ProcessEnv;
  existsSync?: (filePath: string) => boolean;
  readFileSync?: (filePath: string, encoding: "utf8") => string;
}

/**
 * Loads `.env.<mode>` from the working directory without overriding
 * variables that are already set in the process environment.
 */
export function loadModeEnvFile(options: LoadModeEnvFileOptions = {}): string | null {
  const cwd = options.cwd ?? process.cwd();
  const processEnv = options.processEnv ?? process.env;
  const existsSync: (filePath: string) => boolean = options.existsSync ?? fs.existsSync;
  const readFileSync: (filePath: string, encoding: "utf8") => string = options.readFileSync ?? fs.readFileSync;
  const protectedKeys = new Set(
    Object.keys(processEnv).filter((key) => processEnv[key] !== undefined)
  );
  const rawMode = processEnv.APP_MODE?.trim().toLowerCase();
  const explicitMode = rawMode === "local" || rawMode === "prod" ? rawMode : undefined;

  const modeCandidates = explicitMode ? [explicitMode] : ["local", "prod"];
  const envFilePath = modeCandidates
    .map((mode) => path.join(cwd, `.env.${mode}`))
    .find((candidate) => existsSync(candidate));
  if (!envFilePath) {
    return null;
  }

  const content = readFileSync(envFilePath, "utf8");
  for (const line of content.split(/\r?\n/)) {
    const entry = parseDotEnvLine(line);
    if (!entry) {
      continue;
    }
    const [key, value] = entry;
    if (protectedKeys.has(key)) {
      continue;
    }
    processEnv[key] = value;
  }
  return envFilePath;
}

loadModeEnvFile();

const runtimeModeSchema = z.enum(["prod", "local"]);
const agentAuthModeSchema = z.enum(["none", "static", "metadata"]);
const booleanFlagSchema = z
  .union([z.boolean(), z.string()])
  .transform((value) => {
    if (typeof value === "boolean") {
      return value;
    }
    const normalized = value.trim().toLowerCase();
    return normalized === "1" || normalized === "true" || normalized === "yes" || normalized === "on";
  });
const optionalStringSchema = z
  .string()
  .optional()
  .transform((value) => (value && value.trim().length > 0 ? value.trim() : undefined));
const unitIntervalSchema = z.coerce.number().min(0).max(1);

export const envSchema = z.object({
  APP_MODE: runtimeModeSchema.default("prod"),
  PORT: z.coerce.number().int().positive().default(8080),
  FRONTEND_ORIGIN: z.string().min(1).default("http://localhost:5173"),
  ENABLE_INFRA_BOOTSTRAP: booleanFlagSchema.default(false),
  LOG_LEVEL: z.enum(["trace", "debug", "info", "warn", "error"]).default("info"),
  OPENAI_API_KEY: z.string().min(1, "OPENAI_API_KEY is required"),
  OPENAI_CHAT_MODEL: z.string().min(1).default("gpt-4o-mini"),
  OPENAI_CLASSIFIER_MODEL: z.string().min(1).default("gpt-4o-mini"),
  OPENAI_EMBEDDING_MODEL: z.string().min(1).default("text-embedding-3-small"),
  POSTGRES_URL: optionalStringSchema,
  AGENT_REGISTRY_FILE: z.string().min(1).default("config/agents.json"),
  AGENT_AUTH_MODE: agentAuthModeSchema.default("none"),
  AGENT_BEARER_TOKEN: optionalStringSchema,
  IDENTITY_TOKEN_URL: z
    .string()
    .url()
    .default("http://metadata.google.internal/computeMetadata/v1/instance/service-accounts/default/identity"),
  DOCUMENT_STORE_DIR: z.string().min(1).default("data/documents"),
  DOCUMENT_PREFIX: z.string().default(""),
  CORPUS_TTL_SECONDS: z.coerce.number().int().nonnegative().default(3600),
  RETRIEVAL_TOP_K: z.coerce.number().int().positive().default(3),
  RETRIEVAL_MIN_SCORE: unitIntervalSchema.default(0.3),
  CONTEXT_MAX_CHARS: z.coerce.number().int().positive().default(3000),
  ROUTER_GOOD_THRESHOLD: unitIntervalSchema.default(0.8),
  ROUTER_KEYWORD_WEIGHT: unitIntervalSchema.default(0.8),
  INVOKER_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  INVOKER_MAX_RETRIES: z.coerce.number().int().nonnegative().default(3),
  INVOKER_BACKOFF_BASE_MS: z.coerce.number().int().nonnegative().default(750),
  REQUEST_DEADLINE_MS: z.coerce.number().int().positive().default(90_000)
}).superRefine((value, ctx) => {
  if (value.AGENT_AUTH_MODE === "static" && !value.AGENT_BEARER_TOKEN) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["AGENT_BEARER_TOKEN"],
      message: "AGENT_BEARER_TOKEN is required when AGENT_AUTH_MODE=static"
    });
  }
});

export type Env = z.infer<typeof envSchema>;

export function parseEnv(rawEnv: NodeJS.ProcessEnv): Env {
  const parsed = envSchema.safeParse(rawEnv);

  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `- ${issue.path.join(".") || "env"}: ${issue.message}`)
      .join("\n");
    throw new Error(`Invalid environment configuration:\n${details}`);
  }

  return parsed.data;
}

export const env: Env = parseEnv(process.env);
