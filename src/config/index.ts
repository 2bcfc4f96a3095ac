import { env } from "./env.js";

export type { Env } from "./env.js";
export { envSchema, parseEnv } from "./env.js";
export { env };

export type Config = Readonly<typeof env>;
export const config: Config = Object.freeze({ ...env });

export interface RetrievalSettings {
  corpusTtlMs: number;
  topK: number;
  minScore: number;
  contextMaxChars: number;
}

export interface RoutingSettings {
  goodThreshold: number;
  keywordWeight: number;
}

export interface InvokerSettings {
  timeoutMs: number;
  maxRetries: number;
  backoffBaseMs: number;
}

export const toRetrievalSettings = (source: Config): RetrievalSettings => ({
  corpusTtlMs: source.CORPUS_TTL_SECONDS * 1000,
  topK: source.RETRIEVAL_TOP_K,
  minScore: source.RETRIEVAL_MIN_SCORE,
  contextMaxChars: source.CONTEXT_MAX_CHARS
});

export const toRoutingSettings = (source: Config): RoutingSettings => ({
  goodThreshold: source.ROUTER_GOOD_THRESHOLD,
  keywordWeight: source.ROUTER_KEYWORD_WEIGHT
});

export const toInvokerSettings = (source: Config): InvokerSettings => ({
  timeoutMs: source.INVOKER_TIMEOUT_MS,
  maxRetries: source.INVOKER_MAX_RETRIES,
  backoffBaseMs: source.INVOKER_BACKOFF_BASE_MS
});
