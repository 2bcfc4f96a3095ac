import OpenAI from "openai";
import { config } from "../config/index.js";

type HealthStatus = "ok" | "error";

/** What each configured model is used for by this service. */
export type ModelRole = "chat" | "classifier" | "embedding";

export interface ModelHealth {
  role: ModelRole;
  model: string;
  status: HealthStatus;
  details?: string;
}

export interface OpenAIHealth {
  status: HealthStatus;
  models: ModelHealth[];
}

export interface OpenAISingleton {
  client: OpenAI;
  healthCheck: () => Promise<OpenAIHealth>;
}

const REQUEST_TIMEOUT_MS = 15_000;
const REQUEST_RETRIES = 2;
const HEALTH_CHECK_TIMEOUT_MS = 7000;
const HEALTH_CHECK_RETRIES = 1;

let singleton: OpenAISingleton | null = null;

export const configuredModels = (): Array<{ role: ModelRole; model: string }> => [
  { role: "chat", model: config.OPENAI_CHAT_MODEL },
  { role: "classifier", model: config.OPENAI_CLASSIFIER_MODEL },
  { role: "embedding", model: config.OPENAI_EMBEDDING_MODEL }
];

/** Looks every configured model up once; roles sharing a model share the lookup. */
async function checkModels(client: OpenAI): Promise<OpenAIHealth> {
  const lookups = new Map<string, Promise<{ status: HealthStatus; details?: string }>>();
  const lookup = (model: string) => {
    let pending = lookups.get(model);
    if (!pending) {
      pending = client.models
        .retrieve(model, { timeout: HEALTH_CHECK_TIMEOUT_MS, maxRetries: HEALTH_CHECK_RETRIES })
        .then(
          () => ({ status: "ok" as const }),
          (error: unknown) => ({
            status: "error" as const,
            details: error instanceof Error ? error.message : "unknown error"
          })
        );
      lookups.set(model, pending);
    }
    return pending;
  };

  const models = await Promise.all(
    configuredModels().map(async ({ role, model }) => ({ role, model, ...(await lookup(model)) }))
  );
  return {
    status: models.every((entry) => entry.status === "ok") ? "ok" : "error",
    models
  };
}

function initialize(): OpenAISingleton {
  const client = new OpenAI({
    apiKey: config.OPENAI_API_KEY,
    maxRetries: REQUEST_RETRIES,
    timeout: REQUEST_TIMEOUT_MS
  });

  console.info("[clients/openai] initialized singleton");

  return {
    client,
    healthCheck: () => checkModels(client)
  };
}

export async function getOpenAIClient(): Promise<OpenAISingleton> {
  if (!singleton) {
    singleton = initialize();
  }

  return singleton;
}

export async function shutdownOpenAIClient(): Promise<void> {
  if (!singleton) {
    return;
  }

  singleton = null;
  console.info("[clients/openai] shutdown complete");
}

export function resetOpenAIClientForTests(): void {
  singleton = null;
}
