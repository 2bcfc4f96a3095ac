import { Pool } from "pg";
import { config } from "../config/index.js";

type HealthStatus = "ok" | "error" | "disabled";

export interface PostgresSingleton {
  pool: Pool;
  healthCheck: () => Promise<{ status: HealthStatus; details?: string }>;
}

const STARTUP_RETRIES = 3;
const STARTUP_RETRY_DELAY_MS = 250;
const CONNECT_TIMEOUT_MS = 5000;

let singleton: PostgresSingleton | null = null;
let initPromise: Promise<PostgresSingleton> | null = null;

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

async function withRetries<T>(operation: () => Promise<T>): Promise<T> {
  let lastError: unknown;

  for (let attempt = 1; attempt <= STARTUP_RETRIES; attempt += 1) {
    try {
      return await operation();
    } catch (error) {
      lastError = error;
      if (attempt < STARTUP_RETRIES) {
        await delay(STARTUP_RETRY_DELAY_MS * attempt);
      }
    }
  }

  throw lastError;
}

export function isPostgresConfigured(): boolean {
  return config.POSTGRES_URL !== undefined;
}

async function initialize(): Promise<PostgresSingleton> {
  const connectionString = config.POSTGRES_URL;
  if (!connectionString) {
    throw new Error("POSTGRES_URL is not set; the agent registry collection is unavailable.");
  }

  const pool = new Pool({
    connectionString,
    max: 5,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: CONNECT_TIMEOUT_MS
  });

  await withRetries(async () => {
    await pool.query("SELECT 1");
  });

  console.info("[clients/postgres] initialized singleton");

  return {
    pool,
    async healthCheck() {
      try {
        await pool.query("SELECT 1");
        return { status: "ok" };
      } catch (error) {
        const details = error instanceof Error ? error.message : "unknown error";
        return { status: "error", details };
      }
    }
  };
}

export async function getPostgresClient(): Promise<PostgresSingleton> {
  if (singleton) {
    return singleton;
  }

  if (!initPromise) {
    initPromise = initialize().catch((error: unknown) => {
      initPromise = null;
      throw error;
    });
  }

  singleton = await initPromise;
  return singleton;
}

export async function shutdownPostgresClient(): Promise<void> {
  if (!singleton) {
    return;
  }

  await singleton.pool.end();
  singleton = null;
  initPromise = null;
  console.info("[clients/postgres] shutdown complete");
}

export function resetPostgresClientForTests(): void {
  singleton = null;
  initPromise = null;
}
