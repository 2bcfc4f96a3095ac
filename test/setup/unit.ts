import { afterEach, beforeEach, vi } from "vitest";
import { resetClientLifecycleStateForTests } from "../../src/clients/lifecycle.js";
import { resetOpenAIClientForTests } from "../../src/clients/openai.js";
import { resetPostgresClientForTests } from "../../src/clients/postgres.js";
import { resetMetrics } from "../../src/observability/metrics.js";

const ENV_SNAPSHOT = { ...process.env };

beforeEach(() => {
  vi.restoreAllMocks();
  vi.unstubAllEnvs();
});

afterEach(async () => {
  for (const key of Object.keys(process.env)) {
    if (!(key in ENV_SNAPSHOT)) {
      delete process.env[key];
    }
  }

  for (const [key, value] of Object.entries(ENV_SNAPSHOT)) {
    process.env[key] = value;
  }

  resetOpenAIClientForTests();
  resetPostgresClientForTests();
  // Loaded lazily so test files can mock its dependencies (e.g. clients/postgres) before it binds them.
  const { resetEngineForTests } = await import("../../src/modules/engine.js");
  resetEngineForTests();
  resetClientLifecycleStateForTests();
  resetMetrics();
});
