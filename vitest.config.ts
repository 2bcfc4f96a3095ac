import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["test/**/*.test.ts", "tests/**/*.test.ts"],
    setupFiles: ["test/setup/unit.ts"],
    env: {
      OPENAI_API_KEY: "test-key",
      LOG_LEVEL: "error",
      AGENT_AUTH_MODE: "none"
    },
    restoreMocks: true,
    mockReset: true,
    clearMocks: true,
    unstubEnvs: true,
    fileParallelism: false,
    pool: "threads",
    poolOptions: {
      threads: {
        singleThread: true
      }
    },
    coverage: {
      provider: "v8",
      all: true,
      reporter: ["text", "json-summary"],
      include: ["src/**/*.ts"],
      exclude: ["src/**/*.d.ts", "src/**/types.ts"],
      thresholds: {
        functions: 90,
        lines: 85,
        statements: 85,
        branches: 80
      }
    }
  }
});
