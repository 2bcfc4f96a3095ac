import { afterEach, describe, expect, it, vi } from "vitest";
import {
  isLogLevelEnabled,
  logError,
  logInfo,
  logWarn,
  parseLogLevel,
  serializeError
} from "../../src/observability/logger.js";
import {
  getMetricsSnapshot,
  recordAgentCallLatency,
  recordEmbeddingCacheSize,
  recordEnvelopeStatus,
  recordErrorRate,
  recordRetrievalLatency,
  recordRoutingMethod
} from "../../src/observability/metrics.js";
import { AgentAuthError } from "../../src/modules/errors.js";

describe("observability/logger", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("parses log levels and falls back to info", () => {
    expect(parseLogLevel(" WARN ")).toBe("warn");
    expect(parseLogLevel("verbose")).toBe("info");
    expect(parseLogLevel(undefined)).toBe("info");
  });

  it("honours the configured threshold", () => {
    expect(isLogLevelEnabled("error")).toBe(true);
    expect(isLogLevelEnabled("info")).toBe(false);
  });

  it("writes one JSON line with correlation ids", () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2026-03-01T10:00:00.000Z"));
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    const infoSpy = vi.spyOn(console, "info").mockImplementation(() => {});
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => {});

    logError("orchestration.error", { requestId: "req-1", agentId: "fiscalite" }, { kind: "agent_auth" });
    logInfo("orchestration.complete", { requestId: "req-1" });
    logWarn("agents.response.malformed", {});

    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(errorSpy.mock.calls[0]?.[0]))).toEqual({
      ts: "2026-03-01T10:00:00.000Z",
      level: "error",
      event: "orchestration.error",
      request_id: "req-1",
      agent_id: "fiscalite",
      kind: "agent_auth"
    });
    expect(infoSpy).not.toHaveBeenCalled();
    expect(warnSpy).not.toHaveBeenCalled();
  });

  it("serializes errors with their kind", () => {
    expect(serializeError(new AgentAuthError("aides", 401))).toEqual({
      name: "AgentAuthError",
      message: new AgentAuthError("aides", 401).message,
      kind: "agent_auth"
    });
    expect(serializeError("plain")).toEqual({ message: "plain" });
  });
});

describe("observability/metrics", () => {
  it("aggregates latencies and counters", () => {
    recordRetrievalLatency(10);
    recordRetrievalLatency(21);
    recordAgentCallLatency("fiscalite", 120);
    recordRoutingMethod("rules");
    recordRoutingMethod("rules");
    recordRoutingMethod("llm");
    recordEnvelopeStatus("answered");
    recordErrorRate("orchestration_agent_auth");
    recordEmbeddingCacheSize(42);

    expect(getMetricsSnapshot()).toEqual({
      request_latency: { count: 0, avgMs: 0, minMs: 0, maxMs: 0 },
      retrieval_latency: { count: 2, avgMs: 15.5, minMs: 10, maxMs: 21 },
      generation_latency: { count: 0, avgMs: 0, minMs: 0, maxMs: 0 },
      agent_call_latency: { fiscalite: { count: 1, avgMs: 120, minMs: 120, maxMs: 120 } },
      routing_methods: { rules: 2, llm: 1 },
      envelope_statuses: { answered: 1 },
      embedding_cache_entries: 42,
      error_rates: { orchestration_agent_auth: 1 }
    });
  });

  it("clamps negative durations to zero", () => {
    recordRetrievalLatency(-5);

    expect(getMetricsSnapshot().retrieval_latency).toEqual({ count: 1, avgMs: 0, minMs: 0, maxMs: 0 });
  });
});
