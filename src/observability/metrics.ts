import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";

interface LatencySummary {
  count: number;
  totalMs: number;
  minMs: number;
  maxMs: number;
}

interface MetricsState {
  requestLatency: LatencySummary;
  retrievalLatency: LatencySummary;
  generationLatency: LatencySummary;
  agentCallLatency: Record<string, LatencySummary>;
  routingMethods: Record<string, number>;
  envelopeStatuses: Record<string, number>;
  embeddingCacheEntries: number;
  errorRates: Record<string, number>;
}

const createLatencySummary = (): LatencySummary => ({
  count: 0,
  totalMs: 0,
  minMs: Number.POSITIVE_INFINITY,
  maxMs: 0
});

const createState = (): MetricsState => ({
  requestLatency: createLatencySummary(),
  retrievalLatency: createLatencySummary(),
  generationLatency: createLatencySummary(),
  agentCallLatency: {},
  routingMethods: {},
  envelopeStatuses: {},
  embeddingCacheEntries: 0,
  errorRates: {}
});

let state: MetricsState = createState();

const requestStartTimes = new WeakMap<FastifyRequest, number>();

const recordLatency = (summary: LatencySummary, durationMs: number): void => {
  const safeDuration = Number.isFinite(durationMs) ? Math.max(0, durationMs) : 0;
  summary.count += 1;
  summary.totalMs += safeDuration;
  summary.minMs = Math.min(summary.minMs, safeDuration);
  summary.maxMs = Math.max(summary.maxMs, safeDuration);
};

const increment = (counters: Record<string, number>, key: string): void => {
  counters[key] = (counters[key] ?? 0) + 1;
};

const roundTo2Decimals = (value: number): number => Math.round((value + Number.EPSILON) * 100) / 100;

const serializeLatency = (summary: LatencySummary): { count: number; avgMs: number; minMs: number; maxMs: number } => {
  if (summary.count === 0) {
    return { count: 0, avgMs: 0, minMs: 0, maxMs: 0 };
  }
  return {
    count: summary.count,
    avgMs: roundTo2Decimals(summary.totalMs / summary.count),
    minMs: roundTo2Decimals(summary.minMs),
    maxMs: roundTo2Decimals(summary.maxMs)
  };
};

export const recordRequestLatency = (durationMs: number): void => {
  recordLatency(state.requestLatency, durationMs);
};

export const recordRetrievalLatency = (durationMs: number): void => {
  recordLatency(state.retrievalLatency, durationMs);
};

export const recordGenerationLatency = (durationMs: number): void => {
  recordLatency(state.generationLatency, durationMs);
};

export const recordAgentCallLatency = (agentId: string, durationMs: number): void => {
  const summary = state.agentCallLatency[agentId] ?? createLatencySummary();
  state.agentCallLatency[agentId] = summary;
  recordLatency(summary, durationMs);
};

export const recordRoutingMethod = (method: string): void => {
  increment(state.routingMethods, method);
};

export const recordEnvelopeStatus = (status: string): void => {
  increment(state.envelopeStatuses, status);
};

export const recordEmbeddingCacheSize = (entries: number): void => {
  state.embeddingCacheEntries = entries;
};

export const recordErrorRate = (key: string): void => {
  increment(state.errorRates, key);
};

export const getMetricsSnapshot = (): Record<string, unknown> => ({
  request_latency: serializeLatency(state.requestLatency),
  retrieval_latency: serializeLatency(state.retrievalLatency),
  generation_latency: serializeLatency(state.generationLatency),
  agent_call_latency: Object.fromEntries(
    Object.entries(state.agentCallLatency).map(([agentId, summary]) => [agentId, serializeLatency(summary)])
  ),
  routing_methods: { ...state.routingMethods },
  envelope_statuses: { ...state.envelopeStatuses },
  embedding_cache_entries: state.embeddingCacheEntries,
  error_rates: { ...state.errorRates }
});

export const resetMetrics = (): void => {
  state = createState();
};

export const registerMetricsRoutes = async (app: FastifyInstance): Promise<void> => {
  app.get("/metrics", async () => getMetricsSnapshot());
};

export const registerRequestMetricsHooks = (app: FastifyInstance): void => {
  app.addHook("onRequest", async (request: FastifyRequest, reply: FastifyReply) => {
    requestStartTimes.set(request, Date.now());
    reply.header("x-request-id", request.id);
  });

  app.addHook("onResponse", async (request: FastifyRequest, reply: FastifyReply) => {
    const startedAt = requestStartTimes.get(request) ?? Date.now();
    requestStartTimes.delete(request);
    recordRequestLatency(Date.now() - startedAt);
    if (reply.statusCode >= 400) {
      recordErrorRate(`http_${reply.statusCode}`);
    }
  });

  app.addHook("onError", async (_request, reply) => {
    recordErrorRate(`http_${reply.statusCode || 500}`);
  });
};
