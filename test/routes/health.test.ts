import Fastify from "fastify";
import { describe, expect, it } from "vitest";
import { registerHealthRoute } from "../../src/api/routes/health.js";
import { recordRoutingMethod, registerMetricsRoutes, registerRequestMetricsHooks } from "../../src/observability/metrics.js";

describe("registerHealthRoute", () => {
  it("returns ok status", async () => {
    const app = Fastify();
    try {
      await registerHealthRoute(app);

      const response = await app.inject({
        method: "GET",
        url: "/health"
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({ status: "ok" });
    } finally {
      await app.close();
    }
  });
});

describe("registerMetricsRoutes", () => {
  it("exposes the metrics snapshot and tags responses with the request id", async () => {
    const app = Fastify();
    try {
      registerRequestMetricsHooks(app);
      await registerHealthRoute(app);
      await registerMetricsRoutes(app);
      recordRoutingMethod("fused");

      const health = await app.inject({ method: "GET", url: "/health" });
      const response = await app.inject({ method: "GET", url: "/metrics" });

      expect(health.headers["x-request-id"]).toEqual(expect.any(String));
      expect(response.statusCode).toBe(200);
      expect(response.json()).toMatchObject({
        request_latency: { count: expect.any(Number) },
        routing_methods: { fused: 1 },
        envelope_statuses: {}
      });
    } finally {
      await app.close();
    }
  });
});
