import type { FastifyInstance } from "fastify";

export async function registerInfrastructureHealthRoute(app: FastifyInstance): Promise<void> {
  app.get("/infra/health", async (_request, reply) => {
    try {
      const [openaiModule, postgresModule] = await Promise.all([
        import("../../clients/openai.js"),
        import("../../clients/postgres.js")
      ]);

      const openai = await openaiModule.getOpenAIClient();
      const [openaiHealth, postgresHealth] = await Promise.all([
        openai.healthCheck(),
        postgresModule.isPostgresConfigured()
          ? postgresModule.getPostgresClient().then((postgres) => postgres.healthCheck())
          : Promise.resolve({ status: "disabled" as const })
      ]);

      const degraded = openaiHealth.status === "error" || postgresHealth.status === "error";
      if (degraded) {
        reply.code(503);
      }
      return {
        status: degraded ? "error" : "ok",
        clients: {
          openai: openaiHealth,
          postgres: postgresHealth
        }
      };
    } catch (error) {
      const detail = error instanceof Error ? error.message : "unknown error";
      reply.code(503);
      return {
        status: "error",
        detail
      };
    }
  });
}
