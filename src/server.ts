import { fileURLToPath } from "node:url";
import { buildApp } from "./app.js";
import { config } from "./config/index.js";
import { getEngine } from "./modules/engine.js";
import { logInfo } from "./observability/logger.js";

export function resolvePort(rawPort: string | undefined, fallback: number = config.PORT): number {
  const parsed = Number.parseInt(rawPort ?? "", 10);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
}

export async function bootstrap(): Promise<void> {
  // Fail fast on a broken agent registry file instead of on the first request.
  const agents = await getEngine().registry.list();
  logInfo("server.registry.ready", {}, { agent_ids: agents.map((agent) => agent.id) });

  const app = await buildApp({ lifecycle: { enableBootstrap: config.ENABLE_INFRA_BOOTSTRAP } });
  await app.listen({
    host: "0.0.0.0",
    port: resolvePort(process.env.PORT)
  });
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  bootstrap().catch((error: unknown) => {
    console.error("Server startup failed", error);
    process.exitCode = 1;
  });
}
