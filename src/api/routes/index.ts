import type { FastifyInstance } from "fastify";
import { registerAskRoutes, type AskRoutesDependencies } from "./ask.js";
import { registerResponderRoutes, type ResponderRoutesDependencies } from "./responder.js";

export interface ApiRoutesDependencies {
  ask?: AskRoutesDependencies;
  responder?: ResponderRoutesDependencies;
}

export async function registerApiRoutes(app: FastifyInstance, dependencies?: ApiRoutesDependencies): Promise<void> {
  await registerAskRoutes(app, dependencies?.ask);
  await registerResponderRoutes(app, dependencies?.responder);
}
