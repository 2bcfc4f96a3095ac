import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { z } from "zod";
import { getEngine } from "../../modules/engine.js";
import type { GroundedResponder } from "../../modules/responder/grounded-responder.js";
import { logError, serializeError } from "../../observability/logger.js";
import { recordErrorRate } from "../../observability/metrics.js";
import { FRIENDLY_ERROR_MESSAGES } from "../../prompts/index.js";
import { bindClientAbort, resolveRequestId, toValidationError } from "./request-context.js";

// Accepts both payload conventions used by the orchestrator.
const responderBodySchema = z
  .object({
    question: z.string().trim().min(1).optional(),
    user_query: z.string().trim().min(1).optional()
  })
  .refine((body) => body.question !== undefined || body.user_query !== undefined, {
    message: "question or user_query is required",
    path: ["question"]
  });

export interface ResponderRoutesDependencies {
  getResponder?: () => Pick<GroundedResponder, "answer">;
}

export async function registerResponderRoutes(
  app: FastifyInstance,
  dependencies?: ResponderRoutesDependencies
): Promise<void> {
  const getResponder = dependencies?.getResponder ?? (() => getEngine().responder);

  app.post("/responder/query", async (request: FastifyRequest, reply: FastifyReply) => {
    const parsed = responderBodySchema.safeParse(request.body);
    if (!parsed.success) {
      recordErrorRate("validation_422");
      reply.code(422);
      return toValidationError(parsed.error);
    }

    const requestId = resolveRequestId(request);
    const question = parsed.data.question ?? parsed.data.user_query ?? "";
    const clientAbort = bindClientAbort(reply);
    try {
      return await getResponder().answer({ question, requestId, signal: clientAbort.signal });
    } catch (error) {
      recordErrorRate("responder_error");
      logError("responder.query.error", { requestId }, { error: serializeError(error) });
      reply.code(500);
      return { detail: FRIENDLY_ERROR_MESSAGES.internal };
    } finally {
      clientAbort.release();
    }
  });
}
