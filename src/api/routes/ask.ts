import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { z } from "zod";
import { getEngine } from "../../modules/engine.js";
import type { OrchestrationController } from "../../modules/orchestration/orchestration-controller.js";
import type { AnswerEnvelope, EnvelopeErrorKind } from "../../modules/orchestration/types.js";
import { recordErrorRate } from "../../observability/metrics.js";
import { bindClientAbort, resolveRequestId, toValidationError } from "./request-context.js";

const askBodySchema = z.object({
  question: z.string().trim().min(1, "question is required").max(4000, "question is too long"),
  context: z.record(z.unknown()).optional()
});

const ERROR_STATUS_CODES: Record<EnvelopeErrorKind, number> = {
  agent_unreachable: 503,
  agent_auth: 502,
  agent_failure: 502,
  request_timeout: 504,
  internal: 500
};

export const toHttpStatus = (envelope: AnswerEnvelope): number =>
  envelope.status === "error" ? ERROR_STATUS_CODES[envelope.error.kind] : 200;

export interface AskRoutesDependencies {
  getController?: () => Pick<OrchestrationController, "handle">;
}

const buildAskHandler = (dependencies?: AskRoutesDependencies) => {
  const getController = dependencies?.getController ?? (() => getEngine().controller);

  return async (request: FastifyRequest, reply: FastifyReply): Promise<AnswerEnvelope | ReturnType<typeof toValidationError>> => {
    const parsed = askBodySchema.safeParse(request.body);
    if (!parsed.success) {
      recordErrorRate("validation_422");
      reply.code(422);
      return toValidationError(parsed.error);
    }

    const clientAbort = bindClientAbort(reply);
    try {
      const envelope = await getController().handle({
        question: parsed.data.question,
        context: parsed.data.context,
        requestId: resolveRequestId(request),
        signal: clientAbort.signal
      });
      reply.code(toHttpStatus(envelope));
      return envelope;
    } finally {
      clientAbort.release();
    }
  };
};

export async function registerAskRoutes(app: FastifyInstance, dependencies?: AskRoutesDependencies): Promise<void> {
  app.post("/ask", buildAskHandler(dependencies));
}
