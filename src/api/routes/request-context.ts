import type { FastifyReply, FastifyRequest } from "fastify";
import type { z } from "zod";

export const toValidationError = (error: z.ZodError) => ({
  detail: error.issues.map((issue) => ({
    type: issue.code,
    loc: ["body", ...issue.path],
    msg: issue.message
  }))
});

export const resolveRequestId = (request: FastifyRequest): string => {
  const headerRequestId = request.headers["x-request-id"];
  if (typeof headerRequestId === "string" && headerRequestId.trim().length > 0) {
    return headerRequestId.trim();
  }
  return request.id;
};

/** Aborts when the connection closes before the response is written. */
export const bindClientAbort = (reply: FastifyReply): { signal: AbortSignal; release: () => void } => {
  const controller = new AbortController();
  const onClose = (): void => {
    if (!reply.raw.writableFinished) {
      controller.abort();
    }
  };
  reply.raw.once("close", onClose);
  return {
    signal: controller.signal,
    release: () => {
      reply.raw.off("close", onClose);
    }
  };
};
