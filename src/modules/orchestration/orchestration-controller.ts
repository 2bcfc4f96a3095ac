import { randomUUID } from "node:crypto";
import { logError, logInfo, logTrace, serializeError } from "../../observability/logger.js";
import { recordEnvelopeStatus, recordErrorRate } from "../../observability/metrics.js";
import {
  FRIENDLY_ERROR_MESSAGES,
  NOT_UNDERSTOOD_MESSAGE,
  buildAgentUnavailableMessage
} from "../../prompts/index.js";
import { buildAgentPayload, type OutboundInvoker } from "../agents/outbound-invoker.js";
import { isPlainObject, type NormalizedResponse, type ResponseNormalizer } from "../agents/response-normalizer.js";
import type { AgentDescriptor, AgentRegistryPort } from "../agents/types.js";
import { AgentAuthError, AgentUnreachableError, RequestDeadlineError, isEngineError } from "../errors.js";
import type { IntentRouter } from "../routing/intent-router.js";
import type {
  AnswerEnvelope,
  EnvelopeErrorKind,
  ErrorEnvelope,
  OrchestrationInput,
  RoutingSummary
} from "./types.js";

export const DEFAULT_REQUEST_DEADLINE_MS = 90_000;
export const DEFAULT_MAX_HANDOFFS = 1;
export const ROUTING_NOT_REACHED_RATIONALE = "routing did not complete";

export interface OrchestrationDependencies {
  registry: AgentRegistryPort;
  router: Pick<IntentRouter, "route">;
  invoker: Pick<OutboundInvoker, "invoke">;
  normalizer: Pick<ResponseNormalizer, "normalize">;
  deadlineMs?: number;
  maxHandoffs?: number;
  generateRequestId?: () => string;
  logInfo?: typeof logInfo;
  logError?: typeof logError;
  logTrace?: typeof logTrace;
}

type DispatchState = {
  requestId: string;
  question: string;
  context?: Record<string, unknown>;
  routing: RoutingSummary;
  signal: AbortSignal;
  handoffFrom: string | null;
  handoffsUsed: number;
};

/** Target named by an active `handoff` block, if any. */
export const readHandoffTarget = (response: NormalizedResponse): string | null => {
  const handoff = response.extraFields.handoff;
  if (!isPlainObject(handoff) || handoff.needed !== true) {
    return null;
  }
  const target = [handoff.target_agent, handoff.suggested_agent].find(
    (value): value is string => typeof value === "string" && value.trim().length > 0
  );
  if (!target || target.trim().toLowerCase() === "none") {
    return null;
  }
  return target.trim();
};

const toErrorKind = (error: unknown, deadlineExceeded: boolean): EnvelopeErrorKind => {
  if (deadlineExceeded || error instanceof RequestDeadlineError) {
    return "request_timeout";
  }
  if (error instanceof AgentAuthError) {
    return "agent_auth";
  }
  if (error instanceof AgentUnreachableError) {
    return "agent_unreachable";
  }
  return "internal";
};

const isAvailable = (agent: AgentDescriptor): boolean => agent.enabled && agent.endpointUrl !== null;

const resolveDependencies = (dependencies: OrchestrationDependencies) => ({
  registry: dependencies.registry,
  router: dependencies.router,
  invoker: dependencies.invoker,
  normalizer: dependencies.normalizer,
  deadlineMs: dependencies.deadlineMs ?? DEFAULT_REQUEST_DEADLINE_MS,
  maxHandoffs: Math.max(0, dependencies.maxHandoffs ?? DEFAULT_MAX_HANDOFFS),
  generateRequestId: dependencies.generateRequestId ?? randomUUID,
  logInfo: dependencies.logInfo ?? logInfo,
  logError: dependencies.logError ?? logError,
  logTrace: dependencies.logTrace ?? logTrace
});

export class OrchestrationController {
  private readonly dependencies: ReturnType<typeof resolveDependencies>;

  constructor(dependencies: OrchestrationDependencies) {
    this.dependencies = resolveDependencies(dependencies);
  }

  async handle(input: OrchestrationInput): Promise<AnswerEnvelope> {
    const resolved = this.dependencies;
    const requestId = input.requestId ?? resolved.generateRequestId();
    const question = input.question.trim();
    const deadline = new AbortController();
    const deadlineHandle = setTimeout(() => deadline.abort(), resolved.deadlineMs);
    const onCallerAbort = (): void => deadline.abort();
    if (input.signal?.aborted) {
      deadline.abort();
    }
    input.signal?.addEventListener("abort", onCallerAbort, { once: true });
    let routing: RoutingSummary = {
      method: "none",
      targetAgent: null,
      confidence: 0,
      rationale: ROUTING_NOT_REACHED_RATIONALE
    };
    let currentAgentId: string | null = null;

    try {
      const agents = await resolved.registry.list();
      const decision = await resolved.router.route({ question, agents, requestId, signal: deadline.signal });
      routing = {
        method: decision.method,
        targetAgent: decision.targetAgent,
        confidence: decision.confidence,
        rationale: decision.rationale
      };
      if (deadline.signal.aborted) {
        throw new RequestDeadlineError();
      }

      const agent = decision.targetAgent === null ? undefined : agents.find((candidate) => candidate.id === decision.targetAgent);
      if (!agent) {
        return this.finish({ status: "not_understood", requestId, question, routing, message: NOT_UNDERSTOOD_MESSAGE });
      }

      currentAgentId = agent.id;
      return this.finish(
        await this.dispatch(agent, {
          requestId,
          question,
          context: input.context,
          routing,
          signal: deadline.signal,
          handoffFrom: null,
          handoffsUsed: 0
        }, (agentId) => {
          currentAgentId = agentId;
        })
      );
    } catch (error) {
      return this.finish(this.toErrorEnvelope(error, {
        requestId,
        question,
        routing,
        agentId: currentAgentId,
        deadlineExceeded: deadline.signal.aborted
      }));
    } finally {
      clearTimeout(deadlineHandle);
      input.signal?.removeEventListener("abort", onCallerAbort);
    }
  }

  private async dispatch(
    agent: AgentDescriptor,
    state: DispatchState,
    onAgentSelected: (agentId: string) => void
  ): Promise<AnswerEnvelope> {
    const resolved = this.dependencies;
    const correlation = { requestId: state.requestId, agentId: agent.id };
    onAgentSelected(agent.id);

    if (!isAvailable(agent)) {
      resolved.logInfo("orchestration.agent_unavailable", correlation, {
        enabled: agent.enabled,
        has_endpoint: agent.endpointUrl !== null
      });
      return {
        status: "agent_unavailable",
        requestId: state.requestId,
        question: state.question,
        routing: state.routing,
        agentId: agent.id,
        message: buildAgentUnavailableMessage(agent.id)
      };
    }

    resolved.logTrace("orchestration.invoke.start", correlation, { handoff_from: state.handoffFrom });
    const payload = buildAgentPayload(agent, state.question, state.context);
    const result = await resolved.invoker.invoke(agent, payload, { signal: state.signal, requestId: state.requestId });

    if (result.statusCode < 200 || result.statusCode >= 300) {
      resolved.logError("orchestration.agent_failure", correlation, {
        status_code: result.statusCode,
        body_preview: result.body.slice(0, 200)
      });
      return {
        status: "error",
        requestId: state.requestId,
        question: state.question,
        routing: state.routing,
        agentId: agent.id,
        message: FRIENDLY_ERROR_MESSAGES.agent_failure,
        error: {
          kind: "agent_failure",
          message: `Agent "${agent.id}" answered with status ${result.statusCode}`
        }
      };
    }

    const normalized = resolved.normalizer.normalize(result.body, { requestId: state.requestId, agentId: agent.id });
    const handoffTarget = readHandoffTarget(normalized);
    if (handoffTarget && state.handoffsUsed < resolved.maxHandoffs) {
      const target = await resolved.registry.resolve(handoffTarget);
      if (target && target.id !== agent.id && isAvailable(target)) {
        resolved.logInfo("orchestration.handoff.follow", correlation, { target_agent: target.id });
        return this.dispatch(
          target,
          { ...state, handoffFrom: agent.id, handoffsUsed: state.handoffsUsed + 1 },
          onAgentSelected
        );
      }
      resolved.logInfo("orchestration.handoff.ignored", correlation, {
        requested_target: handoffTarget,
        resolved_target: target?.id ?? null
      });
    }

    return {
      status: "answered",
      requestId: state.requestId,
      question: state.question,
      routing: state.routing,
      agentId: agent.id,
      answerText: normalized.answerText,
      sources: normalized.sources,
      extraFields: normalized.extraFields,
      handoffFrom: state.handoffFrom
    };
  }

  private toErrorEnvelope(
    error: unknown,
    details: {
      requestId: string;
      question: string;
      routing: RoutingSummary;
      agentId: string | null;
      deadlineExceeded: boolean;
    }
  ): ErrorEnvelope {
    const kind = toErrorKind(error, details.deadlineExceeded);
    const technicalMessage =
      kind === "request_timeout"
        ? "Request deadline exceeded"
        : error instanceof Error && error.message.trim().length > 0
          ? error.message
          : "unknown orchestration error";
    this.dependencies.logError(
      "orchestration.error",
      { requestId: details.requestId, agentId: details.agentId },
      { kind, cause_kind: isEngineError(error) ? error.kind : null, error: serializeError(error) }
    );
    return {
      status: "error",
      requestId: details.requestId,
      question: details.question,
      routing: details.routing,
      agentId: details.agentId,
      message: FRIENDLY_ERROR_MESSAGES[kind],
      error: { kind, message: technicalMessage }
    };
  }

  private finish(envelope: AnswerEnvelope): AnswerEnvelope {
    recordEnvelopeStatus(envelope.status);
    if (envelope.status === "error") {
      recordErrorRate(`orchestration_${envelope.error.kind}`);
    }
    this.dependencies.logInfo(
      "orchestration.complete",
      { requestId: envelope.requestId, agentId: envelope.routing.targetAgent },
      { status: envelope.status, routing_method: envelope.routing.method }
    );
    return envelope;
  }
}
