import type { SourceReference } from "../agents/response-normalizer.js";
import type { RoutingMethod } from "../routing/types.js";

export type EnvelopeErrorKind = "agent_unreachable" | "agent_auth" | "agent_failure" | "request_timeout" | "internal";

export type RoutingSummary = {
  method: RoutingMethod;
  targetAgent: string | null;
  confidence: number;
  rationale: string;
};

type EnvelopeBase = {
  requestId: string;
  question: string;
  routing: RoutingSummary;
};

export type AnsweredEnvelope = EnvelopeBase & {
  status: "answered";
  agentId: string;
  answerText: string;
  sources: SourceReference[];
  extraFields: Record<string, unknown>;
  /** Agent that handed the question over, when a handoff was followed. */
  handoffFrom: string | null;
};

export type NotUnderstoodEnvelope = EnvelopeBase & {
  status: "not_understood";
  message: string;
};

export type AgentUnavailableEnvelope = EnvelopeBase & {
  status: "agent_unavailable";
  agentId: string;
  message: string;
};

export type ErrorEnvelope = EnvelopeBase & {
  status: "error";
  agentId: string | null;
  message: string;
  error: {
    kind: EnvelopeErrorKind;
    message: string;
  };
};

export type AnswerEnvelope = AnsweredEnvelope | NotUnderstoodEnvelope | AgentUnavailableEnvelope | ErrorEnvelope;

export type OrchestrationInput = {
  question: string;
  context?: Record<string, unknown>;
  requestId?: string;
  signal?: AbortSignal;
};
