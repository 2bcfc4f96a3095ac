export type EngineErrorKind =
  | "embedding_provider"
  | "corpus_unavailable"
  | "classification_parse"
  | "transport"
  | "agent_unreachable"
  | "agent_auth"
  | "malformed_response"
  | "request_timeout";

export class EngineError extends Error {
  readonly kind: EngineErrorKind;

  constructor(kind: EngineErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "EngineError";
    this.kind = kind;
  }
}

export class EmbeddingProviderError extends EngineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("embedding_provider", message, options);
    this.name = "EmbeddingProviderError";
  }
}

export class CorpusUnavailableError extends EngineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("corpus_unavailable", message, options);
    this.name = "CorpusUnavailableError";
  }
}

export class ClassificationParseError extends EngineError {
  readonly rawOutput: string;

  constructor(message: string, rawOutput: string) {
    super("classification_parse", message);
    this.name = "ClassificationParseError";
    this.rawOutput = rawOutput;
  }
}

/** A single attempt failed before an HTTP status came back. Retryable. */
export class TransportError extends EngineError {
  readonly timedOut: boolean;

  constructor(message: string, options: { timedOut: boolean; cause?: unknown }) {
    super("transport", message, { cause: options.cause });
    this.name = "TransportError";
    this.timedOut = options.timedOut;
  }
}

export class AgentUnreachableError extends EngineError {
  readonly agentId: string;
  readonly attempts: number;

  constructor(agentId: string, attempts: number, options?: { cause?: unknown }) {
    super("agent_unreachable", `Agent "${agentId}" unreachable after ${attempts} attempt(s)`, options);
    this.name = "AgentUnreachableError";
    this.agentId = agentId;
    this.attempts = attempts;
  }
}

/** Status is `null` when no identity token could be obtained for the call. */
export class AgentAuthError extends EngineError {
  readonly agentId: string;
  readonly statusCode: number | null;

  constructor(agentId: string, statusCode: number | null, options?: { cause?: unknown }) {
    super(
      "agent_auth",
      statusCode === null
        ? `Could not sign the request for agent "${agentId}"`
        : `Agent "${agentId}" rejected the request with status ${statusCode}`,
      options
    );
    this.name = "AgentAuthError";
    this.agentId = agentId;
    this.statusCode = statusCode;
  }
}

export class MalformedResponseError extends EngineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("malformed_response", message, options);
    this.name = "MalformedResponseError";
  }
}

export class RequestDeadlineError extends EngineError {
  constructor(message = "Request deadline exceeded", options?: { cause?: unknown }) {
    super("request_timeout", message, options);
    this.name = "RequestDeadlineError";
  }
}

export const isEngineError = (error: unknown): error is EngineError => error instanceof EngineError;
