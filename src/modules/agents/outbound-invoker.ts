import { logInfo, logWarn, serializeError } from "../../observability/logger.js";
import { recordAgentCallLatency } from "../../observability/metrics.js";
import { AgentAuthError, AgentUnreachableError, RequestDeadlineError, TransportError } from "../errors.js";
import type { FetchLike, RequestSigner } from "./request-signer.js";
import type { AgentDescriptor, AgentPayload, InvocationResult } from "./types.js";

export const DEFAULT_TIMEOUT_MS = 30_000;
export const DEFAULT_MAX_RETRIES = 3;
export const DEFAULT_BACKOFF_BASE_MS = 750;

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export const abortableSleep: Sleep = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new RequestDeadlineError());
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new RequestDeadlineError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });

/** `base * 2^(attempt - 1)` for the retry that follows failed attempt `attempt`. */
export const backoffDelayMs = (attempt: number, baseMs: number): number => baseMs * 2 ** (attempt - 1);

export const buildAgentPayload = (
  agent: Pick<AgentDescriptor, "payloadField" | "needsExtraContext">,
  question: string,
  context?: Record<string, unknown>
): AgentPayload => ({
  [agent.payloadField]: question,
  ...(agent.needsExtraContext && context ? { context } : {})
});

export interface OutboundInvokerDependencies {
  signer: RequestSigner;
  fetch?: FetchLike;
  sleep?: Sleep;
  now?: () => number;
  timeoutMs?: number;
  maxRetries?: number;
  backoffBaseMs?: number;
  logInfo?: typeof logInfo;
  logWarn?: typeof logWarn;
  recordAgentCallLatency?: typeof recordAgentCallLatency;
}

export interface InvokeOptions {
  signal?: AbortSignal;
  requestId?: string;
}

const resolveDependencies = (dependencies: OutboundInvokerDependencies) => ({
  signer: dependencies.signer,
  fetch: dependencies.fetch ?? ((input: string, init?: RequestInit) => fetch(input, init)),
  sleep: dependencies.sleep ?? abortableSleep,
  now: dependencies.now ?? Date.now,
  timeoutMs: dependencies.timeoutMs ?? DEFAULT_TIMEOUT_MS,
  maxRetries: Math.max(0, dependencies.maxRetries ?? DEFAULT_MAX_RETRIES),
  backoffBaseMs: dependencies.backoffBaseMs ?? DEFAULT_BACKOFF_BASE_MS,
  logInfo: dependencies.logInfo ?? logInfo,
  logWarn: dependencies.logWarn ?? logWarn,
  recordAgentCallLatency: dependencies.recordAgentCallLatency ?? recordAgentCallLatency
});

/**
 * POSTs JSON to a downstream agent. Only transport failures (timeouts,
 * connection errors) are retried; any HTTP status ends the call.
 */
export class OutboundInvoker {
  private readonly dependencies: ReturnType<typeof resolveDependencies>;

  constructor(dependencies: OutboundInvokerDependencies) {
    this.dependencies = resolveDependencies(dependencies);
  }

  async invoke(agent: AgentDescriptor, payload: AgentPayload, options: InvokeOptions = {}): Promise<InvocationResult> {
    const resolved = this.dependencies;
    const context = { requestId: options.requestId ?? null, agentId: agent.id };
    const endpointUrl = agent.endpointUrl;
    if (!endpointUrl) {
      throw new AgentUnreachableError(agent.id, 0);
    }

    const totalAttempts = resolved.maxRetries + 1;
    const startedAt = resolved.now();
    let lastError: TransportError | null = null;

    for (let attempt = 1; attempt <= totalAttempts; attempt += 1) {
      if (options.signal?.aborted) {
        throw new RequestDeadlineError(undefined, { cause: lastError });
      }

      try {
        const result = await this.attempt(agent, endpointUrl, payload, options.signal);
        const latencyMs = resolved.now() - startedAt;
        resolved.recordAgentCallLatency(agent.id, latencyMs);
        resolved.logInfo("agents.invoke.complete", context, {
          status_code: result.statusCode,
          attempts: attempt,
          latency_ms: latencyMs
        });
        return result;
      } catch (error) {
        if (!(error instanceof TransportError)) {
          throw error;
        }
        lastError = error;
        resolved.logWarn("agents.invoke.attempt_failed", context, {
          attempt,
          timed_out: error.timedOut,
          error: serializeError(error)
        });
        if (attempt < totalAttempts) {
          await resolved.sleep(backoffDelayMs(attempt, resolved.backoffBaseMs), options.signal);
        }
      }
    }

    throw new AgentUnreachableError(agent.id, totalAttempts, { cause: lastError });
  }

  private async attempt(
    agent: AgentDescriptor,
    endpointUrl: string,
    payload: AgentPayload,
    parentSignal?: AbortSignal
  ): Promise<InvocationResult> {
    const resolved = this.dependencies;
    const headers: Record<string, string> = { "Content-Type": "application/json" };
    if (agent.requiresAuth) {
      try {
        Object.assign(headers, await resolved.signer.headersFor(endpointUrl, parentSignal));
      } catch (error) {
        if (parentSignal?.aborted) {
          throw new RequestDeadlineError(undefined, { cause: error });
        }
        throw new AgentAuthError(agent.id, null, { cause: error });
      }
    }

    const controller = new AbortController();
    const timeoutHandle = setTimeout(() => controller.abort(), resolved.timeoutMs);
    const onParentAbort = (): void => controller.abort();
    parentSignal?.addEventListener("abort", onParentAbort, { once: true });

    let statusCode: number;
    let body: string;
    try {
      const response = await resolved.fetch(endpointUrl, {
        method: "POST",
        headers,
        body: JSON.stringify(payload),
        signal: controller.signal
      });
      statusCode = response.status;
      body = await response.text();
    } catch (error) {
      if (parentSignal?.aborted) {
        throw new RequestDeadlineError(undefined, { cause: error });
      }
      const timedOut = controller.signal.aborted;
      const reason = error instanceof Error ? error.message : "unknown transport error";
      throw new TransportError(
        timedOut ? `Agent "${agent.id}" timed out after ${resolved.timeoutMs}ms` : `Agent "${agent.id}" connection failed: ${reason}`,
        { timedOut, cause: error }
      );
    } finally {
      clearTimeout(timeoutHandle);
      parentSignal?.removeEventListener("abort", onParentAbort);
    }

    if (statusCode === 401 || statusCode === 403) {
      throw new AgentAuthError(agent.id, statusCode);
    }
    return { statusCode, body };
  }
}
