import { describe, expect, it, vi } from "vitest";
import type { OutboundInvoker } from "../../src/modules/agents/outbound-invoker.js";
import { ResponseNormalizer } from "../../src/modules/agents/response-normalizer.js";
import type { AgentDescriptor, AgentRegistryPort, InvocationResult } from "../../src/modules/agents/types.js";
import { AgentAuthError, AgentUnreachableError, RequestDeadlineError } from "../../src/modules/errors.js";
import {
  OrchestrationController,
  ROUTING_NOT_REACHED_RATIONALE,
  readHandoffTarget
} from "../../src/modules/orchestration/orchestration-controller.js";
import type { RoutingDecision } from "../../src/modules/routing/types.js";
import {
  FRIENDLY_ERROR_MESSAGES,
  NOT_UNDERSTOOD_MESSAGE,
  buildAgentUnavailableMessage
} from "../../src/prompts/index.js";
import { makeAgent } from "../../tests/helpers/agents.js";

type Invoke = OutboundInvoker["invoke"];

const AGENTS: AgentDescriptor[] = [
  makeAgent({ id: "fiscalite", aliases: ["fiscal"] }),
  makeAgent({ id: "juridique", payloadField: "user_query", needsExtraContext: true, aliases: ["droit"] }),
  makeAgent({ id: "comptabilite", endpointUrl: null }),
  makeAgent({ id: "aides", enabled: false })
];

const registry: AgentRegistryPort = {
  list: async () => AGENTS,
  resolve: async (idOrAlias) =>
    AGENTS.find((agent) => agent.id === idOrAlias || agent.aliases.includes(idOrAlias)) ?? null
};

const routedTo = (agentId: string): RoutingDecision => ({
  method: "rules",
  targetAgent: agentId,
  confidence: 0.8,
  rationale: `keywords matched ${agentId}`,
  rules: { agentId, confidence: 0.8, matchedKeywords: [] },
  llm: null
});

const UNROUTED: RoutingDecision = {
  method: "none",
  targetAgent: null,
  confidence: 0,
  rationale: "nothing matched",
  rules: null,
  llm: null
};

const ok = (body: unknown): InvocationResult => ({ statusCode: 200, body: JSON.stringify(body) });

const makeController = (
  decision: RoutingDecision | (() => Promise<RoutingDecision>),
  invoke: Invoke,
  deadlineMs?: number
) => {
  const deps = {
    registry,
    router: { route: vi.fn(typeof decision === "function" ? decision : async () => decision) },
    invoker: { invoke: vi.fn<Parameters<Invoke>, ReturnType<Invoke>>(invoke) },
    normalizer: new ResponseNormalizer({ logWarn: vi.fn() }),
    deadlineMs,
    generateRequestId: () => "generated-id",
    logInfo: vi.fn(),
    logError: vi.fn(),
    logTrace: vi.fn()
  };
  return { controller: new OrchestrationController(deps), deps };
};

describe("modules/orchestration/orchestration-controller", () => {
  it("returns the normalized answer of the routed agent", async () => {
    const { controller, deps } = makeController(routedTo("fiscalite"), async () =>
      ok({ reponse: "La TVA est un impôt.", sources: [{ title: "BOFiP", url: "https://bofip.example.fr" }], confiance: 0.9 })
    );

    const envelope = await controller.handle({ question: "  C'est quoi la TVA ?  ", requestId: "req-1" });

    expect(envelope).toEqual({
      status: "answered",
      requestId: "req-1",
      question: "C'est quoi la TVA ?",
      routing: { method: "rules", targetAgent: "fiscalite", confidence: 0.8, rationale: "keywords matched fiscalite" },
      agentId: "fiscalite",
      answerText: "La TVA est un impôt.",
      sources: [{ title: "BOFiP", url: "https://bofip.example.fr" }],
      extraFields: { confiance: 0.9 },
      handoffFrom: null
    });
    expect(deps.invoker.invoke).toHaveBeenCalledWith(
      AGENTS[0],
      { question: "C'est quoi la TVA ?" },
      { signal: expect.any(AbortSignal), requestId: "req-1" }
    );
    expect(deps.logInfo).toHaveBeenCalledWith(
      "orchestration.complete",
      { requestId: "req-1", agentId: "fiscalite" },
      { status: "answered", routing_method: "rules" }
    );
  });

  it("sends the agent's payload field and forwards context when the agent wants it", async () => {
    const { controller, deps } = makeController(routedTo("juridique"), async () => ok({ answer: "Oui" }));

    await controller.handle({ question: "Puis-je résilier ?", context: { forme: "SAS" } });

    expect(deps.invoker.invoke.mock.calls[0]?.[1]).toEqual({ user_query: "Puis-je résilier ?", context: { forme: "SAS" } });
  });

  it("answers not_understood when no agent was selected", async () => {
    const { controller, deps } = makeController(UNROUTED, async () => ok({}));

    await expect(controller.handle({ question: "Bonjour" })).resolves.toEqual({
      status: "not_understood",
      requestId: "generated-id",
      question: "Bonjour",
      routing: { method: "none", targetAgent: null, confidence: 0, rationale: "nothing matched" },
      message: NOT_UNDERSTOOD_MESSAGE
    });
    expect(deps.invoker.invoke).not.toHaveBeenCalled();
  });

  it.each(["comptabilite", "aides"])("reports %s as unavailable without calling it", async (agentId) => {
    const { controller, deps } = makeController(routedTo(agentId), async () => ok({}));

    await expect(controller.handle({ question: "Q" })).resolves.toMatchObject({
      status: "agent_unavailable",
      agentId,
      message: buildAgentUnavailableMessage(agentId)
    });
    expect(deps.invoker.invoke).not.toHaveBeenCalled();
  });

  it("turns a non-2xx reply into an agent_failure error", async () => {
    const { controller } = makeController(routedTo("fiscalite"), async () => ({ statusCode: 500, body: "boom" }));

    await expect(controller.handle({ question: "Q" })).resolves.toMatchObject({
      status: "error",
      agentId: "fiscalite",
      message: FRIENDLY_ERROR_MESSAGES.agent_failure,
      error: { kind: "agent_failure", message: "Agent \"fiscalite\" answered with status 500" }
    });
  });

  it.each([
    ["agent_auth", new AgentAuthError("fiscalite", 403)],
    ["agent_unreachable", new AgentUnreachableError("fiscalite", 4)]
  ] as const)("maps invoker failures to %s", async (kind, error) => {
    const { controller, deps } = makeController(routedTo("fiscalite"), async () => Promise.reject(error));

    const envelope = await controller.handle({ question: "Q", requestId: "req-2" });

    expect(envelope).toMatchObject({
      status: "error",
      agentId: "fiscalite",
      message: FRIENDLY_ERROR_MESSAGES[kind],
      error: { kind, message: error.message }
    });
    expect(deps.logError).toHaveBeenCalledWith(
      "orchestration.error",
      { requestId: "req-2", agentId: "fiscalite" },
      expect.objectContaining({ kind })
    );
  });

  it("maps unexpected failures to an internal error", async () => {
    const { controller } = makeController(async () => Promise.reject(new Error("registry exploded")), async () => ok({}));

    await expect(controller.handle({ question: "Q" })).resolves.toMatchObject({
      status: "error",
      agentId: null,
      routing: { method: "none", targetAgent: null, confidence: 0, rationale: ROUTING_NOT_REACHED_RATIONALE },
      message: FRIENDLY_ERROR_MESSAGES.internal,
      error: { kind: "internal", message: "registry exploded" }
    });
  });

  it("aborts the agent call when the request deadline passes", async () => {
    const { controller } = makeController(
      routedTo("fiscalite"),
      (_agent, _payload, options) =>
        new Promise<InvocationResult>((_resolve, reject) => {
          options?.signal?.addEventListener("abort", () => reject(new RequestDeadlineError()), { once: true });
        }),
      10
    );

    await expect(controller.handle({ question: "Q" })).resolves.toMatchObject({
      status: "error",
      agentId: "fiscalite",
      message: FRIENDLY_ERROR_MESSAGES.request_timeout,
      error: { kind: "request_timeout", message: "Request deadline exceeded" }
    });
  });

  it("stops before dispatching when the caller has gone away", async () => {
    const caller = new AbortController();
    caller.abort();
    const { controller, deps } = makeController(routedTo("fiscalite"), async () => ok({}));

    await expect(controller.handle({ question: "Q", signal: caller.signal })).resolves.toMatchObject({
      status: "error",
      routing: { method: "rules", targetAgent: "fiscalite", confidence: 0.8, rationale: "keywords matched fiscalite" },
      error: { kind: "request_timeout" }
    });
    expect(deps.invoker.invoke).not.toHaveBeenCalled();
  });

  it("follows one handoff to an available agent", async () => {
    const { controller, deps } = makeController(routedTo("fiscalite"), async (agent) =>
      agent.id === "fiscalite"
        ? ok({ reponse: "Pas mon domaine", handoff: { needed: true, target_agent: "droit" } })
        : ok({ reponse: "Réponse juridique", handoff: { needed: true, target_agent: "fiscalite" } })
    );

    const envelope = await controller.handle({ question: "Mon bail ?" });

    expect(deps.invoker.invoke).toHaveBeenCalledTimes(2);
    expect(deps.invoker.invoke.mock.calls[1]?.[1]).toEqual({ user_query: "Mon bail ?" });
    expect(envelope).toMatchObject({
      status: "answered",
      agentId: "juridique",
      answerText: "Réponse juridique",
      handoffFrom: "fiscalite",
      extraFields: { handoff: { needed: true, target_agent: "fiscalite" } }
    });
  });

  it("ignores a handoff to an unavailable or unknown agent", async () => {
    for (const target of ["comptabilite", "meteo", "fiscal"]) {
      const { controller, deps } = makeController(routedTo("fiscalite"), async () =>
        ok({ reponse: "Réponse fiscale", handoff: { needed: true, suggested_agent: target } })
      );

      await expect(controller.handle({ question: "Q" })).resolves.toMatchObject({
        status: "answered",
        agentId: "fiscalite",
        handoffFrom: null
      });
      expect(deps.invoker.invoke).toHaveBeenCalledTimes(1);
    }
  });

  it("reads handoff targets only from active handoff blocks", () => {
    const withHandoff = (handoff: unknown) => ({ answerText: "", sources: [], extraFields: { handoff } });

    expect(readHandoffTarget(withHandoff({ needed: true, target_agent: " juridique " }))).toBe("juridique");
    expect(readHandoffTarget(withHandoff({ needed: true, target_agent: "", suggested_agent: "aides" }))).toBe("aides");
    expect(readHandoffTarget(withHandoff({ needed: true, suggested_agent: "NONE" }))).toBeNull();
    expect(readHandoffTarget(withHandoff({ needed: "true", target_agent: "aides" }))).toBeNull();
    expect(readHandoffTarget(withHandoff(undefined))).toBeNull();
  });
});
