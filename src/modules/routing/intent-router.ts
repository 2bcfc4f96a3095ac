import { logInfo } from "../../observability/logger.js";
import { recordRoutingMethod } from "../../observability/metrics.js";
import type { AgentDescriptor } from "../agents/types.js";
import { DEFAULT_KEYWORD_WEIGHT, bestRuleScore } from "./keyword-rules.js";
import type { ClassifyInput, LlmClassifier } from "./llm-classifier.js";
import type { LlmClassification, RoutingDecision, RuleScore } from "./types.js";

export const DEFAULT_GOOD_THRESHOLD = 0.8;

export interface IntentRouterDependencies {
  classifier: Pick<LlmClassifier, "classify">;
  goodThreshold?: number;
  keywordWeight?: number;
  now?: () => number;
  logInfo?: typeof logInfo;
  recordRoutingMethod?: typeof recordRoutingMethod;
}

export interface RouteInput {
  question: string;
  agents: readonly AgentDescriptor[];
  requestId?: string;
  signal?: AbortSignal;
}

const clampUnit = (value: number): number => (Number.isFinite(value) ? Math.min(1, Math.max(0, value)) : 0);

export const NO_ROUTE_RATIONALE = "no keyword matched and the classifier named no known agent";

const describeRules = (rules: RuleScore): string =>
  `keywords ${rules.matchedKeywords.map((keyword) => `"${keyword}"`).join(", ")} matched ${rules.agentId}`;

const describeLlm = (llm: LlmClassification): string =>
  llm.reason ? `classifier chose ${llm.agentId}: ${llm.reason}` : `classifier chose ${llm.agentId}`;

/**
 * Combines the keyword and classifier candidates. Agreement keeps the higher
 * confidence; disagreement goes to the more confident one, rules on ties.
 */
export const fuseCandidates = (rules: RuleScore | null, llm: LlmClassification | null): RoutingDecision => {
  const rulesCandidate = rules ? { ...rules, confidence: clampUnit(rules.confidence) } : null;
  const llmCandidate = llm ? { ...llm, confidence: clampUnit(llm.confidence) } : null;

  if (rulesCandidate && llmCandidate) {
    if (rulesCandidate.agentId === llmCandidate.agentId) {
      return {
        method: "fused",
        targetAgent: rulesCandidate.agentId,
        confidence: Math.max(rulesCandidate.confidence, llmCandidate.confidence),
        rationale: `${describeRules(rulesCandidate)}; ${describeLlm(llmCandidate)}`,
        rules: rulesCandidate,
        llm: llmCandidate
      };
    }
    const winner = llmCandidate.confidence > rulesCandidate.confidence ? "llm" : "rules";
    return {
      method: winner,
      targetAgent: winner === "llm" ? llmCandidate.agentId : rulesCandidate.agentId,
      confidence: winner === "llm" ? llmCandidate.confidence : rulesCandidate.confidence,
      rationale:
        winner === "llm"
          ? `${describeLlm(llmCandidate)}; outweighs ${describeRules(rulesCandidate)}`
          : `${describeRules(rulesCandidate)}; outweighs ${describeLlm(llmCandidate)}`,
      rules: rulesCandidate,
      llm: llmCandidate
    };
  }

  if (rulesCandidate) {
    return {
      method: "rules",
      targetAgent: rulesCandidate.agentId,
      confidence: rulesCandidate.confidence,
      rationale: describeRules(rulesCandidate),
      rules: rulesCandidate,
      llm: null
    };
  }

  if (llmCandidate) {
    return {
      method: "llm",
      targetAgent: llmCandidate.agentId,
      confidence: llmCandidate.confidence,
      rationale: describeLlm(llmCandidate),
      rules: null,
      llm: llmCandidate
    };
  }

  return { method: "none", targetAgent: null, confidence: 0, rationale: NO_ROUTE_RATIONALE, rules: null, llm: null };
};

export class IntentRouter {
  private readonly classifier: Pick<LlmClassifier, "classify">;
  private readonly goodThreshold: number;
  private readonly keywordWeight: number;
  private readonly now: () => number;
  private readonly logInfo: typeof logInfo;
  private readonly recordRoutingMethod: typeof recordRoutingMethod;

  constructor(dependencies: IntentRouterDependencies) {
    this.classifier = dependencies.classifier;
    this.goodThreshold = dependencies.goodThreshold ?? DEFAULT_GOOD_THRESHOLD;
    this.keywordWeight = dependencies.keywordWeight ?? DEFAULT_KEYWORD_WEIGHT;
    this.now = dependencies.now ?? Date.now;
    this.logInfo = dependencies.logInfo ?? logInfo;
    this.recordRoutingMethod = dependencies.recordRoutingMethod ?? recordRoutingMethod;
  }

  async route(input: RouteInput): Promise<RoutingDecision> {
    const startedAt = this.now();
    const rules = bestRuleScore(input.question, input.agents, this.keywordWeight);

    let decision: RoutingDecision;
    if (rules && rules.confidence >= this.goodThreshold) {
      decision = fuseCandidates(rules, null);
    } else {
      const classifyInput: ClassifyInput = {
        question: input.question,
        agents: input.agents,
        requestId: input.requestId,
        signal: input.signal
      };
      const llm = await this.classifier.classify(classifyInput);
      decision = fuseCandidates(rules, llm);
    }

    this.recordRoutingMethod(decision.method);
    this.logInfo("routing.decision", { requestId: input.requestId ?? null, agentId: decision.targetAgent }, {
      method: decision.method,
      confidence: decision.confidence,
      rationale: decision.rationale,
      rules_agent: decision.rules?.agentId ?? null,
      rules_confidence: decision.rules?.confidence ?? null,
      matched_keywords: decision.rules?.matchedKeywords ?? [],
      llm_agent: decision.llm?.agentId ?? null,
      llm_confidence: decision.llm?.confidence ?? null,
      latency_ms: this.now() - startedAt
    });
    return decision;
  }
}
