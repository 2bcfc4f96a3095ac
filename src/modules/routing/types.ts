export type RoutingMethod = "rules" | "llm" | "fused" | "none";

export type RoutingCandidate = {
  agentId: string;
  confidence: number;
};

export type RuleScore = RoutingCandidate & {
  matchedKeywords: string[];
};

export type LlmClassification = RoutingCandidate & {
  reason: string;
};

export type RoutedDecision = {
  method: Exclude<RoutingMethod, "none">;
  targetAgent: string;
  confidence: number;
  /** Human-readable account of the evidence behind the choice. */
  rationale: string;
  rules: RuleScore | null;
  llm: LlmClassification | null;
};

export type UnroutedDecision = {
  method: "none";
  targetAgent: null;
  confidence: 0;
  rationale: string;
  rules: RuleScore | null;
  llm: LlmClassification | null;
};

export type RoutingDecision = RoutedDecision | UnroutedDecision;
