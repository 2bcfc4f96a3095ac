import type { AgentDescriptor } from "../agents/types.js";
import type { RuleScore } from "./types.js";

export const DEFAULT_KEYWORD_WEIGHT = 0.8;

const escapeRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

const clampUnit = (value: number): number => (Number.isFinite(value) ? Math.min(1, Math.max(0, value)) : 0);

const patternCache = new Map<string, RegExp>();

/** Matches `term` only where it is not glued to another letter or digit. */
const keywordPattern = (term: string): RegExp => {
  const cached = patternCache.get(term);
  if (cached) {
    return cached;
  }
  const body = term.split(/\s+/).map(escapeRegExp).join("\\s+");
  const pattern = new RegExp(`(?<![\\p{L}\\p{N}])${body}(?![\\p{L}\\p{N}])`, "u");
  patternCache.set(term, pattern);
  return pattern;
};

export const normalizeQuestion = (question: string): string => question.toLowerCase().replace(/[\u2018\u2019]/g, "'");

export const matchesKeyword = (loweredQuestion: string, term: string): boolean => {
  const normalizedTerm = term.trim().toLowerCase();
  if (!normalizedTerm) {
    return false;
  }
  return keywordPattern(normalizedTerm).test(loweredQuestion);
};

/**
 * Noisy-OR over matched keyword weights: `1 - Π(1 - w)`. One default-weight
 * hit yields `defaultWeight`; more hits push towards 1.
 */
export const scoreAgent = (
  question: string,
  agent: Pick<AgentDescriptor, "id" | "keywords">,
  defaultWeight: number = DEFAULT_KEYWORD_WEIGHT
): RuleScore => {
  const lowered = normalizeQuestion(question);
  const matchedKeywords: string[] = [];
  let miss = 1;

  for (const keyword of agent.keywords) {
    const term = keyword.term.trim().toLowerCase();
    if (!term || matchedKeywords.includes(term) || !matchesKeyword(lowered, term)) {
      continue;
    }
    matchedKeywords.push(term);
    miss *= 1 - clampUnit(keyword.weight ?? defaultWeight);
  }

  const confidence = matchedKeywords.length === 0 ? 0 : Math.round((1 - miss) * 1e6) / 1e6;
  return { agentId: agent.id, confidence: clampUnit(confidence), matchedKeywords };
};

/** Highest-scoring agent with at least one hit; ties keep registry order. */
export const bestRuleScore = (
  question: string,
  agents: ReadonlyArray<Pick<AgentDescriptor, "id" | "keywords">>,
  defaultWeight: number = DEFAULT_KEYWORD_WEIGHT
): RuleScore | null => {
  let best: RuleScore | null = null;
  for (const agent of agents) {
    const score = scoreAgent(question, agent, defaultWeight);
    if (score.matchedKeywords.length === 0) {
      continue;
    }
    if (!best || score.confidence > best.confidence) {
      best = score;
    }
  }
  return best;
};
