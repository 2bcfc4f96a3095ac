import { z } from "zod";
import { logWarn, serializeError } from "../../observability/logger.js";
import { CLASSIFIER_SYSTEM_PROMPT, buildClassifierPrompt } from "../../prompts/index.js";
import type { AgentDescriptor } from "../agents/types.js";
import { ClassificationParseError } from "../errors.js";
import type { TextGenerator } from "../llm/text-generator.js";
import type { LlmClassification } from "./types.js";

export const NO_AGENT_LABEL = "none";
const DEFAULT_LLM_CONFIDENCE = 0.5;
const CLASSIFIER_TEMPERATURE = 0;
const CLASSIFIER_MAX_TOKENS = 120;

const classificationSchema = z.object({
  agent: z.string().transform((value) => value.trim().toLowerCase()),
  confidence: z.coerce.number().finite().optional(),
  reason: z.string().optional()
});

/** First balanced `{...}` span, ignoring braces inside JSON strings. */
export const extractFirstJsonObject = (text: string): string | null => {
  const start = text.indexOf("{");
  if (start === -1) {
    return null;
  }

  let depth = 0;
  let inString = false;
  let escaped = false;
  for (let index = start; index < text.length; index += 1) {
    const char = text[index];
    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (char === "\\") {
        escaped = true;
      } else if (char === "\"") {
        inString = false;
      }
      continue;
    }
    if (char === "\"") {
      inString = true;
    } else if (char === "{") {
      depth += 1;
    } else if (char === "}") {
      depth -= 1;
      if (depth === 0) {
        return text.slice(start, index + 1);
      }
    }
  }
  return null;
};

const parseLenientJson = (raw: string): unknown => {
  try {
    return JSON.parse(raw);
  } catch {
    const span = extractFirstJsonObject(raw);
    if (!span) {
      throw new ClassificationParseError("Classifier output contains no JSON object", raw);
    }
    try {
      return JSON.parse(span);
    } catch (error) {
      const message = error instanceof Error ? error.message : "invalid json";
      throw new ClassificationParseError(`Classifier output is not valid JSON: ${message}`, raw);
    }
  }
};

const clampUnit = (value: number): number => Math.min(1, Math.max(0, value));

/**
 * Returns `null` when the model answered "none". Throws
 * `ClassificationParseError` for anything outside the allowed label set.
 */
export const parseClassification = (raw: string, allowedIds: readonly string[]): LlmClassification | null => {
  const parsed = classificationSchema.safeParse(parseLenientJson(raw.trim()));
  if (!parsed.success) {
    throw new ClassificationParseError("Classifier output does not match the expected shape", raw);
  }

  const { agent, confidence, reason } = parsed.data;
  if (agent === NO_AGENT_LABEL) {
    return null;
  }
  const agentId = allowedIds.find((id) => id.toLowerCase() === agent);
  if (!agentId) {
    throw new ClassificationParseError(`Classifier returned unknown agent "${agent}"`, raw);
  }

  return {
    agentId,
    confidence: clampUnit(confidence ?? DEFAULT_LLM_CONFIDENCE),
    reason: reason?.trim() ?? ""
  };
};

export interface LlmClassifierDependencies {
  generator: TextGenerator;
  logWarn?: typeof logWarn;
}

export interface ClassifyInput {
  question: string;
  agents: ReadonlyArray<Pick<AgentDescriptor, "id" | "description">>;
  requestId?: string;
  signal?: AbortSignal;
}

export class LlmClassifier {
  private readonly generator: TextGenerator;
  private readonly logWarn: typeof logWarn;

  constructor(dependencies: LlmClassifierDependencies) {
    this.generator = dependencies.generator;
    this.logWarn = dependencies.logWarn ?? logWarn;
  }

  /** Never throws; parse and provider failures degrade to "no candidate". */
  async classify(input: ClassifyInput): Promise<LlmClassification | null> {
    const context = { requestId: input.requestId ?? null };
    let raw: string;
    try {
      raw = await this.generator.generate(buildClassifierPrompt(input), {
        systemPrompt: CLASSIFIER_SYSTEM_PROMPT,
        temperature: CLASSIFIER_TEMPERATURE,
        maxTokens: CLASSIFIER_MAX_TOKENS,
        jsonMode: true,
        signal: input.signal
      });
    } catch (error) {
      this.logWarn("routing.classifier.generation_failed", context, {
        error: serializeError(error)
      });
      return null;
    }

    try {
      return parseClassification(
        raw,
        input.agents.map((agent) => agent.id)
      );
    } catch (error) {
      this.logWarn("routing.classifier.discarded", context, {
        error: serializeError(error),
        raw_output: raw.slice(0, 200)
      });
      return null;
    }
  }
}
