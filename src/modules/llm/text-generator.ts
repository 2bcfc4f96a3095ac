import { getOpenAIClient } from "../../clients/openai.js";
import { config } from "../../config/index.js";
import { logDebug } from "../../observability/logger.js";

export interface GenerationOptions {
  temperature?: number;
  maxTokens?: number;
  systemPrompt?: string;
  jsonMode?: boolean;
  signal?: AbortSignal;
}

export interface TextGenerator {
  generate: (prompt: string, options?: GenerationOptions) => Promise<string>;
}

export const normalizeCompletionContent = (value: unknown): string => {
  if (typeof value === "string") {
    return value;
  }

  if (Array.isArray(value)) {
    return value
      .map((part: unknown) => {
        if (typeof part === "string") {
          return part;
        }
        if (part && typeof part === "object" && "text" in part && typeof part.text === "string") {
          return part.text;
        }
        return "";
      })
      .join("");
  }

  return "";
};

export interface OpenAITextGeneratorDependencies {
  model?: string;
  now?: () => number;
  getOpenAIClient?: typeof getOpenAIClient;
  logDebug?: typeof logDebug;
}

export const createOpenAITextGenerator = (dependencies?: OpenAITextGeneratorDependencies): TextGenerator => {
  const model = dependencies?.model ?? config.OPENAI_CHAT_MODEL;
  const now = dependencies?.now ?? Date.now;
  const resolveClient = dependencies?.getOpenAIClient ?? getOpenAIClient;
  const log = dependencies?.logDebug ?? logDebug;

  return {
    async generate(prompt, options = {}) {
      const startedAt = now();
      const { client } = await resolveClient();
      const messages: Array<{ role: "system" | "user"; content: string }> = [];
      if (options.systemPrompt) {
        messages.push({ role: "system", content: options.systemPrompt });
      }
      messages.push({ role: "user", content: prompt });

      const response = await client.chat.completions.create(
        {
          model,
          messages,
          temperature: options.temperature ?? 0,
          max_tokens: options.maxTokens ?? 500,
          ...(options.jsonMode ? { response_format: { type: "json_object" as const } } : {})
        },
        { signal: options.signal }
      );

      const content = normalizeCompletionContent(response.choices[0]?.message?.content).trim();
      log("llm.generate.complete", {}, {
        model,
        latency_ms: now() - startedAt,
        output_chars: content.length
      });
      return content;
    }
  };
};
