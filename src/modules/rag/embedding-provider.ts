import { config } from "../../config/index.js";
import { getOpenAIClient } from "../../clients/openai.js";
import type { EmbeddingProvider } from "./types.js";

export interface OpenAIEmbeddingProviderDependencies {
  getOpenAIClient?: typeof getOpenAIClient;
  model?: string;
}

export const createOpenAIEmbeddingProvider = (
  dependencies?: OpenAIEmbeddingProviderDependencies
): EmbeddingProvider => {
  const resolveClient = dependencies?.getOpenAIClient ?? getOpenAIClient;
  const model = dependencies?.model ?? config.OPENAI_EMBEDDING_MODEL;

  return async (text) => {
    const { client } = await resolveClient();
    const response = await client.embeddings.create({ model, input: text });
    const embedding = response.data[0]?.embedding;
    if (!embedding || embedding.length === 0) {
      throw new Error("Embedding response missing vector payload.");
    }
    return embedding;
  };
};
