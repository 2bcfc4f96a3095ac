import { logInfo, logWarn, serializeError } from "../../observability/logger.js";
import { recordRetrievalLatency } from "../../observability/metrics.js";
import { cosineSimilarity } from "./similarity.js";
import type { Document, EmbeddingCachePort, EmbeddingVector, RetrievalInput, ScoredDocument } from "./types.js";

export const DEFAULT_TOP_K = 3;
export const DEFAULT_MIN_SCORE = 0.3;
export const TITLE_WEIGHT = 3;
export const BODY_PREFIX_CHARS = 1000;
const DEFAULT_EMBEDDING_BATCH_SIZE = 8;

export interface RetrieverDependencies {
  embeddingCache: EmbeddingCachePort;
  now?: () => number;
  batchSize?: number;
  recordRetrievalLatency?: typeof recordRetrievalLatency;
  logInfo?: typeof logInfo;
  logWarn?: typeof logWarn;
}

const resolveDependencies = (dependencies: RetrieverDependencies) => ({
  embeddingCache: dependencies.embeddingCache,
  now: dependencies.now ?? Date.now,
  batchSize: Math.max(1, dependencies.batchSize ?? DEFAULT_EMBEDDING_BATCH_SIZE),
  recordRetrievalLatency: dependencies.recordRetrievalLatency ?? recordRetrievalLatency,
  logInfo: dependencies.logInfo ?? logInfo,
  logWarn: dependencies.logWarn ?? logWarn
});

/** Title repeated to weigh it above the body, followed by the start of the body. */
export const documentRepresentation = (document: Pick<Document, "title" | "body">): string =>
  [...Array.from({ length: TITLE_WEIGHT }, () => document.title), document.body.slice(0, BODY_PREFIX_CHARS)].join("\n");

type DocumentEmbeddingResult = { vector: EmbeddingVector } | { error: unknown };

const embedDocument = async (
  document: Document,
  embeddingCache: EmbeddingCachePort,
  signal?: AbortSignal
): Promise<DocumentEmbeddingResult> => {
  if (document.embedding) {
    return { vector: document.embedding };
  }
  try {
    return { vector: await embeddingCache.getOrCompute(documentRepresentation(document), signal) };
  } catch (error) {
    return { error };
  }
};

export class SemanticRetriever {
  private readonly dependencies: ReturnType<typeof resolveDependencies>;

  constructor(dependencies: RetrieverDependencies) {
    this.dependencies = resolveDependencies(dependencies);
  }

  async retrieve(input: RetrievalInput): Promise<ScoredDocument[]> {
    const resolved = this.dependencies;
    const startedAt = resolved.now();
    const context = { requestId: input.requestId ?? null };
    const k = Math.max(0, Math.floor(input.k ?? DEFAULT_TOP_K));
    const minScore = input.minScore ?? DEFAULT_MIN_SCORE;
    const query = input.query.trim();

    if (!query || input.corpus.length === 0 || k === 0) {
      return [];
    }

    let queryVector: EmbeddingVector;
    try {
      queryVector = await resolved.embeddingCache.getOrCompute(query, input.signal);
    } catch (error) {
      resolved.logWarn("rag.retrieve.query_embedding_failed", context, { error: serializeError(error) });
      return [];
    }

    const scored: ScoredDocument[] = [];
    const failedIds: string[] = [];
    for (let offset = 0; offset < input.corpus.length; offset += resolved.batchSize) {
      const batch = input.corpus.slice(offset, offset + resolved.batchSize);
      const results = await Promise.all(
        batch.map((document) => embedDocument(document, resolved.embeddingCache, input.signal))
      );
      results.forEach((result, index) => {
        const document = batch[index];
        if (!document) {
          return;
        }
        if ("error" in result) {
          failedIds.push(document.id);
          return;
        }
        scored.push({ document, score: cosineSimilarity(queryVector, result.vector) });
      });
    }

    // Array.prototype.sort is stable, so equal scores keep corpus order.
    const ranked = scored
      .filter((candidate) => candidate.score >= minScore)
      .sort((left, right) => right.score - left.score)
      .slice(0, k);

    const latencyMs = resolved.now() - startedAt;
    resolved.recordRetrievalLatency(latencyMs);
    if (failedIds.length > 0) {
      resolved.logWarn("rag.retrieve.document_embedding_failed", context, { document_ids: failedIds });
    }
    resolved.logInfo("rag.retrieve.complete", context, {
      latency_ms: latencyMs,
      corpus_size: input.corpus.length,
      scored_count: scored.length,
      result_count: ranked.length,
      top_score: ranked[0]?.score ?? null,
      min_score: minScore
    });

    return ranked;
  }
}
