import { createHash } from "node:crypto";
import { logDebug } from "../../observability/logger.js";
import { recordEmbeddingCacheSize } from "../../observability/metrics.js";
import { EmbeddingProviderError } from "../errors.js";
import type { EmbeddingCachePort, EmbeddingProvider, EmbeddingVector } from "./types.js";

export const MAX_EMBEDDING_INPUT_CHARS = 5000;
export const EMBEDDING_EDGE_CHARS = 2000;
export const EMBEDDING_TRUNCATION_MARKER = "\n[...]\n";

/**
 * Long inputs keep their head and tail only; the provider rejects very long
 * texts and the middle of a document rarely changes its topic.
 */
export const normalizeEmbeddingInput = (text: string): string => {
  if (text.length <= MAX_EMBEDDING_INPUT_CHARS) {
    return text;
  }
  return `${text.slice(0, EMBEDDING_EDGE_CHARS)}${EMBEDDING_TRUNCATION_MARKER}${text.slice(-EMBEDDING_EDGE_CHARS)}`;
};

export const textHash = (text: string): string => createHash("sha256").update(text, "utf8").digest("hex");

const abortedError = (signal: AbortSignal): EmbeddingProviderError =>
  new EmbeddingProviderError("Embedding request aborted by the caller", { cause: signal.reason });

const waitUnlessAborted = <T>(shared: Promise<T>, signal: AbortSignal): Promise<T> =>
  new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(abortedError(signal));
    signal.addEventListener("abort", onAbort, { once: true });
    void shared.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      }
    );
  });

export interface EmbeddingCacheDependencies {
  provider: EmbeddingProvider;
  recordEmbeddingCacheSize?: typeof recordEmbeddingCacheSize;
  logDebug?: typeof logDebug;
}

/**
 * Process-wide memo of text embeddings. Entries are never evicted; the map
 * grows with the number of distinct texts embedded during the process lifetime.
 */
export class EmbeddingCache implements EmbeddingCachePort {
  private readonly entries = new Map<string, EmbeddingVector>();
  private readonly inFlight = new Map<string, Promise<EmbeddingVector>>();
  private readonly provider: EmbeddingProvider;
  private readonly recordSize: typeof recordEmbeddingCacheSize;
  private readonly log: typeof logDebug;

  constructor(dependencies: EmbeddingCacheDependencies) {
    this.provider = dependencies.provider;
    this.recordSize = dependencies.recordEmbeddingCacheSize ?? recordEmbeddingCacheSize;
    this.log = dependencies.logDebug ?? logDebug;
  }

  size(): number {
    return this.entries.size;
  }

  /**
   * Concurrent callers for the same text share one provider call. Each caller's
   * signal only ends its own wait; the shared call keeps running for the others.
   */
  async getOrCompute(text: string, signal?: AbortSignal): Promise<EmbeddingVector> {
    if (signal?.aborted) {
      throw abortedError(signal);
    }
    const normalized = normalizeEmbeddingInput(text);
    const key = textHash(normalized);

    const cached = this.entries.get(key);
    if (cached) {
      return cached;
    }

    let computation = this.inFlight.get(key);
    if (!computation) {
      computation = this.compute(key, normalized).finally(() => {
        this.inFlight.delete(key);
      });
      this.inFlight.set(key, computation);
    }
    return signal ? waitUnlessAborted(computation, signal) : computation;
  }

  private async compute(key: string, normalized: string): Promise<EmbeddingVector> {
    let vector: number[];
    try {
      vector = await this.provider(normalized);
    } catch (error) {
      const message = error instanceof Error ? error.message : "unknown embedding error";
      throw new EmbeddingProviderError(`Embedding provider failed: ${message}`, { cause: error });
    }

    if (vector.length === 0 || vector.some((value) => !Number.isFinite(value))) {
      throw new EmbeddingProviderError("Embedding provider returned an invalid vector");
    }

    const frozen = Object.freeze([...vector]);
    this.entries.set(key, frozen);
    this.recordSize(this.entries.size);
    this.log("rag.embedding.cached", {}, { text_hash: key, input_chars: normalized.length, dimensions: frozen.length });
    return frozen;
  }
}
