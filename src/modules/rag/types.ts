export type EmbeddingVector = readonly number[];

export type Document = {
  /** Stable identifier derived from the source URL. */
  id: string;
  title: string;
  body: string;
  sourceUrl: string;
  sizeChars: number;
  /** Store key the document was read from. */
  storeKey: string;
  embedding?: EmbeddingVector;
};

export type ScoredDocument = {
  document: Document;
  score: number;
};

export type RetrievalInput = {
  query: string;
  corpus: readonly Document[];
  k?: number;
  minScore?: number;
  requestId?: string;
  signal?: AbortSignal;
};

export type AssemblyOptions = {
  maxTotalChars?: number;
  docMaxChars?: number;
  docFallbackChars?: number;
};

/** Shared between concurrent callers, so it never takes a caller's signal. */
export type EmbeddingProvider = (text: string) => Promise<number[]>;

export interface EmbeddingCachePort {
  getOrCompute: (text: string, signal?: AbortSignal) => Promise<EmbeddingVector>;
  size: () => number;
}

export type CorpusSnapshotInfo = {
  documentCount: number;
  loadedAt: number | null;
  ageMs: number | null;
  stale: boolean;
};
