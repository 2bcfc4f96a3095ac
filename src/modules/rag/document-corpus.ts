import { createHash } from "node:crypto";
import { z } from "zod";
import type { DocumentStore, StoredDocumentEntry } from "../../clients/local-document-store.js";
import { logInfo, logWarn, serializeError } from "../../observability/logger.js";
import { CorpusUnavailableError } from "../errors.js";
import type { CorpusSnapshotInfo, Document } from "./types.js";

export const DEFAULT_CORPUS_TTL_MS = 3600 * 1000;
const DOCUMENT_ID_LENGTH = 16;

const optionalText = z.string().optional();

// Ingestion has written several field spellings over time.
const storedDocumentSchema = z
  .object({
    titre: optionalText,
    title: optionalText,
    contenu: optionalText,
    contenu_brut: optionalText,
    content: optionalText,
    body: optionalText,
    source_url: optionalText,
    url: optionalText,
    embedding: z.array(z.number().finite()).min(1).optional()
  })
  .passthrough();

type StoredDocument = z.infer<typeof storedDocumentSchema>;

const firstNonEmpty = (...values: Array<string | undefined>): string | undefined =>
  values.find((value): value is string => typeof value === "string" && value.trim().length > 0);

export const documentIdFromUrl = (sourceUrl: string): string =>
  createHash("sha256").update(sourceUrl.trim(), "utf8").digest("hex").slice(0, DOCUMENT_ID_LENGTH);

export const parseStoredDocument = (entry: StoredDocumentEntry): Document | null => {
  let json: unknown;
  try {
    json = JSON.parse(entry.raw);
  } catch {
    return null;
  }

  const parsed = storedDocumentSchema.safeParse(json);
  if (!parsed.success) {
    return null;
  }

  const value: StoredDocument = parsed.data;
  const title = firstNonEmpty(value.titre, value.title);
  const body = firstNonEmpty(value.contenu, value.content, value.contenu_brut, value.body);
  const sourceUrl = firstNonEmpty(value.source_url, value.url);
  if (!title || !body || !sourceUrl) {
    return null;
  }

  return {
    id: documentIdFromUrl(sourceUrl),
    title: title.trim(),
    body,
    sourceUrl: sourceUrl.trim(),
    sizeChars: body.length,
    storeKey: entry.id,
    ...(value.embedding ? { embedding: Object.freeze([...value.embedding]) } : {})
  };
};

export interface DocumentCorpusOptions {
  store: DocumentStore;
  prefix?: string;
  ttlMs?: number;
  now?: () => number;
  logInfo?: typeof logInfo;
  logWarn?: typeof logWarn;
}

type Snapshot = {
  documents: readonly Document[];
  loadedAt: number;
};

/**
 * TTL-cached, read-only view of the documents under a store prefix.
 * Readers always see one complete snapshot; a refresh swaps it in one assignment.
 */
export class DocumentCorpus {
  private snapshot: Snapshot | null = null;
  private refreshing: Promise<readonly Document[]> | null = null;
  private readonly store: DocumentStore;
  private readonly prefix: string;
  private readonly ttlMs: number;
  private readonly now: () => number;
  private readonly logInfo: typeof logInfo;
  private readonly logWarn: typeof logWarn;

  constructor(options: DocumentCorpusOptions) {
    this.store = options.store;
    this.prefix = options.prefix ?? "";
    this.ttlMs = options.ttlMs ?? DEFAULT_CORPUS_TTL_MS;
    this.now = options.now ?? Date.now;
    this.logInfo = options.logInfo ?? logInfo;
    this.logWarn = options.logWarn ?? logWarn;
  }

  async load(): Promise<readonly Document[]> {
    const current = this.snapshot;
    if (current && this.now() - current.loadedAt < this.ttlMs) {
      return current.documents;
    }
    return this.refresh();
  }

  refresh(): Promise<readonly Document[]> {
    if (!this.refreshing) {
      this.refreshing = this.fetchAndSwap().finally(() => {
        this.refreshing = null;
      });
    }
    return this.refreshing;
  }

  snapshotInfo(): CorpusSnapshotInfo {
    const current = this.snapshot;
    if (!current) {
      return { documentCount: 0, loadedAt: null, ageMs: null, stale: true };
    }
    const ageMs = this.now() - current.loadedAt;
    return {
      documentCount: current.documents.length,
      loadedAt: current.loadedAt,
      ageMs,
      stale: ageMs >= this.ttlMs
    };
  }

  private async fetchAndSwap(): Promise<readonly Document[]> {
    const startedAt = this.now();
    try {
      const documents = await this.fetchDocuments();
      this.snapshot = { documents, loadedAt: this.now() };
      this.logInfo("rag.corpus.refreshed", {}, {
        prefix: this.prefix,
        document_count: documents.length,
        latency_ms: this.now() - startedAt
      });
      return documents;
    } catch (error) {
      const fallback = this.snapshot?.documents ?? Object.freeze([]);
      this.logWarn("rag.corpus.refresh_failed", {}, {
        prefix: this.prefix,
        error: serializeError(error),
        serving_stale: this.snapshot !== null,
        document_count: fallback.length
      });
      return fallback;
    }
  }

  private async fetchDocuments(): Promise<readonly Document[]> {
    let entries: StoredDocumentEntry[];
    try {
      entries = await this.store.listDocuments(this.prefix);
    } catch (error) {
      const message = error instanceof Error ? error.message : "unknown store error";
      throw new CorpusUnavailableError(`Document store unavailable: ${message}`, { cause: error });
    }

    const documents: Document[] = [];
    const seenIds = new Set<string>();
    const skipped: string[] = [];
    const duplicates: string[] = [];

    for (const entry of entries) {
      const document = parseStoredDocument(entry);
      if (!document) {
        skipped.push(entry.id);
        continue;
      }
      if (seenIds.has(document.id)) {
        duplicates.push(entry.id);
        continue;
      }
      seenIds.add(document.id);
      documents.push(Object.freeze(document));
    }

    if (skipped.length > 0 || duplicates.length > 0) {
      this.logWarn("rag.corpus.entries_dropped", {}, {
        prefix: this.prefix,
        skipped_keys: skipped,
        duplicate_keys: duplicates
      });
    }

    return Object.freeze(documents);
  }
}
