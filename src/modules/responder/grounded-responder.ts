import { logInfo } from "../../observability/logger.js";
import { recordGenerationLatency } from "../../observability/metrics.js";
import { NO_INFORMATION_ANSWER, RESPONDER_SYSTEM_PROMPT, buildResponderUserPrompt } from "../../prompts/index.js";
import type { TextGenerator } from "../llm/text-generator.js";
import { DEFAULT_MAX_TOTAL_CHARS, NO_DOCUMENTS_CONTEXT, assembleContext } from "../rag/context-assembler.js";
import type { DocumentCorpus } from "../rag/document-corpus.js";
import type { SemanticRetriever } from "../rag/retriever.js";
import type { ResponderAnswer, ResponderInput } from "./types.js";

const MAX_LISTED_SOURCES = 3;
const ANSWER_TEMPERATURE = 0.2;
const ANSWER_MAX_TOKENS = 1024;

export interface GroundedResponderDependencies {
  corpus: Pick<DocumentCorpus, "load">;
  retriever: Pick<SemanticRetriever, "retrieve">;
  generator: TextGenerator;
  topK?: number;
  minScore?: number;
  maxContextChars?: number;
  now?: () => number;
  logInfo?: typeof logInfo;
  recordGenerationLatency?: typeof recordGenerationLatency;
}

/**
 * Answers from its own corpus only. Generation is skipped entirely when
 * nothing relevant was retrieved.
 */
export class GroundedResponder {
  private readonly dependencies: GroundedResponderDependencies;

  constructor(dependencies: GroundedResponderDependencies) {
    this.dependencies = dependencies;
  }

  async answer(input: ResponderInput): Promise<ResponderAnswer> {
    const resolved = this.dependencies;
    const now = resolved.now ?? Date.now;
    const log = resolved.logInfo ?? logInfo;
    const recordLatency = resolved.recordGenerationLatency ?? recordGenerationLatency;
    const context = { requestId: input.requestId ?? null };
    const question = input.question.trim();

    const corpus = await resolved.corpus.load();
    const ranked = await resolved.retriever.retrieve({
      query: question,
      corpus,
      k: resolved.topK,
      minScore: resolved.minScore,
      requestId: input.requestId,
      signal: input.signal
    });
    const assembled = assembleContext(ranked, resolved.maxContextChars ?? DEFAULT_MAX_TOTAL_CHARS);

    if (assembled === NO_DOCUMENTS_CONTEXT) {
      log("responder.answer.no_documents", context, { corpus_size: corpus.length });
      return { question, reponse: NO_INFORMATION_ANSWER, documents_trouves: 0, sources: [] };
    }

    const startedAt = now();
    const reponse = await resolved.generator.generate(buildResponderUserPrompt({ question, context: assembled }), {
      systemPrompt: RESPONDER_SYSTEM_PROMPT,
      temperature: ANSWER_TEMPERATURE,
      maxTokens: ANSWER_MAX_TOKENS,
      signal: input.signal
    });
    const latencyMs = now() - startedAt;
    recordLatency(latencyMs);
    log("responder.answer.complete", context, {
      documents_found: ranked.length,
      context_chars: assembled.length,
      generation_latency_ms: latencyMs
    });

    return {
      question,
      reponse: reponse.trim() || NO_INFORMATION_ANSWER,
      documents_trouves: ranked.length,
      sources: ranked.slice(0, MAX_LISTED_SOURCES).map(({ document }) => ({
        titre: document.title,
        url: document.sourceUrl
      }))
    };
  }
}
