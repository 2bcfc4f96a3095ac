import { createLocalDocumentStore } from "../clients/local-document-store.js";
import { isPostgresConfigured } from "../clients/postgres.js";
import { config, toInvokerSettings, toRetrievalSettings, toRoutingSettings, type Config } from "../config/index.js";
import { AgentRegistry, loadAgentDefaults } from "./agents/agent-registry.js";
import { AgentRegistryRepository } from "./agents/agent-registry-repository.js";
import { OutboundInvoker } from "./agents/outbound-invoker.js";
import { createRequestSigner } from "./agents/request-signer.js";
import { ResponseNormalizer } from "./agents/response-normalizer.js";
import { createOpenAITextGenerator } from "./llm/text-generator.js";
import { OrchestrationController } from "./orchestration/orchestration-controller.js";
import { DocumentCorpus } from "./rag/document-corpus.js";
import { EmbeddingCache } from "./rag/embedding-cache.js";
import { createOpenAIEmbeddingProvider } from "./rag/embedding-provider.js";
import { SemanticRetriever } from "./rag/retriever.js";
import { GroundedResponder } from "./responder/grounded-responder.js";
import { IntentRouter } from "./routing/intent-router.js";
import { LlmClassifier } from "./routing/llm-classifier.js";

export interface Engine {
  registry: AgentRegistry;
  controller: OrchestrationController;
  corpus: DocumentCorpus;
  embeddingCache: EmbeddingCache;
  responder: GroundedResponder;
}

/** Wires every service from configuration. Clients are created lazily on first use. */
export function createEngine(source: Config = config): Engine {
  const retrieval = toRetrievalSettings(source);
  const routing = toRoutingSettings(source);
  const invoker = toInvokerSettings(source);

  const registry = new AgentRegistry({
    loadDefaults: () => loadAgentDefaults(source.AGENT_REGISTRY_FILE),
    overrideSource: isPostgresConfigured() ? new AgentRegistryRepository() : null
  });

  const classifier = new LlmClassifier({
    generator: createOpenAITextGenerator({ model: source.OPENAI_CLASSIFIER_MODEL })
  });

  const controller = new OrchestrationController({
    registry,
    router: new IntentRouter({
      classifier,
      goodThreshold: routing.goodThreshold,
      keywordWeight: routing.keywordWeight
    }),
    invoker: new OutboundInvoker({
      signer: createRequestSigner(source),
      timeoutMs: invoker.timeoutMs,
      maxRetries: invoker.maxRetries,
      backoffBaseMs: invoker.backoffBaseMs
    }),
    normalizer: new ResponseNormalizer(),
    deadlineMs: source.REQUEST_DEADLINE_MS
  });

  const embeddingCache = new EmbeddingCache({
    provider: createOpenAIEmbeddingProvider({ model: source.OPENAI_EMBEDDING_MODEL })
  });
  const corpus = new DocumentCorpus({
    store: createLocalDocumentStore(source.DOCUMENT_STORE_DIR),
    prefix: source.DOCUMENT_PREFIX,
    ttlMs: retrieval.corpusTtlMs
  });
  const responder = new GroundedResponder({
    corpus,
    retriever: new SemanticRetriever({ embeddingCache }),
    generator: createOpenAITextGenerator({ model: source.OPENAI_CHAT_MODEL }),
    topK: retrieval.topK,
    minScore: retrieval.minScore,
    maxContextChars: retrieval.contextMaxChars
  });

  return { registry, controller, corpus, embeddingCache, responder };
}

let singleton: Engine | null = null;

export function getEngine(): Engine {
  if (!singleton) {
    singleton = createEngine();
  }
  return singleton;
}

export function resetEngineForTests(): void {
  singleton = null;
}
