import { config } from './config/index.js';
import type { EvaluationMode, RetrievalMode } from './config/validation.js';
import type { AuditRepository } from './services/audit/AuditRepository.interface.js';
import { AuditOrchestrator, type AuditProgressEvent } from './services/audit/AuditOrchestrator.js';
import { ExplainabilityService } from './services/audit/ExplainabilityService.js';
import { InMemoryAuditRepository } from './services/audit/InMemoryAuditRepository.js';
import { Neo4jAuditRepository } from './services/audit/Neo4jAuditRepository.js';
import { Assessor } from './services/agents/Assessor.js';
import { RequirementPlanner } from './services/agents/RequirementPlanner.js';
import { Verifier } from './services/agents/Verifier.js';
import { JsonRequirementCatalog } from './services/catalog/JsonRequirementCatalog.js';
import { Neo4jRequirementCatalog } from './services/catalog/Neo4jRequirementCatalog.js';
import type { RequirementCatalog } from './services/catalog/RequirementCatalog.interface.js';
import { DocumentProcessor } from './services/extraction/DocumentProcessor.js';
import { Neo4jClient } from './services/graph/Neo4jClient.js';
import { LLMServiceFactory } from './services/llm/LLMServiceFactory.js';
import type { LLMService } from './services/llm/LLMService.interface.js';
import type { RetrievalStrategy } from './domain/schemas/report.schema.js';
import { createRetrievalStack } from './services/retrieval/createRetrievalStack.js';
import { AuditSnapshotter } from './services/snapshot/AuditSnapshotter.js';
import { EmbeddingService } from './services/vector/EmbeddingService.js';
import { createVectorStore } from './services/vector/VectorStoreFactory.js';
import { logger } from './utils/logger.js';

export interface AuditEngineOptions {
  evaluationMode?: EvaluationMode;
  retrieval?: RetrievalMode;
  /** Forces in-process audit records, e.g. for one-off CLI runs. */
  inMemoryAudits?: boolean;
  onProgress?: (event: AuditProgressEvent) => void;
}

export interface AuditEngine {
  orchestrator: AuditOrchestrator;
  audits: AuditRepository;
  catalog: RequirementCatalog;
  snapshotter: AuditSnapshotter;
  explainability: ExplainabilityService;
  llm: LLMService;
  retrievalStrategy: RetrievalStrategy;
  healthChecks: Record<string, () => Promise<boolean>>;
  close(): Promise<void>;
}

/** Wires every production component from configuration. */
export async function createAuditEngine(options: AuditEngineOptions = {}): Promise<AuditEngine> {
  const auditBackend = options.inMemoryAudits ? 'memory' : config.storage.auditBackend;
  const needsNeo4j =
    auditBackend === 'neo4j' || config.catalog.source === 'neo4j' || config.vectorStore.provider === 'neo4j';

  let neo4jClient: Neo4jClient | null = null;
  if (needsNeo4j) {
    neo4jClient = new Neo4jClient();
    await neo4jClient.connect();
  }

  const catalog: RequirementCatalog =
    config.catalog.source === 'neo4j' && neo4jClient
      ? new Neo4jRequirementCatalog(neo4jClient, config.catalog.frameworkId)
      : new JsonRequirementCatalog(config.catalog.filePath);

  const audits: AuditRepository =
    auditBackend === 'neo4j' && neo4jClient ? new Neo4jAuditRepository(neo4jClient) : new InMemoryAuditRepository();

  const vectorStore = createVectorStore(neo4jClient);
  await vectorStore?.connect();
  const embedder = vectorStore ? new EmbeddingService() : null;
  const retrieval = await createRetrievalStack({
    mode: options.retrieval ?? config.pipeline.retrieval,
    vectorStore,
    embedder,
  });

  const llm = LLMServiceFactory.createLLMService();
  const snapshotter = new AuditSnapshotter();

  const orchestrator = new AuditOrchestrator(
    {
      catalog,
      audits,
      extractor: new DocumentProcessor({
        maxSegmentChars: config.pipeline.maxSegmentChars,
        maxSegmentTokens: config.pipeline.maxSegmentTokens,
      }),
      documentIndex: retrieval.index,
      retriever: retrieval.retriever,
      planner: new RequirementPlanner(llm),
      assessor: new Assessor(llm),
      verifier: new Verifier(llm),
      snapshotter,
      onProgress: options.onProgress,
    },
    {
      evaluationMode: options.evaluationMode ?? config.pipeline.evaluationMode,
      topK: config.pipeline.topK,
      concurrency: config.pipeline.concurrency,
    }
  );

  const healthChecks: Record<string, () => Promise<boolean>> = {
    llm: () => llm.testConnection(),
  };
  const client = neo4jClient;
  if (client) healthChecks.neo4j = () => client.testConnection();
  if (vectorStore) healthChecks.vectorStore = () => vectorStore.testConnection();

  logger.info(
    { retrieval: retrieval.strategy, auditBackend, catalog: config.catalog.source },
    'Audit engine initialized'
  );

  return {
    orchestrator,
    audits,
    catalog,
    snapshotter,
    explainability: new ExplainabilityService(catalog),
    llm,
    retrievalStrategy: retrieval.strategy,
    healthChecks,
    close: async () => {
      await vectorStore?.disconnect();
      await client?.disconnect();
    },
  };
}
