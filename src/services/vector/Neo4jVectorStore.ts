import neo4j from 'neo4j-driver';
import { config } from '../../config/index.js';
import { logger } from '../../utils/logger.js';
import { GraphPersistenceError } from '../../utils/errors.js';
import type { Neo4jClient } from '../graph/Neo4jClient.js';
import { nodeProperties, toJsNumber, toNullableString, toNumberList, toStringValue } from '../graph/values.js';
import type {
  StoredSegment,
  VectorDocument,
  VectorSearchFilter,
  VectorSearchResult,
  VectorStore,
} from './VectorStore.interface.js';

const VECTOR_INDEX_NAME = 'segment_embedding';
const BATCH_SIZE = 100;
/** The vector index is global, so scoped searches over-fetch before filtering. */
const CANDIDATE_MULTIPLIER = 10;

function toStoredSegment(node: unknown): StoredSegment {
  const props = nodeProperties(node);
  return {
    id: toStringValue(props.id),
    payload: {
      documentId: toStringValue(props.documentId),
      segmentIndex: toJsNumber(props.segmentIndex),
      text: toStringValue(props.text),
      pages: toNumberList(props.pages),
      section: toNullableString(props.section),
    },
  };
}

export class Neo4jVectorStore implements VectorStore {
  constructor(
    private readonly client: Neo4jClient,
    private readonly dimension: number = config.embedding.dimension
  ) {}

  async connect(): Promise<void> {
    await this.client.connect();
    await this.ensureIndexes();
  }

  private async ensureIndexes(): Promise<void> {
    try {
      await this.client.run(`
        CREATE VECTOR INDEX ${VECTOR_INDEX_NAME} IF NOT EXISTS
        FOR (s:Segment) ON s.embedding
        OPTIONS { indexConfig: {
          \`vector.dimensions\`: ${this.dimension},
          \`vector.similarity_function\`: 'cosine'
        }}
      `);
      await this.client.run('CREATE INDEX segment_documentId IF NOT EXISTS FOR (s:Segment) ON (s.documentId)');
      logger.info('Neo4j vector indexes ensured');
    } catch (error) {
      logger.error({ error }, 'Failed to create vector indexes');
      throw new GraphPersistenceError('Vector index creation failed', error);
    }
  }

  /** The shared client is closed by its owner. */
  async disconnect(): Promise<void> {}

  async testConnection(): Promise<boolean> {
    return this.client.testConnection();
  }

  async upsertDocuments(docs: VectorDocument[]): Promise<void> {
    try {
      const segments = docs.map(doc => ({
        id: doc.id,
        embedding: doc.vector,
        documentId: doc.payload.documentId,
        segmentIndex: doc.payload.segmentIndex,
        text: doc.payload.text,
        pages: doc.payload.pages,
        section: doc.payload.section,
      }));

      for (let i = 0; i < segments.length; i += BATCH_SIZE) {
        const batch = segments.slice(i, i + BATCH_SIZE);
        await this.client.run(
          `
          UNWIND $segments AS segment
          MERGE (s:Segment {id: segment.id})
          SET s.embedding = segment.embedding,
              s.documentId = segment.documentId,
              s.segmentIndex = segment.segmentIndex,
              s.text = segment.text,
              s.pages = segment.pages,
              s.section = segment.section
        `,
          { segments: batch }
        );
      }

      logger.debug({ count: docs.length }, 'Upserted segment vectors to Neo4j');
    } catch (error) {
      logger.error({ error, count: docs.length }, 'Failed to upsert vectors to Neo4j');
      throw new GraphPersistenceError('Vector upsert failed', error);
    }
  }

  async search(query: number[], limit: number, filter?: VectorSearchFilter): Promise<VectorSearchResult[]> {
    try {
      const params: Record<string, unknown> = {
        queryVector: query,
        candidates: neo4j.int(limit * CANDIDATE_MULTIPLIER),
        limit: neo4j.int(limit),
      };
      let whereClause = '';
      if (filter?.documentId) {
        params.documentId = filter.documentId;
        whereClause = 'WHERE segment.documentId = $documentId';
      }

      const result = await this.client.run(
        `
        CALL db.index.vector.queryNodes('${VECTOR_INDEX_NAME}', $candidates, $queryVector)
        YIELD node AS segment, score
        ${whereClause}
        RETURN segment, score
        ORDER BY score DESC
        LIMIT $limit
      `,
        params
      );

      return result.records.map(record => ({
        ...toStoredSegment(record.get('segment')),
        score: toJsNumber(record.get('score')),
      }));
    } catch (error) {
      logger.error({ error, limit }, 'Vector search failed in Neo4j');
      throw new GraphPersistenceError('Vector search failed', error);
    }
  }

  async listByDocumentId(documentId: string): Promise<StoredSegment[]> {
    try {
      const result = await this.client.run(
        `
        MATCH (s:Segment {documentId: $documentId})
        RETURN s
        ORDER BY s.segmentIndex ASC
      `,
        { documentId }
      );
      return result.records.map(record => toStoredSegment(record.get('s')));
    } catch (error) {
      logger.error({ error, documentId }, 'Failed to list segments from Neo4j');
      throw new GraphPersistenceError('Segment listing failed', error);
    }
  }

  async deleteByDocumentId(documentId: string): Promise<void> {
    try {
      await this.client.run('MATCH (s:Segment {documentId: $documentId}) DELETE s', { documentId });
      logger.debug({ documentId }, 'Deleted segment vectors from Neo4j');
    } catch (error) {
      logger.error({ error, documentId }, 'Failed to delete vectors from Neo4j');
      throw new GraphPersistenceError('Vector deletion failed', error);
    }
  }
}
