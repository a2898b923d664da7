import { z } from 'zod';

export const EVALUATION_MODES = ['agentic', 'single-pass'] as const;
export const RETRIEVAL_MODES = ['auto', 'hybrid', 'lexical'] as const;

export const configSchema = z
  .object({
    server: z.object({
      nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
      port: z.number().int().positive().default(3000),
      logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    }),
    neo4j: z.object({
      uri: z.string().min(1).default('bolt://localhost:7687'),
      user: z.string().min(1).default('neo4j'),
      password: z.string().default(''),
    }),
    llm: z.object({
      provider: z.enum(['openai', 'anthropic', 'openrouter']).default('openai'),
      apiKey: z.string().default(''),
      model: z.string().min(1).default('gpt-4o-mini'),
      maxTokens: z.number().int().positive().default(4000),
      temperature: z.number().min(0).max(2).default(0),
      baseUrl: z.string().url().optional(),
    }),
    embedding: z.object({
      provider: z.enum(['openai', 'azure']).default('openai'),
      apiKey: z.string().default(''),
      model: z.string().min(1).default('text-embedding-3-small'),
      endpoint: z.string().url().optional(),
      apiVersion: z.string().optional(),
      deployment: z.string().optional(),
      dimension: z.number().int().positive().default(1536),
    }),
    vectorStore: z.object({
      provider: z.enum(['neo4j', 'memory', 'none']).default('none'),
    }),
    catalog: z.object({
      source: z.enum(['file', 'neo4j']).default('file'),
      filePath: z.string().min(1).default('./data/frameworks/dpdp-2023.json'),
      frameworkId: z.string().min(1).default('dpdp-2023'),
    }),
    storage: z.object({
      auditBackend: z.enum(['memory', 'neo4j']).default('memory'),
      snapshotPath: z.string().min(1).default('./data/snapshots'),
      maxUploadSizeMB: z.number().positive().default(50),
    }),
    pipeline: z.object({
      evaluationMode: z.enum(EVALUATION_MODES).default('agentic'),
      retrieval: z.enum(RETRIEVAL_MODES).default('auto'),
      topK: z.number().int().positive().default(4),
      concurrency: z.number().int().positive().max(32).default(4),
      maxSegmentChars: z.number().int().positive().default(1500),
      maxSegmentTokens: z.number().int().positive().default(512),
    }),
  })
  .superRefine((value, ctx) => {
    const needsNeo4j =
      value.vectorStore.provider === 'neo4j' ||
      value.catalog.source === 'neo4j' ||
      value.storage.auditBackend === 'neo4j';
    if (needsNeo4j && value.neo4j.password.length === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['neo4j', 'password'],
        message: 'NEO4J_PASSWORD is required when any component is backed by Neo4j',
      });
    }
    if (value.embedding.provider === 'azure' && (!value.embedding.endpoint || !value.embedding.deployment)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['embedding'],
        message: 'Azure embeddings need AZURE_OPENAI_ENDPOINT and AZURE_OPENAI_EMBEDDING_DEPLOYMENT',
      });
    }
  });

export type Config = z.infer<typeof configSchema>;
export type PipelineSettings = Config['pipeline'];
export type EvaluationMode = (typeof EVALUATION_MODES)[number];
export type RetrievalMode = (typeof RETRIEVAL_MODES)[number];
