import 'dotenv/config';
import { ZodError } from 'zod';
import { configSchema, type Config } from './validation.js';

const env = (name: string): string | undefined => {
  const value = process.env[name];
  return value && value.trim().length > 0 ? value.trim() : undefined;
};

const int = (name: string): number | undefined => {
  const value = env(name);
  return value ? parseInt(value, 10) : undefined;
};

const float = (name: string): number | undefined => {
  const value = env(name);
  return value ? parseFloat(value) : undefined;
};

function llmApiKey(provider: string | undefined): string | undefined {
  switch (provider) {
    case 'anthropic':
      return env('ANTHROPIC_API_KEY');
    case 'openrouter':
      return env('OPENROUTER_API_KEY');
    default:
      return env('OPENAI_API_KEY');
  }
}

export function loadConfig(): Config {
  const nodeEnv = env('NODE_ENV');
  const llmProvider = env('LLM_PROVIDER');

  const rawConfig = {
    server: {
      nodeEnv,
      port: int('PORT'),
      logLevel: env('LOG_LEVEL') ?? (nodeEnv === 'test' ? 'silent' : undefined),
    },
    neo4j: {
      uri: env('NEO4J_URI'),
      user: env('NEO4J_USER'),
      password: env('NEO4J_PASSWORD'),
    },
    llm: {
      provider: llmProvider,
      apiKey: llmApiKey(llmProvider),
      model: env('LLM_MODEL'),
      maxTokens: int('LLM_MAX_TOKENS'),
      temperature: float('LLM_TEMPERATURE'),
      baseUrl: env('LLM_BASE_URL'),
    },
    embedding: {
      provider: env('EMBEDDING_PROVIDER'),
      apiKey: env('AZURE_OPENAI_API_KEY') ?? env('EMBEDDING_API_KEY') ?? env('OPENAI_API_KEY'),
      model: env('EMBEDDING_MODEL'),
      endpoint: env('AZURE_OPENAI_ENDPOINT'),
      apiVersion: env('AZURE_OPENAI_API_VERSION'),
      deployment: env('AZURE_OPENAI_EMBEDDING_DEPLOYMENT'),
      dimension: int('EMBEDDING_DIMENSION'),
    },
    vectorStore: {
      provider: env('VECTOR_STORE_PROVIDER'),
    },
    catalog: {
      source: env('CATALOG_SOURCE'),
      filePath: env('CATALOG_FILE'),
      frameworkId: env('CATALOG_FRAMEWORK_ID'),
    },
    storage: {
      auditBackend: env('AUDIT_STORAGE_BACKEND'),
      snapshotPath: env('SNAPSHOT_STORAGE_PATH'),
      maxUploadSizeMB: int('MAX_UPLOAD_SIZE_MB'),
    },
    pipeline: {
      evaluationMode: env('EVALUATION_MODE'),
      retrieval: env('RETRIEVAL_STRATEGY'),
      topK: int('RETRIEVAL_TOP_K'),
      concurrency: int('EVALUATION_CONCURRENCY'),
      maxSegmentChars: int('SEGMENT_MAX_CHARS'),
      maxSegmentTokens: int('SEGMENT_MAX_TOKENS'),
    },
  };

  try {
    return configSchema.parse(rawConfig);
  } catch (error) {
    if (error instanceof ZodError) {
      console.error('\n❌ Invalid configuration:\n');
      error.issues.forEach(issue => {
        const field = issue.path.join('.');
        console.error(`  ${field}: ${issue.message}`);
      });
      console.error('\nCheck the environment against .env.example\n');
    } else {
      console.error('Config error:', error);
    }
    process.exit(1);
  }
}

export const config = loadConfig();
