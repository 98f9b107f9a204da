import { z } from 'zod';

const positiveInt = z.coerce.number().int().positive();

const envSchema = z.object({
  PORT: positiveInt.default(3000),
  DEV_MODE: z.enum(['true', 'false']).default('false'),

  DATABASE_URL: z.string().optional(),
  WAREHOUSE_SCHEMA: z.string().default('public'),
  WAREHOUSE_SCHEMA_FILE: z.string().default('config/warehouse-schema.json'),
  SQL_STATEMENT_TIMEOUT_MS: positiveInt.default(8000),

  AWS_REGION: z.string().optional(),
  AWS_DEFAULT_REGION: z.string().optional(),
  BEDROCK_AWS_REGION: z.string().optional(),
  BEDROCK_LLM_MODEL: z.string().default('amazon.nova-lite-v1:0'),
  BEDROCK_ROUTER_MODEL: z.string().optional(),
  BEDROCK_SQL_MODEL: z.string().optional(),
  BEDROCK_ANSWER_MODEL: z.string().optional(),
  BEDROCK_EMBED_MODEL: z.string().default('amazon.titan-embed-text-v2:0'),
  LLM_MAX_RETRIES: z.coerce.number().int().min(0).default(2),

  CHUNK_STORE: z.enum(['pgvector', 'memory']).default('pgvector'),
  CHUNK_STORE_FILE: z.string().optional(),
  CHUNK_TABLE: z.string().default('pdf_doc_chunks'),
  VECTOR_DIMENSION: positiveInt.default(1024),
  VECTOR_METRIC: z.enum(['cosine', 'euclidean']).default('cosine'),
  RAG_TOP_K: positiveInt.max(50).default(5),

  CLASSIFIER_TIMEOUT_MS: positiveInt.default(8000),
  COMPLETION_TIMEOUT_MS: positiveInt.default(30000),
  EMBEDDING_TIMEOUT_MS: positiveInt.default(10000),
  SEARCH_TIMEOUT_MS: positiveInt.default(10000),

  MAX_RENDERED_ROWS: positiveInt.default(20),
});

export type VectorMetric = 'cosine' | 'euclidean';

export interface AppConfig {
  port: number;
  devMode: boolean;
  databaseUrl: string | null;
  warehouseSchema: string;
  warehouseSchemaFile: string;
  sqlStatementTimeoutMs: number;
  awsRegion: string | null;
  models: {
    default: string;
    route: string;
    sql: string;
    answer: string;
    embedding: string;
  };
  llmMaxRetries: number;
  chunkStore: 'pgvector' | 'memory';
  chunkStoreFile: string | null;
  chunkTable: string;
  vectorDimension: number;
  vectorMetric: VectorMetric;
  ragTopK: number;
  timeouts: {
    classifierMs: number;
    completionMs: number;
    embeddingMs: number;
    searchMs: number;
  };
  maxRenderedRows: number;
}

export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  const parsed = envSchema.parse(env);

  if (parsed.CHUNK_STORE === 'memory' && !parsed.CHUNK_STORE_FILE) {
    throw new Error('CHUNK_STORE=memory requires CHUNK_STORE_FILE.');
  }

  return {
    port: parsed.PORT,
    devMode: parsed.DEV_MODE === 'true',
    databaseUrl: parsed.DATABASE_URL ?? null,
    warehouseSchema: parsed.WAREHOUSE_SCHEMA,
    warehouseSchemaFile: parsed.WAREHOUSE_SCHEMA_FILE,
    sqlStatementTimeoutMs: parsed.SQL_STATEMENT_TIMEOUT_MS,
    awsRegion:
      parsed.AWS_REGION ||
      parsed.AWS_DEFAULT_REGION ||
      parsed.BEDROCK_AWS_REGION ||
      null,
    models: {
      default: parsed.BEDROCK_LLM_MODEL,
      route: parsed.BEDROCK_ROUTER_MODEL ?? parsed.BEDROCK_LLM_MODEL,
      sql: parsed.BEDROCK_SQL_MODEL ?? parsed.BEDROCK_LLM_MODEL,
      answer: parsed.BEDROCK_ANSWER_MODEL ?? parsed.BEDROCK_LLM_MODEL,
      embedding: parsed.BEDROCK_EMBED_MODEL,
    },
    llmMaxRetries: parsed.LLM_MAX_RETRIES,
    chunkStore: parsed.CHUNK_STORE,
    chunkStoreFile: parsed.CHUNK_STORE_FILE ?? null,
    chunkTable: parsed.CHUNK_TABLE,
    vectorDimension: parsed.VECTOR_DIMENSION,
    vectorMetric: parsed.VECTOR_METRIC,
    ragTopK: parsed.RAG_TOP_K,
    timeouts: {
      classifierMs: parsed.CLASSIFIER_TIMEOUT_MS,
      completionMs: parsed.COMPLETION_TIMEOUT_MS,
      embeddingMs: parsed.EMBEDDING_TIMEOUT_MS,
      searchMs: parsed.SEARCH_TIMEOUT_MS,
    },
    maxRenderedRows: parsed.MAX_RENDERED_ROWS,
  };
}
