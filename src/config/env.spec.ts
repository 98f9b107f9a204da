import { loadConfig } from './env';

describe('loadConfig', () => {
  it('applies defaults', () => {
    const config = loadConfig({});

    expect(config.port).toBe(3000);
    expect(config.devMode).toBe(false);
    expect(config.chunkStore).toBe('pgvector');
    expect(config.vectorMetric).toBe('cosine');
    expect(config.vectorDimension).toBe(1024);
    expect(config.ragTopK).toBe(5);
    expect(config.models).toEqual({
      default: 'amazon.nova-lite-v1:0',
      route: 'amazon.nova-lite-v1:0',
      sql: 'amazon.nova-lite-v1:0',
      answer: 'amazon.nova-lite-v1:0',
      embedding: 'amazon.titan-embed-text-v2:0',
    });
    expect(config.awsRegion).toBeNull();
  });

  it('lets each task pick its own model', () => {
    const config = loadConfig({
      BEDROCK_LLM_MODEL: 'base-model',
      BEDROCK_SQL_MODEL: 'sql-model',
    });

    expect(config.models.route).toBe('base-model');
    expect(config.models.sql).toBe('sql-model');
    expect(config.models.answer).toBe('base-model');
  });

  it('coerces numbers and falls back across region variables', () => {
    const config = loadConfig({
      PORT: '8080',
      RAG_TOP_K: '3',
      AWS_DEFAULT_REGION: 'eu-west-1',
      DEV_MODE: 'true',
    });

    expect(config.port).toBe(8080);
    expect(config.ragTopK).toBe(3);
    expect(config.awsRegion).toBe('eu-west-1');
    expect(config.devMode).toBe(true);
  });

  it.each([
    [{ RAG_TOP_K: '0' }],
    [{ RAG_TOP_K: '51' }],
    [{ VECTOR_METRIC: 'manhattan' }],
    [{ CLASSIFIER_TIMEOUT_MS: 'soon' }],
  ])('rejects %p', (env) => {
    expect(() => loadConfig(env)).toThrow();
  });

  it('requires a chunk file for the in-memory store', () => {
    expect(() => loadConfig({ CHUNK_STORE: 'memory' })).toThrow(
      'CHUNK_STORE=memory requires CHUNK_STORE_FILE.',
    );
  });
});
