import {
  FakeCompletionService,
  FakeEmbeddingService,
  chunk,
  testConfig,
} from '../../test/fakes';
import type { ChunkStore } from '../ai/capabilities';
import { GenerationError, RetrievalError } from '../common/errors';
import type { ChunkMatch } from '../query/types';
import { InMemoryChunkStore } from './chunk-store';
import {
  DocumentAnswerService,
  buildGroundingPrompt,
} from './document-answer.service';

function seededStore() {
  const store = new InMemoryChunkStore({ dimension: 3, metric: 'cosine' });
  store.add([
    chunk('esg-2024', 0, [0, 1, 0], 'Board composition and governance.'),
    chunk('esg-2024', 1, [1, 0, 0], 'Scope 1 emissions fell 12% year on year.'),
    chunk('esg-2024', 2, [0.9, 0.1, 0], 'Scope 2 emissions were flat.'),
  ]);
  return store;
}

describe('DocumentAnswerService', () => {
  it('answers from the retrieved chunks and lists them as sources', async () => {
    const llm = new FakeCompletionService(() => '  Emissions fell 12% [1].  ');
    const embedder = new FakeEmbeddingService([1, 0, 0]);
    const service = new DocumentAnswerService(
      embedder,
      seededStore(),
      llm,
      testConfig(),
    );

    const result = await service.answerDocument(
      'What does the report say about emissions?',
      2,
    );

    expect(result.answer).toBe('Emissions fell 12% [1].');
    expect(
      result.sources.map((s) => [s.doc_id, s.filename, s.chunk_index]),
    ).toEqual([
      ['esg-2024', 'esg-2024.pdf', 1],
      ['esg-2024', 'esg-2024.pdf', 2],
    ]);
    expect(embedder.calls).toEqual(['What does the report say about emissions?']);

    expect(llm.calls).toHaveLength(1);
    expect(llm.calls[0].task).toBe('answer');
    expect(llm.calls[0].system).toContain('Answer only from the document excerpts');
    expect(llm.calls[0].user).toContain(
      '[1] source=esg-2024.pdf#1\nScope 1 emissions fell 12% year on year.',
    );
    expect(llm.calls[0].user).toContain(
      '[2] source=esg-2024.pdf#2\nScope 2 emissions were flat.',
    );
    expect(llm.calls[0].user).not.toContain('Board composition');
  });

  it('raises RetrievalError without calling the model when nothing is found', async () => {
    const llm = new FakeCompletionService(() => 'should not be used');
    const empty = new InMemoryChunkStore({ dimension: 3, metric: 'cosine' });
    const service = new DocumentAnswerService(
      new FakeEmbeddingService(),
      empty,
      llm,
      testConfig(),
    );

    await expect(service.answerDocument('Any findings?', 3)).rejects.toThrow(
      RetrievalError,
    );
    expect(llm.calls).toHaveLength(0);
  });

  it('wraps a failing completion in GenerationError', async () => {
    const llm = new FakeCompletionService(() => {
      throw new Error('model overloaded');
    });
    const service = new DocumentAnswerService(
      new FakeEmbeddingService(),
      seededStore(),
      llm,
      testConfig(),
    );

    await expect(service.answerDocument('Emissions?', 1)).rejects.toThrow(
      GenerationError,
    );
  });

  it('treats an empty completion as a GenerationError', async () => {
    const service = new DocumentAnswerService(
      new FakeEmbeddingService(),
      seededStore(),
      new FakeCompletionService(() => '   '),
      testConfig(),
    );

    await expect(service.answerDocument('Emissions?', 1)).rejects.toThrow(
      'The model returned an empty answer',
    );
  });

  it('surfaces embedding and search failures as RetrievalError', async () => {
    const failingStore: ChunkStore = {
      search: async () => {
        throw new Error('connection refused');
      },
    };
    const llm = new FakeCompletionService(() => 'unused');
    const service = new DocumentAnswerService(
      new FakeEmbeddingService(),
      failingStore,
      llm,
      testConfig(),
    );

    await expect(service.answerDocument('Emissions?', 1)).rejects.toThrow(
      'Similarity search failed',
    );
    expect(llm.calls).toHaveLength(0);
  });

  it('passes the dimension check error through unchanged', async () => {
    const service = new DocumentAnswerService(
      new FakeEmbeddingService([1, 0]),
      seededStore(),
      new FakeCompletionService(() => 'unused'),
      testConfig(),
    );

    await expect(service.answerDocument('Emissions?', 1)).rejects.toThrow(
      'Query vector has 2 dimensions; the chunk store expects 3',
    );
  });

  it('uses only the first k chunks a store returns', async () => {
    const many: ChunkMatch[] = [0, 1, 2].map((i) => ({
      ...chunk('doc', i, [1, 0, 0]),
      distance: i / 10,
    }));
    const store: ChunkStore = { search: async () => many };
    const llm = new FakeCompletionService(() => 'ok');
    const service = new DocumentAnswerService(
      new FakeEmbeddingService(),
      store,
      llm,
      testConfig(),
    );

    const result = await service.answerDocument('q', 2);

    expect(result.sources.map((s) => s.chunk_index)).toEqual([0, 1]);
    expect(llm.calls[0].user).not.toContain('doc chunk 2');
  });

  it.each([0, -1, 2.5])('rejects k = %p', async (k) => {
    const service = new DocumentAnswerService(
      new FakeEmbeddingService(),
      seededStore(),
      new FakeCompletionService(() => 'unused'),
      testConfig(),
    );

    await expect(service.answerDocument('q', k)).rejects.toThrow(RangeError);
  });

  it('refuses to retrieve for an empty question', async () => {
    const embedder = new FakeEmbeddingService();
    const service = new DocumentAnswerService(
      embedder,
      seededStore(),
      new FakeCompletionService(() => 'unused'),
      testConfig(),
    );

    await expect(service.answerDocument('  ', 3)).rejects.toThrow(RetrievalError);
    expect(embedder.calls).toHaveLength(0);
  });
});

describe('buildGroundingPrompt', () => {
  it('numbers each chunk with its source tag before the question', () => {
    const prompt = buildGroundingPrompt('Why?', [
      { ...chunk('a', 0, [1, 0, 0], 'Alpha.'), distance: 0 },
      { ...chunk('b', 4, [1, 0, 0], 'Beta.'), distance: 0.1 },
    ]);

    expect(prompt).toBe(
      'Question:\nWhy?\n\nContext:\n[1] source=a.pdf#0\nAlpha.\n\n[2] source=b.pdf#4\nBeta.\n\nAnswer using only the context above and cite like [1], [2].',
    );
  });
});
