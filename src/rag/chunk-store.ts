import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { OnModuleDestroy } from '@nestjs/common';
import { Pool } from 'pg';
import { z } from 'zod';

import type { ChunkStore } from '../ai/capabilities';
import { RetrievalError } from '../common/errors';
import type { AppConfig, VectorMetric } from '../config/env';
import type { ChunkMatch, ChunkRecord } from '../query/types';
import { distanceFn, toVectorLiteral, vectorProblem } from './vector';

export interface ChunkStoreOptions {
  dimension: number;
  metric: VectorMetric;
}

const ChunkRecordSchema = z.object({
  doc_id: z.string().min(1),
  filename: z.string().min(1),
  chunk_index: z.number().int().min(0),
  content: z.string(),
  embedding: z.array(z.number()),
});

// Equal distances order by doc_id bytes (as collate "C" does), then chunk_index
export function compareMatches(a: ChunkMatch, b: ChunkMatch) {
  if (a.distance !== b.distance) return a.distance - b.distance;
  if (a.doc_id !== b.doc_id) {
    return Buffer.compare(Buffer.from(a.doc_id), Buffer.from(b.doc_id));
  }
  return a.chunk_index - b.chunk_index;
}

export class InMemoryChunkStore implements ChunkStore {
  private readonly records = new Map<string, ChunkRecord>();

  constructor(private readonly options: ChunkStoreOptions) {}

  get size() {
    return this.records.size;
  }

  add(records: ChunkRecord[]) {
    for (const record of records) {
      const key = `${record.doc_id}#${record.chunk_index}`;
      if (this.records.has(key)) {
        throw new Error(`Duplicate chunk ${key}`);
      }
      const problem = vectorProblem(
        record.embedding,
        this.options.dimension,
        `Chunk ${key}`,
      );
      if (problem) throw new Error(problem);
      this.records.set(key, record);
    }
  }

  async search(queryVector: number[], k: number): Promise<ChunkMatch[]> {
    const problem = vectorProblem(
      queryVector,
      this.options.dimension,
      'Query vector',
    );
    if (problem) throw new RetrievalError(problem);

    const distance = distanceFn(this.options.metric);
    return [...this.records.values()]
      .map((record) => ({
        ...record,
        distance: distance(queryVector, record.embedding),
      }))
      .sort(compareMatches)
      .slice(0, k);
  }
}

type ChunkRow = {
  doc_id: string;
  filename: string;
  chunk_index: number;
  content: string;
  embedding: string;
  dims: number;
  distance: number;
};

export class PgVectorChunkStore implements ChunkStore, OnModuleDestroy {
  private readonly table: string;

  constructor(
    private readonly pool: Pool,
    private readonly options: ChunkStoreOptions & { table: string },
  ) {
    if (!/^[a-zA-Z_][a-zA-Z0-9_.]*$/.test(options.table)) {
      throw new Error(`Invalid CHUNK_TABLE "${options.table}"`);
    }
    this.table = options.table;
  }

  async search(queryVector: number[], k: number): Promise<ChunkMatch[]> {
    const problem = vectorProblem(
      queryVector,
      this.options.dimension,
      'Query vector',
    );
    if (problem) throw new RetrievalError(problem);

    const operator = this.options.metric === 'cosine' ? '<=>' : '<->';
    const res = await this.pool.query<ChunkRow>(
      `
      select
        doc_id,
        filename,
        chunk_index,
        content,
        embedding::text as embedding,
        vector_dims(embedding) as dims,
        (embedding ${operator} $1::vector) as distance
      from ${this.table}
      order by distance, doc_id collate "C", chunk_index
      limit $2
      `,
      [toVectorLiteral(queryVector), k],
    );

    const mismatch = res.rows.find((r) => r.dims !== this.options.dimension);
    if (mismatch) {
      throw new RetrievalError(
        `Stored embeddings have ${mismatch.dims} dimensions; expected ${this.options.dimension}`,
      );
    }

    return res.rows.map((row) => ({
      doc_id: row.doc_id,
      filename: row.filename,
      chunk_index: row.chunk_index,
      content: row.content,
      embedding: z.array(z.number()).parse(JSON.parse(row.embedding)),
      distance: row.distance,
    }));
  }

  async onModuleDestroy() {
    await this.pool.end();
  }
}

export async function loadChunkFile(file: string): Promise<ChunkRecord[]> {
  const raw: unknown = JSON.parse(await readFile(path.resolve(file), 'utf8'));
  return z.array(ChunkRecordSchema).parse(raw);
}

export async function createChunkStore(config: AppConfig): Promise<ChunkStore> {
  const options = {
    dimension: config.vectorDimension,
    metric: config.vectorMetric,
  };

  if (config.chunkStore === 'memory') {
    const store = new InMemoryChunkStore(options);
    if (config.chunkStoreFile) {
      store.add(await loadChunkFile(config.chunkStoreFile));
    }
    return store;
  }

  const pool = new Pool({
    connectionString: config.databaseUrl ?? undefined,
    max: 5,
  });
  return new PgVectorChunkStore(pool, { ...options, table: config.chunkTable });
}
