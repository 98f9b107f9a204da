import type { ColumnInfo } from '../config/warehouse-schema';
import type { ChunkMatch } from '../query/types';

/** Which prompt is being sent; selects the model used for it. */
export type CompletionTask = 'route' | 'sql' | 'answer';

export interface CompletionRequest {
  task: CompletionTask;
  system: string;
  user: string;
}

export interface CompletionService {
  complete(request: CompletionRequest): Promise<string>;
}

export interface EmbeddingService {
  embed(text: string): Promise<number[]>;
}

export interface TabularResult {
  columns: string[];
  rows: Record<string, unknown>[];
}

export interface SqlExecutor {
  execute(sql: string): Promise<TabularResult>;
  /** Column metadata keyed by lower-cased table name; unknown tables are absent. */
  describeColumns(tables: string[]): Promise<Map<string, ColumnInfo[]>>;
}

export interface ChunkStore {
  /** The k nearest chunks, nearest first. */
  search(queryVector: number[], k: number): Promise<ChunkMatch[]>;
}
