import type { Route } from '../ai/schemas';
import type { ColumnInfo, Relationship } from '../config/warehouse-schema';

export type { Route };

export interface Classification {
  route: Route;
  reasoning: string;
  confidence: number;
  strategy: 'model' | 'keywords' | 'default';
}

export interface ChunkRecord {
  doc_id: string;
  filename: string;
  chunk_index: number;
  content: string;
  embedding: number[];
}

export interface ChunkMatch extends ChunkRecord {
  distance: number;
}

export type ChunkRef = Pick<
  ChunkMatch,
  'doc_id' | 'filename' | 'chunk_index' | 'distance'
>;

export interface TableSchema {
  name: string;
  description?: string;
  columns: ColumnInfo[];
}

export interface SchemaContext {
  tables: TableSchema[];
  relationships: Relationship[];
}

export interface StructuredResult {
  generated_sql: string;
  rows: Record<string, unknown>[];
  columns: string[];
}

export interface DocumentResult {
  answer: string;
  sources: ChunkRef[];
}

export type AnswerSide = 'structured' | 'document';

export interface HalfFailure {
  side: AnswerSide;
  error: string;
  message: string;
}

export interface CombinedResponse {
  classification: Classification;
  structured?: StructuredResult;
  document?: DocumentResult;
  final_answer: string;
  failures: HalfFailure[];
}
