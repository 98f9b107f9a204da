import { Inject, Injectable, Logger } from '@nestjs/common';

import type { CompletionService, SqlExecutor } from '../ai/capabilities';
import { ExecutionError, GenerationError } from '../common/errors';
import { assertReadOnlySql, extractSql } from '../common/sql-guard';
import { withTimeout } from '../common/timeout';
import { APP_CONFIG, COMPLETION_SERVICE, SQL_EXECUTOR } from '../common/tokens';
import type { AppConfig } from '../config/env';
import type { SchemaContext, StructuredResult } from '../query/types';

const SQL_SYSTEM_PROMPT = [
  'You are a SQL expert for a PostgreSQL analytics warehouse.',
  'Write exactly one read-only query (SELECT or WITH) that answers the question.',
  'Use only the tables, columns and relationships listed.',
  'Return only the SQL. No explanations, no markdown.',
].join(' ');

export function describeSchema(schema: SchemaContext): string {
  const lines = ['Tables:'];
  for (const table of schema.tables) {
    const header = table.description
      ? `${table.name} -- ${table.description}`
      : table.name;
    lines.push(header);
    for (const col of table.columns) {
      lines.push(`  - ${col.name} (${col.type})`);
    }
  }

  if (schema.relationships.length) {
    lines.push('', 'Relationships:');
    for (const rel of schema.relationships) {
      lines.push(
        `- ${rel.left_table}.${rel.left_column} -> ${rel.right_table}.${rel.right_column} (${rel.type})`,
      );
    }
  }
  return lines.join('\n');
}

export function buildSqlPrompt(question: string, schema: SchemaContext) {
  return `${describeSchema(schema)}\n\nQuestion:\n${question}\n\nSQL:`;
}

@Injectable()
export class StructuredAnswerService {
  private readonly logger = new Logger(StructuredAnswerService.name);

  constructor(
    @Inject(COMPLETION_SERVICE) private readonly llm: CompletionService,
    @Inject(SQL_EXECUTOR) private readonly sql: SqlExecutor,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
  ) {}

  async answerStructured(
    question: string,
    schema: SchemaContext,
  ): Promise<StructuredResult> {
    let reply: string;
    try {
      reply = await withTimeout(
        this.llm.complete({
          task: 'sql',
          system: SQL_SYSTEM_PROMPT,
          user: buildSqlPrompt(question, schema),
        }),
        this.config.timeouts.completionMs,
        'SQL generation',
      );
    } catch (err) {
      throw new GenerationError('SQL generation failed', { cause: err });
    }

    const generatedSql = extractSql(reply);
    if (!generatedSql) {
      throw new GenerationError('The model returned no SQL');
    }

    // Throws GenerationError; nothing is executed on rejection
    assertReadOnlySql(generatedSql);
    this.logger.log(`Generated SQL: ${generatedSql}`);

    try {
      const result = await this.sql.execute(generatedSql);
      return {
        generated_sql: generatedSql,
        columns: result.columns.length
          ? result.columns
          : Object.keys(result.rows[0] ?? {}),
        rows: result.rows,
      };
    } catch (err) {
      if (err instanceof ExecutionError) throw err;
      const message = err instanceof Error ? err.message : String(err);
      throw new ExecutionError(`SQL execution failed: ${message}`, generatedSql, {
        cause: err,
      });
    }
  }
}
