import { Inject, Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { Pool } from 'pg';

import type { SqlExecutor, TabularResult } from '../ai/capabilities';
import { ExecutionError } from '../common/errors';
import { assertReadOnlySql } from '../common/sql-guard';
import { APP_CONFIG } from '../common/tokens';
import type { AppConfig } from '../config/env';
import type { ColumnInfo } from '../config/warehouse-schema';

type ColumnRow = {
  table_name: string;
  column_name: string;
  data_type: string;
};

@Injectable()
export class SqlService implements SqlExecutor, OnModuleDestroy {
  private readonly logger = new Logger(SqlService.name);
  private readonly pool: Pool;

  constructor(@Inject(APP_CONFIG) private readonly config: AppConfig) {
    this.pool = new Pool({
      connectionString: config.databaseUrl ?? undefined,
      max: 5,
      application_name: 'hybrid_query_router',
    });
  }

  private safeIdent(name: string) {
    const trimmed = (name || '').trim();
    if (!/^[a-zA-Z_][a-zA-Z0-9_]*$/.test(trimmed)) {
      throw new ExecutionError(`Invalid WAREHOUSE_SCHEMA "${name}"`, null);
    }
    return `"${trimmed}"`;
  }

  async execute(sql: string): Promise<TabularResult> {
    assertReadOnlySql(sql);

    const schema = this.safeIdent(this.config.warehouseSchema);
    const client = await this.pool.connect().catch((err: unknown) => {
      throw new ExecutionError('Cannot connect to the warehouse', sql, {
        cause: err,
      });
    });

    try {
      // Postgres rejects any write inside a read-only transaction
      await client.query('begin transaction read only');
      await client.query(
        `set local statement_timeout = '${this.config.sqlStatementTimeoutMs}ms'`,
      );
      await client.query(`set local search_path to ${schema}, public`);

      const res = await client.query<Record<string, unknown>>(sql);
      await client.query('commit');
      return {
        columns: res.fields?.map((f) => f.name) ?? [],
        rows: res.rows,
      };
    } catch (err) {
      await client.query('rollback').catch((rollbackErr: unknown) => {
        this.logger.warn(
          `Rollback failed: ${rollbackErr instanceof Error ? rollbackErr.message : String(rollbackErr)}`,
        );
      });
      const message = err instanceof Error ? err.message : String(err);
      throw new ExecutionError(`SQL execution failed: ${message}`, sql, {
        cause: err,
      });
    } finally {
      client.release();
    }
  }

  async describeColumns(tables: string[]): Promise<Map<string, ColumnInfo[]>> {
    let rows: ColumnRow[];
    try {
      const res = await this.pool.query<ColumnRow>(
        `
        select table_name, column_name, data_type
        from information_schema.columns
        where table_schema = $1
          and lower(table_name) = any($2::text[])
        order by table_name, ordinal_position
        `,
        [this.config.warehouseSchema, tables.map((t) => t.toLowerCase())],
      );
      rows = res.rows;
    } catch (err) {
      throw new ExecutionError('Cannot read warehouse column metadata', null, {
        cause: err,
      });
    }

    const byTable = new Map<string, ColumnInfo[]>();
    for (const row of rows) {
      const key = row.table_name.toLowerCase();
      const columns = byTable.get(key) ?? [];
      columns.push({ name: row.column_name, type: row.data_type });
      byTable.set(key, columns);
    }
    return byTable;
  }

  async onModuleDestroy() {
    await this.pool.end();
  }
}
