import { Inject, Injectable, Logger } from '@nestjs/common';

import type { SqlExecutor } from '../ai/capabilities';
import { ExecutionError } from '../common/errors';
import { SQL_EXECUTOR, WAREHOUSE_SCHEMA } from '../common/tokens';
import type { WarehouseSchemaConfig } from '../config/warehouse-schema';
import type { SchemaContext, TableSchema } from '../query/types';

/**
 * Table/column metadata for SQL generation. Columns come from the warehouse
 * itself; descriptions and relationships come from configuration.
 */
@Injectable()
export class SchemaCatalogService {
  private readonly logger = new Logger(SchemaCatalogService.name);

  private context?: Promise<SchemaContext>;

  constructor(
    @Inject(SQL_EXECUTOR) private readonly sql: SqlExecutor,
    @Inject(WAREHOUSE_SCHEMA) private readonly schema: WarehouseSchemaConfig,
  ) {}

  getSchemaContext(): Promise<SchemaContext> {
    if (!this.context) {
      this.context = this.discover().catch((err: unknown) => {
        this.context = undefined;
        throw err;
      });
    }
    return this.context;
  }

  private async discover(): Promise<SchemaContext> {
    const names = this.schema.tables.map((t) => t.name);
    const discovered = await this.sql.describeColumns(names);

    const tables: TableSchema[] = [];
    for (const table of this.schema.tables) {
      const columns =
        discovered.get(table.name.toLowerCase()) ?? table.columns ?? [];
      if (!columns.length) {
        this.logger.warn(`No columns found for table ${table.name}; skipping`);
        continue;
      }
      tables.push({
        name: table.name,
        description: table.description,
        columns,
      });
    }

    if (!tables.length) {
      throw new ExecutionError(
        `None of the configured tables could be described: ${names.join(', ')}`,
        null,
      );
    }

    this.logger.log(`Schema context ready: ${tables.length} table(s)`);
    return { tables, relationships: this.schema.relationships };
  }
}
