import { Module } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';

import { LangchainService } from './ai/langchain.service';
import { BedrockService } from './bedrock/bedrock.service';
import { QueryErrorFilter } from './common/query-error.filter';
import {
  APP_CONFIG,
  CHUNK_STORE,
  COMPLETION_SERVICE,
  EMBEDDING_SERVICE,
  SQL_EXECUTOR,
  WAREHOUSE_SCHEMA,
} from './common/tokens';
import { AppConfig, loadConfig } from './config/env';
import { loadWarehouseSchema } from './config/warehouse-schema';
import { EvalController } from './eval/eval.controller';
import { OrchestratorService } from './query/orchestrator.service';
import { QueryController } from './query/query.controller';
import { createChunkStore } from './rag/chunk-store';
import { DocumentAnswerService } from './rag/document-answer.service';
import { QueryClassifierService } from './router/query-classifier.service';
import { SchemaCatalogService } from './sql/schema-catalog.service';
import { SqlService } from './sql/sql.service';
import { StructuredAnswerService } from './sql/structured-answer.service';

@Module({
  controllers: [QueryController, EvalController],
  providers: [
    { provide: APP_CONFIG, useFactory: () => loadConfig() },
    {
      provide: WAREHOUSE_SCHEMA,
      inject: [APP_CONFIG],
      useFactory: (config: AppConfig) =>
        loadWarehouseSchema(config.warehouseSchemaFile),
    },
    { provide: COMPLETION_SERVICE, useClass: LangchainService },
    { provide: EMBEDDING_SERVICE, useClass: BedrockService },
    { provide: SQL_EXECUTOR, useClass: SqlService },
    {
      provide: CHUNK_STORE,
      inject: [APP_CONFIG],
      useFactory: (config: AppConfig) => createChunkStore(config),
    },
    { provide: APP_FILTER, useClass: QueryErrorFilter },
    SchemaCatalogService,
    QueryClassifierService,
    StructuredAnswerService,
    DocumentAnswerService,
    OrchestratorService,
  ],
})
export class AppModule {}
