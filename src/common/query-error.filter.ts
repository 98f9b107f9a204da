import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { HttpAdapterHost } from '@nestjs/core';

import {
  ExecutionError,
  GenerationError,
  OrchestratorError,
  RetrievalError,
  TimeoutError,
} from './errors';

export function statusFor(error: OrchestratorError): number {
  if (error instanceof RetrievalError) return HttpStatus.NOT_FOUND;
  if (error instanceof GenerationError) return HttpStatus.BAD_GATEWAY;
  if (error instanceof ExecutionError) return HttpStatus.BAD_GATEWAY;
  if (error instanceof TimeoutError) return HttpStatus.GATEWAY_TIMEOUT;
  return HttpStatus.INTERNAL_SERVER_ERROR;
}

@Catch(OrchestratorError)
export class QueryErrorFilter implements ExceptionFilter<OrchestratorError> {
  private readonly logger = new Logger(QueryErrorFilter.name);

  constructor(private readonly adapterHost: HttpAdapterHost) {}

  catch(error: OrchestratorError, host: ArgumentsHost) {
    const { httpAdapter } = this.adapterHost;
    const status = statusFor(error);
    this.logger.error(`${error.name}: ${error.message}`);

    const body: Record<string, unknown> = {
      error: error.name,
      message: error.message,
    };
    if (error instanceof ExecutionError && error.sql) body.sql = error.sql;

    httpAdapter.reply(host.switchToHttp().getResponse(), body, status);
  }
}
