import type { ArgumentsHost, ExceptionFilter } from '@nestjs/common';
import { Catch, HttpException, HttpStatus, Inject, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { FastifyRequest, FastifyReply } from 'fastify';
import { resolveCorrelationId } from '../correlation-id';
import { INTERNAL_ERROR, NOT_FOUND_ERROR } from './models/error-response.model';
import type {
  InternalErrorResponseModel,
  PathErrorResponseModel,
} from './models/error-response.model';
import type { AppConfig } from '../../config/config.schema';

@Catch()
export class AllExceptionsFilter implements ExceptionFilter {
  private readonly logger = new Logger(AllExceptionsFilter.name);
  private readonly headerName: string;

  constructor(
    @Inject(ConfigService) private readonly configService: ConfigService<AppConfig, true>,
  ) {
    this.headerName = this.configService.get('CORRELATION_ID_HEADER', { infer: true });
  }

  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const request = ctx.getRequest<FastifyRequest>();
    const response = ctx.getResponse<FastifyReply>();

    // Unmatched routes never reach the interceptor that normally sets this.
    if (!response.hasHeader(this.headerName)) {
      response.header(this.headerName, resolveCorrelationId(request.headers, this.headerName));
    }

    if (exception instanceof HttpException) {
      const statusCode = exception.getStatus();
      const body: PathErrorResponseModel = {
        error: statusCode === HttpStatus.NOT_FOUND ? NOT_FOUND_ERROR : this.resolveMessage(exception),
        path: request.url,
      };

      if (statusCode !== HttpStatus.NOT_FOUND) {
        this.logger.warn(`${request.method} ${request.url} failed with ${statusCode}: ${body.error}`);
      }

      response.status(statusCode).send(body);
      return;
    }

    const error = exception instanceof Error ? exception : new Error(String(exception));
    this.logger.error(error.message, error.stack);

    const body: InternalErrorResponseModel = {
      error: INTERNAL_ERROR,
      message: error.message,
    };

    response.status(HttpStatus.INTERNAL_SERVER_ERROR).send(body);
  }

  private resolveMessage(exception: HttpException): string {
    const response = exception.getResponse();

    if (typeof response === 'string') {
      return response;
    }

    if (typeof response === 'object' && response !== null && 'message' in response) {
      const { message } = response;
      if (typeof message === 'string') {
        return message;
      }
      if (Array.isArray(message)) {
        return message.join(', ');
      }
    }

    return exception.message;
  }
}
