import type { CallHandler, ExecutionContext, NestInterceptor } from '@nestjs/common';
import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { Observable } from 'rxjs';
import type { FastifyRequest, FastifyReply } from 'fastify';
import { resolveCorrelationId } from '../correlation-id';
import type { AppConfig } from '../../config/config.schema';

@Injectable()
export class CorrelationIdInterceptor implements NestInterceptor {
  private readonly headerName: string;

  constructor(
    @Inject(ConfigService) private readonly configService: ConfigService<AppConfig, true>,
  ) {
    this.headerName = this.configService.get('CORRELATION_ID_HEADER', { infer: true });
  }

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const http = context.switchToHttp();
    const request = http.getRequest<FastifyRequest>();
    const response = http.getResponse<FastifyReply>();

    response.header(this.headerName, resolveCorrelationId(request.headers, this.headerName));

    return next.handle();
  }
}
