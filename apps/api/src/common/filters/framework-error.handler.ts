import { HttpStatus } from '@nestjs/common';
import type { FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import { resolveCorrelationId } from '../correlation-id';
import { NOT_FOUND_ERROR } from './models/error-response.model';
import type { PathErrorResponseModel } from './models/error-response.model';

const BAD_URL = 'FST_ERR_BAD_URL';

/**
 * Answers errors Fastify raises before routing, where neither Nest's
 * interceptors nor its exception filters run. A URL that cannot be decoded
 * matches no route, so it gets the same 404 as any other routing miss.
 */
export function createFrameworkErrorHandler(correlationIdHeader: string) {
  return (error: FastifyError, request: FastifyRequest, reply: FastifyReply): void => {
    reply.header(correlationIdHeader, resolveCorrelationId(request.headers, correlationIdHeader));

    const statusCode =
      error.code === BAD_URL
        ? HttpStatus.NOT_FOUND
        : error.statusCode ?? HttpStatus.INTERNAL_SERVER_ERROR;

    const body: PathErrorResponseModel = {
      error: error.code === BAD_URL ? NOT_FOUND_ERROR : error.message,
      path: request.url,
    };

    reply.status(statusCode).send(body);
  };
}
