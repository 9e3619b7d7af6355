import type { FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import { ZodError } from 'zod';
import { isProd } from '../../config/env.js';
import { AppError, ErrorCode } from '../errors/app-error.js';

interface ErrorResponse {
  code: string;
  message: string;
  details?: Record<string, unknown>;
  requestId?: string;
}

export function errorHandler(
  error: FastifyError | Error,
  request: FastifyRequest,
  reply: FastifyReply
) {
  const requestId = request.id;

  request.log.error({ err: error, requestId }, 'Request error');

  if (error instanceof AppError) {
    const response: ErrorResponse = {
      code: error.code,
      message: error.message,
      requestId,
    };

    if (error.details) {
      response.details = error.details;
    }

    return reply.status(error.statusCode).send(response);
  }

  if (error instanceof ZodError) {
    const response: ErrorResponse = {
      code: ErrorCode.INVALID_REQUEST,
      message: 'Validation failed',
      details: {
        errors: error.errors.map((e) => ({
          path: e.path.join('.'),
          message: e.message,
        })),
      },
      requestId,
    };

    return reply.status(400).send(response);
  }

  // Fastify schema validation
  if ('validation' in error && error.validation) {
    const response: ErrorResponse = {
      code: ErrorCode.INVALID_REQUEST,
      message: error.message,
      details: {
        validation: error.validation,
      },
      requestId,
    };

    return reply.status(400).send(response);
  }

  // Rate limiter and other plugins set statusCode on the error
  if ('statusCode' in error && error.statusCode === 429) {
    const response: ErrorResponse = {
      code: ErrorCode.RATE_LIMITED,
      message: error.message,
      requestId,
    };
    return reply.status(429).send(response);
  }

  const response: ErrorResponse = {
    code: ErrorCode.INTERNAL_ERROR,
    message: isProd ? 'Internal server error' : error.message,
    requestId,
  };

  return reply.status(500).send(response);
}
