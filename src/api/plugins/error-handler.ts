import type { FastifyError, FastifyPluginAsync } from 'fastify';
import fp from 'fastify-plugin';
import { AppError, FetchError, InvalidFilterError } from '../../lib/errors.js';
import { ZodError } from 'zod';

const errorHandlerPluginFn: FastifyPluginAsync = async (app) => {
  app.setErrorHandler((error: FastifyError, request, reply) => {
    if (error instanceof AppError) {
      if (error.statusCode >= 500) {
        request.log.warn({ code: error.code, message: error.message }, 'Search request failed');
      }
      return reply.status(error.statusCode).send({
        error: error.code,
        message: error.message,
        ...errorDetails(error),
      });
    }

    if (error instanceof ZodError) {
      return reply.status(400).send({
        error: 'VALIDATION_ERROR',
        message: 'Invalid request',
        details: error.flatten().fieldErrors,
      });
    }

    // Fastify validation errors
    if (error.validation) {
      return reply.status(400).send({
        error: 'VALIDATION_ERROR',
        message: error.message || 'Validation error',
      });
    }

    request.log.error(error, 'Unhandled error');
    return reply.status(500).send({
      error: 'INTERNAL_ERROR',
      message: 'An unexpected error occurred',
    });
  });
};

function errorDetails(error: AppError): Record<string, unknown> {
  if (error instanceof FetchError) {
    return {
      details: {
        provider: error.provider,
        requestIndex: error.requestIndex,
        attempts: error.attempts,
        retryable: error.retryable,
        lastToken: error.lastToken ?? null,
      },
    };
  }
  if (error instanceof InvalidFilterError && error.criterionIndex !== undefined) {
    return { details: { criterionIndex: error.criterionIndex } };
  }
  return {};
}

export const errorHandlerPlugin = fp(errorHandlerPluginFn, { name: 'error-handler' });
