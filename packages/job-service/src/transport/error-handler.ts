// packages/job-service/src/transport/error-handler.ts
//
// Centralized error handling for Fastify.
// Maps the service's typed errors onto status codes with a structured body.
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { ZodError } from 'zod';

import {
  type ErrorResponseDto,
  ArtifactNotFoundError,
  InvalidRequestError,
  JobAlreadyTerminalError,
  JobNotFoundError,
  JobServiceError,
} from '@setsplit/contracts';

import { logger } from '../infrastructure/logger.js';

/**
 * Error classification for consistent handling
 */
export enum ErrorType {
  VALIDATION_ERROR = 'validation_error',
  NOT_FOUND = 'not_found',
  CONFLICT = 'conflict',
  UNAVAILABLE = 'unavailable',
  CLIENT_ERROR = 'client_error',
  SERVER_ERROR = 'server_error',
}

function statusCodeOf(error: unknown): number | undefined {
  if (error && typeof error === 'object' && 'statusCode' in error) {
    const { statusCode } = error;
    if (typeof statusCode === 'number') return statusCode;
  }
  return undefined;
}

function classifyError(error: unknown): ErrorType {
  if (error instanceof InvalidRequestError || error instanceof ZodError) {
    return ErrorType.VALIDATION_ERROR;
  }
  if (error instanceof JobNotFoundError || error instanceof ArtifactNotFoundError) {
    return ErrorType.NOT_FOUND;
  }
  if (error instanceof JobAlreadyTerminalError) {
    return ErrorType.CONFLICT;
  }
  if (error instanceof JobServiceError && error.code === 'shutting_down') {
    return ErrorType.UNAVAILABLE;
  }
  const statusCode = statusCodeOf(error);
  if (statusCode !== undefined && statusCode >= 400 && statusCode < 500) {
    return ErrorType.CLIENT_ERROR;
  }
  return ErrorType.SERVER_ERROR;
}

function getHttpStatus(errorType: ErrorType, error: unknown): number {
  switch (errorType) {
    case ErrorType.VALIDATION_ERROR: {
      return 400;
    }
    case ErrorType.NOT_FOUND: {
      return 404;
    }
    case ErrorType.CONFLICT: {
      return 409;
    }
    case ErrorType.UNAVAILABLE: {
      return 503;
    }
    case ErrorType.CLIENT_ERROR: {
      return statusCodeOf(error) ?? 400;
    }
    default: {
      return 500;
    }
  }
}

function getErrorCode(errorType: ErrorType): string {
  switch (errorType) {
    case ErrorType.VALIDATION_ERROR: {
      return 'validation_failed';
    }
    case ErrorType.NOT_FOUND: {
      return 'not_found';
    }
    case ErrorType.CONFLICT: {
      return 'conflict';
    }
    case ErrorType.UNAVAILABLE: {
      return 'service_unavailable';
    }
    case ErrorType.CLIENT_ERROR: {
      return 'client_error';
    }
    default: {
      return 'internal_error';
    }
  }
}

function createErrorResponse(
  error: unknown,
  request: FastifyRequest,
  errorType: ErrorType,
): ErrorResponseDto {
  const response: ErrorResponseDto = {
    error: getErrorCode(errorType),
    message: 'An internal server error occurred',
    timestamp: new Date().toISOString(),
    requestId: request.id,
  };

  if (error instanceof ZodError) {
    const first = error.issues[0];
    response.message = first
      ? first.path.length > 0
        ? `${first.path.join('.')}: ${first.message}`
        : first.message
      : 'Validation failed';
    response.code = first?.code ?? 'validation_failed';
    return response;
  }

  if (error instanceof JobServiceError) {
    response.code = error.code;
  } else if (
    error &&
    typeof error === 'object' &&
    'code' in error &&
    typeof error.code === 'string'
  ) {
    response.code = error.code;
  }

  // Server errors keep the generic message.
  if (errorType !== ErrorType.SERVER_ERROR && error instanceof Error && error.message.length < 200) {
    response.message = error.message;
  }

  return response;
}

function logError(error: unknown, request: FastifyRequest, errorType: ErrorType): void {
  const logContext = {
    event: 'http_error',
    errorType,
    method: request.method,
    url: request.url,
    requestId: request.id,
    error:
      error instanceof Error
        ? { name: error.name, message: error.message, stack: error.stack }
        : String(error),
  };

  if (errorType === ErrorType.SERVER_ERROR) {
    logger.error('HTTP request failed with server error', logContext);
  } else {
    logger.warn('HTTP request failed with client error', logContext);
  }
}

export function errorHandler(error: unknown, request: FastifyRequest, reply: FastifyReply): void {
  const errorType = classifyError(error);
  logError(error, request, errorType);
  reply.code(getHttpStatus(errorType, error)).send(createErrorResponse(error, request, errorType));
}

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler(errorHandler);
}
