/**
 * API Middleware: error handling.
 */

import { Request, Response, NextFunction } from 'express';
import { ConfigurationError, TypedError, apiError, createTypedError, describeError } from '../domain/errors';
import { OrchestratorError } from '../engine/orchestrator';
import { logger } from '../logger';

const log = logger.child({ module: 'api' });

/** Errors that carry a typed error for the response body. */
function typedErrorOf(err: unknown): TypedError | undefined {
  if (err instanceof OrchestratorError || err instanceof ConfigurationError) {
    return err.typedError;
  }
  return undefined;
}

/** Map a typed error to an HTTP status. */
export function getHttpStatus(error: TypedError): number {
  if (error.code.includes('NOT_FOUND')) return 404;
  if (error.code === 'PIPELINE.ALREADY_RUNNING') return 409;
  if (error.code.includes('INVALID_STATE_TRANSITION')) return 409;
  if (error.code.startsWith('VALIDATION.') || error.code.startsWith('CONFIG.')) return 422;
  return 500;
}

/** Send the error envelope for anything a route handler throws. */
export function sendError(res: Response, err: unknown): void {
  const typed = typedErrorOf(err);
  if (typed) {
    const status = getHttpStatus(typed);
    log.warn('Request error', { code: typed.code, status });
    res.status(status).json(apiError(typed));
    return;
  }

  log.error('Unhandled request error', {
    message: describeError(err),
    stack: err instanceof Error ? err.stack : undefined,
  });
  res.status(500).json(
    apiError(
      createTypedError({
        code: 'SYSTEM.INTERNAL',
        message: describeError(err) || 'Internal server error',
        retryable: false,
      }),
    ),
  );
}

/** Express error-handling middleware (e.g., malformed JSON bodies). */
export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof SyntaxError) {
    res.status(400).json(
      apiError(
        createTypedError({
          code: 'VALIDATION.MALFORMED_BODY',
          message: 'Request body is not valid JSON',
          retryable: false,
        }),
      ),
    );
    return;
  }
  sendError(res, err);
}
