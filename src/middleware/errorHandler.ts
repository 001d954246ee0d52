import { NextFunction, Request, Response } from 'express';
import { ZodError } from 'zod';
import { isAppError } from '../lib/errors';
import { handleDatabaseError } from '../utils/dbErrorHandler';
import { httpLogger } from '../utils/logger';

export const notFoundHandler = (req: Request, res: Response) => {
  res.status(404).json({
    error: { code: 'NOT_FOUND', message: `Route ${req.method} ${req.path} not found` },
  });
};

const zodFieldMessages = (error: ZodError): Record<string, string> => {
  const fields: Record<string, string> = {};
  for (const issue of error.issues) {
    const path = issue.path.join('.') || 'body';
    fields[path] ??= issue.message;
  }
  return fields;
};

/**
 * Central error mapping. Every failure leaves as `{ error: { code, message } }`.
 */
export const createErrorHandler = (isDevelopment: boolean) => {
  return (error: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (isAppError(error)) {
      if (error.statusCode >= 500) {
        httpLogger.error({ err: error, path: req.path }, error.message);
      } else {
        httpLogger.debug({ code: error.code, path: req.path }, error.message);
      }
      return res.status(error.statusCode).json({
        error: { code: error.code, message: error.message, ...(error.details && { fields: error.details }) },
      });
    }

    if (error instanceof ZodError) {
      return res.status(400).json({
        error: { code: 'VALIDATION_ERROR', message: 'Invalid request', fields: zodFieldMessages(error) },
      });
    }

    // Malformed JSON body from express.json()
    if (error instanceof SyntaxError && 'body' in error) {
      return res.status(400).json({
        error: { code: 'VALIDATION_ERROR', message: 'Request body is not valid JSON' },
      });
    }

    const dbResponse = handleDatabaseError(error, isDevelopment);
    if (dbResponse) {
      httpLogger.error({ err: error, path: req.path }, dbResponse.error.message);
      return res.status(dbResponse.status).json({ error: dbResponse.error });
    }

    httpLogger.error({ err: error, method: req.method, path: req.path }, 'Unhandled error');
    res.status(500).json({
      error: { code: 'INTERNAL_ERROR', message: 'Something went wrong' },
    });
  };
};
