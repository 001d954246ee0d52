import { isDatabaseConnectionError, readErrorField } from './dbErrorHandler';
import { dbLogger } from './logger';

export interface RetryOptions {
  maxRetries?: number;
  delayMs?: number;
  operationName?: string;
}

export const withRetry = async <T>(operation: () => Promise<T>, options: RetryOptions = {}): Promise<T> => {
  const { maxRetries = 3, delayMs = 1000, operationName = 'database operation' } = options;

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation();
    } catch (error) {
      // Only connection errors are retried
      if (!isDatabaseConnectionError(error) || attempt >= maxRetries) {
        throw error;
      }

      const backoffDelay = delayMs * attempt + Math.random() * 500;
      dbLogger.warn(
        {
          operation: operationName,
          attempt,
          maxRetries,
          code: readErrorField(error, 'code'),
          retryInMs: Math.round(backoffDelay),
        },
        'Database connection error, retrying'
      );

      await new Promise((resolve) => setTimeout(resolve, backoffDelay));
    }
  }
};
