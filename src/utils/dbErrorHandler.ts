/**
 * Classification of database driver errors
 */

const CONNECTION_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ENOTFOUND',
  'ETIMEDOUT',
  'ECONNRESET',
  'ENETUNREACH',
  'EHOSTUNREACH',
  // PostgreSQL connection classes
  '57P01', // admin_shutdown
  '57P02', // crash_shutdown
  '57P03', // cannot_connect_now
  '57P04', // database_shutdown
  '08000', // connection_exception
  '08001', // sqlclient_unable_to_establish_sqlconnection
  '08003', // connection_does_not_exist
  '08004', // sqlserver_rejected_establishment_of_sqlconnection
  '08006', // connection_failure
  '53300', // too_many_connections
]);

const CONNECTION_ERROR_MESSAGES = [
  'connection terminated',
  'client has been closed',
  'server closed the connection',
  'no connection to the server',
  'timeout exceeded when trying to connect',
];

export interface DatabaseErrorResponse {
  status: number;
  error: {
    code: string;
    message: string;
    details?: string;
  };
}

export const readErrorField = (error: unknown, key: 'code' | 'message'): string | undefined => {
  if (typeof error !== 'object' || error === null || !(key in error)) return undefined;
  const value: unknown = Reflect.get(error, key);
  return typeof value === 'string' ? value : undefined;
};

export function isDatabaseConnectionError(error: unknown): boolean {
  if (typeof error !== 'object' || error === null) return false;

  const code = readErrorField(error, 'code');
  if (code && CONNECTION_ERROR_CODES.has(code)) {
    return true;
  }

  const message = (readErrorField(error, 'message') ?? '').toLowerCase();
  if (CONNECTION_ERROR_MESSAGES.some((fragment) => message.includes(fragment))) {
    return true;
  }

  // AggregateError from dual-stack connection attempts
  if (error instanceof AggregateError) {
    return error.errors.some((inner: unknown) => isDatabaseConnectionError(inner));
  }

  return false;
}

export function isTableMissingError(error: unknown): boolean {
  // PostgreSQL "relation does not exist"
  if (readErrorField(error, 'code') === '42P01') {
    return true;
  }

  const message = (readErrorField(error, 'message') ?? '').toLowerCase();
  return message.includes('no such table') || (message.includes('relation') && message.includes('does not exist'));
}

/**
 * Map a driver error to an HTTP response, or null when the error is not a
 * database availability problem.
 */
export function handleDatabaseError(error: unknown, isDevelopment: boolean): DatabaseErrorResponse | null {
  if (isDatabaseConnectionError(error)) {
    return {
      status: 503,
      error: {
        code: 'DATABASE_UNAVAILABLE',
        message: 'Database connection failed. Please try again shortly.',
        details: isDevelopment ? `Connection error: ${readErrorField(error, 'code') ?? readErrorField(error, 'message')}` : undefined,
      },
    };
  }

  if (isTableMissingError(error)) {
    return {
      status: 503,
      error: {
        code: 'SCHEMA_NOT_INITIALIZED',
        message: 'Database tables do not exist. Please run the database schema migration.',
        details: isDevelopment ? 'Run: npm run db:schema' : undefined,
      },
    };
  }

  return null;
}
