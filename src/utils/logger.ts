/**
 * Structured Logging Module
 *
 * Provides structured JSON logging functions for consistent logging across
 * the application. All logs include request_id and timestamp where known.
 * Credentials and contact details are redacted before anything is written.
 */

/**
 * Log levels
 */
export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 10,
  [LogLevel.INFO]: 20,
  [LogLevel.WARN]: 30,
  [LogLevel.ERROR]: 40,
};

/**
 * Base log entry structure
 */
interface BaseLogEntry {
  timestamp: string;
  level: LogLevel;
  request_id?: string;
  user_id?: number;
}

/**
 * API request log entry
 */
interface RequestLogEntry extends BaseLogEntry {
  log_type: 'API_REQUEST';
  method: string;
  path: string;
  status_code: number;
  latency_ms: number;
}

/**
 * Authentication log entry
 */
interface AuthenticationLogEntry extends BaseLogEntry {
  log_type: 'AUTHENTICATION';
  action: 'SIGNUP' | 'LOGIN' | 'TOKEN' | 'LOGOUT';
  success: boolean;
  reason?: string;
  username?: string;
}

/**
 * Database error log entry
 */
interface DatabaseLogEntry extends BaseLogEntry {
  log_type: 'DATABASE_ERROR';
  error_message: string;
  query_preview: string;
  operation: string;
}

/**
 * CSV import log entry
 */
interface CsvImportLogEntry extends BaseLogEntry {
  log_type: 'CSV_IMPORT';
  filename: string;
  success: boolean;
  imported: number;
  failed_row?: number;
  reason?: string;
  duration_ms: number;
}

/**
 * Email pattern masked in free-text values
 */
const EMAIL_PATTERN = /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g;

/**
 * Fields that are never written to logs
 */
const REDACTED_FIELDS = [
  'password',
  'hashed_password',
  'access_token',
  'token',
  'authorization',
  'email',
];

/**
 * Sanitize string by masking email addresses
 */
function sanitizeString(value: string): string {
  return value.replace(EMAIL_PATTERN, '[EMAIL_REDACTED]');
}

function sanitizeValue(value: unknown): unknown {
  if (typeof value === 'string') {
    return sanitizeString(value);
  }
  if (Array.isArray(value)) {
    return value.map(sanitizeValue);
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (value !== null && typeof value === 'object') {
    return sanitizeObject(Object.fromEntries(Object.entries(value)));
  }
  return value;
}

/**
 * Sanitize object by removing sensitive fields and patterns
 */
function sanitizeObject(obj: Record<string, unknown>): Record<string, unknown> {
  const sanitized: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(obj)) {
    if (REDACTED_FIELDS.includes(key.toLowerCase())) {
      sanitized[key] = '[REDACTED]';
      continue;
    }
    sanitized[key] = sanitizeValue(value);
  }

  return sanitized;
}

/**
 * Minimum level from LOG_LEVEL (read per call so tests can change it)
 */
function minimumLevel(): number {
  const configured = (process.env.LOG_LEVEL || 'info').toUpperCase();
  const level = Object.values(LogLevel).find((candidate) => candidate === configured);
  return LEVEL_ORDER[level ?? LogLevel.INFO];
}

/**
 * Write log entry to console (CloudWatch)
 */
function writeLog(entry: BaseLogEntry): void {
  if (LEVEL_ORDER[entry.level] < minimumLevel()) {
    return;
  }
  const logMethod = entry.level === LogLevel.ERROR ? console.error : console.log;
  logMethod(JSON.stringify(entry));
}

/**
 * Log API request
 *
 * Logs every API request with method, path, status code and latency.
 *
 * @example
 * ```typescript
 * logRequest({
 *   requestId: 'abc-123',
 *   method: 'GET',
 *   path: '/players',
 *   userId: 7,
 *   statusCode: 200,
 *   latencyMs: 45
 * });
 * ```
 */
export function logRequest(params: {
  requestId: string;
  method: string;
  path: string;
  userId?: number;
  statusCode: number;
  latencyMs: number;
}): void {
  const entry: RequestLogEntry = {
    timestamp: new Date().toISOString(),
    level: params.statusCode >= 500 ? LogLevel.ERROR : params.statusCode >= 400 ? LogLevel.WARN : LogLevel.INFO,
    log_type: 'API_REQUEST',
    request_id: params.requestId,
    user_id: params.userId,
    method: params.method,
    path: params.path,
    status_code: params.statusCode,
    latency_ms: params.latencyMs,
  };

  writeLog(entry);
}

/**
 * Log authentication event
 *
 * Records signups, logins, token checks and logouts. The reason for a
 * rejected token is only ever written here, never returned to the caller.
 */
export function logAuthentication(params: {
  requestId?: string;
  action: AuthenticationLogEntry['action'];
  success: boolean;
  userId?: number;
  username?: string;
  reason?: string;
}): void {
  const entry: AuthenticationLogEntry = {
    timestamp: new Date().toISOString(),
    level: params.success ? LogLevel.INFO : LogLevel.WARN,
    log_type: 'AUTHENTICATION',
    request_id: params.requestId,
    user_id: params.userId,
    action: params.action,
    success: params.success,
    username: params.username,
    reason: params.reason,
  };

  writeLog(entry);
}

/**
 * Log database error
 *
 * Logs database errors with a sanitized, truncated query preview.
 */
export function logDatabase(params: {
  requestId?: string;
  errorMessage: string;
  query: string;
  operation: string;
}): void {
  const sanitizedQuery = sanitizeString(params.query);

  const queryPreview = sanitizedQuery.length > 200
    ? sanitizedQuery.substring(0, 200) + '...'
    : sanitizedQuery;

  const entry: DatabaseLogEntry = {
    timestamp: new Date().toISOString(),
    level: LogLevel.ERROR,
    log_type: 'DATABASE_ERROR',
    request_id: params.requestId,
    error_message: params.errorMessage,
    query_preview: queryPreview,
    operation: params.operation,
  };

  writeLog(entry);
}

/**
 * Log CSV import outcome
 */
export function logCsvImport(params: {
  requestId?: string;
  filename: string;
  success: boolean;
  imported: number;
  failedRow?: number;
  reason?: string;
  durationMs: number;
}): void {
  const entry: CsvImportLogEntry = {
    timestamp: new Date().toISOString(),
    level: params.success ? LogLevel.INFO : LogLevel.WARN,
    log_type: 'CSV_IMPORT',
    request_id: params.requestId,
    filename: params.filename,
    success: params.success,
    imported: params.imported,
    failed_row: params.failedRow,
    reason: params.reason,
    duration_ms: params.durationMs,
  };

  writeLog(entry);
}

/**
 * Log generic message with context
 *
 * General-purpose logging function. Context is sanitized before writing.
 *
 * @example
 * ```typescript
 * log(LogLevel.INFO, 'Migrations applied', { tables: ['users', 'players'] });
 * ```
 */
export function log(
  level: LogLevel,
  message: string,
  context?: Record<string, unknown>
): void {
  const sanitizedContext = context ? sanitizeObject(context) : {};

  const entry = {
    timestamp: new Date().toISOString(),
    level,
    message,
    ...sanitizedContext,
  };

  writeLog(entry);
}
