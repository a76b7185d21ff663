/**
 * Structured Logger Service
 *
 * JSON-formatted log lines on stderr (stdout is reserved for the MCP
 * JSON-RPC protocol when running as a server).
 *
 * Every line of one pipeline run shares a request_id, so
 *   grep "req_1734345045123_a1b2c3"
 * shows the whole lifecycle of a question.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  // Correlation
  request_id?: string;
  database_id?: string;

  // Pipeline
  stage?: string;
  decision?: string;
  confidence?: number;
  bucket?: string;

  // Performance
  duration_ms?: number;
  rows?: number;

  // Errors
  error?: string;

  // Extensible
  [key: string]: unknown;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

/**
 * Minimum level, read on every call so tests can flip LOG_LEVEL
 */
function minimumLevel(): LogLevel {
  const configured = (process.env.LOG_LEVEL || 'info').toLowerCase();
  return isLogLevel(configured) ? configured : 'info';
}

/**
 * Log a structured message to stderr
 *
 * Output format:
 * {"ts":"2026-01-16T10:30:45.123Z","level":"info","msg":"Intent analyzed","request_id":"req_...",...}
 */
export function log(level: LogLevel, message: string, context: LogContext = {}): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[minimumLevel()]) return;

  const entry = {
    ts: new Date().toISOString(),
    level,
    msg: message,
    ...context,
  };
  console.error(JSON.stringify(entry));
}

// Convenience functions
export const logInfo = (msg: string, ctx?: LogContext) => log('info', msg, ctx);
export const logWarn = (msg: string, ctx?: LogContext) => log('warn', msg, ctx);
export const logError = (msg: string, ctx?: LogContext) => log('error', msg, ctx);
export const logDebug = (msg: string, ctx?: LogContext) => log('debug', msg, ctx);

/**
 * Generate unique request ID for log correlation
 * Format: req_<timestamp>_<random>
 */
export function generateRequestId(): string {
  return `req_${Date.now()}_${Math.random().toString(36).substring(2, 8)}`;
}

/**
 * Make user text safe for a single log line
 */
export function sanitizeForLog(text: string, maxLength = 120): string {
  const singleLine = text.replace(/[\r\n\t]+/g, ' ').replace(/[\x00-\x1F\x7F]/g, '').trim();
  return singleLine.length > maxLength ? `${singleLine.substring(0, maxLength)}...` : singleLine;
}
