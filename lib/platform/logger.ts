/**
 * Structured logger.
 *
 * Outputs JSON lines by default (easy to filter in any log drain)
 * and human-readable lines when NODE_ENV=development.
 *
 * Usage:
 *   import { log } from '@/lib/platform/logger';
 *   log.warn('markdown.headings', 'Duplicate explicit heading id', { id });
 */

type LogLevel = 'info' | 'warn' | 'error';

function formatError(err: unknown): { message: string; stack?: string } {
  if (err instanceof Error) {
    return { message: err.message, ...(err.stack ? { stack: err.stack } : {}) };
  }
  return { message: String(err) };
}

function emit(
  level: LogLevel,
  scope: string,
  message: string,
  context?: Record<string, unknown>,
  err?: unknown
) {
  const fn = level === 'error' ? console.error : level === 'warn' ? console.warn : console.log;

  if (process.env.NODE_ENV === 'development') {
    const prefix = level === 'error' ? '✗' : level === 'warn' ? '⚠' : '·';
    const extra = context ? ` ${JSON.stringify(context)}` : '';
    const errLine = err ? `\n  → ${formatError(err).message}` : '';
    fn(`${prefix} [${scope}] ${message}${extra}${errLine}`);
    return;
  }

  fn(
    JSON.stringify({
      level,
      scope,
      message,
      ...(context ? { context } : {}),
      ...(err ? { error: formatError(err) } : {}),
      ts: new Date().toISOString(),
    })
  );
}

export const log = {
  info: (scope: string, message: string, context?: Record<string, unknown>) =>
    emit('info', scope, message, context),

  warn: (scope: string, message: string, context?: Record<string, unknown>) =>
    emit('warn', scope, message, context),

  error: (scope: string, message: string, context?: Record<string, unknown>, err?: unknown) =>
    emit('error', scope, message, context, err),
};
