/**
 * Error Handler - User-friendly error messages, no secret leakage
 */

import { AppError, logger } from '@perfsweep/utils';

/**
 * Sensitive patterns that should never appear in error messages
 */
const SENSITIVE_PATTERNS = [
  /api[_-]?key/i,
  /token/i,
  /secret/i,
  /password/i,
  /private[_-]?key/i,
  /bearer/i,
  /authorization/i,
];

function containsSensitiveInfo(message: string): boolean {
  return SENSITIVE_PATTERNS.some((pattern) => pattern.test(message));
}

function sanitizeErrorMessage(message: string): string {
  if (containsSensitiveInfo(message)) {
    return 'An error occurred. Please check your configuration and try again.';
  }
  return message;
}

/**
 * Format error for user display
 */
export function formatError(error: unknown): string {
  if (error instanceof Error) {
    return sanitizeErrorMessage(error.message);
  }
  if (typeof error === 'string') {
    return sanitizeErrorMessage(error);
  }
  return 'An unexpected error occurred';
}

/**
 * Hints for failures a sweep operator commonly hits
 */
export function describeSweepError(error: unknown): string {
  const message = formatError(error);
  if (!(error instanceof Error)) {
    return message;
  }
  const lower = error.message.toLowerCase();

  if (lower.includes('eacces') || lower.includes('permission denied')) {
    return `${message} (check write access to the output directory, or run with --no-sudo)`;
  }
  if (lower.includes('enospc')) {
    return `${message} (no space left for artifacts)`;
  }
  return message;
}

/**
 * Log error with full context (for debugging), redacting sensitive values
 */
export function logError(error: unknown, context?: Record<string, unknown>): void {
  const sanitizedContext = context
    ? Object.fromEntries(
        Object.entries(context).map(([key, value]) => [
          key,
          containsSensitiveInfo(String(value)) ? '[REDACTED]' : value,
        ])
      )
    : undefined;

  logger.error('CLI error', error, {
    code: error instanceof AppError ? error.code : undefined,
    errorContext: error instanceof AppError ? error.context : undefined,
    context: sanitizedContext,
  });
}

/**
 * Handle and format error for CLI output
 */
export function handleError(error: unknown, context?: Record<string, unknown>): string {
  logError(error, context);
  return describeSweepError(error);
}
