import type { ErrorCode, ErrorPayload, ToolOutcome, ToolData } from '../types/index.js';
import { ERROR_CODES } from '../types/index.js';
import { extractMessage } from './classifier.js';

export function isErrorCode(value: unknown): value is ErrorCode {
  return typeof value === 'string' && ERROR_CODES.some((code) => code === value);
}

export function errorPayload(
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>,
): ErrorPayload {
  return details ? { code, message, details } : { code, message };
}

/**
 * Convert any thrown value into a serializable payload. Unclassified errors
 * keep their message for diagnostics.
 */
export function toErrorPayload(error: unknown): ErrorPayload {
  const message = extractMessage(error);
  return errorPayload('INTERNAL_ERROR', message || 'Internal error');
}

export function failure(
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>,
): ToolOutcome<never> {
  return { ok: false, error: errorPayload(code, message, details) };
}

export function success<T extends ToolData>(sessionId: string, data: T): ToolOutcome<T> {
  return { ok: true, sessionId, data };
}
