import { errors } from 'playwright';
import type { ErrorCode } from '../types/index.js';

export type EngineOperation = 'navigate' | 'interact' | 'capture';

interface ClassifyContext {
  operation: EngineOperation;
  selector?: string;
}

/**
 * Map a raw engine failure onto the fixed error taxonomy. Anything that does
 * not match a known shape for the operation collapses to INTERNAL_ERROR.
 */
export function classifyEngineError(error: unknown, context: ClassifyContext): ErrorCode {
  const text = extractMessage(error).toLowerCase();

  if (context.operation === 'navigate') {
    if (isTimeoutError(error) || text.includes('timeout')) {
      return 'NAVIGATION_TIMEOUT';
    }
    if (isInvalidUrl(text)) {
      return 'INVALID_URL';
    }
    // Every other navigation failure is a transport problem from the caller's view.
    return 'NETWORK_ERROR';
  }

  if (context.operation === 'interact') {
    if (isTargetNotFound(text)) return 'ELEMENT_NOT_FOUND';
    if (isNotEditable(text)) return 'ELEMENT_NOT_EDITABLE';
    if (isNotVisible(text)) return 'ELEMENT_NOT_VISIBLE';
    if (isNotClickable(text)) return 'ELEMENT_NOT_CLICKABLE';
  }

  return 'INTERNAL_ERROR';
}

export function isTimeoutError(error: unknown): boolean {
  if (error instanceof errors.TimeoutError) return true;
  return error instanceof Error && error.name === 'TimeoutError';
}

export function extractMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}

function isInvalidUrl(text: string): boolean {
  const patterns = ['invalid url', 'err_invalid_url', 'cannot navigate to invalid url'];
  return patterns.some((p) => text.includes(p));
}

function isTargetNotFound(text: string): boolean {
  const patterns = [
    'no element found',
    'element not found',
    'resolved to 0 elements',
    'unable to find',
    'could not find',
  ];
  return patterns.some((p) => text.includes(p));
}

function isNotVisible(text: string): boolean {
  const patterns = ['element is not visible', 'not visible', 'hidden'];
  return patterns.some((p) => text.includes(p));
}

function isNotEditable(text: string): boolean {
  const patterns = ['element is not editable', 'not editable', 'readonly', 'not an <input>'];
  return patterns.some((p) => text.includes(p));
}

function isNotClickable(text: string): boolean {
  const patterns = [
    'not clickable',
    'element is not enabled',
    'element is not stable',
    'intercepts pointer events',
    'intercepted',
    'pointer-events: none',
    'disabled',
  ];
  return patterns.some((p) => text.includes(p));
}
