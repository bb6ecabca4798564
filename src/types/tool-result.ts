export const ERROR_CODES = [
  'INVALID_URL',
  'NAVIGATION_TIMEOUT',
  'NETWORK_ERROR',
  'ELEMENT_NOT_FOUND',
  'ELEMENT_NOT_VISIBLE',
  'ELEMENT_NOT_EDITABLE',
  'ELEMENT_NOT_CLICKABLE',
  'INTERNAL_ERROR',
] as const;

export type ErrorCode = (typeof ERROR_CODES)[number];

export interface ErrorPayload {
  code: ErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

export type ToolData = Record<string, unknown>;

/**
 * What a capability hands back to the tool service. Domain failures travel
 * as the `ok: false` variant instead of being thrown.
 */
export type ToolOutcome<T extends ToolData = ToolData> =
  | { ok: true; sessionId: string; data: T }
  | { ok: false; error: ErrorPayload };

export interface ToolMeta {
  ts: string;
  durationMs: number;
}

export type ToolResult =
  | { ok: true; tool: string; sessionId: string; data: ToolData; meta: ToolMeta }
  | { ok: false; tool: string; sessionId?: string; error: ErrorPayload; meta: ToolMeta };
