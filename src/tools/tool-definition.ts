import type { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import type { ToolOutcome } from '../types/index.js';
import type { EnginePage } from '../engines/browser-engine.js';
import type { SessionManager } from '../engines/session-manager.js';
import type { SessionInput } from '../schemas/index.js';
import { failure } from '../exception/tool-error.js';
import { isRecord } from '../utils/guards.js';

export interface ToolDefinition {
  name: string;
  description: string;
  inputSchema: z.ZodTypeAny;
  run(args: Record<string, unknown>): Promise<ToolOutcome>;
}

export type SessionBinding<T> =
  | { ok: true; sessionId: string; input: T; page: EnginePage }
  | { ok: false; outcome: ToolOutcome<never> };

/**
 * Validate raw arguments and resolve the page behind the requested session,
 * minting a new session when none (or an unknown one) is given.
 */
export async function withSession<T extends SessionInput>(
  raw: Record<string, unknown>,
  sessions: SessionManager,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): Promise<SessionBinding<T>> {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    return {
      ok: false,
      outcome: failure('INTERNAL_ERROR', 'Invalid arguments supplied to tool.', {
        validation_errors: parsed.error.issues,
      }),
    };
  }

  const { sessionId, page } = await sessions.resolve(parsed.data.session_id);
  return { ok: true, sessionId, input: parsed.data, page };
}

export function toInputSchema(schema: z.ZodTypeAny): Record<string, unknown> {
  const json: unknown = zodToJsonSchema(schema, { $refStrategy: 'none' });
  if (!isRecord(json)) return {};
  const { $schema: _draft, ...rest } = json;
  return rest;
}
