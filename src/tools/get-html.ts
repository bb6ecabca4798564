import type { SessionManager } from '../engines/session-manager.js';
import { GetHtmlInputSchema } from '../schemas/index.js';
import { extractMessage } from '../exception/classifier.js';
import { failure, success } from '../exception/tool-error.js';
import { withSession, type ToolDefinition } from './tool-definition.js';

export function buildGetHtmlTool(sessions: SessionManager): ToolDefinition {
  return {
    name: 'get_html',
    description: 'Return the HTML content after scripts have executed.',
    inputSchema: GetHtmlInputSchema,
    async run(raw) {
      const bound = await withSession(raw, sessions, GetHtmlInputSchema);
      if (!bound.ok) return bound.outcome;

      try {
        return success(bound.sessionId, { html: await bound.page.content() });
      } catch (error) {
        return failure('INTERNAL_ERROR', `Reading page HTML failed: ${extractMessage(error)}`);
      }
    },
  };
}
