import type { SessionManager } from '../engines/session-manager.js';
import { FillInputSchema } from '../schemas/index.js';
import { classifyEngineError, extractMessage } from '../exception/classifier.js';
import { failure, success } from '../exception/tool-error.js';
import { withSession, type ToolDefinition } from './tool-definition.js';
import { locateFirst, waitUntilVisible } from './element.js';

export function buildFillTool(sessions: SessionManager): ToolDefinition {
  return {
    name: 'fill',
    description: 'Fill a text input or textarea using a CSS selector.',
    inputSchema: FillInputSchema,
    async run(raw) {
      const bound = await withSession(raw, sessions, FillInputSchema);
      if (!bound.ok) return bound.outcome;
      const { sessionId, input, page } = bound;
      const { selector, value } = input;

      const lookup = await locateFirst(page, selector);
      if (!lookup.ok) return lookup.outcome;
      const target = lookup.target;

      const hidden = await waitUntilVisible(target, selector);
      if (hidden) return hidden;

      if (!(await target.isEditable())) {
        return failure('ELEMENT_NOT_EDITABLE', `Element '${selector}' is not editable.`);
      }

      try {
        await target.fill(value);
      } catch (error) {
        const code = classifyEngineError(error, { operation: 'interact', selector });
        return failure(code, `Filling '${selector}' failed: ${extractMessage(error)}`);
      }

      return success(sessionId, { filled: true });
    },
  };
}
