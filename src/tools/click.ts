import type { SessionManager } from '../engines/session-manager.js';
import { ClickInputSchema } from '../schemas/index.js';
import { classifyEngineError, extractMessage, isTimeoutError } from '../exception/classifier.js';
import { failure, success } from '../exception/tool-error.js';
import { createLogger } from '../logging/logger.js';
import { withSession, type ToolDefinition } from './tool-definition.js';
import { SCROLL_TIMEOUT_MS, locateFirst, waitUntilVisible } from './element.js';

const log = createLogger('ClickTool');

export function buildClickTool(sessions: SessionManager): ToolDefinition {
  return {
    name: 'click',
    description: 'Click a visible, enabled element identified by CSS selector.',
    inputSchema: ClickInputSchema,
    async run(raw) {
      const bound = await withSession(raw, sessions, ClickInputSchema);
      if (!bound.ok) return bound.outcome;
      const { sessionId, input, page } = bound;
      const { selector } = input;

      const lookup = await locateFirst(page, selector);
      if (!lookup.ok) return lookup.outcome;
      const target = lookup.target;

      try {
        await target.scrollIntoViewIfNeeded({ timeout: SCROLL_TIMEOUT_MS });
      } catch (error) {
        // Visibility is checked next; a failed scroll alone is not a failure.
        log.debug('scroll_into_view_failed', { selector, error: extractMessage(error) });
      }

      const hidden = await waitUntilVisible(target, selector);
      if (hidden) return hidden;

      if (!(await target.isEnabled())) {
        return failure('ELEMENT_NOT_CLICKABLE', `Element '${selector}' is disabled.`);
      }

      try {
        await target.click();
      } catch (error) {
        if (isTimeoutError(error)) {
          return failure('ELEMENT_NOT_CLICKABLE', `Element '${selector}' was not clickable.`);
        }
        const code = classifyEngineError(error, { operation: 'interact', selector });
        return failure(code, `Clicking '${selector}' failed: ${extractMessage(error)}`);
      }

      return success(sessionId, { clicked: true });
    },
  };
}
