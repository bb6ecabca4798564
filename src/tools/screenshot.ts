import type { SessionManager } from '../engines/session-manager.js';
import { ScreenshotInputSchema } from '../schemas/index.js';
import { extractMessage } from '../exception/classifier.js';
import { failure, success } from '../exception/tool-error.js';
import { withSession, type ToolDefinition } from './tool-definition.js';

export function buildScreenshotTool(sessions: SessionManager): ToolDefinition {
  return {
    name: 'screenshot',
    description: 'Capture a PNG screenshot of the current page.',
    inputSchema: ScreenshotInputSchema,
    async run(raw) {
      const bound = await withSession(raw, sessions, ScreenshotInputSchema);
      if (!bound.ok) return bound.outcome;
      const { sessionId, input, page } = bound;

      let image: Buffer;
      try {
        image = await page.screenshot({ fullPage: input.mode === 'fullpage', type: 'png' });
      } catch (error) {
        return failure('INTERNAL_ERROR', `Screenshot failed: ${extractMessage(error)}`);
      }

      return success(sessionId, {
        current_url: page.url(),
        mode: input.mode,
        image_b64: image.toString('base64'),
      });
    },
  };
}
