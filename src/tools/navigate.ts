import type { SessionManager } from '../engines/session-manager.js';
import type { ErrorCode } from '../types/index.js';
import { NavigateInputSchema } from '../schemas/index.js';
import { classifyEngineError, extractMessage } from '../exception/classifier.js';
import { failure, success } from '../exception/tool-error.js';
import { withSession, type ToolDefinition } from './tool-definition.js';

export interface NavigateToolOptions {
  timeoutMs?: number;
}

function schemeOf(url: string): string | null {
  try {
    return new URL(url).protocol.replace(/:$/, '');
  } catch {
    return null;
  }
}

function navigationMessage(code: ErrorCode, url: string, error: unknown): string {
  switch (code) {
    case 'NAVIGATION_TIMEOUT':
      return `Navigation to ${url} timed out.`;
    case 'INVALID_URL':
      return `Invalid URL: ${url}`;
    default:
      return `Navigation failed for ${url}: ${extractMessage(error)}`;
  }
}

export function buildNavigateTool(sessions: SessionManager, options: NavigateToolOptions = {}): ToolDefinition {
  const timeoutMs = options.timeoutMs ?? 30_000;

  return {
    name: 'navigate',
    description: 'Navigate the page to the provided URL.',
    inputSchema: NavigateInputSchema,
    async run(raw) {
      const bound = await withSession(raw, sessions, NavigateInputSchema);
      if (!bound.ok) return bound.outcome;
      const { sessionId, input, page } = bound;

      const scheme = schemeOf(input.url);
      if (scheme === null) {
        return failure('INVALID_URL', `Invalid URL: ${input.url}`);
      }
      if (scheme !== 'http' && scheme !== 'https') {
        return failure('INVALID_URL', `Only http(s) URLs are supported (got ${scheme}).`);
      }

      let status: number | null;
      try {
        const response = await page.goto(input.url, { waitUntil: 'networkidle', timeout: timeoutMs });
        status = response ? response.status() : null;
      } catch (error) {
        const code = classifyEngineError(error, { operation: 'navigate' });
        return failure(code, navigationMessage(code, input.url, error));
      }

      return success(sessionId, {
        current_url: page.url(),
        status,
        title: await page.title(),
      });
    },
  };
}
