import type { ToolDescriptor, ToolResult } from '../types/index.js';
import type { ToolRegistry } from '../tools/tool-registry.js';
import { errorPayload, toErrorPayload } from '../exception/tool-error.js';
import { createLogger, type Logger } from '../logging/logger.js';

export interface ToolServiceOptions {
  logger?: Logger;
  now?: () => number;
}

function incomingSessionId(args: Record<string, unknown>): string | undefined {
  const value = args.session_id;
  return typeof value === 'string' && value !== '' ? value : undefined;
}

/**
 * Runs named tools and turns every outcome, including thrown errors, into a
 * ToolResult. `call` never rejects.
 */
export class ToolService {
  private logger: Logger;
  private now: () => number;

  constructor(
    private registry: ToolRegistry,
    options: ToolServiceOptions = {},
  ) {
    this.logger = options.logger ?? createLogger('ToolService');
    this.now = options.now ?? Date.now;
  }

  names(): string[] {
    return this.registry.names();
  }

  descriptors(): ToolDescriptor[] {
    return this.registry.descriptors();
  }

  async call(name: string, args: Record<string, unknown> = {}): Promise<ToolResult> {
    const tool = this.registry.get(name);
    if (!tool) {
      return {
        ok: false,
        tool: name,
        error: errorPayload('INTERNAL_ERROR', `Unknown tool: ${name}`),
        meta: { ts: new Date().toISOString(), durationMs: 0 },
      };
    }

    const incoming = { ...args };
    const requestedSession = incomingSessionId(incoming);
    const start = this.now();

    try {
      const outcome = await tool.run(incoming);
      const durationMs = Math.max(0, this.now() - start);
      const meta = { ts: new Date().toISOString(), durationMs };

      if (!outcome.ok) {
        this.logger.info('tool_failure', {
          tool: name,
          sessionId: requestedSession,
          ok: false,
          errorCode: outcome.error.code,
          durationMs,
        });
        return requestedSession
          ? { ok: false, tool: name, sessionId: requestedSession, error: outcome.error, meta }
          : { ok: false, tool: name, error: outcome.error, meta };
      }

      const currentUrl = outcome.data.current_url;
      this.logger.info('tool_success', {
        tool: name,
        sessionId: outcome.sessionId,
        ok: true,
        durationMs,
        url: typeof currentUrl === 'string' ? currentUrl : null,
      });
      return { ok: true, tool: name, sessionId: outcome.sessionId, data: outcome.data, meta };
    } catch (error) {
      const durationMs = Math.max(0, this.now() - start);
      const payload = toErrorPayload(error);
      this.logger.error('tool_failure', {
        tool: name,
        sessionId: requestedSession,
        ok: false,
        errorCode: payload.code,
        durationMs,
        error,
      });
      return {
        ok: false,
        tool: name,
        ...(requestedSession ? { sessionId: requestedSession } : {}),
        error: payload,
        meta: { ts: new Date().toISOString(), durationMs },
      };
    }
  }
}
