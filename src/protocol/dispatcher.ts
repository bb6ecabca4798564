import { once } from 'node:events';
import { createInterface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import type { ProtocolRequest, ProtocolResponse, RequestId, ToolResult } from '../types/index.js';
import type { ToolService } from '../runner/tool-service.js';
import { ProtocolRequestSchema, ToolCallParamsSchema } from '../schemas/index.js';
import { errorPayload, toErrorPayload } from '../exception/tool-error.js';
import { extractMessage } from '../exception/classifier.js';
import { createLogger, type Logger } from '../logging/logger.js';

export interface ServerInfo {
  name: string;
  version: string;
}

export interface DispatcherOptions {
  logger?: Logger;
}

/**
 * Wire form of a ToolResult: snake_case keys, `session_id` only when known.
 */
export function toWireResult(result: ToolResult): Record<string, unknown> {
  const meta = { ts: result.meta.ts, duration_ms: result.meta.durationMs };
  const session = result.sessionId ? { session_id: result.sessionId } : {};
  return result.ok
    ? { ok: true, tool: result.tool, ...session, data: result.data, meta }
    : { ok: false, tool: result.tool, ...session, error: result.error, meta };
}

function errorResponse(id: RequestId, message: string, details?: Record<string, unknown>): ProtocolResponse {
  return { id, error: errorPayload('INTERNAL_ERROR', message, details) };
}

/**
 * Line-delimited JSON request handling over a ToolService. One request in,
 * one response out, strictly in order.
 */
export class RequestDispatcher {
  private logger: Logger;

  constructor(
    private service: ToolService,
    private info: ServerInfo,
    options: DispatcherOptions = {},
  ) {
    this.logger = options.logger ?? createLogger('RequestDispatcher');
  }

  async handle(request: ProtocolRequest): Promise<ProtocolResponse> {
    const { id, method, params } = request;
    try {
      switch (method) {
        case 'initialize':
          return {
            id,
            result: {
              name: this.info.name,
              version: this.info.version,
              protocol: 'stdio',
              tools: this.service.names(),
            },
          };
        case 'tools/list':
          return { id, result: { tools: this.service.descriptors() } };
        case 'tools/call': {
          const parsed = ToolCallParamsSchema.safeParse(params);
          if (!parsed.success) {
            return errorResponse(id, 'Invalid parameters', { validation_errors: parsed.error.issues });
          }
          const result = await this.service.call(parsed.data.name, parsed.data.arguments);
          return { id, result: toWireResult(result) };
        }
        default:
          return errorResponse(id, `Unknown method: ${method}`);
      }
    } catch (error) {
      this.logger.error('request_failed', { method, error });
      return { id, error: toErrorPayload(error) };
    }
  }

  /**
   * Parse and handle one raw line. Never rejects; a line that is not a
   * request gets an error response with a null id.
   */
  async dispatchLine(line: string): Promise<ProtocolResponse> {
    let raw: unknown;
    try {
      raw = JSON.parse(line);
    } catch (error) {
      this.logger.warn('invalid_request', { reason: extractMessage(error) });
      return errorResponse(null, 'Invalid request payload', { reason: extractMessage(error) });
    }

    const parsed = ProtocolRequestSchema.safeParse(raw);
    if (!parsed.success) {
      this.logger.warn('invalid_request', { reason: parsed.error.message });
      return errorResponse(null, 'Invalid request payload', { validation_errors: parsed.error.issues });
    }

    this.logger.debug('request_received', { id: parsed.data.id, method: parsed.data.method });
    return this.handle(parsed.data);
  }

  /**
   * Serve until the input ends or the output fails. Each response is written
   * as one line and the output is allowed to drain before the next request is
   * read. An output error (EPIPE on a closed stdout) is logged and stops the
   * loop; it does not reject.
   */
  async serve(input: Readable, output: Writable): Promise<void> {
    const lines = createInterface({ input, crlfDelay: Infinity });
    let outputFailed = false;
    output.on('error', (error: Error) => {
      if (!outputFailed) {
        this.logger.error('output_failed', { error });
      }
      outputFailed = true;
      lines.close();
    });
    this.logger.info('server_started', { name: this.info.name, version: this.info.version });

    try {
      for await (const line of lines) {
        if (outputFailed) break;
        if (line.trim() === '') continue;
        const response = await this.dispatchLine(line);
        if (outputFailed) break;
        if (!output.write(`${JSON.stringify(response)}
`) && !(await this.drained(output))) {
          break;
        }
      }
    } finally {
      lines.close();
    }

    this.logger.info('server_stopped', { reason: outputFailed ? 'output_error' : 'input_end' });
  }

  /**
   * False when the output errors instead of draining; the error itself is
   * logged by the listener installed in serve().
   */
  private async drained(output: Writable): Promise<boolean> {
    try {
      await once(output, 'drain');
      return true;
    } catch {
      return false;
    }
  }
}
