import { describe, it, expect, afterEach } from 'vitest';
import { configureLogger, createLogger } from '../../src/logging/logger.js';

function sink(): { write: (line: string) => void; entries: () => Record<string, unknown>[] } {
  const lines: string[] = [];
  return {
    write: (line) => {
      lines.push(line);
    },
    entries: () => lines.map((line): Record<string, unknown> => JSON.parse(line)),
  };
}

describe('Logger', () => {
  afterEach(() => {
    configureLogger({ level: 'silent' });
  });

  it('writes component-tagged JSON lines to the configured destination', () => {
    const out = sink();
    configureLogger({ level: 'info', destination: out });
    const logger = createLogger('ToolService');

    logger.info('tool_success', { tool: 'navigate', durationMs: 12 });
    logger.debug('hidden_below_level');
    logger.warn('tool_failure', { tool: 'click' });

    expect(out.entries()).toMatchObject([
      { level: 'info', component: 'ToolService', tool: 'navigate', durationMs: 12, msg: 'tool_success' },
      { level: 'warn', component: 'ToolService', tool: 'click', msg: 'tool_failure' },
    ]);
  });

  it('follows a reconfiguration made after the logger was created', () => {
    const first = sink();
    const second = sink();
    configureLogger({ level: 'info', destination: first });
    const logger = createLogger('serve');
    logger.info('before');

    configureLogger({ level: 'debug', destination: second });
    logger.debug('after');

    expect(first.entries().map((e) => e.msg)).toEqual(['before']);
    expect(second.entries()).toMatchObject([{ level: 'debug', component: 'serve', msg: 'after' }]);
  });

  it('serializes errors and redacts api keys', () => {
    const out = sink();
    configureLogger({ level: 'info', destination: out });
    const logger = createLogger('run-job');

    logger.error('startup_failed', { error: new Error('bad config'), openai: { apiKey: 'test-secret' } });

    const [entry] = out.entries();
    expect(entry).toMatchObject({
      level: 'error',
      msg: 'startup_failed',
      err: { name: 'Error', message: 'bad config' },
      openai: { apiKey: '[REDACTED]' },
    });
  });
});
