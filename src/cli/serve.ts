#!/usr/bin/env node
/**
 * CLI: line-delimited JSON tool server.
 *
 * Usage: web-tool-serve < requests.jsonl
 *
 * Requests are read from stdin and responses written to stdout, one JSON
 * object per line. Logs go to stderr.
 */

import { parseRuntimeConfig, type RuntimeConfig } from '../config/runtime-config.js';
import { SessionManager } from '../engines/session-manager.js';
import { buildToolRegistry } from '../tools/tool-registry.js';
import { ToolService } from '../runner/tool-service.js';
import { RequestDispatcher } from '../protocol/dispatcher.js';
import { configureLogger, createLogger } from '../logging/logger.js';
import { SERVER_NAME, SERVER_VERSION } from '../version.js';

const log = createLogger('serve');

async function main(): Promise<void> {
  let config: RuntimeConfig;
  try {
    config = parseRuntimeConfig();
  } catch (error) {
    log.error('config_invalid', { error });
    process.exitCode = 1;
    return;
  }
  configureLogger({ level: config.logLevel });

  const sessions = new SessionManager({ headless: config.browser.headless });
  const registry = buildToolRegistry(sessions, {
    navigationTimeoutMs: config.browser.navigationTimeoutMs,
  });
  const dispatcher = new RequestDispatcher(new ToolService(registry), {
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  const stopOnSignal = (signal: NodeJS.Signals) => {
    log.info('signal_received', { signal });
    sessions.shutdown().then(
      () => process.exit(0),
      (error: unknown) => {
        log.error('shutdown_failed', { error });
        process.exit(1);
      },
    );
  };
  process.once('SIGINT', stopOnSignal);
  process.once('SIGTERM', stopOnSignal);

  try {
    await dispatcher.serve(process.stdin, process.stdout);
  } finally {
    await sessions.shutdown();
  }
}

main().catch((error: unknown) => {
  log.error('server_crashed', { error });
  process.exitCode = 1;
});
