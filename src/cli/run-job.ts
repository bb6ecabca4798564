#!/usr/bin/env node
/**
 * CLI: run one extraction job and write the result file.
 *
 * Usage: web-tool-run-job --config job.json [--output result.json] [--api-key KEY] [--verbose]
 */

import { parseArgs } from 'node:util';
import { parseRuntimeConfig, type RuntimeConfig } from '../config/runtime-config.js';
import { loadJobConfig } from '../job/job-loader.js';
import { SessionManager } from '../engines/session-manager.js';
import { buildToolRegistry } from '../tools/tool-registry.js';
import { ToolService } from '../runner/tool-service.js';
import { ExtractionOrchestrator } from '../runner/extraction-orchestrator.js';
import { LlmCompletionService } from '../completion-client/completion-service.js';
import { createOpenAiTransport } from '../completion-client/openai-transport.js';
import { summarizeResult, writeJobResult } from '../logging/result-writer.js';
import { configureLogger, createLogger } from '../logging/logger.js';
import type { ExtractionJobConfig } from '../types/index.js';

const log = createLogger('run-job');

const DEFAULT_OUTPUT = 'scraping_result.json';

interface CliOptions {
  configPath: string;
  outputPath: string;
  apiKey?: string;
  verbose: boolean;
}

function readCliOptions(argv: string[]): CliOptions {
  const { values } = parseArgs({
    args: argv,
    options: {
      config: { type: 'string', short: 'c' },
      output: { type: 'string', short: 'o', default: DEFAULT_OUTPUT },
      'api-key': { type: 'string' },
      verbose: { type: 'boolean', short: 'v', default: false },
    },
    strict: true,
  });

  if (!values.config) {
    throw new Error('--config <path> is required');
  }
  return {
    configPath: values.config,
    outputPath: values.output ?? DEFAULT_OUTPUT,
    apiKey: values['api-key'],
    verbose: values.verbose ?? false,
  };
}

async function main(): Promise<void> {
  let options: CliOptions;
  let runtime: RuntimeConfig;
  let job: ExtractionJobConfig;
  try {
    options = readCliOptions(process.argv.slice(2));
    runtime = parseRuntimeConfig();
    configureLogger({ level: options.verbose ? 'debug' : runtime.logLevel });
    job = await loadJobConfig(options.configPath);
  } catch (error) {
    log.error('startup_failed', { error });
    process.exitCode = 1;
    return;
  }

  const apiKey = options.apiKey ?? runtime.openai.apiKey;
  if (!apiKey) {
    log.error('missing_api_key', { hint: 'pass --api-key or set OPENAI_API_KEY' });
    process.exitCode = 1;
    return;
  }

  const sessions = new SessionManager({ headless: runtime.browser.headless });
  try {
    const tools = new ToolService(
      buildToolRegistry(sessions, { navigationTimeoutMs: runtime.browser.navigationTimeoutMs }),
    );
    const completion = new LlmCompletionService(
      createOpenAiTransport({
        apiKey,
        model: runtime.openai.model,
        baseUrl: runtime.openai.baseUrl,
      }),
    );
    const orchestrator = new ExtractionOrchestrator(tools, completion, {
      pageSettleMs: runtime.orchestrator.pageSettleMs,
    });

    const result = await orchestrator.run(job);
    await writeJobResult(options.outputPath, result);
    log.info('job_summary', {
      status: result.status,
      output: options.outputPath,
      pagesProcessed: result.pagesProcessed,
      summary: summarizeResult(result),
    });
    if (result.status !== 'success') {
      process.exitCode = 1;
    }
  } finally {
    await sessions.shutdown();
  }
}

main().catch((error: unknown) => {
  log.error('run_failed', { error });
  process.exitCode = 1;
});
