import type {
  ExtractionJobConfig,
  ExtractionResult,
  Interaction,
  JobState,
  ToolData,
  ToolResult,
} from '../types/index.js';
import type { CompletionService } from '../completion-client/completion-service.js';
import type { ToolService } from './tool-service.js';
import { analyzeQuality } from './quality-analyzer.js';
import { structureItems } from './structure.js';
import { extractMessage } from '../exception/classifier.js';
import { createLogger, type Logger } from '../logging/logger.js';
import { sleep as defaultSleep, type Sleep } from '../utils/sleep.js';

export type ToolCaller = Pick<ToolService, 'call'>;

export interface OrchestratorOptions {
  logger?: Logger;
  sleep?: Sleep;
  /** Pause after a successful next-page click, in ms. */
  pageSettleMs?: number;
  now?: () => Date;
}

type StepOutcome<T> = { ok: true; value: T } | { ok: false; message: string };

interface JobProgress {
  state: JobState;
  sessionId: string | null;
  items: unknown[];
  warnings: string[];
  pagesProcessed: number;
}

/** Codes that mean the next-page control is there but cannot be used: the last page. */
const LAST_PAGE_CODES = new Set(['ELEMENT_NOT_VISIBLE', 'ELEMENT_NOT_CLICKABLE']);

function assertNever(value: never): never {
  throw new Error(`Unhandled interaction: ${JSON.stringify(value)}`);
}

/**
 * Runs one extraction job: navigate, pre-interactions, the page loop,
 * structuring and scoring. Tolerated failures are logged and the job goes on;
 * anything else ends it with an error result and no partial data.
 */
export class ExtractionOrchestrator {
  private logger: Logger;
  private sleep: Sleep;
  private pageSettleMs: number;
  private now: () => Date;

  constructor(
    private tools: ToolCaller,
    private completion: CompletionService,
    options: OrchestratorOptions = {},
  ) {
    this.logger = options.logger ?? createLogger('ExtractionOrchestrator');
    this.sleep = options.sleep ?? defaultSleep;
    this.pageSettleMs = options.pageSettleMs ?? 2_000;
    this.now = options.now ?? (() => new Date());
  }

  async run(config: ExtractionJobConfig): Promise<ExtractionResult> {
    const job: JobProgress = {
      state: 'START',
      sessionId: null,
      items: [],
      warnings: [],
      pagesProcessed: 0,
    };
    this.logger.info('job_started', { url: config.url, maxPages: config.options.maxPages });

    try {
      const navigation = await this.callTool(job, 'navigate', { url: config.url });
      if (!navigation.ok) {
        return this.fail(job, navigation.message);
      }
      this.transition(job, 'NAVIGATED');

      await this.runInteractions(job, config.interactions);
      this.transition(job, 'INTERACTED');

      const extraction = await this.extractPages(job, config);
      if (!extraction.ok) {
        return this.fail(job, extraction.message);
      }

      const data = structureItems(job.items, config.schema, this.now());
      this.transition(job, 'STRUCTURED');

      const qualityReport = analyzeQuality(job.items);
      qualityReport.errors.push(...job.warnings);
      this.transition(job, 'SCORED');

      this.transition(job, 'DONE');
      this.logger.info('job_completed', {
        pagesProcessed: job.pagesProcessed,
        totalItems: qualityReport.totalItems,
        completionRate: qualityReport.completionRate,
      });
      return { status: 'success', data, qualityReport, pagesProcessed: job.pagesProcessed };
    } catch (error) {
      this.logger.error('job_failed', { state: job.state, error });
      return this.fail(job, extractMessage(error) || 'Extraction failed');
    }
  }

  private async runInteractions(job: JobProgress, interactions: Interaction[]): Promise<void> {
    for (const interaction of interactions) {
      switch (interaction.type) {
        case 'click': {
          const result = await this.callTool(job, 'click', { selector: interaction.selector });
          if (result.ok) {
            this.logger.info('interaction_clicked', { selector: interaction.selector });
          } else {
            this.logger.warn('interaction_failed', {
              type: 'click',
              selector: interaction.selector,
              reason: result.message,
            });
          }
          break;
        }
        case 'fill': {
          const result = await this.callTool(job, 'fill', {
            selector: interaction.selector,
            value: interaction.value,
          });
          if (result.ok) {
            this.logger.info('interaction_filled', { selector: interaction.selector });
          } else {
            this.logger.warn('interaction_failed', {
              type: 'fill',
              selector: interaction.selector,
              reason: result.message,
            });
          }
          break;
        }
        case 'wait':
          await this.sleep(interaction.duration);
          this.logger.info('interaction_waited', { durationMs: interaction.duration });
          break;
        case 'scroll':
          // No scroll tool exists; the step is accepted and skipped.
          this.logger.warn('interaction_skipped', { type: 'scroll', direction: interaction.direction });
          break;
        default:
          assertNever(interaction);
      }
    }
  }

  private async extractPages(job: JobProgress, config: ExtractionJobConfig): Promise<StepOutcome<number>> {
    const { pagination, maxPages } = config.options;
    this.transition(job, 'EXTRACTING');

    while (job.pagesProcessed < maxPages) {
      const pageNumber = job.pagesProcessed + 1;

      const markup = await this.readHtml(job);
      if (!markup.ok) return markup;

      const parsed = await this.completion.extractItems(markup.value, config.schema);
      job.pagesProcessed = pageNumber;
      if (parsed.warning) {
        this.logger.warn('extraction_unparseable', { page: pageNumber, reason: parsed.warning });
        job.warnings.push(`page ${pageNumber}: ${parsed.warning}`);
      }
      job.items.push(...parsed.items);
      this.logger.info('page_extracted', { page: pageNumber, items: parsed.items.length, total: job.items.length });

      if (!pagination || pageNumber >= maxPages) break;
      if (!(await this.advancePage(job, markup.value))) break;
    }

    return { ok: true, value: job.pagesProcessed };
  }

  private async readHtml(job: JobProgress): Promise<StepOutcome<string>> {
    const result = await this.callTool(job, 'get_html', {});
    if (!result.ok) return result;

    const html = result.value.html;
    if (typeof html !== 'string') {
      return { ok: false, message: 'get_html returned no markup' };
    }
    return { ok: true, value: html };
  }

  /**
   * Try to move to the next page. False means the loop should stop; that is
   * never a job failure.
   */
  private async advancePage(job: JobProgress, html: string): Promise<boolean> {
    const selector = await this.completion.findNextPageSelector(html);
    if (!selector) {
      this.logger.info('pagination_finished', { page: job.pagesProcessed });
      return false;
    }

    this.logger.info('pagination_attempt', { selector });
    const result = await this.tools.call('click', this.withSession(job, { selector }));
    if (result.ok) {
      await this.sleep(this.pageSettleMs);
      return true;
    }

    if (LAST_PAGE_CODES.has(result.error.code)) {
      this.logger.info('pagination_last_page', { selector, code: result.error.code });
    } else {
      this.logger.warn('pagination_failed', { selector, code: result.error.code, reason: result.error.message });
    }
    return false;
  }

  private async callTool(
    job: JobProgress,
    name: string,
    args: Record<string, unknown>,
  ): Promise<StepOutcome<ToolData>> {
    const result: ToolResult = await this.tools.call(name, this.withSession(job, args));
    if (!result.ok) {
      return { ok: false, message: result.error.message };
    }
    if (!job.sessionId) {
      job.sessionId = result.sessionId;
    }
    return { ok: true, value: result.data };
  }

  private withSession(job: JobProgress, args: Record<string, unknown>): Record<string, unknown> {
    return job.sessionId ? { ...args, session_id: job.sessionId } : args;
  }

  private transition(job: JobProgress, next: JobState): void {
    this.logger.debug('job_state', { from: job.state, to: next });
    job.state = next;
  }

  private fail(job: JobProgress, message: string): ExtractionResult {
    this.transition(job, 'ERROR');
    this.logger.error('job_aborted', { reason: message, pagesProcessed: job.pagesProcessed });
    return { status: 'error', data: {}, qualityReport: null, error: message, pagesProcessed: job.pagesProcessed };
  }
}
