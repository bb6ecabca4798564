import type { TargetSchema } from '../types/index.js';
import {
  EXTRACTION_MARKUP_LIMIT,
  PAGINATION_MARKUP_LIMIT,
  buildExtractionPrompt,
  buildNextPagePrompt,
  truncateMarkup,
} from './prompts.js';
import { parseExtractionResponse, parseNextPageSelector, type ParsedExtraction } from './response-parser.js';

/**
 * Sends one prompt and resolves with the raw reply text.
 */
export type CompletionTransport = (prompt: string, maxTokens: number) => Promise<string>;

export interface CompletionService {
  extractItems(html: string, schema: TargetSchema): Promise<ParsedExtraction>;
  findNextPageSelector(html: string): Promise<string | null>;
}

export interface LlmCompletionServiceOptions {
  extractionMaxTokens?: number;
  paginationMaxTokens?: number;
  extractionMarkupLimit?: number;
  paginationMarkupLimit?: number;
}

/**
 * Prompt-driven extraction and pagination probing. Markup past the limits is
 * dropped before it is sent, so fields that only appear late on a large page
 * are not seen.
 */
export class LlmCompletionService implements CompletionService {
  private extractionMaxTokens: number;
  private paginationMaxTokens: number;
  private extractionMarkupLimit: number;
  private paginationMarkupLimit: number;

  constructor(
    private transport: CompletionTransport,
    options: LlmCompletionServiceOptions = {},
  ) {
    this.extractionMaxTokens = options.extractionMaxTokens ?? 4096;
    this.paginationMaxTokens = options.paginationMaxTokens ?? 256;
    this.extractionMarkupLimit = options.extractionMarkupLimit ?? EXTRACTION_MARKUP_LIMIT;
    this.paginationMarkupLimit = options.paginationMarkupLimit ?? PAGINATION_MARKUP_LIMIT;
  }

  async extractItems(html: string, schema: TargetSchema): Promise<ParsedExtraction> {
    const prompt = buildExtractionPrompt(truncateMarkup(html, this.extractionMarkupLimit), schema);
    const reply = await this.transport(prompt, this.extractionMaxTokens);
    return parseExtractionResponse(reply);
  }

  async findNextPageSelector(html: string): Promise<string | null> {
    const prompt = buildNextPagePrompt(truncateMarkup(html, this.paginationMarkupLimit));
    const reply = await this.transport(prompt, this.paginationMaxTokens);
    return parseNextPageSelector(reply);
  }
}
