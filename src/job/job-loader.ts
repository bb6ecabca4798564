import { readFile } from 'node:fs/promises';
import type { z } from 'zod';
import type { ExtractionJobConfig } from '../types/index.js';
import { JobConfigSchema } from '../schemas/index.js';
import { extractMessage } from '../exception/classifier.js';

export class JobConfigError extends Error {
  constructor(
    message: string,
    public issues: z.ZodIssue[] = [],
  ) {
    super(message);
    this.name = 'JobConfigError';
  }
}

/**
 * Validate a parsed job document. Every interaction is checked here so a bad
 * step fails the load instead of surfacing halfway through a run.
 */
export function parseJobConfig(raw: unknown): ExtractionJobConfig {
  const result = JobConfigSchema.safeParse(raw);
  if (!result.success) {
    const summary = result.error.issues
      .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
      .join('; ');
    throw new JobConfigError(`Invalid job configuration: ${summary}`, result.error.issues);
  }

  const { url, schema, interactions, options } = result.data;
  return {
    url,
    schema,
    interactions,
    options: { pagination: options.pagination, maxPages: options.max_pages },
  };
}

export async function loadJobConfig(path: string): Promise<ExtractionJobConfig> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    throw new JobConfigError(`Cannot read job configuration ${path}: ${extractMessage(error)}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new JobConfigError(`Job configuration ${path} is not valid JSON: ${extractMessage(error)}`);
  }
  return parseJobConfig(raw);
}
