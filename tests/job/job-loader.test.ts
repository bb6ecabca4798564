import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';
import { JobConfigError, loadJobConfig, parseJobConfig } from '../../src/job/job-loader.js';

describe('parseJobConfig', () => {
  it('maps a full job document', () => {
    const config = parseJobConfig({
      url: 'https://shop.example.com/list',
      schema: { products: [{ name: 'string' }] },
      interactions: [
        { type: 'click', selector: '#accept' },
        { type: 'fill', selector: 'input[name=q]', value: 'lamps' },
        { type: 'wait' },
        { type: 'scroll' },
      ],
      options: { pagination: true, max_pages: 3 },
    });

    expect(config).toEqual({
      url: 'https://shop.example.com/list',
      schema: { products: [{ name: 'string' }] },
      interactions: [
        { type: 'click', selector: '#accept' },
        { type: 'fill', selector: 'input[name=q]', value: 'lamps' },
        { type: 'wait', duration: 1000 },
        { type: 'scroll', direction: 'bottom' },
      ],
      options: { pagination: true, maxPages: 3 },
    });
  });

  it('fills in defaults', () => {
    expect(parseJobConfig({ url: 'https://example.com/', schema: {} })).toEqual({
      url: 'https://example.com/',
      schema: {},
      interactions: [],
      options: { pagination: false, maxPages: 1 },
    });
  });

  it('rejects unknown interaction types at load time', () => {
    const raw = { url: 'https://example.com/', schema: {}, interactions: [{ type: 'hover', selector: '#a' }] };

    expect(() => parseJobConfig(raw)).toThrow(JobConfigError);
    expect(() => parseJobConfig(raw)).toThrow(/^Invalid job configuration: interactions\.0\.type: /);
  });

  it('rejects a non-positive page budget', () => {
    const raw = { url: 'https://example.com/', schema: {}, options: { max_pages: 0 } };

    expect(() => parseJobConfig(raw)).toThrow(/^Invalid job configuration: options\.max_pages: /);
  });

  it('rejects an invalid url and keeps the issues', () => {
    try {
      parseJobConfig({ url: 'shop', schema: {} });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(JobConfigError);
      if (error instanceof JobConfigError) {
        expect(error.issues.map((i) => i.path.join('.'))).toEqual(['url']);
      }
    }
  });
});

describe('loadJobConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = join(tmpdir(), `job-loader-test-${randomUUID()}`);
    await mkdir(dir, { recursive: true });
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reads and validates a job file', async () => {
    const path = join(dir, 'job.json');
    await writeFile(path, JSON.stringify({ url: 'https://example.com/', schema: { title: 'string' } }), 'utf-8');

    const config = await loadJobConfig(path);

    expect(config.url).toBe('https://example.com/');
    expect(config.options).toEqual({ pagination: false, maxPages: 1 });
  });

  it('reports unreadable files', async () => {
    const path = join(dir, 'missing.json');

    await expect(loadJobConfig(path)).rejects.toThrow(`Cannot read job configuration ${path}: `);
  });

  it('reports malformed JSON', async () => {
    const path = join(dir, 'broken.json');
    await writeFile(path, '{ "url": ', 'utf-8');

    await expect(loadJobConfig(path)).rejects.toThrow(`Job configuration ${path} is not valid JSON: `);
  });
});
