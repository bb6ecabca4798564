import { isRecord } from '../utils/guards.js';
import { NO_PAGINATION } from './prompts.js';

export interface ParsedExtraction {
  items: unknown[];
  warning?: string;
}

function stripCodeFence(text: string): string {
  const trimmed = text.trim();
  if (!trimmed.startsWith('```')) return trimmed;

  const lines = trimmed.split('\n').slice(1);
  if (lines.length > 0 && lines[lines.length - 1].trim() === '```') {
    lines.pop();
  }
  return lines.join('\n').trim();
}

function tryParse(text: string): { ok: true; value: unknown } | { ok: false; reason: string } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (error) {
    return { ok: false, reason: error instanceof Error ? error.message : String(error) };
  }
}

type ItemsLookup = { ok: true; items: unknown[] } | { ok: false; warning: string };

function itemsFrom(value: unknown): ItemsLookup {
  if (Array.isArray(value)) return { ok: true, items: value };
  if (!isRecord(value)) {
    return { ok: false, warning: 'Completion reply was JSON but not an object or array' };
  }

  if ('items' in value) {
    const items = value.items;
    return Array.isArray(items)
      ? { ok: true, items }
      : { ok: false, warning: 'Completion reply has an "items" key that is not an array' };
  }

  for (const entry of Object.values(value)) {
    if (Array.isArray(entry)) return { ok: true, items: entry };
  }
  return { ok: true, items: [value] };
}

function toParsed(lookup: ItemsLookup): ParsedExtraction {
  return lookup.ok ? { items: lookup.items } : { items: [], warning: lookup.warning };
}

/**
 * Lenient reading of an extraction reply. A reply that holds no usable JSON
 * yields no items and a warning.
 */
export function parseExtractionResponse(text: string): ParsedExtraction {
  const body = stripCodeFence(text);

  const direct = tryParse(body);
  if (direct.ok) {
    return toParsed(itemsFrom(direct.value));
  }

  const start = body.indexOf('{');
  const end = body.lastIndexOf('}');
  if (start === -1 || end <= start) {
    return { items: [], warning: 'No JSON found in completion reply' };
  }

  const embedded = tryParse(body.slice(start, end + 1));
  if (!embedded.ok) {
    return { items: [], warning: `Completion reply is not valid JSON: ${embedded.reason}` };
  }
  return toParsed(itemsFrom(embedded.value));
}

/**
 * Clean a next-page reply down to a bare selector; null means "no further pages".
 */
export function parseNextPageSelector(text: string): string | null {
  let selector = stripCodeFence(text);

  if (selector.startsWith('`') && selector.endsWith('`') && selector.split('`').length === 3) {
    selector = selector.slice(1, -1).trim();
  }

  if (selector === '' || selector === NO_PAGINATION) return null;
  return selector;
}
