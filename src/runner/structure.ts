import type { TargetSchema } from '../types/index.js';

export const DEFAULT_ITEMS_KEY = 'items';

/**
 * First schema key whose declared shape is a list, if any.
 */
export function findArrayField(schema: TargetSchema): string | null {
  for (const [key, value] of Object.entries(schema)) {
    if (Array.isArray(value)) return key;
  }
  return null;
}

export function structureItems(
  items: unknown[],
  schema: TargetSchema,
  now: Date = new Date(),
): Record<string, unknown> {
  const key = findArrayField(schema) ?? DEFAULT_ITEMS_KEY;
  const data: Record<string, unknown> = { [key]: items };

  if ('metadata' in schema) {
    data.metadata = {
      extracted_at: now.toISOString(),
      item_count: items.length,
    };
  }
  return data;
}
