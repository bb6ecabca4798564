import type { TargetSchema } from '../types/index.js';

export const NO_PAGINATION = 'NO_PAGINATION';

export const EXTRACTION_MARKUP_LIMIT = 50_000;
export const PAGINATION_MARKUP_LIMIT = 30_000;

export function truncateMarkup(html: string, limit: number): string {
  return html.length > limit ? html.slice(0, limit) : html;
}

export function buildExtractionPrompt(html: string, schema: TargetSchema): string {
  return [
    'You extract structured data from HTML so that it matches a target schema.',
    '',
    'TARGET SCHEMA:',
    JSON.stringify(schema, null, 2),
    '',
    'HTML CONTENT:',
    html,
    '',
    'RULES:',
    '1. Find the elements in the HTML that correspond to each schema field.',
    '2. Extract EVERY item that fits the schema, not only the first one.',
    '3. Types: "string" is the text content; "number" is a numeric value without currency',
    '   symbols or separators; "boolean" is true/false from presence or wording; nested',
    '   objects are extracted field by field.',
    '4. Use null for any field that cannot be found.',
    '5. Reply with JSON only: no markdown, no explanations.',
    '',
    'OUTPUT FORMAT:',
    '{"items": [item1, item2, ...]}',
    'Start the reply with { and end it with }.',
  ].join('\n');
}

export function buildNextPagePrompt(html: string): string {
  return [
    'Find the CSS selector of the active "next page" link or button in this HTML.',
    '',
    'HTML:',
    html,
    '',
    'RULES:',
    '1. Look for usual pagination controls: "Next", "Suivant", "→", "»", numbered pages.',
    '2. The element must be active: skip anything with a "disabled", "inactive" or',
    '   "current" class, aria-disabled="true", a disabled attribute, or an href of "#".',
    '3. Prefer selectors that only match the active control, for example',
    '   li.next:not(.disabled) a or a.next-page[href].',
    '4. Reply with the selector alone: no backticks, no markdown.',
    `5. If there is no active next-page control, reply exactly: ${NO_PAGINATION}`,
  ].join('\n');
}
