import { describe, it, expect } from 'vitest';
import { parseExtractionResponse, parseNextPageSelector } from '../../src/completion-client/response-parser.js';

describe('parseExtractionResponse', () => {
  it('reads the items array of an object reply', () => {
    expect(parseExtractionResponse('{"items": [{"name": "Lamp"}]}')).toEqual({ items: [{ name: 'Lamp' }] });
  });

  it('strips markdown fences', () => {
    const reply = '```json\n[{"name": "Lamp"}, {"name": "Desk"}]\n```';

    expect(parseExtractionResponse(reply)).toEqual({ items: [{ name: 'Lamp' }, { name: 'Desk' }] });
  });

  it('falls back to the first array value of an object', () => {
    const reply = '{"count": 1, "products": [{"name": "Lamp"}]}';

    expect(parseExtractionResponse(reply)).toEqual({ items: [{ name: 'Lamp' }] });
  });

  it('wraps a plain object as a single item', () => {
    expect(parseExtractionResponse('{"name": "Lamp", "price": null}')).toEqual({
      items: [{ name: 'Lamp', price: null }],
    });
  });

  it('finds JSON embedded in prose', () => {
    const reply = 'Here is the data: {"items": [{"name": "Lamp"}]} Let me know if you need more.';

    expect(parseExtractionResponse(reply)).toEqual({ items: [{ name: 'Lamp' }] });
  });

  it('warns when the reply holds no JSON', () => {
    expect(parseExtractionResponse('I could not find any products.')).toEqual({
      items: [],
      warning: 'No JSON found in completion reply',
    });
  });

  it('warns when the reply is a JSON scalar', () => {
    expect(parseExtractionResponse('42')).toEqual({
      items: [],
      warning: 'Completion reply was JSON but not an object or array',
    });
  });

  it('warns when the items key is not an array', () => {
    expect(parseExtractionResponse('{"items": null}')).toEqual({
      items: [],
      warning: 'Completion reply has an "items" key that is not an array',
    });
    expect(parseExtractionResponse('Nothing to extract: {"items": "none", "note": []}')).toEqual({
      items: [],
      warning: 'Completion reply has an "items" key that is not an array',
    });
  });

  it('warns when the embedded span is not valid JSON', () => {
    const parsed = parseExtractionResponse('Result: {name: Lamp} done');

    expect(parsed.items).toEqual([]);
    expect(parsed.warning).toMatch(/^Completion reply is not valid JSON: /);
  });
});

describe('parseNextPageSelector', () => {
  it('returns a trimmed selector', () => {
    expect(parseNextPageSelector('  li.next:not(.disabled) a \n')).toBe('li.next:not(.disabled) a');
  });

  it('removes wrapping backticks', () => {
    expect(parseNextPageSelector('`a.next`')).toBe('a.next');
  });

  it('removes code fences', () => {
    expect(parseNextPageSelector('```css\na[rel=next]\n```')).toBe('a[rel=next]');
  });

  it('maps the sentinel and empty replies to null', () => {
    expect(parseNextPageSelector('NO_PAGINATION')).toBeNull();
    expect(parseNextPageSelector('```\nNO_PAGINATION\n```')).toBeNull();
    expect(parseNextPageSelector('   ')).toBeNull();
  });
});
