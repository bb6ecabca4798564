import { describe, it, expect } from 'vitest';
import { buildFillTool } from '../../src/tools/fill.js';
import { createFakePage, createFakeSessions } from '../fixtures/fake-engine.js';

describe('fill tool', () => {
  it('fills the first matching field', async () => {
    const page = createFakePage({ elements: { 'input[name=q]': [{}] } });
    const tool = buildFillTool(createFakeSessions([page]));

    const outcome = await tool.run({ selector: 'input[name=q]', value: 'laptops' });

    expect(outcome).toEqual({ ok: true, sessionId: 'sess_000000000001', data: { filled: true } });
    expect(page.locator('input[name=q]').first().fill).toHaveBeenCalledWith('laptops');
  });

  it('accepts an empty value', async () => {
    const page = createFakePage({ elements: { '#name': [{}] } });
    const tool = buildFillTool(createFakeSessions([page]));

    const outcome = await tool.run({ selector: '#name', value: '' });

    expect(outcome.ok).toBe(true);
    expect(page.locator('#name').first().fill).toHaveBeenCalledWith('');
  });

  it('reports ELEMENT_NOT_FOUND when nothing matches', async () => {
    const tool = buildFillTool(createFakeSessions());

    const outcome = await tool.run({ selector: '#name', value: 'x' });

    expect(outcome).toEqual({
      ok: false,
      error: { code: 'ELEMENT_NOT_FOUND', message: "No element matches selector '#name'." },
    });
  });

  it('reports ELEMENT_NOT_VISIBLE for a hidden field', async () => {
    const page = createFakePage({ elements: { '#name': [{ visible: false }] } });
    const tool = buildFillTool(createFakeSessions([page]));

    const outcome = await tool.run({ selector: '#name', value: 'x' });

    expect(outcome).toEqual({
      ok: false,
      error: { code: 'ELEMENT_NOT_VISIBLE', message: "Element '#name' never became visible." },
    });
  });

  it('reports ELEMENT_NOT_EDITABLE for a read-only field', async () => {
    const page = createFakePage({ elements: { '#name': [{ editable: false }] } });
    const tool = buildFillTool(createFakeSessions([page]));

    const outcome = await tool.run({ selector: '#name', value: 'x' });

    expect(outcome).toEqual({
      ok: false,
      error: { code: 'ELEMENT_NOT_EDITABLE', message: "Element '#name' is not editable." },
    });
    expect(page.locator('#name').first().fill).not.toHaveBeenCalled();
  });

  it('classifies engine fill errors', async () => {
    const page = createFakePage({
      elements: { '#name': [{ fillError: new Error('Element is not an <input>, <textarea> or [contenteditable] element') }] },
    });
    const tool = buildFillTool(createFakeSessions([page]));

    const outcome = await tool.run({ selector: '#name', value: 'x' });

    expect(outcome).toEqual({
      ok: false,
      error: {
        code: 'ELEMENT_NOT_EDITABLE',
        message: "Filling '#name' failed: Element is not an <input>, <textarea> or [contenteditable] element",
      },
    });
  });
});
