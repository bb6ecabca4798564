import { describe, it, expect } from 'vitest';
import { errors } from 'playwright';
import { classifyEngineError, extractMessage, isTimeoutError } from '../../src/exception/classifier.js';

describe('classifyEngineError', () => {
  describe('navigate', () => {
    it('classifies Playwright timeouts', () => {
      const error = new errors.TimeoutError('page.goto: Timeout 30000ms exceeded.');
      expect(classifyEngineError(error, { operation: 'navigate' })).toBe('NAVIGATION_TIMEOUT');
    });

    it('classifies timeout messages', () => {
      const error = new Error('Navigation timeout of 30000 ms exceeded');
      expect(classifyEngineError(error, { operation: 'navigate' })).toBe('NAVIGATION_TIMEOUT');
    });

    it('classifies invalid url errors', () => {
      const error = new Error('page.goto: Protocol error (Page.navigate): Cannot navigate to invalid URL');
      expect(classifyEngineError(error, { operation: 'navigate' })).toBe('INVALID_URL');
    });

    it('treats everything else as a network error', () => {
      const error = new Error('net::ERR_CONNECTION_REFUSED at http://localhost:9/');
      expect(classifyEngineError(error, { operation: 'navigate' })).toBe('NETWORK_ERROR');
    });
  });

  describe('interact', () => {
    it('classifies missing targets', () => {
      const error = new Error('locator.click: Error: strict mode violation: locator resolved to 0 elements');
      expect(classifyEngineError(error, { operation: 'interact', selector: '#go' })).toBe('ELEMENT_NOT_FOUND');
    });

    it('classifies non-editable targets', () => {
      const error = new Error('Element is not editable');
      expect(classifyEngineError(error, { operation: 'interact' })).toBe('ELEMENT_NOT_EDITABLE');
    });

    it('classifies hidden targets', () => {
      const error = new Error('element is not visible');
      expect(classifyEngineError(error, { operation: 'interact' })).toBe('ELEMENT_NOT_VISIBLE');
    });

    it('classifies blocked clicks', () => {
      const error = new Error('<div class="modal"> intercepts pointer events');
      expect(classifyEngineError(error, { operation: 'interact' })).toBe('ELEMENT_NOT_CLICKABLE');
    });

    it('classifies disabled targets', () => {
      const error = new Error('element is not enabled');
      expect(classifyEngineError(error, { operation: 'interact' })).toBe('ELEMENT_NOT_CLICKABLE');
    });

    it('falls back to INTERNAL_ERROR', () => {
      const error = new Error('Execution context was destroyed');
      expect(classifyEngineError(error, { operation: 'interact' })).toBe('INTERNAL_ERROR');
    });
  });

  it('never maps capture failures to element codes', () => {
    const error = new Error('element is not visible');
    expect(classifyEngineError(error, { operation: 'capture' })).toBe('INTERNAL_ERROR');
  });
});

describe('isTimeoutError', () => {
  it('recognises Playwright and named timeout errors', () => {
    const named = new Error('waited too long');
    named.name = 'TimeoutError';

    expect(isTimeoutError(new errors.TimeoutError('Timeout 5000ms exceeded.'))).toBe(true);
    expect(isTimeoutError(named)).toBe(true);
    expect(isTimeoutError(new Error('Timeout 5000ms exceeded.'))).toBe(false);
    expect(isTimeoutError('TimeoutError')).toBe(false);
  });
});

describe('extractMessage', () => {
  it('reads errors, strings and other values', () => {
    expect(extractMessage(new Error('boom'))).toBe('boom');
    expect(extractMessage('plain')).toBe('plain');
    expect(extractMessage(404)).toBe('404');
  });
});
