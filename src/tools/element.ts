import type { ToolOutcome } from '../types/index.js';
import type { EngineLocator, EnginePage } from '../engines/browser-engine.js';
import { classifyEngineError, extractMessage, isTimeoutError } from '../exception/classifier.js';
import { failure } from '../exception/tool-error.js';

export const VISIBLE_TIMEOUT_MS = 5_000;
export const SCROLL_TIMEOUT_MS = 2_000;

export type ElementLookup =
  | { ok: true; target: EngineLocator }
  | { ok: false; outcome: ToolOutcome<never> };

/**
 * First element matching `selector`, or ELEMENT_NOT_FOUND when nothing does.
 */
export async function locateFirst(page: EnginePage, selector: string): Promise<ElementLookup> {
  const locator = page.locator(selector);
  let count: number;
  try {
    count = await locator.count();
  } catch (error) {
    const code = classifyEngineError(error, { operation: 'interact', selector });
    return {
      ok: false,
      outcome: failure(code, `Selector '${selector}' could not be evaluated: ${extractMessage(error)}`),
    };
  }

  if (count === 0) {
    return { ok: false, outcome: failure('ELEMENT_NOT_FOUND', `No element matches selector '${selector}'.`) };
  }
  return { ok: true, target: locator.first() };
}

/**
 * Resolves to a failure outcome when the element does not become visible in time.
 */
export async function waitUntilVisible(
  target: EngineLocator,
  selector: string,
): Promise<ToolOutcome<never> | null> {
  try {
    await target.waitFor({ state: 'visible', timeout: VISIBLE_TIMEOUT_MS });
    return null;
  } catch (error) {
    if (isTimeoutError(error)) {
      return failure('ELEMENT_NOT_VISIBLE', `Element '${selector}' never became visible.`);
    }
    const code = classifyEngineError(error, { operation: 'interact', selector });
    return failure(code, extractMessage(error));
  }
}
