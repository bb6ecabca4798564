/**
 * The slice of Playwright the tools rely on. Real `Page`, `BrowserContext`
 * and `Browser` objects satisfy these shapes; tests supply in-memory fakes.
 */

export type WaitUntil = 'load' | 'domcontentloaded' | 'networkidle' | 'commit';

export interface EngineResponse {
  status(): number;
}

export interface EngineLocator {
  count(): Promise<number>;
  first(): EngineLocator;
  nth(index: number): EngineLocator;
  scrollIntoViewIfNeeded(options?: { timeout?: number }): Promise<void>;
  waitFor(options?: { state?: 'attached' | 'detached' | 'visible' | 'hidden'; timeout?: number }): Promise<void>;
  isEnabled(options?: { timeout?: number }): Promise<boolean>;
  isEditable(options?: { timeout?: number }): Promise<boolean>;
  click(options?: { timeout?: number }): Promise<void>;
  fill(value: string, options?: { timeout?: number }): Promise<void>;
  getAttribute(name: string, options?: { timeout?: number }): Promise<string | null>;
  innerText(options?: { timeout?: number }): Promise<string>;
}

export interface EnginePage {
  goto(url: string, options?: { waitUntil?: WaitUntil; timeout?: number }): Promise<EngineResponse | null>;
  locator(selector: string): EngineLocator;
  screenshot(options?: { fullPage?: boolean; type?: 'png' | 'jpeg' }): Promise<Buffer>;
  url(): string;
  title(): Promise<string>;
  content(): Promise<string>;
  close(): Promise<void>;
}

export interface EngineContext {
  newPage(): Promise<EnginePage>;
  close(): Promise<void>;
}

export interface EngineBrowser {
  newContext(): Promise<EngineContext>;
  close(): Promise<void>;
}

export type BrowserLauncher = () => Promise<EngineBrowser>;
