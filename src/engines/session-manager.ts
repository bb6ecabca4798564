import { randomUUID } from 'node:crypto';
import { chromium } from 'playwright';
import type { BrowserLauncher, EngineBrowser, EngineContext, EnginePage } from './browser-engine.js';
import { createLogger } from '../logging/logger.js';

const log = createLogger('SessionManager');

export interface ResolvedSession {
  sessionId: string;
  page: EnginePage;
}

interface StoredSession {
  context: EngineContext;
  page: EnginePage;
}

export interface SessionManagerOptions {
  launcher?: BrowserLauncher;
  headless?: boolean;
  idFactory?: () => string;
}

export function chromiumLauncher(headless: boolean): BrowserLauncher {
  return () => chromium.launch({ headless });
}

function defaultSessionId(): string {
  return `sess_${randomUUID().replace(/-/g, '').slice(0, 12)}`;
}

/**
 * Owns the browser and the session-id → page mapping. Each session gets its
 * own browser context so cookies and storage never leak between callers.
 */
export class SessionManager {
  private sessions = new Map<string, StoredSession>();
  private browser: Promise<EngineBrowser> | null = null;
  private launcher: BrowserLauncher;
  private idFactory: () => string;
  private closed = false;

  constructor(options: SessionManagerOptions = {}) {
    this.launcher = options.launcher ?? chromiumLauncher(options.headless ?? true);
    this.idFactory = options.idFactory ?? defaultSessionId;
  }

  get size(): number {
    return this.sessions.size;
  }

  has(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  async resolve(sessionId?: string | null): Promise<ResolvedSession> {
    if (sessionId) {
      const stored = this.sessions.get(sessionId);
      if (stored) {
        return { sessionId, page: stored.page };
      }
    }

    if (this.closed) {
      throw new Error('Session manager has been shut down');
    }

    const browser = await this.getBrowser();
    const context = await browser.newContext();
    const page = await context.newPage();
    const id = this.idFactory();
    this.sessions.set(id, { context, page });
    log.debug('session_created', { sessionId: id, requested: sessionId ?? null });
    return { sessionId: id, page };
  }

  /**
   * Close every page and context, then the browser. Safe to call repeatedly;
   * a failing close is logged and the rest still get released.
   */
  async shutdown(): Promise<void> {
    this.closed = true;

    for (const [sessionId, stored] of Array.from(this.sessions.entries())) {
      this.sessions.delete(sessionId);
      try {
        await stored.page.close();
        await stored.context.close();
      } catch (error) {
        log.warn('session_close_failed', { sessionId, error: String(error) });
      }
    }

    const pending = this.browser;
    this.browser = null;
    if (!pending) return;

    try {
      const browser = await pending;
      await browser.close();
    } catch (error) {
      log.warn('browser_close_failed', { error: String(error) });
    }
  }

  private getBrowser(): Promise<EngineBrowser> {
    if (!this.browser) {
      const launching = this.launcher();
      // A failed launch must not poison later attempts.
      void launching.catch(() => {
        if (this.browser === launching) this.browser = null;
      });
      this.browser = launching;
    }
    return this.browser;
  }
}
