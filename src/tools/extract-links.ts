import type { SessionManager } from '../engines/session-manager.js';
import type { EnginePage } from '../engines/browser-engine.js';
import { ExtractLinksInputSchema } from '../schemas/index.js';
import { extractMessage } from '../exception/classifier.js';
import { failure, success } from '../exception/tool-error.js';
import { withSession, type ToolDefinition } from './tool-definition.js';

export type ExtractedLink = {
  text: string;
  url: string;
  is_external: boolean;
};

function resolveHref(href: string, base: string): URL | null {
  try {
    return new URL(href, base);
  } catch {
    return null;
  }
}

function hostOf(url: string): string {
  try {
    return new URL(url).host;
  } catch {
    return '';
  }
}

export async function collectLinks(page: EnginePage, filter?: string | null): Promise<ExtractedLink[]> {
  const currentUrl = page.url();
  const currentHost = hostOf(currentUrl);
  const needle = filter ? filter.toLowerCase() : null;

  const anchors = page.locator('a');
  const count = await anchors.count();
  const links: ExtractedLink[] = [];

  for (let i = 0; i < count; i++) {
    const anchor = anchors.nth(i);
    const href = ((await anchor.getAttribute('href')) ?? '').trim();
    if (!href) continue;

    const absolute = resolveHref(href, currentUrl);
    if (!absolute) continue;

    const text = (await anchor.innerText()).trim();
    const url = absolute.href;
    if (needle && !`${text} ${url}`.toLowerCase().includes(needle)) continue;

    links.push({
      text,
      url,
      is_external: absolute.host !== '' && absolute.host !== currentHost,
    });
  }

  return links;
}

export function buildExtractLinksTool(sessions: SessionManager): ToolDefinition {
  return {
    name: 'extract_links',
    description: 'Return anchors on the page with text, URL, and external flag.',
    inputSchema: ExtractLinksInputSchema,
    async run(raw) {
      const bound = await withSession(raw, sessions, ExtractLinksInputSchema);
      if (!bound.ok) return bound.outcome;

      try {
        const links = await collectLinks(bound.page, bound.input.filter_contains);
        return success(bound.sessionId, { links });
      } catch (error) {
        return failure('INTERNAL_ERROR', `Link extraction failed: ${extractMessage(error)}`);
      }
    },
  };
}
