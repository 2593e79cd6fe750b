import { vi } from 'vitest';
import type { BrowserHandle, BrowserLauncher, PageHandle } from '../dynamicSession.js';

export interface FakeSite {
  /** HTML served per URL; URLs not listed render an empty body. */
  pages: Record<string, string>;
}

/**
 * In-process browser stand-in. A page "renders" when its HTML contains the
 * marker class.
 */
export function fakeLauncher(site: FakeSite) {
  const visited: string[] = [];
  const close = vi.fn(async () => {});
  let current = '';

  const page: PageHandle = {
    async goto(url) {
      visited.push(url);
      current = site.pages[url] ?? '<html><body></body></html>';
    },
    async waitForSelector(selector) {
      return current.includes(`class="${selector.replace(/^\./, '')}"`);
    },
    async content() {
      return current;
    },
  };
  const browser: BrowserHandle = {
    newPage: async () => page,
    close,
  };
  const launcher = vi.fn<BrowserLauncher>(async () => browser);
  return { launcher, close, visited };
}
