import { chromium, errors } from 'playwright-core';
import { DriverError, NetworkError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import type { FetchTask, PageSource } from './types.js';
import { emptyDocument, parseDocument } from './document.js';

export interface BrowserLaunchOptions {
  headless: boolean;
  timeoutMs: number;
  userAgent?: string;
  executablePath?: string;
}

/** The slice of a browser page the session needs. */
export interface PageHandle {
  goto(url: string, timeoutMs: number): Promise<void>;
  /** Resolves false when the selector does not appear within the timeout. */
  waitForSelector(selector: string, timeoutMs: number): Promise<boolean>;
  content(): Promise<string>;
}

export interface BrowserHandle {
  newPage(): Promise<PageHandle>;
  close(): Promise<void>;
}

export type BrowserLauncher = (options: BrowserLaunchOptions) => Promise<BrowserHandle>;

/**
 * Default launcher: headless Chromium through playwright-core. The browser
 * binary must already be installed (or named via `executablePath`).
 */
export const launchChromium: BrowserLauncher = async (options) => {
  const browser = await chromium.launch({
    headless: options.headless,
    timeout: options.timeoutMs,
    ...(options.executablePath ? { executablePath: options.executablePath } : {}),
    args: ['--no-sandbox', '--disable-dev-shm-usage', '--disable-gpu', '--window-size=1920,1080'],
  });
  const context = await browser.newContext({
    ...(options.userAgent ? { userAgent: options.userAgent } : {}),
    viewport: { width: 1920, height: 1080 },
  });

  return {
    async newPage() {
      const page = await context.newPage();
      return {
        async goto(url, timeoutMs) {
          await page.goto(url, { timeout: timeoutMs, waitUntil: 'domcontentloaded' });
        },
        async waitForSelector(selector, timeoutMs) {
          try {
            await page.waitForSelector(selector, { timeout: timeoutMs, state: 'attached' });
            return true;
          } catch (err) {
            if (err instanceof errors.TimeoutError) return false;
            throw err;
          }
        },
        content: () => page.content(),
      };
    },
    close: () => browser.close(),
  };
};

export interface DynamicSessionOptions extends BrowserLaunchOptions {
  /** Element whose presence means the page finished rendering. */
  marker: string;
  waitTimeoutMs: number;
  launcher?: BrowserLauncher;
}

const BROWSER_GONE = /(target|page|context|browser)( page, context or browser)? (has been )?closed|crashed/i;

export type NavigationResult = { status: 'ready' } | { status: 'timeout' };

/**
 * Owns one browser process for the length of a crawl. `close()` is idempotent,
 * never rejects, and must be paired with every successful `open()`.
 */
export class DynamicSession implements PageSource {
  readonly kind = 'dynamic';
  private readonly options: DynamicSessionOptions;
  private readonly launcher: BrowserLauncher;
  private browser: BrowserHandle | null = null;
  private page: PageHandle | null = null;
  private lastNavigation: NavigationResult | null = null;
  private currentUrl: string | undefined;

  constructor(options: DynamicSessionOptions) {
    this.options = options;
    this.launcher = options.launcher ?? launchChromium;
  }

  get isOpen(): boolean {
    return this.browser !== null;
  }

  async open(): Promise<void> {
    if (this.browser) return;

    let browser: BrowserHandle;
    try {
      browser = await this.launcher({
        headless: this.options.headless,
        timeoutMs: this.options.timeoutMs,
        userAgent: this.options.userAgent,
        executablePath: this.options.executablePath,
      });
    } catch (err) {
      throw new DriverError(`Browser failed to launch: ${err instanceof Error ? err.message : String(err)}`, {
        headless: this.options.headless,
        executablePath: this.options.executablePath,
      });
    }

    try {
      this.page = await browser.newPage();
    } catch (err) {
      await browser.close().catch((closeErr: unknown) => {
        logger.warn({ error: closeErr instanceof Error ? closeErr.message : String(closeErr) }, 'Browser close failed');
      });
      throw new DriverError(`Browser page could not be created: ${err instanceof Error ? err.message : String(err)}`);
    }

    this.browser = browser;
    logger.debug({ headless: this.options.headless }, 'Browser session opened');
  }

  /**
   * Load `url` and wait for the marker element. A marker timeout is reported
   * as `{ status: 'timeout' }`, not thrown.
   */
  async navigate(url: string): Promise<NavigationResult> {
    const page = this.requirePage();
    this.currentUrl = url;

    this.lastNavigation = null;

    try {
      await page.goto(url, this.options.timeoutMs);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      if (BROWSER_GONE.test(message)) {
        throw new DriverError(`Browser crashed during navigation: ${message}`, { url });
      }
      throw new NetworkError(`Navigation failed: ${message}`, false, { url });
    }

    let found: boolean;
    try {
      found = await page.waitForSelector(this.options.marker, this.options.waitTimeoutMs);
    } catch (err) {
      throw new DriverError(`Waiting for marker failed: ${err instanceof Error ? err.message : String(err)}`, {
        url,
        marker: this.options.marker,
      });
    }
    this.lastNavigation = found ? { status: 'ready' } : { status: 'timeout' };
    if (!found) {
      logger.warn({ url, marker: this.options.marker, timeoutMs: this.options.waitTimeoutMs }, 'Marker element not found');
    }
    return this.lastNavigation;
  }

  /** Snapshot of the current DOM; empty after a marker timeout. */
  async render(): Promise<Document> {
    const page = this.requirePage();
    if (this.lastNavigation?.status !== 'ready') {
      return emptyDocument(this.currentUrl);
    }
    return parseDocument(await page.content(), this.currentUrl);
  }

  async load(task: FetchTask): Promise<Document> {
    task.attempts += 1;
    await this.navigate(task.url);
    return this.render();
  }

  async close(): Promise<void> {
    const browser = this.browser;
    this.browser = null;
    this.page = null;
    this.lastNavigation = null;
    if (!browser) return;
    try {
      await browser.close();
      logger.debug('Browser session closed');
    } catch (err) {
      logger.warn({ error: err instanceof Error ? err.message : String(err) }, 'Browser close failed');
    }
  }

  private requirePage(): PageHandle {
    if (!this.page) {
      throw new DriverError('Browser session is not open');
    }
    return this.page;
  }
}

/**
 * Run `fn` with an open session, closing it on every exit path.
 */
export async function withDynamicSession<T>(
  session: DynamicSession,
  fn: (session: DynamicSession) => Promise<T>,
): Promise<T> {
  await session.open();
  try {
    return await fn(session);
  } finally {
    await session.close();
  }
}
