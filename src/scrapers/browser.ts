import type { Browser, BrowserContext, Locator, Page } from 'playwright-core';
import { ScrapeCancelledError, errorMessage } from '../errors';

export interface NavigationResult {
  ok: boolean;
  status: number | null;
  url: string;
  title: string;
}

/**
 * Read-only view of a page or of one element on it. A missing selector means the
 * scope itself.
 */
export interface ElementScope {
  extractText(selector?: string): Promise<string | undefined>;
  extractAttribute(selector: string | undefined, attribute: string): Promise<string | undefined>;
  queryAll(selector: string): Promise<ElementScope[]>;
}

/**
 * One browser context with a single page. Must be released on every exit path;
 * release is idempotent.
 */
export interface BrowserSession extends ElementScope {
  navigate(url: string): Promise<NavigationResult>;
  release(): Promise<void>;
}

export interface BrowserPool {
  /** Aborting `signal` releases the session, failing any navigation in flight. */
  acquire(signal?: AbortSignal): Promise<BrowserSession>;
  close(): Promise<void>;
}

export interface PlaywrightPoolOptions {
  headless: boolean;
  navigationTimeoutMs: number;
  executablePath?: string;
  random?: () => number;
}

const USER_AGENTS = [
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/121.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/122.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.2 Safari/605.1.15',
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/121.0.0.0 Safari/537.36',
];

const VIEWPORTS = [
  { width: 1366, height: 768 },
  { width: 1440, height: 900 },
  { width: 1536, height: 864 },
  { width: 1920, height: 1080 },
];

function pick<T>(items: readonly T[], random: () => number): T {
  return items[Math.floor(random() * items.length) % items.length];
}

class LocatorScope implements ElementScope {
  constructor(
    protected readonly root: Page | Locator,
    protected readonly timeoutMs: number,
  ) {}

  async extractText(selector?: string): Promise<string | undefined> {
    const target = this.root.locator(selector ?? ':scope').first();
    if ((await target.count()) === 0) return undefined;
    const text = await target.textContent({ timeout: this.timeoutMs });
    const trimmed = text?.replace(/\s+/g, ' ').trim();
    return trimmed ? trimmed : undefined;
  }

  async extractAttribute(selector: string | undefined, attribute: string): Promise<string | undefined> {
    const target = this.root.locator(selector ?? ':scope').first();
    if ((await target.count()) === 0) return undefined;
    const value = await target.getAttribute(attribute, { timeout: this.timeoutMs });
    return value ?? undefined;
  }

  async queryAll(selector: string): Promise<ElementScope[]> {
    const matches = await this.root.locator(selector).all();
    return matches.map(match => new LocatorScope(match, this.timeoutMs));
  }
}

class PlaywrightSession extends LocatorScope implements BrowserSession {
  private released = false;
  private readonly cleanups: (() => void)[] = [];

  constructor(
    private readonly context: BrowserContext,
    private readonly page: Page,
    timeoutMs: number,
  ) {
    super(page, timeoutMs);
  }

  async navigate(url: string): Promise<NavigationResult> {
    const response = await this.page.goto(url, { waitUntil: 'domcontentloaded', timeout: this.timeoutMs });
    return {
      ok: response ? response.ok() : true,
      status: response ? response.status() : null,
      url: this.page.url(),
      title: await this.page.title(),
    };
  }

  onRelease(cleanup: () => void): void {
    this.cleanups.push(cleanup);
  }

  async release(): Promise<void> {
    if (this.released) return;
    this.released = true;
    for (const cleanup of this.cleanups) cleanup();
    await this.context.close();
  }
}

/**
 * Headless Chromium through playwright-core. One browser is launched lazily and
 * shared; every session gets its own context with a randomized user agent and
 * viewport.
 */
export class PlaywrightBrowserPool implements BrowserPool {
  private browser: Promise<Browser> | null = null;
  private readonly random: () => number;

  constructor(private readonly options: PlaywrightPoolOptions) {
    this.random = options.random ?? Math.random;
  }

  private launch(): Promise<Browser> {
    if (!this.browser) {
      console.log('[Browser] Launching Chromium...');
      this.browser = import('playwright-core')
        .then(pw =>
          pw.chromium.launch({
            headless: this.options.headless,
            executablePath: this.options.executablePath,
          }),
        )
        .catch((error: unknown) => {
          this.browser = null;
          throw new Error(
            `Chromium could not be launched (install it with "npx playwright install chromium" ` +
              `or set BROWSER_EXECUTABLE_PATH): ${errorMessage(error)}`,
          );
        });
    }
    return this.browser;
  }

  async acquire(signal?: AbortSignal): Promise<BrowserSession> {
    if (signal?.aborted) throw new ScrapeCancelledError();

    const browser = await this.launch();
    const context = await browser.newContext({
      userAgent: pick(USER_AGENTS, this.random),
      viewport: pick(VIEWPORTS, this.random),
      locale: 'en-US',
    });
    const page = await context.newPage();
    const session = new PlaywrightSession(context, page, this.options.navigationTimeoutMs);

    if (signal?.aborted) {
      await session.release();
      throw new ScrapeCancelledError();
    }
    if (signal) {
      const onAbort = () => {
        session.release().catch(error => {
          console.error('[Browser] Failed to close context after cancellation:', errorMessage(error));
        });
      };
      signal.addEventListener('abort', onAbort, { once: true });
      session.onRelease(() => signal.removeEventListener('abort', onAbort));
    }

    return session;
  }

  async close(): Promise<void> {
    if (!this.browser) return;
    const pending = this.browser;
    this.browser = null;
    // A failed launch was already reported to whoever acquired a session
    const browser = await pending.catch(() => null);
    if (!browser) return;
    await browser.close();
    console.log('[Browser] Browser closed.');
  }
}
