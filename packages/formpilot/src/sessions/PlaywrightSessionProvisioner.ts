import { chromium, type Browser, type BrowserContext } from 'playwright';
import { getLogger } from '../monitoring/logger.js';
import type { BrowserSession, SessionProvisioner } from '../engine/collaborators.js';
import { errorMessage } from '../engine/errors.js';

export interface SessionOptions {
  headless: boolean;
  /** Hide the usual automation fingerprints. */
  stealth: boolean;
  navigationTimeoutMs: number;
  actionTimeoutMs: number;
  userAgent?: string;
  viewport?: { width: number; height: number };
}

const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

const STEALTH_ARGS = [
  '--no-sandbox',
  '--disable-dev-shm-usage',
  '--disable-blink-features=AutomationControlled',
  '--disable-gpu',
  '--disable-extensions',
];

const STEALTH_INIT_SCRIPTS = [
  "Object.defineProperty(navigator, 'webdriver', { get: () => undefined })",
  "Object.defineProperty(navigator, 'languages', { get: () => ['en-US', 'en'] })",
  "Object.defineProperty(navigator, 'plugins', { get: () => [1, 2, 3, 4, 5].map((i) => ({ name: 'Plugin ' + i, filename: 'plugin' + i + '.dll' })) })",
  "if (window.Notification) Object.defineProperty(Notification, 'permission', { get: () => 'denied' })",
];

/** Launches a local Chromium with one context and one page per session. */
export class PlaywrightSessionProvisioner implements SessionProvisioner {
  private logger = getLogger({ service: 'SessionProvisioner' });

  constructor(private readonly opts: SessionOptions) {}

  async open(): Promise<BrowserSession> {
    let browser: Browser | null = null;
    let context: BrowserContext | null = null;
    try {
      browser = await chromium.launch({
        headless: this.opts.headless,
        args: this.opts.stealth ? STEALTH_ARGS : [],
      });
      context = await browser.newContext({
        userAgent: this.opts.userAgent ?? DEFAULT_USER_AGENT,
        viewport: this.opts.viewport ?? { width: 1366, height: 768 },
        locale: 'en-US',
        timezoneId: 'America/New_York',
        bypassCSP: true,
        extraHTTPHeaders: { 'Accept-Language': 'en-US,en;q=0.9', DNT: '1' },
      });
      if (this.opts.stealth) {
        for (const script of STEALTH_INIT_SCRIPTS) await context.addInitScript(script);
      }

      const page = await context.newPage();
      page.setDefaultNavigationTimeout(this.opts.navigationTimeoutMs);
      page.setDefaultTimeout(this.opts.actionTimeoutMs);
      this.logger.info('Browser session opened', { headless: this.opts.headless, stealth: this.opts.stealth });

      const openedBrowser = browser;
      const openedContext = context;
      return {
        page,
        close: async () => {
          await openedContext.close();
          await openedBrowser.close();
          this.logger.info('Browser session closed');
        },
      };
    } catch (err) {
      this.logger.error('Browser session failed to open', { error: errorMessage(err) });
      await context?.close();
      await browser?.close();
      throw err;
    }
  }
}
