import type { Page } from 'playwright';
import { getLogger } from '../../monitoring/logger.js';
import type { PopupDismisser } from '../collaborators.js';
import { clickFirst } from './clickFirst.js';

export const POPUP_CLOSE_SELECTORS = [
  "button:has-text('Accept all cookies')",
  "button:has-text('Allow Cookies')",
  "button:has-text('Got it')",
  "button:has-text('I accept')",
  "button[id*='cookie'][id*='accept']",
  "[aria-label*='accept cookie' i]",
  "button[aria-label*='close' i]",
  "button[aria-label*='dismiss' i]",
  "button:has-text('×')",
  "button[class*='close' i][class*='button' i]",
  "button[id*='close' i]",
  "span[aria-label*='close' i]",
  "button:has-text('No thanks')",
  "button:has-text('Maybe later')",
  'button:has-text("Don\'t allow")',
] as const;

const MAX_POPUPS = 3;

/** Closes cookie banners, survey prompts and modal close buttons. */
export class SelectorPopupDismisser implements PopupDismisser {
  private logger = getLogger({ service: 'PopupDismisser' });

  constructor(private readonly settleMs = 250) {}

  async dismiss(page: Page): Promise<number> {
    let closed = 0;
    while (closed < MAX_POPUPS) {
      const selector = await clickFirst(page, POPUP_CLOSE_SELECTORS, { timeoutMs: 1_000 });
      if (!selector) break;
      closed += 1;
      this.logger.info('Popup dismissed', { selector });
      await page.waitForTimeout(this.settleMs);
    }
    if (closed > 0) this.logger.info('Popups closed', { count: closed });
    return closed;
  }
}
