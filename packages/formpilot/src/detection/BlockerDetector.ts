/**
 * BlockerDetector: DOM-based detection of CAPTCHAs and bot checks.
 *
 * Selector patterns are evaluated inside the page; text patterns are matched
 * against the first few thousand characters of the body text. Solving is out
 * of scope: callers get a bounded window in which a human may clear it.
 */

import type { Page } from 'playwright';
import { getLogger } from '../monitoring/logger.js';
import { errorMessage } from '../engine/errors.js';

export type BlockerType = 'captcha' | 'bot_check' | 'visual_verification';

export interface BlockerResult {
  type: BlockerType;
  /** 0-1 confidence score */
  confidence: number;
  /** CSS selector that matched, if applicable */
  selector?: string;
  details: string;
}

interface SelectorPattern {
  type: BlockerType;
  selector: string;
  confidence: number;
}

const SELECTOR_PATTERNS: SelectorPattern[] = [
  // -- CAPTCHA --
  { type: 'captcha', selector: 'iframe[src*="recaptcha"]', confidence: 0.95 },
  { type: 'captcha', selector: 'iframe[title*="reCAPTCHA"]', confidence: 0.95 },
  { type: 'captcha', selector: 'iframe[src*="hcaptcha"]', confidence: 0.95 },
  { type: 'captcha', selector: 'iframe[title*="hcaptcha"]', confidence: 0.9 },
  { type: 'captcha', selector: '[class*="g-recaptcha"]', confidence: 0.9 },
  { type: 'captcha', selector: '[class*="h-captcha"]', confidence: 0.9 },
  { type: 'captcha', selector: 'iframe[src*="challenges.cloudflare.com"]', confidence: 0.95 },
  { type: 'captcha', selector: 'iframe[src*="funcaptcha"]', confidence: 0.9 },
  { type: 'captcha', selector: 'iframe[src*="arkoselabs.com"]', confidence: 0.9 },
  { type: 'captcha', selector: 'div#turnstile-widget', confidence: 0.9 },
  { type: 'captcha', selector: '[data-testid="captcha"]', confidence: 0.8 },
  { type: 'captcha', selector: '#captcha', confidence: 0.7 },
  { type: 'captcha', selector: '[aria-label*="captcha" i]', confidence: 0.7 },

  // -- Bot check --
  { type: 'bot_check', selector: '#challenge-running', confidence: 0.95 },
  { type: 'bot_check', selector: '#cf-challenge-running', confidence: 0.95 },
  { type: 'bot_check', selector: '.cf-browser-verification', confidence: 0.9 },
  { type: 'bot_check', selector: '#px-captcha', confidence: 0.9 },

  // -- Visual verification --
  { type: 'visual_verification', selector: '.slider-captcha', confidence: 0.85 },
];

const TEXT_PATTERNS: { type: BlockerType; pattern: RegExp; confidence: number }[] = [
  { type: 'captcha', pattern: /please complete the (security |captcha )?check/i, confidence: 0.75 },
  { type: 'captcha', pattern: /verify you('re| are) (a )?human/i, confidence: 0.8 },
  { type: 'captcha', pattern: /i('|’)m not a robot/i, confidence: 0.85 },
  { type: 'bot_check', pattern: /checking your browser/i, confidence: 0.85 },
  { type: 'bot_check', pattern: /please wait while we verify/i, confidence: 0.8 },
  { type: 'visual_verification', pattern: /select all images with/i, confidence: 0.9 },
  { type: 'visual_verification', pattern: /slide to (verify|unlock)/i, confidence: 0.85 },
];

/** Matches below this are reported but not treated as blocking. */
export const BLOCKING_CONFIDENCE = 0.6;

export class BlockerDetector {
  private logger = getLogger({ service: 'BlockerDetector' });

  /** Highest-confidence blocker on the page, or null. */
  async detectBlocker(page: Page): Promise<BlockerResult | null> {
    const matches = await this.runDOMDetection(page);
    if (matches.length === 0) return null;

    matches.sort((a, b) => b.confidence - a.confidence);
    return matches[0] ?? null;
  }

  /**
   * Poll until no blocking challenge remains or the window closes.
   * Returns true when the page is clear.
   */
  async waitForClear(page: Page, windowMs: number, pollMs = 1_000): Promise<boolean> {
    let blocker = await this.safeDetect(page);
    if (!blocker || blocker.confidence < BLOCKING_CONFIDENCE) return true;

    this.logger.warn('Challenge detected; waiting for manual solve', {
      type: blocker.type,
      selector: blocker.selector,
      windowMs,
    });

    let waited = 0;
    while (waited < windowMs) {
      await page.waitForTimeout(pollMs);
      waited += pollMs;
      blocker = await this.safeDetect(page);
      if (!blocker || blocker.confidence < BLOCKING_CONFIDENCE) {
        this.logger.info('Challenge cleared', { waitedMs: waited });
        return true;
      }
    }

    this.logger.warn('Challenge still present after manual window', { type: blocker.type });
    return false;
  }

  private async safeDetect(page: Page): Promise<BlockerResult | null> {
    try {
      return await this.detectBlocker(page);
    } catch (err) {
      this.logger.debug('Blocker detection failed', { error: errorMessage(err) });
      return null;
    }
  }

  private async runDOMDetection(page: Page): Promise<BlockerResult[]> {
    const matches: BlockerResult[] = [];

    const selectorResults = await page.evaluate((patterns: SelectorPattern[]) => {
      const found: (SelectorPattern & { visible: boolean })[] = [];
      for (const p of patterns) {
        const el = document.querySelector(p.selector);
        if (el) {
          const rect = el.getBoundingClientRect();
          found.push({ ...p, visible: rect.width > 0 && rect.height > 0 });
        }
      }
      return found;
    }, SELECTOR_PATTERNS);

    for (const result of selectorResults) {
      // Hidden matches are often preloaded widgets that never render.
      const confidence = result.visible ? result.confidence : result.confidence * 0.5;
      matches.push({
        type: result.type,
        confidence,
        selector: result.selector,
        details: `Matched selector: ${result.selector} (visible=${result.visible})`,
      });
    }

    const bodyText = await page.evaluate(() => document.body?.innerText?.substring(0, 5000) || '');
    for (const { type, pattern, confidence } of TEXT_PATTERNS) {
      if (pattern.test(bodyText)) {
        matches.push({ type, confidence, details: `Matched text pattern: ${pattern.source}` });
      }
    }

    return matches;
  }
}
