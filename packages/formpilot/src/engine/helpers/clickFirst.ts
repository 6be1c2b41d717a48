import type { Locator, Page } from 'playwright';
import { getLogger } from '../../monitoring/logger.js';
import { errorMessage } from '../errors.js';

const logger = getLogger({ service: 'clickFirst' });

export interface ClickFirstOptions {
  timeoutMs?: number;
  /** Skip candidates whose text contains any of these (lower-case) words. */
  excludeWords?: readonly string[];
}

async function isCandidate(candidate: Locator, excludeWords: readonly string[]): Promise<boolean> {
  if (!(await candidate.isVisible()) || !(await candidate.isEnabled())) return false;
  if (excludeWords.length === 0) return true;
  const text = ((await candidate.textContent()) ?? '').toLowerCase();
  return !excludeWords.some((word) => text.includes(word));
}

/** First visible, enabled element matching any selector, in selector order. */
export async function findFirstInteractable(
  page: Page,
  selectors: readonly string[],
  opts: ClickFirstOptions = {},
): Promise<{ locator: Locator; selector: string } | null> {
  for (const selector of selectors) {
    try {
      for (const candidate of await page.locator(selector).all()) {
        if (await isCandidate(candidate, opts.excludeWords ?? [])) return { locator: candidate, selector };
      }
    } catch (err) {
      logger.debug('Selector probe failed', { selector, error: errorMessage(err) });
    }
  }
  return null;
}

/**
 * Click the first interactable match, moving on to the next candidate when a
 * click fails. Returns the selector that worked, or null.
 */
export async function clickFirst(
  page: Page,
  selectors: readonly string[],
  opts: ClickFirstOptions = {},
): Promise<string | null> {
  const timeout = opts.timeoutMs ?? 5_000;
  for (const selector of selectors) {
    try {
      for (const candidate of await page.locator(selector).all()) {
        if (!(await isCandidate(candidate, opts.excludeWords ?? []))) continue;
        try {
          await candidate.scrollIntoViewIfNeeded({ timeout });
          await candidate.click({ timeout });
          return selector;
        } catch (err) {
          logger.debug('Click failed; trying next candidate', { selector, error: errorMessage(err) });
        }
      }
    } catch (err) {
      logger.debug('Selector probe failed', { selector, error: errorMessage(err) });
    }
  }
  return null;
}
