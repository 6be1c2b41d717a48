import type { Page } from 'playwright';
import { z } from 'zod';
import { getLogger } from '../monitoring/logger.js';
import { errorMessage, isFatalBrowserError, type ErrorKind } from './errors.js';

// ── Page-side scripts ──────────────────────────────────────────────────────

const INTERACTIVE_ROLES = [
  'input',
  'select',
  'textarea',
  'button',
  "[role='button']",
  "[role='textbox']",
  "[role='combobox']",
  "[role='listbox']",
  "[role='option']",
  "[role='checkbox']",
  "[role='radio']",
].join(', ');

const WATCHED_ATTRIBUTES = [
  'disabled',
  'hidden',
  'style',
  'class',
  'value',
  'checked',
  'selected',
  'readonly',
  'aria-disabled',
  'aria-hidden',
];

export const STABILITY_SCRIPTS = {
  install: `(() => {
    const existing = window.__fpStability;
    if (existing && existing.observer) return true;
    if (!document.documentElement) return false;
    const interactive = ${JSON.stringify(INTERACTIVE_ROLES)};
    const state = { lastCritical: Date.now(), mutations: 0, observer: null };
    const observer = new MutationObserver((records) => {
      for (const record of records) {
        const structural = record.type === 'childList' && (record.addedNodes.length > 0 || record.removedNodes.length > 0);
        const interactiveAttr = record.type === 'attributes' && record.target instanceof Element && record.target.matches(interactive);
        if (structural || interactiveAttr) {
          state.lastCritical = Date.now();
          state.mutations += 1;
        }
      }
    });
    observer.observe(document.documentElement, {
      childList: true,
      subtree: true,
      attributes: true,
      attributeFilter: ${JSON.stringify(WATCHED_ATTRIBUTES)},
    });
    state.observer = observer;
    window.__fpStability = state;
    return true;
  })()`,
  read: `(() => {
    const s = window.__fpStability;
    return s ? { now: Date.now(), lastCritical: s.lastCritical, mutations: s.mutations } : null;
  })()`,
  reset: `(() => {
    if (window.__fpStability) window.__fpStability.lastCritical = Date.now();
  })()`,
} as const;

const SnapshotSchema = z
  .object({
    now: z.number(),
    lastCritical: z.number(),
    mutations: z.number(),
  })
  .nullable();

// ── Monitor ────────────────────────────────────────────────────────────────

export interface StabilityOptions {
  /** Required quiet period with no critical mutation. */
  quietWindowMs: number;
  timeoutMs: number;
  pollIntervalMs: number;
}

export type StabilityResult =
  | { stable: true; via: 'mutations' | 'fallback'; waitedMs: number }
  | { stable: false; kind: ErrorKind; message: string; waitedMs: number };

export class StabilityMonitor {
  private logger = getLogger({ service: 'StabilityMonitor' });

  constructor(
    private readonly opts: StabilityOptions,
    private readonly now: () => number = Date.now,
  ) {}

  async waitForStable(page: Page, overrides: Partial<StabilityOptions> = {}): Promise<StabilityResult> {
    const { quietWindowMs, timeoutMs, pollIntervalMs } = { ...this.opts, ...overrides };
    const start = this.now();
    const elapsed = () => this.now() - start;
    const detached = (message: string): StabilityResult => {
      this.logger.warn('Page went away while waiting for stability', { message, waitedMs: elapsed() });
      return { stable: false, kind: 'detached', message, waitedMs: elapsed() };
    };

    if (page.isClosed()) return detached('page is closed');

    if (!(await this.install(page))) {
      if (page.isClosed()) return detached('page closed during install');
      return this.fallback(page, quietWindowMs, timeoutMs, start);
    }

    while (elapsed() < timeoutMs) {
      if (page.isClosed()) return detached('page closed during stability wait');

      try {
        const snapshot = SnapshotSchema.parse(await page.evaluate(STABILITY_SCRIPTS.read));
        if (snapshot === null) {
          // A navigation replaced the document; watch the new one.
          await this.install(page);
        } else if (snapshot.now - snapshot.lastCritical >= quietWindowMs) {
          if (await this.networkSettled(page, quietWindowMs)) {
            this.logger.debug('Page stable', { waitedMs: elapsed(), mutations: snapshot.mutations });
            return { stable: true, via: 'mutations', waitedMs: elapsed() };
          }
          await page.evaluate(STABILITY_SCRIPTS.reset);
        }
      } catch (err) {
        if (page.isClosed() || isFatalBrowserError(err)) return detached(errorMessage(err));
        this.logger.debug('Stability poll error', { error: errorMessage(err) });
      }

      try {
        await page.waitForTimeout(pollIntervalMs);
      } catch (err) {
        return detached(errorMessage(err));
      }
    }

    this.logger.warn('Stability wait timed out', { timeoutMs, quietWindowMs });
    return {
      stable: false,
      kind: 'timeout',
      message: `no ${quietWindowMs}ms quiet window within ${timeoutMs}ms`,
      waitedMs: elapsed(),
    };
  }

  private async install(page: Page): Promise<boolean> {
    try {
      return (await page.evaluate(STABILITY_SCRIPTS.install)) === true;
    } catch (err) {
      this.logger.debug('Mutation hook install failed', { error: errorMessage(err) });
      return false;
    }
  }

  private async networkSettled(page: Page, timeout: number): Promise<boolean> {
    try {
      await page.waitForLoadState('networkidle', { timeout });
      return true;
    } catch (err) {
      if (page.isClosed() || isFatalBrowserError(err)) throw err;
      this.logger.debug('Network not idle after quiet DOM; waiting again', { error: errorMessage(err) });
      return false;
    }
  }

  private async fallback(
    page: Page,
    quietWindowMs: number,
    timeoutMs: number,
    start: number,
  ): Promise<StabilityResult> {
    this.logger.info('Using network-idle fallback for stability');
    try {
      await page.waitForLoadState('networkidle', { timeout: Math.max(3_000, timeoutMs / 2) });
    } catch (err) {
      if (page.isClosed() || isFatalBrowserError(err)) {
        return { stable: false, kind: 'detached', message: errorMessage(err), waitedMs: this.now() - start };
      }
      this.logger.debug('Network-idle fallback timed out', { error: errorMessage(err) });
    }
    try {
      await page.waitForTimeout(quietWindowMs);
    } catch (err) {
      return { stable: false, kind: 'detached', message: errorMessage(err), waitedMs: this.now() - start };
    }
    return { stable: true, via: 'fallback', waitedMs: this.now() - start };
  }
}
