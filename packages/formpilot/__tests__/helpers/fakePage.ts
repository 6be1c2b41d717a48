import type { Page } from 'playwright';
import { buildStableSelector, SCAN_INDEX_ATTR } from '../../src/engine/analysis/AttributeExtractor.js';
import { STABILITY_SCRIPTS } from '../../src/engine/StabilityMonitor.js';
import type { RawElement } from '../../src/engine/types.js';

// ── Scripted in-process page ──────────────────────────────────────────────

export interface FakeElement {
  raw: RawElement;
  /** Screen index shown after this element is clicked. */
  navigatesTo?: number;
  /** Marks the run as submitted when clicked. */
  submits?: boolean;
}

export interface FakeScreen {
  url: string;
  elements: FakeElement[];
  bodyText?: string;
  /** Per-element failures reported by the extraction script. */
  extractionErrors?: string[];
}

const SCAN_STAMP = /^\[data-fp-scan-idx="(\d+)"\]$/;

/**
 * Just enough of a Playwright page for the engine: elements are addressed by
 * their scan stamp or by the stable selector the extractor would build for
 * them, typing lands in a value map keyed by scan index, and clicks can
 * switch screens.
 */
export class FakePage {
  screenIndex = -1;
  submitted = false;
  readonly values = new Map<number, string>();
  readonly clicks: string[] = [];
  readonly visited: string[] = [];
  private closed = false;

  constructor(private readonly screens: FakeScreen[]) {}

  asPage(): Page {
    return this as unknown as Page;
  }

  private get screen(): FakeScreen | undefined {
    return this.screens[this.screenIndex];
  }

  async goto(url: string): Promise<null> {
    const index = this.screens.findIndex((s) => s.url === url);
    this.screenIndex = index === -1 ? 0 : index;
    this.visited.push(url);
    return null;
  }

  url(): string {
    return this.screen?.url ?? 'about:blank';
  }

  isClosed(): boolean {
    return this.closed;
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  async waitForTimeout(): Promise<void> {}

  async waitForLoadState(): Promise<void> {}

  async screenshot(): Promise<Buffer> {
    return Buffer.from('');
  }

  async evaluate(script: unknown, arg?: unknown): Promise<unknown> {
    if (typeof script === 'function') {
      // Blocker probes: selector list first, then body text.
      return Array.isArray(arg) ? [] : (this.screen?.bodyText ?? '');
    }
    if (script === STABILITY_SCRIPTS.install) return true;
    if (script === STABILITY_SCRIPTS.read) return { now: 10_000, lastCritical: 0, mutations: 0 };
    if (script === STABILITY_SCRIPTS.reset) return undefined;
    if (typeof script === 'string' && script.includes(SCAN_INDEX_ATTR)) {
      const records: unknown[] = (this.screen?.elements ?? []).map((e) => e.raw);
      (this.screen?.extractionErrors ?? []).forEach((error, i) => records.push({ scanIndex: 900 + i, error }));
      return records;
    }
    return [];
  }

  locator(selector: string): FakeLocator {
    if (selector === 'body') return new FakeLocator(this, selector, [], this.screen?.bodyText ?? '');
    const stamp = SCAN_STAMP.exec(selector);
    const matches = (this.screen?.elements ?? []).filter((e) =>
      stamp ? e.raw.scanIndex === Number(stamp[1]) : buildStableSelector(e.raw) === selector,
    );
    return new FakeLocator(this, selector, matches);
  }

  click(element: FakeElement): void {
    this.clicks.push(buildStableSelector(element.raw));
    if (element.submits) this.submitted = true;
    if (element.navigatesTo !== undefined) this.screenIndex = element.navigatesTo;
  }
}

export class FakeLocator {
  constructor(
    private readonly page: FakePage,
    private readonly selector: string,
    private readonly matches: FakeElement[],
    private readonly text = '',
  ) {}

  first(): FakeLocator {
    return new FakeLocator(this.page, this.selector, this.matches.slice(0, 1), this.text);
  }

  locator(selector: string): FakeLocator {
    return this.page.locator(selector);
  }

  async all(): Promise<FakeLocator[]> {
    return this.matches.map((m) => new FakeLocator(this.page, this.selector, [m]));
  }

  async count(): Promise<number> {
    return this.matches.length;
  }

  async isVisible(): Promise<boolean> {
    return this.matches[0]?.raw.visible ?? false;
  }

  async isEnabled(): Promise<boolean> {
    return this.matches[0]?.raw.enabled ?? false;
  }

  async innerText(): Promise<string> {
    return this.text;
  }

  async allInnerTexts(): Promise<string[]> {
    return this.matches.map((m) => m.raw.text);
  }

  async textContent(): Promise<string | null> {
    return this.matches[0]?.raw.text ?? null;
  }

  async scrollIntoViewIfNeeded(): Promise<void> {}

  async click(): Promise<void> {
    this.page.click(this.require());
  }

  async fill(value: string): Promise<void> {
    this.page.values.set(this.require().raw.scanIndex, value);
  }

  async pressSequentially(text: string): Promise<void> {
    const { scanIndex } = this.require().raw;
    this.page.values.set(scanIndex, (this.page.values.get(scanIndex) ?? '') + text);
  }

  async press(): Promise<void> {}

  async dispatchEvent(): Promise<void> {}

  async inputValue(): Promise<string> {
    return this.page.values.get(this.require().raw.scanIndex) ?? '';
  }

  private require(): FakeElement {
    const element = this.matches[0];
    if (!element) throw new Error(`locator resolved to 0 elements: ${this.selector}`);
    return element;
  }
}
