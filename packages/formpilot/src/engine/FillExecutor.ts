import { stat } from 'node:fs/promises';
import { resolve } from 'node:path';
import type { Locator, Page } from 'playwright';
import { getLogger } from '../monitoring/logger.js';
import { scanStampSelector } from './analysis/AttributeExtractor.js';
import {
  errorMessage,
  failure,
  fromError,
  isTransient,
  type ErrorKind,
} from './errors.js';
import {
  FieldTypeSchema,
  type ElementKind,
  type FieldDescriptor,
  type FieldValue,
  type FillAttemptOutcome,
  type FillSuccess,
  type PageAnalysis,
  type StepData,
} from './types.js';

export type FillResult = { ok: true; strategy: string } | { ok: false; kind: ErrorKind; message: string };

export interface FillExecutorOptions {
  actionTimeoutMs: number;
  interactionDelayMs: number;
  typingDelayMs: readonly [number, number];
  fieldGapMs: readonly [number, number];
  random?: () => number;
}

const FALSY_STRINGS = new Set(['', 'false', 'no', 'n', 'off', '0']);
const INNER_TEXT_TARGET =
  "input[type='text'], input[type='search'], input:not([type]), [role='searchbox'], [role='textbox']";
const SELECT_TIER_TIMEOUT_MS = 2_000;
const MICRO_PAUSE_EVERY: readonly [number, number] = [8, 15];
const MICRO_PAUSE_MS: readonly [number, number] = [50, 150];
const FALLBACK_TYPING_DELAY_MS = 30;

const ok = (strategy: string): FillResult => ({ ok: true, strategy });

export function toBoolean(value: FieldValue): boolean {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0;
  return !FALSY_STRINGS.has(value.trim().toLowerCase());
}

export function computeFillSuccess(attempted: number, filled: number): FillSuccess {
  if (filled === attempted) return 'full';
  if (filled > 0) return 'partial';
  return 'none';
}

/**
 * Writes values into resolved controls. Every public method reports through
 * a result value; nothing thrown by Playwright escapes.
 */
export class FillExecutor {
  private logger = getLogger({ service: 'FillExecutor' });
  private readonly random: () => number;

  constructor(private readonly opts: FillExecutorOptions) {
    this.random = opts.random ?? Math.random;
  }

  /**
   * Re-acquire a descriptor's element through the stamp its scan left on it.
   * Only valid while the descriptor's epoch is current.
   */
  locate(page: Page, descriptor: FieldDescriptor): Locator {
    const stamp = scanStampSelector(descriptor.scanIndex);
    if (descriptor.scope === 'body') return page.locator(stamp).first();
    return page.locator(descriptor.scope).first().locator(stamp).first();
  }

  async fillField(page: Page, descriptor: FieldDescriptor, value: FieldValue): Promise<FillResult> {
    if (descriptor.kind.kind === 'action_button') {
      return failure('not_interactable', 'action buttons are not fill targets');
    }

    const locator = this.locate(page, descriptor);
    let result = await this.attempt(page, locator, descriptor.kind, value);

    if (!result.ok && isTransient(result.kind) && !page.isClosed()) {
      this.logger.debug('Retrying field after transient failure', {
        fieldType: descriptor.fieldType,
        kind: result.kind,
      });
      await this.pause(page, this.opts.interactionDelayMs);
      result = await this.attempt(page, locator, descriptor.kind, value);
    }

    this.logger.debug('Field fill result', {
      fieldType: descriptor.fieldType,
      selector: descriptor.stableSelector,
      ok: result.ok,
      ...(result.ok ? { strategy: result.strategy } : { kind: result.kind, error: result.message }),
    });
    return result;
  }

  async fillStep(
    page: Page,
    analysis: PageAnalysis,
    data: StepData,
    ctx: { step: number; epoch: number },
  ): Promise<FillAttemptOutcome> {
    const started = Date.now();
    const outcome: FillAttemptOutcome = {
      step: ctx.step,
      attempted: 0,
      filled: 0,
      skipped: [],
      errors: [],
      success: 'none',
      durationMs: 0,
    };
    const stale = analysis.epoch !== ctx.epoch;

    for (const [key, value] of Object.entries(data)) {
      const parsedType = FieldTypeSchema.safeParse(key);
      if (!parsedType.success || value === undefined) continue;
      const fieldType = parsedType.data;

      const descriptor = analysis.fields[fieldType];
      if (!descriptor) {
        outcome.skipped.push(fieldType);
        this.logger.info('Field not detected on page; skipping', { step: ctx.step, fieldType });
        continue;
      }

      if (outcome.attempted > 0) await this.pause(page, this.randomBetween(this.opts.fieldGapMs));
      outcome.attempted += 1;

      const result = stale
        ? failure('detached', `analysis from page generation ${analysis.epoch} is stale`)
        : await this.fillField(page, descriptor, value);

      if (result.ok) {
        outcome.filled += 1;
      } else {
        outcome.errors.push({ fieldType, kind: result.kind, message: result.message });
      }
    }

    outcome.success = computeFillSuccess(outcome.attempted, outcome.filled);
    outcome.durationMs = Date.now() - started;
    this.logger.info('Step fill finished', {
      step: ctx.step,
      attempted: outcome.attempted,
      filled: outcome.filled,
      skipped: outcome.skipped,
      success: outcome.success,
      durationMs: outcome.durationMs,
    });
    return outcome;
  }

  // ── Dispatch ─────────────────────────────────────────────────────────────

  private async attempt(page: Page, locator: Locator, kind: ElementKind, value: FieldValue): Promise<FillResult> {
    try {
      if (kind.kind !== 'file') {
        const blocked = await this.ensureInteractable(locator);
        if (blocked) return blocked;
      }
      return await this.dispatch(page, locator, kind, value);
    } catch (err) {
      return fromError(err);
    }
  }

  private dispatch(page: Page, locator: Locator, kind: ElementKind, value: FieldValue): Promise<FillResult> {
    switch (kind.kind) {
      case 'file':
        return this.fillFile(locator, value);
      case 'checkbox':
        return this.fillCheckbox(locator, value);
      case 'radio':
        return this.fillRadio(locator, value);
      case 'select':
        return this.fillSelect(locator, String(value));
      case 'text_like':
        return this.fillText(page, locator, String(value), true);
      case 'content_editable':
        return this.fillText(page, locator, String(value), false);
      case 'custom_widget':
        return this.fillCustomWidget(page, locator, String(value));
      case 'action_button':
        return Promise.resolve(failure('not_interactable', 'action buttons are not fill targets'));
      default: {
        const unhandled: never = kind;
        return Promise.resolve(failure('unknown', `unhandled element kind ${JSON.stringify(unhandled)}`));
      }
    }
  }

  private async ensureInteractable(locator: Locator): Promise<FillResult | null> {
    if ((await locator.count()) === 0) return failure('not_found', 'element no longer present');
    if (await this.isReady(locator)) return null;

    try {
      await locator.scrollIntoViewIfNeeded({ timeout: this.opts.actionTimeoutMs });
    } catch (err) {
      this.logger.debug('scrollIntoView failed', { error: errorMessage(err) });
    }
    if (await this.isReady(locator)) return null;
    return failure('not_interactable', 'element is not visible or not enabled');
  }

  private async isReady(locator: Locator): Promise<boolean> {
    return (await locator.isVisible()) && (await locator.isEnabled());
  }

  // ── Strategies ───────────────────────────────────────────────────────────

  private async fillFile(locator: Locator, value: FieldValue): Promise<FillResult> {
    if (typeof value !== 'string') return failure('unknown', 'file fields take a file path');
    const path = resolve(value);

    try {
      const stats = await stat(path);
      if (!stats.isFile()) return failure('not_found', `not a regular file: ${path}`);
    } catch (err) {
      return failure('not_found', `file not found: ${path} (${errorMessage(err)})`);
    }

    let revealed = false;
    if (!(await locator.isVisible())) {
      await this.forceReveal(locator);
      revealed = true;
    }

    try {
      await locator.setInputFiles(path, { timeout: this.opts.actionTimeoutMs });
      return ok(revealed ? 'set_input_files_revealed' : 'set_input_files');
    } catch (err) {
      if (revealed) return fromError(err);
      this.logger.debug('File attach failed; revealing input and retrying', { error: errorMessage(err) });
    }

    await this.forceReveal(locator);
    await locator.setInputFiles(path, { timeout: this.opts.actionTimeoutMs });
    return ok('set_input_files_revealed');
  }

  private async forceReveal(locator: Locator): Promise<void> {
    await locator.evaluate((el) => {
      if (el instanceof HTMLElement) {
        el.style.display = 'block';
        el.style.visibility = 'visible';
        el.style.opacity = '1';
      }
    });
  }

  private async fillCheckbox(locator: Locator, value: FieldValue): Promise<FillResult> {
    const desired = toBoolean(value);

    if ((await locator.isChecked()) !== desired) {
      await locator.click({ timeout: this.opts.actionTimeoutMs });
    }
    if ((await locator.isChecked()) === desired) return ok('click');

    try {
      await locator.setChecked(desired, { force: true, timeout: this.opts.actionTimeoutMs });
    } catch (err) {
      this.logger.debug('Forced setChecked failed', { error: errorMessage(err) });
    }
    if ((await locator.isChecked()) === desired) return ok('set_checked');
    return failure('unknown', `checkbox stayed ${desired ? 'unchecked' : 'checked'}`);
  }

  private async fillRadio(locator: Locator, value: FieldValue): Promise<FillResult> {
    if (!toBoolean(value)) return ok('skip_falsy');
    if (await locator.isChecked()) return ok('already_checked');
    await locator.check({ timeout: this.opts.actionTimeoutMs });
    return ok('check');
  }

  private async fillSelect(locator: Locator, value: string): Promise<FillResult> {
    try {
      const picked = await locator.selectOption({ value }, { timeout: SELECT_TIER_TIMEOUT_MS });
      if (picked.length > 0) return ok('option_value');
    } catch (err) {
      this.logger.debug('Select by value failed', { error: errorMessage(err) });
    }

    try {
      const picked = await locator.selectOption({ label: value }, { timeout: SELECT_TIER_TIMEOUT_MS });
      if (picked.length > 0) return ok('option_label');
    } catch (err) {
      this.logger.debug('Select by label failed', { error: errorMessage(err) });
    }

    const wanted = value.toLowerCase();
    for (const option of await locator.locator('option').all()) {
      const label = ((await option.textContent()) ?? '').trim();
      if (!label.toLowerCase().includes(wanted)) continue;
      const optionValue = await option.getAttribute('value');
      await locator.selectOption(optionValue !== null ? { value: optionValue } : { label }, {
        timeout: this.opts.actionTimeoutMs,
      });
      return ok('option_contains');
    }
    return failure('not_found', `no option matches "${value}"`);
  }

  private async fillText(page: Page, locator: Locator, value: string, verify: boolean): Promise<FillResult> {
    try {
      await this.humanType(page, locator, value);
      if (!verify || (await locator.inputValue()) === value) return ok('human_type');
      this.logger.debug('Typed value did not stick; falling back to fill');
    } catch (err) {
      this.logger.debug('Human typing failed', { error: errorMessage(err) });
    }

    try {
      await locator.fill(value, { timeout: this.opts.actionTimeoutMs });
      return ok('fill');
    } catch (err) {
      this.logger.debug('Bulk fill failed', { error: errorMessage(err) });
    }

    await locator.click({ timeout: this.opts.actionTimeoutMs });
    await locator.press('ControlOrMeta+A');
    await locator.press('Delete');
    await locator.pressSequentially(value, { delay: FALLBACK_TYPING_DELAY_MS });
    return ok('select_all_retype');
  }

  private async humanType(page: Page, locator: Locator, value: string): Promise<void> {
    await locator.click({ timeout: this.opts.actionTimeoutMs });
    await locator.fill('', { timeout: this.opts.actionTimeoutMs });

    let untilPause = this.randomBetween(MICRO_PAUSE_EVERY);
    for (const char of value) {
      await locator.pressSequentially(char, { delay: this.randomBetween(this.opts.typingDelayMs) });
      untilPause -= 1;
      if (untilPause === 0) {
        await page.waitForTimeout(this.randomBetween(MICRO_PAUSE_MS));
        untilPause = this.randomBetween(MICRO_PAUSE_EVERY);
      }
    }

    await locator.dispatchEvent('input');
    await locator.dispatchEvent('change');
    await locator.dispatchEvent('blur');
  }

  private async fillCustomWidget(page: Page, locator: Locator, value: string): Promise<FillResult> {
    try {
      await locator.click({ timeout: this.opts.actionTimeoutMs });
      await page.waitForTimeout(this.opts.interactionDelayMs);

      const inner = locator.locator(INNER_TEXT_TARGET).first();
      const target = (await inner.count()) > 0 && (await inner.isVisible()) ? inner : locator;
      await target.fill('', { timeout: this.opts.actionTimeoutMs });
      await target.pressSequentially(value, { delay: this.randomBetween(this.opts.typingDelayMs) });
      await target.press('Enter');
      await page.waitForTimeout(this.opts.interactionDelayMs);
      return ok('open_type_confirm');
    } catch (err) {
      this.logger.debug('Widget typing failed; assigning value directly', { error: errorMessage(err) });
    }

    await locator.evaluate((el, v) => {
      if (el instanceof HTMLInputElement || el instanceof HTMLTextAreaElement || el instanceof HTMLSelectElement) {
        el.value = v;
      } else {
        el.setAttribute('value', v);
      }
      el.dispatchEvent(new Event('change', { bubbles: true }));
    }, value);
    return ok('direct_assign');
  }

  // ── Helpers ──────────────────────────────────────────────────────────────

  private randomBetween([min, max]: readonly [number, number]): number {
    return min + Math.floor(this.random() * (max - min + 1));
  }

  private async pause(page: Page, ms: number): Promise<void> {
    if (ms <= 0) return;
    try {
      await page.waitForTimeout(ms);
    } catch (err) {
      this.logger.debug('Pause interrupted', { error: errorMessage(err) });
    }
  }
}
