import { randomUUID } from 'node:crypto';
import type { Page } from 'playwright';
import type { FillerConfig } from '../config/filler.js';
import { getLogger } from '../monitoring/logger.js';
import type { PageAnalyzer } from './analysis/PageAnalyzer.js';
import type {
  CaptchaGate,
  Credentials,
  DiagnosticsRecorder,
  LoginHelper,
  PopupDismisser,
  SessionProvisioner,
} from './collaborators.js';
import type { DecisionResolver } from './decisions/DecisionResolver.js';
import { errorMessage, FlowAbortError, isFatalBrowserError } from './errors.js';
import type { FillExecutor } from './FillExecutor.js';
import { clickFirst } from './helpers/clickFirst.js';
import { looksLikeLoginUrl } from './helpers/LoginHelper.js';
import type { StabilityMonitor } from './StabilityMonitor.js';
import {
  StepSequenceSchema,
  type ApplicationRun,
  type FieldDescriptor,
  type PageAnalysis,
  type RunStatus,
  type StepData,
  type StepFailureReason,
} from './types.js';

// ── Selectors ──────────────────────────────────────────────────────────────

export const APPLY_SELECTORS = [
  "[data-automation-id='adventureButton']",
  "[data-automation-id*='apply' i]",
  "a:has-text('Apply Now')",
  "button:has-text('Apply Now')",
  "a:has-text('Start Application')",
  "button:has-text('Start Application')",
  'a:has-text("I\'m interested")',
  'button:has-text("I\'m interested")',
  "a:has-text('Apply')",
  "button:has-text('Apply')",
] as const;

export const APPLY_NEGATIVE_WORDS = ['save', 'share', 'linkedin', 'indeed', 'later'] as const;

export const GENERIC_NEXT_SELECTORS = [
  "[data-automation-id='bottom-navigation-next-button']",
  "button:has-text('Save and Continue')",
  "button:has-text('Continue')",
  "button:has-text('Next')",
  "input[type='button'][value*='Next' i]",
] as const;

export const GENERIC_SUBMIT_SELECTORS = [
  "button[type='submit']",
  "input[type='submit']",
  "button:has-text('Submit')",
  "button:has-text('Apply')",
] as const;

const JOB_LISTING_MARKERS = ['job', 'career'];
const APPLICATION_MARKERS = ['apply', 'application', 'candidate', 'form', 'talent', 'login', 'signin'];
const MANUAL_POLL_MS = 1_000;
export const NO_CREDENTIALS_MESSAGE = 'sign-in page reached without email and password in step 1';

export function looksLikeJobListing(url: string): boolean {
  const lower = url.toLowerCase();
  return (
    JOB_LISTING_MARKERS.some((m) => lower.includes(m)) && !APPLICATION_MARKERS.some((m) => lower.includes(m))
  );
}

const failStatus = (step: number, reason: StepFailureReason): RunStatus => `fail_S${step}_${reason}`;

// ── Orchestrator ───────────────────────────────────────────────────────────

export type FlowState =
  | 'LandingCheck'
  | 'ApplyClick'
  | 'DecisionResolution'
  | 'LoginResolution'
  | 'CaptchaCheck'
  | 'PopupDismiss'
  | 'StepLoop'
  | 'Terminal';

export interface FlowOrchestratorDeps {
  sessions: SessionProvisioner;
  analyzer: PageAnalyzer;
  stability: StabilityMonitor;
  filler: FillExecutor;
  decisions: DecisionResolver;
  login: LoginHelper;
  captcha: CaptchaGate;
  popups: PopupDismisser;
  diagnostics: DiagnosticsRecorder;
  now?: () => Date;
  newRunId?: () => string;
}

/**
 * Drives one application run end to end: landing page, apply button,
 * decision prompts, sign-in, then one fill-and-advance cycle per step.
 * Always resolves to an ApplicationRun; failures become a status.
 */
export class FlowOrchestrator {
  private readonly rootLogger = getLogger({ service: 'FlowOrchestrator' });
  private logger = this.rootLogger;
  private readonly now: () => Date;
  private readonly newRunId: () => string;
  private epoch = 0;
  private state: FlowState = 'LandingCheck';

  constructor(
    private readonly config: FillerConfig,
    private readonly deps: FlowOrchestratorDeps,
  ) {
    this.now = deps.now ?? (() => new Date());
    this.newRunId = deps.newRunId ?? randomUUID;
  }

  async run(targetUrl: string, steps: readonly StepData[]): Promise<ApplicationRun> {
    const runId = this.newRunId();
    this.logger = this.rootLogger.child({ runId });
    const run: ApplicationRun = {
      runId,
      targetUrl,
      status: 'initiated',
      steps: [],
      totalFilled: 0,
      errors: [],
      screenshots: [],
      startedAt: this.now().toISOString(),
      finishedAt: null,
    };
    this.epoch = 0;
    this.state = 'LandingCheck';

    let page: Page | null = null;
    let close: (() => Promise<void>) | null = null;

    try {
      const sequence = StepSequenceSchema.parse(steps);
      const session = await this.deps.sessions.open();
      page = session.page;
      close = session.close;
      run.status = await this.drive(page, targetUrl, sequence, run);
    } catch (err) {
      if (err instanceof FlowAbortError) {
        run.status = err.status;
        run.errors.push(err.message);
        this.logger.warn('Run aborted', { status: err.status, state: this.state, reason: err.message });
      } else {
        run.status = 'error_critical';
        run.errors.push(errorMessage(err));
        this.logger.error('Run failed with an unexpected error', {
          state: this.state,
          error: errorMessage(err),
          fatalBrowser: isFatalBrowserError(err),
        });
      }
      if (page) await this.screenshot(page, run.status, run);
    } finally {
      if (close) {
        try {
          await close();
        } catch (err) {
          this.logger.warn('Session close failed', { error: errorMessage(err) });
        }
      }
    }

    this.transition('Terminal');
    run.finishedAt = this.now().toISOString();
    this.logger.info('Run finished', {
      url: targetUrl,
      status: run.status,
      steps: run.steps.length,
      totalFilled: run.totalFilled,
    });
    return run;
  }

  private async drive(page: Page, targetUrl: string, steps: StepData[], run: ApplicationRun): Promise<RunStatus> {
    await this.landing(page, targetUrl);
    await this.applyClick(page);
    await this.resolveDecisions(page);
    await this.resolveLogin(page, steps, run);
    await this.checkCaptcha(page);
    await this.dismissPopups(page);

    this.transition('StepLoop');
    for (let i = 1; i <= steps.length; i++) {
      const data = steps[i - 1] ?? {};
      const submitted = await this.runStep(page, i, steps.length, data, run);
      if (submitted) return 'submission_attempted';
    }
    return 'completed_all_data_steps';
  }

  // ── Pre-step states ──────────────────────────────────────────────────────

  private async landing(page: Page, targetUrl: string): Promise<void> {
    this.transition('LandingCheck', { url: targetUrl });
    await page.goto(targetUrl, { waitUntil: 'domcontentloaded', timeout: this.config.gotoTimeoutMs });
    await this.settle(page);
  }

  private async applyClick(page: Page): Promise<void> {
    const url = page.url();
    if (!looksLikeJobListing(url)) return;

    this.transition('ApplyClick', { url });
    const selector = await clickFirst(page, APPLY_SELECTORS, {
      timeoutMs: this.config.actionTimeoutMs,
      excludeWords: APPLY_NEGATIVE_WORDS,
    });
    if (!selector) {
      this.logger.info('No apply control on listing page; continuing');
      return;
    }
    this.logger.info('Apply control clicked', { selector });
    await this.afterNavigation(page, false);
  }

  private async resolveDecisions(page: Page): Promise<void> {
    this.transition('DecisionResolution');
    let pending: string | null = null;

    for (let attempt = 1; attempt <= this.config.maxDecisionAttempts; attempt++) {
      const point = await this.deps.decisions.detect(page);
      if (!point) {
        pending = null;
        break;
      }
      pending = point.name;
      const result = await this.deps.decisions.resolve(page, point);
      this.logger.info('Decision attempt', { attempt, ...result });
      if (result.handled) await this.afterNavigation(page, false);
    }

    if (pending === null) return;
    if (!(await this.deps.decisions.detect(page))) return;
    await this.awaitManualDecision(page, pending);
  }

  private async awaitManualDecision(page: Page, pointName: string): Promise<void> {
    const windowMs = this.config.manualDecisionWindowMs;
    this.logger.warn('Decision point unresolved; waiting for manual choice', { name: pointName, windowMs });

    let waited = 0;
    while (waited < windowMs) {
      await page.waitForTimeout(MANUAL_POLL_MS);
      waited += MANUAL_POLL_MS;
      if (!(await this.deps.decisions.detect(page))) {
        this.logger.info('Decision point resolved manually', { name: pointName, waitedMs: waited });
        await this.afterNavigation(page, false);
        return;
      }
    }
    this.logger.warn('Manual decision window elapsed; continuing', { name: pointName });
  }

  private async resolveLogin(page: Page, steps: StepData[], run: ApplicationRun): Promise<void> {
    const url = page.url();
    if (!looksLikeLoginUrl(url)) return;

    this.transition('LoginResolution', { url });
    const credentials = credentialsFrom(steps[0] ?? {});
    if (!credentials) {
      run.errors.push(NO_CREDENTIALS_MESSAGE);
      this.logger.warn('Sign-in page reached without credentials; continuing', { url });
      return;
    }

    if (await this.deps.login.login(page, credentials)) {
      this.logger.info('Signed in');
      await this.afterNavigation(page, false);
      return;
    }

    if (await this.deps.login.hasCreateAccountOption(page)) {
      this.logger.warn('Sign-in failed; page offers account creation instead');
    }
    throw new FlowAbortError(failStatus(0, 'login'), 'sign-in did not succeed');
  }

  private async checkCaptcha(page: Page): Promise<void> {
    this.transition('CaptchaCheck');
    const clear = await this.deps.captcha.waitForClear(page, this.config.captchaWindowMs);
    if (!clear) this.logger.warn('Continuing with an unsolved challenge on the page');
  }

  private async dismissPopups(page: Page): Promise<void> {
    this.transition('PopupDismiss');
    await this.deps.popups.dismiss(page);
  }

  // ── Step loop ────────────────────────────────────────────────────────────

  /** Returns true once the final submit has been clicked. */
  private async runStep(page: Page, step: number, total: number, data: StepData, run: ApplicationRun): Promise<boolean> {
    this.logger.info('Step started', { step, of: total, fields: Object.keys(data) });
    await this.settle(page);

    const analysis = await this.deps.analyzer.analyze(page, this.epoch);
    for (const e of analysis.errors) run.errors.push(`S${step} analysis: ${e}`);
    const outcome = await this.deps.filler.fillStep(page, analysis, data, { step, epoch: this.epoch });
    run.steps.push(outcome);
    run.totalFilled += outcome.filled;
    for (const e of outcome.errors) run.errors.push(`S${step} ${e.fieldType}: ${e.kind}: ${e.message}`);

    const { submit, next, apply } = analysis.actionButtons;
    const hasButtons = submit.length + next.length + apply.length > 0;

    if (outcome.attempted === 0 && !hasButtons && step < total) {
      throw new FlowAbortError(failStatus(step, 'no_fields_actions'), `no known fields or actions on step ${step}`);
    }
    if (outcome.success === 'none') {
      throw new FlowAbortError(failStatus(step, 'fill'), `no field could be filled on step ${step}`);
    }

    const siteHasNext = next.length > 0 || analysis.multiStep.currentStep < analysis.multiStep.totalSteps;
    const effectiveLast = step === total && !siteHasNext;

    if (effectiveLast) {
      if (!(await this.clickSubmit(page, analysis))) {
        throw new FlowAbortError(failStatus(step, 'submit'), `no submit control could be clicked on step ${step}`);
      }
      this.logger.info('Submission attempted', { step });
      await this.afterNavigation(page, false);
      return true;
    }

    if (!(await this.clickNext(page, analysis))) {
      throw new FlowAbortError(failStatus(step, 'nav'), `no next control could be clicked on step ${step}`);
    }
    await this.afterNavigation(page, true);
    return false;
  }

  private async clickSubmit(page: Page, analysis: PageAnalysis): Promise<boolean> {
    const { submit, apply } = analysis.actionButtons;
    if (await this.clickAny(page, submit)) return true;
    if (await this.clickAny(page, apply)) return true;
    const selector = await clickFirst(page, GENERIC_SUBMIT_SELECTORS, { timeoutMs: this.config.actionTimeoutMs });
    if (selector) this.logger.info('Submitted through generic selector', { selector });
    return selector !== null;
  }

  private async clickNext(page: Page, analysis: PageAnalysis): Promise<boolean> {
    if (await this.clickAny(page, analysis.actionButtons.next)) return true;
    const selector = await clickFirst(page, GENERIC_NEXT_SELECTORS, { timeoutMs: this.config.actionTimeoutMs });
    if (selector) this.logger.info('Advanced through generic selector', { selector });
    return selector !== null;
  }

  private async clickAny(page: Page, buttons: readonly FieldDescriptor[]): Promise<boolean> {
    for (const button of buttons) {
      if (button.epoch !== this.epoch) continue;
      const locator = this.deps.filler.locate(page, button);
      try {
        if (!(await locator.isVisible()) || !(await locator.isEnabled())) continue;
        await locator.click({ timeout: this.config.actionTimeoutMs });
        this.logger.info('Action button clicked', { fieldType: button.fieldType, selector: button.stableSelector });
        return true;
      } catch (err) {
        if (isFatalBrowserError(err)) throw err;
        this.logger.debug('Action button click failed', { selector: button.stableSelector, error: errorMessage(err) });
      }
    }
    return false;
  }

  // ── Helpers ──────────────────────────────────────────────────────────────

  private async afterNavigation(page: Page, recheck: boolean): Promise<void> {
    this.epoch += 1;
    this.logger.debug('Page generation advanced', { epoch: this.epoch });
    await this.settle(page);
    if (recheck) {
      await this.checkCaptcha(page);
      await this.dismissPopups(page);
      this.transition('StepLoop');
    }
  }

  private async settle(page: Page): Promise<void> {
    const result = await this.deps.stability.waitForStable(page);
    if (result.stable) return;
    if (result.kind === 'detached') throw new Error(`page went away: ${result.message}`);
    this.logger.warn('Page did not settle; continuing', { kind: result.kind, waitedMs: result.waitedMs });
  }

  private async screenshot(page: Page, label: string, run: ApplicationRun): Promise<void> {
    const path = await this.deps.diagnostics.capture(page, label);
    if (path) run.screenshots.push(path);
  }

  private transition(next: FlowState, data: Record<string, unknown> = {}): void {
    if (next !== this.state) this.logger.info('State transition', { from: this.state, to: next, ...data });
    this.state = next;
  }
}

function credentialsFrom(step: StepData): Credentials | null {
  const { email, password } = step;
  if (typeof email !== 'string' || typeof password !== 'string' || !email || !password) return null;
  return { email, password };
}
