import type { Page } from 'playwright';
import type { BlockerResult } from '../detection/BlockerDetector.js';

/** A navigable page plus whatever owns it. */
export interface BrowserSession {
  page: Page;
  close(): Promise<void>;
}

export interface SessionProvisioner {
  open(): Promise<BrowserSession>;
}

export interface Credentials {
  email: string;
  password: string;
}

export interface LoginHelper {
  /** True when the page no longer looks like a sign-in page afterwards. */
  login(page: Page, credentials: Credentials): Promise<boolean>;
  /** Whether the page offers to create an account instead. */
  hasCreateAccountOption(page: Page): Promise<boolean>;
}

export interface CaptchaGate {
  detectBlocker(page: Page): Promise<BlockerResult | null>;
  /** Bounded manual-solve window; true when the page is clear. */
  waitForClear(page: Page, windowMs: number): Promise<boolean>;
}

export interface PopupDismisser {
  /** Returns how many popups were closed. */
  dismiss(page: Page): Promise<number>;
}

export interface DiagnosticsRecorder {
  /** Best-effort screenshot; resolves to the file path or null. */
  capture(page: Page, label: string): Promise<string | null>;
}
