import type { Page } from 'playwright';
import { getLogger } from '../../monitoring/logger.js';
import type { Credentials, LoginHelper } from '../collaborators.js';
import { errorMessage } from '../errors.js';
import { clickFirst, findFirstInteractable } from './clickFirst.js';

export const LOGIN_URL_INDICATORS = ['signin', 'login', 'auth', 'sso', 'accountlogin'] as const;

const EMAIL_SELECTORS = [
  "[data-automation-id='email'], [data-automation-id='username']",
  "input[type='email']",
  "input[name*='email' i], input[id*='email' i]",
  "input[name*='username' i], input[id*='username' i]",
  "input[placeholder*='email' i]",
  "input[placeholder*='username' i]",
  "input[aria-label*='email' i]",
  "input[aria-label*='username' i]",
];

const PASSWORD_SELECTORS = [
  "[data-automation-id='password']",
  "input[type='password']",
  "input[name*='password' i]",
  "input[id*='password' i]",
  "input[placeholder*='password' i]",
  "input[aria-label*='password' i]",
];

const INTERSTITIAL_NEXT_SELECTORS = [
  "button:has-text('Next')",
  "button:has-text('Continue')",
  "input[type='submit'][value*='Next' i]",
  "input[type='submit'][value*='Continue' i]",
];

const SIGN_IN_SELECTORS = [
  "[data-automation-id='signInSubmitButton']",
  "button[type='submit']",
  "button:has-text('Sign In')",
  "button:has-text('Log In')",
  "button:has-text('Submit')",
  "button:has-text('Continue')",
  "input[type='submit'][value*='Sign In' i]",
  "input[type='submit'][value*='Log In' i]",
];

const CREATE_ACCOUNT_SELECTORS = [
  "a:has-text('Create Account')",
  "button:has-text('Create Account')",
  "a:has-text('Sign Up')",
  "button:has-text('Sign Up')",
  "a:has-text('Register')",
  "button:has-text('Register')",
  "[data-automation-id='createAccount']",
];

const ERROR_REGION = "[class*='error' i], [class*='alert' i], [role='alert']";
const CREDENTIAL_ERROR = /incorrect|invalid|failed|try again|doesn't match/;
const CREDENTIAL_WORDS = /password|email|username|credential/;

export function looksLikeLoginUrl(url: string): boolean {
  const lower = url.toLowerCase();
  return LOGIN_URL_INDICATORS.some((indicator) => lower.includes(indicator));
}

export interface PasswordLoginOptions {
  typingDelayMs: number;
  settleMs: number;
  navigationTimeoutMs: number;
}

/** Email/username + password sign-in, including two-page (email, then password) flows. */
export class PasswordLoginHelper implements LoginHelper {
  private logger = getLogger({ service: 'LoginHelper' });

  constructor(
    private readonly opts: PasswordLoginOptions = { typingDelayMs: 60, settleMs: 750, navigationTimeoutMs: 15_000 },
  ) {}

  async login(page: Page, credentials: Credentials): Promise<boolean> {
    const startUrl = page.url().toLowerCase();

    try {
      if (!(await this.typeInto(page, EMAIL_SELECTORS, credentials.email))) {
        this.logger.warn('No email/username field on login page');
        return false;
      }

      const advanced = await clickFirst(page, INTERSTITIAL_NEXT_SELECTORS);
      if (advanced) await page.waitForTimeout(this.opts.settleMs * 2);

      if (!(await this.typeInto(page, PASSWORD_SELECTORS, credentials.password))) {
        this.logger.warn('No password field on login page', { advanced: advanced !== null });
        return false;
      }

      if (!(await clickFirst(page, SIGN_IN_SELECTORS))) {
        this.logger.warn('No sign-in button found');
        return false;
      }
      await this.settle(page);
      return await this.verify(page, startUrl);
    } catch (err) {
      this.logger.error('Login attempt failed', { error: errorMessage(err) });
      return false;
    }
  }

  async hasCreateAccountOption(page: Page): Promise<boolean> {
    const found = await findFirstInteractable(page, CREATE_ACCOUNT_SELECTORS);
    if (found) this.logger.info('Create-account option present', { selector: found.selector });
    return found !== null;
  }

  private async typeInto(page: Page, selectors: readonly string[], value: string): Promise<boolean> {
    const found = await findFirstInteractable(page, selectors);
    if (!found) return false;
    await found.locator.click();
    await found.locator.fill('');
    await found.locator.pressSequentially(value, { delay: this.opts.typingDelayMs });
    return true;
  }

  private async settle(page: Page): Promise<void> {
    try {
      await page.waitForLoadState('networkidle', { timeout: this.opts.navigationTimeoutMs });
    } catch (err) {
      this.logger.debug('No network idle after sign-in', { error: errorMessage(err) });
    }
    await page.waitForTimeout(this.opts.settleMs);
  }

  private async verify(page: Page, startUrl: string): Promise<boolean> {
    const finalUrl = page.url().toLowerCase();
    if (looksLikeLoginUrl(finalUrl) && finalUrl === startUrl) {
      this.logger.warn('Still on the sign-in page after submitting credentials');
      return false;
    }

    const bodyText = (await page.locator('body').innerText()).toLowerCase();
    if (CREDENTIAL_ERROR.test(bodyText)) {
      for (const text of await page.locator(ERROR_REGION).allInnerTexts()) {
        if (CREDENTIAL_WORDS.test(text.toLowerCase())) {
          this.logger.warn('Sign-in rejected', { message: text.trim().slice(0, 120) });
          return false;
        }
      }
    }
    this.logger.info('Sign-in appears successful', { url: finalUrl });
    return true;
  }
}
