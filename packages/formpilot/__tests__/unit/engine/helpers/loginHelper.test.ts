import type { Page } from 'playwright';
import { describe, expect, test } from 'vitest';
import { looksLikeLoginUrl, PasswordLoginHelper } from '../../../../src/engine/helpers/LoginHelper.js';
import { stubCandidate, stubPage } from '../../../helpers/locatorStub.js';

const LOGIN_URL = 'https://jobs.example.test/login';
const credentials = { email: 'jane@example.com', password: 'test-secret' };
const helper = new PasswordLoginHelper({ typingDelayMs: 0, settleMs: 0, navigationTimeoutMs: 100 });

describe('looksLikeLoginUrl', () => {
  test.each([
    ['https://jobs.example.test/login', true],
    ['https://example.test/SignIn?next=/apply', true],
    ['https://sso.example.test/', true],
    ['https://jobs.example.test/apply/42', false],
  ])('%s → %s', (url, expected) => {
    expect(looksLikeLoginUrl(url)).toBe(expected);
  });
});

describe('PasswordLoginHelper', () => {
  test('types both credentials, submits and sees the page move on', async () => {
    const email = stubCandidate();
    const password = stubCandidate();
    const submit = stubCandidate();
    const { page, state } = stubPage(
      {
        "input[type='email']": [email],
        "input[type='password']": [password],
        "button[type='submit']": [submit],
      },
      { url: LOGIN_URL },
    );
    submit.click.mockImplementation(() => {
      state.url = 'https://jobs.example.test/apply/42';
      return Promise.resolve();
    });

    await expect(helper.login(page as unknown as Page, credentials)).resolves.toBe(true);
    expect(email.pressSequentially).toHaveBeenCalledWith('jane@example.com', { delay: 0 });
    expect(password.pressSequentially).toHaveBeenCalledWith('test-secret', { delay: 0 });
  });

  test('fails when the page stays on the same sign-in URL', async () => {
    const { page } = stubPage(
      {
        "input[type='email']": [stubCandidate()],
        "input[type='password']": [stubCandidate()],
        "button[type='submit']": [stubCandidate()],
      },
      { url: LOGIN_URL },
    );

    await expect(helper.login(page as unknown as Page, credentials)).resolves.toBe(false);
  });

  test('fails when the page shows a credential error', async () => {
    const submit = stubCandidate();
    const { page, state } = stubPage(
      {
        "input[type='email']": [stubCandidate()],
        "input[type='password']": [stubCandidate()],
        "button[type='submit']": [submit],
      },
      { url: LOGIN_URL, errorTexts: ['Invalid password'] },
    );
    submit.click.mockImplementation(() => {
      state.url = `${LOGIN_URL}?attempt=2`;
      state.bodyText = 'Invalid password. Please try again.';
      return Promise.resolve();
    });

    await expect(helper.login(page as unknown as Page, credentials)).resolves.toBe(false);
  });

  test('fails without an email field', async () => {
    const { page } = stubPage({}, { url: LOGIN_URL });

    await expect(helper.login(page as unknown as Page, credentials)).resolves.toBe(false);
  });

  test('spots a create-account option', async () => {
    const { page } = stubPage({ "a:has-text('Create Account')": [stubCandidate()] });

    await expect(helper.hasCreateAccountOption(page as unknown as Page)).resolves.toBe(true);
  });
});
