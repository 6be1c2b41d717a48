import type { Page } from 'playwright';
import { describe, expect, test, vi } from 'vitest';
import {
  AttributeExtractor,
  buildStableSelector,
  classifyElementKind,
  FORM_SCOPE_SELECTORS,
} from '../../../../src/engine/analysis/AttributeExtractor.js';
import { rawElement } from '../../../helpers/elements.js';

describe('buildStableSelector', () => {
  test('prefers test ids over ids and names', () => {
    expect(buildStableSelector(rawElement({ testId: 'email-input', id: 'email', name: 'email' }))).toBe(
      'input[data-testid="email-input"]',
    );
  });

  test('uses the automation id before the id', () => {
    expect(buildStableSelector(rawElement({ automationId: 'legalNameSection_firstName', id: 'x1' }))).toBe(
      'input[data-automation-id="legalNameSection_firstName"]',
    );
  });

  test('skips numeric and generated ids', () => {
    expect(buildStableSelector(rawElement({ id: '12345', name: 'phone' }))).toBe('input[name="phone"]');
    expect(buildStableSelector(rawElement({ id: '3f2a9c1e-77b0-4e5d-9a11-0c2b', name: 'city' }))).toBe(
      'input[name="city"]',
    );
  });

  test('escapes quotes and backslashes', () => {
    expect(buildStableSelector(rawElement({ name: 'q"a\\b' }))).toBe('input[name="q\\"a\\\\b"]');
  });

  test('falls back to type and placeholder, then class, then tag', () => {
    expect(buildStableSelector(rawElement({ inputType: 'tel', placeholder: '(555) 555-5555' }))).toBe(
      'input[type="tel"][placeholder*="(555) 555-5555"]',
    );
    expect(buildStableSelector(rawElement({ tag: 'textarea', inputType: 'textarea', placeholder: 'Tell us more' }))).toBe(
      'textarea[placeholder*="Tell us more"]',
    );
    expect(buildStableSelector(rawElement({ className: 'css-1x2y form-control candidate-phone' }))).toBe(
      'input.candidate-phone',
    );
    expect(buildStableSelector(rawElement({ tag: 'select', inputType: 'select' }))).toBe('select');
  });
});

describe('classifyElementKind', () => {
  test.each([
    [{ tag: 'button', inputType: 'submit' }, { kind: 'action_button' }],
    [{ tag: 'input', inputType: 'submit' }, { kind: 'action_button' }],
    [{ tag: 'div', inputType: '', role: 'button' }, { kind: 'action_button' }],
    [{ tag: 'input', inputType: 'file' }, { kind: 'file' }],
    [{ tag: 'input', inputType: 'checkbox' }, { kind: 'checkbox' }],
    [{ tag: 'div', inputType: '', role: 'switch' }, { kind: 'checkbox' }],
    [{ tag: 'input', inputType: 'radio' }, { kind: 'radio' }],
    [{ tag: 'select', inputType: 'select' }, { kind: 'select' }],
    [{ tag: 'div', inputType: '', contentEditable: true }, { kind: 'content_editable' }],
    [{ tag: 'div', inputType: '', role: 'combobox' }, { kind: 'custom_widget', marker: 'role=combobox' }],
    [{ tag: 'input', inputType: 'text', className: 'select2-search' }, { kind: 'custom_widget', marker: 'select2' }],
    [{ tag: 'input', inputType: 'email' }, { kind: 'text_like', inputType: 'email', multiline: false }],
    [{ tag: 'textarea', inputType: 'textarea' }, { kind: 'text_like', inputType: 'textarea', multiline: true }],
  ] as const)('%o → %o', (overrides, expected) => {
    expect(classifyElementKind(rawElement(overrides))).toEqual(expected);
  });
});

describe('AttributeExtractor', () => {
  const extractor = new AttributeExtractor();

  test('picks the first scope selector present on the page', async () => {
    const count = vi.fn().mockImplementation(() => Promise.resolve(0));
    const locator = vi.fn().mockImplementation((selector: string) => ({
      count: selector === 'form' ? () => Promise.resolve(2) : count,
    }));
    const page = { locator } as unknown as Page;

    await expect(extractor.selectScope(page)).resolves.toBe('form');
    expect(locator).toHaveBeenCalledTimes(FORM_SCOPE_SELECTORS.indexOf('form') + 1);
  });

  test('uses the body when no form container exists', async () => {
    const page = { locator: () => ({ count: () => Promise.resolve(0) }) } as unknown as Page;

    await expect(extractor.selectScope(page)).resolves.toBe('body');
  });

  test('parses records and reports the ones that failed', async () => {
    const good = rawElement({ scanIndex: 0, name: 'email', inputType: 'email' });
    const page = {
      evaluate: vi.fn().mockResolvedValue([good, { scanIndex: 1, error: 'stale node' }, { scanIndex: 2 }]),
    } as unknown as Page;

    const { elements, errors } = await extractor.extract(page, 'form');

    expect(elements).toEqual([
      {
        raw: good,
        kind: { kind: 'text_like', inputType: 'email', multiline: false },
        stableSelector: 'input[name="email"]',
      },
    ]);
    expect(errors[0]).toBe('element skipped: stale node');
    expect(errors).toHaveLength(2);
  });

  test('reports a non-list probe result', async () => {
    const page = { evaluate: vi.fn().mockResolvedValue(null) } as unknown as Page;

    await expect(extractor.extract(page, 'body')).resolves.toEqual({
      elements: [],
      errors: ['extraction returned no element list'],
    });
  });
});
