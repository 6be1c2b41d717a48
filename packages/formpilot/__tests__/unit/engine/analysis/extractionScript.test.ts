// @vitest-environment jsdom
import type { Page } from 'playwright';
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import { AttributeExtractor, scanStampSelector } from '../../../../src/engine/analysis/AttributeExtractor.js';

/** Evaluates a page-side script string against the test document. */
const runInDom = (script: string): unknown => new Function(`return ${script}`)();

const domPage = { evaluate: (script: string) => Promise.resolve(runInDom(script)) } as unknown as Page;

const FORM = `
  <form id="application-form">
    <span id="lbl-a">Preferred</span> <span id="lbl-b">Name</span>
    <label for="nick">Nickname</label>
    <input id="nick" aria-labelledby="lbl-a lbl-b">
    <label for="email">Email address</label>
    <input id="email" type="email">
    <label>Phone <input name="phone" type="tel"></label>
    <input name="orphan">
    <input type="hidden" name="token">
    <input type="image" alt="Go">
    <input name="collapsed" style="display: none" data-fp-scan-idx="9">
    <input type="file" name="resume" style="display: none">
    <input name="broken">
  </form>
  <input name="outside" data-fp-scan-idx="2">
`;

describe('extraction script', () => {
  beforeEach(() => {
    document.body.innerHTML = FORM;
    vi.stubGlobal('CSS', { escape: (value: string) => value });
    vi.spyOn(Element.prototype, 'getBoundingClientRect').mockReturnValue({
      x: 0,
      y: 0,
      top: 0,
      left: 0,
      right: 200,
      bottom: 24,
      width: 200,
      height: 24,
      toJSON: () => ({}),
    });
    const broken = document.querySelector('input[name="broken"]');
    if (broken) {
      broken.getBoundingClientRect = () => {
        throw new Error('layout unavailable');
      };
    }
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllGlobals();
  });

  // ── Labels ──

  test('resolves labels from aria-labelledby, then label[for], then an ancestor label', async () => {
    const { elements } = await new AttributeExtractor().extract(domPage, 'form');

    expect(elements.map((e) => [e.raw.scanIndex, e.raw.labelText])).toEqual([
      [0, 'Preferred Name'],
      [1, 'Email address'],
      [2, 'Phone'],
      [3, ''],
      [5, ''],
    ]);
  });

  // ── Exclusions ──

  test('leaves out hidden and image inputs and invisible non-file inputs', async () => {
    const { elements } = await new AttributeExtractor().extract(domPage, 'form');

    expect(elements.map((e) => e.raw.name)).toEqual(['', '', 'phone', 'orphan', 'resume']);
    expect(elements.find((e) => e.raw.name === 'resume')?.raw.visible).toBe(false);
  });

  test('skips an element whose attributes cannot be read and reports why', async () => {
    const { elements, errors } = await new AttributeExtractor().extract(domPage, 'form');

    expect(elements.some((e) => e.raw.name === 'broken')).toBe(false);
    expect(errors).toEqual(['element skipped: layout unavailable']);
  });

  // ── Stamps ──

  test('stamps each extracted element and clears stamps left by earlier scans', async () => {
    await new AttributeExtractor().extract(domPage, 'form');

    expect(document.querySelector(scanStampSelector(1))?.id).toBe('email');
    expect(document.querySelectorAll(scanStampSelector(2))).toHaveLength(1);
    expect(document.querySelector(scanStampSelector(2))?.getAttribute('name')).toBe('phone');
    expect(document.querySelector('input[name="collapsed"]')?.hasAttribute('data-fp-scan-idx')).toBe(false);
  });
});
