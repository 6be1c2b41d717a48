import type { Page } from 'playwright';
import { getLogger } from '../../monitoring/logger.js';
import { errorMessage } from '../errors.js';
import { RawElementSchema, type ElementKind, type ExtractedElement, type RawElement } from '../types.js';

// ── Selectors ──────────────────────────────────────────────────────────────

/** Containers tried in order when choosing the scan scope. */
export const FORM_SCOPE_SELECTORS = [
  "form[id*='application']",
  "form[data-testid*='application']",
  "form[aria-label*='application']",
  "form[id*='job-form']",
  "form[class*='job-form']",
  "form[id*='signup']",
  "form[id*='register']",
  'form',
  "div[role='form']",
] as const;

export const INTERACTIVE_SELECTOR = [
  "input:not([type='hidden']):not([type='image'])",
  'select',
  'textarea',
  'button',
  "[role='textbox']",
  "[role='combobox']",
  "[role='listbox']",
  "[role='checkbox']",
  "[role='radio']",
  "[role='switch']",
  "[role='button']",
  "[contenteditable='true']",
].join(', ');

export const SCAN_INDEX_ATTR = 'data-fp-scan-idx';

/** Addresses the element stamped with this index by the latest scan. */
export function scanStampSelector(scanIndex: number): string {
  return `[${SCAN_INDEX_ATTR}="${scanIndex}"]`;
}

// ── Stable selectors ───────────────────────────────────────────────────────

const GENERATED_VALUE = /^[a-f0-9-]{20,}$/i;
const NUMERIC_VALUE = /^\d+$/;
const PLAIN_CLASS = /^[A-Za-z_][\w-]*$/;
const UTILITY_CLASS_PREFIXES = ['css-', 'sc-', 'styled__', 'style-', 'ember', 'm-', 'p-', 'w-', 'h-'];
const GENERIC_CLASSES = new Set(['input', 'form-control', 'field', 'button', 'label', 'active', 'focus']);

const quote = (value: string): string => `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;

const isStableValue = (value: string): boolean =>
  value.length > 0 && !NUMERIC_VALUE.test(value) && !GENERATED_VALUE.test(value);

export function buildStableSelector(raw: RawElement): string {
  const tag = raw.tag || '*';

  const attributeCandidates: Array<[string, string]> = [
    ['data-testid', raw.testId],
    ['data-cy', raw.dataCy],
    ['data-qa', raw.dataQa],
    ['data-automation-id', raw.automationId],
    ['id', raw.id],
    ['name', raw.name],
  ];
  for (const [attr, value] of attributeCandidates) {
    if (isStableValue(value)) return `${tag}[${attr}=${quote(value)}]`;
  }

  if (raw.placeholder) {
    const typePart = raw.inputType && tag === 'input' ? `[type=${quote(raw.inputType)}]` : '';
    return `${tag}${typePart}[placeholder*=${quote(raw.placeholder.slice(0, 30))}]`;
  }

  const stableClass = raw.className
    .split(/\s+/)
    .find(
      (cls) =>
        cls.length > 3 &&
        PLAIN_CLASS.test(cls) &&
        !GENERATED_VALUE.test(cls) &&
        !GENERIC_CLASSES.has(cls) &&
        !UTILITY_CLASS_PREFIXES.some((prefix) => cls.startsWith(prefix)),
    );
  if (stableClass) return `${tag}.${stableClass}`;

  return tag;
}

// ── Element kinds ──────────────────────────────────────────────────────────

const BUTTON_INPUT_TYPES = new Set(['submit', 'button', 'reset', 'image']);
const WIDGET_ROLES = new Set(['combobox', 'listbox', 'searchbox', 'slider']);
const NATIVE_FIELD_TAGS = new Set(['input', 'select', 'textarea', 'button']);
const WIDGET_CLASS_MARKERS = [
  'select2',
  'chosen',
  'multiselect',
  'react-select',
  'typeahead',
  'autocomplete',
  'datepicker',
  'calendar',
  'MuiInputBase',
];

export function isButtonLike(raw: Pick<RawElement, 'tag' | 'inputType' | 'role'>): boolean {
  return (
    raw.tag === 'button' ||
    raw.tag === 'a' ||
    (raw.tag === 'input' && BUTTON_INPUT_TYPES.has(raw.inputType)) ||
    raw.role.includes('button')
  );
}

export function classifyElementKind(raw: RawElement): ElementKind {
  if (isButtonLike(raw)) return { kind: 'action_button' };
  if (raw.contentEditable && raw.tag !== 'input' && raw.tag !== 'textarea') {
    return { kind: 'content_editable' };
  }
  if (raw.tag === 'select') return { kind: 'select' };

  if (raw.tag === 'input') {
    if (raw.inputType === 'file') return { kind: 'file' };
    if (raw.inputType === 'checkbox') return { kind: 'checkbox' };
    if (raw.inputType === 'radio') return { kind: 'radio' };
  }
  if (raw.role === 'checkbox' || raw.role === 'switch') return { kind: 'checkbox' };
  if (raw.role === 'radio') return { kind: 'radio' };

  if (!NATIVE_FIELD_TAGS.has(raw.tag) && WIDGET_ROLES.has(raw.role)) {
    return { kind: 'custom_widget', marker: `role=${raw.role}` };
  }
  const marker = WIDGET_CLASS_MARKERS.find((m) => raw.className.includes(m));
  if (marker) return { kind: 'custom_widget', marker };

  return { kind: 'text_like', inputType: raw.inputType || 'text', multiline: raw.tag === 'textarea' };
}

// ── Page-side extraction ───────────────────────────────────────────────────

export function buildExtractionScript(scope: string): string {
  return `(() => {
    document.querySelectorAll('[${SCAN_INDEX_ATTR}]').forEach((n) => n.removeAttribute(${JSON.stringify(SCAN_INDEX_ATTR)}));
    const root = document.querySelector(${JSON.stringify(scope)}) || document.body;
    const nodes = Array.from(root.querySelectorAll(${JSON.stringify(INTERACTIVE_SELECTOR)}));
    const clean = (s) => (s || '').replace(/\\s+/g, ' ').trim();
    const attr = (el, name) => el.getAttribute(name) || '';
    const isVisible = (el) => {
      const rect = el.getBoundingClientRect();
      const style = window.getComputedStyle(el);
      return rect.width > 0 && rect.height > 0 && style.display !== 'none' && style.visibility !== 'hidden';
    };
    const labelFor = (el) => {
      const labelledBy = attr(el, 'aria-labelledby');
      if (labelledBy) {
        const text = labelledBy.split(/\\s+/)
          .map((id) => document.getElementById(id))
          .filter(Boolean)
          .map((n) => clean(n.textContent))
          .join(' ');
        if (text) return text;
      }
      if (el.id) {
        const forLabel = document.querySelector('label[for="' + CSS.escape(el.id) + '"]');
        if (forLabel) return clean(forLabel.textContent);
      }
      const ancestor = el.closest('label');
      if (ancestor) return clean(ancestor.textContent);
      return '';
    };
    const contextFor = (el) => {
      const parent = clean(el.parentElement ? el.parentElement.textContent : '').slice(0, 100);
      const prev = el.previousElementSibling ? clean(el.previousElementSibling.textContent).slice(0, 100) : '';
      return clean(parent + ' ' + prev);
    };

    const out = [];
    nodes.forEach((el, index) => {
      try {
        const tag = el.tagName.toLowerCase();
        let inputType = '';
        if (tag === 'input') inputType = (attr(el, 'type') || 'text').toLowerCase();
        else if (tag === 'textarea') inputType = 'textarea';
        else if (tag === 'select') inputType = 'select';
        else inputType = attr(el, 'type').toLowerCase();

        const visible = isVisible(el);
        if (!visible && inputType !== 'file') return;

        el.setAttribute(${JSON.stringify(SCAN_INDEX_ATTR)}, String(index));
        out.push({
          scanIndex: index,
          tag,
          inputType,
          name: attr(el, 'name'),
          id: el.id || '',
          className: typeof el.className === 'string' ? el.className : attr(el, 'class'),
          placeholder: attr(el, 'placeholder'),
          ariaLabel: attr(el, 'aria-label'),
          ariaLabelledBy: attr(el, 'aria-labelledby'),
          ariaDescribedBy: attr(el, 'aria-describedby'),
          role: attr(el, 'role').toLowerCase(),
          autocomplete: attr(el, 'autocomplete').toLowerCase(),
          required: el.hasAttribute('required') || attr(el, 'aria-required') === 'true',
          value: typeof el.value === 'string' ? el.value : '',
          text: clean(el.innerText || el.textContent).slice(0, 200),
          automationId: attr(el, 'data-automation-id'),
          testId: attr(el, 'data-testid'),
          dataCy: attr(el, 'data-cy'),
          dataQa: attr(el, 'data-qa'),
          contentEditable: el.isContentEditable === true,
          visible,
          enabled: !el.disabled && attr(el, 'aria-disabled') !== 'true',
          labelText: labelFor(el),
          contextText: contextFor(el),
        });
      } catch (e) {
        out.push({ scanIndex: index, error: String(e && e.message ? e.message : e) });
      }
    });
    return out;
  })()`;
}

// ── Extractor ──────────────────────────────────────────────────────────────

export interface ExtractionResult {
  elements: ExtractedElement[];
  errors: string[];
}

export class AttributeExtractor {
  private logger = getLogger({ service: 'AttributeExtractor' });

  /** First container from the priority list present on the page, else body. */
  async selectScope(page: Page): Promise<string> {
    for (const selector of FORM_SCOPE_SELECTORS) {
      try {
        if ((await page.locator(selector).count()) > 0) return selector;
      } catch (err) {
        this.logger.debug('Scope probe failed', { selector, error: errorMessage(err) });
      }
    }
    return 'body';
  }

  async extract(page: Page, scope: string): Promise<ExtractionResult> {
    const records: unknown = await page.evaluate(buildExtractionScript(scope));
    const elements: ExtractedElement[] = [];
    const errors: string[] = [];

    if (!Array.isArray(records)) {
      return { elements, errors: ['extraction returned no element list'] };
    }

    for (const record of records) {
      const parsed = RawElementSchema.safeParse(record);
      if (!parsed.success) {
        const message = `element skipped: ${describeSkipped(record, parsed.error.issues[0]?.message)}`;
        this.logger.warn('Element extraction skipped', { detail: message });
        errors.push(message);
        continue;
      }
      const raw = parsed.data;
      elements.push({ raw, kind: classifyElementKind(raw), stableSelector: buildStableSelector(raw) });
    }

    this.logger.debug('Extracted elements', { scope, count: elements.length, skipped: errors.length });
    return { elements, errors };
  }
}

function describeSkipped(record: unknown, issue: string | undefined): string {
  if (typeof record === 'object' && record !== null && 'error' in record) {
    return String(record.error);
  }
  return issue ?? 'invalid record';
}
