import type { Page } from 'playwright';
import { z } from 'zod';
import { getLogger } from '../../monitoring/logger.js';
import { errorMessage } from '../errors.js';
import type { StepPosition } from '../types.js';

export const STEP_INDICATOR_SELECTORS = [
  "[class*='step']",
  "[class*='progress']",
  "[class*='wizard']",
  "[role='tablist']:has([role='tab'][aria-selected='true'])",
  '.breadcrumb li.active',
  '.pagination .active',
  '[data-step]',
  "[aria-current='step']",
  "[data-automation-id*='progressBar'] li[data-automation-id*='selected']",
  "[data-automation-id*='stepIndicator']",
] as const;

const STEP_ITEM_SELECTOR = "li, [role='tab'], div[class*='step-item']";
const STEP_TEXT = /(?:step\s*)?(\d+)\s*(?:of|\/|∕|from)\s*(\d+)/i;
const STRUCTURAL = /progress|wizard|tablist|breadcrumb/;

export const StepIndicatorGroupSchema = z.object({
  selector: z.string(),
  elements: z.array(
    z.object({
      text: z.string(),
      ariaLabel: z.string(),
      visible: z.boolean(),
      itemCount: z.number().int().nonnegative(),
    }),
  ),
});

export type StepIndicatorGroup = z.infer<typeof StepIndicatorGroupSchema>;

const SINGLE_STEP: StepPosition = { isMultiStep: false, currentStep: 1, totalSteps: 1 };

// ── Inference ──────────────────────────────────────────────────────────────

/**
 * Infer the wizard position from step-indicator matches, in selector
 * priority order. Only the first selector with any match is consulted.
 */
export function inferStepPosition(groups: readonly StepIndicatorGroup[]): StepPosition {
  const group = groups.find((g) => g.elements.length > 0);
  if (!group) return { ...SINGLE_STEP };

  const structural = STRUCTURAL.test(group.selector);
  for (const el of group.elements) {
    if (!el.visible) continue;

    const match = STEP_TEXT.exec(`${el.text} ${el.ariaLabel}`.trim());
    if (match) {
      const current = Number(match[1]);
      const total = Number(match[2]);
      if (total > 1) return { isMultiStep: true, currentStep: current, totalSteps: total };
    }

    if (structural && el.itemCount > 1) {
      return { isMultiStep: true, currentStep: 1, totalSteps: el.itemCount };
    }
  }

  return { isMultiStep: true, currentStep: 1, totalSteps: 1 };
}

// ── Page probe ─────────────────────────────────────────────────────────────

function buildStepIndicatorScript(): string {
  return `(() => {
    const selectors = ${JSON.stringify(STEP_INDICATOR_SELECTORS)};
    const itemSelector = ${JSON.stringify(STEP_ITEM_SELECTOR)};
    const isVisible = (el) => {
      const rect = el.getBoundingClientRect();
      const style = window.getComputedStyle(el);
      return rect.width > 0 && rect.height > 0 && style.display !== 'none' && style.visibility !== 'hidden';
    };
    const groups = [];
    for (const selector of selectors) {
      let nodes = [];
      try { nodes = Array.from(document.querySelectorAll(selector)); } catch (e) { continue; }
      if (nodes.length === 0) continue;
      groups.push({
        selector,
        elements: nodes.slice(0, 20).map((el) => ({
          text: (el.textContent || '').replace(/\\s+/g, ' ').trim().slice(0, 200),
          ariaLabel: el.getAttribute('aria-label') || '',
          visible: isVisible(el),
          itemCount: el.querySelectorAll(itemSelector).length,
        })),
      });
      break;
    }
    return groups;
  })()`;
}

export class MultiStepDetector {
  private logger = getLogger({ service: 'MultiStepDetector' });

  async detect(page: Page): Promise<StepPosition> {
    try {
      const groups = z.array(StepIndicatorGroupSchema).parse(await page.evaluate(buildStepIndicatorScript()));
      const position = inferStepPosition(groups);
      if (position.isMultiStep) {
        this.logger.debug('Step indicator found', { selector: groups[0]?.selector, ...position });
      }
      return position;
    } catch (err) {
      this.logger.warn('Step indicator scan failed', { error: errorMessage(err) });
      return { ...SINGLE_STEP };
    }
  }
}
