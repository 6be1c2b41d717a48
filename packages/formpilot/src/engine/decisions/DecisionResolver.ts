import type { Page } from 'playwright';
import { getLogger } from '../../monitoring/logger.js';
import { errorMessage } from '../errors.js';
import {
  DecisionPointSchema,
  type DecisionOption,
  type DecisionPoint,
  type DecisionPointInput,
} from '../types.js';
import { BUILT_IN_DECISION_POINTS } from './builtins.js';
import type { PreferenceStore } from './PreferenceStore.js';

export type DecisionResult =
  | { handled: true; point: string; option: string }
  | { handled: false; point: string; reason: 'no_choice' | 'not_clickable' };

const CLICKABLE_SELECTOR =
  "button, a[role='button'], [role='button'], input[type='submit'], input[type='button'], [data-automation-id*='button' i], a";

/** Options a page must show before a definition counts as detected. */
export function requiredButtonMatches(expected: number): number {
  return Math.max(1, Math.ceil(expected / 2));
}

export class DecisionResolver {
  private logger = getLogger({ service: 'DecisionResolver' });

  constructor(
    private readonly store: PreferenceStore,
    private readonly builtIns: readonly DecisionPoint[] = BUILT_IN_DECISION_POINTS,
    private readonly clickTimeoutMs = 5_000,
  ) {}

  /** Built-in definitions first; a custom one reusing a built-in name is ignored. */
  definitions(): DecisionPoint[] {
    const builtInNames = new Set(this.builtIns.map((d) => d.name));
    const custom = this.store.customDefinitions().filter((d) => {
      if (!builtInNames.has(d.name)) return true;
      this.logger.debug('Custom decision point shadowed by built-in', { name: d.name });
      return false;
    });
    return [...this.builtIns, ...custom];
  }

  registerDecisionPoint(input: DecisionPointInput): DecisionPoint {
    const definition = DecisionPointSchema.parse(input);
    this.store.putCustomDefinition(definition);
    if (this.builtIns.some((d) => d.name === definition.name)) {
      this.logger.warn('Custom decision point saved but a built-in of the same name takes precedence', {
        name: definition.name,
      });
    }
    this.logger.info('Decision point registered', {
      name: definition.name,
      options: definition.options.map((o) => o.name),
    });
    return definition;
  }

  async detect(page: Page): Promise<DecisionPoint | null> {
    let url: string;
    let bodyText: string;
    let clickableTexts: string[];
    try {
      url = page.url().toLowerCase();
      bodyText = (await page.locator('body').innerText()).toLowerCase();
      clickableTexts = (await page.locator(CLICKABLE_SELECTOR).allInnerTexts()).map((t) =>
        t.trim().toLowerCase(),
      );
    } catch (err) {
      this.logger.warn('Decision detection could not read the page', { error: errorMessage(err) });
      return null;
    }

    for (const point of this.definitions()) {
      const { urlContains, textIndicators, buttonTexts } = point.detection;
      const urlMatch = urlContains.some((fragment) => url.includes(fragment.toLowerCase()));
      const textMatch = textIndicators.some((indicator) => bodyText.includes(indicator.toLowerCase()));
      if (!urlMatch && !textMatch) continue;

      const present = buttonTexts.filter((expected) =>
        clickableTexts.some((text) => text.includes(expected.toLowerCase())),
      ).length;
      const required = requiredButtonMatches(buttonTexts.length);

      if (present >= required) {
        this.logger.info('Decision point detected', { name: point.name, urlMatch, textMatch, present, required });
        return point;
      }
      this.logger.debug('Decision point criteria partly met', { name: point.name, present, required });
    }
    return null;
  }

  async resolve(page: Page, point: DecisionPoint): Promise<DecisionResult> {
    const option = this.chooseOption(point);
    if (!option) {
      this.logger.warn('No stored or default choice for decision point', { name: point.name });
      return { handled: false, point: point.name, reason: 'no_choice' };
    }

    for (const selector of option.selectors) {
      try {
        for (const candidate of await page.locator(selector).all()) {
          if (!(await candidate.isVisible()) || !(await candidate.isEnabled())) continue;
          await candidate.click({ timeout: this.clickTimeoutMs });
          this.logger.info('Decision option clicked', { name: point.name, option: option.name, selector });
          this.remember(point.name, option.name);
          return { handled: true, point: point.name, option: option.name };
        }
      } catch (err) {
        this.logger.debug('Decision option selector failed', { selector, error: errorMessage(err) });
      }
    }

    this.logger.warn('Could not click any selector for decision option', { name: point.name, option: option.name });
    return { handled: false, point: point.name, reason: 'not_clickable' };
  }

  private chooseOption(point: DecisionPoint): DecisionOption | undefined {
    const stored = this.store.getChoice(point.name);
    if (stored) {
      const match = point.options.find((o) => o.name === stored);
      if (match) {
        this.logger.debug('Using stored decision', { name: point.name, option: stored });
        return match;
      }
      this.logger.warn('Stored decision names an unknown option', { name: point.name, option: stored });
    }
    return point.options.find((o) => o.preferred);
  }

  private remember(pointName: string, optionName: string): void {
    try {
      this.store.setChoice(pointName, optionName);
    } catch (err) {
      this.logger.error('Failed to persist decision', { name: pointName, error: errorMessage(err) });
    }
  }
}
