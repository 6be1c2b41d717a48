import type { Page } from 'playwright';
import { getLogger } from '../../monitoring/logger.js';
import { errorMessage } from '../errors.js';
import {
  type ButtonIntent,
  type ExtractedElement,
  type FieldDescriptor,
  type FieldType,
  type PageAnalysis,
} from '../types.js';
import { AttributeExtractor } from './AttributeExtractor.js';
import { ACTION_BUTTON_CONFIDENCE, classifyButtonIntent } from './ButtonIntentClassifier.js';
import { ConfidenceScorer, type FieldCandidate } from './ConfidenceScorer.js';
import { resolveConflicts } from './ConflictResolver.js';
import { classifyFormPurpose } from './FormPurposeClassifier.js';
import { MultiStepDetector } from './MultiStepDetector.js';

export interface PageAnalyzerOptions {
  confidenceThreshold: number;
  extractor?: AttributeExtractor;
  scorer?: ConfidenceScorer;
  stepDetector?: MultiStepDetector;
}

const INTENT_FIELD_TYPE: Record<ButtonIntent, FieldType> = {
  submit: 'submit_button',
  next: 'next_button',
  apply: 'submit_button',
};

export function listFields(analysis: PageAnalysis): FieldDescriptor[] {
  return Object.values(analysis.fields).filter((d): d is FieldDescriptor => d !== undefined);
}

/**
 * One analysis pass: extract, score, resolve, then infer purpose and wizard
 * position. The result is only valid for the page generation it was taken in.
 */
export class PageAnalyzer {
  private logger = getLogger({ service: 'PageAnalyzer' });
  private readonly threshold: number;
  private readonly extractor: AttributeExtractor;
  private readonly scorer: ConfidenceScorer;
  private readonly stepDetector: MultiStepDetector;

  constructor(opts: PageAnalyzerOptions) {
    this.threshold = opts.confidenceThreshold;
    this.extractor = opts.extractor ?? new AttributeExtractor();
    this.scorer = opts.scorer ?? new ConfidenceScorer();
    this.stepDetector = opts.stepDetector ?? new MultiStepDetector();
  }

  async analyze(page: Page, epoch: number): Promise<PageAnalysis> {
    const analysis: PageAnalysis = {
      url: page.url(),
      epoch,
      scope: 'body',
      fields: {},
      actionButtons: { submit: [], next: [], apply: [] },
      purpose: 'general_form',
      multiStep: { isMultiStep: false, currentStep: 1, totalSteps: 1 },
      errors: [],
    };

    try {
      analysis.scope = await this.extractor.selectScope(page);
      const { elements, errors } = await this.extractor.extract(page, analysis.scope);
      analysis.errors.push(...errors);

      const byIndex = new Map<number, ExtractedElement>();
      const candidates: FieldCandidate[] = [];

      for (const element of elements) {
        byIndex.set(element.raw.scanIndex, element);
        if (element.kind.kind === 'action_button') {
          const intent = classifyButtonIntent(element.raw);
          if (intent) {
            analysis.actionButtons[intent].push(
              this.describe(element, INTENT_FIELD_TYPE[intent], ACTION_BUTTON_CONFIDENCE, analysis),
            );
          }
          continue;
        }
        candidates.push(...this.scorer.candidates(element.raw));
      }

      for (const [fieldType, winner] of resolveConflicts(candidates, this.threshold)) {
        const element = byIndex.get(winner.scanIndex);
        if (element) {
          analysis.fields[fieldType] = this.describe(element, fieldType, winner.confidence, analysis);
        }
      }

      analysis.purpose = classifyFormPurpose(
        listFields(analysis).map((d) => ({
          fieldType: d.fieldType,
          label: d.labelText,
          placeholder: d.rawAttributes.placeholder,
        })),
      );
      analysis.multiStep = await this.stepDetector.detect(page);
    } catch (err) {
      const message = `analysis failed: ${errorMessage(err)}`;
      this.logger.error('Page analysis failed', { url: analysis.url, error: errorMessage(err) });
      analysis.errors.push(message);
    }

    this.logger.info('Page analyzed', {
      url: analysis.url,
      scope: analysis.scope,
      fields: Object.keys(analysis.fields),
      buttons: {
        submit: analysis.actionButtons.submit.length,
        next: analysis.actionButtons.next.length,
        apply: analysis.actionButtons.apply.length,
      },
      purpose: analysis.purpose,
      multiStep: analysis.multiStep,
    });
    return analysis;
  }

  private describe(
    element: ExtractedElement,
    fieldType: FieldType,
    confidence: number,
    analysis: PageAnalysis,
  ): FieldDescriptor {
    return {
      scanIndex: element.raw.scanIndex,
      fieldType,
      confidence,
      stableSelector: element.stableSelector,
      scope: analysis.scope,
      epoch: analysis.epoch,
      kind: element.kind,
      labelText: element.raw.labelText,
      contextText: element.raw.contextText,
      rawAttributes: element.raw,
    };
  }
}
