import type { ButtonIntent, RawElement } from '../types.js';

const APPLY_PATTERNS = [/\bapply now\b/, /\bapply for this job\b/, /\bsubmit application\b/, /\bapply\b/];
const NEXT_PATTERNS = [/\bnext\b/, /\bcontinue\b/, /\bproceed\b/, /\bstep \d+\b/, /\bforward\b/];
const SUBMIT_PATTERNS = [
  /\bsubmit\b/,
  /\bsend\b/,
  /\bfinish\b/,
  /\bcomplete\b/,
  /\bdone\b/,
  /\bsave (?:&|and) exit\b/,
  /\bsave\b/,
];

const SAVE = /\bsave\b/;
const CONTINUE = /\bcontinue\b/;

export const ACTION_BUTTON_CONFIDENCE = 0.85;

type ButtonAttributes = Pick<
  RawElement,
  'text' | 'value' | 'ariaLabel' | 'name' | 'id' | 'automationId' | 'inputType'
>;

export function buttonCorpus(el: ButtonAttributes): string {
  return [el.text, el.value, el.ariaLabel, el.name, el.id, el.automationId]
    .filter((part) => part.length > 0)
    .join(' ')
    .replace(/\s+/g, ' ')
    .trim()
    .toLowerCase();
}

/**
 * Decide what pressing a button-like element would do. Apply phrases win
 * over everything else, so "Submit Application" is reported as apply.
 */
export function classifyButtonIntent(el: ButtonAttributes): ButtonIntent | null {
  const corpus = buttonCorpus(el);

  if (APPLY_PATTERNS.some((re) => re.test(corpus))) return 'apply';

  if (NEXT_PATTERNS.some((re) => re.test(corpus))) {
    // "Save and Continue" usually commits the page; treat it as a submit.
    if (SAVE.test(corpus) && CONTINUE.test(corpus)) return 'submit';
    return 'next';
  }

  if (SUBMIT_PATTERNS.some((re) => re.test(corpus))) return 'submit';
  if (el.inputType.toLowerCase() === 'submit') return 'submit';
  return null;
}
