import type { DecisionPoint } from '../types.js';

/** Branch pages recognized out of the box. A custom definition reusing one of these names is ignored. */
export const BUILT_IN_DECISION_POINTS: readonly DecisionPoint[] = [
  {
    name: 'workday_application_method_selection',
    description: 'Workday: choose how to apply (autofill, manual, or last application)',
    detection: {
      urlContains: ['myworkdayjobs.com'],
      textIndicators: [
        'Start Your Application',
        'Please select how you would like to apply',
        'How would you like to apply?',
      ],
      buttonTexts: ['Autofill with Resume', 'Apply Manually', 'Use My Last Application'],
    },
    options: [
      {
        name: 'autofill_resume_workday',
        selectors: [
          "a[data-automation-id='autofillWithResume']",
          "button[data-automation-id='autofillWithResume']",
          "button:text-matches('autofill.*resume', 'i')",
          "a:text-matches('autofill.*resume', 'i')",
          "[aria-label*='Autofill with Resume' i]",
        ],
        preferred: true,
      },
      {
        name: 'apply_manually_workday',
        selectors: [
          "a[data-automation-id='applyManually']",
          "button[data-automation-id='applyManually']",
          "button:has-text('Apply Manually')",
          "a:has-text('Apply Manually')",
          "[aria-label*='Apply Manually' i]",
        ],
        preferred: false,
      },
      {
        name: 'use_last_application_workday',
        selectors: [
          "a[data-automation-id='useMyLastApplication']",
          "button[data-automation-id='useMyLastApplication']",
          "button:has-text('Use My Last Application')",
          "a:has-text('Use My Last Application')",
          "[aria-label*='Use My Last Application' i]",
        ],
        preferred: false,
      },
    ],
  },
  {
    name: 'resume_parse_confirmation',
    description: 'Confirm the details parsed from an uploaded resume',
    detection: {
      urlContains: ['myworkdayjobs.com/apply'],
      textIndicators: [
        'Review your information',
        'Confirm your details',
        'Information from resume',
        'Review and Submit',
        'My Information',
      ],
      buttonTexts: ['Continue', 'Next', 'Save and continue', 'Edit Information'],
    },
    options: [
      {
        name: 'continue_after_parse',
        selectors: [
          "button[data-automation-id*='continue' i]",
          "button[data-automation-id*='next' i]",
          "button:has-text('Continue')",
          "button:has-text('Next')",
          "button:text-matches('save.*continue', 'i')",
        ],
        preferred: true,
      },
    ],
  },
];
