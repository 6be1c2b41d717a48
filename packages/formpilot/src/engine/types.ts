import { z } from 'zod';

// ── Field types ────────────────────────────────────────────────────────────

export const FIELD_TYPES = [
  'email',
  'password',
  'confirm_password',
  'first_name',
  'last_name',
  'full_name',
  'phone',
  'location',
  'address_line1',
  'address_line2',
  'city',
  'state',
  'zip_code',
  'country',
  'company',
  'job_title',
  'years_experience',
  'salary',
  'school',
  'degree',
  'field_of_study',
  'graduation_date',
  'linkedin_profile_url',
  'portfolio_url',
  'personal_website_url',
  'cover_letter_text',
  'resume_file',
  'cover_letter_file',
  'text_input',
  'select_dropdown',
  'checkbox',
  'radio_button_group',
  'textarea',
  'submit_button',
  'next_button',
  'unknown',
] as const;

export const FieldTypeSchema = z.enum(FIELD_TYPES);
export type FieldType = z.infer<typeof FieldTypeSchema>;

export const ACTION_FIELD_TYPES: ReadonlySet<FieldType> = new Set(['submit_button', 'next_button']);

// ── Element kinds ──────────────────────────────────────────────────────────

export type ElementKind =
  | { kind: 'text_like'; inputType: string; multiline: boolean }
  | { kind: 'checkbox' }
  | { kind: 'radio' }
  | { kind: 'select' }
  | { kind: 'file' }
  | { kind: 'custom_widget'; marker: string }
  | { kind: 'content_editable' }
  | { kind: 'action_button' };

export type ElementKindTag = ElementKind['kind'];

// ── Raw extraction records ─────────────────────────────────────────────────

/** One element as reported by the page-side extraction script. */
export const RawElementSchema = z.object({
  scanIndex: z.number().int().nonnegative(),
  tag: z.string(),
  inputType: z.string(),
  name: z.string(),
  id: z.string(),
  className: z.string(),
  placeholder: z.string(),
  ariaLabel: z.string(),
  ariaLabelledBy: z.string(),
  ariaDescribedBy: z.string(),
  role: z.string(),
  autocomplete: z.string(),
  required: z.boolean(),
  value: z.string(),
  text: z.string(),
  automationId: z.string(),
  testId: z.string(),
  dataCy: z.string(),
  dataQa: z.string(),
  contentEditable: z.boolean(),
  visible: z.boolean(),
  enabled: z.boolean(),
  labelText: z.string(),
  contextText: z.string(),
});

export type RawElement = z.infer<typeof RawElementSchema>;

export interface ExtractedElement {
  raw: RawElement;
  kind: ElementKind;
  stableSelector: string;
}

// ── Descriptors and analysis ───────────────────────────────────────────────

export interface FieldDescriptor {
  /** Element identity within one analysis pass. */
  scanIndex: number;
  fieldType: FieldType;
  /** Normalized score in [0, 1]. */
  confidence: number;
  stableSelector: string;
  scope: string;
  /** Page generation this descriptor belongs to. */
  epoch: number;
  kind: ElementKind;
  labelText: string;
  contextText: string;
  rawAttributes: RawElement;
}

export type ButtonIntent = 'submit' | 'next' | 'apply';

export type FormPurpose =
  | 'job_application'
  | 'login'
  | 'registration'
  | 'contact'
  | 'general_form';

export interface StepPosition {
  isMultiStep: boolean;
  currentStep: number;
  totalSteps: number;
}

export interface PageAnalysis {
  url: string;
  epoch: number;
  scope: string;
  fields: Partial<Record<FieldType, FieldDescriptor>>;
  actionButtons: Record<ButtonIntent, FieldDescriptor[]>;
  purpose: FormPurpose;
  multiStep: StepPosition;
  errors: string[];
}

// ── Step data ──────────────────────────────────────────────────────────────

export const FieldValueSchema = z.union([z.string(), z.number(), z.boolean()]);
export type FieldValue = z.infer<typeof FieldValueSchema>;

export const StepDataSchema = z.record(FieldTypeSchema, FieldValueSchema);
export type StepData = Partial<Record<FieldType, FieldValue>>;

export const StepSequenceSchema = z.array(StepDataSchema).min(1);

// ── Outcomes ───────────────────────────────────────────────────────────────

export interface FieldError {
  fieldType: FieldType;
  kind: string;
  message: string;
}

export type FillSuccess = 'full' | 'partial' | 'none';

export interface FillAttemptOutcome {
  step: number;
  attempted: number;
  filled: number;
  skipped: FieldType[];
  errors: FieldError[];
  success: FillSuccess;
  durationMs: number;
}

export type StepFailureReason = 'no_fields_actions' | 'fill' | 'submit' | 'nav' | 'login';

export type RunStatus =
  | 'initiated'
  | 'submission_attempted'
  | 'completed_all_data_steps'
  | `fail_S${number}_${StepFailureReason}`
  | 'error_critical';

export interface ApplicationRun {
  /** Correlates the run's log entries. */
  runId: string;
  targetUrl: string;
  status: RunStatus;
  steps: FillAttemptOutcome[];
  totalFilled: number;
  errors: string[];
  screenshots: string[];
  startedAt: string;
  finishedAt: string | null;
}

// ── Decision points ────────────────────────────────────────────────────────

export const DecisionOptionSchema = z.object({
  name: z.string().min(1),
  selectors: z.array(z.string().min(1)).min(1),
  preferred: z.boolean().default(false),
});

export const DecisionPointSchema = z.object({
  name: z.string().min(1),
  description: z.string().default(''),
  detection: z.object({
    urlContains: z.array(z.string()).default([]),
    textIndicators: z.array(z.string()).default([]),
    buttonTexts: z.array(z.string()).default([]),
  }),
  options: z.array(DecisionOptionSchema).min(1),
});

export type DecisionOption = z.infer<typeof DecisionOptionSchema>;
export type DecisionPoint = z.infer<typeof DecisionPointSchema>;
export type DecisionPointInput = z.input<typeof DecisionPointSchema>;

export const PreferencesSchema = z.object({
  decisions: z.record(z.string(), z.string()).default({}),
  customDecisionDefinitions: z.array(DecisionPointSchema).default([]),
});

export type Preferences = z.infer<typeof PreferencesSchema>;
