import { ACTION_FIELD_TYPES, type FieldType, type FormPurpose } from '../types.js';

export interface PurposeField {
  fieldType: FieldType;
  label: string;
  placeholder: string;
}

const JOB_SIGNALS: readonly FieldType[] = [
  'resume_file',
  'cover_letter_file',
  'linkedin_profile_url',
  'company',
  'job_title',
  'years_experience',
  'school',
  'degree',
];

const REGISTRATION_EXTRAS: readonly FieldType[] = ['first_name', 'confirm_password', 'full_name'];
const NAME_TYPES: readonly FieldType[] = ['first_name', 'last_name', 'full_name'];
const FREE_TEXT_TYPES: readonly FieldType[] = ['textarea', 'text_input'];
const CONTACT_WORDS = /message|comment|query|question|feedback/i;

export function classifyFormPurpose(fields: readonly PurposeField[]): FormPurpose {
  const types = new Set(fields.map((f) => f.fieldType));
  const has = (t: FieldType) => types.has(t);

  const jobSignals = JOB_SIGNALS.filter(has).length;
  if (has('resume_file') || (has('job_title') && has('company')) || jobSignals >= 2) {
    return 'job_application';
  }

  const dataTypes = [...types].filter((t) => !ACTION_FIELD_TYPES.has(t));
  const hasCredentials = has('email') && has('password');

  if (hasCredentials) {
    // A name or confirmation field next to the credentials means sign-up, not sign-in.
    if (REGISTRATION_EXTRAS.some(has)) return 'registration';
    const others = dataTypes.filter((t) => t !== 'email' && t !== 'password');
    if (others.length <= 1) return 'login';
  }

  const freeText = fields.filter((f) => FREE_TEXT_TYPES.includes(f.fieldType));
  if (has('email') && NAME_TYPES.some(has) && freeText.length > 0) {
    const asksForMessage = freeText.some(
      (f) => CONTACT_WORDS.test(f.label) || CONTACT_WORDS.test(f.placeholder),
    );
    if (asksForMessage || dataTypes.length <= 5) return 'contact';
  }

  return 'general_form';
}
