import { describe, expect, test } from 'vitest';
import { classifyFormPurpose, type PurposeField } from '../../../../src/engine/analysis/FormPurposeClassifier.js';
import type { FieldType } from '../../../../src/engine/types.js';

const fields = (...types: FieldType[]): PurposeField[] =>
  types.map((fieldType) => ({ fieldType, label: '', placeholder: '' }));

describe('classifyFormPurpose', () => {
  test('a resume upload makes a job application', () => {
    expect(classifyFormPurpose(fields('email', 'resume_file'))).toBe('job_application');
  });

  test('job title with company makes a job application', () => {
    expect(classifyFormPurpose(fields('job_title', 'company'))).toBe('job_application');
  });

  test('any two job signals make a job application', () => {
    expect(classifyFormPurpose(fields('school', 'degree'))).toBe('job_application');
  });

  test('email and password alone make a login form', () => {
    expect(classifyFormPurpose(fields('email', 'password', 'submit_button'))).toBe('login');
  });

  test('email, password and a first name make a registration form', () => {
    expect(classifyFormPurpose(fields('email', 'password', 'first_name'))).toBe('registration');
  });

  test('a password confirmation makes a registration form', () => {
    expect(classifyFormPurpose(fields('email', 'password', 'confirm_password'))).toBe('registration');
  });

  test('email, name and a message box make a contact form', () => {
    expect(
      classifyFormPurpose([
        ...fields('email', 'full_name'),
        { fieldType: 'textarea', label: 'Your message', placeholder: '' },
      ]),
    ).toBe('contact');
  });

  test('a short name-email-text form counts as contact without message wording', () => {
    expect(classifyFormPurpose(fields('email', 'first_name', 'textarea'))).toBe('contact');
  });

  test('everything else is a general form', () => {
    expect(classifyFormPurpose(fields('email', 'first_name', 'last_name'))).toBe('general_form');
    expect(classifyFormPurpose([])).toBe('general_form');
  });
});
