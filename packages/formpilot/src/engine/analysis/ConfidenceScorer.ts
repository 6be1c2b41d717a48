import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { FIELD_TYPES, FieldTypeSchema, type FieldType, type RawElement } from '../types.js';

// ── Categories & weights ───────────────────────────────────────────────────

export const PATTERN_CATEGORIES = [
  'names',
  'labels',
  'placeholders',
  'types',
  'autocompletes',
  'automationIds',
  'texts',
  'classes',
  'contexts',
] as const;

export type PatternCategory = (typeof PATTERN_CATEGORIES)[number];

export const CATEGORY_WEIGHTS: Record<PatternCategory, number> = {
  autocompletes: 3.5,
  types: 3.0,
  automationIds: 2.8,
  labels: 2.5,
  names: 2.2,
  placeholders: 1.8,
  texts: 1.0,
  classes: 0.5,
  contexts: 0.3,
};

/** Which raw attributes each category is matched against. */
const CATEGORY_SOURCES: Record<PatternCategory, (raw: RawElement) => string[]> = {
  names: (raw) => [raw.name, raw.id],
  labels: (raw) => [raw.labelText, raw.ariaLabel],
  placeholders: (raw) => [raw.placeholder],
  types: (raw) => [raw.inputType],
  autocompletes: (raw) => [raw.autocomplete],
  automationIds: (raw) => [raw.automationId, raw.testId, raw.dataCy, raw.dataQa],
  texts: (raw) => [raw.text],
  classes: (raw) => [raw.className],
  contexts: (raw) => [raw.contextText],
};

/** Attributes checked for negative patterns. */
const NEGATIVE_SOURCES = (raw: RawElement): string[] => [
  raw.labelText,
  raw.name,
  raw.id,
  raw.placeholder,
  raw.ariaLabel,
  raw.text,
  raw.automationId,
  raw.autocomplete,
];

const CANONICAL_TYPE_BONUS: Partial<Record<FieldType, { inputType: string; factor: number }>> = {
  email: { inputType: 'email', factor: 1.5 },
  password: { inputType: 'password', factor: 1.5 },
  phone: { inputType: 'tel', factor: 1.0 },
  resume_file: { inputType: 'file', factor: 1.0 },
  cover_letter_file: { inputType: 'file', factor: 1.0 },
};

export const NEGATIVE_MULTIPLIER = 0.3;
export const NORMALIZATION_CONSTANT = 2.0;
export const ADMISSION_FLOOR = 0.15;

// ── Pattern book ───────────────────────────────────────────────────────────

const PatternSetSchema = z
  .object({
    names: z.array(z.string()),
    labels: z.array(z.string()),
    placeholders: z.array(z.string()),
    types: z.array(z.string()),
    autocompletes: z.array(z.string()),
    automationIds: z.array(z.string()),
    texts: z.array(z.string()),
    classes: z.array(z.string()),
    contexts: z.array(z.string()),
  })
  .partial()
  .strict();

const PatternFileSchema = z.object({
  patterns: z.record(FieldTypeSchema, PatternSetSchema),
  negatives: z.record(FieldTypeSchema, z.array(z.string())),
});

export type PatternFile = z.infer<typeof PatternFileSchema>;

export type CompiledPatternSet = Partial<Record<PatternCategory, RegExp[]>>;

export interface PatternBook {
  patterns: Partial<Record<FieldType, CompiledPatternSet>>;
  negatives: Partial<Record<FieldType, RegExp[]>>;
}

const compile = (sources: string[]): RegExp[] => sources.map((source) => new RegExp(source, 'i'));

export function compilePatternBook(input: unknown): PatternBook {
  const file = PatternFileSchema.parse(input);
  const book: PatternBook = { patterns: {}, negatives: {} };

  for (const fieldType of FIELD_TYPES) {
    const set = file.patterns[fieldType];
    if (set) {
      const compiled: CompiledPatternSet = {};
      for (const category of PATTERN_CATEGORIES) {
        const sources = set[category];
        if (sources && sources.length > 0) compiled[category] = compile(sources);
      }
      book.patterns[fieldType] = compiled;
    }
    const negatives = file.negatives[fieldType];
    if (negatives && negatives.length > 0) book.negatives[fieldType] = compile(negatives);
  }
  return book;
}

const PATTERN_FILE = fileURLToPath(new URL('../../../data/field-patterns.json', import.meta.url));

let _defaultBook: PatternBook | null = null;

export function loadPatternBook(path: string = PATTERN_FILE): PatternBook {
  if (path !== PATTERN_FILE) {
    return compilePatternBook(JSON.parse(readFileSync(path, 'utf8')));
  }
  if (!_defaultBook) {
    _defaultBook = compilePatternBook(JSON.parse(readFileSync(PATTERN_FILE, 'utf8')));
  }
  return _defaultBook;
}

// ── Scoring ────────────────────────────────────────────────────────────────

export interface ScoreBreakdown {
  fieldType: FieldType;
  matched: PatternCategory[];
  /** Accumulated weight before negative damping. */
  raw: number;
  /** Accumulated weight after negative damping. */
  score: number;
  penalized: boolean;
  denominator: number;
  /** Normalized to [0, 1], three decimals. */
  confidence: number;
}

export interface FieldCandidate {
  scanIndex: number;
  fieldType: FieldType;
  confidence: number;
}

export const roundConfidence = (value: number): number => Math.round(value * 1000) / 1000;

export class ConfidenceScorer {
  constructor(private readonly book: PatternBook = loadPatternBook()) {}

  /** Returns null for field types that carry no pattern set. */
  score(raw: RawElement, fieldType: FieldType): ScoreBreakdown | null {
    const set = this.book.patterns[fieldType];
    if (!set) return null;

    let accumulated = 0;
    let applicable = 0;
    const matched: PatternCategory[] = [];

    for (const category of PATTERN_CATEGORIES) {
      const patterns = set[category];
      if (!patterns) continue;
      const values = CATEGORY_SOURCES[category](raw).filter((v) => v.trim().length > 0);
      if (values.length === 0) continue;

      applicable += CATEGORY_WEIGHTS[category];
      if (patterns.some((re) => values.some((v) => re.test(v)))) {
        accumulated += CATEGORY_WEIGHTS[category];
        matched.push(category);
      }
    }

    const bonus = CANONICAL_TYPE_BONUS[fieldType];
    if (bonus && raw.inputType.toLowerCase() === bonus.inputType) {
      accumulated += CATEGORY_WEIGHTS.types * bonus.factor;
    }

    const negatives = this.book.negatives[fieldType] ?? [];
    const negativeValues = NEGATIVE_SOURCES(raw).filter((v) => v.length > 0);
    const penalized = negatives.some((re) => negativeValues.some((v) => re.test(v)));
    const score = penalized ? accumulated * NEGATIVE_MULTIPLIER : accumulated;

    const denominator = applicable + NORMALIZATION_CONSTANT;
    const confidence = roundConfidence(Math.min(1, Math.max(0, score / denominator)));

    return { fieldType, matched, raw: accumulated, score, penalized, denominator, confidence };
  }

  /** Every field type whose confidence clears the admission floor. */
  candidates(raw: RawElement): FieldCandidate[] {
    const out: FieldCandidate[] = [];
    for (const fieldType of FIELD_TYPES) {
      const breakdown = this.score(raw, fieldType);
      if (breakdown && breakdown.confidence > ADMISSION_FLOOR) {
        out.push({ scanIndex: raw.scanIndex, fieldType, confidence: breakdown.confidence });
      }
    }
    return out;
  }
}
