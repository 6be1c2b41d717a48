import { z } from 'zod';
import { getEnv } from './env.js';

// ── Schema ─────────────────────────────────────────────────────────────────

const rangeSchema = z
  .tuple([z.number().int().nonnegative(), z.number().int().nonnegative()])
  .refine(([min, max]) => min <= max, { message: 'range min must not exceed max' });

export const FillerConfigSchema = z.object({
  /** Minimum normalized score for a field candidate to be accepted. */
  confidenceThreshold: z.number().min(0).max(1).default(0.4),
  stabilityTimeoutMs: z.number().int().positive().default(12_000),
  /** Quiet period with no critical DOM mutation before a page counts as settled. */
  stabilityWindowMs: z.number().int().positive().default(1_200),
  stabilityPollMs: z.number().int().positive().default(250),
  navigationTimeoutMs: z.number().int().positive().default(45_000),
  actionTimeoutMs: z.number().int().positive().default(15_000),
  gotoTimeoutMs: z.number().int().positive().default(60_000),
  interactionDelayMs: z.number().int().nonnegative().default(250),
  fieldGapMs: rangeSchema.default([250, 500]),
  typingDelayMs: rangeSchema.default([30, 110]),
  manualDecisionWindowMs: z.number().int().nonnegative().default(7_000),
  captchaWindowMs: z.number().int().nonnegative().default(7_000),
  maxDecisionAttempts: z.number().int().positive().default(3),
});

export type FillerConfig = z.infer<typeof FillerConfigSchema>;
export type FillerConfigInput = z.input<typeof FillerConfigSchema>;

// ── Loader ─────────────────────────────────────────────────────────────────

/**
 * Resolve the run configuration. Explicit overrides win over environment
 * values, which win over schema defaults.
 */
export function loadFillerConfig(overrides: FillerConfigInput = {}): FillerConfig {
  const env = getEnv();
  const fromEnv: FillerConfigInput = {};
  if (env.FORMPILOT_CONFIDENCE_THRESHOLD !== undefined) {
    fromEnv.confidenceThreshold = env.FORMPILOT_CONFIDENCE_THRESHOLD;
  }
  return FillerConfigSchema.parse({ ...fromEnv, ...overrides });
}
