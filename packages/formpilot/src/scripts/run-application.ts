#!/usr/bin/env -S npx tsx
/**
 * Run one application against a live page.
 *
 * Usage:
 *   npx tsx src/scripts/run-application.ts --url=https://... --steps=steps.json
 *   npx tsx src/scripts/run-application.ts --url=https://... --steps=steps.json --headed
 *   npx tsx src/scripts/run-application.ts --url=... --steps=... --preferences=./prefs.json
 *
 * steps.json is an array with one object per form page, keyed by field type:
 *   [{ "email": "jane@example.com", "first_name": "Jane" }, { "resume_file": "./resume.pdf" }]
 *
 * Exit code is 0 when the run reached a submit or filled every step, 1 otherwise.
 */

import { readFileSync } from 'node:fs';
import { createFlowOrchestrator } from '../engine/createFlowOrchestrator.js';
import { errorMessage } from '../engine/errors.js';
import { StepSequenceSchema, type RunStatus } from '../engine/types.js';
import { getLogger } from '../monitoring/logger.js';

const logger = getLogger({ service: 'run-application' });

const SUCCESS_STATUSES: ReadonlySet<RunStatus> = new Set(['submission_attempted', 'completed_all_data_steps']);

// --- Parse args ---

function parseArg(name: string): string | null {
  const arg = process.argv.find((a) => a.startsWith(`--${name}=`));
  if (!arg) return null;
  const value = arg.split('=').slice(1).join('=');
  if (!value) {
    console.error(`--${name} requires a value`);
    process.exit(1);
  }
  return value;
}

function loadSteps(path: string) {
  const parsed = StepSequenceSchema.safeParse(JSON.parse(readFileSync(path, 'utf-8')));
  if (!parsed.success) {
    console.error(`Invalid steps file ${path}: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`);
    process.exit(1);
  }
  return parsed.data;
}

// --- Main ---

async function main(): Promise<void> {
  const url = parseArg('url');
  const stepsPath = parseArg('steps');
  if (!url || !stepsPath) {
    console.error('Usage: run-application --url=<page> --steps=<steps.json> [--headed] [--preferences=<file>]');
    process.exit(1);
  }

  const steps = loadSteps(stepsPath);
  const preferencesPath = parseArg('preferences');
  const { orchestrator } = createFlowOrchestrator({
    headless: process.argv.includes('--headed') ? false : undefined,
    ...(preferencesPath ? { preferencesPath } : {}),
  });

  const run = await orchestrator.run(url, steps);
  console.log(JSON.stringify(run, null, 2));
  process.exit(SUCCESS_STATUSES.has(run.status) ? 0 : 1);
}

main().catch((err: unknown) => {
  logger.error('Run script crashed', { error: errorMessage(err) });
  process.exit(1);
});
