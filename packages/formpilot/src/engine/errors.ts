import { errors } from 'playwright';
import type { RunStatus } from './types.js';

// ── Error kinds ────────────────────────────────────────────────────────────

export type ErrorKind = 'not_found' | 'not_interactable' | 'timeout' | 'detached' | 'unknown';

/** Result of any operation that crosses the browser boundary. */
export type Outcome<T> = { ok: true; value: T } | { ok: false; kind: ErrorKind; message: string };

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

const DETACHED = /not attached|detached|target closed|page closed|context was destroyed|browser has been closed/;
const NOT_INTERACTABLE =
  /not visible|not enabled|disabled|not editable|readonly|intercepts pointer events|outside of the viewport|not interactable/;
const NOT_FOUND = /not found|no element|no such element|resolved to 0 elements|no options? (?:matched|found)/;

/**
 * Map a thrown failure from Playwright (or our own strategies) onto the
 * closed error-kind set. Message checks run before the timeout check because
 * Playwright reports most actionability failures as timeouts whose log names
 * the real cause.
 */
export function classifyInteractionError(error: unknown): ErrorKind {
  const msg = errorMessage(error).toLowerCase();

  if (DETACHED.test(msg)) return 'detached';
  if (NOT_INTERACTABLE.test(msg)) return 'not_interactable';
  if (NOT_FOUND.test(msg)) return 'not_found';
  if (error instanceof errors.TimeoutError || msg.includes('timeout') || msg.includes('timed out')) {
    return 'timeout';
  }
  return 'unknown';
}

export function failure(kind: ErrorKind, message: string): { ok: false; kind: ErrorKind; message: string } {
  return { ok: false, kind, message };
}

export function fromError(error: unknown): { ok: false; kind: ErrorKind; message: string } {
  return failure(classifyInteractionError(error), errorMessage(error));
}

/** Errors transient enough to be worth one retry. */
export function isTransient(kind: ErrorKind): boolean {
  return kind === 'not_interactable' || kind === 'detached';
}

/** The page or browser is gone; nothing further can succeed in this run. */
export function isFatalBrowserError(error: unknown): boolean {
  return /target closed|browser has been closed|execution context was destroyed|page closed/i.test(
    errorMessage(error),
  );
}

// ── Flow control ───────────────────────────────────────────────────────────

/** Thrown inside the orchestrator to unwind a run to a terminal status. */
export class FlowAbortError extends Error {
  readonly status: RunStatus;

  constructor(status: RunStatus, message: string) {
    super(message);
    this.name = 'FlowAbortError';
    this.status = status;
  }
}
