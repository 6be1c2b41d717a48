import type { FieldType } from '../types.js';
import type { FieldCandidate } from './ConfidenceScorer.js';

/**
 * Collapse scored candidates to one type per element and one element per
 * type. Equal scores keep whichever candidate was seen first.
 */
export function resolveConflicts(
  candidates: readonly FieldCandidate[],
  threshold: number,
): Map<FieldType, FieldCandidate> {
  // Phase 1: best type per element
  const byElement = new Map<number, FieldCandidate>();
  for (const candidate of candidates) {
    const current = byElement.get(candidate.scanIndex);
    if (!current || candidate.confidence > current.confidence) {
      byElement.set(candidate.scanIndex, candidate);
    }
  }

  // Phase 2: best element per type
  const byType = new Map<FieldType, FieldCandidate>();
  for (const winner of byElement.values()) {
    const current = byType.get(winner.fieldType);
    if (!current || winner.confidence > current.confidence) {
      byType.set(winner.fieldType, winner);
    }
  }

  const accepted = new Map<FieldType, FieldCandidate>();
  for (const [fieldType, winner] of byType) {
    if (winner.confidence >= threshold) accepted.set(fieldType, winner);
  }
  return accepted;
}
