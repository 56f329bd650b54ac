/**
 * Candidate generation from a base domain and wordlist labels
 */

import { InvalidConfigError } from './errors.js';
import type { Candidate } from './types.js';

function isBlank(label: string): boolean {
  return label.trim().length === 0;
}

function* emit(domain: string, labels: Iterable<string>): Generator<Candidate, void, undefined> {
  for (const label of labels) {
    if (isBlank(label)) continue;
    yield Object.freeze({ label, hostname: `${label}.${domain}` });
  }
}

/**
 * Lazily combine each label with the domain, in label order.
 * Blank labels are skipped. The domain is checked eagerly, before iteration.
 */
export function generateCandidates(
  domain: string,
  labels: Iterable<string>
): Generator<Candidate, void, undefined> {
  if (!domain.trim()) {
    throw new InvalidConfigError('domain', 'domain must not be empty');
  }
  return emit(domain, labels);
}

/**
 * Number of candidates generateCandidates would emit for these labels
 */
export function countCandidates(labels: Iterable<string>): number {
  let count = 0;
  for (const label of labels) {
    if (!isBlank(label)) count++;
  }
  return count;
}
