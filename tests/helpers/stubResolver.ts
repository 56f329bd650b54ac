/**
 * In-process resolvers for tests
 */

import { sleep } from '../../src/utils/concurrency.js';
import type {
  Candidate,
  FailureKind,
  FailureReason,
  ResolutionOutcome,
  Resolver,
} from '../../src/core/types.js';

export type Behavior = (
  candidate: Candidate,
  attempt: number
) => ResolutionOutcome | Promise<ResolutionOutcome>;

export const resolved = (candidate: Candidate, addresses = ['192.0.2.1']): ResolutionOutcome => ({
  status: 'resolved',
  candidate,
  addresses,
});

export const unresolved = (candidate: Candidate, kind: FailureKind): ResolutionOutcome => {
  const reason: FailureReason =
    kind === 'Other' ? { kind, detail: 'stub' } : kind === 'NetworkError' ? { kind, detail: 'stub' } : { kind };
  return { status: 'unresolved', candidate, reason };
};

/**
 * Records every call and the peak number of concurrent calls
 */
export class StubResolver implements Resolver {
  readonly calls: string[] = [];
  readonly attempts = new Map<string, number>();
  active = 0;
  maxActive = 0;

  private behavior: Behavior;
  private delay: (candidate: Candidate) => number;

  constructor(behavior: Behavior = (c) => resolved(c), delay: (candidate: Candidate) => number = () => 0) {
    this.behavior = behavior;
    this.delay = delay;
  }

  async resolve(candidate: Candidate): Promise<ResolutionOutcome> {
    this.calls.push(candidate.hostname);
    const attempt = (this.attempts.get(candidate.hostname) ?? 0) + 1;
    this.attempts.set(candidate.hostname, attempt);

    this.active++;
    this.maxActive = Math.max(this.maxActive, this.active);
    try {
      const ms = this.delay(candidate);
      if (ms > 0) {
        await sleep(ms);
      } else {
        await Promise.resolve();
      }
      return await this.behavior(candidate, attempt);
    } finally {
      this.active--;
    }
  }
}

/**
 * Fails the first `failures` attempts of each name with `kind`, then resolves
 */
export function flakyResolver(kind: FailureKind, failures = 1): StubResolver {
  return new StubResolver((candidate, attempt) =>
    attempt <= failures ? unresolved(candidate, kind) : resolved(candidate)
  );
}

export function labels(count: number, prefix = 'host'): string[] {
  return Array.from({ length: count }, (_, i) => `${prefix}${i}`);
}
