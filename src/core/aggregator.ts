/**
 * Result aggregation and progress accounting for one scan
 */

import { logger } from '../utils/logger.js';
import type { FailureKind, RecordedOutcome, ResolvedEntry, ScanSnapshot } from './types.js';

export type OutcomeListener = (outcome: RecordedOutcome) => void;

/**
 * Collects final outcomes from all workers.
 *
 * `record` runs to completion without awaiting, so calls from concurrent
 * workers never interleave on the event loop.
 */
export class ResultAggregator {
  private readonly total: number;
  private completed = 0;
  private readonly resolved = new Map<string, ResolvedEntry>();
  private readonly failures: Record<FailureKind, number> = {
    NameNotFound: 0,
    Timeout: 0,
    NetworkError: 0,
    Other: 0,
  };
  private readonly listener?: OutcomeListener;

  constructor(total: number, listener?: OutcomeListener) {
    this.total = total;
    this.listener = listener;
  }

  /**
   * Count one final outcome and keep it if it resolved
   */
  record(outcome: RecordedOutcome): void {
    if (this.completed >= this.total) {
      throw new RangeError(
        `Outcome for ${outcome.candidate.hostname} exceeds the ${this.total} expected candidates`
      );
    }

    this.completed++;

    if (outcome.status === 'resolved') {
      this.resolved.set(outcome.candidate.hostname, {
        hostname: outcome.candidate.hostname,
        addresses: [...outcome.addresses],
        duration: outcome.duration,
      });
    } else {
      this.failures[outcome.reason.kind]++;
    }

    if (this.listener) {
      try {
        this.listener(outcome);
      } catch (error) {
        logger.error(`Outcome listener failed for ${outcome.candidate.hostname}:`, error);
      }
    }
  }

  /**
   * Current counters; inFlight is supplied by the scheduler
   */
  snapshot(inFlight = 0): ScanSnapshot {
    return {
      completed: this.completed,
      total: this.total,
      resolved: this.resolved.size,
      inFlight,
      failures: { ...this.failures },
    };
  }

  /**
   * Resolved names recorded so far
   */
  entries(): ResolvedEntry[] {
    return Array.from(this.resolved.values(), (entry) => ({
      ...entry,
      addresses: [...entry.addresses],
    }));
  }
}
