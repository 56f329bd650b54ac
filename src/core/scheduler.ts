/**
 * Bounded worker pool driving DNS lookups
 */

import pLimit from 'p-limit';
import { logger } from '../utils/logger.js';
import type { ResultAggregator } from './aggregator.js';
import type {
  Candidate,
  FailureKind,
  RecordedOutcome,
  ResolutionOutcome,
  Resolver,
} from './types.js';

export interface SchedulerOptions {
  concurrency: number;
  timeout: number;
  retries: number;
  retryOn: readonly FailureKind[];
  signal?: AbortSignal;
}

/**
 * Runs `concurrency` workers over one shared candidate iterator.
 *
 * Workers take candidates in source order; completion order is not
 * preserved. Every lookup passes through a limiter sized to the same cap, so
 * in-flight lookups never exceed it and `inFlight` reports the live count.
 */
export class Scheduler {
  private readonly resolver: Resolver;
  private readonly options: SchedulerOptions;
  private readonly limit: ReturnType<typeof pLimit>;

  constructor(resolver: Resolver, options: SchedulerOptions) {
    this.resolver = resolver;
    this.options = options;
    this.limit = pLimit(options.concurrency);
  }

  /**
   * Lookups currently awaiting the resolver
   */
  get inFlight(): number {
    return this.limit.activeCount;
  }

  private get cancelled(): boolean {
    return this.options.signal?.aborted ?? false;
  }

  /**
   * Resolve candidates until the source is exhausted or the signal aborts.
   * @returns Number of candidates dispatched
   */
  async run(candidates: Iterator<Candidate>, aggregator: ResultAggregator): Promise<number> {
    const workers = Array.from({ length: this.options.concurrency }, (_, id) =>
      this.work(id, candidates, aggregator)
    );
    const dispatched = await Promise.all(workers);
    return dispatched.reduce((sum, n) => sum + n, 0);
  }

  private async work(
    id: number,
    source: Iterator<Candidate>,
    aggregator: ResultAggregator
  ): Promise<number> {
    let dispatched = 0;

    while (!this.cancelled) {
      const next = source.next();
      if (next.done) break;

      dispatched++;
      const outcome = await this.resolveWithRetry(next.value);
      aggregator.record(outcome);
    }

    logger.debug(`Worker ${id} exiting after ${dispatched} candidates`);
    return dispatched;
  }

  /**
   * Resolve one candidate, retrying transient failures up to the retry budget
   */
  private async resolveWithRetry(candidate: Candidate): Promise<RecordedOutcome> {
    const start = Date.now();
    let attempts = 0;

    for (;;) {
      attempts++;
      const outcome = await this.limit(() => this.attempt(candidate));

      const retryable =
        outcome.status === 'unresolved' && this.options.retryOn.includes(outcome.reason.kind);

      if (!retryable || attempts > this.options.retries || this.cancelled) {
        return { ...outcome, attempts, duration: Date.now() - start };
      }

      logger.debug(`Retrying ${candidate.hostname} (attempt ${attempts + 1})`);
    }
  }

  /**
   * One lookup; a resolver that throws is folded into NetworkError
   */
  private async attempt(candidate: Candidate): Promise<ResolutionOutcome> {
    try {
      return await this.resolver.resolve(candidate, this.options.timeout);
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      logger.debug(`Resolver threw for ${candidate.hostname}: ${detail}`);
      return { status: 'unresolved', candidate, reason: { kind: 'NetworkError', detail } };
    }
  }
}
