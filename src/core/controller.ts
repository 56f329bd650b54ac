/**
 * Run controller: one instance owns the state of exactly one scan
 */

import { logger } from '../utils/logger.js';
import { ResultAggregator, type OutcomeListener } from './aggregator.js';
import { validateScanConfig } from './config.js';
import { InvalidConfigError, ScanError } from './errors.js';
import { countCandidates, generateCandidates } from './generator.js';
import { DnsResolver } from './resolver.js';
import { Scheduler } from './scheduler.js';
import type {
  ProgressReporter,
  Resolver,
  ScanConfig,
  ScanConfigInput,
  ScanReport,
  ScanSnapshot,
} from './types.js';

export interface ScanDependencies {
  /** Defaults to a DnsResolver using the system nameservers */
  resolver?: Resolver;
  reporter?: ProgressReporter;
  /** Called with every final outcome, in recording order */
  onOutcome?: OutcomeListener;
  /** Aborting this signal cancels the scan, like cancel() */
  signal?: AbortSignal;
}

export class ScanController {
  readonly config: ScanConfig;
  private readonly resolver: Resolver;
  private readonly reporter?: ProgressReporter;
  private readonly onOutcome?: OutcomeListener;
  private readonly abort = new AbortController();
  private readonly signal?: AbortSignal;
  private readonly onAbort = () => this.cancel();
  private aggregator?: ResultAggregator;
  private scheduler?: Scheduler;
  private started = false;

  /**
   * @throws InvalidConfigError before anything is resolved
   */
  constructor(input: ScanConfigInput, deps: ScanDependencies = {}) {
    this.config = validateScanConfig(input);
    this.resolver = deps.resolver ?? new DnsResolver();
    this.reporter = deps.reporter;
    this.onOutcome = deps.onOutcome;

    this.signal = deps.signal;
    if (this.signal?.aborted) {
      this.cancel();
    } else {
      this.signal?.addEventListener('abort', this.onAbort, { once: true });
    }
  }

  get cancelled(): boolean {
    return this.abort.signal.aborted;
  }

  /**
   * Stop dispatching new candidates. Lookups already in flight finish
   * within their timeout and are still recorded.
   * @returns true on the first call, false afterwards
   */
  cancel(): boolean {
    if (this.abort.signal.aborted) {
      return false;
    }
    this.abort.abort();
    logger.debug('Scan cancellation requested');
    return true;
  }

  /**
   * Progress counters; all zero before run() starts
   */
  snapshot(): ScanSnapshot {
    if (!this.aggregator) {
      return {
        completed: 0,
        total: 0,
        resolved: 0,
        inFlight: 0,
        failures: { NameNotFound: 0, Timeout: 0, NetworkError: 0, Other: 0 },
      };
    }
    return this.aggregator.snapshot(this.scheduler?.inFlight ?? 0);
  }

  /**
   * Run the scan to completion or cancellation
   */
  async run(): Promise<ScanReport> {
    if (this.started) {
      throw new ScanError('A ScanController can only run once');
    }
    this.started = true;

    try {
      return await this.execute();
    } finally {
      this.signal?.removeEventListener('abort', this.onAbort);
    }
  }

  private async execute(): Promise<ScanReport> {
    const startTime = new Date();
    const labels = this.readLabels();
    const total = countCandidates(labels);

    const aggregator = new ResultAggregator(total, this.onOutcome);
    const scheduler = new Scheduler(this.resolver, {
      concurrency: this.config.concurrency,
      timeout: this.config.timeoutPerLookup,
      retries: this.config.retries,
      retryOn: this.config.retryOn,
      signal: this.abort.signal,
    });
    this.aggregator = aggregator;
    this.scheduler = scheduler;

    logger.debug(
      `Scanning ${total} candidates for ${this.config.domain} with ${this.config.concurrency} workers`
    );

    this.reporter?.start(total);
    const timer = this.reporter
      ? setInterval(() => this.report(), this.config.progressInterval)
      : undefined;

    try {
      await scheduler.run(generateCandidates(this.config.domain, labels), aggregator);
    } finally {
      clearInterval(timer);
    }

    const snapshot = this.snapshot();
    this.reporter?.stop(snapshot, this.cancelled);

    const endTime = new Date();
    const report: ScanReport = {
      domain: this.config.domain,
      resolved: aggregator.entries(),
      snapshot,
      cancelled: this.cancelled,
      metadata: {
        startTime,
        endTime,
        duration: endTime.getTime() - startTime.getTime(),
      },
    };

    if (this.config.outputSink) {
      try {
        await this.config.outputSink.write(report);
      } catch (error) {
        logger.error('Failed to write results:', error);
        throw error;
      }
    }

    return report;
  }

  private report(): void {
    try {
      this.reporter?.update(this.snapshot());
    } catch (error) {
      logger.warn('Progress reporter failed:', error);
    }
  }

  private readLabels(): string[] {
    try {
      return Array.from(this.config.wordlistSource);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new InvalidConfigError('wordlistSource', `Cannot read wordlist: ${reason}`, {
        cause: error,
      });
    }
  }
}
