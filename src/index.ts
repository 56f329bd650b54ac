/**
 * dnsweep - bounded-concurrency subdomain resolver
 * Main entry point for programmatic usage
 */

import { ScanController, type ScanDependencies } from './core/controller.js';
import type { ScanReport } from './core/types.js';

export { App } from './core/app.js';
export { ScanController, type ScanDependencies } from './core/controller.js';
export { Scheduler, type SchedulerOptions } from './core/scheduler.js';
export { ResultAggregator, type OutcomeListener } from './core/aggregator.js';
export { DnsResolver, classifyDnsError, type DnsResolverOptions } from './core/resolver.js';
export { generateCandidates, countCandidates } from './core/generator.js';
export {
  validateScanConfig,
  isValidDomain,
  DEFAULT_CONCURRENCY,
  DEFAULT_TIMEOUT,
  DEFAULT_RETRIES,
} from './core/config.js';
export { ScanError, InvalidConfigError } from './core/errors.js';
export { FileOutputSink, formatResultLine } from './utils/output.js';
export { loadWordlist, parseWordlist } from './utils/wordlist.js';
export { SpinnerProgressReporter, LogProgressReporter } from './utils/progress.js';
export * from './core/types.js';

/**
 * Version information
 */
export const VERSION = '1.0.0';

/**
 * Quick scan interface for programmatic usage
 * @example
 * ```typescript
 * import { quickScan } from 'dnsweep';
 *
 * const report = await quickScan('example.com', ['www', 'mail', 'api'], {
 *   concurrency: 20,
 *   timeout: 2000,
 * });
 * ```
 */
export async function quickScan(
  domain: string,
  labels: Iterable<string>,
  options: {
    concurrency?: number;
    timeout?: number;
    retries?: number;
  } & ScanDependencies = {}
): Promise<ScanReport> {
  const { concurrency, timeout, retries, ...deps } = options;
  const controller = new ScanController(
    { domain, wordlistSource: labels, concurrency, timeoutPerLookup: timeout, retries },
    deps
  );
  return await controller.run();
}
