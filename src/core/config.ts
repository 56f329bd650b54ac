/**
 * Scan configuration defaults and validation
 */

import { InvalidConfigError } from './errors.js';
import type { FailureKind, ScanConfig, ScanConfigInput } from './types.js';

export const DEFAULT_CONCURRENCY = 50;
export const DEFAULT_TIMEOUT = 3000;
export const DEFAULT_RETRIES = 1;
export const DEFAULT_RETRY_ON: readonly FailureKind[] = ['Timeout', 'NetworkError'];
export const DEFAULT_PROGRESS_INTERVAL = 250;

/**
 * Validate domain format
 */
export function isValidDomain(domain: string): boolean {
  const domainRegex = /^(?:[a-zA-Z0-9](?:[a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?\.)+[a-zA-Z]{2,}$/;
  return domainRegex.test(domain);
}

/**
 * Lowercase the domain and strip surrounding whitespace and dots
 */
export function normalizeDomain(domain: string): string {
  return domain.trim().toLowerCase().replace(/^\.+|\.+$/g, '');
}

function requirePositiveInteger(field: string, value: number): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new InvalidConfigError(field, `${field} must be a positive integer, got ${value}`);
  }
  return value;
}

/**
 * Fill defaults and check every option, throwing InvalidConfigError on the first bad one
 */
export function validateScanConfig(input: ScanConfigInput): ScanConfig {
  const domain = normalizeDomain(input.domain);
  if (!domain) {
    throw new InvalidConfigError('domain', 'domain must not be empty');
  }
  if (!isValidDomain(domain)) {
    throw new InvalidConfigError('domain', `Invalid domain: ${input.domain}`);
  }

  const concurrency = requirePositiveInteger('concurrency', input.concurrency ?? DEFAULT_CONCURRENCY);

  const timeoutPerLookup = input.timeoutPerLookup ?? DEFAULT_TIMEOUT;
  if (!Number.isFinite(timeoutPerLookup) || timeoutPerLookup <= 0) {
    throw new InvalidConfigError(
      'timeoutPerLookup',
      `timeoutPerLookup must be a positive number of milliseconds, got ${timeoutPerLookup}`
    );
  }

  const retries = input.retries ?? DEFAULT_RETRIES;
  if (!Number.isInteger(retries) || retries < 0) {
    throw new InvalidConfigError('retries', `retries must be a non-negative integer, got ${retries}`);
  }

  const retryOn = input.retryOn ?? DEFAULT_RETRY_ON;
  if (retryOn.includes('NameNotFound')) {
    throw new InvalidConfigError('retryOn', 'NameNotFound is a definitive answer and cannot be retried');
  }

  const progressInterval = requirePositiveInteger(
    'progressInterval',
    input.progressInterval ?? DEFAULT_PROGRESS_INTERVAL
  );

  return Object.freeze({
    domain,
    wordlistSource: input.wordlistSource,
    concurrency,
    timeoutPerLookup,
    retries,
    retryOn: Object.freeze([...retryOn]),
    progressInterval,
    outputSink: input.outputSink,
  });
}
