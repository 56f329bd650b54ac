// src/core/types.ts
/**
 * Type definitions for dnsweep
 */

/**
 * A fully-qualified name built from a wordlist label and the base domain
 */
export interface Candidate {
  readonly label: string;
  readonly hostname: string;
}

export type FailureKind = 'NameNotFound' | 'Timeout' | 'NetworkError' | 'Other';

/**
 * Why a lookup did not produce addresses
 */
export type FailureReason =
  | { kind: 'NameNotFound' }
  | { kind: 'Timeout' }
  | { kind: 'NetworkError'; detail?: string }
  | { kind: 'Other'; detail: string };

/**
 * Result of a single lookup attempt
 */
export type ResolutionOutcome =
  | { status: 'resolved'; candidate: Candidate; addresses: string[] }
  | { status: 'unresolved'; candidate: Candidate; reason: FailureReason };

/**
 * Final outcome of a candidate once retries are spent
 */
export type RecordedOutcome = ResolutionOutcome & {
  attempts: number;
  duration: number;
};

/**
 * DNS lookup capability
 *
 * Implementations must not reject: every failure is reported as an
 * `unresolved` outcome.
 */
export interface Resolver {
  resolve(candidate: Candidate, timeout: number): Promise<ResolutionOutcome>;
}

/**
 * Progress counters at a point in time
 */
export interface ScanSnapshot {
  completed: number;
  total: number;
  resolved: number;
  inFlight: number;
  failures: Record<FailureKind, number>;
}

export interface ResolvedEntry {
  hostname: string;
  addresses: string[];
  duration: number;
}

/**
 * Final report of one scan (partial when cancelled)
 */
export interface ScanReport {
  domain: string;
  resolved: ResolvedEntry[];
  snapshot: ScanSnapshot;
  cancelled: boolean;
  metadata: ScanMetadata;
}

export interface ScanMetadata {
  startTime: Date;
  endTime: Date;
  duration: number;
}

export interface ProgressReporter {
  start(total: number): void;
  update(snapshot: ScanSnapshot): void;
  stop(snapshot: ScanSnapshot, cancelled: boolean): void;
}

export interface OutputSink {
  write(report: ScanReport): Promise<void>;
}

/**
 * Scan configuration as supplied by callers
 */
export interface ScanConfigInput {
  domain: string;
  wordlistSource: Iterable<string>;
  concurrency?: number;
  timeoutPerLookup?: number;
  retries?: number;
  retryOn?: readonly FailureKind[];
  progressInterval?: number;
  outputSink?: OutputSink;
}

/**
 * Validated scan configuration, frozen for the duration of a run
 */
export interface ScanConfig {
  readonly domain: string;
  readonly wordlistSource: Iterable<string>;
  readonly concurrency: number;
  readonly timeoutPerLookup: number;
  readonly retries: number;
  readonly retryOn: readonly FailureKind[];
  readonly progressInterval: number;
  readonly outputSink?: OutputSink;
}

export type OutputFormat = 'text' | 'json';

/**
 * CLI application configuration
 */
export interface AppConfig {
  domain: string;
  wordlist: string;
  concurrency: number;
  timeout: number;
  retries: number;
  resolvers: string[];
  output?: string;
  format: OutputFormat;
  logFile?: string;
  progress: boolean;
  quiet: boolean;
  verbose: boolean;
}

/**
 * Logger levels
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
