/**
 * Error types raised before or around a scan
 */

export class ScanError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ScanError';
  }
}

/**
 * Raised when a scan cannot start: bad domain, concurrency, timeout or wordlist
 */
export class InvalidConfigError extends ScanError {
  readonly field: string;

  constructor(field: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'InvalidConfigError';
    this.field = field;
  }
}
