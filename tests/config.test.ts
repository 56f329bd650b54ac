/**
 * Tests for scan configuration validation
 */

import { describe, it, expect } from 'vitest';
import { isValidDomain, normalizeDomain, validateScanConfig } from '../src/core/config.js';
import { InvalidConfigError } from '../src/core/errors.js';
import type { ScanConfigInput } from '../src/core/types.js';

const base = { domain: 'example.com', wordlistSource: ['www'] };

describe('validateScanConfig', () => {
  it('should apply defaults', () => {
    const config = validateScanConfig(base);

    expect(config).toMatchObject({
      domain: 'example.com',
      concurrency: 50,
      timeoutPerLookup: 3000,
      retries: 1,
      retryOn: ['Timeout', 'NetworkError'],
      progressInterval: 250,
    });
    expect(Object.isFrozen(config)).toBe(true);
  });

  const invalid: Array<[Partial<ScanConfigInput>, string]> = [
    [{ concurrency: 0 }, 'concurrency'],
    [{ concurrency: -3 }, 'concurrency'],
    [{ concurrency: 2.5 }, 'concurrency'],
    [{ timeoutPerLookup: 0 }, 'timeoutPerLookup'],
    [{ timeoutPerLookup: Number.NaN }, 'timeoutPerLookup'],
    [{ retries: -1 }, 'retries'],
    [{ progressInterval: 0 }, 'progressInterval'],
    [{ domain: '   ' }, 'domain'],
    [{ domain: '...' }, 'domain'],
    [{ domain: 'exa mple!!' }, 'domain'],
    [{ domain: 'localhost' }, 'domain'],
  ];

  it.each(invalid)('should reject %o', (overrides, field) => {
    const error = (() => {
      try {
        validateScanConfig({ ...base, ...overrides });
        return undefined;
      } catch (e) {
        return e;
      }
    })();

    expect(error).toBeInstanceOf(InvalidConfigError);
    expect(error).toMatchObject({ field });
  });

  it('should refuse to retry NameNotFound', () => {
    expect(() => validateScanConfig({ ...base, retryOn: ['Timeout', 'NameNotFound'] })).toThrow(
      'NameNotFound is a definitive answer and cannot be retried'
    );
  });

  it('should name the rejected domain', () => {
    expect(() => validateScanConfig({ ...base, domain: 'exa mple!!' })).toThrow('Invalid domain: exa mple!!');
  });

  it('should allow retries to be disabled', () => {
    expect(validateScanConfig({ ...base, retries: 0 }).retries).toBe(0);
  });
});

describe('normalizeDomain', () => {
  it('should lowercase and strip dots and whitespace', () => {
    expect(normalizeDomain('  .Example.COM.  ')).toBe('example.com');
  });
});

describe('isValidDomain', () => {
  it('should accept registrable names', () => {
    expect(isValidDomain('example.com')).toBe(true);
    expect(isValidDomain('sub.example.co.uk')).toBe(true);
  });

  it('should reject malformed names', () => {
    expect(isValidDomain('localhost')).toBe(false);
    expect(isValidDomain('-bad.example.com')).toBe(false);
    expect(isValidDomain('exa mple.com')).toBe(false);
  });
});
