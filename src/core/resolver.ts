/**
 * DNS resolver adapter over Node's c-ares resolver
 */

import { promises as dns } from 'dns';
import { withTimeout, TimeoutError } from '../utils/concurrency.js';
import { logger } from '../utils/logger.js';
import type { Candidate, FailureReason, ResolutionOutcome, Resolver } from './types.js';

const NOT_FOUND_CODES = new Set(['ENOTFOUND', 'ENODATA']);

const NETWORK_CODES = new Set([
  'ESERVFAIL',
  'EREFUSED',
  'ECONNREFUSED',
  'ECONNRESET',
  'EBADRESP',
  'EBADFAMILY',
  'ECANCELLED',
  'EDESTRUCTION',
  'EFORMERR',
  'ENETUNREACH',
  'EHOSTUNREACH',
]);

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

/**
 * Map a rejected lookup to a failure reason
 */
export function classifyDnsError(error: unknown): FailureReason {
  if (error instanceof TimeoutError) {
    return { kind: 'Timeout' };
  }

  const code = errorCode(error);
  if (code && NOT_FOUND_CODES.has(code)) {
    return { kind: 'NameNotFound' };
  }
  if (code === 'ETIMEOUT') {
    return { kind: 'Timeout' };
  }
  if (code && NETWORK_CODES.has(code)) {
    return { kind: 'NetworkError', detail: code };
  }

  const detail = code ?? (error instanceof Error ? error.message : String(error));
  return { kind: 'Other', detail };
}

const REASON_RANK: Record<FailureReason['kind'], number> = {
  NameNotFound: 0,
  Other: 1,
  NetworkError: 2,
  Timeout: 2,
};

/**
 * Combine the A and AAAA failure reasons: the name is only definitively
 * absent when both families say so, and a transient failure outranks any
 * other so the lookup is retried. Ties keep the A reason.
 */
export function mergeReasons(a: FailureReason, b: FailureReason): FailureReason {
  return REASON_RANK[b.kind] > REASON_RANK[a.kind] ? b : a;
}

export interface DnsResolverOptions {
  /** Nameservers to query instead of the system configuration */
  servers?: string[];
}

/**
 * Resolves a candidate's A and AAAA records. Each call uses its own
 * c-ares channel so a timeout can cancel exactly its own queries.
 */
export class DnsResolver implements Resolver {
  private servers: string[];

  constructor(options: DnsResolverOptions = {}) {
    this.servers = options.servers ?? [];
  }

  async resolve(candidate: Candidate, timeout: number): Promise<ResolutionOutcome> {
    const resolver = new dns.Resolver({ timeout, tries: 1 });
    if (this.servers.length > 0) {
      resolver.setServers(this.servers);
    }

    try {
      const [v4, v6] = await withTimeout(
        Promise.allSettled([resolver.resolve4(candidate.hostname), resolver.resolve6(candidate.hostname)]),
        timeout,
        () => resolver.cancel()
      );

      const addresses = [
        ...(v4.status === 'fulfilled' ? v4.value : []),
        ...(v6.status === 'fulfilled' ? v6.value : []),
      ];

      if (addresses.length > 0) {
        return { status: 'resolved', candidate, addresses };
      }

      const reasonOf = (settled: PromiseSettledResult<string[]>): FailureReason =>
        settled.status === 'rejected' ? classifyDnsError(settled.reason) : { kind: 'NameNotFound' };

      const reason = mergeReasons(reasonOf(v4), reasonOf(v6));
      logger.debug(`${candidate.hostname} unresolved: ${reason.kind}`);
      return { status: 'unresolved', candidate, reason };
    } catch (error) {
      return { status: 'unresolved', candidate, reason: classifyDnsError(error) };
    }
  }
}
