/**
 * CNAME chain resolution
 */

import { Resolver } from 'dns/promises';
import { CacheManager } from './cache.js';
import { errorCode, errorMessage } from './errors.js';
import { logger } from '../utils/logger.js';
import type { DnsResolver, ResolutionResult, ResolutionStatus } from './types.js';

export const DEFAULT_RESOLVERS = ['8.8.8.8', '1.1.1.1'];
export const DEFAULT_MAX_DEPTH = 8;

/**
 * The part of a DNS resolver the chain walk needs.
 * `node:dns/promises` Resolver satisfies it.
 */
export interface DnsClient {
  resolveCname(hostname: string): Promise<string[]>;
  cancel(): void;
}

/** Creates a client whose queries give up after `timeout` ms */
export type DnsClientFactory = (timeout: number) => DnsClient;

export function createDnsClientFactory(servers: readonly string[] = DEFAULT_RESOLVERS) {
  return (timeout: number): DnsClient => {
    const resolver = new Resolver({ timeout, tries: 1 });
    if (servers.length > 0) {
      resolver.setServers([...servers]);
    }
    return resolver;
  };
}

export interface CnameResolverOptions {
  clientFactory?: DnsClientFactory;
  servers?: readonly string[];
  /** Hops allowed before the chain counts as runaway */
  maxDepth?: number;
  cache?: CacheManager<string[]>;
}

const FIRST_HOP_STATUS: Partial<Record<string, ResolutionStatus>> = {
  ENODATA: 'NO_RECORD',
  ENOTFOUND: 'NXDOMAIN',
  ETIMEOUT: 'TIMEOUT',
};

/** One chain walk: its own client, and whether its deadline has passed */
interface ChainQuery {
  client: DnsClient;
  expired: boolean;
}

const normalizeTarget = (name: string) => name.trim().toLowerCase().replace(/\.+$/, '');

/**
 * Walks CNAME chains. Never throws: every fault ends up in the result's
 * status.
 */
export class CnameResolver implements DnsResolver {
  private createClient: DnsClientFactory;
  private maxDepth: number;
  private cache: CacheManager<string[]>;

  constructor(options: CnameResolverOptions = {}) {
    this.createClient = options.clientFactory ?? createDnsClientFactory(options.servers);
    this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
    this.cache = options.cache ?? new CacheManager<string[]>(5000, 3600000); // 1 hour TTL
  }

  /**
   * @param timeout milliseconds, for the whole chain
   */
  async resolve(candidate: string, timeout: number): Promise<ResolutionResult> {
    const name = normalizeTarget(candidate);
    const query: ChainQuery = { client: this.createClient(timeout), expired: false };
    let timer: NodeJS.Timeout | undefined;

    const deadline = new Promise<ResolutionResult>((resolve) => {
      timer = setTimeout(() => {
        query.expired = true;
        query.client.cancel();
        resolve({ candidate: name, cnameChain: [], status: 'TIMEOUT' });
      }, timeout);
    });

    try {
      return await Promise.race([this.walkChain(query, name), deadline]);
    } finally {
      clearTimeout(timer);
    }
  }

  private async walkChain(query: ChainQuery, candidate: string): Promise<ResolutionResult> {
    const chain: string[] = [];
    let current = candidate;

    for (;;) {
      let targets: string[];
      try {
        targets = await this.lookup(query, current);
      } catch (error) {
        const code = errorCode(error);

        if (chain.length === 0) {
          const status = (code ? FIRST_HOP_STATUS[code] : undefined) ?? 'ERROR';
          logger.debug(`CNAME lookup ${candidate} -> ${code ?? errorMessage(error)}`);
          return status === 'ERROR'
            ? { candidate, cnameChain: chain, status, error: code ?? errorMessage(error) }
            : { candidate, cnameChain: chain, status };
        }

        // the walk ends at the first hop without a further alias
        if (code === 'ENOTFOUND') {
          return { candidate, cnameChain: chain, status: 'RESOLVED', dangling: true };
        }
        if (code !== 'ENODATA') {
          logger.debug(`CNAME lookup ${current} failed mid-chain: ${code ?? errorMessage(error)}`);
        }
        return { candidate, cnameChain: chain, status: 'RESOLVED' };
      }

      const next = targets.length > 0 ? normalizeTarget(targets[0]) : '';
      if (!next) {
        return chain.length === 0
          ? { candidate, cnameChain: chain, status: 'NO_RECORD' }
          : { candidate, cnameChain: chain, status: 'RESOLVED' };
      }

      if (next === candidate || chain.includes(next)) {
        return { candidate, cnameChain: chain, status: 'ERROR', error: `CNAME loop at ${next}` };
      }
      if (chain.length >= this.maxDepth) {
        return {
          candidate,
          cnameChain: chain,
          status: 'ERROR',
          error: `CNAME chain longer than ${this.maxDepth} hops`,
        };
      }

      chain.push(next);
      current = next;
    }
  }

  private async lookup(query: ChainQuery, hostname: string): Promise<string[]> {
    const key = `cname:${hostname}`;
    try {
      return await this.cache.getOrSet(key, () => query.client.resolveCname(hostname));
    } catch (error) {
      // the shared query belonged to another walk whose deadline cancelled it
      if (errorCode(error) !== 'ECANCELLED' || query.expired) throw error;

      const targets = await query.client.resolveCname(hostname);
      this.cache.set(key, targets);
      return targets;
    }
  }
}
