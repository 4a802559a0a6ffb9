/**
 * Tests for CnameResolver
 */

import { describe, it, expect, vi } from 'vitest';
import { CnameResolver, type DnsClient } from '../src/core/resolver.js';
import { CacheManager } from '../src/core/cache.js';

const dnsError = (code: string) => Object.assign(new Error(`queryCname ${code}`), { code });

/**
 * In-memory DNS: a list of targets per name, an error code, or `hang`
 * for a query that never answers. Unknown names answer ENODATA.
 */
class FakeDns implements DnsClient {
  readonly queries: string[] = [];
  cancelled = false;

  constructor(private readonly records: Record<string, string[] | string>) {}

  resolveCname(hostname: string): Promise<string[]> {
    this.queries.push(hostname);
    const record = this.records[hostname];
    if (record === 'hang') return new Promise<string[]>(() => {});
    if (record === undefined) return Promise.reject(dnsError('ENODATA'));
    if (typeof record === 'string') return Promise.reject(dnsError(record));
    return Promise.resolve(record);
  }

  cancel(): void {
    this.cancelled = true;
  }
}

/**
 * DNS whose answers arrive after a delay. `cancel` rejects the queries
 * still open on this client with ECANCELLED.
 */
class DelayedDns implements DnsClient {
  private open = new Set<(error: Error) => void>();

  constructor(private readonly records: Record<string, { targets: string[]; delay: number }>) {}

  resolveCname(hostname: string): Promise<string[]> {
    const record = this.records[hostname];
    if (record === undefined) return Promise.reject(dnsError('ENODATA'));

    return new Promise<string[]>((resolve, reject) => {
      const fail = (error: Error) => {
        clearTimeout(timer);
        reject(error);
      };
      const timer = setTimeout(() => {
        this.open.delete(fail);
        resolve(record.targets);
      }, record.delay);
      this.open.add(fail);
    });
  }

  cancel(): void {
    for (const fail of this.open) fail(dnsError('ECANCELLED'));
    this.open.clear();
  }
}

const resolverFor = (dns: FakeDns, maxDepth?: number) =>
  new CnameResolver({ clientFactory: () => dns, maxDepth });

describe('CnameResolver', () => {
  it('should report a host without CNAME as NO_RECORD', async () => {
    const result = await resolverFor(new FakeDns({})).resolve('www.example.com', 1000);

    expect(result).toEqual({ candidate: 'www.example.com', cnameChain: [], status: 'NO_RECORD' });
  });

  it('should map first-hop failures to statuses', async () => {
    const dns = new FakeDns({
      'gone.example.com': 'ENOTFOUND',
      'slow.example.com': 'ETIMEOUT',
      'bad.example.com': 'ESERVFAIL',
    });
    const resolver = resolverFor(dns);

    expect((await resolver.resolve('gone.example.com', 1000)).status).toBe('NXDOMAIN');
    expect((await resolver.resolve('slow.example.com', 1000)).status).toBe('TIMEOUT');
    expect(await resolver.resolve('bad.example.com', 1000)).toEqual({
      candidate: 'bad.example.com',
      cnameChain: [],
      status: 'ERROR',
      error: 'ESERVFAIL',
    });
  });

  it('should follow a chain and normalize targets', async () => {
    const dns = new FakeDns({
      'blog.example.com': ['Example.GitHub.io.'],
    });

    const result = await resolverFor(dns).resolve('Blog.Example.com', 1000);

    expect(result).toEqual({
      candidate: 'blog.example.com',
      cnameChain: ['example.github.io'],
      status: 'RESOLVED',
    });
    expect(dns.queries).toEqual(['blog.example.com', 'example.github.io']);
  });

  it('should follow multi-hop chains in order', async () => {
    const dns = new FakeDns({
      'cdn.example.com': ['cdn.example.net'],
      'cdn.example.net': ['cdn.example.net.edgekey.net'],
      'cdn.example.net.edgekey.net': ['e1.akamaiedge.net'],
    });

    const result = await resolverFor(dns).resolve('cdn.example.com', 1000);

    expect(result.cnameChain).toEqual(
      ['cdn.example.net', 'cdn.example.net.edgekey.net', 'e1.akamaiedge.net']
    );
    expect(result.status).toBe('RESOLVED');
  });

  it('should mark a chain whose target does not exist as dangling', async () => {
    const dns = new FakeDns({
      'shop.example.com': ['old-shop.myshopify.com'],
      'old-shop.myshopify.com': 'ENOTFOUND',
    });

    const result = await resolverFor(dns).resolve('shop.example.com', 1000);

    expect(result).toEqual({
      candidate: 'shop.example.com',
      cnameChain: ['old-shop.myshopify.com'],
      status: 'RESOLVED',
      dangling: true,
    });
  });

  it('should keep the chain when a later hop fails', async () => {
    const dns = new FakeDns({
      'app.example.com': ['app.example.net'],
      'app.example.net': 'ESERVFAIL',
    });

    const result = await resolverFor(dns).resolve('app.example.com', 1000);

    expect(result).toEqual(
      { candidate: 'app.example.com', cnameChain: ['app.example.net'], status: 'RESOLVED' }
    );
  });

  it('should stop at a CNAME loop', async () => {
    const dns = new FakeDns({
      'a.example.com': ['b.example.com'],
      'b.example.com': ['a.example.com'],
    });

    const result = await resolverFor(dns).resolve('a.example.com', 1000);

    expect(result).toEqual({
      candidate: 'a.example.com',
      cnameChain: ['b.example.com'],
      status: 'ERROR',
      error: 'CNAME loop at a.example.com',
    });
  });

  it('should stop a chain longer than the depth limit', async () => {
    const dns = new FakeDns({
      'h0.example.com': ['h1.example.com'],
      'h1.example.com': ['h2.example.com'],
      'h2.example.com': ['h3.example.com'],
      'h3.example.com': ['h4.example.com'],
    });

    const result = await resolverFor(dns, 3).resolve('h0.example.com', 1000);

    expect(result.status).toBe('ERROR');
    expect(result.error).toBe('CNAME chain longer than 3 hops');
    expect(result.cnameChain).toEqual(['h1.example.com', 'h2.example.com', 'h3.example.com']);
  });

  it('should time out a query that never answers', async () => {
    const dns = new FakeDns({ 'hang.example.com': 'hang' });

    const result = await resolverFor(dns).resolve('hang.example.com', 20);

    expect(result).toEqual({ candidate: 'hang.example.com', cnameChain: [], status: 'TIMEOUT' });
    expect(dns.cancelled).toBe(true);
  });

  it('should create clients with the requested timeout', async () => {
    const dns = new FakeDns({});
    const factory = vi.fn((_timeout: number) => dns);

    await new CnameResolver({ clientFactory: factory }).resolve('www.example.com', 750);

    expect(factory).toHaveBeenCalledWith(750);
  });

  it('should cache answered lookups', async () => {
    const dns = new FakeDns({ 'blog.example.com': ['example.github.io'] });
    const cache = new CacheManager<string[]>(100, 60000);
    const resolver = new CnameResolver({ clientFactory: () => dns, cache });

    await resolver.resolve('blog.example.com', 1000);
    await resolver.resolve('blog.example.com', 1000);

    expect(dns.queries.filter((q) => q === 'blog.example.com')).toHaveLength(1);
    expect(cache.get('cname:blog.example.com')).toEqual(['example.github.io']);
    // failed lookups are not cached
    expect(dns.queries.filter((q) => q === 'example.github.io')).toHaveLength(2);
  });

  it('should not let one chain deadline cut short another chain sharing a hop', async () => {
    const records = {
      'a.example.com': { targets: ['shared.cdn.example.net'], delay: 0 },
      'b.example.com': { targets: ['shared.cdn.example.net'], delay: 0 },
      'shared.cdn.example.net': { targets: ['old.herokuapp.com'], delay: 80 },
    };
    const resolver = new CnameResolver({ clientFactory: () => new DelayedDns(records) });

    const first = resolver.resolve('a.example.com', 50);
    await new Promise((resolve) => setTimeout(resolve, 30));
    const second = resolver.resolve('b.example.com', 200);

    expect(await first).toEqual({ candidate: 'a.example.com', cnameChain: [], status: 'TIMEOUT' });
    expect(await second).toEqual({
      candidate: 'b.example.com',
      cnameChain: ['shared.cdn.example.net', 'old.herokuapp.com'],
      status: 'RESOLVED',
    });
  });
});
