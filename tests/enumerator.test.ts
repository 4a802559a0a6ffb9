/**
 * Tests for SubdomainEnumerator and its parsers
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  SubdomainEnumerator,
  isWithinDomain,
  loadWordlist,
  normalizeHostname,
  parseCertificateNames,
  parseWordlist,
} from '../src/core/enumerator.js';
import { ConfigurationError, DiscoveryError } from '../src/core/errors.js';

const jsonResponse = (data: unknown, status = 200) =>
  new Response(JSON.stringify(data), { status, headers: { 'content-type': 'application/json' } });

describe('SubdomainEnumerator', () => {
  const fetchMock = vi.fn((_url: string, _init?: RequestInit) => Promise.resolve(jsonResponse([])));

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe('discover', () => {
    it('should query crt.sh for the domain', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse([]));

      await new SubdomainEnumerator({ retries: 0 }).discover('example.com');

      expect(fetchMock).toHaveBeenCalledTimes(1);
      expect(fetchMock.mock.calls[0][0]).toBe('https://crt.sh/?q=%25.example.com&output=json');
    });

    it('should collect subdomains from certificate records', async () => {
      fetchMock.mockResolvedValueOnce(
        jsonResponse([
          { name_value: 'www.example.com' },
          { name_value: 'api.example.com\nwww.example.com' },
          { common_name: 'mail.example.com' },
        ])
      );

      const result = await new SubdomainEnumerator({ retries: 0 }).discover('example.com');

      expect([...result.candidates].sort()).toEqual(
        ['api.example.com', 'mail.example.com', 'www.example.com']
      );
      expect(result.passive).toBe(3);
      expect(result.active).toBe(0);
      expect(result.errors).toEqual([]);
    });

    it('should record a crt.sh failure without throwing', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ error: 'busy' }, 503));

      const result = await new SubdomainEnumerator({ retries: 0 }).discover('example.com');

      expect(result.candidates.size).toBe(0);
      expect(result.errors).toEqual(['crt.sh enumeration failed: crt.sh returned 503']);
    });

    it('should retry a failed crt.sh request', async () => {
      fetchMock
        .mockRejectedValueOnce(new Error('socket hang up'))
        .mockResolvedValueOnce(jsonResponse([{ name_value: 'dev.example.com' }]));

      const enumerator = new SubdomainEnumerator({ retries: 1, retryDelay: 1 });
      const result = await enumerator.discover('example.com');

      expect(fetchMock).toHaveBeenCalledTimes(2);
      expect([...result.candidates]).toEqual(['dev.example.com']);
      expect(result.errors).toEqual([]);
    });

    it('should still use the wordlist when crt.sh fails', async () => {
      fetchMock.mockRejectedValueOnce(new Error('Network error'));

      const result = await new SubdomainEnumerator({ retries: 0 }).discover('example.com', ['www']);

      expect([...result.candidates]).toEqual(['www.example.com']);
      expect(result.errors).toEqual(['crt.sh enumeration failed: Network error']);
    });

    it('should return nothing for an empty wordlist and unreachable crt.sh', async () => {
      fetchMock.mockRejectedValueOnce(new Error('getaddrinfo ENOTFOUND crt.sh'));

      const result = await new SubdomainEnumerator({ retries: 0 }).discover('example.com', []);

      expect(result.candidates.size).toBe(0);
      expect(result.errors).toHaveLength(1);
    });

    it('should skip crt.sh in active-only mode', async () => {
      const result = await new SubdomainEnumerator({ passive: false }).discover('Example.com', [
        'www',
        'api',
        'www',
      ]);

      expect(fetchMock).not.toHaveBeenCalled();
      expect([...result.candidates]).toEqual(['www.example.com', 'api.example.com']);
      expect(result.active).toBe(2);
    });

    it('should merge passive and active names without duplicates', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse([{ name_value: 'www.example.com' }]));

      const enumerator = new SubdomainEnumerator({ retries: 0 });
      const result = await enumerator.discover('example.com', ['www', 'blog']);

      expect([...result.candidates].sort()).toEqual(['blog.example.com', 'www.example.com']);
      expect(result.passive).toBe(1);
      expect(result.active).toBe(2);
    });
  });
});

describe('parseCertificateNames', () => {
  it('should keep names below the domain and drop the rest', () => {
    const names = parseCertificateNames(
      [
        { name_value: 'www.example.com\nAPI.Example.com' },
        { name_value: 'evil-example.com' },
        { name_value: 'mail.other.org' },
        { name_value: 'admin@example.com' },
        { name_value: 'a..example.com' },
        null,
        'www2.example.com',
      ],
      'example.com'
    );

    expect([...names].sort()).toEqual(['api.example.com', 'www.example.com']);
  });

  it('should strip wildcard labels', () => {
    const names = parseCertificateNames([{ common_name: '*.dev.example.com' }], 'example.com');
    expect([...names]).toEqual(['dev.example.com']);
  });

  it('should not turn an apex wildcard into the bare domain', () => {
    expect(parseCertificateNames([{ name_value: '*.example.com' }], 'example.com').size).toBe(0);
  });

  it('should keep the bare domain when named literally', () => {
    const names = parseCertificateNames([{ name_value: 'example.com' }], 'example.com');
    expect([...names]).toEqual(['example.com']);
  });

  it('should reject a payload that is not a list', () => {
    expect(() => parseCertificateNames({ message: 'rate limited' }, 'example.com')).toThrow(
      DiscoveryError
    );
  });
});

describe('hostname helpers', () => {
  it('should normalize hostnames', () => {
    expect(normalizeHostname(' WWW.Example.com. ')).toBe('www.example.com');
    expect(normalizeHostname('bad_name.example.com')).toBeNull();
    expect(normalizeHostname('')).toBeNull();
  });

  it('should check label boundaries', () => {
    expect(isWithinDomain('a.example.com', 'example.com')).toBe(true);
    expect(isWithinDomain('example.com', 'example.com')).toBe(true);
    expect(isWithinDomain('badexample.com', 'example.com')).toBe(false);
  });
});

describe('wordlists', () => {
  it('should parse one label per line', () => {
    expect(parseWordlist('www\n# comment\n\n  API  \r\nwww\n.dev.\n')).toEqual(
      ['www', 'api', 'dev']
    );
  });

  it('should load a wordlist file', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'wordlist-'));
    try {
      const path = join(dir, 'words.txt');
      await writeFile(path, 'blog\nshop\n');
      expect(await loadWordlist(path)).toEqual(['blog', 'shop']);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it('should fail with a ConfigurationError for an unreadable file', async () => {
    await expect(loadWordlist(join(tmpdir(), 'no-such-wordlist.txt'))).rejects.toBeInstanceOf(
      ConfigurationError
    );
  });
});
