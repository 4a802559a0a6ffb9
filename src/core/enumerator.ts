/**
 * Subdomain enumeration: certificate transparency + wordlist
 */

import { readFile } from 'fs/promises';
import { retryWithBackoff } from '../utils/concurrency.js';
import { logger } from '../utils/logger.js';
import { ConfigurationError, DiscoveryError, errorMessage } from './errors.js';
import type { DiscoveryResult, SubdomainSource } from './types.js';

const CRTSH_ENDPOINT = 'https://crt.sh/';
const HOSTNAME_CHARS = /^[a-z0-9.-]+$/;

export interface EnumeratorOptions {
  /** Query certificate transparency logs (default true) */
  passive?: boolean;
  /** crt.sh request timeout in milliseconds */
  passiveTimeout?: number;
  /** Retries after a failed crt.sh request */
  retries?: number;
  /** Initial backoff between retries in milliseconds */
  retryDelay?: number;
  userAgent?: string;
}

/**
 * Lower-case a name and drop a trailing dot. Returns null for anything that
 * is not a plain hostname.
 */
export function normalizeHostname(name: string): string | null {
  const host = name.trim().toLowerCase().replace(/\.+$/, '');
  if (!host || !HOSTNAME_CHARS.test(host)) return null;
  if (host.split('.').some((label) => label.length === 0)) return null;
  return host;
}

/**
 * True when `host` is `domain` itself or sits below it on a label boundary
 */
export function isWithinDomain(host: string, domain: string): boolean {
  return host === domain || host.endsWith(`.${domain}`);
}

/**
 * Extract subdomains of `domain` from a crt.sh JSON payload.
 *
 * Wildcard names contribute their base (`*.dev.example.com` gives
 * `dev.example.com`), except the apex: `*.example.com` does not name
 * `example.com`, only a literal record does.
 */
export function parseCertificateNames(records: unknown, domain: string): Set<string> {
  if (!Array.isArray(records)) {
    throw new DiscoveryError('crt.sh returned an unexpected payload', 'crt.sh');
  }

  const list: readonly unknown[] = records;
  const names = new Set<string>();

  for (const record of list) {
    if (typeof record !== 'object' || record === null) continue;

    const fields: unknown[] = [
      'name_value' in record ? record.name_value : undefined,
      'common_name' in record ? record.common_name : undefined,
    ];

    for (const field of fields) {
      if (typeof field !== 'string') continue;

      for (const raw of field.split('\n')) {
        const trimmed = raw.trim().toLowerCase();
        const wildcard = trimmed.startsWith('*.');
        const host = normalizeHostname(wildcard ? trimmed.slice(2) : trimmed);

        if (!host || !isWithinDomain(host, domain)) continue;
        if (wildcard && host === domain) continue;

        names.add(host);
      }
    }
  }

  return names;
}

/**
 * Parse wordlist content: one label per line, blanks and `#` comments
 * ignored, order kept, duplicates dropped
 */
export function parseWordlist(content: string): string[] {
  const words = content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line && !line.startsWith('#'))
    .map((line) => line.toLowerCase().replace(/^\.+|\.+$/g, ''))
    .filter((line) => line.length > 0);

  return Array.from(new Set(words));
}

/**
 * Read a wordlist file. An unreadable file is fatal.
 */
export async function loadWordlist(path: string): Promise<string[]> {
  try {
    const content = await readFile(path, 'utf-8');
    return parseWordlist(content);
  } catch (error) {
    throw new ConfigurationError(`Wordlist file not readable: ${path} (${errorMessage(error)})`, {
      cause: error,
    });
  }
}

/**
 * Multi-source subdomain enumerator
 */
export class SubdomainEnumerator implements SubdomainSource {
  private passive: boolean;
  private passiveTimeout: number;
  private retries: number;
  private retryDelay: number;
  private userAgent: string;

  constructor(options: EnumeratorOptions = {}) {
    this.passive = options.passive ?? true;
    this.passiveTimeout = options.passiveTimeout ?? 30000;
    this.retries = options.retries ?? 2;
    this.retryDelay = options.retryDelay ?? 1000;
    this.userAgent = options.userAgent ?? 'takeover-scout/1.0';
  }

  /**
   * Enumerate candidates from all sources. Passive failures are recorded
   * in `errors`, never thrown.
   */
  async discover(domain: string, wordlist?: readonly string[]): Promise<DiscoveryResult> {
    const target = domain.toLowerCase();
    const errors: string[] = [];

    let passive = new Set<string>();
    if (this.passive) {
      try {
        passive = await this.enumerateFromCrtSh(target);
        logger.success(`Found ${passive.size} subdomains from crt.sh`);
      } catch (error) {
        const message = `crt.sh enumeration failed: ${errorMessage(error)}`;
        errors.push(message);
        logger.warn(message);
      }
    }

    const active = wordlist ? this.enumerateFromWordlist(target, wordlist) : new Set<string>();
    if (wordlist) {
      logger.info(`Generated ${active.size} candidates from wordlist`);
    }

    const candidates = new Set<string>([...passive, ...active]);
    logger.info(`Total unique subdomains: ${candidates.size}`);

    return { candidates, passive: passive.size, active: active.size, errors };
  }

  /**
   * Query crt.sh (certificate transparency)
   */
  private async enumerateFromCrtSh(domain: string): Promise<Set<string>> {
    logger.info('Querying crt.sh...');
    const url = `${CRTSH_ENDPOINT}?q=${encodeURIComponent(`%.${domain}`)}&output=json`;

    const records = await retryWithBackoff(
      async () => {
        const response = await fetch(url, {
          headers: { 'User-Agent': this.userAgent, Accept: 'application/json' },
          signal: AbortSignal.timeout(this.passiveTimeout),
        });

        if (!response.ok) {
          throw new DiscoveryError(`crt.sh returned ${response.status}`, 'crt.sh');
        }

        const json: unknown = await response.json();
        return json;
      },
      this.retries,
      this.retryDelay
    );

    return parseCertificateNames(records, domain);
  }

  /**
   * Name generation only; existence is decided by the resolver
   */
  private enumerateFromWordlist(domain: string, words: readonly string[]): Set<string> {
    const names = new Set<string>();
    for (const word of words) {
      const host = normalizeHostname(`${word}.${domain}`);
      if (host) names.add(host);
    }
    return names;
  }
}
