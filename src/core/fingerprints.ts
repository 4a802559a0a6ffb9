/**
 * Service fingerprint table
 *
 * Entries keep the order of the source file. That order is the tie-break
 * when a CNAME or a response body matches more than one service, so the
 * table is frozen once built and never edited during a scan.
 */

import { readFile } from 'fs/promises';
import { ConfigurationError, errorMessage } from './errors.js';
import type { FingerprintEntry } from './types.js';

export const DEFAULT_FINGERPRINTS_PATH = new URL('../../data/fingerprints.json', import.meta.url);

/** Shape of one record in the JSON data file */
interface RawFingerprint {
  service: string;
  cname: string[];
  http: string[];
  vulnerable: boolean;
}

const isStringArray = (value: unknown): value is string[] =>
  Array.isArray(value) && value.every((v) => typeof v === 'string' && v.trim().length > 0);

function isRawFingerprint(value: unknown): value is RawFingerprint {
  return (
    typeof value === 'object' &&
    value !== null &&
    'service' in value &&
    typeof value.service === 'string' &&
    value.service.trim().length > 0 &&
    'cname' in value &&
    isStringArray(value.cname) &&
    value.cname.length > 0 &&
    'http' in value &&
    isStringArray(value.http) &&
    'vulnerable' in value &&
    typeof value.vulnerable === 'boolean'
  );
}

export class FingerprintTable {
  readonly entries: readonly FingerprintEntry[];

  constructor(entries: readonly FingerprintEntry[]) {
    const seen = new Set<string>();
    for (const entry of entries) {
      if (seen.has(entry.service)) {
        throw new ConfigurationError(`Duplicate fingerprint service: ${entry.service}`);
      }
      seen.add(entry.service);
    }

    this.entries = Object.freeze(
      entries.map((entry) =>
        Object.freeze({
          service: entry.service,
          cnamePatterns: Object.freeze(entry.cnamePatterns.map((p) => p.trim().toLowerCase())),
          httpPatterns: Object.freeze([...entry.httpPatterns]),
          vulnerable: entry.vulnerable,
        })
      )
    );
  }

  /**
   * Build a table from parsed JSON (an array of
   * `{ service, cname, http, vulnerable }` records)
   */
  static fromJSON(data: unknown): FingerprintTable {
    if (!Array.isArray(data)) {
      throw new ConfigurationError('Fingerprint data must be an array');
    }

    const entries = data.map((record: unknown, index): FingerprintEntry => {
      if (!isRawFingerprint(record)) {
        throw new ConfigurationError(`Invalid fingerprint record at index ${index}`);
      }
      return {
        service: record.service.trim(),
        cnamePatterns: record.cname,
        httpPatterns: record.http,
        vulnerable: record.vulnerable,
      };
    });

    return new FingerprintTable(entries);
  }

  /**
   * Load a table from a JSON file (the bundled table by default)
   */
  static async load(path: string | URL = DEFAULT_FINGERPRINTS_PATH): Promise<FingerprintTable> {
    let content: string;
    try {
      content = await readFile(path, 'utf-8');
    } catch (error) {
      throw new ConfigurationError(
        `Fingerprint file not readable: ${String(path)} (${errorMessage(error)})`,
        { cause: error }
      );
    }

    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch (error) {
      throw new ConfigurationError(`Fingerprint file is not valid JSON: ${String(path)}`, {
        cause: error,
      });
    }

    return FingerprintTable.fromJSON(data);
  }

  get size(): number {
    return this.entries.length;
  }

  find(service: string): FingerprintEntry | undefined {
    return this.entries.find((entry) => entry.service === service);
  }

  /**
   * Entries with a CNAME pattern contained in `hostname`, in table order
   */
  matchHostname(hostname: string): FingerprintEntry[] {
    const host = hostname.toLowerCase();
    return this.entries.filter((entry) => entry.cnamePatterns.some((p) => host.includes(p)));
  }
}
