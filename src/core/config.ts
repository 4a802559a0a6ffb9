/**
 * Configuration defaults and validation
 */

import { ConfigurationError } from './errors.js';
import { DEFAULT_RESOLVERS } from './resolver.js';
import { DEFAULT_MAX_BODY_BYTES } from './probe.js';
import type { AppConfig, OutputFormat } from './types.js';

export const DEFAULT_CONFIG = {
  concurrency: 10,
  timeout: 5,
  format: 'text',
  passive: true,
  maxBodyBytes: DEFAULT_MAX_BODY_BYTES,
  verbose: false,
  quiet: false,
} as const satisfies Partial<AppConfig>;

const OUTPUT_FORMATS: readonly OutputFormat[] = ['text', 'json'];

/**
 * Raw input from the CLI or a programmatic caller
 */
export interface ConfigInput {
  domain?: string;
  wordlist?: string;
  concurrency?: number;
  timeout?: number;
  format?: string;
  output?: string;
  fingerprints?: string;
  resolvers?: string[];
  passive?: boolean;
  maxBodyBytes?: number;
  verbose?: boolean;
  quiet?: boolean;
}

/**
 * Validate domain format
 */
export function isValidDomain(domain: string): boolean {
  const domainRegex = /^(?:[a-zA-Z0-9](?:[a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?\.)+[a-zA-Z]{2,}$/;
  return domainRegex.test(domain);
}

const isOutputFormat = (value: string): value is OutputFormat =>
  OUTPUT_FORMATS.some((format) => format === value);

/**
 * Apply defaults and validate. Throws ConfigurationError on the first
 * invalid value.
 */
export function resolveConfig(input: ConfigInput): AppConfig {
  const domain = input.domain?.trim().toLowerCase().replace(/\.$/, '');
  if (!domain) {
    throw new ConfigurationError('A target domain is required');
  }
  if (!isValidDomain(domain)) {
    throw new ConfigurationError(`Invalid domain: ${input.domain}`);
  }

  const concurrency = input.concurrency ?? DEFAULT_CONFIG.concurrency;
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new ConfigurationError(`Concurrency must be a positive integer, got ${concurrency}`);
  }

  const timeout = input.timeout ?? DEFAULT_CONFIG.timeout;
  if (!Number.isFinite(timeout) || timeout <= 0) {
    throw new ConfigurationError(`Timeout must be a positive number of seconds, got ${timeout}`);
  }

  const format = input.format ?? DEFAULT_CONFIG.format;
  if (!isOutputFormat(format)) {
    throw new ConfigurationError(`Invalid format: ${format}. Use text or json.`);
  }

  const maxBodyBytes = input.maxBodyBytes ?? DEFAULT_CONFIG.maxBodyBytes;
  if (!Number.isInteger(maxBodyBytes) || maxBodyBytes < 1) {
    throw new ConfigurationError(
      `Body cap must be a positive number of bytes, got ${maxBodyBytes}`
    );
  }

  return {
    domain,
    wordlist: input.wordlist,
    concurrency,
    timeout,
    format,
    output: input.output,
    fingerprints: input.fingerprints,
    resolvers:
      input.resolvers && input.resolvers.length > 0 ? input.resolvers : [...DEFAULT_RESOLVERS],
    passive: input.passive ?? DEFAULT_CONFIG.passive,
    maxBodyBytes,
    verbose: input.verbose ?? DEFAULT_CONFIG.verbose,
    quiet: input.quiet ?? DEFAULT_CONFIG.quiet,
  };
}
