/**
 * takeover-scout - subdomain takeover scanner
 * Main entry point for programmatic usage
 */

export { App, type AppOverrides } from './core/app.js';
export {
  SubdomainEnumerator,
  parseCertificateNames,
  parseWordlist,
  loadWordlist,
} from './core/enumerator.js';
export {
  CnameResolver,
  createDnsClientFactory,
  DEFAULT_RESOLVERS,
  type DnsClient,
} from './core/resolver.js';
export { HostProber, classifyProbeError } from './core/probe.js';
export { FingerprintMatcher } from './core/matcher.js';
export { FingerprintTable } from './core/fingerprints.js';
export { ScanOrchestrator, FindingLog, type ScanComponents } from './core/orchestrator.js';
export { resolveConfig, DEFAULT_CONFIG, type ConfigInput } from './core/config.js';
export {
  toReportDocument,
  formatJSON,
  formatText,
  writeReport,
  type ReportDocument,
} from './core/report.js';
export { ConfigurationError, DiscoveryError } from './core/errors.js';
export * from './core/types.js';

/**
 * Version information
 */
export const VERSION = '1.0.0';

/**
 * Quick scan interface for programmatic usage
 * @example
 * ```typescript
 * import { quickScan } from 'takeover-scout';
 *
 * const report = await quickScan('example.com', { concurrency: 20 });
 * console.log(report.vulnerableFindings);
 * ```
 */
export async function quickScan(
  domain: string,
  options: {
    concurrency?: number;
    /** seconds */
    timeout?: number;
    wordlist?: string;
    passive?: boolean;
    signal?: AbortSignal;
  } = {}
) {
  const { App } = await import('./core/app.js');
  const { resolveConfig } = await import('./core/config.js');
  const app = new App(
    resolveConfig({
      domain,
      concurrency: options.concurrency,
      timeout: options.timeout,
      wordlist: options.wordlist,
      passive: options.passive,
      quiet: true,
    })
  );

  return await app.run(options.signal);
}
