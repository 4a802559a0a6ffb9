/**
 * Main application: builds the pipeline from an AppConfig, runs it and
 * renders the report
 */

import chalk from 'chalk';
import { SubdomainEnumerator, loadWordlist } from './enumerator.js';
import { CnameResolver } from './resolver.js';
import { HostProber } from './probe.js';
import { FingerprintMatcher } from './matcher.js';
import { FingerprintTable } from './fingerprints.js';
import { ScanOrchestrator, type ScanComponents } from './orchestrator.js';
import { formatJSON, formatText, writeReport } from './report.js';
import { logger } from '../utils/logger.js';
import type { AppConfig, ScanHooks, ScanReport } from './types.js';

export interface AppOverrides extends Partial<ScanComponents> {
  fingerprints?: FingerprintTable;
  hooks?: ScanHooks;
}

export class App {
  private config: AppConfig;
  private overrides: AppOverrides;

  constructor(config: AppConfig, overrides: AppOverrides = {}) {
    this.config = config;
    this.overrides = overrides;

    logger.setQuiet(config.quiet);
    logger.setLevel(config.verbose ? 'debug' : 'info');
    logger.setStderr(config.format === 'json');
  }

  /**
   * Run the complete scan workflow. Configuration problems (unreadable
   * wordlist or fingerprint file) reject before any network traffic.
   */
  async run(signal?: AbortSignal): Promise<ScanReport> {
    const { config, overrides } = this;

    const table = overrides.fingerprints ?? (await FingerprintTable.load(config.fingerprints));
    logger.debug(`Loaded ${table.size} service fingerprints`);

    const wordlist = config.wordlist ? await loadWordlist(config.wordlist) : undefined;
    if (wordlist) {
      logger.info(`Loaded ${wordlist.length} words from ${config.wordlist}`);
    }

    let ownProber: HostProber | undefined;
    const prober =
      overrides.prober ??
      (ownProber = new HostProber({
        connectTimeout: config.timeout * 1000,
        maxBodyBytes: config.maxBodyBytes,
      }));

    const orchestrator = new ScanOrchestrator({
      source: overrides.source ?? new SubdomainEnumerator({ passive: config.passive }),
      resolver: overrides.resolver ?? new CnameResolver({ servers: config.resolvers }),
      prober,
      matcher: overrides.matcher ?? new FingerprintMatcher(table),
    });

    try {
      logger.info(chalk.cyan.bold('Enumerating subdomains...'));
      const report = await orchestrator.run({
        domain: config.domain,
        wordlist,
        concurrency: config.concurrency,
        timeout: config.timeout,
        signal,
        hooks: overrides.hooks,
      });

      await this.outputResults(report);
      return report;
    } finally {
      await ownProber?.close();
    }
  }

  /**
   * Print the report and write the JSON file, if requested
   */
  private async outputResults(report: ScanReport): Promise<void> {
    if (!this.config.quiet) {
      const { format, verbose } = this.config;
      const output = format === 'json' ? formatJSON(report) : formatText(report, verbose);
      console.log(output);
    }

    if (this.config.output) {
      await writeReport(this.config.output, report);
      logger.success(`Results saved to ${this.config.output}`);
    }
  }
}
