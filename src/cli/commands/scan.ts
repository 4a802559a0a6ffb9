/**
 * Scan command implementation
 */

import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { App } from '../../core/app.js';
import { DEFAULT_CONFIG, resolveConfig } from '../../core/config.js';
import { ConfigurationError } from '../../core/errors.js';
import type { AppConfig } from '../../core/types.js';

function positiveInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

function positiveNumber(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive number.');
  }
  return parsed;
}

function printBanner(config: AppConfig): void {
  console.log(
    chalk.cyan.bold('\n╔════════════════════════════════════════════════════════════╗\n') +
      chalk.cyan.bold('║                      TAKEOVER SCOUT                        ║\n') +
      chalk.cyan.bold('╚════════════════════════════════════════════════════════════╝\n')
  );

  console.log(
    chalk.bold('   Target') + chalk.gray(' ──▶ ') + chalk.cyan.bold(config.domain) + '\n'
  );

  console.log(chalk.dim('   Configuration'));
  console.log(
    chalk.gray('   ├─ Threads          : ') + chalk.white.bold(String(config.concurrency))
  );
  console.log(chalk.gray('   ├─ Timeout          : ') + chalk.white(`${config.timeout}s`));
  console.log(
    chalk.gray('   ├─ Passive (crt.sh) : ') +
      (config.passive ? chalk.green('Enabled') : chalk.dim('Disabled'))
  );
  console.log(
    chalk.gray('   ├─ Wordlist         : ') +
      (config.wordlist ? chalk.blue(config.wordlist) : chalk.dim('None'))
  );
  console.log(chalk.gray('   ├─ Resolvers        : ') + chalk.white(config.resolvers.join(', ')));
  console.log(
    chalk.gray('   └─ Output File      : ') +
      (config.output ? chalk.blue(config.output) : chalk.dim('None')) +
      '\n'
  );
}

export const scanCommand = new Command('scan')
  .description('Enumerate subdomains and check them for dangling CNAME takeovers')
  .requiredOption('-d, --domain <domain>', 'Target domain to scan')
  .option('-w, --wordlist <file>', 'Wordlist of labels for active enumeration')
  .option(
    '-t, --threads <number>',
    'Concurrent checks',
    positiveInteger,
    DEFAULT_CONFIG.concurrency
  )
  .option(
    '--timeout <seconds>',
    'Per-request timeout in seconds',
    positiveNumber,
    DEFAULT_CONFIG.timeout
  )
  .option('-o, --output <file>', 'Write the JSON report to a file')
  .option('-f, --format <type>', 'Console output format: text|json', DEFAULT_CONFIG.format)
  .option('--fingerprints <file>', 'Service fingerprint table (JSON)')
  .option('--resolvers <ips...>', 'DNS servers to query')
  .option('--no-passive', 'Skip certificate transparency lookup')
  .option(
    '--max-body <bytes>',
    'Bytes of response body to inspect',
    positiveInteger,
    DEFAULT_CONFIG.maxBodyBytes
  )
  .option('-v, --verbose', 'Verbose output', false)
  .option('-q, --quiet', 'Suppress output', false)
  .action(
    async (options: {
      domain: string;
      wordlist?: string;
      threads: number;
      timeout: number;
      output?: string;
      format: string;
      fingerprints?: string;
      resolvers?: string[];
      passive: boolean;
      maxBody: number;
      verbose: boolean;
      quiet: boolean;
    }) => {
      const controller = new AbortController();
      const onInterrupt = () => {
        console.error(chalk.yellow('\n   Interrupted, finishing checks in progress...'));
        controller.abort();
      };

      try {
        const config = resolveConfig({
          domain: options.domain,
          wordlist: options.wordlist,
          concurrency: options.threads,
          timeout: options.timeout,
          format: options.format,
          output: options.output,
          fingerprints: options.fingerprints,
          resolvers: options.resolvers,
          passive: options.passive,
          maxBodyBytes: options.maxBody,
          verbose: options.verbose,
          quiet: options.quiet,
        });

        if (!config.quiet && config.format === 'text') {
          printBanner(config);
        }

        process.once('SIGINT', onInterrupt);
        const app = new App(config);
        const report = await app.run(controller.signal);

        if (!config.quiet && config.format === 'text') {
          const line = report.metadata.interrupted
            ? chalk.yellow.bold('   ! Scan interrupted, partial results above')
            : chalk.green.bold('   ✔ Scan completed');
          console.log(line + '\n');
        }

        process.exit(0);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        const title = error instanceof ConfigurationError ? 'Invalid configuration' : 'Scan failed';
        console.error(chalk.red.bold(`\n   ✘ ${title}\n`));
        console.error(chalk.red('   Error: ') + chalk.white(message) + '\n');
        process.exit(1);
      } finally {
        process.removeListener('SIGINT', onInterrupt);
      }
    }
  );
