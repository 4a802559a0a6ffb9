#!/usr/bin/env node

/**
 * takeover-scout CLI entry point
 */

import { Command, CommanderError } from 'commander';
import chalk from 'chalk';
import { scanCommand } from './commands/scan.js';
import { VERSION } from '../index.js';

const program = new Command();

program
  .name('takeover-scout')
  .description('Subdomain takeover scanner: dangling CNAMEs matched against service fingerprints')
  .version(VERSION);

const BOX_WIDTH = 59;

// `plain` is the unstyled text of `styled`, used for padding
const boxRow = (plain: string, styled: string) => {
  const padded = `  ${styled}`.padEnd(BOX_WIDTH + styled.length - plain.length);
  return chalk.cyan('║') + padded + chalk.cyan('║');
};

const title = `TAKEOVER SCOUT v${VERSION}`;
const banner = [
  '',
  chalk.cyan(`╔${'═'.repeat(BOX_WIDTH)}╗`),
  boxRow(title, `${chalk.bold.white('TAKEOVER SCOUT')} ${chalk.gray(`v${VERSION}`)}`),
  boxRow('Subdomain takeover detection', chalk.gray('Subdomain takeover detection')),
  chalk.cyan(`╚${'═'.repeat(BOX_WIDTH)}╝`),
  '',
].join('\n');

program.addHelpText('beforeAll', banner);

// `takeover-scout -d example.com` runs a scan without naming the command
program.addCommand(scanCommand, { isDefault: true });

program.exitOverride();

try {
  await program.parseAsync(process.argv);
} catch (error) {
  // commander has already printed its own message (or the help text)
  if (error instanceof CommanderError) {
    process.exit(error.exitCode);
  }
  if (error instanceof Error) {
    console.error(chalk.red(`\n❌ Error: ${error.message}\n`));
    process.exit(1);
  }
  throw error;
}
