/**
 * Report rendering: JSON document and console summary
 */

import { writeFile } from 'fs/promises';
import chalk from 'chalk';
import type { Finding, ScanReport } from './types.js';

export interface ReportFinding {
  subdomain: string;
  vulnerable: boolean;
  service: string | null;
  cname: string[];
  evidence: string[];
}

export interface ReportDocument {
  scan_info: {
    domain: string;
    timestamp: string;
    total_subdomains: number;
    vulnerable_count: number;
  };
  subdomains: string[];
  vulnerable: ReportFinding[];
}

const toReportFinding = (finding: Finding): ReportFinding => ({
  subdomain: finding.subdomain,
  vulnerable: finding.vulnerable,
  service: finding.service,
  cname: [...finding.cname],
  evidence: [...finding.evidence],
});

export function toReportDocument(report: ScanReport): ReportDocument {
  return {
    scan_info: {
      domain: report.domain,
      timestamp: report.timestamp.toISOString(),
      total_subdomains: report.allCandidates.length,
      vulnerable_count: report.vulnerableFindings.length,
    },
    subdomains: [...report.allCandidates],
    vulnerable: report.vulnerableFindings.map(toReportFinding),
  };
}

export function formatJSON(report: ScanReport): string {
  return JSON.stringify(toReportDocument(report), null, 2);
}

export async function writeReport(path: string, report: ScanReport): Promise<void> {
  await writeFile(path, formatJSON(report) + '\n', 'utf-8');
}

function findingLines(finding: Finding, color: (text: string) => string): string[] {
  const lines = [`   ${color('[!]')} ${chalk.bold(finding.subdomain)}`];
  if (finding.service) {
    lines.push(`       ${chalk.yellow('Service:')} ${finding.service}`);
  }
  if (finding.cname.length > 0) {
    lines.push(`       ${chalk.yellow('CNAME  :')} ${finding.cname.join(' -> ')}`);
  }
  for (const item of finding.evidence) {
    lines.push(`       ${chalk.blue('└─')} ${item}`);
  }
  return lines;
}

/**
 * Console summary. With `verbose`, non-vulnerable findings that point at a
 * known service are listed too.
 */
export function formatText(report: ScanReport, verbose = false): string {
  const { metadata } = report;
  const lines: string[] = [];

  lines.push(chalk.cyan.bold('\n╔════════════════════════════════════════════════════════════╗'));
  lines.push(chalk.cyan.bold('║                        SCAN SUMMARY                        ║'));
  lines.push(chalk.cyan.bold('╚════════════════════════════════════════════════════════════╝\n'));

  lines.push(chalk.gray('   Target Domain        : ') + chalk.cyan.bold(report.domain));
  const seconds = (metadata.duration / 1000).toFixed(2);
  lines.push(chalk.gray('   Scan Duration        : ') + chalk.white(`${seconds}s`));
  lines.push(
    chalk.gray('   Subdomains Scanned   : ') + chalk.cyan.bold(String(report.allCandidates.length))
  );
  lines.push(
    chalk.gray('   Checked              : ') + chalk.white(String(report.findings.length))
  );
  lines.push(
    chalk.gray('   Vulnerable           : ') +
      (report.vulnerableFindings.length > 0
        ? chalk.red.bold(String(report.vulnerableFindings.length))
        : chalk.green('0'))
  );
  if (metadata.interrupted) {
    lines.push(chalk.yellow('   Scan was interrupted; results are partial.'));
  }
  for (const message of metadata.discovery.errors) {
    lines.push(chalk.yellow(`   Discovery: ${message}`));
  }
  lines.push('');

  if (report.vulnerableFindings.length > 0) {
    lines.push(chalk.red.bold('   VULNERABLE SUBDOMAINS\n'));
    for (const finding of report.vulnerableFindings) {
      lines.push(...findingLines(finding, chalk.red), '');
    }
  } else {
    lines.push(chalk.green.bold('   No vulnerable subdomains found.\n'));
  }

  if (verbose) {
    const identified = report.findings.filter((f) => !f.vulnerable && f.cname.length > 0);
    if (identified.length > 0) {
      lines.push(chalk.bold('   OTHER CNAME RECORDS\n'));
      for (const finding of identified) {
        lines.push(...findingLines(finding, chalk.gray), '');
      }
    }
  }

  return lines.join('\n');
}
