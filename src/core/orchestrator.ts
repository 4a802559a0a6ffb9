/**
 * Scan orchestration: discovery, then a bounded pool running
 * resolve -> probe -> match for each candidate
 */

import { forEachBounded } from '../utils/concurrency.js';
import { logger } from '../utils/logger.js';
import { errorMessage } from './errors.js';
import type {
  CandidateState,
  DnsResolver,
  Finding,
  Matcher,
  ProbeResult,
  Prober,
  ResolutionResult,
  ScanHooks,
  ScanReport,
  SubdomainSource,
} from './types.js';

const PROGRESS_EVERY = 100;

export interface ScanComponents {
  source: SubdomainSource;
  resolver: DnsResolver;
  prober: Prober;
  matcher: Matcher;
}

export interface ScanRunOptions {
  domain: string;
  wordlist?: readonly string[];
  concurrency: number;
  /** Per-candidate timeout in seconds */
  timeout: number;
  signal?: AbortSignal;
  hooks?: ScanHooks;
}

/**
 * Append-only findings list. The only writer of a scan's findings: one
 * Finding per candidate, frozen on the way in.
 */
export class FindingLog {
  private readonly entries: Finding[] = [];
  private readonly seen = new Set<string>();

  append(finding: Finding): boolean {
    if (this.seen.has(finding.subdomain)) {
      logger.warn(`Duplicate finding for ${finding.subdomain} dropped`);
      return false;
    }
    this.seen.add(finding.subdomain);
    this.entries.push(Object.freeze({ ...finding }));
    return true;
  }

  get size(): number {
    return this.entries.length;
  }

  snapshot(): readonly Finding[] {
    return Object.freeze([...this.entries]);
  }
}

export class ScanOrchestrator {
  constructor(private readonly components: ScanComponents) {}

  async run(options: ScanRunOptions): Promise<ScanReport> {
    const { concurrency, signal, hooks = {} } = options;
    const domain = options.domain.toLowerCase();
    const timeoutMs = Math.round(options.timeout * 1000);
    const startTime = new Date();

    const discovery = await this.components.source.discover(domain, options.wordlist);
    const candidates = Array.from(
      new Set(Array.from(discovery.candidates, (name) => name.trim().toLowerCase()))
    ).sort();

    logger.info(`Checking ${candidates.length} candidates (concurrency ${concurrency})...`);
    await this.callHook('onDiscovered', () => hooks.onDiscovered?.(candidates));
    for (const candidate of candidates) {
      this.transition(hooks, candidate, 'DISCOVERED');
    }

    const log = new FindingLog();
    const { aborted } = await forEachBounded(
      candidates,
      async (candidate) => {
        const finding = await this.check(candidate, timeoutMs, hooks);
        if (log.append(finding)) {
          this.transition(hooks, candidate, 'MATCHED');
          if (finding.vulnerable) {
            const service = finding.service ?? 'unknown';
            logger.vuln(`${candidate} -> ${service} (${finding.cname.join(' -> ')})`);
          }
          await this.callHook('onFinding', () => hooks.onFinding?.(finding));
          if (log.size % PROGRESS_EVERY === 0) {
            logger.progress('Checked', log.size, candidates.length);
          }
        }
      },
      { concurrency, signal }
    );

    if (aborted) {
      logger.warn(`Scan interrupted: ${log.size}/${candidates.length} candidates checked`);
    }

    const endTime = new Date();
    const findings = log.snapshot();
    const vulnerableFindings = Object.freeze(findings.filter((f) => f.vulnerable));

    return Object.freeze({
      domain,
      timestamp: startTime,
      allCandidates: Object.freeze(candidates),
      findings,
      vulnerableFindings,
      metadata: Object.freeze({
        startTime,
        endTime,
        duration: endTime.getTime() - startTime.getTime(),
        totalCandidates: candidates.length,
        vulnerableCount: vulnerableFindings.length,
        interrupted: aborted,
        discovery: Object.freeze({
          passive: discovery.passive,
          active: discovery.active,
          errors: [...discovery.errors],
        }),
      }),
    });
  }

  /**
   * Run one candidate to a Finding. Components never throw by contract; if
   * one does anyway the candidate still gets an ERROR finding.
   */
  private async check(candidate: string, timeoutMs: number, hooks: ScanHooks): Promise<Finding> {
    const { resolver, prober, matcher } = this.components;
    let resolution: ResolutionResult;

    try {
      this.transition(hooks, candidate, 'RESOLVING');
      resolution = await resolver.resolve(candidate, timeoutMs);
    } catch (error) {
      resolution = { candidate, cnameChain: [], status: 'ERROR', error: errorMessage(error) };
    }

    let probe: ProbeResult | undefined;
    if (resolution.status === 'RESOLVED' && resolution.cnameChain.length > 0) {
      this.transition(hooks, candidate, 'RESOLVED');
      this.transition(hooks, candidate, 'PROBING');
      try {
        probe = await prober.probe(candidate, timeoutMs);
      } catch (error) {
        probe = { candidate, status: 'CONN_ERROR', redirectChain: [], error: errorMessage(error) };
      }
    } else {
      this.transition(hooks, candidate, 'UNRESOLVED');
    }

    return matcher.match(resolution, probe);
  }

  private transition(hooks: ScanHooks, candidate: string, state: CandidateState): void {
    if (!hooks.onStateChange) return;
    try {
      hooks.onStateChange(candidate, state);
    } catch (error) {
      logger.error(`onStateChange hook failed for ${candidate}: ${errorMessage(error)}`);
    }
  }

  private async callHook(name: keyof ScanHooks, run: () => Promise<void> | void): Promise<void> {
    try {
      await run();
    } catch (error) {
      logger.error(`Hook ${name} failed: ${errorMessage(error)}`);
    }
  }
}
