/**
 * Fingerprint matching: CNAME evidence first, HTTP body to confirm
 */

import type { FingerprintTable } from './fingerprints.js';
import type {
  FingerprintEntry,
  Finding,
  Matcher,
  ProbeResult,
  ResolutionResult,
  ResolutionStatus,
} from './types.js';

const RESOLUTION_EVIDENCE: Record<Exclude<ResolutionStatus, 'ERROR'>, string> = {
  RESOLVED: 'No CNAME record',
  NO_RECORD: 'No CNAME record',
  NXDOMAIN: 'Domain does not exist (NXDOMAIN)',
  TIMEOUT: 'DNS resolution timed out',
};

interface Candidate {
  entry: FingerprintEntry;
  /** First chain hop that matched one of the entry's CNAME patterns */
  hop: string;
}

/**
 * Pure: the same inputs always give the same Finding. Ties go to the entry
 * listed first in the table.
 */
export class FingerprintMatcher implements Matcher {
  constructor(private readonly table: FingerprintTable) {}

  match(resolution: ResolutionResult, probe?: ProbeResult): Finding {
    const { candidate, cnameChain, status } = resolution;

    if (status !== 'RESOLVED' || cnameChain.length === 0) {
      const evidence =
        status === 'ERROR'
          ? `DNS resolution failed${resolution.error ? `: ${resolution.error}` : ''}`
          : RESOLUTION_EVIDENCE[status];
      return this.finding(resolution, { evidence: [evidence] });
    }

    const candidates = this.candidateServices(cnameChain);
    if (candidates.length === 0) {
      return this.finding(resolution, {
        evidence: [
          `CNAME points to: ${cnameChain.join(' -> ')}`,
          'No matching service fingerprint',
        ],
        httpStatus: probe?.httpStatus,
      });
    }

    const probed = probe?.status === 'OK' ? probe : undefined;
    const body = probed?.bodySnippet?.toLowerCase() ?? '';
    const confirmed = body
      ? candidates
          .map((c) => ({
            ...c,
            pattern: c.entry.httpPatterns.find((p) => body.includes(p.toLowerCase())),
          }))
          .filter((c): c is Candidate & { pattern: string } => c.pattern !== undefined)
      : [];

    const httpMatch = confirmed.length > 0;
    const pool = httpMatch ? confirmed : candidates;
    const [selected, ...others] = pool;

    const evidence = [
      `CNAME points to: ${selected.hop}`,
      `Service identified: ${selected.entry.service}`,
    ];

    if (probed) {
      evidence.push(`HTTP Status: ${probed.httpStatus ?? 'unknown'}`);
    } else if (probe) {
      evidence.push(`HTTP probe failed (${probe.status})`);
    }
    if (!httpMatch) {
      evidence.push('CNAME-only match: no HTTP fingerprint confirmed');
    }
    if (others.length > 0) {
      evidence.push(
        `Ambiguous fingerprint: also matches ${others.map((c) => c.entry.service).join(', ')}`
      );
    }
    if (resolution.dangling) {
      evidence.push('CNAME target does not resolve (NXDOMAIN)');
    }

    return {
      subdomain: candidate,
      vulnerable: selected.entry.vulnerable,
      service: selected.entry.service,
      cname: [...cnameChain],
      evidence,
      confidence: httpMatch ? 'http' : 'cname-only',
      resolution: status,
      httpStatus: probed?.httpStatus,
      fingerprint: httpMatch ? confirmed[0].pattern : undefined,
    };
  }

  /**
   * Entries matching any hop of the chain, in table order
   */
  private candidateServices(chain: readonly string[]): Candidate[] {
    const matches: Candidate[] = [];
    for (const entry of this.table.entries) {
      const hop = chain.find((host) => {
        const lower = host.toLowerCase();
        return entry.cnamePatterns.some((p) => lower.includes(p));
      });
      if (hop) matches.push({ entry, hop });
    }
    return matches;
  }

  private finding(
    resolution: ResolutionResult,
    detail: { evidence: string[]; httpStatus?: number }
  ): Finding {
    return {
      subdomain: resolution.candidate,
      vulnerable: false,
      service: null,
      cname: [...resolution.cnameChain],
      evidence: detail.evidence,
      confidence: 'none',
      resolution: resolution.status,
      httpStatus: detail.httpStatus,
    };
  }
}
