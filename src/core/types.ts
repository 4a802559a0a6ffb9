// src/core/types.ts
/**
 * Type definitions for takeover-scout
 */

/**
 * Console output format
 */
export type OutputFormat = 'text' | 'json';

/**
 * Application configuration (validated, see config.ts)
 */
export interface AppConfig {
  domain: string;
  /** Path to a wordlist file, one label per line */
  wordlist?: string;
  concurrency: number;
  /** Per-candidate timeout in seconds */
  timeout: number;
  format: OutputFormat;
  /** JSON report destination */
  output?: string;
  /** Custom fingerprint table (JSON) */
  fingerprints?: string;
  resolvers: string[];
  passive: boolean;
  maxBodyBytes: number;
  verbose: boolean;
  quiet: boolean;
}

/**
 * Outcome of a CNAME chain walk
 */
export type ResolutionStatus = 'RESOLVED' | 'NO_RECORD' | 'NXDOMAIN' | 'TIMEOUT' | 'ERROR';

export interface ResolutionResult {
  candidate: string;
  /** Ordered alias targets, first hop first */
  cnameChain: string[];
  status: ResolutionStatus;
  /** The last hop of the chain does not exist */
  dangling?: boolean;
  error?: string;
}

export type ProbeStatus = 'OK' | 'CONN_ERROR' | 'TIMEOUT' | 'TLS_ERROR';

/**
 * HTTP probe result
 */
export interface ProbeResult {
  candidate: string;
  status: ProbeStatus;
  protocol?: 'https' | 'http';
  httpStatus?: number;
  /** Bounded prefix of the response body */
  bodySnippet?: string;
  redirectChain: string[];
  error?: string;
}

/**
 * Service takeover signature
 */
export interface FingerprintEntry {
  readonly service: string;
  readonly cnamePatterns: readonly string[];
  readonly httpPatterns: readonly string[];
  readonly vulnerable: boolean;
}

/**
 * How a service was identified
 */
export type MatchConfidence = 'http' | 'cname-only' | 'none';

/**
 * Classification of one candidate
 */
export interface Finding {
  readonly subdomain: string;
  readonly vulnerable: boolean;
  readonly service: string | null;
  readonly cname: readonly string[];
  readonly evidence: readonly string[];
  readonly confidence: MatchConfidence;
  readonly resolution: ResolutionStatus;
  readonly httpStatus?: number;
  /** HTTP body pattern that confirmed the service */
  readonly fingerprint?: string;
}

/**
 * Candidate names produced by discovery
 */
export interface DiscoveryResult {
  candidates: Set<string>;
  /** Names contributed by certificate transparency */
  passive: number;
  /** Names generated from the wordlist */
  active: number;
  /** Non-fatal discovery failures */
  errors: string[];
}

export type DiscoverySummary = Omit<DiscoveryResult, 'candidates'>;

/**
 * Per-candidate pipeline state
 */
export type CandidateState =
  | 'DISCOVERED'
  | 'RESOLVING'
  | 'RESOLVED'
  | 'UNRESOLVED'
  | 'PROBING'
  | 'MATCHED';

/**
 * Scan metadata
 */
export interface ScanMetadata {
  readonly startTime: Date;
  readonly endTime: Date;
  readonly duration: number;
  readonly totalCandidates: number;
  readonly vulnerableCount: number;
  readonly interrupted: boolean;
  readonly discovery: DiscoverySummary;
}

/**
 * Complete scan report, read-only once handed off
 */
export interface ScanReport {
  readonly domain: string;
  readonly timestamp: Date;
  readonly allCandidates: readonly string[];
  /** Completion order, not discovery order */
  readonly findings: readonly Finding[];
  readonly vulnerableFindings: readonly Finding[];
  readonly metadata: ScanMetadata;
}

/**
 * Pipeline stages, as seen by the orchestrator
 */
export interface SubdomainSource {
  discover(domain: string, wordlist?: readonly string[]): Promise<DiscoveryResult>;
}

export interface DnsResolver {
  /** @param timeout milliseconds */
  resolve(candidate: string, timeout: number): Promise<ResolutionResult>;
}

export interface Prober {
  /** @param timeout milliseconds */
  probe(candidate: string, timeout: number): Promise<ProbeResult>;
}

export interface Matcher {
  match(resolution: ResolutionResult, probe?: ProbeResult): Finding;
}

/**
 * Scan lifecycle hooks
 */
export interface ScanHooks {
  onDiscovered?: (candidates: readonly string[]) => Promise<void> | void;
  onStateChange?: (candidate: string, state: CandidateState) => void;
  onFinding?: (finding: Finding) => Promise<void> | void;
}

/**
 * Cache entry
 */
export interface CacheEntry<T> {
  value: T;
  expiresAt: number;
}

/**
 * Logger levels
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
