/**
 * src/core/probe.ts
 *
 * HTTP/HTTPS probing of takeover candidates:
 * - HTTPS first, one plain-HTTP retry on TLS or connection failure
 * - certificate verification disabled (see createProbeAgent)
 * - manual redirect following, chain recorded
 * - body read capped in bytes and in time, separately from connect/headers
 * - every fault folded into ProbeResult.status
 */

import { request, type Dispatcher } from 'undici';
import { createProbeAgent, headerValue, readBodyPrefix, resolveLocation } from '../utils/http.js';
import { errorCode, errorMessage } from './errors.js';
import { logger } from '../utils/logger.js';
import type { ProbeResult, ProbeStatus, Prober } from './types.js';

export const DEFAULT_MAX_BODY_BYTES = 64 * 1024;

export interface ProberOptions {
  /** Connect timeout of the pooled agent, in milliseconds */
  connectTimeout?: number;
  /** Body read timeout in milliseconds (defaults to the probe timeout) */
  readTimeout?: number;
  maxBodyBytes?: number;
  maxRedirects?: number;
  userAgent?: string;
  /** Dispatcher to send requests through instead of the insecure pool */
  dispatcher?: Dispatcher;
}

const TIMEOUT_CODES = new Set([
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
  'UND_ERR_ABORTED',
  'ETIMEDOUT',
  'ABORT_ERR',
]);

const TLS_CODES = new Set([
  'EPROTO',
  'CERT_HAS_EXPIRED',
  'DEPTH_ZERO_SELF_SIGNED_CERT',
  'SELF_SIGNED_CERT_IN_CHAIN',
  'UNABLE_TO_VERIFY_LEAF_SIGNATURE',
]);

/**
 * Map a request failure onto a probe status
 */
export function classifyProbeError(error: unknown): ProbeStatus {
  const code = errorCode(error);
  if (code && (code.startsWith('ERR_TLS_') || code.startsWith('ERR_SSL_') || TLS_CODES.has(code))) {
    return 'TLS_ERROR';
  }
  if (code && TIMEOUT_CODES.has(code)) {
    return 'TIMEOUT';
  }
  if (error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError')) {
    return 'TIMEOUT';
  }
  return 'CONN_ERROR';
}

interface Attempt {
  status: ProbeStatus;
  httpStatus?: number;
  bodySnippet?: string;
  redirectChain: string[];
  error?: string;
}

export class HostProber implements Prober {
  private dispatcher: Dispatcher;
  private ownsDispatcher: boolean;
  private readTimeout?: number;
  private maxBodyBytes: number;
  private maxRedirects: number;
  private userAgent: string;

  constructor(options: ProberOptions = {}) {
    this.ownsDispatcher = !options.dispatcher;
    this.dispatcher = options.dispatcher ?? createProbeAgent(options.connectTimeout ?? 5000);
    this.readTimeout = options.readTimeout;
    this.maxBodyBytes = options.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES;
    this.maxRedirects = options.maxRedirects ?? 5;
    this.userAgent = options.userAgent ?? 'Mozilla/5.0 (compatible; takeover-scout/1.0)';
  }

  /**
   * @param timeout milliseconds for connect + response headers, per attempt
   */
  async probe(candidate: string, timeout: number): Promise<ProbeResult> {
    const https = await this.attempt(candidate, 'https', timeout);
    // a host that answered slowly over HTTPS is not retried; one that never connected is
    const connected = https.status !== 'TIMEOUT' || https.error !== 'UND_ERR_CONNECT_TIMEOUT';
    if (https.status === 'OK' || (https.status === 'TIMEOUT' && connected)) {
      return { candidate, protocol: 'https', ...https };
    }

    logger.debug(`HTTPS probe ${candidate} -> ${https.status}, retrying over HTTP`);
    const http = await this.attempt(candidate, 'http', timeout);
    return { candidate, protocol: 'http', ...http };
  }

  async close(): Promise<void> {
    if (this.ownsDispatcher) {
      await this.dispatcher.close();
    }
  }

  /**
   * One protocol, following redirects
   */
  private async attempt(
    candidate: string,
    protocol: 'https' | 'http',
    timeout: number
  ): Promise<Attempt> {
    let url = `${protocol}://${candidate}/`;
    const redirectChain: string[] = [];

    for (let hop = 0; ; hop++) {
      const controller = new AbortController();
      let timer = setTimeout(() => controller.abort(), timeout);

      try {
        const response = await request(url, {
          method: 'GET',
          dispatcher: this.dispatcher,
          headers: {
            accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
            'user-agent': this.userAgent,
          },
          headersTimeout: timeout,
          bodyTimeout: this.readTimeout ?? timeout,
          signal: controller.signal,
        });

        const location = headerValue(response.headers, 'location');
        const target = location ? resolveLocation(url, location) : null;

        const redirect = response.statusCode >= 300 && response.statusCode < 400;
        if (redirect && target && hop < this.maxRedirects) {
          // free the socket before the next hop
          response.body.destroy();
          redirectChain.push(target);
          url = target;
          continue;
        }

        // headers are in: from here on only the read timeout applies
        clearTimeout(timer);
        timer = setTimeout(() => controller.abort(), this.readTimeout ?? timeout);

        const { text, truncated } = await readBodyPrefix(response.body, this.maxBodyBytes);
        if (truncated) {
          logger.debug(`Body of ${url} cut at ${Buffer.byteLength(text)} bytes`);
        }

        return {
          status: 'OK',
          httpStatus: response.statusCode,
          bodySnippet: text,
          redirectChain,
        };
      } catch (error) {
        const status = classifyProbeError(error);
        logger.debug(`Probe ${url} failed (${status}): ${errorMessage(error)}`);
        return { status, redirectChain, error: errorCode(error) ?? errorMessage(error) };
      } finally {
        clearTimeout(timer);
      }
    }
  }
}
