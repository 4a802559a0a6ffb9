/**
 * HTTP utilities for probing untrusted hosts
 */

import { Agent } from 'undici';
import type { Readable } from 'node:stream';

/**
 * Create a connection pool for probes. Certificate verification is off:
 * abandoned third-party endpoints routinely present invalid certificates,
 * and the probe only reads what they serve.
 */
export function createProbeAgent(connectTimeout: number) {
  return new Agent({
    connections: 100,
    keepAliveTimeout: 4000,
    keepAliveMaxTimeout: 10000,
    connect: {
      rejectUnauthorized: false,
      timeout: connectTimeout,
    },
  });
}

/**
 * Read at most `maxBytes` from a body stream, then stop reading.
 * Returns the decoded prefix and whether the body was cut short, either by
 * the cap or by a read error after some bytes arrived. A read error before
 * the first byte is rethrown.
 */
export async function readBodyPrefix(
  body: Readable,
  maxBytes: number
): Promise<{ text: string; truncated: boolean }> {
  const chunks: Buffer[] = [];
  let received = 0;
  let truncated = false;

  try {
    for await (const chunk of body) {
      const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
      chunks.push(buf);
      received += buf.length;
      if (received >= maxBytes) {
        truncated = received > maxBytes;
        break;
      }
    }
  } catch (error) {
    if (received === 0) throw error;
    truncated = true;
  } finally {
    // leaving the loop early destroys the stream; make sure either way
    body.destroy();
  }

  const text = Buffer.concat(chunks).subarray(0, maxBytes).toString('utf8');
  return { text, truncated };
}

/**
 * Header value as a single string
 */
export function headerValue(
  headers: Record<string, string | string[] | undefined>,
  name: string
): string | undefined {
  const value = headers[name.toLowerCase()];
  if (Array.isArray(value)) return value[0];
  return value;
}

/**
 * Resolve relative Location headers against the current URL
 */
export function resolveLocation(currentUrl: string, location: string): string | null {
  try {
    return new URL(location, currentUrl).toString();
  } catch {
    return null;
  }
}
