/**
 * Error types and helpers for unknown thrown values
 */

/**
 * Invalid or missing input. Aborts the scan before any work starts.
 */
export class ConfigurationError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConfigurationError';
  }
}

/**
 * Passive source unreachable or unparseable. Never fatal: the enumerator
 * records it and carries on with whatever it has.
 */
export class DiscoveryError extends Error {
  constructor(
    message: string,
    readonly source: string,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'DiscoveryError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Read the `code` of a Node/undici error, if any
 */
export function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}
