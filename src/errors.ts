/**
 * Error taxonomy
 *
 * InvalidArgumentError and ConfigMissingError are fatal and thrown before any
 * query runs. Fetch failures are values (see FetchError) so that one failed
 * query never aborts the iteration.
 */

export class InvalidArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidArgumentError';
  }
}

export class ConfigMissingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigMissingError';
  }
}

export type FetchError =
  | { kind: 'unauthorized'; status: number }
  | { kind: 'server_error'; status: number }
  | { kind: 'transport_failure'; message: string }
  | { kind: 'timeout'; timeoutMs: number };

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

/**
 * One-line description of a fetch failure for logs
 */
export function describeFetchError(error: FetchError): string {
  switch (error.kind) {
    case 'unauthorized':
      return `unauthorized (HTTP ${error.status})`;
    case 'server_error':
      return `server error (HTTP ${error.status})`;
    case 'transport_failure':
      return `transport failure: ${error.message}`;
    case 'timeout':
      return `timed out after ${error.timeoutMs}ms`;
  }
}
