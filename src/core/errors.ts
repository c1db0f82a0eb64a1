/**
 * Error taxonomy shared by the storage, presence and adapter layers.
 */

/** Storage unreachable, full, or a statement failed. Propagated to the immediate caller. */
export class StoreError extends Error {
  constructor(
    readonly operation: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`${operation}: ${message}`, options);
    this.name = 'StoreError';
  }
}

/** A collaborator outside this process failed (OneBot API, live room API, upload script). */
export class UpstreamError extends Error {
  constructor(
    readonly upstream: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`${upstream}: ${message}`, options);
    this.name = 'UpstreamError';
  }
}

/** Malformed configuration or payload. */
export class InvalidInputError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'InvalidInputError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function assertNever(value: never, what: string): never {
  throw new Error(`Unhandled ${what}: ${JSON.stringify(value)}`);
}
