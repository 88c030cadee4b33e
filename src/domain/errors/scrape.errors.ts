export abstract class ScrapeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Cookie handshake failed; whatever cookies were stored before stay in place. */
export class AcquisitionError extends ScrapeError {
  constructor(
    message: string,
    readonly step: string,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** Data request produced nothing usable this cycle. */
export class FetchError extends ScrapeError {
  constructor(message: string, readonly status?: number, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/** Origin refused the cookies (401/403). */
export class AuthRejection extends ScrapeError {
  constructor(readonly status: number) {
    super(`Origin rejected session cookies with HTTP ${status}`);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
