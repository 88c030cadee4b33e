import type { HttpResponse } from '../../domain/interfaces/http.interface';

export interface RetryPolicyOptions {
  /** Total attempts, the first one included. */
  maxAttempts: number;
  shouldRetry(response: HttpResponse): boolean;
  /** Runs between a rejected attempt and the next one. */
  beforeRetry(response: HttpResponse, failedAttempt: number): Promise<void>;
}

export const AUTH_FAILURE_STATUSES: ReadonlySet<number> = new Set([401, 403]);

export class RetryPolicy {
  constructor(private readonly options: RetryPolicyOptions) {
    if (!Number.isInteger(options.maxAttempts) || options.maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be a positive integer, got ${options.maxAttempts}`);
    }
  }

  async execute(attempt: (attemptNumber: number) => Promise<HttpResponse>): Promise<HttpResponse> {
    let attemptNumber = 1;
    let response = await attempt(attemptNumber);

    while (attemptNumber < this.options.maxAttempts && this.options.shouldRetry(response)) {
      await this.options.beforeRetry(response, attemptNumber);
      attemptNumber++;
      response = await attempt(attemptNumber);
    }

    return response;
  }
}
