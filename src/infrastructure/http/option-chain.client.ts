import { Inject, Injectable } from '../../shared/decorators';
import { Logger } from '../../shared/logger';
import { TOKENS } from '../../shared/tokens';
import type { AppConfig } from '../../shared/config';
import type { HttpResponse, IHttpSession } from '../../domain/interfaces/http.interface';
import type {
  ICookieAcquirer,
  IOptionChainFetcher,
  ISessionStore,
} from '../../domain/interfaces/services.interface';
import type { RawMarketPayload } from '../../domain/entities/snapshot.entity';
import { AuthRejection, FetchError, describeError } from '../../domain/errors/scrape.errors';
import { apiHeaders } from './browser-headers';
import { AUTH_FAILURE_STATUSES, RetryPolicy } from './retry-policy';

/**
 * Pulls the option-chain JSON for the configured index symbol.
 * Returns null instead of throwing on any failure.
 */
@Injectable()
export class OptionChainClient implements IOptionChainFetcher {
  private readonly logger = new Logger(OptionChainClient.name);
  private readonly retryPolicy: RetryPolicy;

  constructor(
    @Inject(TOKENS.HttpSession) private readonly session: IHttpSession,
    @Inject(TOKENS.SessionStore) private readonly sessionStore: ISessionStore,
    @Inject(TOKENS.CookieAcquirer) private readonly cookieAcquirer: ICookieAcquirer,
    @Inject(TOKENS.AppConfig) private readonly config: AppConfig,
  ) {
    this.retryPolicy = new RetryPolicy({
      maxAttempts: 2,
      shouldRetry: (response) => AUTH_FAILURE_STATUSES.has(response.status),
      beforeRetry: async (response) => {
        const rejection = new AuthRejection(response.status);
        this.logger.warn(`${rejection.message}; refreshing cookies and retrying once`);
        await this.cookieAcquirer.refresh();
      },
    });
  }

  get apiUrl(): string {
    const symbol = encodeURIComponent(this.config.symbol);
    return `${this.config.originBaseUrl}/api/option-chain-indices?symbol=${symbol}`;
  }

  async fetch(): Promise<RawMarketPayload | null> {
    try {
      await this.ensureFreshCookies();

      const response = await this.retryPolicy.execute(() => this.request());
      if (!response.ok) {
        throw new FetchError(`Option-chain API returned HTTP ${response.status}`, response.status);
      }

      return await this.parseBody(response);
    } catch (error) {
      const fetchError =
        error instanceof FetchError
          ? error
          : new FetchError(`Option-chain request failed: ${describeError(error)}`, undefined, {
              cause: error,
            });
      this.logger.error('Error fetching option-chain JSON', fetchError);
      return null;
    }
  }

  private async ensureFreshCookies(): Promise<void> {
    const { cookies, age } = this.sessionStore.getCookies();
    const missing = Object.keys(cookies).length === 0;

    if (missing || age > this.config.cookieTtlMs) {
      this.logger.info(missing ? 'No session cookies yet; acquiring' : 'Session cookies expired; refreshing');
      await this.cookieAcquirer.refresh();
    }
  }

  private request(): Promise<HttpResponse> {
    return this.session.get(this.apiUrl, {
      headers: apiHeaders(`${this.config.originBaseUrl}/option-chain`),
      cookies: { ...this.sessionStore.getCookies().cookies },
      timeoutMs: this.config.requestTimeoutMs,
    });
  }

  private async parseBody(response: HttpResponse): Promise<RawMarketPayload> {
    let payload: unknown;
    try {
      payload = await response.json();
    } catch (error) {
      throw new FetchError('Option-chain response is not valid JSON', response.status, { cause: error });
    }

    // A blocked session is answered with `{}` and a 200
    if (typeof payload !== 'object' || payload === null || Array.isArray(payload)) {
      throw new FetchError('Option-chain response is not a JSON object', response.status);
    }
    if (Object.keys(payload).length === 0) {
      throw new FetchError('Option-chain response is empty', response.status);
    }

    return payload;
  }
}
