import { Inject, Injectable } from '../../shared/decorators';
import { Logger } from '../../shared/logger';
import { TOKENS } from '../../shared/tokens';
import type { AppConfig } from '../../shared/config';
import type { IHttpSession } from '../../domain/interfaces/http.interface';
import type {
  AcquisitionResult,
  ICookieAcquirer,
  ISessionStore,
} from '../../domain/interfaces/services.interface';
import { AcquisitionError, describeError } from '../../domain/errors/scrape.errors';
import { PAGE_HEADERS } from '../http/browser-headers';

/**
 * Walks the origin's human-facing pages in order (home, then option-chain landing page)
 * so its bot protection issues a complete cookie set, then stores the session's cookies.
 */
@Injectable()
export class CookieAcquirerService implements ICookieAcquirer {
  private readonly logger = new Logger(CookieAcquirerService.name);

  constructor(
    @Inject(TOKENS.HttpSession) private readonly session: IHttpSession,
    @Inject(TOKENS.SessionStore) private readonly sessionStore: ISessionStore,
    @Inject(TOKENS.AppConfig) private readonly config: AppConfig,
  ) {}

  get landingPages(): string[] {
    const base = this.config.originBaseUrl;
    return [base, `${base}/option-chain`];
  }

  async refresh(): Promise<AcquisitionResult> {
    for (const page of this.landingPages) {
      const error = await this.visit(page);
      if (error) {
        this.logger.error('Error refreshing origin cookies; keeping previous ones', error);
        return { ok: false, error };
      }
    }

    const cookies = this.session.getCookies();
    this.sessionStore.setCookies(cookies);
    this.logger.info('Refreshed origin cookies', { cookieNames: Object.keys(cookies) });
    return { ok: true };
  }

  private async visit(page: string): Promise<AcquisitionError | null> {
    try {
      const response = await this.session.get(page, {
        headers: PAGE_HEADERS,
        timeoutMs: this.config.requestTimeoutMs,
      });
      if (!response.ok) {
        return new AcquisitionError(`${page} returned HTTP ${response.status}`, page, response.status);
      }
      return null;
    } catch (error) {
      return new AcquisitionError(`${page} request failed: ${describeError(error)}`, page, undefined, {
        cause: error,
      });
    }
  }
}
