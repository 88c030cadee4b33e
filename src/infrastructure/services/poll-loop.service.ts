import { Inject, Injectable } from '../../shared/decorators';
import { Logger } from '../../shared/logger';
import { TOKENS } from '../../shared/tokens';
import type { AppConfig } from '../../shared/config';
import type {
  ICookieAcquirer,
  IOptionChainFetcher,
  IPollLoop,
  ISessionStore,
  ISnapshotCache,
  PollLoopState,
  PollLoopStats,
} from '../../domain/interfaces/services.interface';
import { extractTotals } from '../../application/parsers/totals.extractor';

/**
 * Background fetch -> parse -> store cycle on a fixed interval.
 * A failed cycle leaves the previous snapshot in place; nothing short of stop() ends the loop.
 */
@Injectable()
export class PollLoopService implements IPollLoop {
  private readonly logger = new Logger(PollLoopService.name);

  private state: PollLoopState = 'stopped';
  private running = false;
  private loop: Promise<void> | null = null;
  private cancelSleep: (() => void) | null = null;

  private cycles = 0;
  private successes = 0;
  private failures = 0;
  private consecutiveFailures = 0;
  private lastSuccessAt: number | null = null;
  private lastFailureAt: number | null = null;

  constructor(
    @Inject(TOKENS.OptionChainFetcher) private readonly fetcher: IOptionChainFetcher,
    @Inject(TOKENS.CookieAcquirer) private readonly cookieAcquirer: ICookieAcquirer,
    @Inject(TOKENS.SessionStore) private readonly sessionStore: ISessionStore,
    @Inject(TOKENS.SnapshotCache) private readonly snapshotCache: ISnapshotCache,
    @Inject(TOKENS.AppConfig) private readonly config: AppConfig,
  ) {}

  public start(): void {
    if (this.loop) {
      this.logger.warn('Poll loop already running');
      return;
    }

    this.running = true;
    this.state = 'idle';
    this.logger.info(`Starting poll loop for ${this.config.symbol} every ${this.config.pollIntervalMs}ms`);
    this.loop = this.run().catch((error: unknown) => {
      this.logger.error('Poll loop terminated unexpectedly', error);
    });
  }

  public async stop(): Promise<void> {
    const loop = this.loop;
    if (!loop) return;

    this.running = false;
    this.cancelSleep?.();
    await loop;

    this.loop = null;
    this.state = 'stopped';
    this.logger.info('Poll loop stopped');
  }

  /**
   * One fetch-parse-store pass. Resolves to whether the snapshot was updated; never rejects.
   */
  public async runCycle(): Promise<boolean> {
    this.state = 'fetching';
    this.cycles++;
    let updated = false;

    try {
      if (!this.sessionStore.hasCookies()) {
        await this.cookieAcquirer.refresh();
      }

      const payload = await this.fetcher.fetch();
      if (payload !== null) {
        const snapshot = this.snapshotCache.set(extractTotals(payload));
        this.logger.info('Updated snapshot', {
          CE: snapshot.totals.CE.totalOI,
          PE: snapshot.totals.PE.totalOI,
        });
        updated = true;
      } else {
        this.logger.warn('Received no data; will retry on next cycle');
      }
    } catch (error) {
      this.logger.error('Unexpected exception in poll cycle', error);
    }

    this.recordOutcome(updated);
    this.state = this.running ? 'idle' : 'stopped';
    return updated;
  }

  public getStats(): PollLoopStats {
    return {
      state: this.state,
      cycles: this.cycles,
      successes: this.successes,
      failures: this.failures,
      consecutiveFailures: this.consecutiveFailures,
      lastSuccessAt: this.lastSuccessAt,
      lastFailureAt: this.lastFailureAt,
    };
  }

  private async run(): Promise<void> {
    while (this.running) {
      await this.runCycle();
      if (!this.running) break;
      await this.sleep(this.config.pollIntervalMs);
    }
  }

  private recordOutcome(updated: boolean): void {
    if (updated) {
      this.successes++;
      this.consecutiveFailures = 0;
      this.lastSuccessAt = Date.now();
      return;
    }

    this.failures++;
    this.consecutiveFailures++;
    this.lastFailureAt = Date.now();
    if (this.consecutiveFailures % 5 === 0) {
      this.logger.warn(`${this.consecutiveFailures} consecutive poll cycles without data`);
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.cancelSleep = null;
        resolve();
      }, ms);
      this.cancelSleep = () => {
        clearTimeout(timer);
        this.cancelSleep = null;
        resolve();
      };
    });
  }
}
