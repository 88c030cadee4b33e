import { Inject, Injectable } from './shared/decorators';
import { Logger } from './shared/logger';
import { TOKENS } from './shared/tokens';
import type { AppConfig } from './shared/config';
import type { IPollLoop } from './domain/interfaces/services.interface';

@Injectable()
export class OiSnapshotApp {
  private readonly logger = new Logger(OiSnapshotApp.name);

  constructor(
    @Inject(TOKENS.PollLoop) private readonly pollLoop: IPollLoop,
    @Inject(TOKENS.AppConfig) private readonly config: AppConfig,
  ) {}

  /** Launches the background poll loop without waiting for its first cycle. */
  public start(): void {
    this.logger.info(
      `Starting background task to fetch ${this.config.symbol} option-chain data every ${this.config.pollIntervalMs / 1000}s`,
    );
    this.pollLoop.start();
  }

  public async stop(): Promise<void> {
    this.logger.info('Stopping OI snapshot service...');
    await this.pollLoop.stop();
    this.logger.info('OI snapshot service stopped gracefully.');
  }
}
