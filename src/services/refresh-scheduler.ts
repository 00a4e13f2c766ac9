import { errorHandler } from '../utils/error-handler';
import { logger } from '../utils/logger';
import { DashboardFetcher, SettingsSource } from './fetcher';

export type RefreshTarget = Pick<DashboardFetcher, 'fetchAllConfiguredRepositories'>;

/**
 * Periodically re-fetches the configured repositories to keep the cache warm.
 * At most one refresh runs at a time; ticks that land during a run are skipped.
 */
export class RefreshScheduler {
  private timer: NodeJS.Timeout | undefined;
  private intervalSeconds: number | undefined;
  private inFlight: Promise<void> | undefined;

  constructor(
    private readonly fetcher: RefreshTarget,
    private readonly settings: SettingsSource
  ) {}

  start(intervalSeconds: number): void {
    if (this.timer) {
      this.stop();
    }

    this.intervalSeconds = intervalSeconds;
    this.timer = setInterval(() => this.onTick(), intervalSeconds * 1000);
    logger.info('Started background refresh', { intervalSeconds });
  }

  stop(): void {
    if (!this.timer) {
      return;
    }

    clearInterval(this.timer);
    this.timer = undefined;
    this.intervalSeconds = undefined;
    logger.info('Background refresh stopped');
  }

  reschedule(intervalSeconds: number): void {
    if (!this.timer || this.intervalSeconds === intervalSeconds) {
      return;
    }

    logger.info('Rescheduling background refresh', {
      from: this.intervalSeconds,
      to: intervalSeconds,
    });
    this.start(intervalSeconds);
  }

  isRunning(): boolean {
    return this.timer !== undefined;
  }

  getIntervalSeconds(): number | undefined {
    return this.intervalSeconds;
  }

  private onTick(): void {
    if (this.settings.get().repositories.length === 0) {
      return;
    }

    if (this.inFlight) {
      logger.warn('Skipping background refresh, previous run still in progress');
      return;
    }

    this.inFlight = this.refresh().finally(() => {
      this.inFlight = undefined;
    });
  }

  private async refresh(): Promise<void> {
    logger.info('Performing background repository refresh');
    const endTimer = logger.createTimer('background refresh');

    try {
      const repositories = await this.fetcher.fetchAllConfiguredRepositories();
      logger.info('Background refresh completed', {
        repositories: repositories.length,
        duration: `${endTimer()}ms`,
      });
    } catch (error) {
      errorHandler.handleError(error, { operation: 'backgroundRefresh' });
    }
  }
}
