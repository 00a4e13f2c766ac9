import { AppConfig } from '../config';
import { DatabaseManager } from '../database/manager';
import { MessageDispatcher, MessageType } from '../handlers/message-dispatcher';
import { ApiResponse } from '../handlers/payloads';
import { EncryptionUtil } from '../utils/encryption';
import { errorHandler, toError } from '../utils/error-handler';
import { HealthMonitor } from '../utils/health-monitor';
import { logger } from '../utils/logger';
import { CacheStore, Clock } from './cache-store';
import { DashboardFetcher } from './fetcher';
import { GitHubClient } from './github-client';
import { RefreshScheduler } from './refresh-scheduler';
import { SettingsService, SettingsStore } from './settings-service';

export interface DashboardPluginOptions {
  config: AppConfig;
  store: SettingsStore;
  database?: DatabaseManager | undefined;
  fetch?: typeof fetch | undefined;
  clock?: Clock | undefined;
}

type PluginState = 'idle' | 'running' | 'stopped';

/**
 * Owns all dashboard state for one plugin instance: settings, cache, GitHub client,
 * fetcher, refresh timer and dispatcher. Lifecycle is start, handleMessage*, stop.
 */
export class DashboardPlugin {
  readonly settings: SettingsService;
  readonly cache: CacheStore;
  readonly client: GitHubClient;
  readonly fetcher: DashboardFetcher;
  readonly scheduler: RefreshScheduler;
  readonly healthMonitor: HealthMonitor;
  private readonly dispatcher: MessageDispatcher;
  private state: PluginState = 'idle';

  constructor(options: DashboardPluginOptions) {
    const { config } = options;
    const clock = options.clock ?? Date.now;

    this.settings = new SettingsService(options.store, {
      settingsKey: config.plugin.settingsKey,
      settingsVersion: config.plugin.settingsVersion,
      encryption: new EncryptionUtil(config.security.encryptionKey),
    });

    this.healthMonitor = new HealthMonitor();
    this.cache = new CacheStore(() => this.settings.getCacheTimeout(), clock);
    this.client = new GitHubClient({
      baseUrl: config.github.apiBaseUrl,
      userAgent: config.github.userAgent,
      requestTimeout: config.github.requestTimeout,
      tokenProvider: () => this.settings.getToken(),
      fetch: options.fetch,
      metrics: this.healthMonitor,
    });
    this.fetcher = new DashboardFetcher(this.client, this.cache, this.settings, clock);
    this.scheduler = new RefreshScheduler(this.fetcher, this.settings);

    this.healthMonitor.setGitHubClient(this.client);
    if (options.database) {
      this.healthMonitor.setDatabaseManager(options.database);
    }

    this.dispatcher = new MessageDispatcher({
      fetcher: this.fetcher,
      cache: this.cache,
      settings: this.settings,
      client: this.client,
      healthMonitor: this.healthMonitor,
      redactTokenInConfigResponse: config.security.redactTokenInConfigResponse,
    });
  }

  async start(): Promise<void> {
    if (this.state !== 'idle') {
      return;
    }

    const endTimer = logger.createTimer('dashboard start');
    logger.info('Initializing repository dashboard');

    try {
      await this.settings.load();
    } catch (error) {
      errorHandler.handleError(error, { operation: 'loadSettings' });
      logger.warn('Failed to load settings, continuing with defaults');
    }

    await this.checkConnectivity();

    try {
      const repositories = await this.fetcher.getRepositories();
      logger.info('Initial repository load completed', { repositories: repositories.length });
    } catch (error) {
      errorHandler.handleError(error, { operation: 'warmCache' });
    }

    this.scheduler.start(this.settings.get().refreshInterval);
    this.healthMonitor.startPeriodicHealthChecks();
    this.state = 'running';

    logger.logStartup('Repository dashboard', true, endTimer());
  }

  async handleMessage(type: number, data: string): Promise<ApiResponse> {
    const response = await this.dispatcher.dispatch(type, data);

    if (type === MessageType.SetConfig) {
      this.scheduler.reschedule(this.settings.get().refreshInterval);
    }

    return response;
  }

  /**
   * Stops the refresh timer and writes the settings back to storage. Requests already
   * in flight are left to finish.
   */
  async stop(): Promise<void> {
    if (this.state === 'stopped') {
      return;
    }
    const wasRunning = this.state === 'running';
    this.state = 'stopped';

    logger.info('Starting graceful shutdown');
    this.scheduler.stop();
    this.healthMonitor.stopPeriodicHealthChecks();

    if (!wasRunning) {
      logger.logShutdown('Repository dashboard', true);
      return;
    }

    try {
      await this.settings.persist();
      logger.logShutdown('Repository dashboard', true);
    } catch (error) {
      errorHandler.handleError(error, { operation: 'persistSettingsOnShutdown' });
      logger.logShutdown('Repository dashboard', false, toError(error));
    }
  }

  isRunning(): boolean {
    return this.state === 'running';
  }

  private async checkConnectivity(): Promise<void> {
    if (!this.settings.hasToken()) {
      logger.info('No GitHub token configured - using public API with rate limits');
      return;
    }

    try {
      await this.client.get('/user');
      logger.info('GitHub API connectivity verified');
    } catch (error) {
      errorHandler.handleError(error, { operation: 'connectivityCheck' });
    }
  }
}
