import { DashboardSettings, PullRequest, Repository } from '../models/types';
import { errorHandler } from '../utils/error-handler';
import { logger } from '../utils/logger';
import { CacheStore, Clock } from './cache-store';
import { demoPullRequests, demoRepositories } from './demo-data';
import { GitHubClient } from './github-client';
import { decodePullRequests, decodeRepository } from './github-decoder';

export interface SettingsSource {
  get(): DashboardSettings;
}

export type UpstreamClient = Pick<GitHubClient, 'get'>;

/**
 * Resolves dashboard data from the cache, then GitHub, then demo data. Identical requests
 * issued within one cache generation share a single upstream call.
 */
export class DashboardFetcher {
  private repositoryFlights = new Map<string, Promise<Repository>>();
  private pullRequestFlights = new Map<string, Promise<PullRequest[]>>();

  constructor(
    private readonly client: UpstreamClient,
    private readonly cache: CacheStore,
    private readonly settings: SettingsSource,
    private readonly clock: Clock = Date.now
  ) {}

  /**
   * Single lookup. Upstream and decode failures propagate to the caller.
   */
  async fetchRepository(fullName: string): Promise<Repository> {
    const cached = this.cache.repositories.get(fullName);
    if (cached?.isFresh) {
      return cached.value;
    }

    return this.share(this.repositoryFlights, fullName, async generation => {
      const repository = decodeRepository(await this.client.get(`/repos/${fullName}`));
      this.cache.putRepository(fullName, repository, generation);
      return repository;
    });
  }

  /**
   * Fetches every configured repository in configuration order. A failed entry falls back
   * to its stale snapshot when one exists and is omitted otherwise.
   */
  async fetchAllConfiguredRepositories(): Promise<Repository[]> {
    const names = this.settings.get().repositories;

    const results = await Promise.all(names.map(async name => {
      try {
        return await this.fetchRepository(name);
      } catch (error) {
        errorHandler.handleError(error, { operation: 'fetchRepository', repository: name });

        const stale = this.cache.repositories.get(name);
        if (stale) {
          logger.info('Serving stale repository snapshot', { repository: name, fetchedAt: stale.fetchedAt });
          return stale.value;
        }
        return undefined;
      }
    }));

    return results.filter((repository): repository is Repository => repository !== undefined);
  }

  async getRepositories(): Promise<Repository[]> {
    if (this.settings.get().repositories.length === 0) {
      logger.info('No repositories configured, returning demo data');
      return demoRepositories(this.clock());
    }
    return this.fetchAllConfiguredRepositories();
  }

  /**
   * Never rejects: failures resolve to the stale list when one exists, else an empty list.
   */
  async fetchPullRequests(fullName: string): Promise<PullRequest[]> {
    const cached = this.cache.pullRequests.get(fullName);
    if (cached?.isFresh) {
      return cached.value;
    }

    const { githubToken, maxPRsPerRepo } = this.settings.get();
    if (!githubToken) {
      logger.debug('No GitHub token configured, returning demo pull requests', { repository: fullName });
      return demoPullRequests(fullName, this.clock());
    }

    try {
      return await this.share(this.pullRequestFlights, fullName, async generation => {
        const body = await this.client.get(`/repos/${fullName}/pulls`, { state: 'open', per_page: maxPRsPerRepo });
        const pullRequests = decodePullRequests(body);
        this.cache.putPullRequests(fullName, pullRequests, generation);
        return pullRequests;
      });
    } catch (error) {
      errorHandler.handleError(error, { operation: 'fetchPullRequests', repository: fullName });

      const stale = this.cache.pullRequests.get(fullName);
      if (stale) {
        logger.info('Serving stale pull request list', { repository: fullName, fetchedAt: stale.fetchedAt });
        return stale.value;
      }
      return [];
    }
  }

  private share<T>(
    flights: Map<string, Promise<T>>,
    fullName: string,
    task: (generation: number) => Promise<T>
  ): Promise<T> {
    const generation = this.cache.generation;
    const key = `${generation}:${fullName}`;

    const existing = flights.get(key);
    if (existing) {
      return existing;
    }

    const flight = task(generation).finally(() => flights.delete(key));
    flights.set(key, flight);
    return flight;
  }
}
