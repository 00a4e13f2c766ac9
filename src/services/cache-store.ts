import { PullRequest, Repository } from '../models/types';
import { logger } from '../utils/logger';

export type Clock = () => number;

export interface CacheEntry<T> {
  value: T;
  fetchedAt: number; // epoch ms
}

export interface CacheLookup<T> extends CacheEntry<T> {
  isFresh: boolean;
}

/**
 * Map-backed namespace whose entries never expire on their own. Freshness is decided
 * at read time against the TTL the owner supplies, so a settings change applies to
 * entries already stored.
 */
export class TtlNamespace<T> {
  private entries = new Map<string, CacheEntry<T>>();

  constructor(
    readonly prefix: string,
    private readonly ttlSeconds: () => number,
    private readonly clock: Clock
  ) {}

  get(name: string): CacheLookup<T> | undefined {
    const entry = this.entries.get(this.key(name));
    if (!entry) return undefined;

    const age = this.clock() - entry.fetchedAt;
    return { ...entry, isFresh: age < this.ttlSeconds() * 1000 };
  }

  set(name: string, value: T): void {
    this.entries.set(this.key(name), { value, fetchedAt: this.clock() });
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }

  keys(): string[] {
    return [...this.entries.keys()];
  }

  private key(name: string): string {
    return `${this.prefix}${name}`;
  }
}

/**
 * Repository snapshots and pull-request lists, keyed by repository full name.
 */
export class CacheStore {
  readonly repositories: TtlNamespace<Repository>;
  readonly pullRequests: TtlNamespace<PullRequest[]>;
  private currentGeneration = 0;

  constructor(ttlSeconds: () => number, clock: Clock = Date.now) {
    this.repositories = new TtlNamespace<Repository>('repo:', ttlSeconds, clock);
    this.pullRequests = new TtlNamespace<PullRequest[]>('prs:', ttlSeconds, clock);
  }

  get generation(): number {
    return this.currentGeneration;
  }

  putRepository(fullName: string, repository: Repository, generation = this.currentGeneration): boolean {
    if (generation !== this.currentGeneration) {
      logger.debug('Dropping repository fetched before cache invalidation', { fullName });
      return false;
    }
    this.repositories.set(fullName, repository);
    return true;
  }

  putPullRequests(fullName: string, pullRequests: PullRequest[], generation = this.currentGeneration): boolean {
    if (generation !== this.currentGeneration) {
      logger.debug('Dropping pull requests fetched before cache invalidation', { fullName });
      return false;
    }
    this.pullRequests.set(fullName, pullRequests);
    return true;
  }

  invalidateAll(): void {
    const cleared = this.size;
    this.repositories.clear();
    this.pullRequests.clear();
    this.currentGeneration += 1;
    logger.info('Cache cleared, data will be refreshed on next request', {
      entries: cleared,
      generation: this.currentGeneration,
    });
  }

  get size(): number {
    return this.repositories.size + this.pullRequests.size;
  }

  keys(): string[] {
    return [...this.repositories.keys(), ...this.pullRequests.keys()];
  }
}
