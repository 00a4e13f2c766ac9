import { decodeSettingsPayload, isValidRepositoryName, REDACTED_TOKEN } from '../config/settings';
import { DashboardSettings } from '../models/types';
import { CacheStore } from '../services/cache-store';
import { DashboardFetcher } from '../services/fetcher';
import { GitHubClient } from '../services/github-client';
import { SettingsService } from '../services/settings-service';
import { errorHandler, ErrorType, toError } from '../utils/error-handler';
import { HealthMonitor } from '../utils/health-monitor';
import { logger } from '../utils/logger';
import {
  ApiResponse,
  HealthPayload,
  failure,
  success,
  toPullRequestPayload,
  toRepositoryPayload,
} from './payloads';

// Fixed by the host SDK
export enum MessageType {
  GetRepositories = 1,
  GetPullRequests = 2,
  Refresh = 3,
  GetConfig = 4,
  SetConfig = 5,
  HealthCheck = 6,
}

export interface MessageDispatcherDeps {
  fetcher: Pick<DashboardFetcher, 'getRepositories' | 'fetchPullRequests'>;
  cache: CacheStore;
  settings: SettingsService;
  client: Pick<GitHubClient, 'get' | 'getRateLimitStatus'>;
  healthMonitor: Pick<HealthMonitor, 'checkHealth'>;
  redactTokenInConfigResponse: boolean;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseJson(data: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(data) };
  } catch (error) {
    logger.debug('Message payload is not valid JSON', { error: toError(error).message });
    return { ok: false };
  }
}

/**
 * Maps host message types to dashboard operations. Every outcome, including unexpected
 * failures, is returned as an envelope; nothing is thrown to the transport.
 */
export class MessageDispatcher {
  constructor(private readonly deps: MessageDispatcherDeps) {}

  async dispatch(type: number, data: string): Promise<ApiResponse> {
    logger.debug('Received host message', { type, size: data.length });

    let response: ApiResponse;
    try {
      response = await this.route(type, data);
    } catch (error) {
      const appError = errorHandler.handleError(error, { operation: 'dispatch', messageType: type });
      response = failure(errorHandler.getUserFriendlyMessage(appError));
    }

    logger.debug('Sending response', { type, success: response.success, error: response.error });
    return response;
  }

  private route(type: number, data: string): Promise<ApiResponse> {
    switch (type) {
      case MessageType.GetRepositories:
        return this.getRepositories();
      case MessageType.GetPullRequests:
        return this.getPullRequests(data);
      case MessageType.Refresh:
        return Promise.resolve(this.refresh());
      case MessageType.GetConfig:
        return Promise.resolve(this.getConfig());
      case MessageType.SetConfig:
        return this.setConfig(data);
      case MessageType.HealthCheck:
        return this.healthCheck();
      default:
        logger.warn('Unknown message type', { type });
        return Promise.resolve(failure('unknown message type'));
    }
  }

  private async getRepositories(): Promise<ApiResponse> {
    const repositories = await this.deps.fetcher.getRepositories();
    return success(repositories.map(toRepositoryPayload));
  }

  private async getPullRequests(data: string): Promise<ApiResponse> {
    const parsed = parseJson(data);
    if (!parsed.ok || !isRecord(parsed.value)) {
      return failure('Invalid request format');
    }

    const params = parsed.value.params;
    const repository = isRecord(params) ? params.repository : undefined;
    if (typeof repository !== 'string') {
      logger.warn('Missing repository parameter in pull request request');
      return failure('Missing repository parameter');
    }
    if (!isValidRepositoryName(repository)) {
      logger.warn('Rejected invalid repository name', { repository });
      return failure('Invalid repository name');
    }

    const pullRequests = await this.deps.fetcher.fetchPullRequests(repository);
    return success(pullRequests.map(toPullRequestPayload));
  }

  private refresh(): ApiResponse {
    this.deps.cache.invalidateAll();
    return success('Cache cleared successfully');
  }

  private getConfig(): ApiResponse {
    return success(this.deps.settings.toWire({ redactToken: this.deps.redactTokenInConfigResponse }));
  }

  private async setConfig(data: string): Promise<ApiResponse> {
    const parsed = parseJson(data);
    if (!parsed.ok) {
      return failure('Invalid config format');
    }

    let next: DashboardSettings;
    try {
      next = decodeSettingsPayload(parsed.value);
    } catch (error) {
      errorHandler.handleError(error, { operation: 'setConfig' });
      return failure('Invalid config format');
    }

    // A redacted token echoed back from get-config keeps the stored one
    if (next.githubToken === REDACTED_TOKEN) {
      next.githubToken = this.deps.settings.getToken();
    }

    try {
      await this.deps.settings.replace(next);
    } catch (error) {
      const appError = errorHandler.handleError(error, { operation: 'setConfig' });
      if (appError.type === ErrorType.STORAGE) {
        return failure('Failed to save config');
      }
      throw appError;
    }

    return success('Configuration updated');
  }

  private async healthCheck(): Promise<ApiResponse> {
    const { settings, cache, client, healthMonitor } = this.deps;

    let healthy = true;
    let message = 'Plugin is healthy';

    if (settings.hasToken()) {
      try {
        await client.get('/user');
      } catch (error) {
        healthy = false;
        message = `GitHub API connectivity failed: ${toError(error).message}`;
      }
    }

    const system = await healthMonitor.checkHealth();
    const payload: HealthPayload = {
      healthy,
      message,
      repos_configured: settings.getRepositories().length,
      cache_entries: cache.size,
      has_github_token: settings.hasToken(),
      rate_limit: client.getRateLimitStatus(),
      components: system.components.map(({ component, status, message: detail }) => ({
        component,
        status,
        message: detail,
      })),
    };

    return { success: healthy, data: payload };
  }
}
