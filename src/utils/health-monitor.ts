import { logger } from './logger';
import { toError } from './error-handler';
import { DatabaseManager } from '../database/manager';
import { GitHubClient } from '../services/github-client';

export type HealthStatus = 'healthy' | 'unhealthy' | 'degraded';

export interface HealthCheckResult {
  component: string;
  status: HealthStatus;
  message: string;
  details?: Record<string, unknown>;
  timestamp: string;
  responseTime?: number;
}

export interface SystemHealth {
  overall: HealthStatus;
  components: HealthCheckResult[];
  timestamp: string;
  uptime: number;
}

export interface APIMetrics {
  github: {
    requestCount: number;
    errorCount: number;
    averageResponseTime: number;
    rateLimitRemaining: number | null;
    rateLimitReset: number | null;
  };
}

const DEFAULT_CHECK_INTERVAL_MS = 5 * 60 * 1000;

export class HealthMonitor {
  private readonly startTime: number;
  private healthChecks: Map<string, () => Promise<HealthCheckResult>> = new Map();
  private metrics = { github: { requests: 0, errors: 0, totalTime: 0 } };
  private githubClient?: GitHubClient;
  private databaseManager?: DatabaseManager;
  private periodicTimer: NodeJS.Timeout | undefined;

  constructor() {
    this.startTime = Date.now();
    this.setupDefaultHealthChecks();
  }

  private setupDefaultHealthChecks(): void {
    this.addHealthCheck('database', async () => {
      const startTime = Date.now();
      if (!this.databaseManager) {
        return {
          component: 'database',
          status: 'degraded',
          message: 'Plugin storage not initialized',
          timestamp: new Date().toISOString(),
        };
      }

      const healthy = await this.databaseManager.healthCheck();
      return {
        component: 'database',
        status: healthy ? 'healthy' : 'unhealthy',
        message: healthy ? 'Plugin storage is healthy' : 'Plugin storage query failed',
        responseTime: Date.now() - startTime,
        timestamp: new Date().toISOString(),
      };
    });

    this.addHealthCheck('memory', async () => {
      const memUsage = process.memoryUsage();
      const memoryPercentage = (memUsage.heapUsed / memUsage.heapTotal) * 100;

      let status: HealthStatus = 'healthy';
      let message = 'Memory usage is normal';

      if (memoryPercentage > 90) {
        status = 'unhealthy';
        message = 'Memory usage is critically high';
      } else if (memoryPercentage > 75) {
        status = 'degraded';
        message = 'Memory usage is elevated';
      }

      return {
        component: 'memory',
        status,
        message,
        details: {
          used: Math.round(memUsage.heapUsed / 1024 / 1024),
          total: Math.round(memUsage.heapTotal / 1024 / 1024),
          percentage: Math.round(memoryPercentage * 100) / 100,
        },
        timestamp: new Date().toISOString(),
      };
    });

    // Reports the last observed rate limit; never issues a request itself
    this.addHealthCheck('github', async () => {
      if (!this.githubClient) {
        return {
          component: 'github',
          status: 'degraded',
          message: 'GitHub client not initialized',
          timestamp: new Date().toISOString(),
        };
      }

      const { remaining, reset } = this.githubClient.getRateLimitStatus();

      let status: HealthStatus = 'healthy';
      let message = 'GitHub API rate limit is sufficient';

      if (remaining === null) {
        message = 'No GitHub API calls made yet';
      } else if (remaining === 0) {
        status = 'unhealthy';
        message = 'GitHub API rate limit exceeded';
      } else if (remaining < 100) {
        status = 'degraded';
        message = 'GitHub API rate limit is low';
      }

      return {
        component: 'github',
        status,
        message,
        details: {
          rateLimitRemaining: remaining,
          rateLimitReset: reset !== null ? new Date(reset * 1000).toISOString() : null,
        },
        timestamp: new Date().toISOString(),
      };
    });
  }

  public setGitHubClient(client: GitHubClient): void {
    this.githubClient = client;
  }

  public setDatabaseManager(manager: DatabaseManager): void {
    this.databaseManager = manager;
  }

  public addHealthCheck(name: string, check: () => Promise<HealthCheckResult>): void {
    this.healthChecks.set(name, check);
    logger.debug(`Added health check: ${name}`);
  }

  /**
   * Runs all health checks and returns system health status
   */
  public async checkHealth(): Promise<SystemHealth> {
    const results: HealthCheckResult[] = [];

    for (const [name, check] of this.healthChecks) {
      try {
        const result = await check();
        results.push(result);
        logger.logHealthCheck(name, result.status === 'healthy' ? 'healthy' : 'unhealthy', result.details);
      } catch (error) {
        const errorResult: HealthCheckResult = {
          component: name,
          status: 'unhealthy',
          message: `Health check failed: ${toError(error).message}`,
          timestamp: new Date().toISOString(),
        };
        results.push(errorResult);
        logger.logHealthCheck(name, 'unhealthy', { error: errorResult.message });
      }
    }

    const unhealthyCount = results.filter(r => r.status === 'unhealthy').length;
    const degradedCount = results.filter(r => r.status === 'degraded').length;

    let overall: HealthStatus = 'healthy';
    if (unhealthyCount > 0) {
      overall = 'unhealthy';
    } else if (degradedCount > 0) {
      overall = 'degraded';
    }

    return {
      overall,
      components: results,
      timestamp: new Date().toISOString(),
      uptime: Date.now() - this.startTime,
    };
  }

  public getAPIMetrics(): APIMetrics {
    const rateLimit = this.githubClient?.getRateLimitStatus();
    const { requests, errors, totalTime } = this.metrics.github;

    return {
      github: {
        requestCount: requests,
        errorCount: errors,
        averageResponseTime: requests > 0 ? Math.round(totalTime / requests) : 0,
        rateLimitRemaining: rateLimit?.remaining ?? null,
        rateLimitReset: rateLimit?.reset ?? null,
      },
    };
  }

  public recordGitHubAPICall(duration: number, success: boolean): void {
    this.metrics.github.requests++;
    this.metrics.github.totalTime += duration;
    if (!success) {
      this.metrics.github.errors++;
    }
  }

  public startPeriodicHealthChecks(intervalMs: number = DEFAULT_CHECK_INTERVAL_MS): void {
    this.stopPeriodicHealthChecks();

    this.periodicTimer = setInterval(() => {
      this.checkHealth()
        .then(health => {
          if (health.overall === 'unhealthy') {
            logger.warn('System health check failed', {
              unhealthyComponents: health.components.filter(c => c.status === 'unhealthy').map(c => c.component),
            });
          } else if (health.overall === 'degraded') {
            logger.info('System health is degraded', {
              degradedComponents: health.components.filter(c => c.status === 'degraded').map(c => c.component),
            });
          } else {
            logger.debug('System health check passed');
          }
          logger.info('System metrics', { api: this.getAPIMetrics(), uptime: this.getUptimeString() });
        })
        .catch(error => {
          logger.error('Periodic health check failed', {}, toError(error));
        });
    }, intervalMs);
  }

  public stopPeriodicHealthChecks(): void {
    if (this.periodicTimer) {
      clearInterval(this.periodicTimer);
      this.periodicTimer = undefined;
    }
  }

  public getUptimeString(): string {
    const seconds = Math.floor((Date.now() - this.startTime) / 1000);
    const minutes = Math.floor(seconds / 60);
    const hours = Math.floor(minutes / 60);
    const days = Math.floor(hours / 24);

    if (days > 0) {
      return `${days}d ${hours % 24}h ${minutes % 60}m`;
    } else if (hours > 0) {
      return `${hours}h ${minutes % 60}m`;
    } else if (minutes > 0) {
      return `${minutes}m ${seconds % 60}s`;
    }
    return `${seconds}s`;
  }
}
