import { Octokit } from '@octokit/rest';
import {
  ApplicationError,
  RateLimitError,
  UnreachableError,
  UpstreamError,
  toError,
} from '../utils/error-handler';
import { logger } from '../utils/logger';

export interface RateLimitStatus {
  remaining: number | null;
  reset: number | null; // epoch seconds
}

export interface GitHubClientOptions {
  baseUrl: string;
  userAgent: string;
  requestTimeout: number; // ms
  tokenProvider: () => string | undefined;
  fetch?: typeof fetch | undefined;
  metrics?: GitHubCallRecorder | undefined;
}

export interface GitHubCallRecorder {
  recordGitHubAPICall(duration: number, success: boolean): void;
}

export type QueryParams = Record<string, string | number>;

type ResponseHeaders = Record<string, string | number | undefined>;

interface HttpFailure extends Error {
  status: number;
  response?: { headers: ResponseHeaders } | undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function isHeaders(value: unknown): value is ResponseHeaders {
  return isRecord(value) && Object.values(value).every(
    header => header === undefined || typeof header === 'string' || typeof header === 'number'
  );
}

/**
 * Octokit raises a RequestError with a numeric status for HTTP failures. Network failures
 * also carry a status (500) but no response.
 */
function isHttpFailure(error: unknown): error is HttpFailure {
  if (!(error instanceof Error) || !('status' in error) || typeof error.status !== 'number') {
    return false;
  }
  if (!('response' in error) || error.response === undefined) {
    return true;
  }
  return isRecord(error.response) && isHeaders(error.response.headers);
}

function readHeader(headers: ResponseHeaders | undefined, name: string): string | undefined {
  const value = headers?.[name];
  return value === undefined ? undefined : String(value);
}

/**
 * Thin authenticated GET over the GitHub REST API. One attempt per call: failures are
 * classified and thrown, never retried.
 */
export class GitHubClient {
  private octokit: Octokit;
  private currentToken: string | undefined;
  private rateLimit: RateLimitStatus = { remaining: null, reset: null };

  constructor(private readonly options: GitHubClientOptions) {
    this.currentToken = options.tokenProvider();
    this.octokit = this.createOctokit(this.currentToken);
  }

  async get(path: string, query: QueryParams = {}): Promise<unknown> {
    const octokit = this.resolveOctokit();
    const endTimer = logger.createTimer(`GET ${path}`);

    try {
      const response = await octokit.request(`GET ${path}`, {
        ...query,
        request: { signal: AbortSignal.timeout(this.options.requestTimeout) },
      });

      const duration = endTimer();
      this.updateRateLimit(response.headers);
      this.options.metrics?.recordGitHubAPICall(duration, true);
      logger.logGitHubAPICall('GET', path, response.status, duration);

      return response.data;
    } catch (error) {
      const duration = endTimer();
      this.options.metrics?.recordGitHubAPICall(duration, false);

      const classified = this.classify(error, path);
      logger.logGitHubAPICall('GET', path, classified.statusCode, duration);
      throw classified;
    }
  }

  getRateLimitStatus(): RateLimitStatus {
    return { ...this.rateLimit };
  }

  private resolveOctokit(): Octokit {
    const token = this.options.tokenProvider();
    if (token !== this.currentToken) {
      this.currentToken = token;
      this.octokit = this.createOctokit(token);
      logger.debug('GitHub client re-authenticated', { authenticated: token !== undefined });
    }
    return this.octokit;
  }

  private createOctokit(token: string | undefined): Octokit {
    return new Octokit({
      auth: token,
      baseUrl: this.options.baseUrl,
      userAgent: this.options.userAgent,
      request: this.options.fetch ? { fetch: this.options.fetch } : {},
      log: {
        debug: (message: string) => logger.debug(message),
        info: (message: string) => logger.debug(message),
        warn: (message: string) => logger.warn(message),
        error: (message: string) => logger.debug(message),
      },
    });
  }

  private classify(error: unknown, path: string): ApplicationError {
    if (!isHttpFailure(error) || error.response === undefined) {
      const cause = toError(error);
      return new UnreachableError(`Request to ${path} failed: ${cause.message}`, cause);
    }

    const headers = error.response.headers;
    this.updateRateLimit(headers);

    const exhausted = readHeader(headers, 'x-ratelimit-remaining') === '0';
    if (exhausted && (error.status === 401 || error.status === 403 || error.status === 429)) {
      const reset = this.rateLimit.reset ?? undefined;
      logger.logRateLimitHit(path, 0, reset);
      return new RateLimitError(`Rate limit exhausted for ${path}`, error.status, reset, error);
    }

    return new UpstreamError(`GitHub returned ${error.status} for ${path}`, error.status, error);
  }

  private updateRateLimit(headers: ResponseHeaders | undefined): void {
    const remaining = readHeader(headers, 'x-ratelimit-remaining');
    const reset = readHeader(headers, 'x-ratelimit-reset');

    if (remaining !== undefined && Number.isFinite(Number(remaining))) {
      this.rateLimit.remaining = Number(remaining);
    }
    if (reset !== undefined && Number.isFinite(Number(reset))) {
      this.rateLimit.reset = Number(reset);
    }
  }
}
